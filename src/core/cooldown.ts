import { uniformBetween, type RandomSource } from "./random";
import { sleep } from "./retry";

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep,
};

export interface ActionDelayOptions {
  minMs: number;
  maxMs: number;
  random?: RandomSource;
  clock?: Clock;
}

export async function actionDelay(options: ActionDelayOptions): Promise<number> {
  const delay = uniformBetween(options.minMs, options.maxMs, options.random ?? Math.random);

  await (options.clock ?? systemClock).sleep(delay);
  return delay;
}
