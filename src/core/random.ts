/** Returns a number in [0, 1), like Math.random. */
export type RandomSource = () => number;

export function pickOne<T>(items: readonly T[], random: RandomSource): T {
  if (items.length === 0) {
    throw new RangeError("Cannot pick from an empty pool");
  }
  const index = Math.min(Math.floor(random() * items.length), items.length - 1);
  const item = items[index];
  if (item === undefined) {
    throw new RangeError(`Random source produced out-of-range index ${index}`);
  }
  return item;
}

export function uniformBetween(min: number, max: number, random: RandomSource): number {
  return min + random() * (max - min);
}
