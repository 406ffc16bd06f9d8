import { FetchError, NetworkError } from "../core/errors";
import type { Logger } from "../core/logger";
import { systemClock, type Clock } from "../core/cooldown";
import { pickOne, type RandomSource } from "../core/random";
import { retryWithBackoff } from "../core/retry";
import { DEFAULT_HEADER_PROFILES, type HeaderProfile } from "./header-profiles";
import { createAxiosTransport, type HttpTransport } from "./transport";

export interface FetcherOptions {
  logger: Logger;
  minIntervalMs?: number;
  maxRetries?: number;
  backoffBaseMs?: number;
  maxBackoffMs?: number;
  timeoutMs?: number;
  headerProfiles?: readonly HeaderProfile[];
  transport?: HttpTransport;
  clock?: Clock;
  random?: RandomSource;
}

export interface Fetcher {
  fetch(url: string): Promise<Buffer>;
}

export class RateLimitedFetcher implements Fetcher {
  private lastRequestAt: number | null = null;
  private readonly logger: Logger;
  private readonly minIntervalMs: number;
  private readonly maxRetries: number;
  private readonly backoffBaseMs: number;
  private readonly maxBackoffMs: number;
  private readonly timeoutMs: number;
  private readonly headerProfiles: readonly HeaderProfile[];
  private readonly transport: HttpTransport;
  private readonly clock: Clock;
  private readonly random: RandomSource;

  constructor(options: FetcherOptions) {
    this.logger = options.logger;
    this.minIntervalMs = options.minIntervalMs ?? 2000;
    this.maxRetries = options.maxRetries ?? 3;
    this.backoffBaseMs = options.backoffBaseMs ?? 1000;
    this.maxBackoffMs = options.maxBackoffMs ?? 60000;
    this.timeoutMs = options.timeoutMs ?? 15000;
    this.headerProfiles = options.headerProfiles ?? DEFAULT_HEADER_PROFILES;
    this.transport = options.transport ?? createAxiosTransport();
    this.clock = options.clock ?? systemClock;
    this.random = options.random ?? Math.random;
  }

  async fetch(url: string): Promise<Buffer> {
    const maxAttempts = this.maxRetries + 1;

    try {
      return await retryWithBackoff(
        (attempt) => this.attempt(url, attempt, maxAttempts),
        {
          maxAttempts,
          baseDelayMs: this.backoffBaseMs,
          maxDelayMs: this.maxBackoffMs,
          sleep: (ms) => this.clock.sleep(ms),
          shouldRetry: (error) => error instanceof NetworkError,
          logger: this.logger,
        },
        "fetch"
      );
    } catch (error) {
      if (!(error instanceof NetworkError)) {
        throw error;
      }
      this.logger.error({ url, attempts: maxAttempts, code: error.code }, "Fetch failed after all attempts");
      throw new FetchError(`Failed to fetch ${url} after ${maxAttempts} attempts`, "EXHAUSTED", maxAttempts, error);
    }
  }

  private async attempt(url: string, attempt: number, maxAttempts: number): Promise<Buffer> {
    await this.waitForSlot();

    const headers = pickOne(this.headerProfiles, this.random);

    try {
      const response = await this.transport({ url, headers, timeoutMs: this.timeoutMs });
      if (response.status < 200 || response.status >= 300) {
        throw new NetworkError(`Unexpected status ${response.status} for ${url}`, "HTTP_STATUS", response.status);
      }
      this.logger.debug({ url, status: response.status, bytes: response.body.length }, "Fetched");
      return response.body;
    } catch (error) {
      if (error instanceof NetworkError) {
        this.logger.warn(
          { url, attempt: attempt + 1, maxAttempts, code: error.code, status: error.status },
          `Request failed: ${error.message}`
        );
      }
      throw error;
    }
  }

  private async waitForSlot(): Promise<void> {
    if (this.lastRequestAt !== null) {
      const elapsed = this.clock.now() - this.lastRequestAt;
      if (elapsed < this.minIntervalMs) {
        await this.clock.sleep(this.minIntervalMs - elapsed);
      }
    }
    this.lastRequestAt = this.clock.now();
  }
}
