import { InvalidArgumentError } from "commander";
import { env } from "../core/config";
import { describeError } from "../core/errors";
import { createLogger, type Logger } from "../core/logger";
import { UsernameSchema } from "../domain/models";
import { RateLimitedFetcher } from "../http/rate-limited-fetcher";
import { ProfileScrapeRunner } from "../orchestration/profile-scrape-runner";
import { MediaDownloaderService } from "../services/media-downloader.service";
import { OutputWriterService } from "../services/output-writer.service";

export interface ProfileCommandOptions {
  download?: boolean;
  limit: number;
  verbose?: boolean;
  output?: string;
}

export function parseUsername(value: string): string {
  const parsed = UsernameSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidArgumentError(parsed.error.issues[0]?.message ?? "Invalid username");
  }
  return parsed.data;
}

export function parseLimit(value: string): number {
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit < 0) {
    throw new InvalidArgumentError("Limit must be a non-negative integer.");
  }
  return limit;
}

export function createRunContext(verbose: boolean): { logger: Logger; runner: ProfileScrapeRunner } {
  const logger = createLogger({ level: verbose ? "debug" : env.LOG_LEVEL });

  const fetcher = new RateLimitedFetcher({
    logger,
    minIntervalMs: env.FETCH_MIN_INTERVAL_MS,
    maxRetries: env.FETCH_MAX_RETRIES,
    backoffBaseMs: env.FETCH_BACKOFF_BASE_MS,
    maxBackoffMs: env.FETCH_MAX_BACKOFF_MS,
    timeoutMs: env.FETCH_TIMEOUT_MS,
  });
  const writer = new OutputWriterService(logger);
  const downloader = new MediaDownloaderService({
    fetcher,
    writer,
    logger,
    delayMinMs: env.DOWNLOAD_DELAY_MIN_MS,
    delayMaxMs: env.DOWNLOAD_DELAY_MAX_MS,
  });

  const runner = new ProfileScrapeRunner({
    fetcher,
    writer,
    downloader,
    logger,
    baseUrl: env.PROFILE_BASE_URL,
  });

  return { logger, runner };
}

export function logCommandFailure(logger: Logger, error: unknown): void {
  logger.error(describeError(error), "Command failed");
}
