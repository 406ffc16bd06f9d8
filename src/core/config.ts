import { config as dotenvConfig } from "dotenv";
import { z } from "zod";
import { ConfigError } from "./errors";

dotenvConfig();

const envSchema = z.object({
  LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
  LOG_PRETTY: z.string().default("true").transform((v) => v === "true"),
  PROFILE_BASE_URL: z.string().url().default("https://www.instagram.com"),
  FETCH_MIN_INTERVAL_MS: z.coerce.number().nonnegative().default(2000),
  FETCH_MAX_RETRIES: z.coerce.number().int().nonnegative().default(3),
  FETCH_BACKOFF_BASE_MS: z.coerce.number().nonnegative().default(1000),
  FETCH_MAX_BACKOFF_MS: z.coerce.number().nonnegative().default(60000),
  FETCH_TIMEOUT_MS: z.coerce.number().positive().default(15000),
  DOWNLOAD_DELAY_MIN_MS: z.coerce.number().nonnegative().default(1000),
  DOWNLOAD_DELAY_MAX_MS: z.coerce.number().nonnegative().default(3000),
  OUTPUT_BASE_DIR: z.string().default("./profile_scout_results"),
  DEFAULT_POST_LIMIT: z.coerce.number().int().nonnegative().default(12),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const parsed = envSchema.parse(source);
  if (parsed.DOWNLOAD_DELAY_MIN_MS > parsed.DOWNLOAD_DELAY_MAX_MS) {
    throw new ConfigError(
      `DOWNLOAD_DELAY_MIN_MS (${parsed.DOWNLOAD_DELAY_MIN_MS}) exceeds DOWNLOAD_DELAY_MAX_MS (${parsed.DOWNLOAD_DELAY_MAX_MS})`
    );
  }
  return parsed;
}

export const env = parseEnv(process.env);
