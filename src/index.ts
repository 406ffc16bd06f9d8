export { RateLimitedFetcher, type Fetcher, type FetcherOptions } from "./http/rate-limited-fetcher";
export { createAxiosTransport, createHttpClient, type HttpTransport, type HttpRequest, type HttpResponse } from "./http/transport";
export { DEFAULT_HEADER_PROFILES, buildHeaderProfile, type HeaderProfile } from "./http/header-profiles";
export { parseProfilePage } from "./platforms/instagram/page-parser";
export { normalizeProfile } from "./platforms/instagram/profile-normalizer";
export { extractPosts } from "./platforms/instagram/post-extractor";
export { MediaDownloaderService } from "./services/media-downloader.service";
export { OutputWriterService } from "./services/output-writer.service";
export { ProfileScrapeRunner, type ProfileScrapeOptions, type ProfileScrapeResult } from "./orchestration/profile-scrape-runner";
export { presentPosts, presentProfile } from "./presentation/profile-presenter";
export { formatProfileReport } from "./presentation/profile-report";
export { createLogger, type Logger } from "./core/logger";
export { backoffDelayMs } from "./core/retry";
export * from "./core/errors";
export * from "./domain/models";
