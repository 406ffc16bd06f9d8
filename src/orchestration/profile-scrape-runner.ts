import path from "path";
import { describeError } from "../core/errors";
import type { Logger } from "../core/logger";
import { normalizeUsername } from "../core/normalize";
import type { KeyStyle, PostRecord, ProfileRecord } from "../domain/models";
import type { Fetcher } from "../http/rate-limited-fetcher";
import { parseProfilePage } from "../platforms/instagram/page-parser";
import { extractPosts } from "../platforms/instagram/post-extractor";
import { normalizeProfile } from "../platforms/instagram/profile-normalizer";
import { buildProfileUrl } from "../platforms/instagram/selectors";
import { presentPosts, presentProfile } from "../presentation/profile-presenter";
import type { MediaDownloaderService } from "../services/media-downloader.service";
import type { OutputWriterService } from "../services/output-writer.service";

export const PROFILE_DATA_FILE = "profile_data.json";
export const POSTS_METADATA_FILE = "posts_metadata.json";

export interface ProfileScrapeDeps {
  fetcher: Fetcher;
  writer: OutputWriterService;
  downloader: MediaDownloaderService;
  logger: Logger;
  baseUrl: string;
  now?: () => Date;
}

export interface ProfileScrapeOptions {
  username: string;
  limit: number;
  download: boolean;
  persist: boolean;
  baseDir: string;
  keyStyle: KeyStyle;
}

export interface ProfileScrapeResult {
  status: "success" | "failed";
  username: string;
  profile?: ProfileRecord;
  posts: PostRecord[];
  outputDir?: string;
  mediaComplete?: boolean;
  error?: { code: string; message: string };
}

export class ProfileScrapeRunner {
  constructor(private deps: ProfileScrapeDeps) {}

  async run(options: ProfileScrapeOptions): Promise<ProfileScrapeResult> {
    const { logger, baseUrl } = this.deps;
    const username = normalizeUsername(options.username);
    const result: ProfileScrapeResult = { status: "failed", username, posts: [] };

    logger.info({ username, limit: options.limit, download: options.download }, "Starting profile scrape");

    let profile: ProfileRecord;
    try {
      const page = await this.deps.fetcher.fetch(buildProfileUrl(baseUrl, username));
      const raw = parseProfilePage(page.toString("utf8"), logger);
      profile = normalizeProfile(raw, username, { baseUrl, capturedAt: this.deps.now?.() });

      if (!profile.isPrivate) {
        result.posts = extractPosts(raw, options.limit, logger, { baseUrl });
      }
    } catch (error) {
      result.error = describeError(error);
      logger.error({ username, ...result.error }, "Failed to fetch profile data");
      return result;
    }

    result.profile = profile;
    logger.info({ username, isPrivate: profile.isPrivate, posts: result.posts.length }, "Profile scraped");

    if (!options.persist) {
      result.status = "success";
      return result;
    }

    let outputDir: string;
    try {
      outputDir = await this.deps.writer.allocateDirectory(options.baseDir, username);
      result.outputDir = outputDir;

      await this.deps.writer.writeJson(path.join(outputDir, PROFILE_DATA_FILE), presentProfile(profile, options.keyStyle));
      logger.info({ outputDir }, "Data saved");
    } catch (error) {
      result.error = describeError(error);
      logger.error({ username, ...result.error }, "Failed to save profile data");
      return result;
    }

    if (!profile.isPrivate) {
      try {
        await this.deps.writer.writeJson(
          path.join(outputDir, POSTS_METADATA_FILE),
          presentPosts(result.posts, options.keyStyle)
        );
      } catch (error) {
        logger.error({ username, ...describeError(error) }, "Failed to save posts metadata");
      }
    }

    if (options.download) {
      result.mediaComplete = await this.deps.downloader.downloadMedia(profile, result.posts, outputDir);
    }

    result.status = "success";
    return result;
  }
}
