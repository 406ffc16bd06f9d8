import path from "path";
import { actionDelay, systemClock, type Clock } from "../core/cooldown";
import { describeError } from "../core/errors";
import { safeFileSegment } from "../core/normalize";
import type { Logger } from "../core/logger";
import type { RandomSource } from "../core/random";
import type { PostRecord, ProfileRecord } from "../domain/models";
import type { Fetcher } from "../http/rate-limited-fetcher";
import type { OutputWriterService } from "./output-writer.service";

export interface MediaDownloaderOptions {
  fetcher: Fetcher;
  writer: OutputWriterService;
  logger: Logger;
  delayMinMs?: number;
  delayMaxMs?: number;
  clock?: Clock;
  random?: RandomSource;
}

export class MediaDownloaderService {
  constructor(private options: MediaDownloaderOptions) {}

  /**
   * Downloads the profile picture and each post's media under `outputDir`.
   * Resolves to false when the profile is private or any single download failed.
   */
  async downloadMedia(record: ProfileRecord, posts: readonly PostRecord[], outputDir: string): Promise<boolean> {
    const { logger } = this.options;

    if (record.isPrivate) {
      logger.warn({ username: record.username }, "Cannot download content from a private profile");
      return false;
    }

    let failures = 0;

    if (record.profilePicUrl) {
      const target = path.join(outputDir, `${safeFileSegment(record.username)}_profile_pic.jpg`);
      if (await this.download(record.profilePicUrl, target, "profile_picture")) {
        logger.info({ file: target }, "Downloaded profile picture");
      } else {
        failures++;
      }
    }

    const postsDir = path.join(outputDir, "posts");
    let downloaded = 0;
    let attempted = 0;

    for (const post of posts) {
      if (!post.mediaUrl) {
        logger.debug({ postId: post.id }, "Post has no media URL; skipping");
        continue;
      }

      if (attempted > 0) {
        await actionDelay({
          minMs: this.options.delayMinMs ?? 1000,
          maxMs: this.options.delayMaxMs ?? 3000,
          clock: this.options.clock ?? systemClock,
          random: this.options.random,
        });
      }

      attempted++;
      const target = path.join(postsDir, `${safeFileSegment(post.id)}.${post.isVideo ? "mp4" : "jpg"}`);
      if (await this.download(post.mediaUrl, target, "post")) {
        downloaded++;
        logger.debug({ postId: post.id, file: target }, "Downloaded post media");
      } else {
        failures++;
      }
    }

    logger.info({ downloaded, failed: failures, total: posts.length }, "Media download finished");
    return failures === 0;
  }

  private async download(url: string, target: string, kind: "profile_picture" | "post"): Promise<boolean> {
    try {
      const body = await this.options.fetcher.fetch(url);
      await this.options.writer.writeBinary(target, body);
      return true;
    } catch (error) {
      this.options.logger.error({ kind, url, file: target, ...describeError(error) }, "Media download failed");
      return false;
    }
  }
}
