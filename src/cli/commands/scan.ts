import type { Command } from "commander";
import { env } from "../../core/config";
import { formatProfileReport } from "../../presentation/profile-report";
import { createRunContext, parseLimit, parseUsername, type ProfileCommandOptions } from "../context";

export const commands = (program: Command) => {
  program
    .command("scan")
    .description("Scrape a profile, save it under a fresh results directory and print a report")
    .argument("<username>", "Profile username", parseUsername)
    .option("-d, --download", "Download the profile picture and post media")
    .option("-l, --limit <n>", "Maximum number of posts to extract", parseLimit, env.DEFAULT_POST_LIMIT)
    .option("-o, --output <dir>", "Base directory for results", env.OUTPUT_BASE_DIR)
    .option("-v, --verbose", "Enable debug logging")
    .action(async (username: string, options: ProfileCommandOptions) => {
      const { logger, runner } = createRunContext(options.verbose === true);

      const result = await runner.run({
        username,
        limit: options.limit,
        download: options.download === true,
        persist: true,
        baseDir: options.output ?? env.OUTPUT_BASE_DIR,
        keyStyle: "snake",
      });

      if (result.status === "failed" || !result.profile) {
        logger.error({ username, error: result.error }, "Scan failed");
        process.exit(1);
      }

      console.log(formatProfileReport(result.profile));
      logger.info(
        { outputDir: result.outputDir, posts: result.posts.length, mediaComplete: result.mediaComplete },
        "Scan completed"
      );

      process.exit(0);
    });
};
