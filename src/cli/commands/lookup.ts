import type { Command } from "commander";
import { env } from "../../core/config";
import { formatProfileReport } from "../../presentation/profile-report";
import { createRunContext, parseLimit, parseUsername, type ProfileCommandOptions } from "../context";

export const commands = (program: Command) => {
  program
    .command("lookup")
    .description("Print a profile report; save data only when --output or --download is given")
    .argument("<username>", "Profile username", parseUsername)
    .option("-o, --output <dir>", "Base directory for saved data")
    .option("-d, --download", "Download the profile picture and post media")
    .option("-l, --limit <n>", "Maximum number of posts to download", parseLimit, env.DEFAULT_POST_LIMIT)
    .option("-v, --verbose", "Enable debug logging")
    .action(async (username: string, options: ProfileCommandOptions) => {
      const { logger, runner } = createRunContext(options.verbose === true);
      const download = options.download === true;

      const result = await runner.run({
        username,
        limit: options.limit,
        download,
        persist: download || options.output !== undefined,
        baseDir: options.output ?? env.OUTPUT_BASE_DIR,
        keyStyle: "display",
      });

      if (result.status === "failed" || !result.profile) {
        console.log(`Failed to retrieve data for ${username}`);
        logger.error({ username, error: result.error }, "Lookup failed");
        process.exit(1);
      }

      console.log(formatProfileReport(result.profile, 50));
      if (result.outputDir) {
        logger.info({ outputDir: result.outputDir, mediaComplete: result.mediaComplete }, "Data saved");
      }

      process.exit(0);
    });
};
