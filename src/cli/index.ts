#!/usr/bin/env node
import { Command } from "commander";
import { createLogger } from "../core/logger";
import { commands as scanCommands } from "./commands/scan";
import { commands as lookupCommands } from "./commands/lookup";
import { logCommandFailure } from "./context";

const program = new Command();

program.name("profile-scout").description("Public profile scraper with rate-limited fetching").version("0.1.0");

scanCommands(program);
lookupCommands(program);

program.parseAsync().catch((error: unknown) => {
  logCommandFailure(createLogger(), error);
  process.exit(1);
});
