import { access, mkdir, writeFile } from "node:fs/promises";
import path from "path";
import { PersistenceError } from "../core/errors";
import type { Logger } from "../core/logger";

export class OutputWriterService {
  constructor(private logger: Logger) {}

  /** Creates `{baseDir}/{username}`, or the first free `{username}_N` beside it. */
  async allocateDirectory(baseDir: string, username: string): Promise<string> {
    try {
      await mkdir(baseDir, { recursive: true });

      let candidate = path.join(baseDir, username);
      let counter = 1;
      while (await pathExists(candidate)) {
        candidate = path.join(baseDir, `${username}_${counter}`);
        counter++;
      }

      await mkdir(candidate);
      this.logger.debug({ dir: candidate }, "Allocated output directory");
      return candidate;
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      throw new PersistenceError(`Failed to allocate output directory under ${baseDir}: ${message}`, "DIRECTORY_FAILED", baseDir);
    }
  }

  async writeJson(filePath: string, value: unknown): Promise<void> {
    try {
      await writeFile(filePath, `${JSON.stringify(value, null, 2)}\n`, "utf8");
      this.logger.debug({ file: filePath }, "Wrote JSON");
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      throw new PersistenceError(`Failed to write ${filePath}: ${message}`, "WRITE_FAILED", filePath);
    }
  }

  async writeBinary(filePath: string, data: Buffer): Promise<void> {
    try {
      await mkdir(path.dirname(filePath), { recursive: true });
      await writeFile(filePath, data);
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      throw new PersistenceError(`Failed to write ${filePath}: ${message}`, "WRITE_FAILED", filePath);
    }
  }
}

async function pathExists(target: string): Promise<boolean> {
  try {
    await access(target);
    return true;
  } catch {
    return false;
  }
}
