import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "os";
import path from "path";
import { PersistenceError } from "../../src/core/errors";
import { silentLogger } from "../../src/core/logger";
import { OutputWriterService } from "../../src/services/output-writer.service";

describe("OutputWriterService", () => {
  let baseDir: string;
  const writer = new OutputWriterService(silentLogger);

  beforeEach(async () => {
    baseDir = await mkdtemp(path.join(os.tmpdir(), "output-writer-"));
  });

  afterEach(async () => {
    await rm(baseDir, { recursive: true, force: true });
  });

  it("should allocate distinct directories for the same username", async () => {
    const first = await writer.allocateDirectory(baseDir, "sample.user");
    const second = await writer.allocateDirectory(baseDir, "sample.user");
    const third = await writer.allocateDirectory(baseDir, "sample.user");

    expect(first).toBe(path.join(baseDir, "sample.user"));
    expect(second).toBe(path.join(baseDir, "sample.user_1"));
    expect(third).toBe(path.join(baseDir, "sample.user_2"));
  });

  it("should create a missing base directory", async () => {
    const nested = path.join(baseDir, "nested", "results");

    await expect(writer.allocateDirectory(nested, "someone")).resolves.toBe(path.join(nested, "someone"));
  });

  it("should write indented JSON in the given key order", async () => {
    const file = path.join(baseDir, "data.json");

    await writer.writeJson(file, { zeta: 1, alpha: [true] });

    expect(await readFile(file, "utf8")).toBe('{\n  "zeta": 1,\n  "alpha": [\n    true\n  ]\n}\n');
  });

  it("should raise a PersistenceError when the target cannot be written", async () => {
    const blocker = path.join(baseDir, "blocker");
    await writeFile(blocker, "not a directory");

    await expect(writer.writeJson(path.join(blocker, "data.json"), {})).rejects.toBeInstanceOf(PersistenceError);
    await expect(writer.allocateDirectory(blocker, "someone")).rejects.toMatchObject({ code: "DIRECTORY_FAILED" });
  });
});
