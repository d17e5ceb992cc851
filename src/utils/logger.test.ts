import test from "node:test";
import assert from "node:assert/strict";
import fs from "fs/promises";
import os from "os";
import path from "path";

test("LOG_LEVEL from .env in the working directory reaches module loggers", async () => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "decision-facts-env-"));
  await fs.writeFile(path.join(dir, ".env"), "LOG_LEVEL=debug\n", "utf-8");

  const previousCwd = process.cwd();
  const previousLevel = process.env.LOG_LEVEL;
  delete process.env.LOG_LEVEL;
  process.chdir(dir);

  try {
    // Same load order as the CLI: config first, whose imports create loggers
    await import("../config/pipeline.js");
    const { createLogger, logger } = await import("./logger.js");

    assert.equal(logger.level, "debug");
    assert.equal(createLogger("LoggerTest").level, "debug");
  } finally {
    process.chdir(previousCwd);
    if (previousLevel === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = previousLevel;
    }
    await fs.rm(dir, { recursive: true, force: true });
  }
});
