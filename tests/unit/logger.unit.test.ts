import assert from "node:assert/strict";
import { readFileSync } from "node:fs";
import test from "node:test";
import { createLogger } from "../../src/logging/logger";
import { makeTempDir } from "../helpers/fakes";

test("logger: writes NDJSON records at or above the configured level to the log file", () => {
  const tmp = makeTempDir("logger");
  try {
    const logFile = tmp.file("logs/migrate.log");
    const logger = createLogger({ level: "info", format: "json", logFile, name: "logger-test" });

    logger.debug({ step: "SCANNING" }, "pipeline_step_started");
    logger.info({ step: "SCANNING", ok: true }, "pipeline_step_completed");
    logger.error({ step: "BACKING_UP", ok: false }, "pipeline_step_failed");

    const lines = readFileSync(logFile, "utf8").trim().split("\n").map((line) => JSON.parse(line));
    assert.equal(lines.length, 2);
    assert.equal(lines[0].msg, "pipeline_step_completed");
    assert.equal(lines[0].step, "SCANNING");
    assert.equal(lines[0].ok, true);
    assert.equal(lines[0].name, "logger-test");
    assert.equal(lines[0].level, 30);
    assert.equal(lines[1].msg, "pipeline_step_failed");
    assert.equal(lines[1].level, 50);
  } finally {
    tmp.cleanup();
  }
});
