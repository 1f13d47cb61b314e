#!/usr/bin/env node
import { loadConfig } from "./config/env";
import { ConfigurationError } from "./errors";
import { createLogger } from "./logging/logger";
import { MigrationPipeline, pipelineConfigFrom } from "./pipeline/migration-pipeline";
import { MqttNotifier } from "./services/notifier";
import { CommandScanner } from "./services/scanner";

async function start(): Promise<number> {
  const config = loadConfig();
  const logger = createLogger({
    level: config.log.level,
    format: config.log.format,
    logFile: config.paths.logFile
  });

  const pipeline = new MigrationPipeline(pipelineConfigFrom(config), {
    scanner: new CommandScanner({
      command: config.scan.command,
      args: config.scan.args,
      cwd: config.scan.cwd,
      timeoutMs: config.scan.timeoutMs
    }),
    notifier: new MqttNotifier(config.mqtt, logger),
    logger
  });

  const report = await pipeline.run();
  logger.info(
    {
      status: report.status,
      failed_step: report.failedStep,
      error: report.error,
      changes: report.changes,
      unmatched_entries: report.warnings.length,
      skipped_devices: report.skippedDevices.length,
      notified: report.notified
    },
    "pipeline_report"
  );
  return report.status === "done" ? 0 : 1;
}

start()
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error) => {
    // eslint-disable-next-line no-console
    console.error(error instanceof ConfigurationError ? error.message : error);
    process.exitCode = 1;
  });
