import type { AppConfig } from "../config/env";
import { ExternalProcessError, MigrationError, toMigrationError } from "../errors";
import type { LoggerLike } from "../logging/logger";
import { syncConfigFile } from "../services/address-sync";
import { backupService } from "../services/backup-service";
import { copyFileContents, modifiedAtMs, readFileBytes } from "../services/file-transfer";
import type { Notifier } from "../services/notifier";
import { describeChange, type ChangeRecord, type MatchWarning } from "../services/reconciler";
import type { Scanner } from "../services/scanner";
import type { SkippedDevice } from "../services/snapshot-reader";
import { err, ok, type Result } from "../utils/result";
import { nowIso } from "../utils/time";

export type PipelineState =
  | "SCANNING"
  | "BACKING_UP"
  | "STAGING"
  | "RECONCILING"
  | "COMMITTING"
  | "NOTIFYING"
  | "DONE";

export type PipelineStep = Exclude<PipelineState, "DONE">;

export type CapturedOutput = {
  stdout: string;
  stderr: string;
};

export type StepLogEntry = {
  step: PipelineStep;
  ok: boolean;
  startedAt: string;
  elapsedMs: number;
  message: string;
  output: CapturedOutput | null;
};

export type PipelineReport = {
  status: "done" | "failed";
  failedStep: PipelineStep | null;
  error: { code: string; message: string } | null;
  steps: StepLogEntry[];
  changes: ChangeRecord[];
  warnings: MatchWarning[];
  skippedDevices: SkippedDevice[];
  updated: boolean;
  notified: boolean;
};

export type PipelineConfig = {
  paths: Pick<AppConfig["paths"], "snapshotFile" | "liveConfigFile" | "backupFile" | "workingConfigFile">;
  strictDuplicates: boolean;
  backupRetentionCount: number;
  notification: {
    topic: string;
    payload: string;
  };
};

export type PipelineDependencies = {
  scanner: Scanner;
  notifier: Notifier;
  logger: LoggerLike;
};

type StepSuccess = {
  next: PipelineState;
  message: string;
  output?: CapturedOutput;
  // Set when the step failed in a way that must not stop the run.
  nonFatalError?: MigrationError;
};

type StepOutcome = Result<StepSuccess, MigrationError>;

function advance(success: StepSuccess): StepOutcome {
  return ok(success);
}

type RunContext = {
  steps: StepLogEntry[];
  snapshot: Buffer | null;
  changes: ChangeRecord[];
  warnings: MatchWarning[];
  skippedDevices: SkippedDevice[];
  notified: boolean;
};

export function pipelineConfigFrom(config: AppConfig): PipelineConfig {
  return {
    paths: {
      snapshotFile: config.paths.snapshotFile,
      liveConfigFile: config.paths.liveConfigFile,
      backupFile: config.paths.backupFile,
      workingConfigFile: config.paths.workingConfigFile
    },
    strictDuplicates: config.scan.strictDuplicates,
    backupRetentionCount: config.backup.retentionCount,
    notification: {
      topic: config.mqtt.topic,
      payload: config.mqtt.payload
    }
  };
}

/**
 * scan -> backup -> stage -> reconcile -> commit -> notify.
 *
 * Every step runs to completion before the next starts. The first failing step
 * ends the run as FAILED(step), except NOTIFYING: by then the new config is
 * already committed, so a failed publish is logged and the run still ends DONE.
 * Not safe to run twice at once against the same config file.
 */
export class MigrationPipeline {
  private readonly transitions: Record<PipelineStep, (run: RunContext) => Promise<StepOutcome>>;

  constructor(
    private readonly config: PipelineConfig,
    private readonly deps: PipelineDependencies
  ) {
    this.transitions = {
      SCANNING: (run) => this.scan(run),
      BACKING_UP: () => this.backUp(),
      STAGING: () => this.stage(),
      RECONCILING: (run) => this.reconcile(run),
      COMMITTING: () => this.commit(),
      NOTIFYING: (run) => this.notify(run)
    };
  }

  async run(): Promise<PipelineReport> {
    const run: RunContext = {
      steps: [],
      snapshot: null,
      changes: [],
      warnings: [],
      skippedDevices: [],
      notified: false
    };

    let state: PipelineState = "SCANNING";
    while (state !== "DONE") {
      const step: PipelineStep = state;
      const startedAt = nowIso();
      const started = Date.now();
      this.deps.logger.debug({ step }, "pipeline_step_started");

      const outcome: StepOutcome = await this.transitions[step](run);
      const elapsedMs = Date.now() - started;

      if (!outcome.ok) {
        const error = outcome.error;
        const output = error instanceof ExternalProcessError ? { stdout: error.stdout, stderr: error.stderr } : null;
        if (output) {
          this.logOutput(step, output, "error");
        }
        run.steps.push({ step, ok: false, startedAt, elapsedMs, message: error.message, output });
        this.deps.logger.error(
          {
            step,
            ok: false,
            elapsed_ms: elapsedMs,
            code: error.code,
            details: error.details,
            err: error
          },
          "pipeline_step_failed"
        );
        return this.report(run, step, error);
      }

      const success: StepSuccess = outcome.value;
      const stepOk = !success.nonFatalError;
      run.steps.push({
        step,
        ok: stepOk,
        startedAt,
        elapsedMs,
        message: success.message,
        output: success.output ?? null
      });
      if (stepOk) {
        this.deps.logger.info({ step, ok: true, elapsed_ms: elapsedMs, detail: success.message }, "pipeline_step_completed");
      } else {
        this.deps.logger.error(
          {
            step,
            ok: false,
            elapsed_ms: elapsedMs,
            code: success.nonFatalError?.code,
            err: success.nonFatalError
          },
          "pipeline_step_failed_non_fatal"
        );
      }
      state = success.next;
    }

    this.deps.logger.info(
      { changes: run.changes.length, notified: run.notified },
      "pipeline_done"
    );
    return this.report(run, null, null);
  }

  private async scan(run: RunContext): Promise<StepOutcome> {
    const snapshotFile = this.config.paths.snapshotFile;
    try {
      const before = await modifiedAtMs(snapshotFile);
      this.deps.logger.info({ command: this.deps.scanner.describe() }, "scan_started");

      const output = await this.deps.scanner.scan();
      this.logOutput("SCANNING", output, "info");

      run.snapshot = await readFileBytes(snapshotFile, "snapshot_unreadable");
      const after = await modifiedAtMs(snapshotFile);
      if (before !== null && after !== null && after <= before) {
        this.deps.logger.warn({ snapshot_file: snapshotFile }, "snapshot_not_refreshed");
      }

      return advance({
        next: "BACKING_UP",
        message: `Scan finished in ${output.elapsedMs} ms`,
        output: { stdout: output.stdout, stderr: output.stderr }
      });
    } catch (error) {
      return err(toMigrationError(error, "scan_failed"));
    }
  }

  private async backUp(): Promise<StepOutcome> {
    try {
      const backup = await backupService.createBackup({
        liveFile: this.config.paths.liveConfigFile,
        backupFile: this.config.paths.backupFile,
        retentionCount: this.config.backupRetentionCount
      });
      this.deps.logger.info(
        {
          backup_path: backup.backupPath,
          bytes: backup.bytes,
          sha256: backup.digest,
          history_path: backup.historyPath,
          deleted_history: backup.deletedHistory
        },
        "backup_created"
      );
      return advance({ next: "STAGING", message: `Backup created at ${backup.backupPath}` });
    } catch (error) {
      return err(toMigrationError(error, "backup_failed"));
    }
  }

  private async stage(): Promise<StepOutcome> {
    try {
      const copy = await copyFileContents(
        this.config.paths.liveConfigFile,
        this.config.paths.workingConfigFile,
        "staging",
        { createDir: true }
      );
      return advance({ next: "RECONCILING", message: `Working copy written to ${copy.destination}` });
    } catch (error) {
      return err(toMigrationError(error, "staging_failed"));
    }
  }

  private async reconcile(run: RunContext): Promise<StepOutcome> {
    if (!run.snapshot) {
      return err(new MigrationError("snapshot_not_loaded", "Snapshot was not loaded by the scan step"));
    }

    try {
      const result = await syncConfigFile({
        snapshot: run.snapshot,
        configFile: this.config.paths.workingConfigFile,
        strictDuplicates: this.config.strictDuplicates
      });

      for (const skipped of result.snapshot.skipped) {
        this.deps.logger.warn(
          { position: skipped.position, reason: skipped.reason, device_id: skipped.id, name: skipped.name },
          "snapshot_device_skipped"
        );
      }
      for (const duplicate of result.snapshot.duplicates) {
        this.deps.logger.warn(
          {
            device_id: duplicate.id,
            previous_address: duplicate.previousAddress,
            address: duplicate.address
          },
          "snapshot_duplicate_device"
        );
      }
      for (const warning of result.reconcile.warnings) {
        this.deps.logger.debug(
          { title: warning.title, device_id: warning.identifier, reason: warning.reason },
          "config_entry_unmatched"
        );
      }
      for (const change of result.reconcile.changes) {
        this.deps.logger.info(
          {
            title: change.title,
            device_id: change.identifier,
            old_address: change.oldAddress,
            new_address: change.newAddress
          },
          describeChange(change)
        );
      }

      run.changes = result.reconcile.changes;
      run.warnings = result.reconcile.warnings;
      run.skippedDevices = result.snapshot.skipped;

      const message = result.reconcile.updated
        ? `Updated ${result.reconcile.changes.length} of ${result.entryCount} entries from ${result.snapshot.index.size} devices`
        : `No address changes across ${result.entryCount} entries from ${result.snapshot.index.size} devices`;
      return advance({ next: "COMMITTING", message });
    } catch (error) {
      return err(toMigrationError(error, "reconcile_failed"));
    }
  }

  private async commit(): Promise<StepOutcome> {
    try {
      const copy = await copyFileContents(
        this.config.paths.workingConfigFile,
        this.config.paths.liveConfigFile,
        "commit"
      );
      return advance({ next: "NOTIFYING", message: `Committed ${copy.bytes} bytes to ${copy.destination}` });
    } catch (error) {
      return err(toMigrationError(error, "commit_failed"));
    }
  }

  private async notify(run: RunContext): Promise<StepOutcome> {
    const { topic, payload } = this.config.notification;
    try {
      await this.deps.notifier.notify(topic, payload);
      run.notified = true;
      return advance({ next: "DONE", message: `Published "${payload}" to ${topic}` });
    } catch (error) {
      const failure = toMigrationError(error, "notification_failed");
      return advance({
        next: "DONE",
        message: `Notification failed: ${failure.message}`,
        nonFatalError: failure
      });
    }
  }

  private logOutput(step: PipelineStep, output: CapturedOutput, level: "info" | "error"): void {
    if (output.stdout.length > 0) {
      this.deps.logger[level]({ step, stream: "stdout", output: output.stdout }, "scanner_output");
    }
    if (output.stderr.length > 0) {
      this.deps.logger[level]({ step, stream: "stderr", output: output.stderr }, "scanner_output");
    }
  }

  private report(run: RunContext, failedStep: PipelineStep | null, error: MigrationError | null): PipelineReport {
    return {
      status: failedStep ? "failed" : "done",
      failedStep,
      error: error ? { code: error.code, message: error.message } : null,
      steps: run.steps,
      changes: run.changes,
      warnings: run.warnings,
      skippedDevices: run.skippedDevices,
      updated: run.changes.length > 0,
      notified: run.notified
    };
  }
}
