import { spawn } from "node:child_process";
import { ExternalProcessError } from "../errors";

export type ScanOutput = {
  exitCode: number;
  stdout: string;
  stderr: string;
  elapsedMs: number;
};

export type Scanner = {
  describe: () => string;
  scan: () => Promise<ScanOutput>;
};

export type CommandScannerOptions = {
  command: string;
  args: string[];
  cwd: string;
  timeoutMs: number | null;
};

/**
 * Runs the device scanner as a child process and captures its output.
 * Exit code zero is success; anything else rejects with an ExternalProcessError
 * that still carries whatever the process printed.
 */
export class CommandScanner implements Scanner {
  constructor(private readonly options: CommandScannerOptions) {}

  describe(): string {
    return [this.options.command, ...this.options.args].join(" ");
  }

  scan(): Promise<ScanOutput> {
    const started = Date.now();
    const label = this.describe();

    return new Promise<ScanOutput>((resolve, reject) => {
      let stdout = "";
      let stderr = "";
      let settled = false;
      let timedOut = false;

      const child = spawn(this.options.command, this.options.args, {
        cwd: this.options.cwd,
        stdio: ["ignore", "pipe", "pipe"]
      });
      child.stdout.setEncoding("utf8");
      child.stderr.setEncoding("utf8");
      child.stdout.on("data", (chunk: string) => {
        stdout += chunk;
      });
      child.stderr.on("data", (chunk: string) => {
        stderr += chunk;
      });

      const timer =
        this.options.timeoutMs === null
          ? null
          : setTimeout(() => {
              timedOut = true;
              child.kill("SIGTERM");
            }, this.options.timeoutMs);

      const settle = (outcome: () => void) => {
        if (settled) {
          return;
        }
        settled = true;
        if (timer) {
          clearTimeout(timer);
        }
        outcome();
      };

      child.on("error", (error) => {
        settle(() =>
          reject(
            new ExternalProcessError("scan_spawn_failed", `Could not start "${label}": ${error.message}`, {
              exitCode: null,
              signal: null,
              stdout,
              stderr
            })
          )
        );
      });

      child.on("close", (code, signal) => {
        settle(() => {
          if (timedOut) {
            reject(
              new ExternalProcessError(
                "scan_timed_out",
                `"${label}" did not finish within ${this.options.timeoutMs} ms`,
                { exitCode: code, signal, stdout, stderr }
              )
            );
            return;
          }
          if (code !== 0) {
            reject(
              new ExternalProcessError(
                "scan_failed",
                `"${label}" exited with ${code === null ? `signal ${signal ?? "unknown"}` : `code ${code}`}`,
                { exitCode: code, signal, stdout, stderr }
              )
            );
            return;
          }
          resolve({
            exitCode: code,
            stdout,
            stderr,
            elapsedMs: Date.now() - started
          });
        });
      });
    });
  }
}
