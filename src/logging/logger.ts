import { mkdirSync } from "node:fs";
import path from "node:path";
import pino, { type Logger as PinoLogger } from "pino";
import pretty from "pino-pretty";
import type { LogFormat, LogLevel } from "../config/env";

export type LoggerLike = {
  debug: (obj: unknown, msg?: string) => void;
  info: (obj: unknown, msg?: string) => void;
  warn: (obj: unknown, msg?: string) => void;
  error: (obj: unknown, msg?: string) => void;
};

export type LoggerOptions = {
  level: LogLevel;
  format: LogFormat;
  logFile: string;
  name?: string;
};

/**
 * One logger that writes every record to the console and to the log file.
 * The file always receives NDJSON; `format` only changes the console stream.
 */
export function createLogger(options: LoggerOptions): PinoLogger {
  mkdirSync(path.dirname(path.resolve(options.logFile)), { recursive: true });

  const consoleStream =
    options.format === "pretty"
      ? pretty({
          colorize: true,
          translateTime: "SYS:yyyy-mm-dd HH:MM:ss",
          ignore: "pid,hostname"
        })
      : process.stdout;
  const fileStream = pino.destination({ dest: options.logFile, sync: true });
  const streamLevel = options.level === "silent" ? "fatal" : options.level;

  return pino(
    {
      name: options.name ?? "address-reconciler",
      level: options.level
    },
    pino.multistream([
      { level: streamLevel, stream: consoleStream },
      { level: streamLevel, stream: fileStream }
    ])
  );
}
