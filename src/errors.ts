export class MigrationError extends Error {
  readonly code: string;
  readonly details: unknown;

  constructor(code: string, message: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details ?? null;
  }
}

export class ConfigurationError extends MigrationError {}

export class ExternalProcessError extends MigrationError {
  readonly exitCode: number | null;
  readonly signal: string | null;
  readonly stdout: string;
  readonly stderr: string;

  constructor(
    code: string,
    message: string,
    output: { exitCode: number | null; signal: string | null; stdout: string; stderr: string }
  ) {
    super(code, message, {
      exit_code: output.exitCode,
      signal: output.signal
    });
    this.exitCode = output.exitCode;
    this.signal = output.signal;
    this.stdout = output.stdout;
    this.stderr = output.stderr;
  }
}

export class IOError extends MigrationError {
  readonly operation: string;
  readonly path: string;

  constructor(code: string, operation: string, filePath: string, cause?: unknown) {
    super(code, `${operation} failed for ${filePath}: ${describeError(cause)}`, {
      operation,
      path: filePath
    });
    this.operation = operation;
    this.path = filePath;
  }
}

export class FormatError extends MigrationError {}

export class NotificationError extends MigrationError {}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (error === undefined) {
    return "unknown error";
  }
  return String(error);
}

export function toMigrationError(error: unknown, fallbackCode: string): MigrationError {
  if (error instanceof MigrationError) {
    return error;
  }
  return new MigrationError(fallbackCode, describeError(error));
}
