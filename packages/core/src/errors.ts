/**
 * Error taxonomy shared by @nodeconf/core, @nodeconf/reconcile and the CLI.
 *
 * Field-scoped errors (ReadError, ApplyError) are returned as data by the
 * adapters and the engine. Everything else is thrown.
 */

/** A single violated model invariant. */
export interface Violation {
  /** Dotted path of the offending field, e.g. `networking.wifi[1].ssid` */
  path: string;
  message: string;
}

/** Thrown when a model violates one or more invariants. Lists all of them. */
export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly violations: Violation[] = [],
  ) {
    super(message);
    this.name = 'ValidationError';
  }

  static fromViolations(violations: Violation[]): ValidationError {
    const summary = violations.map((v) => `${v.path}: ${v.message}`).join('; ');
    const noun = violations.length === 1 ? 'violation' : 'violations';
    return new ValidationError(
      `Config model has ${violations.length} ${noun}: ${summary}`,
      violations,
    );
  }
}

/** Thrown when the store file is not well-formed TOML. Line and column are 1-based. */
export class ParseError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly line: number,
    public readonly column: number,
  ) {
    super(message);
    this.name = 'ParseError';
  }
}

/** Thrown when a requested resource (store file, settings file) is not found. */
export class NotFoundError extends Error {
  constructor(
    message: string,
    public readonly resourceType: string,
    public readonly resourceId: string,
  ) {
    super(message);
    this.name = 'NotFoundError';
  }
}

/** Thrown when a file system read/write operation fails. */
export class FileSystemError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'FileSystemError';
  }
}

/** Thrown when a file lock cannot be acquired after retries. */
export class LockTimeoutError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
  ) {
    super(message);
    this.name = 'LockTimeoutError';
  }
}

/** An adapter could not inspect live system state. */
export class ReadError extends Error {
  constructor(
    message: string,
    public readonly adapter: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'ReadError';
  }
}

/** An adapter could not mutate system state for one field. */
export class ApplyError extends Error {
  constructor(
    message: string,
    public readonly field: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'ApplyError';
  }

  static forField(field: string, cause: unknown): ApplyError {
    return new ApplyError(`Failed to apply ${field}: ${describeError(cause)}`, field, cause);
  }
}

/** Thrown when a bounded operation does not settle in time. */
export class TimeoutError extends Error {
  constructor(
    message: string,
    public readonly timeoutMs: number,
  ) {
    super(message);
    this.name = 'TimeoutError';
  }
}

/** Render any thrown value as a one-line message. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
