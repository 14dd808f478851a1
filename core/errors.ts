/**
 * Error types raised by the editing core.
 *
 * Two classes of failure exist: I/O failures, which callers are expected to
 * handle, and invariant violations, which are programming errors and abort
 * the current operation.
 */

/** A broken precondition or invariant. Never caught inside the core. */
export class InvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantError';
  }
}

/** Reading or writing a file failed. Editor state is left untouched. */
export class FileAccessError extends Error {
  readonly path: string;
  readonly operation: 'read' | 'write';

  constructor(operation: 'read' | 'write', path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to ${operation} ${path}: ${reason}`, { cause });
    this.name = 'FileAccessError';
    this.path = path;
    this.operation = operation;
  }
}

/** An external formatter exited with a non-zero status or could not be started. */
export class FormatError extends Error {
  readonly stderr: string;

  constructor(message: string, stderr: string = '') {
    super(message);
    this.name = 'FormatError';
    this.stderr = stderr;
  }
}

/** Editor configuration failed validation. */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid editor configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Assert a condition that must hold for the core to stay consistent.
 * Throws an InvariantError when it doesn't.
 */
export function invariant(condition: boolean, message: string): asserts condition {
  if (!condition) throw new InvariantError(message);
}
