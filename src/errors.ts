/**
 * Field logger errors
 */

export const EXIT_CODES = {
  OK: 0,
  CONFIG_ERROR: 1,
  CONNECTION_FAILED: 2,
  HARD_FAIL: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export class FieldLoggerError extends Error {
  readonly exitCode: ExitCode;

  constructor(message: string, exitCode: ExitCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FieldLoggerError';
    this.exitCode = exitCode;
  }
}

/**
 * Unknown device type, malformed descriptor or unreadable configuration.
 * Fatal at startup: polling never begins.
 */
export class ConfigError extends FieldLoggerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, EXIT_CODES.CONFIG_ERROR, options);
    this.name = 'ConfigError';
  }
}

/**
 * Connection refused, read timeout, Modbus exception or malformed response.
 */
export class TransportError extends FieldLoggerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, EXIT_CODES.CONNECTION_FAILED, options);
    this.name = 'TransportError';
  }
}

/**
 * A block the driver cannot interpret. Caught at the record boundary and
 * written as a "Decode error" row; it only ends the process (as a hard
 * failure) if a caller outside buildRecord lets it escape.
 */
export class DecodeError extends FieldLoggerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, EXIT_CODES.HARD_FAIL, options);
    this.name = 'DecodeError';
  }
}

/**
 * Terminal state of repeated transport failures for one read.
 * `fatal` is set when the escalation policy of the call site is hard-fail.
 */
export class ExhaustedRetriesError extends FieldLoggerError {
  readonly attempts: number;
  readonly fatal: boolean;

  constructor(target: string, attempts: number, fatal: boolean, lastError: Error) {
    super(
      `Read of ${target} failed after ${attempts} attempt(s): ${lastError.message}`,
      EXIT_CODES.HARD_FAIL,
      { cause: lastError }
    );
    this.name = 'ExhaustedRetriesError';
    this.attempts = attempts;
    this.fatal = fatal;
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
