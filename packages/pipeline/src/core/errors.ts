/**
 * Airshed Error Types
 *
 * Only configuration problems abort a run. Record- and field-level
 * failures are returned as values (see DataQualityIssue) and never thrown.
 */

export type AirshedErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'STORE_ERROR'
  | 'INPUT_ERROR'
  | 'INVARIANT_VIOLATION';

/**
 * Base class for errors raised by the pipeline
 */
export class AirshedError extends Error {
  constructor(
    message: string,
    public readonly code: AirshedErrorCode
  ) {
    super(message);
    this.name = 'AirshedError';

    // Maintain proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Missing or malformed configuration: config file, band tables, thresholds
 *
 * RECOVERY:
 * - Fix the listed issues in the config file or environment
 * - Remove the override to fall back to built-in defaults
 */
export class ConfigurationError extends AirshedError {
  /**
   * @param message - Human-readable error message
   * @param issues - One entry per offending setting, `path: problem`
   * @param source - File or environment the settings came from
   */
  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
    public readonly source: string | null = null
  ) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }

  getSummary(): string {
    const lines: string[] = [
      this.source ? `${this.message} (${this.source})` : this.message,
    ];

    for (const issue of this.issues.slice(0, 10)) {
      lines.push(`  - ${issue}`);
    }

    if (this.issues.length > 10) {
      lines.push(`  ... and ${this.issues.length - 10} more issues`);
    }

    return lines.join('\n');
  }
}

/**
 * Failure reading from or writing to the observation store
 */
export class StoreError extends AirshedError {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly underlying?: unknown
  ) {
    super(message, 'STORE_ERROR');
    this.name = 'StoreError';
  }
}

/**
 * Unreadable input file (CLI boundary)
 */
export class InputError extends AirshedError {
  constructor(
    message: string,
    public readonly path: string,
    public readonly line: number | null = null
  ) {
    super(message, 'INPUT_ERROR');
    this.name = 'InputError';
  }
}

/**
 * A caller broke a precondition of a pure stage (e.g. duplicate dates
 * within one entity handed to the trend fold)
 */
export class InvariantViolationError extends AirshedError {
  constructor(message: string) {
    super(message, 'INVARIANT_VIOLATION');
    this.name = 'InvariantViolationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
