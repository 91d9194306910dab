import { ConfigurationError, errorMessage } from '../core/errors.js';

export const EXIT_CODES = {
  SUCCESS: 0,
  WARNINGS: 1,
  ERRORS: 2,
  CONFIG_ERROR: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export function exitCodeFor(error: unknown): ExitCode {
  return error instanceof ConfigurationError ? EXIT_CODES.CONFIG_ERROR : EXIT_CODES.ERRORS;
}

export function describeError(error: unknown): string {
  if (error instanceof ConfigurationError) return error.getSummary();
  return errorMessage(error);
}
