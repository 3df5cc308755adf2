/**
 * CLI error types and exit-code mapping
 *
 * @module cli/lib/errors
 */

import { InvalidProofError, SerializationError } from '@hashcommit/merkle';

// ============================================================================
// Exit Codes
// ============================================================================

export const EXIT_CODES = {
  SUCCESS: 0,
  ERRORS: 2,
  CONFIG_ERROR: 3,
  DATA_INTEGRITY_ERROR: 5,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

// ============================================================================
// Error Classes
// ============================================================================

/**
 * Unusable configuration: bad config file, env value or flag
 */
export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/**
 * Malformed command input: unreadable file, bad index, bad hex
 */
export class InputError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InputError';
  }
}

/**
 * Exit code for an error escaping a command. Other tree errors (empty input,
 * index out of range) and unexpected failures map to ERRORS.
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof ConfigError) {
    return EXIT_CODES.CONFIG_ERROR;
  }
  if (
    error instanceof InputError ||
    error instanceof InvalidProofError ||
    error instanceof SerializationError
  ) {
    return EXIT_CODES.DATA_INTEGRITY_ERROR;
  }
  return EXIT_CODES.ERRORS;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
