/**
 * Per-invocation command context
 *
 * @module cli/lib/context
 */

import type { CLIConfig } from './config.js';
import type { ExitCode } from './errors.js';
import type { CLILogger } from './logger.js';

export interface CommandContext {
  readonly config: CLIConfig;
  readonly logger: CLILogger;
}

/**
 * What a command hands back to the entry point: text for stdout and the
 * process exit code
 */
export interface CommandResult {
  readonly output: string;
  readonly exitCode: ExitCode;
}
