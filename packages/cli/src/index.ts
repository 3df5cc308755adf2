/**
 * hashcommit CLI library surface
 *
 * Command functions return their output and exit code instead of writing to
 * the process, so they can be driven from other programs and tests.
 */

export { createProgram, getGlobalContext, initializeContext } from './program.js';

export { rootCommand, buildTree } from './commands/root.js';
export type { RootOptions } from './commands/root.js';
export { proofCommand } from './commands/proof.js';
export type { ProofOptions } from './commands/proof.js';
export { verifyCommand } from './commands/verify.js';
export type { VerifyOptions } from './commands/verify.js';
export {
  buildSparseTree,
  sparseProofCommand,
  sparseRootCommand,
  sparseVerifyCommand,
} from './commands/sparse.js';
export type { SparseProofOptions, SparseTreeOptions, SparseVerifyOptions } from './commands/sparse.js';

export { DEFAULT_CONFIG, loadConfig, resolveDepth, resolveHashAlgorithm } from './lib/config.js';
export type { CLIConfig, LoadConfigOptions } from './lib/config.js';
export type { CommandContext, CommandResult } from './lib/context.js';
export { ConfigError, EXIT_CODES, InputError, errorMessage, exitCodeFor } from './lib/errors.js';
export type { ExitCode } from './lib/errors.js';
export { CLILogger, createCLILogger } from './lib/logger.js';
export type { CLILoggerConfig, LogLevel, LogMetadata } from './lib/logger.js';
export { formatJson, formatKeyValue, formatRecord } from './lib/output.js';
export { parseAssignments, parseDigest, parseIndex, readItems, readProofFile } from './lib/input.js';
