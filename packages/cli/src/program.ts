/**
 * hashcommit command tree
 *
 * Global options are resolved into a CommandContext by the preAction hook;
 * each action runs one command function and turns its result (or error)
 * into stdout text and an exit code.
 *
 * @module cli/program
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { HASH_ALGORITHMS } from '@hashcommit/merkle';

import { proofCommand } from './commands/proof.js';
import { rootCommand } from './commands/root.js';
import { sparseProofCommand, sparseRootCommand, sparseVerifyCommand } from './commands/sparse.js';
import { verifyCommand } from './commands/verify.js';
import { loadConfig } from './lib/config.js';
import type { CommandContext, CommandResult } from './lib/context.js';
import { ConfigError, EXIT_CODES, errorMessage, exitCodeFor } from './lib/errors.js';
import { createCLILogger } from './lib/logger.js';

// ============================================================================
// Global State
// ============================================================================

const GlobalOptionsSchema = z.object({
  verbose: z.boolean().optional(),
  json: z.boolean().optional(),
  config: z.string().optional(),
  hash: z.string().optional(),
});

type GlobalOptions = z.infer<typeof GlobalOptionsSchema>;

let globalContext: CommandContext | null = null;

export function getGlobalContext(): CommandContext {
  if (!globalContext) {
    throw new Error('Global context not initialized. Call initializeContext first.');
  }
  return globalContext;
}

// ============================================================================
// CLI Setup
// ============================================================================

const PackageJsonSchema = z.object({ version: z.string() });

function getVersion(): string {
  const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '..', 'package.json');
  try {
    const parsed = PackageJsonSchema.safeParse(JSON.parse(readFileSync(packageJsonPath, 'utf-8')));
    return parsed.success ? parsed.data.version : '0.0.0';
  } catch {
    return '0.0.0';
  }
}

export async function initializeContext(options: GlobalOptions): Promise<CommandContext> {
  const config = await loadConfig({
    configPath: options.config,
    overrides: {
      hash: options.hash,
      json: options.json,
      verbose: options.verbose,
    },
  });

  const logger = createCLILogger({
    level: config.verbose ? 'debug' : 'info',
    json: config.json,
  });

  globalContext = { config, logger };
  return globalContext;
}

/**
 * Run a command function against the global context and report its outcome
 */
function run(name: string, command: (context: CommandContext) => CommandResult): void {
  const context = getGlobalContext();
  context.logger.commandStart(name);

  try {
    const result = command(context);
    console.log(result.output);
    process.exitCode = result.exitCode;
    context.logger.commandEnd(true, { exitCode: result.exitCode });
  } catch (error) {
    const exitCode = exitCodeFor(error);
    context.logger.error(errorMessage(error), {
      error: error instanceof Error ? error.name : typeof error,
    });
    context.logger.commandEnd(false, { exitCode });
    process.exitCode = exitCode;
  }
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function withSparseTreeOptions(command: Command): Command {
  return command
    .option('--depth <n>', 'Tree depth, 1-64 (default from config, else 32)')
    .option('--set <index=value>', 'Populate a slot before running (repeatable)', collect, []);
}

interface SparseFlags {
  depth?: string;
  set: string[];
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('hashcommit')
    .description('Merkle commitments: roots, inclusion proofs and sparse-tree membership')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable debug logging on stderr')
    .option('--json', 'Output as JSON (machine-readable)')
    .option('--config <path>', 'Path to config file (default: .hashcommitrc)')
    .option('--hash <algorithm>', `Hash algorithm: ${HASH_ALGORITHMS.join('|')}`)
    .hook('preAction', async (thisCommand) => {
      try {
        const parsed = GlobalOptionsSchema.safeParse(thisCommand.opts());
        if (!parsed.success) {
          throw new ConfigError(`Invalid global options: ${parsed.error.issues[0].message}`);
        }
        await initializeContext(parsed.data);
      } catch (error) {
        console.error(`Configuration error: ${errorMessage(error)}`);
        process.exit(EXIT_CODES.CONFIG_ERROR);
      }
    });

  // ============================================================================
  // Binary Tree Commands
  // ============================================================================

  program
    .command('root [items...]')
    .description('Build a tree over the items and print its root')
    .option('--file <path>', 'Read items from a file, one per line')
    .action((items: string[], options: { file?: string }) => {
      run('root', (context) => rootCommand({ items, file: options.file }, context));
    });

  program
    .command('proof <index> [items...]')
    .description('Print the inclusion proof for the item at <index>')
    .option('--file <path>', 'Read items from a file, one per line')
    .action((index: string, items: string[], options: { file?: string }) => {
      run('proof', (context) => proofCommand({ index, items, file: options.file }, context));
    });

  program
    .command('verify')
    .description('Check an inclusion proof against an item and a root')
    .requiredOption('--proof <file>', 'Proof file written by `hashcommit proof`')
    .requiredOption('--item <data>', 'The item the proof claims')
    .requiredOption('--root <hex>', 'Expected root digest')
    .action((options: { proof: string; item: string; root: string }) => {
      run('verify', (context) => verifyCommand(options, context));
    });

  // ============================================================================
  // Sparse Tree Commands
  // ============================================================================

  const sparse = program.command('sparse').description('Sparse Merkle tree operations');

  withSparseTreeOptions(sparse.command('root'))
    .description('Print the root of a sparse tree built from --set entries')
    .action((options: SparseFlags) => {
      run('sparse root', (context) => sparseRootCommand(options, context));
    });

  withSparseTreeOptions(sparse.command('proof <index>'))
    .description('Print the proof for a slot, populated or empty')
    .action((index: string, options: SparseFlags) => {
      run('sparse proof', (context) => sparseProofCommand({ ...options, index }, context));
    });

  withSparseTreeOptions(sparse.command('verify <index>'))
    .description('Check a slot proof; without --value, check that the slot is empty')
    .requiredOption('--proof <file>', 'Proof file written by `hashcommit sparse proof`')
    .option('--value <value>', 'Claimed slot value')
    .action((index: string, options: SparseFlags & { proof: string; value?: string }) => {
      run('sparse verify', (context) => sparseVerifyCommand({ ...options, index }, context));
    });

  return program;
}
