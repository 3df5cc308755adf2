/**
 * Proof Command
 *
 * Print the persisted inclusion proof for one item.
 *
 * Usage:
 *   hashcommit proof <index> [items...] [--file <path>]
 *
 * @module cli/commands/proof
 */

import { InvalidIndexError, serializeProof } from '@hashcommit/merkle';

import type { CommandContext, CommandResult } from '../lib/context.js';
import { EXIT_CODES } from '../lib/errors.js';
import { parseIndex } from '../lib/input.js';
import { buildTree, type RootOptions } from './root.js';

export interface ProofOptions extends RootOptions {
  readonly index: string;
}

export function proofCommand(options: ProofOptions, context: CommandContext): CommandResult {
  const index = parseIndex(options.index);
  const tree = buildTree(options, context);

  if (typeof index === 'bigint') {
    throw new InvalidIndexError(index, tree.size);
  }

  const proof = tree.generateProof(index);
  return {
    output: serializeProof(proof, context.config.json ? undefined : 2),
    exitCode: EXIT_CODES.SUCCESS,
  };
}
