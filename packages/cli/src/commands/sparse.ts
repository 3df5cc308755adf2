/**
 * Sparse Tree Commands
 *
 * The tree lives only for one invocation: it is rebuilt from the --set
 * entries every time, so `sparse verify` checks against the root those
 * entries produce.
 *
 * Usage:
 *   hashcommit sparse root   [--depth <n>] [--set <index>=<value>]...
 *   hashcommit sparse proof  <index> [--depth <n>] [--set ...]
 *   hashcommit sparse verify <index> --proof <file> [--value <v>] [--depth <n>] [--set ...]
 *
 * `sparse verify` without --value checks that the slot is empty.
 *
 * @module cli/commands/sparse
 */

import { SparseMerkleTree, getHasher, serializeProof } from '@hashcommit/merkle';

import { resolveDepth } from '../lib/config.js';
import type { CommandContext, CommandResult } from '../lib/context.js';
import { EXIT_CODES } from '../lib/errors.js';
import { parseAssignments, parseIndex, readProofFile } from '../lib/input.js';
import { formatJson, formatRecord } from '../lib/output.js';

export interface SparseTreeOptions {
  /** Overrides the configured depth */
  readonly depth?: string;
  /** `<index>=<value>` entries, applied in order */
  readonly set: readonly string[];
}

export interface SparseProofOptions extends SparseTreeOptions {
  readonly index: string;
}

export interface SparseVerifyOptions extends SparseProofOptions {
  readonly proof: string;
  /** Absent: non-membership check */
  readonly value?: string;
}

export function buildSparseTree(
  options: SparseTreeOptions,
  context: CommandContext
): SparseMerkleTree {
  const depth =
    options.depth === undefined ? context.config.sparseDepth : resolveDepth(options.depth);
  const tree = SparseMerkleTree.create(depth, getHasher(context.config.hash));

  for (const [index, value] of parseAssignments(options.set)) {
    tree.update(index, value);
  }

  context.logger.debug('Sparse tree built', { depth, leafCount: tree.size });
  return tree;
}

export function sparseRootCommand(
  options: SparseTreeOptions,
  context: CommandContext
): CommandResult {
  const stats = buildSparseTree(options, context).stats();

  return {
    output: formatRecord(
      {
        root: stats.rootHash,
        depth: stats.depth,
        leaves: stats.leafCount,
        capacity: stats.maxLeaves,
        hasher: stats.hasherName,
      },
      context.config.json
    ),
    exitCode: EXIT_CODES.SUCCESS,
  };
}

export function sparseProofCommand(
  options: SparseProofOptions,
  context: CommandContext
): CommandResult {
  const index = parseIndex(options.index);
  const proof = buildSparseTree(options, context).generateProof(index);

  return {
    output: serializeProof(proof, context.config.json ? undefined : 2),
    exitCode: EXIT_CODES.SUCCESS,
  };
}

export function sparseVerifyCommand(
  options: SparseVerifyOptions,
  context: CommandContext
): CommandResult {
  const index = parseIndex(options.index);
  const tree = buildSparseTree(options, context);
  const proof = readProofFile(options.proof);
  proof.assertWellFormed(tree.hasher, tree.depth);

  const membership = options.value !== undefined;
  const valid =
    options.value === undefined
      ? tree.verifyNonMembership(proof, index)
      : tree.verifyProof(proof, index, options.value);

  return {
    output: context.config.json
      ? formatJson({ valid, index, check: membership ? 'membership' : 'non-membership' })
      : valid
        ? 'valid'
        : 'invalid',
    exitCode: valid ? EXIT_CODES.SUCCESS : EXIT_CODES.ERRORS,
  };
}
