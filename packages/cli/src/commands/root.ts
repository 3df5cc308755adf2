/**
 * Root Command
 *
 * Build a binary Merkle tree over the given items and print its root.
 *
 * Usage:
 *   hashcommit root [items...] [--file <path>]
 *
 * @module cli/commands/root
 */

import { MerkleTree, getHasher } from '@hashcommit/merkle';

import type { CommandContext, CommandResult } from '../lib/context.js';
import { EXIT_CODES } from '../lib/errors.js';
import { readItems } from '../lib/input.js';
import { formatRecord } from '../lib/output.js';

export interface RootOptions {
  readonly items: readonly string[];
  /** One item per line, appended after positional items */
  readonly file?: string;
}

/**
 * Load items and build the tree. Shared with the proof command.
 */
export function buildTree(options: RootOptions, context: CommandContext): MerkleTree {
  const items = readItems(options.items, options.file);
  const tree = MerkleTree.fromData(items, getHasher(context.config.hash));
  context.logger.debug('Tree built', {
    leafCount: tree.size,
    height: tree.height,
    hasher: tree.hasher.name,
  });
  return tree;
}

export function rootCommand(options: RootOptions, context: CommandContext): CommandResult {
  const stats = buildTree(options, context).stats();

  return {
    output: formatRecord(
      {
        root: stats.rootHash,
        leaves: stats.leafCount,
        height: stats.treeHeight,
        hasher: stats.hasherName,
      },
      context.config.json
    ),
    exitCode: EXIT_CODES.SUCCESS,
  };
}
