/**
 * Verify Command
 *
 * Check a persisted inclusion proof against an item and a root.
 *
 * Usage:
 *   hashcommit verify --proof <file> --item <data> --root <hex>
 *
 * Exit codes: 0 valid, 2 invalid, 5 malformed proof or root.
 *
 * @module cli/commands/verify
 */

import { getHasher } from '@hashcommit/merkle';

import type { CommandContext, CommandResult } from '../lib/context.js';
import { EXIT_CODES } from '../lib/errors.js';
import { parseDigest, readProofFile } from '../lib/input.js';
import { formatJson } from '../lib/output.js';

export interface VerifyOptions {
  /** Path to a proof written by `hashcommit proof` */
  readonly proof: string;
  readonly item: string;
  /** Hex root, optionally 0x-prefixed */
  readonly root: string;
}

export function verifyCommand(options: VerifyOptions, context: CommandContext): CommandResult {
  const hasher = getHasher(context.config.hash);
  const proof = readProofFile(options.proof);
  proof.assertWellFormed(hasher);
  const root = parseDigest(options.root, hasher.outputSize);

  const valid = proof.verify(hasher, options.item, root);
  context.logger.debug('Proof checked', {
    leafIndex: String(proof.leafIndex),
    steps: proof.length,
    valid,
  });

  return {
    output: context.config.json
      ? formatJson({ valid, leafIndex: proof.leafIndex })
      : valid
        ? 'valid'
        : 'invalid',
    exitCode: valid ? EXIT_CODES.SUCCESS : EXIT_CODES.ERRORS,
  };
}
