/**
 * Command input parsing: item lists, indices, --set entries, digests and
 * proof files
 *
 * @module cli/lib/input
 */

import { readFileSync } from 'node:fs';
import { deserializeProof, fromHex, type LeafIndex, type MerkleProof } from '@hashcommit/merkle';

import { InputError, errorMessage } from './errors.js';

const DECIMAL = /^\d+$/;
const HEX = /^(0x)?([0-9a-fA-F]{2})+$/;

function readText(path: string, what: string): string {
  try {
    return readFileSync(path, 'utf-8');
  } catch (error) {
    throw new InputError(`Cannot read ${what} ${path}: ${errorMessage(error)}`, { cause: error });
  }
}

/**
 * Positional items followed by the lines of `file`, if given.
 * A trailing newline does not add an empty item.
 */
export function readItems(items: readonly string[], file?: string): string[] {
  if (file === undefined) {
    return [...items];
  }
  const lines = readText(file, 'items file').split(/\r?\n/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return [...items, ...lines];
}

/**
 * Decimal leaf index; numbers beyond the safe range come back as bigint
 */
export function parseIndex(raw: string): LeafIndex {
  if (!DECIMAL.test(raw)) {
    throw new InputError(`Invalid index: ${raw}. Expected a non-negative decimal integer`);
  }
  const value = BigInt(raw);
  return value <= BigInt(Number.MAX_SAFE_INTEGER) ? Number(value) : value;
}

/**
 * `<index>=<value>` pairs; the value may itself contain '='
 */
export function parseAssignments(entries: readonly string[]): Array<[LeafIndex, string]> {
  return entries.map((entry): [LeafIndex, string] => {
    const separator = entry.indexOf('=');
    if (separator <= 0) {
      throw new InputError(`Invalid --set entry "${entry}": expected <index>=<value>`);
    }
    return [parseIndex(entry.slice(0, separator)), entry.slice(separator + 1)];
  });
}

export function parseDigest(raw: string, expectedSize: number): Uint8Array {
  if (!HEX.test(raw)) {
    throw new InputError(`Invalid root: ${raw}. Expected a hex digest`);
  }
  const digest = fromHex(raw);
  if (digest.length !== expectedSize) {
    throw new InputError(`Invalid root: ${digest.length} bytes, expected ${expectedSize}`);
  }
  return digest;
}

/**
 * @throws InputError if the file cannot be read
 * @throws SerializationError if its content is not a persisted proof
 */
export function readProofFile(path: string): MerkleProof {
  return deserializeProof(readText(path, 'proof file'));
}
