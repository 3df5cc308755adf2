/**
 * Proof persistence form
 *
 * Plain JSON-compatible shape for storing or shipping a proof:
 *
 * ```json
 * { "leaf_index": 2, "steps": [{ "hash": "ab12...", "direction": "Left" }] }
 * ```
 *
 * No versioning or framing: wrap it if the transport needs either.
 * `leaf_index` is a JSON number up to Number.MAX_SAFE_INTEGER and a decimal
 * string beyond it (64-bit sparse slots).
 */

import { z } from 'zod';

import { SerializationError } from './errors.js';
import { fromHex, toHex } from './hasher.js';
import { MerkleProof, ProofDirection, type LeafIndex } from './proof.js';

const HEX_PATTERN = /^(0x)?([0-9a-fA-F]{2})*$/;

export const SerializedProofStepSchema = z.object({
  hash: z.string().regex(HEX_PATTERN, 'hash must be an even-length hex string'),
  direction: z.enum([ProofDirection.Left, ProofDirection.Right]),
});

export const SerializedProofSchema = z.object({
  leaf_index: z.union([
    z.number().int('leaf_index must be an integer').nonnegative('leaf_index must be >= 0'),
    z.string().regex(/^\d+$/, 'leaf_index must be a decimal integer string'),
  ]),
  steps: z.array(SerializedProofStepSchema),
});

export type SerializedProof = z.infer<typeof SerializedProofSchema>;

function encodeIndex(index: LeafIndex): number | string {
  if (typeof index === 'number') {
    return index;
  }
  return index <= BigInt(Number.MAX_SAFE_INTEGER) ? Number(index) : index.toString(10);
}

function decodeIndex(raw: number | string): LeafIndex {
  if (typeof raw === 'number') {
    if (!Number.isSafeInteger(raw)) {
      throw new SerializationError(`leaf_index ${raw} exceeds the safe integer range; encode it as a string`);
    }
    return raw;
  }
  const value = BigInt(raw);
  return value <= BigInt(Number.MAX_SAFE_INTEGER) ? Number(value) : value;
}

export function encodeProof(proof: MerkleProof): SerializedProof {
  return {
    leaf_index: encodeIndex(proof.leafIndex),
    steps: proof.steps.map((step) => ({
      hash: toHex(step.hash),
      direction: step.direction,
    })),
  };
}

/**
 * @throws SerializationError if the value does not match the persisted shape
 */
export function decodeProof(value: unknown): MerkleProof {
  const parsed = SerializedProofSchema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    throw new SerializationError(`${path}: ${issue.message}`, { cause: parsed.error });
  }

  return new MerkleProof(
    decodeIndex(parsed.data.leaf_index),
    parsed.data.steps.map((step) => ({
      hash: fromHex(step.hash),
      direction: step.direction,
    }))
  );
}

export function serializeProof(proof: MerkleProof, space?: number): string {
  return JSON.stringify(encodeProof(proof), null, space);
}

/**
 * @throws SerializationError on malformed JSON or shape
 */
export function deserializeProof(text: string): MerkleProof {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    throw new SerializationError(
      `invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }
  return decodeProof(value);
}
