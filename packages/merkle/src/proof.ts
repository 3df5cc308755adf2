/**
 * Merkle proof value object
 *
 * A proof is the target leaf index plus sibling digests ordered leaf-to-root.
 * Folding a leaf digest through the steps recomputes the root; verification
 * compares that result byte-wise and answers true or false, never throws.
 */

import { InvalidProofError } from './errors.js';
import { digestEquals, toHex, type Digest, type HashInput, type Hasher } from './hasher.js';

/**
 * Side on which the sibling sits relative to the node being proven
 */
export const ProofDirection = {
  Left: 'Left',
  Right: 'Right',
} as const;

export type ProofDirection = (typeof ProofDirection)[keyof typeof ProofDirection];

export interface ProofStep {
  readonly hash: Digest;
  readonly direction: ProofDirection;
}

/**
 * Binary trees index leaves with numbers; sparse trees address 64-bit slots
 */
export type LeafIndex = number | bigint;

/**
 * Index as bigint, or undefined for a fractional or unsafe number
 */
function indexValue(index: LeafIndex): bigint | undefined {
  if (typeof index === 'bigint') {
    return index;
  }
  return Number.isSafeInteger(index) ? BigInt(index) : undefined;
}

export class MerkleProof {
  readonly leafIndex: LeafIndex;
  readonly steps: readonly ProofStep[];

  /**
   * Step digests are copied, so a proof never aliases the buffers of the
   * tree that issued it.
   */
  constructor(leafIndex: LeafIndex, steps: readonly ProofStep[]) {
    this.leafIndex = leafIndex;
    this.steps = steps.map((step) => ({ hash: step.hash.slice(), direction: step.direction }));
  }

  get length(): number {
    return this.steps.length;
  }

  /**
   * True only for the proof of a single-leaf tree
   */
  isEmpty(): boolean {
    return this.steps.length === 0;
  }

  computeRoot(hasher: Hasher, leafHash: Digest): Digest {
    let current = leafHash;

    for (const step of this.steps) {
      current =
        step.direction === ProofDirection.Left
          ? hasher.hashPair(step.hash, current)
          : hasher.hashPair(current, step.hash);
    }

    return current;
  }

  verify(hasher: Hasher, leafData: HashInput, root: Digest): boolean {
    return this.verifyWithLeafHash(hasher, hasher.hash(leafData), root);
  }

  verifyWithLeafHash(hasher: Hasher, leafHash: Digest, root: Digest): boolean {
    return digestEquals(this.computeRoot(hasher, leafHash), root);
  }

  /**
   * Structural check, separate from verification.
   *
   * @param expectedLength - Step count the issuing tree must have produced
   * @throws InvalidProofError describing the first defect found
   */
  assertWellFormed(hasher: Hasher, expectedLength?: number): void {
    if (typeof this.leafIndex === 'number' && !Number.isSafeInteger(this.leafIndex)) {
      throw new InvalidProofError(`leaf index ${this.leafIndex} is not an integer`);
    }
    if (this.leafIndex < 0) {
      throw new InvalidProofError(`leaf index ${this.leafIndex} is negative`);
    }
    if (expectedLength !== undefined && this.steps.length !== expectedLength) {
      throw new InvalidProofError(
        `expected ${expectedLength} steps, found ${this.steps.length}`
      );
    }

    this.steps.forEach((step, i) => {
      if (step.direction !== ProofDirection.Left && step.direction !== ProofDirection.Right) {
        throw new InvalidProofError(`step ${i} has unknown direction ${String(step.direction)}`);
      }
      if (step.hash.length !== hasher.outputSize) {
        throw new InvalidProofError(
          `step ${i} digest is ${step.hash.length} bytes, ${hasher.name} produces ${hasher.outputSize}`
        );
      }
    });
  }

  equals(other: MerkleProof): boolean {
    const index = indexValue(this.leafIndex);
    if (index === undefined || index !== indexValue(other.leafIndex)) return false;
    if (this.steps.length !== other.steps.length) return false;
    return this.steps.every(
      (step, i) =>
        step.direction === other.steps[i].direction &&
        digestEquals(step.hash, other.steps[i].hash)
    );
  }

  /**
   * Debug rendering: `index:<N>, steps:[<L|R>:<hex>, ...]`. Not a wire format.
   */
  toHex(): string {
    const steps = this.steps.map(
      (step) => `${step.direction === ProofDirection.Left ? 'L' : 'R'}:${toHex(step.hash)}`
    );
    return `index:${this.leafIndex}, steps:[${steps.join(', ')}]`;
  }

  toString(): string {
    return this.toHex();
  }
}
