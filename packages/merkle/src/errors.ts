/**
 * Merkle Error Types
 *
 * Every failure the trees raise for caller-supplied input is one of these
 * classes. Proof verification never throws; it answers with a boolean.
 */

export type MerkleErrorKind =
  | 'EmptyData'
  | 'InvalidIndex'
  | 'InvalidProof'
  | 'HashError'
  | 'SerializationError'
  | 'TreeConstructionError';

/**
 * Base class for all tree and proof errors
 */
export abstract class MerkleError extends Error {
  abstract readonly kind: MerkleErrorKind;

  protected constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;

    // Maintain proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Tree construction was given no items
 */
export class EmptyDataError extends MerkleError {
  readonly kind = 'EmptyData' as const;

  constructor() {
    super('Empty data provided');
  }
}

/**
 * Leaf, slot or proof target outside the tree
 */
export class InvalidIndexError extends MerkleError {
  readonly kind = 'InvalidIndex' as const;

  constructor(
    public readonly index: number | bigint,
    public readonly size: number | bigint
  ) {
    super(`Invalid index: ${index}, tree size: ${size}`);
  }
}

/**
 * Structurally malformed proof (wrong step count, digest width, direction tag).
 * A well-formed proof that does not match a root is not an error.
 */
export class InvalidProofError extends MerkleError {
  readonly kind = 'InvalidProof' as const;

  constructor(public readonly reason: string) {
    super(`Invalid proof: ${reason}`);
  }
}

/**
 * A hash capability failed internally
 */
export class HashError extends MerkleError {
  readonly kind = 'HashError' as const;

  constructor(public readonly detail: string, options?: { cause?: unknown }) {
    super(`Hash function error: ${detail}`, options);
  }
}

/**
 * The persisted proof form could not be read or written
 */
export class SerializationError extends MerkleError {
  readonly kind = 'SerializationError' as const;

  constructor(public readonly detail: string, options?: { cause?: unknown }) {
    super(`Serialization error: ${detail}`, options);
  }
}

/**
 * Invalid sparse-tree depth, or a broken invariant while building
 */
export class TreeConstructionError extends MerkleError {
  readonly kind = 'TreeConstructionError' as const;

  constructor(public readonly reason: string) {
    super(`Tree construction failed: ${reason}`);
  }
}

export function isMerkleError(value: unknown): value is MerkleError {
  return value instanceof MerkleError;
}
