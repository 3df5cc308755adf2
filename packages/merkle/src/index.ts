/**
 * hashcommit Merkle library
 *
 * Hash-based commitment structures:
 * - Binary Merkle tree over an ordered item list
 * - Sparse Merkle tree over up to 2^64 addressable slots
 * - Inclusion / non-membership proofs and their persisted JSON form
 *
 * @packageDocumentation
 */

export {
  BaseHasher,
  Blake3Hasher,
  HASH_ALGORITHMS,
  Sha256Hasher,
  Sha3Hasher,
  digestEquals,
  fromHex,
  getHasher,
  isHashAlgorithm,
  toBytes,
  toHex,
} from './hasher.js';
export type { Digest, HashAlgorithm, HashInput, Hasher } from './hasher.js';

export {
  EmptyDataError,
  HashError,
  InvalidIndexError,
  InvalidProofError,
  MerkleError,
  SerializationError,
  TreeConstructionError,
  isMerkleError,
} from './errors.js';
export type { MerkleErrorKind } from './errors.js';

export { MerkleProof, ProofDirection } from './proof.js';
export type { LeafIndex, ProofStep } from './proof.js';

export { MerkleTree } from './merkle-tree.js';
export type { TreeStats } from './merkle-tree.js';

export {
  DEFAULT_HASH_SIZE,
  MAX_DEPTH,
  MIN_DEPTH,
  SparseMerkleTree,
  defaultHash,
  emptyDigest,
} from './sparse-merkle-tree.js';
export type { SparseTreeStats } from './sparse-merkle-tree.js';

export {
  SerializedProofSchema,
  SerializedProofStepSchema,
  decodeProof,
  deserializeProof,
  encodeProof,
  serializeProof,
} from './serialization.js';
export type { SerializedProof } from './serialization.js';

export { DebugLogger, createLogger, isDebugEnabled } from './logger.js';
export type { DebugLoggerConfig, LogMetadata } from './logger.js';
