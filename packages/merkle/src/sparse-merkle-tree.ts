/**
 * Sparse Merkle Tree
 *
 * Structure: implicit binary tree of fixed depth d (1-64) over 2^d slots
 * Addressing: heap coordinates as bigint. The root is node 1 at level d,
 * node i has children 2i and 2i+1 one level down, and slot s is node 2^d + s
 * at level 0.
 * Empty slots: hold the all-zero digest; a subtree with no populated slot
 * resolves to a precomputed per-level default, so only populated paths are
 * ever hashed.
 *
 * Internal nodes are computed on demand and memoized by (index, level). A
 * mutation drops the cached root and the memoized ancestors of the mutated
 * slot; every other cached node is still valid.
 *
 * CONCURRENCY: mutable and unsynchronized. Readers populate the memo, so
 * callers sharing a tree must serialize writers against readers.
 *
 * USAGE:
 * ```typescript
 * const tree = SparseMerkleTree.create(16, getHasher('sha256'));
 * tree.update(10, 'hello');
 * const proof = tree.generateProof(10);
 * tree.verifyProof(proof, 10, 'hello');       // true
 * tree.verifyNonMembership(tree.generateProof(11), 11); // true
 * ```
 */

import { InvalidIndexError, TreeConstructionError } from './errors.js';
import { digestEquals, toBytes, toHex, type Digest, type HashInput, type Hasher } from './hasher.js';
import { createLogger } from './logger.js';
import { MerkleProof, ProofDirection, type LeafIndex, type ProofStep } from './proof.js';

const log = createLogger('sparse-merkle-tree');

export const DEFAULT_HASH_SIZE = 32;

export const MIN_DEPTH = 1;
export const MAX_DEPTH = 64;

/**
 * Fresh zero-filled digest of the given width
 */
export function emptyDigest(size: number = DEFAULT_HASH_SIZE): Digest {
  return new Uint8Array(size);
}

/**
 * Digest of an empty slot for 32-byte hashers: 32 zero bytes.
 * A fixed sentinel, not the hash of anything. Each call returns a new buffer.
 */
export function defaultHash(): Digest {
  return emptyDigest(DEFAULT_HASH_SIZE);
}

export interface SparseTreeStats {
  readonly depth: number;
  readonly leafCount: number;
  readonly maxLeaves: bigint;
  readonly cachedNodes: number;
  readonly hasherName: string;
  /** Lowercase hex */
  readonly rootHash: string;
}

function nodeKey(index: bigint, level: number): string {
  return `${level}:${index.toString(16)}`;
}

function compareBigInt(a: bigint, b: bigint): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Slot as bigint, or undefined unless index is a non-negative safe integer
 */
function asSlot(index: LeafIndex): bigint | undefined {
  if (typeof index === 'number') {
    return Number.isSafeInteger(index) && index >= 0 ? BigInt(index) : undefined;
  }
  return index >= 0n ? index : undefined;
}

export class SparseMerkleTree {
  readonly depth: number;
  readonly hasher: Hasher;

  /** Slot -> leaf digest, populated slots only */
  private readonly leafHashes = new Map<bigint, Digest>();
  /** Memoized internal nodes, keyed by (level, index) */
  private readonly nodes = new Map<string, Digest>();
  /** Populated slots beneath each internal node; absent = empty subtree */
  private readonly occupancy = new Map<string, number>();
  /** zeroHashes[l] = digest of an empty subtree of height l */
  private readonly zeroHashes: readonly Digest[];
  private readonly leafOffset: bigint;
  private rootCache: Digest | undefined;

  /**
   * Private constructor - use create() factory instead
   */
  private constructor(depth: number, hasher: Hasher) {
    this.depth = depth;
    this.hasher = hasher;
    this.leafOffset = 1n << BigInt(depth);

    const zeroHashes: Digest[] = [emptyDigest(hasher.outputSize)];
    for (let level = 1; level <= depth; level++) {
      const below = zeroHashes[level - 1];
      zeroHashes.push(hasher.hashPair(below, below));
    }
    this.zeroHashes = zeroHashes;
  }

  /**
   * @param depth - Tree height, 1-64 (2^depth slots)
   * @throws TreeConstructionError if depth is outside 1-64 or not an integer
   */
  static create(depth: number, hasher: Hasher): SparseMerkleTree {
    if (!Number.isInteger(depth) || depth < MIN_DEPTH || depth > MAX_DEPTH) {
      throw new TreeConstructionError(
        `Invalid depth: ${depth}. Must be between ${MIN_DEPTH} and ${MAX_DEPTH}`
      );
    }
    return new SparseMerkleTree(depth, hasher);
  }

  /**
   * Number of addressable slots, 2^depth
   */
  get capacity(): bigint {
    return this.leafOffset;
  }

  /**
   * Number of populated slots
   */
  get size(): number {
    return this.leafHashes.size;
  }

  isEmpty(): boolean {
    return this.leafHashes.size === 0;
  }

  /**
   * Digest an empty slot holds
   */
  get emptyLeaf(): Digest {
    return this.zeroHashes[0].slice();
  }

  /**
   * Insert or overwrite the value at a slot.
   *
   * Writing the canonical empty value (the empty-slot digest's bytes) empties
   * the slot.
   *
   * @throws InvalidIndexError if index is outside [0, 2^depth)
   */
  update(index: LeafIndex, value: HashInput): void {
    const slot = this.requireSlot(index);
    const bytes = toBytes(value);

    if (this.isEmptyValue(bytes)) {
      this.removeSlot(slot);
      return;
    }

    const isNew = !this.leafHashes.has(slot);
    this.leafHashes.set(slot, this.hasher.hash(bytes));
    if (isNew) {
      this.adjustOccupancy(slot, 1);
    }
    this.invalidate(slot);
  }

  /**
   * @returns true if the slot was populated
   */
  remove(index: LeafIndex): boolean {
    const slot = this.lookupSlot(index);
    return slot !== undefined && this.removeSlot(slot);
  }

  /**
   * Leaf digest stored at a slot, undefined when empty
   */
  get(index: LeafIndex): Digest | undefined {
    const slot = this.lookupSlot(index);
    return slot === undefined ? undefined : this.leafHashes.get(slot)?.slice();
  }

  contains(index: LeafIndex): boolean {
    const slot = this.lookupSlot(index);
    return slot !== undefined && this.leafHashes.has(slot);
  }

  /**
   * Digests leave the tree as copies; cached nodes are never shared.
   */
  root(): Digest {
    return this.rootDigest().slice();
  }

  private rootDigest(): Digest {
    if (this.rootCache === undefined) {
      const cachedBefore = this.nodes.size;
      this.rootCache = this.resolveNode(1n, this.depth);
      log.debug('Sparse root recomputed', {
        depth: this.depth,
        leafCount: this.leafHashes.size,
        nodesComputed: this.nodes.size - cachedBefore,
      });
    }
    return this.rootCache;
  }

  /**
   * Digest of the node at heap coordinate `index` on `level`
   * (level 0 = slots, level depth = root at index 1).
   *
   * @throws InvalidIndexError if level is outside [0, depth] or index is not a node on that level
   */
  getNodeHash(index: bigint, level: number): Digest {
    if (!Number.isInteger(level) || level < 0 || level > this.depth) {
      throw new InvalidIndexError(level, this.depth + 1);
    }
    const first = 1n << BigInt(this.depth - level);
    if (index < first || index >= first << 1n) {
      throw new InvalidIndexError(index, first);
    }
    return this.resolveNode(index, level).slice();
  }

  /**
   * Generate a proof for a slot, populated or not.
   *
   * Always exactly `depth` steps, so the same proof shape serves membership
   * and non-membership checks.
   *
   * @throws InvalidIndexError if index is outside [0, 2^depth)
   */
  generateProof(index: LeafIndex): MerkleProof {
    const slot = this.requireSlot(index);
    const steps: ProofStep[] = [];
    let current = this.leafOffset + slot;

    for (let level = 0; level < this.depth; level++) {
      steps.push({
        hash: this.resolveNode(current ^ 1n, level),
        direction: (current & 1n) === 0n ? ProofDirection.Right : ProofDirection.Left,
      });
      current >>= 1n;
    }

    return new MerkleProof(index, steps);
  }

  /**
   * Check a proof against the tree's current root.
   *
   * The answer reflects the tree as it is now, not when the proof was made.
   * Returns false (never throws) when the proof targets another slot.
   *
   * @param value - Claimed slot value; the canonical empty value checks emptiness
   */
  verifyProof(proof: MerkleProof, index: LeafIndex, value: HashInput): boolean {
    const slot = asSlot(index);
    const proven = asSlot(proof.leafIndex);
    if (slot === undefined || proven === undefined || slot !== proven) {
      return false;
    }

    const bytes = toBytes(value);
    const leafHash = this.isEmptyValue(bytes) ? this.zeroHashes[0] : this.hasher.hash(bytes);
    return digestEquals(proof.computeRoot(this.hasher, leafHash), this.rootDigest());
  }

  /**
   * Check that a slot is empty under the current root
   */
  verifyNonMembership(proof: MerkleProof, index: LeafIndex): boolean {
    return this.verifyProof(proof, index, emptyDigest(this.hasher.outputSize));
  }

  /**
   * Populated slots in ascending order
   */
  leafIndices(): bigint[] {
    return [...this.leafHashes.keys()].sort(compareBigInt);
  }

  /**
   * Populated (slot, leaf digest) pairs in ascending slot order
   */
  entries(): Array<readonly [bigint, Digest]> {
    return [...this.leafHashes.entries()]
      .sort(([a], [b]) => compareBigInt(a, b))
      .map(([slot, hash]): readonly [bigint, Digest] => [slot, hash.slice()]);
  }

  stats(): SparseTreeStats {
    const rootHash = toHex(this.rootDigest());
    return {
      depth: this.depth,
      leafCount: this.leafHashes.size,
      maxLeaves: this.capacity,
      cachedNodes: this.nodes.size,
      hasherName: this.hasher.name,
      rootHash,
    };
  }

  /**
   * Drop every slot and cached node
   */
  clear(): void {
    this.leafHashes.clear();
    this.nodes.clear();
    this.occupancy.clear();
    this.rootCache = undefined;
  }

  private resolveNode(index: bigint, level: number): Digest {
    if (level === 0) {
      return this.leafHashes.get(index - this.leafOffset) ?? this.zeroHashes[0];
    }

    const key = nodeKey(index, level);
    if (!this.occupancy.has(key)) {
      return this.zeroHashes[level];
    }

    const cached = this.nodes.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const left = this.resolveNode(index << 1n, level - 1);
    const right = this.resolveNode((index << 1n) | 1n, level - 1);
    const hash = this.hasher.hashPair(left, right);
    this.nodes.set(key, hash);
    return hash;
  }

  private removeSlot(slot: bigint): boolean {
    if (!this.leafHashes.delete(slot)) {
      return false;
    }
    this.adjustOccupancy(slot, -1);
    this.invalidate(slot);
    return true;
  }

  /**
   * Forget the cached root and every memoized ancestor of a slot
   */
  private invalidate(slot: bigint): void {
    let node = this.leafOffset + slot;
    for (let level = 1; level <= this.depth; level++) {
      node >>= 1n;
      this.nodes.delete(nodeKey(node, level));
    }
    this.rootCache = undefined;
  }

  private adjustOccupancy(slot: bigint, delta: 1 | -1): void {
    let node = this.leafOffset + slot;
    for (let level = 1; level <= this.depth; level++) {
      node >>= 1n;
      const key = nodeKey(node, level);
      const count = (this.occupancy.get(key) ?? 0) + delta;
      if (count > 0) {
        this.occupancy.set(key, count);
      } else {
        this.occupancy.delete(key);
      }
    }
  }

  private isEmptyValue(bytes: Uint8Array): boolean {
    return digestEquals(bytes, this.zeroHashes[0]);
  }

  private lookupSlot(index: LeafIndex): bigint | undefined {
    const slot = asSlot(index);
    return slot !== undefined && slot < this.leafOffset ? slot : undefined;
  }

  private requireSlot(index: LeafIndex): bigint {
    const slot = this.lookupSlot(index);
    if (slot === undefined) {
      throw new InvalidIndexError(index, this.capacity);
    }
    return slot;
  }
}
