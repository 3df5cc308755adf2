/**
 * Binary Merkle Tree
 *
 * Structure: balanced-ish binary hash tree over an ordered, non-empty item list
 * Storage: flat level arrays (layers[0] = leaves, layers[height] = [root])
 * Odd levels: the trailing node is combined with itself, hash(x || x)
 * Hash Function: any `Hasher` capability
 *
 * Insertion order is significant: it defines each item's index. The tree is
 * built once and is read-only afterwards, so proofs for different indices can
 * be produced and checked independently.
 *
 * KNOWN WEAKNESS: self-pairing the odd node and hashing leaves and internal
 * nodes without a domain tag allow crafted trees of different shapes to share
 * a root. Roots are kept bit-compatible with existing commitments.
 *
 * USAGE:
 * ```typescript
 * const tree = MerkleTree.fromData(['a', 'b', 'c', 'd'], getHasher('sha256'));
 * const proof = tree.generateProof(0);
 * tree.verifyProofAgainstRoot(proof, 'a'); // true
 * ```
 */

import { EmptyDataError, InvalidIndexError, TreeConstructionError } from './errors.js';
import { toHex, type Digest, type HashInput, type Hasher } from './hasher.js';
import { createLogger } from './logger.js';
import { MerkleProof, ProofDirection, type ProofStep } from './proof.js';

const log = createLogger('merkle-tree');

/**
 * Tree statistics for debugging and analysis
 */
export interface TreeStats {
  readonly leafCount: number;
  readonly treeHeight: number;
  readonly hasherName: string;
  /** Lowercase hex */
  readonly rootHash: string;
}

export class MerkleTree {
  private readonly layers: readonly (readonly Digest[])[];
  readonly hasher: Hasher;

  /**
   * Private constructor - use fromData() or fromLeaves() instead
   */
  private constructor(layers: readonly (readonly Digest[])[], hasher: Hasher) {
    this.layers = layers;
    this.hasher = hasher;
  }

  /**
   * Build a tree by hashing each item into a leaf
   *
   * @param items - Raw items in index order (strings are UTF-8 encoded)
   * @throws EmptyDataError if items is empty
   */
  static fromData(items: readonly HashInput[], hasher: Hasher): MerkleTree {
    if (items.length === 0) {
      throw new EmptyDataError();
    }
    return MerkleTree.build(items.map((item) => hasher.hash(item)), hasher);
  }

  /**
   * Build a tree from digests that already are leaf hashes.
   *
   * Callers must pass true leaf hashes, not raw data: the tree cannot tell a
   * leaf digest from an internal one.
   *
   * @throws EmptyDataError if leaves is empty
   * @throws TreeConstructionError if a leaf's width differs from the hasher's output size
   */
  static fromLeaves(leaves: readonly Digest[], hasher: Hasher): MerkleTree {
    if (leaves.length === 0) {
      throw new EmptyDataError();
    }
    leaves.forEach((leaf, i) => {
      if (leaf.length !== hasher.outputSize) {
        throw new TreeConstructionError(
          `leaf ${i} is ${leaf.length} bytes, ${hasher.name} produces ${hasher.outputSize}`
        );
      }
    });
    return MerkleTree.build(leaves.map((leaf) => leaf.slice()), hasher);
  }

  private static build(leaves: Digest[], hasher: Hasher): MerkleTree {
    const started = performance.now();
    const layers: Digest[][] = [leaves];
    let current = leaves;

    while (current.length > 1) {
      const next: Digest[] = [];
      for (let i = 0; i < current.length; i += 2) {
        const left = current[i];
        const right = i + 1 < current.length ? current[i + 1] : left;
        next.push(hasher.hashPair(left, right));
      }
      layers.push(next);
      current = next;
    }

    const tree = new MerkleTree(layers, hasher);
    log.debug('Merkle tree built', {
      leafCount: leaves.length,
      height: tree.height,
      hasher: hasher.name,
      durationMs: Math.round((performance.now() - started) * 1000) / 1000,
    });
    return tree;
  }

  /**
   * Digests leave the tree as copies; the layers are never shared.
   */
  root(): Digest {
    return this.rootDigest().slice();
  }

  private rootDigest(): Digest {
    return this.layers[this.layers.length - 1][0];
  }

  get size(): number {
    return this.layers[0].length;
  }

  /**
   * Always false: construction rejects empty input
   */
  isEmpty(): boolean {
    return this.size === 0;
  }

  /**
   * Number of levels above the leaves, ceil(log2(size))
   */
  get height(): number {
    return this.layers.length - 1;
  }

  getLeaf(index: number): Digest {
    if (!Number.isInteger(index) || index < 0 || index >= this.size) {
      throw new InvalidIndexError(index, this.size);
    }
    return this.layers[0][index].slice();
  }

  leaves(): Digest[] {
    return this.layers[0].map((leaf) => leaf.slice());
  }

  /**
   * @param level - 0 = leaves, height = root
   */
  getLayer(level: number): Digest[] {
    if (!Number.isInteger(level) || level < 0 || level > this.height) {
      throw new InvalidIndexError(level, this.layers.length);
    }
    return this.layers[level].map((node) => node.slice());
  }

  /**
   * Generate the inclusion proof for the leaf at `index`
   *
   * O(height): one sibling per level, collected root-to-leaf and then
   * reversed into the leaf-to-root order verification replays.
   *
   * @throws InvalidIndexError if index is outside [0, size)
   */
  generateProof(index: number): MerkleProof {
    if (!Number.isInteger(index) || index < 0 || index >= this.size) {
      throw new InvalidIndexError(index, this.size);
    }

    const steps: ProofStep[] = [];
    this.collectProofSteps(this.height, 0, 0, this.size, index, steps);
    steps.reverse();

    return new MerkleProof(index, steps);
  }

  /**
   * Walk from the node at (level, position), which covers the `width` real
   * leaves starting at `start`, down to the target leaf.
   *
   * A child at `level - 1` spans at most 2^(level-1) leaves, so the left
   * child takes min(2^(level-1), width) of the range and the right child the
   * rest. With a full right side this is start + ceil(width / 2); on a ragged
   * right edge the left side is the larger one. An empty right side means
   * the node was formed by pairing its left child with itself.
   */
  private collectProofSteps(
    level: number,
    position: number,
    start: number,
    width: number,
    target: number,
    steps: ProofStep[]
  ): void {
    if (level === 0) {
      return;
    }

    const children = this.layers[level - 1];
    const leftPosition = position * 2;
    const rightPosition = leftPosition + 1;
    const left = children[leftPosition];
    const right = rightPosition < children.length ? children[rightPosition] : left;

    const leftWidth = Math.min(2 ** (level - 1), width);
    const mid = start + leftWidth;

    if (target < mid) {
      steps.push({ hash: right, direction: ProofDirection.Right });
      this.collectProofSteps(level - 1, leftPosition, start, leftWidth, target, steps);
    } else {
      steps.push({ hash: left, direction: ProofDirection.Left });
      this.collectProofSteps(level - 1, rightPosition, mid, width - leftWidth, target, steps);
    }
  }

  verifyProof(proof: MerkleProof, leafData: HashInput, root: Digest): boolean {
    return proof.verify(this.hasher, leafData, root);
  }

  verifyProofWithLeafHash(proof: MerkleProof, leafHash: Digest, root: Digest): boolean {
    return proof.verifyWithLeafHash(this.hasher, leafHash, root);
  }

  /**
   * Verify against this tree's own root
   */
  verifyProofAgainstRoot(proof: MerkleProof, leafData: HashInput): boolean {
    return this.verifyProof(proof, leafData, this.rootDigest());
  }

  stats(): TreeStats {
    return {
      leafCount: this.size,
      treeHeight: this.height,
      hasherName: this.hasher.name,
      rootHash: toHex(this.rootDigest()),
    };
  }
}
