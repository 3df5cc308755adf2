/**
 * Hash capabilities
 *
 * A tree never hashes bytes itself: every leaf and internal digest goes
 * through a `Hasher`. Internal nodes combine children as `hash(left || right)`,
 * plain concatenation with no leaf/internal domain tag, so any substitute
 * capability must keep exactly that byte layout to reproduce existing roots.
 *
 * USAGE:
 * ```typescript
 * const hasher = getHasher('sha256');
 * const leaf = hasher.hash('hello');
 * const parent = hasher.hashPair(leaf, leaf);
 * ```
 */

import { blake3 } from '@noble/hashes/blake3';
import { sha256 } from '@noble/hashes/sha256';
import { sha3_256 } from '@noble/hashes/sha3';
import { bytesToHex, concatBytes, hexToBytes, utf8ToBytes } from '@noble/hashes/utils';

import { HashError } from './errors.js';

/**
 * Fixed-length hash output; equality is byte-wise
 */
export type Digest = Uint8Array;

/**
 * Raw item accepted by the trees. Strings are UTF-8 encoded.
 */
export type HashInput = Uint8Array | string;

export interface Hasher {
  /** Diagnostic name of the primitive, e.g. "SHA-256" */
  readonly name: string;
  /** Digest length in bytes */
  readonly outputSize: number;
  hash(data: HashInput): Digest;
  /** Combine two child digests into their parent */
  hashPair(left: Digest, right: Digest): Digest;
}

/**
 * Shared plumbing for byte-oriented primitives.
 *
 * Subclasses supply `digest`; a primitive that throws, or answers with the
 * wrong width, surfaces as `HashError`.
 */
export abstract class BaseHasher implements Hasher {
  abstract readonly name: string;
  abstract readonly outputSize: number;

  protected abstract digest(data: Uint8Array): Uint8Array;

  hash(data: HashInput): Digest {
    let out: Uint8Array;
    try {
      out = this.digest(toBytes(data));
    } catch (error) {
      throw new HashError(
        `${this.name} failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }

    if (out.length !== this.outputSize) {
      throw new HashError(
        `${this.name} returned ${out.length} bytes, expected ${this.outputSize}`
      );
    }
    return out;
  }

  hashPair(left: Digest, right: Digest): Digest {
    return this.hash(concatBytes(left, right));
  }
}

export class Sha256Hasher extends BaseHasher {
  readonly name = 'SHA-256';
  readonly outputSize = 32;

  protected digest(data: Uint8Array): Uint8Array {
    return sha256(data);
  }
}

export class Sha3Hasher extends BaseHasher {
  readonly name = 'SHA3-256';
  readonly outputSize = 32;

  protected digest(data: Uint8Array): Uint8Array {
    return sha3_256(data);
  }
}

export class Blake3Hasher extends BaseHasher {
  readonly name = 'BLAKE3';
  readonly outputSize = 32;

  protected digest(data: Uint8Array): Uint8Array {
    return blake3(data);
  }
}

/**
 * Algorithms selectable by name (CLI, config files)
 */
export const HASH_ALGORITHMS = ['sha256', 'sha3-256', 'blake3'] as const;

export type HashAlgorithm = (typeof HASH_ALGORITHMS)[number];

export function isHashAlgorithm(value: string): value is HashAlgorithm {
  return HASH_ALGORITHMS.some((algorithm) => algorithm === value);
}

const FACTORIES: Record<HashAlgorithm, () => Hasher> = {
  sha256: () => new Sha256Hasher(),
  'sha3-256': () => new Sha3Hasher(),
  blake3: () => new Blake3Hasher(),
};

const instances = new Map<HashAlgorithm, Hasher>();

/**
 * Get the shared hasher for an algorithm (instances are stateless)
 */
export function getHasher(algorithm: HashAlgorithm = 'sha256'): Hasher {
  let hasher = instances.get(algorithm);
  if (!hasher) {
    hasher = FACTORIES[algorithm]();
    instances.set(algorithm, hasher);
  }
  return hasher;
}

export function toBytes(input: HashInput): Uint8Array {
  return typeof input === 'string' ? utf8ToBytes(input) : input;
}

export function digestEquals(a: Digest, b: Digest): boolean {
  if (a.length !== b.length) {
    return false;
  }
  let diff = 0;
  for (let i = 0; i < a.length; i++) {
    diff |= a[i] ^ b[i];
  }
  return diff === 0;
}

/**
 * Lowercase hex, no prefix
 */
export function toHex(digest: Digest): string {
  return bytesToHex(digest);
}

/**
 * Parse hex (optional 0x prefix). Throws on odd length or non-hex characters.
 */
export function fromHex(hex: string): Digest {
  const clean = hex.startsWith('0x') ? hex.slice(2) : hex;
  return hexToBytes(clean);
}
