/**
 * CLI command function tests
 *
 * Commands are called directly with an in-memory context; files live in a
 * per-test temp directory. Expected roots come from the library itself.
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  EmptyDataError,
  InvalidIndexError,
  InvalidProofError,
  MerkleTree,
  SerializationError,
  SparseMerkleTree,
  Sha256Hasher,
  deserializeProof,
  toHex,
} from '@hashcommit/merkle';

import { proofCommand } from '../../commands/proof.js';
import { rootCommand } from '../../commands/root.js';
import { sparseProofCommand, sparseRootCommand, sparseVerifyCommand } from '../../commands/sparse.js';
import { verifyCommand } from '../../commands/verify.js';
import type { CLIConfig } from '../../lib/config.js';
import type { CommandContext } from '../../lib/context.js';
import { ConfigError, EXIT_CODES, InputError, exitCodeFor } from '../../lib/errors.js';
import { createCLILogger } from '../../lib/logger.js';

const hasher = new Sha256Hasher();
const ITEMS = ['a', 'b', 'c', 'd', 'e'];

function makeContext(overrides: Partial<CLIConfig> = {}): CommandContext {
  return {
    config: {
      hash: 'sha256',
      sparseDepth: 8,
      json: false,
      verbose: false,
      configPath: null,
      ...overrides,
    },
    logger: createCLILogger({ level: 'error', json: true, color: false, write: () => undefined }),
  };
}

describe('CLI commands', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'hashcommit-cli-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeFile(name: string, content: string): string {
    const path = join(dir, name);
    writeFileSync(path, content);
    return path;
  }

  // ==========================================================================
  // root
  // ==========================================================================

  describe('root', () => {
    const expectedRoot = toHex(MerkleTree.fromData(['a', 'b', 'c', 'd'], hasher).root());

    it('should print root, leaf count, height and hasher', () => {
      const result = rootCommand({ items: ['a', 'b', 'c', 'd'] }, makeContext());

      expect(result.exitCode).toBe(EXIT_CODES.SUCCESS);
      expect(result.output).toBe(
        [`root:    ${expectedRoot}`, 'leaves:  4', 'height:  2', 'hasher:  SHA-256'].join('\n')
      );
    });

    it('should print JSON in json mode', () => {
      const result = rootCommand({ items: ['a', 'b', 'c', 'd'] }, makeContext({ json: true }));

      expect(JSON.parse(result.output)).toEqual({
        root: expectedRoot,
        leaves: 4,
        height: 2,
        hasher: 'SHA-256',
      });
    });

    it('should read items from a file after positional items', () => {
      const file = writeFile('items.txt', 'c\nd\n');
      const result = rootCommand({ items: ['a', 'b'], file }, makeContext({ json: true }));

      expect(JSON.parse(result.output).root).toBe(expectedRoot);
    });

    it('should use the configured hasher', () => {
      const result = rootCommand({ items: ['a', 'b', 'c', 'd'] }, makeContext({ hash: 'blake3', json: true }));
      const parsed = JSON.parse(result.output);

      expect(parsed.hasher).toBe('BLAKE3');
      expect(parsed.root).not.toBe(expectedRoot);
    });

    it('should fail with EmptyData when there are no items', () => {
      expect(() => rootCommand({ items: [] }, makeContext())).toThrow(EmptyDataError);
      expect(exitCodeFor(new EmptyDataError())).toBe(EXIT_CODES.ERRORS);
    });

    it('should report an unreadable items file as input error', () => {
      const file = join(dir, 'missing.txt');
      expect(() => rootCommand({ items: [], file }, makeContext())).toThrow(InputError);
    });
  });

  // ==========================================================================
  // proof / verify
  // ==========================================================================

  describe('proof', () => {
    it('should print a persisted proof that verifies', () => {
      const result = proofCommand({ index: '2', items: ITEMS }, makeContext());
      const proof = deserializeProof(result.output);
      const tree = MerkleTree.fromData(ITEMS, hasher);

      expect(result.exitCode).toBe(EXIT_CODES.SUCCESS);
      expect(proof.leafIndex).toBe(2);
      expect(proof.length).toBe(3);
      expect(tree.verifyProofAgainstRoot(proof, 'c')).toBe(true);
    });

    it('should print compact JSON in json mode', () => {
      const result = proofCommand({ index: '0', items: ['only'] }, makeContext({ json: true }));
      expect(result.output).toBe('{"leaf_index":0,"steps":[]}');
    });

    it('should reject an index past the last item', () => {
      expect(() => proofCommand({ index: '5', items: ITEMS }, makeContext())).toThrow(
        'Invalid index: 5, tree size: 5'
      );
      expect(() =>
        proofCommand({ index: '99999999999999999999', items: ITEMS }, makeContext())
      ).toThrow(InvalidIndexError);
    });

    it('should reject a non-numeric index as input error', () => {
      expect(() => proofCommand({ index: 'two', items: ITEMS }, makeContext())).toThrow(InputError);
    });
  });

  describe('verify', () => {
    let proofFile: string;
    let root: string;

    beforeEach(() => {
      proofFile = writeFile('proof.json', proofCommand({ index: '2', items: ITEMS }, makeContext()).output);
      root = toHex(MerkleTree.fromData(ITEMS, hasher).root());
    });

    it('should report a matching item as valid', () => {
      const result = verifyCommand({ proof: proofFile, item: 'c', root }, makeContext());

      expect(result.output).toBe('valid');
      expect(result.exitCode).toBe(EXIT_CODES.SUCCESS);
    });

    it('should report a different item as invalid with exit code 2', () => {
      const result = verifyCommand({ proof: proofFile, item: 'z', root }, makeContext());

      expect(result.output).toBe('invalid');
      expect(result.exitCode).toBe(EXIT_CODES.ERRORS);
    });

    it('should accept a 0x-prefixed root and print JSON', () => {
      const result = verifyCommand(
        { proof: proofFile, item: 'c', root: `0x${root}` },
        makeContext({ json: true })
      );
      expect(JSON.parse(result.output)).toEqual({ valid: true, leafIndex: 2 });
    });

    it('should reject a root that is not a digest', () => {
      expect(() => verifyCommand({ proof: proofFile, item: 'c', root: 'zz' }, makeContext())).toThrow(
        'Invalid root: zz. Expected a hex digest'
      );
      expect(() => verifyCommand({ proof: proofFile, item: 'c', root: 'abcd' }, makeContext())).toThrow(
        'Invalid root: 2 bytes, expected 32'
      );
    });

    it('should reject a proof with a truncated digest as data-integrity error', () => {
      const broken = writeFile(
        'broken.json',
        JSON.stringify({ leaf_index: 0, steps: [{ hash: 'abcd', direction: 'Left' }] })
      );

      let caught: unknown;
      try {
        verifyCommand({ proof: broken, item: 'a', root }, makeContext());
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(InvalidProofError);
      expect(exitCodeFor(caught)).toBe(EXIT_CODES.DATA_INTEGRITY_ERROR);
    });

    it('should reject a proof file that is not JSON', () => {
      const garbage = writeFile('garbage.json', 'not a proof');

      expect(() => verifyCommand({ proof: garbage, item: 'a', root }, makeContext())).toThrow(
        SerializationError
      );
    });

    it('should reject a missing proof file', () => {
      expect(() =>
        verifyCommand({ proof: join(dir, 'absent.json'), item: 'a', root }, makeContext())
      ).toThrow(InputError);
    });
  });

  // ==========================================================================
  // sparse
  // ==========================================================================

  describe('sparse root', () => {
    it('should print the root of the populated tree', () => {
      const expected = SparseMerkleTree.create(8, hasher);
      expected.update(1, 'a');

      const result = sparseRootCommand({ set: ['1=a'] }, makeContext({ json: true }));

      expect(JSON.parse(result.output)).toEqual({
        root: toHex(expected.root()),
        depth: 8,
        leaves: 1,
        capacity: '256',
        hasher: 'SHA-256',
      });
    });

    it('should print a key/value block in text mode', () => {
      const result = sparseRootCommand({ depth: '4', set: [] }, makeContext());
      const emptyRoot = toHex(SparseMerkleTree.create(4, hasher).root());

      expect(result.output).toBe(
        [
          `root:      ${emptyRoot}`,
          'depth:     4',
          'leaves:    0',
          'capacity:  16',
          'hasher:    SHA-256',
        ].join('\n')
      );
    });

    it('should keep everything after the first = as the value', () => {
      const expected = SparseMerkleTree.create(8, hasher);
      expected.update(3, 'a=b');

      const result = sparseRootCommand({ set: ['3=a=b'] }, makeContext({ json: true }));
      expect(JSON.parse(result.output).root).toBe(toHex(expected.root()));
    });

    it('should reject a bad depth as configuration error', () => {
      let caught: unknown;
      try {
        sparseRootCommand({ depth: '0', set: [] }, makeContext());
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(ConfigError);
      expect(exitCodeFor(caught)).toBe(EXIT_CODES.CONFIG_ERROR);
    });

    it('should reject malformed --set entries', () => {
      expect(() => sparseRootCommand({ set: ['nothing'] }, makeContext())).toThrow(
        'Invalid --set entry "nothing": expected <index>=<value>'
      );
      expect(() => sparseRootCommand({ set: ['x=1'] }, makeContext())).toThrow(InputError);
    });

    it('should reject a slot outside the tree', () => {
      expect(() => sparseRootCommand({ depth: '4', set: ['16=x'] }, makeContext())).toThrow(
        'Invalid index: 16, tree size: 16'
      );
    });
  });

  describe('sparse proof and verify', () => {
    const tree = { depth: '4', set: ['3=hello', '9=world'] };

    function writeProof(index: string): string {
      return writeFile(`slot-${index}.json`, sparseProofCommand({ ...tree, index }, makeContext()).output);
    }

    it('should print a depth-length proof', () => {
      const proof = deserializeProof(sparseProofCommand({ ...tree, index: '3' }, makeContext()).output);

      expect(proof.leafIndex).toBe(3);
      expect(proof.length).toBe(4);
    });

    it('should verify membership of a populated slot', () => {
      const proof = writeProof('3');

      const valid = sparseVerifyCommand({ ...tree, index: '3', proof, value: 'hello' }, makeContext());
      const wrong = sparseVerifyCommand({ ...tree, index: '3', proof, value: 'other' }, makeContext());

      expect(valid.output).toBe('valid');
      expect(valid.exitCode).toBe(EXIT_CODES.SUCCESS);
      expect(wrong.output).toBe('invalid');
      expect(wrong.exitCode).toBe(EXIT_CODES.ERRORS);
    });

    it('should verify non-membership when no value is given', () => {
      const empty = writeProof('5');
      const populated = writeProof('3');

      expect(sparseVerifyCommand({ ...tree, index: '5', proof: empty }, makeContext()).output).toBe('valid');
      expect(sparseVerifyCommand({ ...tree, index: '3', proof: populated }, makeContext()).output).toBe(
        'invalid'
      );
    });

    it('should report the check in json mode', () => {
      const proof = writeProof('5');
      const result = sparseVerifyCommand({ ...tree, index: '5', proof }, makeContext({ json: true }));

      expect(JSON.parse(result.output)).toEqual({ valid: true, index: 5, check: 'non-membership' });
    });

    it('should reject a proof for another slot', () => {
      const proof = writeProof('5');
      const result = sparseVerifyCommand({ ...tree, index: '6', proof }, makeContext());

      expect(result.output).toBe('invalid');
    });

    it('should reject a proof issued at another depth', () => {
      const proof = writeProof('5');

      expect(() =>
        sparseVerifyCommand({ depth: '5', set: tree.set, index: '5', proof }, makeContext())
      ).toThrow('Invalid proof: expected 5 steps, found 4');
    });

    it('should go invalid once the tree differs from the one that issued the proof', () => {
      const proof = writeProof('3');
      const changed = { depth: '4', set: [...tree.set, '12=new'] };

      expect(
        sparseVerifyCommand({ ...changed, index: '3', proof, value: 'hello' }, makeContext()).output
      ).toBe('invalid');
      expect(readFileSync(proof, 'utf-8')).toContain('"leaf_index": 3');
    });
  });
});
