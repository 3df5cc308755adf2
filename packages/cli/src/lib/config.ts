/**
 * hashcommit CLI Configuration Management
 *
 * Loads configuration from .hashcommitrc (YAML) with environment variable
 * overrides and defaults.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (HASHCOMMIT_*)
 * 3. Config file (.hashcommitrc or --config path)
 * 4. Default values
 *
 * Example .hashcommitrc:
 * ```yaml
 * hash: sha3-256
 * sparse:
 *   depth: 16
 * output:
 *   json: true
 * ```
 *
 * @module cli/lib/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import {
  HASH_ALGORITHMS,
  MAX_DEPTH,
  MIN_DEPTH,
  isHashAlgorithm,
  type HashAlgorithm,
} from '@hashcommit/merkle';

import { ConfigError, errorMessage } from './errors.js';

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * Full CLI configuration
 */
export interface CLIConfig {
  /** Hash primitive for every tree the command builds */
  readonly hash: HashAlgorithm;
  /** Sparse tree depth when a command does not pass --depth */
  readonly sparseDepth: number;
  /** Output as JSON */
  readonly json: boolean;
  /** Enable debug logging */
  readonly verbose: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

/**
 * Config file structure (YAML)
 */
const ConfigFileSchema = z
  .object({
    hash: z.string().optional(),
    sparse: z.object({ depth: z.number().optional() }).strict().optional(),
    output: z.object({ json: z.boolean().optional() }).strict().optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG = {
  hash: 'sha256',
  sparseDepth: 32,
  json: false,
} as const satisfies Pick<CLIConfig, 'hash' | 'sparseDepth' | 'json'>;

/**
 * Standard config file names to search for
 */
const CONFIG_FILE_NAMES = ['.hashcommitrc', '.hashcommitrc.yaml', '.hashcommitrc.yml'];

// ============================================================================
// Configuration Loading
// ============================================================================

/**
 * Find config file in the start directory or its parents
 */
function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = resolve(dir, '..');
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

/**
 * Parse and shape-check a config file
 */
function parseConfigFile(filePath: string): ConfigFile {
  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${filePath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  // An empty file parses to null
  const result = ConfigFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    throw new ConfigError(`Invalid config file ${filePath}: ${path}: ${issue.message}`);
  }
  return result.data;
}

/**
 * Hash algorithm name, validated
 *
 * @throws ConfigError for an unknown algorithm
 */
export function resolveHashAlgorithm(value: string): HashAlgorithm {
  if (!isHashAlgorithm(value)) {
    throw new ConfigError(
      `Unknown hash algorithm: ${value}. Must be one of: ${HASH_ALGORITHMS.join(', ')}`
    );
  }
  return value;
}

/**
 * Sparse depth from a flag, env or file value, validated
 *
 * @throws ConfigError for a non-integer or a depth outside 1-64
 */
export function resolveDepth(value: string | number): number {
  const depth = typeof value === 'number' ? value : /^\d+$/.test(value) ? Number(value) : NaN;
  if (!Number.isInteger(depth) || depth < MIN_DEPTH || depth > MAX_DEPTH) {
    throw new ConfigError(
      `Invalid sparse depth: ${value}. Must be between ${MIN_DEPTH} and ${MAX_DEPTH}`
    );
  }
  return depth;
}

function parseBool(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Load configuration options
 */
export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** Directory the config file search starts from (default: cwd) */
  cwd?: string;
  /** Environment to read HASHCOMMIT_* variables from (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** CLI flag overrides */
  overrides?: {
    hash?: string;
    json?: boolean;
    verbose?: boolean;
  };
}

/**
 * Load and merge configuration from all sources
 *
 * @throws ConfigError if any source holds an invalid value
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<CLIConfig> {
  const env = options.env ?? process.env;
  let configPath: string | null = null;
  let fileConfig: ConfigFile = {};

  if (options.configPath) {
    configPath = resolve(options.cwd ?? process.cwd(), options.configPath);
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    configPath = findConfigFile(options.cwd ?? process.cwd());
    if (configPath) {
      fileConfig = parseConfigFile(configPath);
    }
  }

  const hash =
    options.overrides?.hash ?? env.HASHCOMMIT_HASH ?? fileConfig.hash ?? DEFAULT_CONFIG.hash;
  const depth =
    env.HASHCOMMIT_SPARSE_DEPTH ?? fileConfig.sparse?.depth ?? DEFAULT_CONFIG.sparseDepth;

  return {
    hash: resolveHashAlgorithm(hash),
    sparseDepth: resolveDepth(depth),
    json:
      options.overrides?.json ??
      parseBool(env.HASHCOMMIT_JSON) ??
      fileConfig.output?.json ??
      DEFAULT_CONFIG.json,
    verbose: options.overrides?.verbose ?? false,
    configPath,
  };
}
