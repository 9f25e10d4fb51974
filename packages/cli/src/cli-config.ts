/**
 * Configuration Loader for eightfold
 * Loads and validates .eightfold.yaml engine configuration files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import * as yaml from 'yaml';
import { ConfigError, EOF_BEHAVIORS, type EofBehavior } from 'eightfold';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file looked up in the working directory */
export const CONFIG_FILE_NAME = '.eightfold.yaml';

const KNOWN_KEYS = ['step_limit', 'tape_limit', 'eof_behavior'] as const;

// ============================================================
// TYPES
// ============================================================

/** Engine settings read from a config file */
export interface EngineConfig {
  readonly stepLimit?: number | undefined;
  readonly tapeLimit?: number | undefined;
  readonly eofBehavior?: EofBehavior | undefined;
}

// ============================================================
// VALIDATION
// ============================================================

function isKnownKey(key: string): key is (typeof KNOWN_KEYS)[number] {
  return KNOWN_KEYS.some((known) => known === key);
}

function isEofBehavior(value: unknown): value is EofBehavior {
  return EOF_BEHAVIORS.some((behavior) => behavior === value);
}

function readLimit(
  path: string,
  key: string,
  value: unknown
): number | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isSafeInteger(value) || value < 1) {
    throw new ConfigError('EF-C002', {
      path,
      reason: `${key} must be a positive integer`,
    });
  }
  return value;
}

/**
 * Parse and validate config file text.
 * An empty file (or one holding only comments) yields an empty config.
 *
 * @throws ConfigError (EF-C002) for malformed YAML, unknown keys or bad values
 */
export function parseConfig(text: string, path: string): EngineConfig {
  let data: unknown;
  try {
    data = yaml.parse(text);
  } catch (err) {
    throw new ConfigError('EF-C002', {
      path,
      reason: err instanceof Error ? err.message : String(err),
    });
  }

  if (data === null || data === undefined) {
    return {};
  }
  if (typeof data !== 'object' || Array.isArray(data)) {
    throw new ConfigError('EF-C002', {
      path,
      reason: 'expected a mapping of settings',
    });
  }

  const fields: [string, unknown][] = Object.entries(data);
  const settings = new Map<string, unknown>();
  for (const [key, value] of fields) {
    if (!isKnownKey(key)) {
      throw new ConfigError('EF-C002', {
        path,
        reason: `unknown key ${key} (expected ${KNOWN_KEYS.join(', ')})`,
      });
    }
    settings.set(key, value);
  }

  const eofBehavior = settings.get('eof_behavior');
  if (
    eofBehavior !== undefined &&
    eofBehavior !== null &&
    !isEofBehavior(eofBehavior)
  ) {
    throw new ConfigError('EF-C002', {
      path,
      reason: `eof_behavior must be one of ${EOF_BEHAVIORS.join(', ')}`,
    });
  }

  return {
    stepLimit: readLimit(path, 'step_limit', settings.get('step_limit')),
    tapeLimit: readLimit(path, 'tape_limit', settings.get('tape_limit')),
    eofBehavior: eofBehavior ?? undefined,
  };
}

// ============================================================
// LOADING
// ============================================================

/**
 * Load engine configuration.
 *
 * Without an explicit path, reads .eightfold.yaml from `cwd` when present and
 * returns an empty config otherwise. An explicit path must exist.
 *
 * @throws ConfigError (EF-C002) when an explicit file is missing or invalid
 */
export function loadConfig(
  configPath: string | undefined,
  cwd: string
): EngineConfig {
  if (configPath === undefined) {
    const defaultPath = join(cwd, CONFIG_FILE_NAME);
    if (!existsSync(defaultPath)) {
      return {};
    }
    return parseConfig(readFileSync(defaultPath, 'utf-8'), defaultPath);
  }

  const fullPath = resolve(cwd, configPath);
  if (!existsSync(fullPath)) {
    throw new ConfigError('EF-C002', {
      path: fullPath,
      reason: 'file not found',
    });
  }
  return parseConfig(readFileSync(fullPath, 'utf-8'), fullPath);
}
