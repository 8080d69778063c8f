/**
 * Configuration Loader for lsconf
 * Loads and validates .lsconf.json configuration files.
 */

import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';

// ============================================================
// TYPES
// ============================================================

export type TreeFormat = 'json' | 'yaml';

export interface CliConfig {
  /** Spaces per nesting level when rendering */
  readonly indentWidth: number;
  /** Default output format of `lsconf tree` */
  readonly treeFormat: TreeFormat;
}

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file name */
export const CONFIG_FILE_NAME = '.lsconf.json';

const KNOWN_KEYS = new Set(['indentWidth', 'treeFormat']);

// ============================================================
// DEFAULT CONFIGURATION
// ============================================================

export function createDefaultConfig(): CliConfig {
  return { indentWidth: 2, treeFormat: 'json' };
}

// ============================================================
// VALIDATION
// ============================================================

export function isTreeFormat(value: unknown): value is TreeFormat {
  return value === 'json' || value === 'yaml';
}

function isIndentWidth(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

/**
 * Validate configuration structure and values.
 * Throws Error if configuration is invalid.
 */
function validateConfig(data: unknown): Partial<CliConfig> {
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw new Error('Invalid configuration: must be an object');
  }

  const config: { indentWidth?: number; treeFormat?: TreeFormat } = {};
  for (const [key, value] of Object.entries(data)) {
    if (!KNOWN_KEYS.has(key)) {
      throw new Error(`Invalid configuration: unknown key ${key}`);
    }
    if (key === 'indentWidth') {
      if (!isIndentWidth(value)) {
        throw new Error(
          `Invalid configuration: indentWidth must be a positive integer, got ${JSON.stringify(value)}`
        );
      }
      config.indentWidth = value;
    }
    if (key === 'treeFormat') {
      if (!isTreeFormat(value)) {
        throw new Error(
          `Invalid configuration: treeFormat has invalid value ${JSON.stringify(value)} (must be 'json' or 'yaml')`
        );
      }
      config.treeFormat = value;
    }
  }
  return config;
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Load configuration from .lsconf.json in the specified directory.
 *
 * @param cwd - Directory to search for configuration file
 * @returns Configuration merged over defaults, or null if file not found
 * @throws Error with "Invalid configuration: {reason}" for unreadable,
 *   malformed or invalid files
 */
export function loadConfig(cwd: string): CliConfig | null {
  const configPath = join(cwd, CONFIG_FILE_NAME);

  if (!existsSync(configPath)) {
    return null;
  }

  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new Error(
      `Invalid configuration: failed to read file (${err instanceof Error ? err.message : String(err)})`
    );
  }

  let parsedData: unknown;
  try {
    parsedData = JSON.parse(fileContent);
  } catch (err) {
    throw new Error(
      `Invalid configuration: invalid JSON (${err instanceof Error ? err.message : String(err)})`
    );
  }

  return { ...createDefaultConfig(), ...validateConfig(parsedData) };
}
