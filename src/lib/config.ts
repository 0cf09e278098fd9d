/**
 * Configuration handling and validation
 *
 * Options come from the CLI or library callers; CURSOR_STORAGE_PATH fills in
 * the storage override when no data path is given explicitly.
 */

import { resolve } from 'node:path';
import type { Platform } from '../core/types.js';
import { InvalidConfigError } from './errors.js';
import { detectPlatform, expandPath } from './platform.js';
import { DEFAULT_OUTPUT_FILE } from '../core/writer.js';

/** Environment variable replacing the default storage locations */
export const STORAGE_PATH_ENV = 'CURSOR_STORAGE_PATH';

const VALID_PLATFORMS: Platform[] = ['windows', 'macos', 'linux'];

/**
 * User-facing configuration
 */
export interface PromptLogConfig {
  /** Log file destination (default: cursor-prompts.log in the working directory) */
  output?: string;
  /** Print per-step diagnostics */
  verbose?: boolean;
  /** Storage directory or database file to search instead of the defaults */
  dataPath?: string;
  /** Keep records with identical timestamp, content and command type */
  keepDuplicates?: boolean;
  /** Override platform detection */
  platform?: Platform;
}

/**
 * Merged configuration with all defaults applied
 */
export interface ResolvedConfig {
  outputPath: string;
  verbose: boolean;
  storagePath?: string;
  dedupe: boolean;
  platform: Platform;
}

/**
 * Validate configuration parameters
 * @throws {InvalidConfigError} If any parameter is invalid
 */
export function validateConfig(config?: PromptLogConfig): void {
  if (!config) return;

  if (config.output !== undefined) {
    if (typeof config.output !== 'string' || config.output.trim() === '') {
      throw new InvalidConfigError('output', config.output, 'must be a non-empty path');
    }
  }

  if (config.dataPath !== undefined) {
    if (typeof config.dataPath !== 'string' || config.dataPath.trim() === '') {
      throw new InvalidConfigError('dataPath', config.dataPath, 'must be a non-empty path');
    }
  }

  if (config.platform !== undefined && !VALID_PLATFORMS.includes(config.platform)) {
    throw new InvalidConfigError(
      'platform',
      config.platform,
      `must be one of: ${VALID_PLATFORMS.join(', ')}`
    );
  }
}

/**
 * Merge user configuration with environment and defaults
 *
 * Priority for the storage override: dataPath > CURSOR_STORAGE_PATH.
 */
export function resolveConfig(
  config?: PromptLogConfig,
  env: NodeJS.ProcessEnv = process.env
): ResolvedConfig {
  validateConfig(config);

  const envPath = env[STORAGE_PATH_ENV];
  const storagePath = config?.dataPath ?? (envPath ? envPath : undefined);

  return {
    outputPath: resolve(expandPath(config?.output ?? DEFAULT_OUTPUT_FILE)),
    verbose: config?.verbose ?? false,
    storagePath: storagePath ? expandPath(storagePath) : undefined,
    dedupe: !(config?.keepDuplicates ?? false),
    platform: config?.platform ?? detectPlatform(),
  };
}
