// src/config/environment.ts

/**
 * @file Loads `.env` files into the process environment and hands out immutable snapshots of it.
 */

import dotenv from 'dotenv';
import { ConfigError } from '../core/errors';
import type { EnvironmentSource } from './endpoint-resolver';

export interface LoadEnvironmentOptions {
  /** Path of the dotenv file. Defaults to `.env` in the working directory. */
  path?: string;
  /**
   * Whether values from the file replace variables already set in the process.
   * @default true
   */
  override?: boolean;
}

/**
 * Loads the dotenv file (if there is one) into `process.env` and returns a frozen snapshot
 * of the resulting environment. A missing file is fine: the variables may come from the shell.
 *
 * @throws {ConfigError} If the file exists but cannot be read.
 */
export function loadEnvironment(options: LoadEnvironmentOptions = {}): EnvironmentSource {
  const result = dotenv.config({ path: options.path, override: options.override ?? true });

  if (result.error && !isMissingFileError(result.error)) {
    throw new ConfigError(`Failed to load environment file: ${result.error.message}`, [], {
      path: options.path ?? '.env',
    });
  }
  if (result.parsed) {
    console.debug(`[Environment] Loaded ${Object.keys(result.parsed).length} variable(s) from ${options.path ?? '.env'}.`);
  }

  return Object.freeze({ ...process.env });
}

function isMissingFileError(error: Error): boolean {
  return 'code' in error && error.code === 'ENOENT';
}
