/**
 * Environment variable validation and type-safe access
 *
 * USAGE:
 * - import { env } from '@/lib/env'
 * - Validates all vars at module load time
 * - Throws descriptive errors for invalid vars
 */

import path from 'path';

type NodeEnv = 'development' | 'production' | 'test';

interface Env {
  // Root for data/raw (imports) and data/processed (published tables)
  THREADTALLY_DATA_DIR: string;

  NODE_ENV: NodeEnv;
}

function isNodeEnv(value: string): value is NodeEnv {
  return value === 'development' || value === 'production' || value === 'test';
}

/**
 * Validate and parse environment variables
 */
export function validateEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const errors: string[] = [];

  const nodeEnv = source.NODE_ENV;
  if (nodeEnv && !isNodeEnv(nodeEnv)) {
    errors.push(`Invalid NODE_ENV: ${nodeEnv}. Must be development, production, or test.`);
  }

  const dataDir = source.THREADTALLY_DATA_DIR;
  if (dataDir !== undefined && dataDir.trim() === '') {
    errors.push('THREADTALLY_DATA_DIR must not be empty when set');
  }

  // Throw all errors at once
  if (errors.length > 0) {
    throw new Error(
      `Environment validation failed:\n${errors.map(e => `  - ${e}`).join('\n')}\n\n` +
      'Please check your .env.local file.'
    );
  }

  return {
    THREADTALLY_DATA_DIR: path.resolve(dataDir || 'data'),
    NODE_ENV: nodeEnv && isNodeEnv(nodeEnv) ? nodeEnv : 'development'
  };
}

/**
 * Validated environment variables
 * Throws on module load if validation fails
 */
export const env = validateEnv();

export const rawDir = path.join(env.THREADTALLY_DATA_DIR, 'raw');

export const processedDir = path.join(env.THREADTALLY_DATA_DIR, 'processed');
