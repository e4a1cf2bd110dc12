/**
 * .mdadf.json Config Loader
 *
 * Conversion defaults for the CLI. Flags given on the command line win over
 * the file; a file that fails validation is reported and ignored.
 */

import * as fs from 'node:fs';
import { MdAdfConfigSchema, SchemaValidationError, parseWithSchema } from '@mdadf/core';
import type { MdAdfConfig } from '@mdadf/core';

export const DEFAULT_CONFIG_PATH = '.mdadf.json';

const DEFAULT_CONFIG: MdAdfConfig = MdAdfConfigSchema.parse({});

/**
 * Load config from `configPath`.
 * Falls back to defaults if not found or invalid.
 */
export function loadConfig(configPath: string): MdAdfConfig {
  if (!fs.existsSync(configPath)) {
    return { ...DEFAULT_CONFIG };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch {
    console.warn(`mdadf: warning: failed to parse ${configPath}, using defaults`);
    return { ...DEFAULT_CONFIG };
  }

  try {
    return parseWithSchema(MdAdfConfigSchema, raw, `config in ${configPath}`);
  } catch (err: unknown) {
    if (!(err instanceof SchemaValidationError)) throw err;
    for (const issue of err.issues) {
      console.warn(`mdadf: warning: ${configPath}: ${issue}`);
    }
    console.warn(`mdadf: warning: invalid config in ${configPath}, using defaults`);
    return { ...DEFAULT_CONFIG };
  }
}

export { DEFAULT_CONFIG };
