/**
 * Choosing a format adapter for a file path.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import { JsonFormat } from './json.js';
import { TomlFormat } from './toml.js';
import type { ConfigFormat } from './types.js';

/**
 * Picks a format adapter from a file extension.
 *
 * `.json` selects JSON; everything else, including no extension, selects
 * TOML with default options.
 *
 * @param filePath - The config file path.
 * @returns A new adapter.
 */
export function formatForPath(filePath: string): ConfigFormat {
  const extension = path.extname(filePath).toLowerCase();
  if (extension === '.json') {
    return new JsonFormat();
  }
  return new TomlFormat();
}
