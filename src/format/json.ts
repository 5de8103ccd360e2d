/**
 * JSON format adapter.
 *
 * @packageDocumentation
 */

import { describeValue, isMapping, type DocumentMapping } from '../document/index.js';
import { ParseError } from '../errors.js';
import { atomicWriteFileSync, readTextFileIfExists } from '../utils/safe-fs.js';
import type { ConfigFormat } from './types.js';

/**
 * Options for {@link JsonFormat}.
 */
export interface JsonFormatOptions {
  /** Indentation for pretty-printing. @defaultValue 2 */
  readonly indent?: number;
}

/**
 * Reads and writes JSON config files.
 */
export class JsonFormat implements ConfigFormat {
  public readonly name = 'json';
  public readonly extension = '.json';
  public readonly omitsNull = false;
  private readonly indent: number;

  constructor(options: JsonFormatOptions = {}) {
    this.indent = options.indent ?? 2;
  }

  read(filePath: string): DocumentMapping | undefined {
    const content = readTextFileIfExists(filePath);
    if (content === undefined) {
      return undefined;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new ParseError(filePath, cause.message, cause);
    }

    if (!isMapping(parsed)) {
      throw new ParseError(
        filePath,
        `expected a mapping at the document root, got ${describeValue(parsed)}`
      );
    }
    return parsed;
  }

  write(filePath: string, document: DocumentMapping): void {
    atomicWriteFileSync(filePath, JSON.stringify(document, null, this.indent) + '\n');
  }
}
