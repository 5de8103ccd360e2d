/**
 * TOML format adapter.
 *
 * TOML has no null, so absent values are written either as a sentinel
 * string or by leaving the key out. Dates are read back as ISO-8601 strings.
 * TOML arrays hold one type of value: integers and floats may mix, nothing
 * else may, and a null item written as the sentinel counts as a string.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import {
  describeValue,
  isMapping,
  setOwn,
  type DocumentMapping,
  type DocumentNode,
} from '../document/index.js';
import { ParseError, TypeCoercionError } from '../errors.js';
import { atomicWriteFileSync, readTextFileIfExists } from '../utils/safe-fs.js';
import type { ConfigFormat } from './types.js';

/**
 * How `null` document values are stored.
 *
 * - `{ sentinel }`: written as the sentinel string, read back as `null`
 * - `'omit'`: the key (or sequence item) is dropped
 */
export type NoneRepresentation = { readonly sentinel: string } | 'omit';

/**
 * Default none representation: the string `"null"`.
 */
export const DEFAULT_NONE: NoneRepresentation = { sentinel: 'null' };

/**
 * Options for {@link TomlFormat}.
 */
export interface TomlFormatOptions {
  /** @defaultValue `{ sentinel: 'null' }` */
  readonly none?: NoneRepresentation;
}

type TomlValue = string | number | boolean | TomlTable | TomlValue[];

interface TomlTable {
  [key: string]: TomlValue;
}

/**
 * Reads and writes TOML config files.
 */
export class TomlFormat implements ConfigFormat {
  public readonly name = 'toml';
  public readonly extension = '.toml';
  /** How null values are represented. */
  public readonly none: NoneRepresentation;
  public readonly omitsNull: boolean;

  constructor(options: TomlFormatOptions = {}) {
    this.none = options.none ?? DEFAULT_NONE;
    this.omitsNull = this.none === 'omit';
  }

  read(filePath: string): DocumentMapping | undefined {
    const content = readTextFileIfExists(filePath);
    if (content === undefined) {
      return undefined;
    }
    return this.parse(content, filePath);
  }

  write(filePath: string, document: DocumentMapping): void {
    atomicWriteFileSync(filePath, this.stringify(document));
  }

  /**
   * Parses TOML text into a document.
   *
   * @param content - TOML source.
   * @param filePath - Path reported in errors.
   * @returns The root mapping.
   * @throws ParseError if the content is not valid TOML.
   */
  parse(content: string, filePath = '<string>'): DocumentMapping {
    let parsed: TOML.JsonMap;
    try {
      parsed = TOML.parse(content);
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new ParseError(filePath, cause.message, cause);
    }

    const root = this.fromToml(parsed, filePath);
    if (!isMapping(root)) {
      throw new ParseError(filePath, `expected a table at the document root, got ${describeValue(root)}`);
    }
    return root;
  }

  /**
   * Renders a document as TOML text.
   *
   * @param document - The root mapping.
   * @returns TOML source.
   * @throws TypeCoercionError if a sequence mixes value types, or the
   *   document cannot otherwise be written as TOML.
   */
  stringify(document: DocumentMapping): string {
    const table: Record<string, unknown> = this.toTomlTable(document, '');
    try {
      return TOML.stringify(table as TOML.JsonMap);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new TypeCoercionError('', 'TOML document', 'mapping', `Cannot write TOML: ${message}`);
    }
  }

  private fromToml(value: unknown, filePath: string, path = ''): DocumentNode {
    if (typeof value === 'string') {
      return typeof this.none === 'object' && value === this.none.sentinel ? null : value;
    }
    if (typeof value === 'number' || typeof value === 'boolean') {
      return value;
    }
    if (typeof value === 'bigint') {
      if (value > BigInt(Number.MAX_SAFE_INTEGER) || value < BigInt(Number.MIN_SAFE_INTEGER)) {
        throw new ParseError(
          filePath,
          `integer ${value.toString()} at '${path}' is outside the safe integer range`
        );
      }
      return Number(value);
    }
    if (value instanceof Date) {
      return value.toISOString();
    }
    if (Array.isArray(value)) {
      return value.map((item: unknown, index) => this.fromToml(item, filePath, `${path}[${String(index)}]`));
    }
    if (typeof value === 'object' && value !== null) {
      const mapping: DocumentMapping = {};
      for (const [key, item] of Object.entries(value)) {
        setOwn(mapping, key, this.fromToml(item, filePath, path === '' ? key : `${path}.${key}`));
      }
      return mapping;
    }
    throw new ParseError(filePath, `unsupported TOML value of type ${describeValue(value)}`);
  }

  private toTomlTable(mapping: DocumentMapping, path: string): TomlTable {
    const table: TomlTable = {};
    for (const [key, node] of Object.entries(mapping)) {
      const value = this.toTomlValue(node, path === '' ? key : `${path}.${key}`);
      if (value !== undefined) {
        Object.defineProperty(table, key, {
          value,
          enumerable: true,
          writable: true,
          configurable: true,
        });
      }
    }
    return table;
  }

  /**
   * Converts a node, returning undefined where the none policy drops it.
   */
  private toTomlValue(node: DocumentNode, path: string): TomlValue | undefined {
    if (node === null) {
      return this.none === 'omit' ? undefined : this.none.sentinel;
    }
    if (Array.isArray(node)) {
      const items: TomlValue[] = [];
      node.forEach((item: DocumentNode, index) => {
        const value = this.toTomlValue(item, `${path}[${String(index)}]`);
        if (value !== undefined) {
          items.push(value);
        }
      });
      requireSingleKind(items, path);
      return items;
    }
    if (typeof node === 'object') {
      return this.toTomlTable(node, path);
    }
    return node;
  }
}

function tomlKind(value: TomlValue): string {
  if (Array.isArray(value)) {
    return 'sequence';
  }
  if (typeof value === 'object') {
    return 'mapping';
  }
  return typeof value;
}

function requireSingleKind(items: readonly TomlValue[], path: string): void {
  const kinds = [...new Set(items.map(tomlKind))];
  if (kinds.length > 1) {
    throw new TypeCoercionError(
      path,
      'sequence of one value type',
      `sequence of ${kinds.join(' and ')}`,
      `Cannot write '${path}' as TOML: the sequence mixes ${kinds.join(' and ')} values`
    );
  }
}
