/**
 * Format adapter contract.
 *
 * @packageDocumentation
 */

import type { DocumentMapping } from '../document/index.js';

/**
 * Reads and writes documents in one file encoding.
 */
export interface ConfigFormat {
  /** Short format name, used in log entries. */
  readonly name: string;
  /** Conventional file extension, including the dot. */
  readonly extension: string;
  /**
   * Whether `null` values are left out of written files. Readers treat an
   * absent key as `null` when this is set.
   */
  readonly omitsNull: boolean;

  /**
   * Reads a document.
   *
   * @param filePath - The file to read.
   * @returns The root mapping, or undefined if the file does not exist.
   * @throws ParseError if the file exists but cannot be parsed into a mapping.
   */
  read(filePath: string): DocumentMapping | undefined;

  /**
   * Writes a document, creating parent directories as needed. The write is
   * atomic: a previously valid file is never left half-written.
   *
   * @param filePath - The file to write.
   * @param document - The root mapping.
   */
  write(filePath: string, document: DocumentMapping): void;
}
