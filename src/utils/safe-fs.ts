/**
 * Synchronous file system helpers with path validation.
 *
 * Every path is resolved to an absolute path and validated before use.
 * Writes go through a temporary file in the target directory followed by a
 * rename, so a crash mid-write never leaves a truncated file behind.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { randomUUID } from 'node:crypto';

/**
 * Error thrown when path validation fails.
 */
export class PathValidationError extends Error {
  /** The invalid path that caused the error. */
  public readonly invalidPath: string;

  /**
   * Creates a new PathValidationError.
   *
   * @param message - Human-readable error message.
   * @param invalidPath - The path that failed validation.
   */
  constructor(message: string, invalidPath: string) {
    super(message);
    this.name = 'PathValidationError';
    this.invalidPath = invalidPath;
  }
}

/**
 * Validates and resolves a file system path.
 *
 * @param filePath - The path to validate.
 * @returns The resolved absolute path.
 * @throws {PathValidationError} If the path is empty or contains null bytes.
 */
export function validatePath(filePath: string): string {
  if (filePath.length === 0) {
    throw new PathValidationError('Path cannot be empty', filePath);
  }

  if (filePath.includes('\0')) {
    throw new PathValidationError('Path cannot contain null bytes', filePath);
  }

  const resolved = path.resolve(filePath);

  if (!path.isAbsolute(resolved)) {
    throw new PathValidationError('Path must resolve to an absolute path', filePath);
  }

  return resolved;
}

/**
 * Checks whether an error is a Node.js "no such file or directory" error.
 *
 * @param error - The caught error.
 * @returns True if the error code is ENOENT.
 */
export function isNotFoundError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Checks if a file or directory exists after validating the path.
 *
 * @param filePath - The path to check.
 * @returns True if the path exists.
 * @throws {PathValidationError} If the path is invalid.
 */
export function pathExists(filePath: string): boolean {
  const validatedPath = validatePath(filePath);
  return fs.existsSync(validatedPath);
}

/**
 * Reads a UTF-8 text file, treating a missing file as absence.
 *
 * @param filePath - The path to read.
 * @returns The file contents, or undefined if the file does not exist.
 * @throws {PathValidationError} If the path is invalid.
 * @throws {Error} For any read failure other than a missing file.
 */
export function readTextFileIfExists(filePath: string): string | undefined {
  const validatedPath = validatePath(filePath);
  try {
    return fs.readFileSync(validatedPath, 'utf-8');
  } catch (error) {
    if (isNotFoundError(error)) {
      return undefined;
    }
    throw error;
  }
}

/**
 * Writes a UTF-8 text file atomically.
 *
 * Parent directories are created as needed. The content is written to a
 * temporary sibling file which is then renamed over the target.
 *
 * @param filePath - The path to write.
 * @param content - The text to write.
 * @throws {PathValidationError} If the path is invalid.
 * @throws {Error} If the directory cannot be created or the file cannot be written.
 */
export function atomicWriteFileSync(filePath: string, content: string): void {
  const validatedPath = validatePath(filePath);
  const dir = path.dirname(validatedPath);
  const tempPath = path.join(dir, `.${path.basename(validatedPath)}-${randomUUID()}.tmp`);

  fs.mkdirSync(dir, { recursive: true });

  try {
    fs.writeFileSync(tempPath, content, 'utf-8');
    fs.renameSync(tempPath, validatedPath);
  } catch (error) {
    fs.rmSync(tempPath, { force: true });
    throw error;
  }
}
