/**
 * Writing a config file from record instances.
 *
 * @packageDocumentation
 */

import type { DocumentMapping } from '../document/index.js';
import { WriteConflictError } from '../errors.js';
import { formatForPath, type ConfigFormat } from '../format/index.js';
import { requireRecordMetadata } from '../metadata/index.js';
import { createLogger } from '../utils/env.js';
import type { Logger } from '../utils/logger.js';
import { pathExists, validatePath } from '../utils/safe-fs.js';
import { composeDocument } from './layout.js';

/**
 * Options for {@link generateConfig}.
 */
export interface GenerateConfigOptions {
  /** Format adapter. Defaults to one chosen from the file extension. */
  readonly format?: ConfigFormat;
  /**
   * Replace the file if it already exists.
   * @defaultValue false
   */
  readonly overrideExisting?: boolean;
  readonly logger?: Logger;
}

/**
 * Serializes record instances and writes them to one file.
 *
 * The top-level instance, if any, fills the document root; every other
 * instance is written under its section name, in the order given.
 *
 * @param configPath - Destination path.
 * @param instances - Instances of config classes.
 * @param options - Format, overwrite and logging options.
 * @returns The document that was written.
 * @throws WriteConflictError if the file exists and `overrideExisting` is false.
 * @throws InvalidConfigClassError if an instance's class is not a config class.
 * @throws TopLevelConflictError if more than one instance is top-level.
 * @throws SectionConflictError if two instances claim the same section.
 */
export function generateConfig(
  configPath: string,
  instances: readonly object[],
  options: GenerateConfigOptions = {}
): DocumentMapping {
  const target = validatePath(configPath);
  const format = options.format ?? formatForPath(configPath);
  const logger = options.logger ?? createLogger('generateConfig');

  if (options.overrideExisting !== true && pathExists(target)) {
    throw new WriteConflictError(target);
  }

  const document = composeDocument(
    instances.map((instance) => ({
      metadata: requireRecordMetadata(instance.constructor),
      instance,
    }))
  );
  format.write(target, document);

  logger.info('config_generated', {
    path: target,
    format: format.name,
    records: instances.length,
  });
  return document;
}
