/**
 * Placement of records in the root mapping.
 *
 * The top-level record's fields occupy the root directly; every other record
 * occupies the key named by its section name.
 *
 * @packageDocumentation
 */

import { getOwn, setOwn, type DocumentMapping } from '../document/index.js';
import { SectionConflictError, TopLevelConflictError } from '../errors.js';
import { embeddedRecordType, toDocument } from '../marshal/index.js';
import type { RecordMetadata } from '../metadata/index.js';

/**
 * Checks that a set of records can share one document.
 *
 * At most one record may be top-level. Section names must be unique and must
 * not collide with a top-level key, unless that key holds the very record
 * as a nested field.
 *
 * @param records - The records to place.
 * @throws TopLevelConflictError if more than one record is top-level.
 * @throws SectionConflictError if two records claim the same root key.
 */
export function validateLayout(records: readonly RecordMetadata[]): void {
  const topLevel = records.filter((metadata) => metadata.topLevel);
  if (topLevel.length > 1) {
    throw new TopLevelConflictError(topLevel.map((metadata) => metadata.typeName));
  }
  const root = topLevel[0];

  const owners = new Map<string, RecordMetadata>();
  for (const metadata of records) {
    if (metadata.topLevel) {
      continue;
    }
    const previous = owners.get(metadata.sectionName);
    if (previous !== undefined) {
      throw new SectionConflictError(metadata.sectionName, [previous.typeName, metadata.typeName]);
    }
    owners.set(metadata.sectionName, metadata);

    const rootField = root?.fields.find((field) => field.key === metadata.sectionName);
    if (
      root !== undefined &&
      rootField !== undefined &&
      embeddedRecordType(rootField.conversion) !== metadata.ctor
    ) {
      throw new SectionConflictError(metadata.sectionName, [root.typeName, metadata.typeName]);
    }
  }
}

/**
 * One record and the instance to write for it.
 */
export interface PlacedRecord {
  readonly metadata: RecordMetadata;
  readonly instance: object;
}

/**
 * Composes a root mapping from record instances.
 *
 * The top-level record's fields come first, followed by one section per
 * other record in the order given.
 *
 * @param records - The records and their instances.
 * @returns The root mapping.
 * @throws TopLevelConflictError if more than one record is top-level.
 * @throws SectionConflictError if two records claim the same root key.
 */
export function composeDocument(records: readonly PlacedRecord[]): DocumentMapping {
  validateLayout(records.map((record) => record.metadata));

  const document: DocumentMapping = {};
  const topLevel = records.find((record) => record.metadata.topLevel);
  if (topLevel !== undefined) {
    const fields = toDocument(topLevel.instance, { metadata: topLevel.metadata });
    for (const [key, node] of Object.entries(fields)) {
      setOwn(document, key, node);
    }
  }

  for (const record of records) {
    if (record.metadata.topLevel) {
      continue;
    }
    const { sectionName } = record.metadata;
    if (getOwn(document, sectionName) !== undefined) {
      // The top-level record already holds this section as a nested field.
      continue;
    }
    setOwn(
      document,
      sectionName,
      toDocument(record.instance, { metadata: record.metadata, path: sectionName })
    );
  }

  return document;
}
