/**
 * Type-directed coercion between document values and primitive field types.
 *
 * @packageDocumentation
 */

import {
  describeValue,
  isDocumentNode,
  isMapping,
  isSequence,
  nodeKind,
  type DocumentNode,
} from '../document/index.js';
import { TypeCoercionError } from '../errors.js';
import type { PrimitiveType } from '../metadata/index.js';
import { FALSY_WORDS, parseBooleanWord, TRUTHY_WORDS } from '../utils/env.js';

function coerceToNumber(raw: DocumentNode, path: string, expected: PrimitiveType): number {
  if (typeof raw === 'number') {
    return raw;
  }
  if (typeof raw === 'string') {
    const trimmed = raw.trim();
    const num = trimmed === '' ? Number.NaN : Number(trimmed);
    if (!Number.isNaN(num)) {
      return num;
    }
    throw new TypeCoercionError(
      path,
      expected,
      'string',
      `Cannot coerce '${path}' value '${raw}' to ${expected}`
    );
  }
  throw new TypeCoercionError(path, expected, nodeKind(raw));
}

function coerceToBoolean(raw: DocumentNode, path: string): boolean {
  if (typeof raw === 'boolean') {
    return raw;
  }
  if (typeof raw === 'string') {
    const parsed = parseBooleanWord(raw);
    if (parsed !== undefined) {
      return parsed;
    }
    throw new TypeCoercionError(
      path,
      'boolean',
      'string',
      `Cannot coerce '${path}' value '${raw}' to boolean. Expected one of: ${[...TRUTHY_WORDS, ...FALSY_WORDS].join(', ')}`
    );
  }
  if (raw === 1 || raw === 0) {
    return raw === 1;
  }
  throw new TypeCoercionError(path, 'boolean', nodeKind(raw));
}

/**
 * Coerces a non-null document value to a primitive field type.
 *
 * @param raw - The document value. Callers handle `null` themselves.
 * @param type - The target type.
 * @param path - Dotted path for error messages.
 * @returns The coerced value.
 * @throws TypeCoercionError if the value cannot be converted.
 */
export function coercePrimitive(raw: DocumentNode, type: PrimitiveType, path: string): DocumentNode {
  switch (type) {
    case 'string':
      if (typeof raw === 'string') {
        return raw;
      }
      if (typeof raw === 'number' || typeof raw === 'boolean') {
        return String(raw);
      }
      throw new TypeCoercionError(path, 'string', nodeKind(raw));
    case 'number':
      return coerceToNumber(raw, path, 'number');
    case 'integer': {
      const num = coerceToNumber(raw, path, 'integer');
      if (!Number.isInteger(num)) {
        throw new TypeCoercionError(
          path,
          'integer',
          'number',
          `Cannot coerce '${path}' value ${String(num)} to integer`
        );
      }
      return num;
    }
    case 'boolean':
      return coerceToBoolean(raw, path);
    case 'sequence':
      if (isSequence(raw)) {
        return raw;
      }
      throw new TypeCoercionError(path, 'sequence', nodeKind(raw));
    case 'mapping':
      if (isMapping(raw)) {
        return raw;
      }
      throw new TypeCoercionError(path, 'mapping', nodeKind(raw));
    case 'node':
      return raw;
  }
}

/**
 * Converts an in-memory field value to a document value of the field's type.
 *
 * `undefined` and `null` become `null`. `NaN` and the infinities are
 * rejected.
 *
 * @param value - The field value.
 * @param type - The declared primitive type.
 * @param path - Dotted path for error messages.
 * @returns The document value.
 * @throws TypeCoercionError if the value is not representable or has the wrong type.
 */
export function primitiveToNode(value: unknown, type: PrimitiveType, path: string): DocumentNode {
  if (value === undefined || value === null) {
    return null;
  }
  if (!isDocumentNode(value)) {
    throw new TypeCoercionError(path, type, describeValue(value));
  }
  if (typeof value === 'number' && !Number.isFinite(value)) {
    throw new TypeCoercionError(
      path,
      type,
      'number',
      `Cannot write '${path}' value ${String(value)}: only finite numbers can be stored`
    );
  }
  return coercePrimitive(value, type, path);
}
