/**
 * Conversion between record instances and document mappings.
 *
 * Both directions walk the record's fields in declared order and follow the
 * conversion chosen for each field when its metadata was attached.
 *
 * @packageDocumentation
 */

import {
  describeValue,
  getOwn,
  isDocumentNode,
  isMapping,
  nodeKind,
  setOwn,
  type DocumentMapping,
  type DocumentNode,
} from '../document/index.js';
import { MissingKeyError, RegistryUnavailableError, TypeCoercionError } from '../errors.js';
import {
  requireRecordMetadata,
  type ConfigResolver,
  type FieldConversion,
  type FieldDeserializer,
  type PrimitiveConversion,
  type RecordClass,
  type RecordConversion,
  type RecordMetadata,
} from '../metadata/index.js';
import { coercePrimitive, primitiveToNode } from './coerce.js';

/**
 * What happens when a document lacks the key of a declared field.
 *
 * - `error`: fail with MissingKeyError
 * - `default`: keep the value of the default-constructed instance
 */
export type MissingKeyPolicy = 'error' | 'default';

/**
 * Options for {@link toDocument}.
 */
export interface ToDocumentOptions {
  /** Metadata to use instead of the metadata attached to the instance's class. */
  readonly metadata?: RecordMetadata;
  /** Dotted prefix for error paths. */
  readonly path?: string;
}

/**
 * Options for {@link fromDocument}.
 */
export interface FromDocumentOptions {
  /** Handed to registry-aware deserializers. */
  readonly resolver?: ConfigResolver;
  /** @defaultValue 'error' */
  readonly missingKeys?: MissingKeyPolicy;
  /**
   * Read an absent key as `null`, for documents whose format leaves nulls
   * out. The `default` missing-key policy takes precedence.
   * @defaultValue false
   */
  readonly absentAsNull?: boolean;
  /** Metadata to use instead of the metadata attached to the target class. */
  readonly metadata?: RecordMetadata;
  /** Dotted prefix for error paths. */
  readonly path?: string;
}

interface ReadContext {
  readonly resolver: ConfigResolver | undefined;
  readonly missingKeys: MissingKeyPolicy;
  readonly absentAsNull: boolean;
}

/**
 * Joins a dotted path prefix and a key.
 *
 * @param prefix - The prefix, possibly empty.
 * @param key - The key to append.
 * @returns The joined path.
 */
export function joinPath(prefix: string, key: string): string {
  return prefix === '' ? key : `${prefix}.${key}`;
}

/**
 * Converts a record instance to a document mapping.
 *
 * Fields are emitted in declared order under their external keys. Values
 * equal to the defaults are emitted like any other value.
 *
 * @param instance - An instance of a config class.
 * @param options - Metadata override and error path prefix.
 * @returns A new mapping.
 * @throws InvalidConfigClassError if the instance's class is not a config class.
 * @throws TypeCoercionError if a field value cannot be represented.
 */
export function toDocument(instance: object, options: ToDocumentOptions = {}): DocumentMapping {
  const metadata = options.metadata ?? requireRecordMetadata(instance.constructor);
  return serializeRecord(instance, metadata, options.path ?? '');
}

/**
 * Builds a record instance from a document mapping.
 *
 * The instance is default-constructed and then every declared field is
 * assigned from the mapping. Keys the record does not declare are ignored.
 *
 * @param mapping - The record's mapping.
 * @param type - The record class to build.
 * @param options - Resolver, missing-key policy, metadata override and error path prefix.
 * @returns The new instance.
 * @throws MissingKeyError if a field's key is absent, the policy is `error` and absent keys are not read as null.
 * @throws TypeCoercionError if a value cannot be converted to its field type.
 * @throws RegistryUnavailableError if a registry-aware deserializer runs without a resolver.
 */
export function fromDocument<T extends object>(
  mapping: DocumentMapping,
  type: RecordClass<T>,
  options: FromDocumentOptions = {}
): T {
  const metadata = options.metadata ?? requireRecordMetadata(type);
  const context: ReadContext = {
    resolver: options.resolver,
    missingKeys: options.missingKeys ?? 'error',
    absentAsNull: options.absentAsNull ?? false,
  };
  return deserializeRecord(mapping, type, metadata, context, options.path ?? '');
}

/**
 * Returns the record class a field embeds as a nested mapping, if any.
 *
 * @param conversion - The field's conversion.
 * @returns The nested class, or undefined if the field is not written as a nested record.
 */
export function embeddedRecordType(conversion: FieldConversion): RecordClass | undefined {
  if (conversion.kind === 'record') {
    return conversion.type;
  }
  if (
    conversion.kind === 'custom' &&
    conversion.serializer === undefined &&
    conversion.fallback?.kind === 'record'
  ) {
    return conversion.fallback.type;
  }
  return undefined;
}

function serializeRecord(instance: object, metadata: RecordMetadata, path: string): DocumentMapping {
  const mapping: DocumentMapping = {};
  for (const field of metadata.fields) {
    const value: unknown = Reflect.get(instance, field.name);
    setOwn(mapping, field.key, serializeField(value, field.conversion, joinPath(path, field.key)));
  }
  return mapping;
}

function serializeField(value: unknown, conversion: FieldConversion, path: string): DocumentNode {
  switch (conversion.kind) {
    case 'primitive':
      return primitiveToNode(value, conversion.type, path);
    case 'record':
      return serializeNested(value, conversion, path);
    case 'custom': {
      if (conversion.serializer !== undefined) {
        const node: unknown = conversion.serializer(value);
        if (!isDocumentNode(node)) {
          throw new TypeCoercionError(
            path,
            'document value',
            describeValue(node),
            `Serializer for '${path}' returned ${describeValue(node)}, which is not a document value`
          );
        }
        return node;
      }
      return serializeField(value, requireFallback(conversion.fallback, path), path);
    }
  }
}

function serializeNested(value: unknown, conversion: RecordConversion, path: string): DocumentNode {
  if (value === undefined || value === null) {
    return null;
  }
  const metadata = requireRecordMetadata(conversion.type);
  if (typeof value !== 'object') {
    throw new TypeCoercionError(path, metadata.typeName, describeValue(value));
  }
  return serializeRecord(value, metadata, path);
}

function deserializeRecord<T extends object>(
  mapping: DocumentMapping,
  type: RecordClass<T>,
  metadata: RecordMetadata,
  context: ReadContext,
  path: string
): T {
  const instance = new type();
  for (const field of metadata.fields) {
    const fieldPath = joinPath(path, field.key);
    let raw = getOwn(mapping, field.key);
    if (raw === undefined) {
      if (context.missingKeys === 'default') {
        continue;
      }
      if (!context.absentAsNull) {
        throw new MissingKeyError(fieldPath, metadata.typeName);
      }
      raw = null;
    }
    Reflect.set(instance, field.name, deserializeField(raw, field.conversion, context, fieldPath));
  }
  return instance;
}

function deserializeField(
  raw: DocumentNode,
  conversion: FieldConversion,
  context: ReadContext,
  path: string
): unknown {
  switch (conversion.kind) {
    case 'primitive':
      return raw === null ? null : coercePrimitive(raw, conversion.type, path);
    case 'record': {
      if (raw === null) {
        return null;
      }
      if (!isMapping(raw)) {
        throw new TypeCoercionError(path, 'mapping', nodeKind(raw));
      }
      const metadata = requireRecordMetadata(conversion.type);
      return deserializeRecord(raw, conversion.type, metadata, context, path);
    }
    case 'custom':
      if (conversion.deserializer !== undefined) {
        return applyDeserializer(conversion.deserializer, raw, context, path);
      }
      return deserializeField(raw, requireFallback(conversion.fallback, path), context, path);
  }
}

function applyDeserializer(
  deserializer: FieldDeserializer,
  raw: DocumentNode,
  context: ReadContext,
  path: string
): unknown {
  if (typeof deserializer === 'function') {
    return deserializer(raw);
  }
  if (context.resolver === undefined) {
    throw new RegistryUnavailableError(path);
  }
  return deserializer.deserialize(raw, context.resolver);
}

function requireFallback(
  fallback: PrimitiveConversion | RecordConversion | undefined,
  path: string
): PrimitiveConversion | RecordConversion {
  // configclass() rejects a single converter without a fallback type
  if (fallback === undefined) {
    throw new TypeCoercionError(path, 'declared type', 'none');
  }
  return fallback;
}
