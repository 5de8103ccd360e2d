/**
 * Declaring record types.
 *
 * `configclass` inspects a default-constructed instance once, decides how
 * every field is converted, and attaches the resulting metadata to the class.
 *
 * @packageDocumentation
 */

import { isMapping, type DocumentNode } from '../document/index.js';
import { InvalidConfigClassError } from '../errors.js';
import {
  attachMetadata,
  getRecordMetadata,
  RecordMetadata,
  type ConfigClass,
} from './record-metadata.js';
import {
  PRIMITIVE_TYPES,
  type ConfigClassOptions,
  type ConfigClassOverrides,
  type ConfigResolver,
  type FieldConversion,
  type FieldOptionMap,
  type FieldSpec,
  type FieldType,
  type PrimitiveConversion,
  type RawConfigClassOptions,
  type RecordClass,
  type RecordConversion,
  type RegistryAwareDeserializer,
} from './types.js';

/**
 * Attaches config metadata to a record class.
 *
 * Field types are inferred from the default-constructed instance: strings,
 * numbers, booleans, arrays, plain objects, and instances of other config
 * classes. Fields whose default is `null` or `undefined` need an entry in
 * `fieldTypes` unless both converters are given.
 *
 * @param ctor - The record class. Its constructor must take no arguments.
 * @param options - Section name, top-level flag and per-field overrides.
 * @returns The same class, now carrying metadata.
 * @throws InvalidConfigClassError if the declaration is inconsistent.
 *
 * @example
 * ```typescript
 * class DatabaseConfig {
 *   host = 'localhost';
 *   port = 5432;
 * }
 * configclass(DatabaseConfig, {
 *   name: 'database',
 *   fieldNameMappings: { port: 'port_number' },
 * });
 * ```
 */
export function configclass<T extends object>(
  ctor: RecordClass<T>,
  options: ConfigClassOptions<T> = {}
): ConfigClass<T> {
  const raw: RawConfigClassOptions = options;
  return attachMetadata(ctor, buildRecordMetadata(ctor, raw));
}

/**
 * Wraps a deserializer that needs the owning parser.
 *
 * @param deserialize - Receives the raw value and the parser.
 * @returns A registry-aware deserializer.
 *
 * @example
 * ```typescript
 * const backend = withRegistry((raw, parser) =>
 *   raw === 'sqlite' ? parser.get(SqliteConfig) : parser.get(PostgresConfig)
 * );
 * ```
 */
export function withRegistry<V>(
  deserialize: (raw: DocumentNode, resolver: ConfigResolver) => V
): RegistryAwareDeserializer<V> {
  return { kind: 'registry-aware', deserialize };
}

/**
 * Builds metadata for a class with overrides applied on top of its declaration.
 *
 * The class keeps its own metadata; the result is only held by whoever asked
 * for it, such as a parser registering the class with overrides.
 *
 * @param base - The declared metadata.
 * @param overrides - Replacement section name and per-field entries.
 * @returns New metadata for the same class.
 */
export function deriveRecordMetadata<T extends object>(
  base: RecordMetadata,
  overrides: ConfigClassOverrides<T>
): RecordMetadata {
  const extra: RawConfigClassOptions = overrides;
  const merged: RawConfigClassOptions = {
    name: extra.name ?? base.options.name,
    topLevel: base.options.topLevel,
    fieldTypes: { ...base.options.fieldTypes, ...extra.fieldTypes },
    fieldNameMappings: { ...base.options.fieldNameMappings, ...extra.fieldNameMappings },
    fieldSerializers: { ...base.options.fieldSerializers, ...extra.fieldSerializers },
    fieldDeserializers: { ...base.options.fieldDeserializers, ...extra.fieldDeserializers },
  };
  return buildRecordMetadata(base.ctor, merged);
}

/**
 * Builds metadata from plain options.
 *
 * @param ctor - The record class.
 * @param options - The options.
 * @returns The metadata. Nothing is attached to the class.
 */
export function buildRecordMetadata(ctor: RecordClass, options: RawConfigClassOptions): RecordMetadata {
  const typeName = ctor.name === '' ? '<anonymous>' : ctor.name;
  const topLevel = options.topLevel ?? false;
  const sectionName = options.name ?? ctor.name;

  if (!topLevel && sectionName === '') {
    throw new InvalidConfigClassError(
      typeName,
      "name can't be empty for a config class that is not top-level"
    );
  }

  const defaults = instantiate(ctor, typeName);
  const fieldTypes = options.fieldTypes ?? {};
  const mappings = options.fieldNameMappings ?? {};
  const serializers = options.fieldSerializers ?? {};
  const deserializers = options.fieldDeserializers ?? {};

  const names = collectFieldNames(defaults, fieldTypes);
  assertKnownFields(typeName, names, 'fieldNameMappings', mappings);
  assertKnownFields(typeName, names, 'fieldSerializers', serializers);
  assertKnownFields(typeName, names, 'fieldDeserializers', deserializers);

  const fields: FieldSpec[] = [];
  const seenKeys = new Map<string, string>();

  for (const name of names) {
    const key = lookup(mappings, name) ?? name;
    const previous = seenKeys.get(key);
    if (previous !== undefined) {
      throw new InvalidConfigClassError(
        typeName,
        `fields '${previous}' and '${name}' both map to key '${key}'`
      );
    }
    seenKeys.set(key, name);

    const declared = lookup(fieldTypes, name);
    const base =
      declared !== undefined
        ? explicitConversion(typeName, name, declared)
        : inferConversion(Reflect.get(defaults, name));
    const serializer = lookup(serializers, name);
    const deserializer = lookup(deserializers, name);

    let conversion: FieldConversion;
    if (serializer !== undefined || deserializer !== undefined) {
      if (base === undefined && (serializer === undefined || deserializer === undefined)) {
        throw new InvalidConfigClassError(
          typeName,
          `field '${name}' has a single custom converter and no type to fall back on; add it to fieldTypes`
        );
      }
      conversion = { kind: 'custom', serializer, deserializer, fallback: base };
    } else if (base !== undefined) {
      conversion = base;
    } else {
      throw new InvalidConfigClassError(
        typeName,
        `cannot infer the type of field '${name}' from its default; add it to fieldTypes`
      );
    }

    fields.push(Object.freeze({ name, key, conversion }));
  }

  return new RecordMetadata({ ctor, typeName, sectionName, topLevel, fields, options });
}

function instantiate(ctor: RecordClass, typeName: string): object {
  try {
    return new ctor();
  } catch (error) {
    throw new InvalidConfigClassError(
      typeName,
      'the constructor must succeed without arguments',
      error instanceof Error ? error : new Error(String(error))
    );
  }
}

/**
 * Own enumerable properties of the default instance in initialisation
 * order, then names only known from `fieldTypes`.
 */
function collectFieldNames(defaults: object, fieldTypes: FieldOptionMap<FieldType>): string[] {
  const names = Object.keys(defaults);
  for (const name of Object.keys(fieldTypes)) {
    if (!names.includes(name)) {
      names.push(name);
    }
  }
  return names;
}

function assertKnownFields(
  typeName: string,
  names: readonly string[],
  option: string,
  map: FieldOptionMap<unknown>
): void {
  for (const name of Object.keys(map)) {
    if (!names.includes(name)) {
      throw new InvalidConfigClassError(typeName, `${option} names unknown field '${name}'`);
    }
  }
}

function lookup<V>(map: FieldOptionMap<V>, name: string): V | undefined {
  if (!Object.prototype.hasOwnProperty.call(map, name)) {
    return undefined;
  }
  return map[name];
}

function explicitConversion(
  typeName: string,
  name: string,
  declared: FieldType
): PrimitiveConversion | RecordConversion {
  if (typeof declared === 'string') {
    if (!PRIMITIVE_TYPES.includes(declared)) {
      throw new InvalidConfigClassError(typeName, `field '${name}' has unknown type '${declared}'`);
    }
    return { kind: 'primitive', type: declared };
  }
  if (getRecordMetadata(declared) === undefined) {
    throw new InvalidConfigClassError(
      typeName,
      `field '${name}' has type ${declared.name}, which is not a config class`
    );
  }
  return { kind: 'record', type: declared };
}

function inferConversion(value: unknown): PrimitiveConversion | RecordConversion | undefined {
  switch (typeof value) {
    case 'string':
      return { kind: 'primitive', type: 'string' };
    case 'number':
      return { kind: 'primitive', type: 'number' };
    case 'boolean':
      return { kind: 'primitive', type: 'boolean' };
    case 'object': {
      if (value === null) {
        return undefined;
      }
      if (Array.isArray(value)) {
        return { kind: 'primitive', type: 'sequence' };
      }
      const nested = getRecordMetadata(value.constructor);
      if (nested !== undefined) {
        return { kind: 'record', type: nested.ctor };
      }
      if (isMapping(value)) {
        return { kind: 'primitive', type: 'mapping' };
      }
      return undefined;
    }
    default:
      return undefined;
  }
}
