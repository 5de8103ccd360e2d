/**
 * Type definitions for record and field metadata.
 *
 * @packageDocumentation
 */

import type { DocumentNode } from '../document/index.js';

/**
 * A record type: a class whose no-argument constructor produces an instance
 * holding the default value of every field.
 */
export type RecordClass<T extends object = object> = new () => T;

/**
 * Names usable as field keys of a record type.
 */
export type FieldName<T> = Extract<keyof T, string>;

/**
 * Primitive conversion targets.
 *
 * - `string`, `number`, `integer`, `boolean`: scalar with coercion
 * - `sequence`: any array, items passed through
 * - `mapping`: any free-form mapping, passed through
 * - `node`: any document value, passed through
 */
export type PrimitiveType =
  | 'string'
  | 'number'
  | 'integer'
  | 'boolean'
  | 'sequence'
  | 'mapping'
  | 'node';

/**
 * All primitive conversion targets.
 */
export const PRIMITIVE_TYPES: readonly PrimitiveType[] = [
  'string',
  'number',
  'integer',
  'boolean',
  'sequence',
  'mapping',
  'node',
];

/**
 * Lookup interface handed to registry-aware deserializers.
 */
export interface ConfigResolver {
  /**
   * Returns the resolved instance of a registered record type.
   *
   * @param type - The record type to look up.
   */
  get<T extends object>(type: RecordClass<T>): T;
}

/**
 * Converts a field value to its document form.
 *
 * Declared with method syntax so the parameter is checked bivariantly and a
 * serializer typed for one field fits the shared slot.
 */
export type FieldSerializer<V = unknown> = {
  serialize(value: V): DocumentNode;
}['serialize'];

/**
 * Deserializer that only sees the raw document value.
 */
export type StatelessDeserializer<V = unknown> = (raw: DocumentNode) => V;

/**
 * Deserializer that also receives the owning parser, so a field can select
 * and return an instance of another registered section.
 *
 * Create one with `withRegistry`.
 */
export interface RegistryAwareDeserializer<V = unknown> {
  readonly kind: 'registry-aware';
  readonly deserialize: (raw: DocumentNode, resolver: ConfigResolver) => V;
}

/**
 * Either deserializer shape.
 */
export type FieldDeserializer<V = unknown> = StatelessDeserializer<V> | RegistryAwareDeserializer<V>;

/**
 * Field converted by type-directed coercion.
 */
export interface PrimitiveConversion {
  readonly kind: 'primitive';
  readonly type: PrimitiveType;
}

/**
 * Field holding a nested record, serialized as a mapping.
 */
export interface RecordConversion {
  readonly kind: 'record';
  readonly type: RecordClass;
}

/**
 * Field with at least one custom converter. The fallback handles the
 * direction without one.
 */
export interface CustomConversion {
  readonly kind: 'custom';
  readonly serializer: FieldSerializer | undefined;
  readonly deserializer: FieldDeserializer | undefined;
  readonly fallback: PrimitiveConversion | RecordConversion | undefined;
}

/**
 * How a field is converted, fixed when metadata is attached.
 */
export type FieldConversion = PrimitiveConversion | RecordConversion | CustomConversion;

/**
 * Per-field conversion policy.
 */
export interface FieldSpec {
  /** Property name on the record instance. */
  readonly name: string;
  /** Key used in the document. */
  readonly key: string;
  readonly conversion: FieldConversion;
}

/**
 * Explicit type of a field: a primitive target or a record class.
 */
export type FieldType = PrimitiveType | RecordClass;

/**
 * Per-field options keyed by plain strings.
 */
export type FieldOptionMap<V> = { readonly [field: string]: V | undefined };

/**
 * Per-field options typed against the record's fields. These are also the
 * adjustments accepted when a record type is added to one parser.
 */
export interface ConfigClassOverrides<T extends object> {
  /** Section key. Defaults to the class name. */
  readonly name?: string;
  /** Explicit field types, for fields whose default is null or undefined. */
  readonly fieldTypes?: { readonly [K in FieldName<T>]?: FieldType };
  /** Field name to external key. */
  readonly fieldNameMappings?: { readonly [K in FieldName<T>]?: string };
  readonly fieldSerializers?: { readonly [K in FieldName<T>]?: FieldSerializer<T[K]> };
  readonly fieldDeserializers?: { readonly [K in FieldName<T>]?: FieldDeserializer<T[K]> };
}

/**
 * Options accepted by `configclass`.
 */
export interface ConfigClassOptions<T extends object> extends ConfigClassOverrides<T> {
  /** Whether the fields live directly at the document root. */
  readonly topLevel?: boolean;
}

/**
 * The options of {@link ConfigClassOptions} with plain string keys, as
 * stored on the metadata.
 */
export interface RawConfigClassOptions {
  readonly name?: string;
  readonly topLevel?: boolean;
  readonly fieldTypes?: FieldOptionMap<FieldType>;
  readonly fieldNameMappings?: FieldOptionMap<string>;
  readonly fieldSerializers?: FieldOptionMap<FieldSerializer>;
  readonly fieldDeserializers?: FieldOptionMap<FieldDeserializer>;
}
