/**
 * Record metadata and its attachment to record classes.
 *
 * Metadata lives on the class itself under a module-private symbol. There is
 * no process-wide table: a parser reads the metadata of the classes it is
 * given and holds it.
 *
 * @packageDocumentation
 */

import { InvalidConfigClassError } from '../errors.js';
import type { FieldOptionMap, FieldSpec, RawConfigClassOptions, RecordClass } from './types.js';

/**
 * Property key of the attached metadata. Not re-exported from the package root.
 */
export const RECORD_METADATA: unique symbol = Symbol('classconf.recordMetadata');

/**
 * Immutable description of one record type.
 */
export class RecordMetadata {
  /** The record class. */
  public readonly ctor: RecordClass;
  /** Class name, used in messages. */
  public readonly typeName: string;
  /** Key of this record's section in the root mapping. */
  public readonly sectionName: string;
  /** Whether the fields live directly at the document root. */
  public readonly topLevel: boolean;
  /** Field specifications in declared order. */
  public readonly fields: readonly FieldSpec[];
  /** The options the metadata was built from, kept for per-parser overrides. */
  public readonly options: RawConfigClassOptions;

  constructor(init: {
    ctor: RecordClass;
    typeName: string;
    sectionName: string;
    topLevel: boolean;
    fields: readonly FieldSpec[];
    options: RawConfigClassOptions;
  }) {
    this.ctor = init.ctor;
    this.typeName = init.typeName;
    this.sectionName = init.sectionName;
    this.topLevel = init.topLevel;
    this.fields = Object.freeze([...init.fields]);
    this.options = snapshotOptions(init.options);
    Object.freeze(this);
  }
}

function snapshotMap<V>(map: FieldOptionMap<V> | undefined): FieldOptionMap<V> | undefined {
  return map === undefined ? undefined : Object.freeze({ ...map });
}

/**
 * Frozen copy of the declared options, detached from the caller's objects.
 */
function snapshotOptions(options: RawConfigClassOptions): RawConfigClassOptions {
  return Object.freeze({
    name: options.name,
    topLevel: options.topLevel,
    fieldTypes: snapshotMap(options.fieldTypes),
    fieldNameMappings: snapshotMap(options.fieldNameMappings),
    fieldSerializers: snapshotMap(options.fieldSerializers),
    fieldDeserializers: snapshotMap(options.fieldDeserializers),
  });
}

/**
 * A record class carrying metadata.
 */
export interface ConfigClass<T extends object = object> {
  new (): T;
  readonly [RECORD_METADATA]: RecordMetadata;
}

/**
 * Display name of a class, for messages.
 *
 * @param ctor - Any value expected to be a class.
 * @returns The class name, or a placeholder for anonymous classes.
 */
export function typeNameOf(ctor: unknown): string {
  if (typeof ctor === 'function' && ctor.name !== '') {
    return ctor.name;
  }
  return '<anonymous>';
}

/**
 * Attaches metadata to a class. Fails if the class already has its own.
 *
 * @param ctor - The record class.
 * @param metadata - The metadata to attach.
 * @throws InvalidConfigClassError if metadata is already attached.
 */
export function attachMetadata<T extends object>(
  ctor: RecordClass<T>,
  metadata: RecordMetadata
): ConfigClass<T> {
  if (Object.prototype.hasOwnProperty.call(ctor, RECORD_METADATA)) {
    throw new InvalidConfigClassError(metadata.typeName, 'metadata is already attached');
  }
  Object.defineProperty(ctor, RECORD_METADATA, {
    value: metadata,
    enumerable: false,
    writable: false,
    configurable: false,
  });
  if (!isConfigClass(ctor)) {
    throw new InvalidConfigClassError(metadata.typeName, 'metadata could not be attached');
  }
  return ctor;
}

/**
 * Returns the metadata attached to a class.
 *
 * Metadata of a parent class is not inherited: a subclass needs its own
 * `configclass` call.
 *
 * @param ctor - Any value.
 * @returns The metadata, or undefined if the value is not a config class.
 */
export function getRecordMetadata(ctor: unknown): RecordMetadata | undefined {
  if (typeof ctor !== 'function') {
    return undefined;
  }
  const descriptor = Object.getOwnPropertyDescriptor(ctor, RECORD_METADATA);
  const value: unknown = descriptor?.value;
  return value instanceof RecordMetadata ? value : undefined;
}

/**
 * Returns the metadata attached to a class, failing if there is none.
 *
 * @param ctor - Any value.
 * @returns The metadata.
 * @throws InvalidConfigClassError if the value is not a config class.
 */
export function requireRecordMetadata(ctor: unknown): RecordMetadata {
  const metadata = getRecordMetadata(ctor);
  if (metadata === undefined) {
    throw new InvalidConfigClassError(typeNameOf(ctor), 'config classes must use configclass()');
  }
  return metadata;
}

/**
 * Checks whether a class carries metadata.
 *
 * @param ctor - The class to check.
 * @returns True if `configclass` was applied to this exact class.
 */
export function isConfigClass<T extends object>(ctor: RecordClass<T>): ctor is ConfigClass<T> {
  return getRecordMetadata(ctor) !== undefined;
}
