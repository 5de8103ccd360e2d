/**
 * Config parser: one file, one format, a set of record types.
 *
 * The parser loads lazily on first lookup. Loading reads the file (creating
 * it from defaults when allowed), then resolves every registered record into
 * a cache. Registry-aware deserializers may look up other records while the
 * load is in progress; those records are resolved on demand.
 *
 * @packageDocumentation
 */

import {
  getOwn,
  isMapping,
  nodeKind,
  type DocumentMapping,
} from '../document/index.js';
import {
  ClassconfError,
  ClassNotRegisteredError,
  FileNotFoundError,
  InvalidConfigClassError,
  MissingKeyError,
  ResolutionCycleError,
  TypeCoercionError,
} from '../errors.js';
import { formatForPath, type ConfigFormat } from '../format/index.js';
import {
  embeddedRecordType,
  fromDocument,
  type FromDocumentOptions,
  type MissingKeyPolicy,
} from '../marshal/index.js';
import {
  deriveRecordMetadata,
  requireRecordMetadata,
  typeNameOf,
  type ConfigClassOverrides,
  type ConfigResolver,
  type RecordClass,
  type RecordMetadata,
} from '../metadata/index.js';
import { createLogger } from '../utils/env.js';
import type { Logger } from '../utils/logger.js';
import { validatePath } from '../utils/safe-fs.js';
import { generateConfig, type GenerateConfigOptions } from './generate.js';
import { composeDocument, validateLayout } from './layout.js';

/**
 * Options for {@link ConfigParser}.
 */
export interface ConfigParserOptions {
  /** Format adapter. Defaults to one chosen from the file extension. */
  readonly format?: ConfigFormat;
  /**
   * Write a default config file when the file does not exist.
   * @defaultValue false
   */
  readonly createNoexist?: boolean;
  /**
   * Policy for fields and sections missing from the document.
   * @defaultValue 'error'
   */
  readonly missingKeys?: MissingKeyPolicy;
  /** Logger for load and creation events. */
  readonly logger?: Logger;
}

/**
 * Lifecycle of a parser. Loading is one-way; a failed load returns to
 * `unloaded`.
 */
export type ParserState = 'unloaded' | 'loading' | 'loaded';

/**
 * Loads and caches record instances from one config file.
 *
 * @example
 * ```typescript
 * const parser = new ConfigParser('app.toml', [AppConfig, DatabaseConfig], {
 *   createNoexist: true,
 * });
 * const db = parser.get(DatabaseConfig);
 * ```
 */
export class ConfigParser implements ConfigResolver {
  private readonly configPath: string;
  private readonly configFormat: ConfigFormat;
  private readonly createNoexist: boolean;
  private readonly missingKeys: MissingKeyPolicy;
  private readonly logger: Logger;
  private readonly registered = new Map<RecordClass, RecordMetadata>();
  private readonly cache = new Map<RecordClass, object>();
  private readonly resolving: RecordMetadata[] = [];
  private document: DocumentMapping | undefined;
  private lifecycle: ParserState = 'unloaded';

  /**
   * Creates a parser. No file is touched until the first lookup or `load()`.
   *
   * @param configPath - Path of the config file.
   * @param types - Record types to register.
   * @param options - Format, creation and logging options.
   * @throws InvalidConfigClassError if a type is not a config class.
   * @throws TopLevelConflictError if more than one type is top-level.
   * @throws SectionConflictError if two types claim the same root key.
   */
  constructor(configPath: string, types: readonly RecordClass[], options: ConfigParserOptions = {}) {
    this.configPath = validatePath(configPath);
    this.configFormat = options.format ?? formatForPath(configPath);
    this.createNoexist = options.createNoexist ?? false;
    this.missingKeys = options.missingKeys ?? 'error';
    this.logger = options.logger ?? createLogger('ConfigParser');
    this.register(types.map((type) => requireRecordMetadata(type)));
  }

  /**
   * Writes a config file from record instances, independent of any parser.
   *
   * @see generateConfig
   */
  static generateConfig(
    configPath: string,
    instances: readonly object[],
    options: GenerateConfigOptions = {}
  ): DocumentMapping {
    return generateConfig(configPath, instances, options);
  }

  /** Absolute path of the config file. */
  get path(): string {
    return this.configPath;
  }

  /** The format adapter in use. */
  get format(): ConfigFormat {
    return this.configFormat;
  }

  /** Where the parser is in its lifecycle. */
  get state(): ParserState {
    return this.lifecycle;
  }

  /** Whether the file has been loaded and every record resolved. */
  get isLoaded(): boolean {
    return this.lifecycle === 'loaded';
  }

  /**
   * Whether a record type is registered.
   *
   * @param type - The record type.
   */
  has(type: RecordClass): boolean {
    return this.registered.has(type);
  }

  /**
   * Registered record types in registration order.
   */
  registeredTypes(): RecordClass[] {
    return [...this.registered.keys()];
  }

  /**
   * Loads the file and resolves every registered record. Does nothing if
   * already loaded.
   *
   * @throws FileNotFoundError if the file is missing and creation is off.
   * @throws ParseError if the file content is malformed.
   * @throws MissingKeyError if a field or section is absent.
   * @throws TypeCoercionError if a value does not fit its field.
   */
  load(): void {
    if (this.lifecycle !== 'unloaded') {
      return;
    }

    this.lifecycle = 'loading';
    try {
      this.document = this.readOrCreate();
      for (const metadata of this.registered.values()) {
        this.resolve(metadata);
      }
      this.lifecycle = 'loaded';
    } catch (error) {
      this.reset();
      throw error;
    }

    this.logger.info('config_loaded', {
      path: this.configPath,
      format: this.configFormat.name,
      records: this.registered.size,
    });
  }

  /**
   * Returns the instance of a registered record type, loading first if needed.
   *
   * Repeated calls return the same instance.
   *
   * @param type - The record type.
   * @returns The resolved instance.
   * @throws ClassNotRegisteredError if the type was never registered.
   */
  get<T extends object>(type: RecordClass<T>): T {
    const metadata = this.registered.get(type);
    if (metadata === undefined) {
      throw new ClassNotRegisteredError(typeNameOf(type));
    }

    this.load();

    const instance = this.resolve(metadata);
    if (!(instance instanceof type)) {
      throw new TypeCoercionError(metadata.sectionName, metadata.typeName, typeNameOf(instance.constructor));
    }
    return instance;
  }

  /**
   * Registers a record type after construction.
   *
   * If the parser is already loaded, the type's section is resolved
   * immediately; if that fails the type is not registered.
   * Registering an already registered type without overrides does nothing.
   *
   * @param type - The record type.
   * @param overrides - Section name and per-field adjustments for this parser only.
   * @throws InvalidConfigClassError if the type is not a config class, or is
   *   already registered and overrides are given.
   * @throws TopLevelConflictError if the type adds a second top-level record.
   * @throws SectionConflictError if the type's section is already claimed.
   */
  add<T extends object>(type: RecordClass<T>, overrides?: ConfigClassOverrides<T>): void {
    const declared = requireRecordMetadata(type);
    if (this.registered.has(type)) {
      if (overrides !== undefined) {
        throw new InvalidConfigClassError(declared.typeName, 'already registered with this parser');
      }
      return;
    }

    const metadata = overrides === undefined ? declared : deriveRecordMetadata(declared, overrides);
    this.register([metadata]);

    if (this.lifecycle === 'loaded') {
      try {
        this.resolve(metadata);
      } catch (error) {
        this.registered.delete(type);
        this.cache.delete(type);
        throw error;
      }
    }

    this.logger.debug('record_added', { type: metadata.typeName, section: metadata.sectionName });
  }

  private register(records: readonly RecordMetadata[]): void {
    validateLayout([...this.registered.values(), ...records]);
    for (const metadata of records) {
      this.registered.set(metadata.ctor, metadata);
    }
  }

  private reset(): void {
    this.cache.clear();
    this.resolving.length = 0;
    this.document = undefined;
    this.lifecycle = 'unloaded';
  }

  private readOrCreate(): DocumentMapping {
    const existing = this.configFormat.read(this.configPath);
    if (existing !== undefined) {
      return existing;
    }

    if (!this.createNoexist) {
      throw new FileNotFoundError(this.configPath);
    }

    this.configFormat.write(this.configPath, this.composeDefaults());
    this.logger.info('config_created', {
      path: this.configPath,
      format: this.configFormat.name,
    });

    const created = this.configFormat.read(this.configPath);
    if (created === undefined) {
      throw new FileNotFoundError(this.configPath);
    }
    return created;
  }

  /**
   * Default document: the top-level record, then one section per record
   * that is not nested in another registered record, ordered by section name.
   */
  private composeDefaults(): DocumentMapping {
    const records = [...this.registered.values()]
      .filter((metadata) => metadata.topLevel || this.findParents(metadata).length === 0)
      .sort((a, b) => {
        if (a.topLevel !== b.topLevel) {
          return a.topLevel ? -1 : 1;
        }
        const left = a.sectionName.toLowerCase();
        const right = b.sectionName.toLowerCase();
        return left < right ? -1 : left > right ? 1 : 0;
      });

    return composeDocument(
      records.map((metadata) => ({ metadata, instance: new metadata.ctor() }))
    );
  }

  private findParents(metadata: RecordMetadata): Array<{ parent: RecordMetadata; field: string }> {
    const parents: Array<{ parent: RecordMetadata; field: string }> = [];
    for (const parent of this.registered.values()) {
      if (parent === metadata) {
        continue;
      }
      for (const field of parent.fields) {
        if (embeddedRecordType(field.conversion) === metadata.ctor) {
          parents.push({ parent, field: field.name });
        }
      }
    }
    return parents;
  }

  private resolve(metadata: RecordMetadata): object {
    const cached = this.cache.get(metadata.ctor);
    if (cached !== undefined) {
      return cached;
    }

    if (this.resolving.includes(metadata)) {
      throw new ResolutionCycleError([
        ...this.resolving.map((entry) => entry.typeName),
        metadata.typeName,
      ]);
    }

    const document = this.document;
    if (document === undefined) {
      throw new ClassconfError(`Config file '${this.configPath}' is not loaded`);
    }

    this.resolving.push(metadata);
    try {
      const instance = this.parseRecord(metadata, document);
      this.cache.set(metadata.ctor, instance);
      this.logger.debug('record_resolved', {
        type: metadata.typeName,
        section: metadata.topLevel ? null : metadata.sectionName,
      });
      return instance;
    } finally {
      this.resolving.pop();
    }
  }

  private parseRecord(metadata: RecordMetadata, document: DocumentMapping): object {
    const options: FromDocumentOptions = {
      resolver: this,
      missingKeys: this.missingKeys,
      absentAsNull: this.configFormat.omitsNull,
      metadata,
    };

    if (metadata.topLevel) {
      return fromDocument(document, metadata.ctor, options);
    }

    const section = getOwn(document, metadata.sectionName);
    if (section === undefined) {
      const embedded = this.findEmbedded(metadata);
      if (embedded !== undefined) {
        return embedded;
      }
      if (this.missingKeys === 'default' || this.configFormat.omitsNull) {
        return fromDocument({}, metadata.ctor, { ...options, path: metadata.sectionName });
      }
      throw new MissingKeyError(metadata.sectionName, metadata.typeName);
    }

    if (!isMapping(section)) {
      throw new TypeCoercionError(metadata.sectionName, 'mapping', nodeKind(section));
    }
    return fromDocument(section, metadata.ctor, { ...options, path: metadata.sectionName });
  }

  /**
   * The instance a registered parent holds for a record without its own
   * section.
   */
  private findEmbedded(metadata: RecordMetadata): object | undefined {
    for (const { parent, field } of this.findParents(metadata)) {
      const value: unknown = Reflect.get(this.resolve(parent), field);
      if (typeof value === 'object' && value !== null) {
        return value;
      }
    }
    return undefined;
  }
}
