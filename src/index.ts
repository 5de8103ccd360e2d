/**
 * classconf
 *
 * Typed configuration records backed by a single TOML or JSON file.
 *
 * @packageDocumentation
 */

/**
 * Library version string.
 */
export const VERSION = '0.1.0';

// Declaring record types
export {
  configclass,
  getRecordMetadata,
  isConfigClass,
  PRIMITIVE_TYPES,
  RecordMetadata,
  requireRecordMetadata,
  withRegistry,
} from './metadata/index.js';
export type {
  ConfigClass,
  ConfigClassOptions,
  ConfigClassOverrides,
  ConfigResolver,
  FieldConversion,
  FieldDeserializer,
  FieldName,
  FieldSerializer,
  FieldSpec,
  FieldType,
  PrimitiveType,
  RecordClass,
  RegistryAwareDeserializer,
  StatelessDeserializer,
} from './metadata/index.js';

// Document model
export {
  describeValue,
  getOwn,
  isDocumentNode,
  isMapping,
  isScalar,
  isSequence,
  nodeKind,
} from './document/index.js';
export type {
  DocumentMapping,
  DocumentNode,
  DocumentSequence,
  NodeKind,
  Scalar,
} from './document/index.js';

// Marshalling
export { fromDocument, toDocument } from './marshal/index.js';
export type { FromDocumentOptions, MissingKeyPolicy, ToDocumentOptions } from './marshal/index.js';

// Formats
export { DEFAULT_NONE, formatForPath, JsonFormat, TomlFormat } from './format/index.js';
export type {
  ConfigFormat,
  JsonFormatOptions,
  NoneRepresentation,
  TomlFormatOptions,
} from './format/index.js';

// Parser
export { ConfigParser, generateConfig } from './parser/index.js';
export type { ConfigParserOptions, GenerateConfigOptions, ParserState } from './parser/index.js';

// Errors
export {
  ClassconfError,
  ClassNotRegisteredError,
  FileNotFoundError,
  InvalidConfigClassError,
  MissingKeyError,
  ParseError,
  RegistryUnavailableError,
  ResolutionCycleError,
  SectionConflictError,
  TopLevelConflictError,
  TypeCoercionError,
  WriteConflictError,
} from './errors.js';
export { PathValidationError } from './utils/safe-fs.js';

// Logging
export { Logger } from './utils/logger.js';
export type { LogEntry, LogLevel, LoggerOptions } from './utils/logger.js';
