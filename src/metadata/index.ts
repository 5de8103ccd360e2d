/**
 * Record and field metadata.
 *
 * @packageDocumentation
 */

export {
  buildRecordMetadata,
  configclass,
  deriveRecordMetadata,
  withRegistry,
} from './configclass.js';
export {
  getRecordMetadata,
  isConfigClass,
  RecordMetadata,
  requireRecordMetadata,
  typeNameOf,
} from './record-metadata.js';
export type { ConfigClass } from './record-metadata.js';
export { PRIMITIVE_TYPES } from './types.js';
export type {
  ConfigClassOptions,
  ConfigClassOverrides,
  ConfigResolver,
  CustomConversion,
  FieldConversion,
  FieldDeserializer,
  FieldName,
  FieldOptionMap,
  FieldSerializer,
  FieldSpec,
  FieldType,
  PrimitiveConversion,
  PrimitiveType,
  RawConfigClassOptions,
  RecordClass,
  RecordConversion,
  RegistryAwareDeserializer,
  StatelessDeserializer,
} from './types.js';
