/**
 * Marshalling engine.
 *
 * @packageDocumentation
 */

export { coercePrimitive, primitiveToNode } from './coerce.js';
export { embeddedRecordType, fromDocument, joinPath, toDocument } from './marshal.js';
export type { FromDocumentOptions, MissingKeyPolicy, ToDocumentOptions } from './marshal.js';
