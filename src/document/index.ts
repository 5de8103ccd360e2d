/**
 * Document model shared by all formats.
 *
 * @packageDocumentation
 */

export type {
  DocumentMapping,
  DocumentNode,
  DocumentSequence,
  NodeKind,
  Scalar,
} from './types.js';
export {
  describeValue,
  getOwn,
  isDocumentNode,
  isMapping,
  isScalar,
  isSequence,
  nodeKind,
  setOwn,
} from './document.js';
