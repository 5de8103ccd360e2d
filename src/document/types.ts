/**
 * Format-agnostic document tree.
 *
 * Every file format is translated to and from this shape. Mappings are plain
 * objects and keep insertion order, which is the order keys are written in.
 *
 * @packageDocumentation
 */

/**
 * A leaf value. `null` stands for an absent value.
 */
export type Scalar = string | number | boolean | null;

/**
 * An ordered list of document nodes.
 */
export type DocumentSequence = DocumentNode[];

/**
 * An ordered, string-keyed mapping of document nodes.
 */
export interface DocumentMapping {
  [key: string]: DocumentNode;
}

/**
 * Any node of a document tree.
 */
export type DocumentNode = Scalar | DocumentSequence | DocumentMapping;

/**
 * Short type name of a node, used in error messages.
 */
export type NodeKind = 'string' | 'number' | 'boolean' | 'null' | 'sequence' | 'mapping';
