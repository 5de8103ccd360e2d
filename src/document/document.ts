/**
 * Type guards and helpers for document trees.
 *
 * @packageDocumentation
 */

import type { DocumentMapping, DocumentNode, DocumentSequence, NodeKind, Scalar } from './types.js';

/**
 * Checks whether a value is a scalar leaf.
 *
 * @param value - Value to check.
 * @returns True for strings, numbers, booleans and null.
 */
export function isScalar(value: unknown): value is Scalar {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  );
}

/**
 * Checks whether a value is a plain object usable as a mapping.
 *
 * Only the top level is inspected; use {@link isDocumentNode} for a deep check.
 *
 * @param value - Value to check.
 * @returns True for objects whose prototype is Object.prototype or null.
 */
export function isMapping(value: unknown): value is DocumentMapping {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Checks whether a value is a sequence.
 *
 * @param value - Value to check.
 * @returns True for arrays.
 */
export function isSequence(value: unknown): value is DocumentSequence {
  return Array.isArray(value);
}

/**
 * Deep structural check that a value is a valid document node.
 *
 * @param value - Value to check.
 * @returns True if the value and all its descendants are document nodes.
 */
export function isDocumentNode(value: unknown): value is DocumentNode {
  if (isScalar(value)) {
    return true;
  }
  if (isSequence(value)) {
    return value.every((item) => isDocumentNode(item));
  }
  if (isMapping(value)) {
    return Object.values(value).every((item) => isDocumentNode(item));
  }
  return false;
}

/**
 * Returns the short kind name of a document node.
 *
 * @param node - The node to describe.
 * @returns The node kind.
 */
export function nodeKind(node: DocumentNode): NodeKind {
  if (node === null) {
    return 'null';
  }
  if (isSequence(node)) {
    return 'sequence';
  }
  if (typeof node === 'object') {
    return 'mapping';
  }
  if (typeof node === 'string') {
    return 'string';
  }
  if (typeof node === 'number') {
    return 'number';
  }
  return 'boolean';
}

/**
 * Describes an arbitrary runtime value for error messages.
 *
 * Document nodes are named by their kind; anything else by its JavaScript
 * type, or by its class name for class instances.
 *
 * @param value - The value to describe.
 * @returns A short description such as `mapping` or `Date`.
 */
export function describeValue(value: unknown): string {
  if (value === undefined) {
    return 'undefined';
  }
  if (isScalar(value) || isSequence(value) || isMapping(value)) {
    return nodeKind(value);
  }
  if (typeof value === 'object') {
    const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
    if (typeof ctor === 'function' && ctor.name !== '') {
      return ctor.name;
    }
    return 'object';
  }
  return typeof value;
}

/**
 * Looks up an own key of a mapping.
 *
 * Keys inherited from the prototype (such as `constructor`) are never
 * treated as present.
 *
 * @param mapping - The mapping to search.
 * @param key - The key to look up.
 * @returns The node, or undefined if the key is absent.
 */
export function getOwn(mapping: DocumentMapping, key: string): DocumentNode | undefined {
  if (!Object.prototype.hasOwnProperty.call(mapping, key)) {
    return undefined;
  }
  return mapping[key];
}

/**
 * Sets a key on a mapping as an own, enumerable property.
 *
 * `defineProperty` is used so that a `__proto__` key is stored as data.
 *
 * @param mapping - The mapping to modify.
 * @param key - The key to set.
 * @param node - The value to store.
 */
export function setOwn(mapping: DocumentMapping, key: string, node: DocumentNode): void {
  Object.defineProperty(mapping, key, {
    value: node,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}
