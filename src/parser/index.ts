/**
 * Config parser and file generation.
 *
 * @packageDocumentation
 */

export { ConfigParser } from './parser.js';
export type { ConfigParserOptions, ParserState } from './parser.js';
export { generateConfig } from './generate.js';
export type { GenerateConfigOptions } from './generate.js';
export { composeDocument, validateLayout } from './layout.js';
export type { PlacedRecord } from './layout.js';
