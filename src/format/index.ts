/**
 * Format adapters.
 *
 * @packageDocumentation
 */

export type { ConfigFormat } from './types.js';
export { JsonFormat } from './json.js';
export type { JsonFormatOptions } from './json.js';
export { DEFAULT_NONE, TomlFormat } from './toml.js';
export type { NoneRepresentation, TomlFormatOptions } from './toml.js';
export { formatForPath } from './resolve.js';
