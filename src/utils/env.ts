/**
 * Library settings read from environment variables.
 *
 * - `CLASSCONF_DEBUG`: enables debug-level logging (boolean)
 * - `CLASSCONF_LOG_LEVEL`: minimum level written (`debug`, `info`, `warn`, `error`)
 *
 * @packageDocumentation
 */

import { LOG_LEVELS, Logger, type LogLevel } from './logger.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Gets the default environment from Node.js process.env.
 */
function getDefaultEnv(): EnvRecord {
  return process.env;
}

/**
 * Words accepted as boolean true, compared case-insensitively.
 */
export const TRUTHY_WORDS: readonly string[] = ['true', '1', 'yes', 'on'];

/**
 * Words accepted as boolean false, compared case-insensitively.
 */
export const FALSY_WORDS: readonly string[] = ['false', '0', 'no', 'off'];

/**
 * Parses a boolean word.
 *
 * @param value - The raw string.
 * @returns The boolean, or undefined if the word is not recognized.
 */
export function parseBooleanWord(value: string): boolean | undefined {
  const trimmed = value.trim().toLowerCase();
  if (TRUTHY_WORDS.includes(trimmed)) {
    return true;
  }
  if (FALSY_WORDS.includes(trimmed)) {
    return false;
  }
  return undefined;
}

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

/**
 * Settings resolved from the environment.
 */
export interface EnvSettings {
  /** Whether debug logging is on. */
  readonly debug: boolean;
  /** Minimum level written by library loggers. */
  readonly logLevel: LogLevel;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Reads library settings from environment variables.
 *
 * Unset or empty variables fall back to the defaults (`debug: false`,
 * `logLevel: 'info'`).
 *
 * @param env - The environment object to read from (defaults to process.env).
 * @returns The resolved settings.
 * @throws EnvCoercionError if a variable holds an unrecognized value.
 *
 * @example
 * ```typescript
 * const settings = readEnvSettings({ CLASSCONF_DEBUG: 'yes' });
 * // settings.debug === true, settings.logLevel === 'debug'
 * ```
 */
export function readEnvSettings(env: EnvRecord = getDefaultEnv()): EnvSettings {
  let debug = false;
  const rawDebug = env.CLASSCONF_DEBUG;
  if (rawDebug !== undefined && rawDebug !== '') {
    const parsed = parseBooleanWord(rawDebug);
    if (parsed === undefined) {
      throw new EnvCoercionError(
        'CLASSCONF_DEBUG',
        rawDebug,
        'boolean',
        `Cannot coerce 'CLASSCONF_DEBUG' value '${rawDebug}' to boolean. Expected one of: ${[...TRUTHY_WORDS, ...FALSY_WORDS].join(', ')}`
      );
    }
    debug = parsed;
  }

  let logLevel: LogLevel = debug ? 'debug' : 'info';
  const rawLevel = env.CLASSCONF_LOG_LEVEL;
  if (rawLevel !== undefined && rawLevel !== '') {
    const normalized = rawLevel.trim().toLowerCase();
    if (!isLogLevel(normalized)) {
      throw new EnvCoercionError(
        'CLASSCONF_LOG_LEVEL',
        rawLevel,
        'log level',
        `Cannot coerce 'CLASSCONF_LOG_LEVEL' value '${rawLevel}' to log level. Expected one of: ${LOG_LEVELS.join(', ')}`
      );
    }
    logLevel = normalized;
  }

  return { debug, logLevel };
}

/**
 * Creates a logger configured from the environment.
 *
 * @param component - Component name written with every entry.
 * @param env - The environment object to read from (defaults to process.env).
 * @returns A logger honoring `CLASSCONF_DEBUG` and `CLASSCONF_LOG_LEVEL`.
 */
export function createLogger(component: string, env: EnvRecord = getDefaultEnv()): Logger {
  const settings = readEnvSettings(env);
  return new Logger({ component, debugMode: settings.debug, minLevel: settings.logLevel });
}
