/**
 * Error taxonomy shared by every classconf module.
 *
 * All errors surface synchronously to the caller of the operation that
 * triggered them. Nothing is retried or swallowed.
 *
 * @packageDocumentation
 */

/**
 * Base class for all classconf errors.
 */
export class ClassconfError extends Error {
  /** The underlying error, if any. */
  public readonly cause: Error | undefined;

  /**
   * Creates a new ClassconfError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ClassconfError';
    this.cause = cause;
  }
}

/**
 * The backing file does not exist and the parser may not create it.
 */
export class FileNotFoundError extends ClassconfError {
  public readonly path: string;

  constructor(path: string) {
    super(`Config file '${path}' does not exist`);
    this.name = 'FileNotFoundError';
    this.path = path;
  }
}

/**
 * The backing file exists but its content could not be parsed into a document.
 */
export class ParseError extends ClassconfError {
  /** Path of the malformed file. */
  public readonly path: string;

  constructor(path: string, message: string, cause?: Error) {
    super(`Failed to parse '${path}': ${message}`, cause);
    this.name = 'ParseError';
    this.path = path;
  }
}

/**
 * More than one top-level record type was registered with one parser, or
 * passed to one generation call.
 */
export class TopLevelConflictError extends ClassconfError {
  /** Names of the conflicting record types. */
  public readonly typeNames: readonly string[];

  constructor(typeNames: readonly string[]) {
    super(`Only one top-level config class is allowed; found: ${typeNames.join(', ')}`);
    this.name = 'TopLevelConflictError';
    this.typeNames = typeNames;
  }
}

/**
 * Two record types claim the same key of the root mapping.
 */
export class SectionConflictError extends ClassconfError {
  public readonly section: string;
  public readonly typeNames: readonly string[];

  constructor(section: string, typeNames: readonly string[]) {
    super(`Section '${section}' is claimed by more than one config class: ${typeNames.join(', ')}`);
    this.name = 'SectionConflictError';
    this.section = section;
    this.typeNames = typeNames;
  }
}

/**
 * A lookup named a record type that was never registered with the parser.
 */
export class ClassNotRegisteredError extends ClassconfError {
  public readonly typeName: string;

  constructor(typeName: string) {
    super(`Config class ${typeName} was not provided to this parser`);
    this.name = 'ClassNotRegisteredError';
    this.typeName = typeName;
  }
}

/**
 * A class was used as a record type without valid metadata, or its metadata
 * declaration is inconsistent.
 */
export class InvalidConfigClassError extends ClassconfError {
  public readonly typeName: string;
  /** What is wrong with the declaration. */
  public readonly reason: string;

  constructor(typeName: string, reason: string, cause?: Error) {
    super(`Invalid config class ${typeName}: ${reason}`, cause);
    this.name = 'InvalidConfigClassError';
    this.typeName = typeName;
    this.reason = reason;
  }
}

/**
 * A document lacks the external key of a declared field, or a section.
 */
export class MissingKeyError extends ClassconfError {
  /** Dotted path of the missing key. */
  public readonly path: string;
  public readonly typeName: string;

  constructor(path: string, typeName: string) {
    super(`Missing config key '${path}' for '${typeName}'`);
    this.name = 'MissingKeyError';
    this.path = path;
    this.typeName = typeName;
  }
}

/**
 * A value cannot be converted to or from the declared field type.
 */
export class TypeCoercionError extends ClassconfError {
  public readonly path: string;
  public readonly expectedType: string;
  public readonly actualType: string;

  constructor(path: string, expectedType: string, actualType: string, message?: string) {
    super(
      message ?? `Invalid type for '${path}': expected ${expectedType}, got ${actualType}`
    );
    this.name = 'TypeCoercionError';
    this.path = path;
    this.expectedType = expectedType;
    this.actualType = actualType;
  }
}

/**
 * Config generation targeted an existing file without permission to replace it.
 */
export class WriteConflictError extends ClassconfError {
  public readonly path: string;

  constructor(path: string) {
    super(`Config file '${path}' already exists`);
    this.name = 'WriteConflictError';
    this.path = path;
  }
}

/**
 * A registry-aware deserializer ran without a registry to resolve against.
 */
export class RegistryUnavailableError extends ClassconfError {
  public readonly path: string;

  constructor(path: string) {
    super(`Deserializer for '${path}' needs a config parser, but none was given`);
    this.name = 'RegistryUnavailableError';
    this.path = path;
  }
}

/**
 * Registry-aware deserializers requested each other in a loop.
 */
export class ResolutionCycleError extends ClassconfError {
  /** Type names in resolution order, ending with the repeated one. */
  public readonly chain: readonly string[];

  constructor(chain: readonly string[]) {
    super(`Circular config resolution: ${chain.join(' -> ')}`);
    this.name = 'ResolutionCycleError';
    this.chain = chain;
  }
}
