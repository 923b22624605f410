/**
 * Error taxonomy for schema lookups, key derivation, version checks and record validation.
 * Every error here is recoverable and thrown to the caller.
 */

export type SchemaErrorCode =
  | 'UNKNOWN_OBJECT'
  | 'KEY_DERIVATION_FAILED'
  | 'SCHEMA_VERSION_MISMATCH'
  | 'SCHEMA_DEFINITION_INVALID'
  | 'SUMMARY_INVALID'
  | 'OBJECT_DISABLED';

export abstract class MonitoringSchemaError extends Error {
  constructor(message: string, public readonly code: SchemaErrorCode, public readonly details: Record<string, unknown> = {}) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * Thrown when an object name is not declared in the registry.
 */
export class UnknownObjectError extends MonitoringSchemaError {
  constructor(public readonly objectName: string) {
    super(`Unknown schema object '${objectName}'`, 'UNKNOWN_OBJECT', { objectName });
  }
}

/**
 * Thrown when the identifying attribute is missing, empty or unusable as a key segment.
 */
export class KeyDerivationError extends MonitoringSchemaError {
  constructor(objectName: string, attribute: string, reason: string) {
    super(`Cannot derive key for ${objectName}: ${attribute} ${reason}`, 'KEY_DERIVATION_FAILED', { objectName, attribute });
  }
}

/**
 * Thrown when a consumer expects a schema version the registry does not satisfy.
 */
export class SchemaVersionMismatchError extends MonitoringSchemaError {
  constructor(public readonly expected: string, public readonly actual: string, reason: string) {
    super(`Schema version mismatch: expected ${expected}, registry declares ${actual} (${reason})`, 'SCHEMA_VERSION_MISMATCH', { expected, actual });
  }
}

/**
 * Thrown when a definition document cannot be read or is structurally wrong.
 */
export class SchemaDefinitionError extends MonitoringSchemaError {
  constructor(message: string, source?: string) {
    super(source ? `${message} (${source})` : message, 'SCHEMA_DEFINITION_INVALID', source ? { source } : {});
  }
}

/**
 * Thrown when a summary record does not match its declared attribute set.
 */
export class SummaryValidationError extends MonitoringSchemaError {
  constructor(objectName: string, public readonly problems: string[]) {
    super(`Invalid ${objectName}: ${problems.join('; ')}`, 'SUMMARY_INVALID', { objectName, problems });
  }
}

/**
 * Thrown when writing an object that is declared but not enabled.
 */
export class ObjectDisabledError extends MonitoringSchemaError {
  constructor(objectName: string) {
    super(`Schema object '${objectName}' is declared but not enabled`, 'OBJECT_DISABLED', { objectName });
  }
}
