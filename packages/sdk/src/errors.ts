/**
 * Error types for Strongbox operations
 *
 * Invariants:
 * - Every failure raised by the store is a StrongboxError subclass
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 */

/**
 * Base class for all Strongbox errors
 */
export abstract class StrongboxError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a directory or table file cannot be read, written or removed
 */
export class StorageIOError extends StrongboxError {
  readonly code = "E_IO";

  constructor(
    public readonly path: string,
    operation: string,
    options?: ErrorOptions
  ) {
    super(`I/O error during ${operation}: ${path}`, options);
  }
}

/**
 * Thrown when a snapshot or value payload is malformed
 */
export class SerializationError extends StrongboxError {
  readonly code = "E_SERIALIZATION";

  constructor(reason: string, options?: ErrorOptions) {
    super(`Serialization failed: ${reason}`, options);
  }
}

/**
 * Thrown for a bad key length, or when a ciphertext fails authentication.
 * A wrong key and a tampered buffer are indistinguishable here.
 */
export class EncryptionError extends StrongboxError {
  readonly code = "E_ENCRYPTION";

  constructor(reason: string, options?: ErrorOptions) {
    super(`Encryption error: ${reason}`, options);
  }
}

export class TableNotFoundError extends StrongboxError {
  readonly code = "E_TABLE_NOT_FOUND";

  constructor(
    public readonly table: string,
    options?: ErrorOptions
  ) {
    super(`Table not found: ${table}`, options);
  }
}

export class RecordNotFoundError extends StrongboxError {
  readonly code = "E_RECORD_NOT_FOUND";

  constructor(
    public readonly table: string,
    public readonly id: string,
    options?: ErrorOptions
  ) {
    super(`Record not found: ${table}/${id}`, options);
  }
}

export class DuplicateIdentifierError extends StrongboxError {
  readonly code = "E_DUPLICATE_ID";

  constructor(
    public readonly table: string,
    public readonly id: string,
    options?: ErrorOptions
  ) {
    super(`Duplicate identifier in table ${table}: ${id}`, options);
  }
}

/**
 * Thrown for invalid configuration values or table names
 */
export class ConfigurationError extends StrongboxError {
  readonly code = "E_CONFIG";

  constructor(reason: string, options?: ErrorOptions) {
    super(`Configuration error: ${reason}`, options);
  }
}

/**
 * Thrown when a Value cannot be constructed (out-of-range integer, nesting too deep)
 */
export class ValueError extends StrongboxError {
  readonly code = "E_VALUE";

  constructor(reason: string, options?: ErrorOptions) {
    super(`Invalid value: ${reason}`, options);
  }
}

/**
 * Thrown when an encoded snapshot exceeds the configured maximum file size
 */
export class SnapshotTooLargeError extends StrongboxError {
  readonly code = "E_TOO_LARGE";

  constructor(
    public readonly table: string,
    public readonly size: number,
    public readonly limit: number,
    options?: ErrorOptions
  ) {
    super(`Snapshot for table ${table} is ${size} bytes, exceeding limit of ${limit} bytes`, options);
  }
}

export class StoreClosedError extends StrongboxError {
  readonly code = "E_CLOSED";

  constructor(options?: ErrorOptions) {
    super("Store is closed", options);
  }
}
