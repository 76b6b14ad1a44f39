/**
 * Strongbox SDK
 *
 * An embedded document store: named tables of typed records, persisted as one
 * optionally encrypted snapshot file per table
 */

// Re-export types
export type { Store } from "./types.js";
export type { StoreConfig, Environment } from "./config.js";
export type { Clock, RecordView } from "./record.js";
export type { TableOptions, TableCheckpoint, RecordPredicate } from "./table.js";
export type {
  Fields,
  ValueKind,
  NullValue,
  BoolValue,
  IntValue,
  FloatValue,
  StringValue,
  BytesValue,
  ArrayValue,
  ObjectValue,
} from "./value.js";
export type { JsonValue, RecordJson } from "./value-json.js";
export type { LogLevel, LogEntry, LogSink } from "./observability/logs.js";

// Value model
export {
  Value,
  MAX_VALUE_DEPTH,
  fields,
  valueDepth,
  valueEquals,
  fieldsEqual,
  isNull,
  asBool,
  asInt,
  asFloat,
  asString,
  asBytes,
  asArray,
  asObject,
} from "./value.js";
export {
  valueFromJson,
  valueToJson,
  fieldsFromJson,
  fieldsToJson,
  recordToJson,
} from "./value-json.js";

// Records, tables, store
export { StoreRecord, systemClock } from "./record.js";
export { Table, tableFilePath, TABLE_FILE_EXTENSION } from "./table.js";
export { openStore, withStore } from "./store.js";
export { createSampleStore } from "./sample.js";

// Encryption and snapshot encoding
export { SnapshotCipher, KEY_LENGTH, NONCE_LENGTH, TAG_LENGTH } from "./cipher.js";
export {
  encodeSnapshot,
  decodeSnapshot,
  encodeValue,
  decodeValue,
  SNAPSHOT_FORMAT_VERSION,
} from "./codec.js";

// Configuration and validation
export {
  resolveConfig,
  resolveDataDir,
  validateConfig,
  parseKey,
  formatKey,
  parseMaxFileSize,
  DEFAULT_DATA_DIR,
  DEFAULT_MAX_FILE_SIZE,
} from "./config.js";
export { validateTableName, isValidTableName, MAX_TABLE_NAME_LENGTH } from "./validation.js";

// I/O operations
export { atomicWriteBytes, readBytes, removeFile, ensureDirectory, listFiles } from "./io.js";

// Logging
export { logger } from "./observability/logs.js";

// Errors
export {
  StrongboxError,
  StorageIOError,
  SerializationError,
  EncryptionError,
  TableNotFoundError,
  RecordNotFoundError,
  DuplicateIdentifierError,
  ConfigurationError,
  ValueError,
  SnapshotTooLargeError,
  StoreClosedError,
} from "./errors.js";
