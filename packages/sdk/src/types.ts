/**
 * Core types for Strongbox
 */

import type { RecordView } from "./record.js";
import type { RecordPredicate } from "./table.js";
import type { Fields } from "./value.js";

/**
 * Registry of tables under one data directory.
 *
 * Record reads and mutations are synchronous and in-memory; only
 * table creation, drops, saves and close touch the disk. Mutations are
 * visible in memory only until the next `saveAll` or `close`.
 */
export interface Store {
  /** Absolute data directory */
  readonly dataDir: string;

  /** True when snapshots are encrypted */
  readonly encrypted: boolean;

  /** True once `close` has completed */
  readonly closed: boolean;

  /**
   * Create a table (no-op if it already exists)
   * @throws ConfigurationError for an invalid name
   */
  createTable(name: string): Promise<void>;

  /**
   * Remove a table and its file (no-op if the table does not exist)
   */
  dropTable(name: string): Promise<void>;

  hasTable(name: string): boolean;

  /**
   * Insert a new record, creating the table on first use
   * @returns The generated record id
   */
  insert(table: string, data: Fields): Promise<string>;

  /**
   * @returns The record, or undefined if the id is absent
   * @throws TableNotFoundError
   */
  findById(table: string, id: string): RecordView | undefined;

  /**
   * Replace a record's data wholesale
   * @throws TableNotFoundError
   * @throws RecordNotFoundError
   */
  update(table: string, id: string, data: Fields): void;

  /**
   * @throws TableNotFoundError
   * @throws RecordNotFoundError
   */
  delete(table: string, id: string): void;

  /**
   * All records, in unspecified order
   * @throws TableNotFoundError
   */
  findAll(table: string): RecordView[];

  /**
   * Records matching `predicate` (full scan), in unspecified order
   * @throws TableNotFoundError
   */
  findWhere(table: string, predicate: RecordPredicate): RecordView[];

  /**
   * @throws TableNotFoundError
   */
  count(table: string): number;

  /**
   * Table names, sorted
   */
  listTables(): string[];

  /**
   * Save every dirty table; the first failure aborts and is rethrown.
   * Tables saved before the failure stay saved.
   */
  saveAll(): Promise<void>;

  /**
   * Run a mutation of one table, then save that table.
   * If `fn` or the save fails, the table's records are put back as they were
   * before the call (a table created by `fn` is removed) and the error is rethrown.
   * Other tables are neither saved nor rolled back.
   */
  applyAndSave<T>(table: string, fn: (store: Store) => Promise<T> | T): Promise<T>;

  /**
   * Flush every dirty table once, then release the store.
   * If flushing fails the store stays open so the close can be retried.
   */
  close(): Promise<void>;
}
