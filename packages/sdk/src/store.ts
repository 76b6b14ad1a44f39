/**
 * Main store implementation
 */

import * as path from "node:path";
import { SnapshotCipher } from "./cipher.js";
import { validateConfig, type StoreConfig } from "./config.js";
import { StoreClosedError, TableNotFoundError } from "./errors.js";
import { ensureDirectory, listFiles } from "./io.js";
import { logger } from "./observability/logs.js";
import { systemClock, type Clock, type RecordView } from "./record.js";
import { Table, TABLE_FILE_EXTENSION, type RecordPredicate } from "./table.js";
import type { Store } from "./types.js";
import type { Fields } from "./value.js";

/**
 * Strongbox store: one Table per `<name>.db` file in the data directory
 *
 * A single SnapshotCipher is built from the configured key and shared by
 * reference with every table.
 *
 * @example
 * ```typescript
 * const store = await openStore({ dataDir: "./data" });
 *
 * const id = await store.insert("users", fields({ name: Value.string("Ada") }));
 * store.update("users", id, fields({ name: Value.string("Ada Lovelace") }));
 *
 * await store.close(); // flushes dirty tables
 * ```
 */
class StrongboxStore implements Store {
  readonly dataDir: string;
  readonly #cipher: SnapshotCipher | undefined;
  readonly #maxFileSize: number | undefined;
  readonly #clock: Clock;
  #tables = new Map<string, Table>();
  /** Tables being opened, so concurrent first inserts share one instance */
  #opening = new Map<string, Promise<Table>>();
  #closed = false;

  constructor(config: StoreConfig) {
    this.dataDir = path.resolve(config.dataDir);
    this.#cipher = config.encryptionKey ? new SnapshotCipher(config.encryptionKey) : undefined;
    this.#maxFileSize = config.maxFileSize;
    this.#clock = config.clock ?? systemClock;
  }

  get encrypted(): boolean {
    return this.#cipher !== undefined;
  }

  get closed(): boolean {
    return this.#closed;
  }

  /**
   * Create the data directory and load every table file in it.
   * Any table that fails to load fails the whole open.
   */
  async init(): Promise<void> {
    await ensureDirectory(this.dataDir);

    const files = await listFiles(this.dataDir, TABLE_FILE_EXTENSION);
    for (const file of files) {
      const name = file.slice(0, -TABLE_FILE_EXTENSION.length);

      try {
        this.#tables.set(name, await this.#openTable(name));
      } catch (err) {
        logger.error("store.open.failed", {
          table: name,
          message: err instanceof Error ? err.message : String(err),
        });
        throw err;
      }
    }

    logger.debug("store.open", {
      details: { dataDir: this.dataDir, tables: this.#tables.size, encrypted: this.encrypted },
    });
  }

  async createTable(name: string): Promise<void> {
    this.#assertOpen();
    await this.#ensureTable(name);
  }

  async dropTable(name: string): Promise<void> {
    this.#assertOpen();
    const table = this.#tables.get(name);
    if (!table) return;

    await table.removeFile();
    this.#tables.delete(name);
  }

  hasTable(name: string): boolean {
    return this.#tables.has(name);
  }

  async insert(table: string, data: Fields): Promise<string> {
    this.#assertOpen();
    const target = await this.#ensureTable(table);
    return target.insertData(data);
  }

  findById(table: string, id: string): RecordView | undefined {
    return this.#getTable(table).findById(id);
  }

  update(table: string, id: string, data: Fields): void {
    this.#getTable(table).update(id, data);
  }

  delete(table: string, id: string): void {
    this.#getTable(table).delete(id);
  }

  findAll(table: string): RecordView[] {
    return this.#getTable(table).findAll();
  }

  findWhere(table: string, predicate: RecordPredicate): RecordView[] {
    return this.#getTable(table).findWhere(predicate);
  }

  count(table: string): number {
    return this.#getTable(table).count();
  }

  listTables(): string[] {
    this.#assertOpen();
    return [...this.#tables.keys()].sort();
  }

  async saveAll(): Promise<void> {
    this.#assertOpen();
    for (const table of this.#tables.values()) {
      await table.save();
    }
  }

  async applyAndSave<T>(name: string, fn: (store: Store) => Promise<T> | T): Promise<T> {
    this.#assertOpen();
    const existing = this.#tables.get(name);
    const checkpoint = existing?.checkpoint();

    try {
      const result = await fn(this);
      await this.#tables.get(name)?.save();
      return result;
    } catch (err) {
      if (existing && checkpoint) {
        existing.restore(checkpoint);
      } else {
        // Created by `fn`; it has no file yet
        this.#tables.delete(name);
      }
      logger.debug("store.apply.rollback", {
        table: name,
        message: err instanceof Error ? err.message : String(err),
      });
      throw err;
    }
  }

  async close(): Promise<void> {
    if (this.#closed) return;

    await this.saveAll();
    this.#closed = true;
    this.#tables.clear();
    logger.debug("store.close", { details: { dataDir: this.dataDir } });
  }

  #assertOpen(): void {
    if (this.#closed) {
      throw new StoreClosedError();
    }
  }

  #getTable(name: string): Table {
    this.#assertOpen();
    const table = this.#tables.get(name);
    if (!table) {
      throw new TableNotFoundError(name);
    }
    return table;
  }

  #openTable(name: string): Promise<Table> {
    return Table.open(name, this.dataDir, {
      cipher: this.#cipher,
      maxFileSize: this.#maxFileSize,
      clock: this.#clock,
    });
  }

  async #ensureTable(name: string): Promise<Table> {
    const existing = this.#tables.get(name);
    if (existing) return existing;

    let pending = this.#opening.get(name);
    if (!pending) {
      pending = this.#openTable(name);
      this.#opening.set(name, pending);
    }

    try {
      const table = await pending;
      if (!this.#closed && !this.#tables.has(name)) {
        this.#tables.set(name, table);
      }
      return this.#getTable(name);
    } finally {
      this.#opening.delete(name);
    }
  }
}

/**
 * Open a store over `config.dataDir`
 *
 * Creates the directory if needed and loads every `*.db` table file.
 *
 * @throws ConfigurationError for an invalid config
 * @throws EncryptionError if any table fails authentication (wrong key or tampering)
 * @throws SerializationError if any table file is malformed
 * @throws StorageIOError if the directory or a file cannot be read
 */
export async function openStore(config: StoreConfig): Promise<Store> {
  validateConfig(config);
  const store = new StrongboxStore(config);
  await store.init();
  return store;
}

/**
 * Open a store, run `fn`, and always close it.
 *
 * A close failure (e.g. a failed flush) is rethrown unless `fn` itself failed,
 * in which case `fn`'s error wins and the close failure is logged.
 */
export async function withStore<T>(
  config: StoreConfig,
  fn: (store: Store) => Promise<T>
): Promise<T> {
  const store = await openStore(config);

  let result: T;
  try {
    result = await fn(store);
  } catch (err) {
    try {
      await store.close();
    } catch (closeErr) {
      logger.error("store.close.failed", {
        message: closeErr instanceof Error ? closeErr.message : String(closeErr),
      });
    }
    throw err;
  }

  await store.close();
  return result;
}
