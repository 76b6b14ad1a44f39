/**
 * A named table: in-memory id → record index backed by one snapshot file
 *
 * Invariants:
 * - The file, when present, decodes to exactly the index as of the last successful save
 * - `dirty` is true iff the index has diverged from the file (a table whose
 *   file does not exist yet starts dirty, so its first save creates it)
 * - Reads and mutations are synchronous and touch memory only; `save` is the only writer
 * - Iteration order of `findAll`/`findWhere` is unspecified
 */

import { join } from "node:path";
import type { SnapshotCipher } from "./cipher.js";
import { decodeSnapshot, encodeSnapshot } from "./codec.js";
import {
  DuplicateIdentifierError,
  RecordNotFoundError,
  SnapshotTooLargeError,
} from "./errors.js";
import { atomicWriteBytes, readBytes, removeFile } from "./io.js";
import { logger } from "./observability/logs.js";
import { StoreRecord, systemClock, type Clock, type RecordView } from "./record.js";
import { validateTableName } from "./validation.js";
import type { Fields } from "./value.js";

export const TABLE_FILE_EXTENSION = ".db";

export interface TableOptions {
  /** Shared store cipher; snapshots are plaintext when omitted */
  cipher?: SnapshotCipher;
  /** Reject saves whose encoded snapshot exceeds this many bytes */
  maxFileSize?: number;
  clock?: Clock;
}

export type RecordPredicate = (record: RecordView) => boolean;

/**
 * Copy of a table's records and dirty flag, taken by `checkpoint()`
 */
export interface TableCheckpoint {
  readonly records: ReadonlyMap<string, StoreRecord>;
  readonly dirty: boolean;
}

/**
 * Canonical snapshot path for a table
 */
export function tableFilePath(directory: string, name: string): string {
  return join(directory, `${name}${TABLE_FILE_EXTENSION}`);
}

export class Table {
  readonly name: string;
  readonly filePath: string;
  readonly #cipher: SnapshotCipher | undefined;
  readonly #maxFileSize: number | undefined;
  readonly #clock: Clock;
  #records = new Map<string, StoreRecord>();
  #dirty = false;
  /** Bumped on every mutation so a save can tell whether it captured the latest state */
  #version = 0;

  private constructor(name: string, directory: string, options: TableOptions) {
    this.name = name;
    this.filePath = tableFilePath(directory, name);
    this.#cipher = options.cipher;
    this.#maxFileSize = options.maxFileSize;
    this.#clock = options.clock ?? systemClock;
  }

  /**
   * Open a table, loading its snapshot if the file exists
   * @throws ConfigurationError for an invalid table name
   * @throws StorageIOError if the file cannot be read
   * @throws EncryptionError if the snapshot fails authentication
   * @throws SerializationError if the snapshot is malformed
   */
  static async open(name: string, directory: string, options: TableOptions = {}): Promise<Table> {
    validateTableName(name);
    const table = new Table(name, directory, options);
    await table.#load();
    return table;
  }

  get dirty(): boolean {
    return this.#dirty;
  }

  get encrypted(): boolean {
    return this.#cipher !== undefined;
  }

  /**
   * Create a record from `data` using the table's clock and insert it
   * @returns The new record's id
   */
  insertData(data: Fields): string {
    return this.insert(StoreRecord.create(data, this.#clock()));
  }

  /**
   * @throws DuplicateIdentifierError if the id is already present (existing record untouched)
   */
  insert(record: StoreRecord): string {
    if (this.#records.has(record.id)) {
      throw new DuplicateIdentifierError(this.name, record.id);
    }

    this.#records.set(record.id, record);
    this.#touch();
    return record.id;
  }

  findById(id: string): RecordView | undefined {
    return this.#records.get(id);
  }

  /**
   * Replace a record's data wholesale
   * @throws RecordNotFoundError if absent
   */
  update(id: string, data: Fields): void {
    const record = this.#records.get(id);
    if (!record) {
      throw new RecordNotFoundError(this.name, id);
    }

    record.replace(data, this.#clock());
    this.#touch();
  }

  /**
   * @throws RecordNotFoundError if absent
   */
  delete(id: string): void {
    if (!this.#records.delete(id)) {
      throw new RecordNotFoundError(this.name, id);
    }
    this.#touch();
  }

  findAll(): RecordView[] {
    return [...this.#records.values()];
  }

  /**
   * Full scan filtered by `predicate`; there is no index acceleration
   */
  findWhere(predicate: RecordPredicate): RecordView[] {
    const out: RecordView[] = [];
    for (const record of this.#records.values()) {
      if (predicate(record)) out.push(record);
    }
    return out;
  }

  count(): number {
    return this.#records.size;
  }

  /**
   * Copy the current records so a later `restore` can undo mutations made after this point
   */
  checkpoint(): TableCheckpoint {
    const records = new Map<string, StoreRecord>();
    for (const record of this.#records.values()) {
      records.set(
        record.id,
        StoreRecord.restore(record.id, record.data, record.createdAt, record.updatedAt)
      );
    }
    return { records, dirty: this.#dirty };
  }

  /**
   * Put back the records and dirty flag captured by `checkpoint`
   */
  restore(checkpoint: TableCheckpoint): void {
    this.#records = new Map(checkpoint.records);
    this.#version++;
    this.#dirty = checkpoint.dirty;
  }

  /**
   * Write the whole index to disk if it changed since the last save.
   *
   * The snapshot is encoded before the first await, so the file always holds
   * a consistent image; `dirty` is only cleared if nothing changed meanwhile.
   *
   * @throws SnapshotTooLargeError if the snapshot exceeds `maxFileSize` (nothing written)
   * @throws StorageIOError if the write fails (previous file left intact)
   */
  async save(): Promise<void> {
    if (!this.#dirty) return;

    const version = this.#version;
    const encoded = encodeSnapshot(this.#records.values());
    const payload = this.#cipher ? this.#cipher.encrypt(encoded) : encoded;

    if (this.#maxFileSize !== undefined && payload.length > this.#maxFileSize) {
      throw new SnapshotTooLargeError(this.name, payload.length, this.#maxFileSize);
    }

    await atomicWriteBytes(this.filePath, payload);

    if (this.#version === version) {
      this.#dirty = false;
    }

    logger.debug("table.save", {
      table: this.name,
      details: { records: this.#records.size, bytes: payload.length, encrypted: this.encrypted },
    });
  }

  /**
   * Delete the backing file; the in-memory index is left as is
   */
  async removeFile(): Promise<void> {
    await removeFile(this.filePath);
    logger.debug("table.drop", { table: this.name });
  }

  #touch(): void {
    this.#version++;
    this.#dirty = true;
  }

  async #load(): Promise<void> {
    const bytes = await readBytes(this.filePath);

    if (bytes === null) {
      // Never saved: memory (empty) already differs from disk (nothing)
      this.#dirty = true;
      return;
    }

    if (bytes.length > 0) {
      const plaintext = this.#cipher ? this.#cipher.decrypt(bytes) : bytes;
      this.#records = decodeSnapshot(plaintext);
    }

    this.#dirty = false;
    logger.debug("table.load", {
      table: this.name,
      details: { records: this.#records.size, bytes: bytes.length },
    });
  }
}
