/**
 * Store service adapter
 * Wraps a @strongbox/sdk Store so that every operation, including its save I/O,
 * runs one at a time
 */

import type { Store } from "@strongbox/sdk";
import { logger } from "../observability/logger.js";
import { Mutex } from "./mutex.js";

export interface StoreServiceOptions {
  /** Save the affected table after every mutating operation */
  autosave?: boolean;
}

export class StoreService {
  readonly #store: Store;
  readonly #mutex = new Mutex();
  readonly #autosave: boolean;

  constructor(store: Store, options: StoreServiceOptions = {}) {
    this.#store = store;
    this.#autosave = options.autosave ?? false;
    logger.info("service.init", {
      data_dir: store.dataDir,
      encrypted: store.encrypted,
      autosave: this.#autosave,
    });
  }

  get autosave(): boolean {
    return this.#autosave;
  }

  /**
   * Run a read inside the critical section
   */
  read<T>(fn: (store: Store) => T): Promise<T> {
    return this.#mutex.withLock(() => fn(this.#store));
  }

  /**
   * Run a mutation of `table` inside the critical section.
   * With autosave, only that table is saved; if the save fails the mutation
   * is undone and the error propagates.
   */
  write<T>(table: string, fn: (store: Store) => Promise<T> | T): Promise<T> {
    return this.#mutex.withLock(() =>
      this.#autosave ? this.#store.applyAndSave(table, fn) : fn(this.#store)
    );
  }

  /**
   * Save every dirty table
   */
  save(): Promise<void> {
    return this.#mutex.withLock(() => this.#store.saveAll());
  }

  /**
   * Flush every dirty table and release the store
   */
  close(): Promise<void> {
    return this.#mutex.withLock(async () => {
      await this.#store.close();
      logger.info("service.close", { data_dir: this.#store.dataDir });
    });
  }
}
