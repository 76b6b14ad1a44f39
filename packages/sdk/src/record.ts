/**
 * Records: identified, timestamped field maps
 *
 * Invariants:
 * - `id` is assigned once at creation and never changes
 * - `createdAt <= updatedAt` at all times
 * - `data` is replaced wholesale by `replace`, never merged
 */

import { randomUUID } from "node:crypto";
import { ValueError } from "./errors.js";
import type { Fields } from "./value.js";

/**
 * Source of timestamps in whole seconds since the Unix epoch
 */
export type Clock = () => number;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

/**
 * Read-only view of a record handed out by tables and stores
 */
export interface RecordView {
  readonly id: string;
  readonly data: Fields;
  readonly createdAt: number;
  readonly updatedAt: number;
}

function assertTimestamp(value: number, label: string): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new ValueError(`${label} must be a non-negative integer, got ${value}`);
  }
}

export class StoreRecord implements RecordView {
  readonly id: string;
  readonly createdAt: number;
  #data: Fields;
  #updatedAt: number;

  private constructor(id: string, data: Fields, createdAt: number, updatedAt: number) {
    this.id = id;
    this.#data = new Map(data);
    this.createdAt = createdAt;
    this.#updatedAt = updatedAt;
  }

  /**
   * Create a record with a fresh random id
   */
  static create(data: Fields, now: number = systemClock()): StoreRecord {
    assertTimestamp(now, "createdAt");
    return new StoreRecord(randomUUID(), data, now, now);
  }

  /**
   * Rebuild a record read back from a snapshot
   * @throws ValueError if the timestamps are invalid or out of order
   */
  static restore(id: string, data: Fields, createdAt: number, updatedAt: number): StoreRecord {
    if (!id) {
      throw new ValueError("record id must be a non-empty string");
    }
    assertTimestamp(createdAt, "createdAt");
    assertTimestamp(updatedAt, "updatedAt");
    if (createdAt > updatedAt) {
      throw new ValueError(`record ${id} has createdAt ${createdAt} after updatedAt ${updatedAt}`);
    }
    return new StoreRecord(id, data, createdAt, updatedAt);
  }

  get data(): Fields {
    return this.#data;
  }

  get updatedAt(): number {
    return this.#updatedAt;
  }

  /**
   * Replace the entire field map and bump `updatedAt`.
   * `updatedAt` never moves backwards, even if the clock does.
   */
  replace(data: Fields, now: number = systemClock()): void {
    assertTimestamp(now, "updatedAt");
    this.#data = new Map(data);
    this.#updatedAt = Math.max(now, this.#updatedAt);
  }
}
