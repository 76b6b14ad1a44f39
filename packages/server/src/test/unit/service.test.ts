/**
 * Unit tests for the mutex and the store service
 */

import { describe, it, expect } from "vitest";
import { readdir } from "node:fs/promises";
import { withTempStore } from "@strongbox/testkit";
import { fields, SnapshotTooLargeError, Value } from "@strongbox/sdk";
import { Mutex } from "../../service/mutex.js";
import { StoreService } from "../../service/store-service.js";

const tick = (): Promise<void> => new Promise((resolve) => setTimeout(resolve, 1));

describe("Mutex", () => {
  it("should run critical sections one at a time in arrival order", async () => {
    const mutex = new Mutex();
    const events: string[] = [];

    const task = (name: string) =>
      mutex.withLock(async () => {
        events.push(`${name}:start`);
        await tick();
        events.push(`${name}:end`);
      });

    await Promise.all([task("a"), task("b"), task("c")]);

    expect(events).toEqual(["a:start", "a:end", "b:start", "b:end", "c:start", "c:end"]);
  });

  it("should release the lock when the section throws", async () => {
    const mutex = new Mutex();

    await expect(
      mutex.withLock(() => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    expect(mutex.locked).toBe(false);
    await expect(mutex.withLock(() => 42)).resolves.toBe(42);
  });
});

describe("StoreService", () => {
  it("should not save without autosave", async () => {
    await withTempStore(async (store, dataDir) => {
      const service = new StoreService(store);

      await service.write("users", (s) => s.insert("users", fields({ name: Value.string("a") })));

      expect(service.autosave).toBe(false);
      expect(await service.read((s) => s.count("users"))).toBe(1);
      expect(await readdir(dataDir)).toEqual([]);
    });
  });

  it("should save after each write with autosave", async () => {
    await withTempStore(async (store, dataDir) => {
      const service = new StoreService(store, { autosave: true });

      await service.write("users", (s) => s.insert("users", fields({ name: Value.string("a") })));

      expect(await readdir(dataDir)).toEqual(["users.db"]);
    });
  });

  it("should undo a mutation whose autosave fails", async () => {
    await withTempStore(
      async (store, dataDir) => {
        const service = new StoreService(store, { autosave: true });

        await expect(
          service.write("big", (s) => s.insert("big", fields({ blob: Value.string("x".repeat(500)) })))
        ).rejects.toThrow(SnapshotTooLargeError);

        expect(store.hasTable("big")).toBe(false);
        expect(await readdir(dataDir)).toEqual([]);
      },
      { maxFileSize: 200 }
    );
  });

  it("should save every table on request", async () => {
    await withTempStore(async (store, dataDir) => {
      const service = new StoreService(store);
      await service.write("a", (s) => s.insert("a", fields({})));
      await service.write("b", (s) => s.insert("b", fields({})));

      await service.save();

      expect((await readdir(dataDir)).sort()).toEqual(["a.db", "b.db"]);
    });
  });

  it("should close the underlying store", async () => {
    await withTempStore(async (store) => {
      const service = new StoreService(store);

      await service.close();

      expect(store.closed).toBe(true);
    });
  });
});
