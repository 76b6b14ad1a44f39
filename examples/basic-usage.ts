/**
 * Basic Usage Example
 *
 * Demonstrates table and record operations with Strongbox.
 * Run with: npx tsx examples/basic-usage.ts
 */

import { rm } from "node:fs/promises";
import { asInt, asString, fields, openStore, Value } from "@strongbox/sdk";

async function main(): Promise<void> {
  const dataDir = "./examples-data/basic";
  await rm(dataDir, { recursive: true, force: true });

  console.log("📂 Opening store...");
  const store = await openStore({ dataDir });

  // CREATE
  console.log("\n✏️  Inserting tasks...");
  const first = await store.insert(
    "tasks",
    fields({
      title: Value.string("Write the release notes"),
      status: Value.string("open"),
      priority: Value.int(8),
      tags: Value.array([Value.string("docs")]),
    })
  );
  await store.insert(
    "tasks",
    fields({
      title: Value.string("Rotate the encryption key"),
      status: Value.string("done"),
      priority: Value.int(3),
    })
  );
  console.log(`✅ Inserted ${store.count("tasks")} tasks`);

  // READ
  const task = store.findById("tasks", first);
  if (!task) {
    throw new Error(`Expected ${first} to exist`);
  }
  const title = task.data.get("title");
  console.log(`\n📖 ${first}: ${(title && asString(title)) ?? "(untitled)"}`);

  // UPDATE (replaces the whole field map)
  const updated = new Map(task.data);
  updated.set("status", Value.string("in-progress"));
  store.update("tasks", first, updated);
  console.log("✅ Marked in progress");

  // QUERY
  const urgent = store.findWhere("tasks", (record) => {
    const priority = record.data.get("priority");
    const level = priority === undefined ? undefined : asInt(priority);
    return level !== undefined && level >= 5n;
  });
  console.log(`\n🔍 ${urgent.length} urgent task(s)`);

  // DELETE
  store.delete("tasks", first);
  console.log(`\n🗑️  Deleted ${first}; ${store.count("tasks")} left`);

  // Flushes dirty tables to ./examples-data/basic/tasks.db
  await store.close();
  console.log("\n💾 Saved and closed");
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
