/**
 * Demo data set: a `users` table with two records and a `products` table with one
 */

import type { StoreConfig } from "./config.js";
import { openStore } from "./store.js";
import type { Store } from "./types.js";
import { fields, Value } from "./value.js";

export async function createSampleStore(config: StoreConfig): Promise<Store> {
  const store = await openStore(config);

  await store.createTable("users");
  await store.insert(
    "users",
    fields({
      name: Value.string("Alice"),
      age: Value.int(25),
      email: Value.string("alice@example.com"),
    })
  );
  await store.insert(
    "users",
    fields({
      name: Value.string("Bob"),
      age: Value.int(30),
      email: Value.string("bob@example.com"),
    })
  );

  await store.createTable("products");
  await store.insert(
    "products",
    fields({
      name: Value.string("Laptop"),
      price: Value.float(5999.99),
      category: Value.string("electronics"),
    })
  );

  await store.saveAll();
  return store;
}
