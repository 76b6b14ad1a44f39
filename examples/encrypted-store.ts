/**
 * Encrypted Store Example
 *
 * Every table file is sealed with AES-256-GCM when a key is configured.
 * Run with: npx tsx examples/encrypted-store.ts
 */

import { readFile, rm } from "node:fs/promises";
import {
  EncryptionError,
  fields,
  formatKey,
  openStore,
  SnapshotCipher,
  tableFilePath,
  Value,
  withStore,
} from "@strongbox/sdk";

async function main(): Promise<void> {
  const dataDir = "./examples-data/encrypted";
  await rm(dataDir, { recursive: true, force: true });

  const key = SnapshotCipher.generateKey();
  console.log(`🔑 Key: ${formatKey(key)}`);

  await withStore({ dataDir, encryptionKey: key }, async (store) => {
    await store.insert("secrets", fields({ service: Value.string("mail"), pin: Value.string("0000") }));
  });

  const raw = await readFile(tableFilePath(dataDir, "secrets"));
  console.log(`📦 secrets.db is ${raw.length} bytes of ciphertext`);

  const count = await withStore({ dataDir, encryptionKey: key }, async (store) => store.count("secrets"));
  console.log(`✅ Reopened with the same key: ${count} record(s)`);

  try {
    await openStore({ dataDir, encryptionKey: new Uint8Array(32) });
  } catch (err) {
    if (!(err instanceof EncryptionError)) {
      throw err;
    }
    console.log(`🚫 Wrong key rejected: ${err.message}`);
  }
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
