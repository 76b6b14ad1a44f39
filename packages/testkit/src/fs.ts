/**
 * File system test utilities
 */

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { openStore } from "@strongbox/sdk";
import type { Store, StoreConfig } from "@strongbox/sdk";

/**
 * Fixed placeholder key for encrypted-store tests
 */
export const TEST_KEY_HEX = "0123456789abcdef".repeat(4);

/**
 * Create a unique temporary directory for testing
 * @param prefix - Prefix for the temp directory (default: "strongbox-test-")
 * @returns Absolute path to temp directory
 */
export async function createTempStoreRoot(prefix = "strongbox-test-"): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

/**
 * Remove a directory recursively
 * @param path - Path to remove
 */
export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Execute a function with a temporary store, cleaning up after
 * @param fn - Function to execute with store
 * @param config - Optional store config (dataDir will be overridden)
 * @returns Result of fn
 */
export async function withTempStore<T>(
  fn: (store: Store, dataDir: string) => Promise<T>,
  config?: Partial<StoreConfig>
): Promise<T> {
  const dataDir = await createTempStoreRoot();
  let store: Store;

  try {
    store = await openStore({ ...config, dataDir });
  } catch (err) {
    await removeDir(dataDir);
    throw err;
  }

  let fnError: unknown;
  try {
    return await fn(store, dataDir);
  } catch (err) {
    fnError = err;
    throw err;
  } finally {
    let cleanupError: unknown;
    try {
      await store.close();
    } catch (err) {
      cleanupError = err;
    }
    try {
      await removeDir(dataDir);
    } catch (err) {
      if (!cleanupError) {
        cleanupError = err;
      }
    }
    if (!fnError && cleanupError) {
      // eslint-disable-next-line no-unsafe-finally
      throw cleanupError;
    }
  }
}

