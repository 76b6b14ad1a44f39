/**
 * Store lifecycle for commands: open, act, close (flushing dirty tables)
 */

import { logger, withStore, type Environment, type Store } from "@strongbox/sdk";
import { resolveStoreConfig, type GlobalOptions } from "./env.js";
import { writeStderr } from "./render.js";

/**
 * Route SDK logs to stderr so stdout carries only command output;
 * they are shown only with --verbose
 */
export function configureSdkLogging(verbose: boolean): void {
  logger.setSink((_level, line) => writeStderr(line + "\n"));
  logger.setEnabled(verbose);
}

export function resetSdkLogging(): void {
  logger.setSink(null);
  logger.setEnabled(true);
}

export async function runWithStore<T>(
  globals: GlobalOptions,
  env: Environment,
  fn: (store: Store) => Promise<T> | T
): Promise<T> {
  return withStore(resolveStoreConfig(globals, env), async (store) => fn(store));
}
