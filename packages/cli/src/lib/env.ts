/**
 * Environment and configuration resolution
 */

import { resolveConfig, type Environment, type StoreConfig } from "@strongbox/sdk";

/**
 * Options accepted on the root command
 */
export type GlobalOptions = {
  dataDir?: string;
  key?: Uint8Array;
  verbose?: boolean;
  quiet?: boolean;
};

/**
 * Build the store config for a command
 * Priority: CLI option > STRONGBOX_* env var > default
 */
export function resolveStoreConfig(globals: GlobalOptions, env: Environment = process.env): StoreConfig {
  return resolveConfig(env, {
    dataDir: globals.dataDir,
    encryptionKey: globals.key,
  });
}

/**
 * Check if metric output is enabled
 */
export function isVerbose(env: Environment = process.env): boolean {
  return env.STRONGBOX_CLI_DEBUG === "1";
}
