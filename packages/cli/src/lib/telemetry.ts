/**
 * Command timing metrics, written to stderr when STRONGBOX_CLI_DEBUG=1
 */

import type { Environment } from "@strongbox/sdk";
import { isVerbose } from "./env.js";
import { writeStderr } from "./render.js";

const SANITIZE_NEWLINES = /[\r\n]+/g;

function sanitizeMetricPart(part: unknown): string {
  return String(part).replace(SANITIZE_NEWLINES, " ").trim();
}

/**
 * Format one metric line: `metric <key> k=v ...`
 */
export function formatMetric(key: string, fields: Record<string, unknown>): string {
  const parts = [`metric ${sanitizeMetricPart(key)}`];
  for (const [k, v] of Object.entries(fields)) {
    parts.push(`${sanitizeMetricPart(k)}=${sanitizeMetricPart(v)}`);
  }
  return parts.join(" ");
}

export function emitMetric(
  key: string,
  fields: Record<string, unknown>,
  env: Environment = process.env
): void {
  if (!isVerbose(env)) {
    return;
  }

  writeStderr(formatMetric(key, fields) + "\n");
}

/**
 * Wrap an async function with timing metrics
 */
export async function withTiming<T>(
  label: string,
  fn: () => Promise<T>,
  env: Environment = process.env
): Promise<T> {
  const start = Date.now();
  let success = false;

  try {
    const result = await fn();
    success = true;
    return result;
  } finally {
    emitMetric(label, { duration_ms: Date.now() - start, success }, env);
  }
}
