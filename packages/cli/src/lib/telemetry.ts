/**
 * Telemetry and observability helpers
 */

import type { CliIo } from "./io.js";

const SANITIZE_NEWLINES = /[\r\n]+/g;

function sanitizeMetricPart(part: unknown): string {
  return String(part).replace(SANITIZE_NEWLINES, " ").trim();
}

/**
 * Emit a metric line to stderr when verbose
 */
export function emitMetric(io: CliIo, verbose: boolean, key: string, fields: Record<string, unknown>): void {
  if (!verbose) {
    return;
  }

  const parts = [`metric ${sanitizeMetricPart(key)}`];
  for (const [k, v] of Object.entries(fields)) {
    parts.push(`${sanitizeMetricPart(k)}=${sanitizeMetricPart(v)}`);
  }

  io.stderr(parts.join(" ") + "\n");
}

/**
 * Wrap an async function with timing metrics
 */
export async function withTiming<T>(
  io: CliIo,
  verbose: boolean,
  label: string,
  fn: () => Promise<T>
): Promise<T> {
  const start = Date.now();
  let success = false;

  try {
    const result = await fn();
    success = true;
    return result;
  } finally {
    emitMetric(io, verbose, label, {
      duration_ms: Date.now() - start,
      success,
    });
  }
}
