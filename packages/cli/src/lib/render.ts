/**
 * Output rendering helpers
 */

import type { RecordFailure, WriteReport } from "@tablemat/sdk";
import type { CliIo } from "./io.js";

type Color = "red" | "green" | "yellow";

/**
 * Print JSON to stdout
 */
export function printJson(io: CliIo, data: unknown, options?: { raw?: boolean }): void {
  const json = JSON.stringify(
    data,
    (_key, value: unknown) => (typeof value === "bigint" ? value.toString() : value),
    options?.raw ? undefined : 2
  );
  io.stdout(json + "\n");
}

/**
 * Print lines to stdout (one per line)
 */
export function printLines(io: CliIo, lines: readonly string[]): void {
  for (const line of lines) {
    io.stdout(line + "\n");
  }
}

/**
 * Apply ANSI color only when the target is a terminal
 */
export function colorize(text: string, color: Color, isTTY: boolean): string {
  if (!isTTY) {
    return text;
  }

  const codes: Record<Color, string> = {
    red: "\x1b[31m",
    green: "\x1b[32m",
    yellow: "\x1b[33m",
  };

  const reset = "\x1b[0m";
  return `${codes[color]}${text}${reset}`;
}

function describeFailure(failure: RecordFailure): string {
  const key =
    failure.partitionKey !== undefined ? ` ${failure.partitionKey}/${failure.sortKey ?? ""}` : "";
  return `value ${failure.valueIndex} [${failure.indexName}]${key}: ${failure.error.message}`;
}

/**
 * One-line summary of a write report
 */
export function summarizeReport(verb: string, report: WriteReport): string {
  const indexes = new Set(report.succeeded.map((ref) => ref.indexName)).size;
  let line = `${verb} ${report.succeeded.length} record(s) across ${indexes} index(es)`;
  if (report.pruned.length > 0) line += `, pruned ${report.pruned.length}`;
  if (report.failed.length > 0) line += `, ${report.failed.length} failed`;
  return line;
}

/**
 * Failed records, one line each, for stderr
 */
export function printFailures(io: CliIo, report: WriteReport): void {
  for (const failure of report.failed) {
    io.stderr(`  ${describeFailure(failure)}\n`);
  }
}
