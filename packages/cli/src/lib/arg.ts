/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";
import { edm, type PropertyValue, type SaveKind } from "@tablemat/sdk";
import { CliError } from "./errors.js";

/**
 * Parse a non-negative integer argument
 */
export function parseNonNegativeInt(value: string, name: string): number {
  const trimmed = value.trim();

  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer`);
  }

  const parsed = Number.parseInt(trimmed, 10);

  if (parsed > 10000) {
    throw new InvalidArgumentError(`${name} must be <= 10000`);
  }

  return parsed;
}

/**
 * Parse JSON with descriptive error messages. Used on command input, so failures are
 * CliErrors rather than option-parsing errors.
 */
export function parseJson(value: string, source: string): unknown {
  try {
    // Strip BOM if present
    const cleaned = value.charCodeAt(0) === 0xfeff ? value.slice(1) : value;
    return JSON.parse(cleaned);
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new CliError(`Invalid JSON in ${source}: ${err.message}`, { cause: err });
    }
    throw err;
  }
}

const WRITE_MODES = {
  insert: "insert",
  upsert: "insertOrReplace",
  merge: "insertOrMerge",
  replace: "replace",
} as const satisfies Record<string, SaveKind>;

export type WriteMode = keyof typeof WRITE_MODES;

function isWriteMode(value: string): value is WriteMode {
  return Object.hasOwn(WRITE_MODES, value);
}

/**
 * Parse --mode into the write kind it stands for
 */
export function parseWriteMode(value: string): SaveKind {
  if (!isWriteMode(value)) {
    throw new InvalidArgumentError(`--mode must be one of ${Object.keys(WRITE_MODES).join(", ")}`);
  }
  return WRITE_MODES[value];
}

export interface WhereClause {
  property: string;
  raw: string;
}

/**
 * Parse --where "prop=value"; the value may itself contain "="
 */
export function parseWhere(value: string): WhereClause {
  const eq = value.indexOf("=");
  if (eq <= 0) {
    throw new InvalidArgumentError("--where must look like <property>=<value>");
  }
  return { property: value.slice(0, eq), raw: value.slice(eq + 1) };
}

const VALUE_KINDS = ["string", "int32", "int64", "double", "boolean", "guid", "datetime"] as const;

export type ValueKind = (typeof VALUE_KINDS)[number];

function isValueKind(value: string): value is ValueKind {
  return VALUE_KINDS.some((kind) => kind === value);
}

/**
 * Parse --type for the --where comparison value
 */
export function parseValueKind(value: string): ValueKind {
  const lower = value.toLowerCase();
  if (!isValueKind(lower)) {
    throw new InvalidArgumentError(`--type must be one of ${VALUE_KINDS.join(", ")}`);
  }
  return lower;
}

/**
 * Build a typed property value from command-line text
 */
export function toTypedValue(raw: string, kind: ValueKind): PropertyValue {
  try {
    switch (kind) {
      case "string":
        return edm.string(raw);
      case "int32":
        return edm.int32(Number(raw));
      case "int64":
        return edm.int64(BigInt(raw));
      case "double": {
        const n = Number(raw);
        if (raw.trim() === "" || Number.isNaN(n)) throw new RangeError(`Not a number: ${raw}`);
        return edm.double(n);
      }
      case "boolean":
        if (raw !== "true" && raw !== "false") throw new RangeError(`Not a boolean: ${raw}`);
        return edm.boolean(raw === "true");
      case "guid":
        return edm.guid(raw);
      case "datetime":
        return edm.dateTime(new Date(raw));
    }
  } catch (err) {
    if (err instanceof RangeError || err instanceof SyntaxError) {
      throw new CliError(`Invalid ${kind} value for --where: ${err.message}`, { cause: err });
    }
    throw err;
  }
}
