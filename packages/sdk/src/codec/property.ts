/**
 * Typed property values: constructors, inference, ordering and JSON wire form
 */

import type { PropertyInput, PropertyKind, PropertyValue, TableEntity } from "../types.js";

const GUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

/**
 * Constructors for each property kind
 */
export const edm = {
  string(value: string): PropertyValue {
    return { type: "String", value };
  },
  binary(value: Uint8Array): PropertyValue {
    return { type: "Binary", value };
  },
  boolean(value: boolean): PropertyValue {
    return { type: "Boolean", value };
  },
  dateTime(value: Date): PropertyValue {
    if (Number.isNaN(value.getTime())) {
      throw new RangeError("DateTime property requires a valid date");
    }
    return { type: "DateTime", value };
  },
  double(value: number): PropertyValue {
    return { type: "Double", value };
  },
  guid(value: string): PropertyValue {
    if (!GUID_PATTERN.test(value)) {
      throw new RangeError(`Not a 128-bit identifier: ${value}`);
    }
    return { type: "Guid", value: value.toLowerCase() };
  },
  int32(value: number): PropertyValue {
    if (!Number.isInteger(value) || value < INT32_MIN || value > INT32_MAX) {
      throw new RangeError(`Not a 32-bit integer: ${value}`);
    }
    return { type: "Int32", value };
  },
  int64(value: bigint): PropertyValue {
    return { type: "Int64", value };
  },
};

/**
 * Infer the property kind from a plain runtime value
 */
export function toPropertyValue(input: PropertyInput): PropertyValue {
  if (typeof input === "string") return edm.string(input);
  if (typeof input === "boolean") return edm.boolean(input);
  if (typeof input === "number") return edm.double(input);
  if (typeof input === "bigint") return edm.int64(input);
  if (input instanceof Uint8Array) return edm.binary(input);
  if (input instanceof Date) return edm.dateTime(input);
  return input;
}

function compareBytes(a: Uint8Array, b: Uint8Array): number {
  const len = Math.min(a.length, b.length);
  for (let i = 0; i < len; i++) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0);
    if (diff !== 0) return diff < 0 ? -1 : 1;
  }
  return a.length === b.length ? 0 : a.length < b.length ? -1 : 1;
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function compareNumbers(a: number | bigint, b: number | bigint): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Order two property values. Values of different kinds are incomparable (undefined).
 */
export function comparePropertyValues(a: PropertyValue, b: PropertyValue): number | undefined {
  switch (a.type) {
    case "String":
      return b.type === "String" ? compareStrings(a.value, b.value) : undefined;
    case "Guid":
      return b.type === "Guid" ? compareStrings(a.value.toLowerCase(), b.value.toLowerCase()) : undefined;
    case "Binary":
      return b.type === "Binary" ? compareBytes(a.value, b.value) : undefined;
    case "Boolean":
      return b.type === "Boolean" ? compareNumbers(Number(a.value), Number(b.value)) : undefined;
    case "DateTime":
      return b.type === "DateTime" ? compareNumbers(a.value.getTime(), b.value.getTime()) : undefined;
    case "Double":
      return b.type === "Double" ? compareNumbers(a.value, b.value) : undefined;
    case "Int32":
      return b.type === "Int32" ? compareNumbers(a.value, b.value) : undefined;
    case "Int64":
      return b.type === "Int64" ? compareNumbers(a.value, b.value) : undefined;
  }
}

/**
 * JSON-safe form of a property value
 */
export interface WirePropertyValue {
  type: PropertyKind;
  value: string | number | boolean;
}

export function toWire(prop: PropertyValue): WirePropertyValue {
  switch (prop.type) {
    case "Binary":
      return { type: prop.type, value: Buffer.from(prop.value).toString("base64") };
    case "DateTime":
      return { type: prop.type, value: prop.value.toISOString() };
    case "Int64":
      return { type: prop.type, value: prop.value.toString() };
    default:
      return { type: prop.type, value: prop.value };
  }
}

export function fromWire(wire: WirePropertyValue): PropertyValue {
  const { type, value } = wire;
  switch (type) {
    case "String":
      return edm.string(String(value));
    case "Guid":
      return edm.guid(String(value));
    case "Binary":
      return edm.binary(new Uint8Array(Buffer.from(String(value), "base64")));
    case "Boolean":
      return edm.boolean(value === true || value === "true");
    case "DateTime":
      return edm.dateTime(new Date(String(value)));
    case "Double":
      return edm.double(Number(value));
    case "Int32":
      return edm.int32(Number(value));
    case "Int64":
      return edm.int64(BigInt(value));
  }
}

/**
 * UTF-8 size of an entity's JSON wire form, used to pack batches
 */
export function entityByteSize(entity: TableEntity): number {
  const wire: Record<string, unknown> = {
    PartitionKey: entity.partitionKey,
    RowKey: entity.sortKey,
  };
  for (const [name, prop] of Object.entries(entity.properties)) {
    wire[name] = toWire(prop).value;
  }
  return Buffer.byteLength(JSON.stringify(wire), "utf8");
}
