/**
 * JSON Schemas for structures this library persists, and their compiled validators
 *
 * Schema ids follow schema/<kind>@<major>.
 */

import { Ajv, type ErrorObject, type ValidateFunction } from "ajv";
import type { WirePropertyValue } from "../codec/property.js";

/**
 * Catalog entry payload stored under the reserved metadata key
 */
export interface CatalogPayload {
  partitionKeys: string[];
  version: number;
}

/**
 * One row of a partition file
 */
export interface StoredRow {
  properties: Record<string, WirePropertyValue>;
  timestamp: string;
  etag: string;
}

/**
 * Partition file written by the file backend
 */
export interface PartitionFile {
  partitionKey: string;
  rows: Record<string, StoredRow>;
}

export const catalogEntrySchema = {
  $id: "schema/catalog-entry@1",
  type: "object",
  required: ["partitionKeys", "version"],
  additionalProperties: false,
  properties: {
    partitionKeys: {
      type: "array",
      items: { type: "string" },
      uniqueItems: true,
    },
    version: { type: "integer", minimum: 0 },
  },
} as const;

export const partitionFileSchema = {
  $id: "schema/partition-file@1",
  type: "object",
  required: ["partitionKey", "rows"],
  additionalProperties: false,
  properties: {
    partitionKey: { type: "string" },
    rows: {
      type: "object",
      additionalProperties: {
        type: "object",
        required: ["properties", "timestamp", "etag"],
        additionalProperties: false,
        properties: {
          timestamp: { type: "string" },
          etag: { type: "string" },
          properties: {
            type: "object",
            additionalProperties: {
              type: "object",
              required: ["type", "value"],
              additionalProperties: false,
              properties: {
                type: {
                  type: "string",
                  enum: ["String", "Binary", "Boolean", "DateTime", "Double", "Guid", "Int32", "Int64"],
                },
                value: { type: ["string", "number", "boolean"] },
              },
            },
          },
        },
      },
    },
  },
} as const;

const ajv = new Ajv({ strict: true, allErrors: true, allowUnionTypes: true });

export const validateCatalogPayload: ValidateFunction<CatalogPayload> =
  ajv.compile<CatalogPayload>(catalogEntrySchema);

export const validatePartitionFile: ValidateFunction<PartitionFile> =
  ajv.compile<PartitionFile>(partitionFileSchema);

/**
 * Render ajv errors as "<pointer> <message>" lines
 */
export function describeErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map((err) => {
    const pointer = err.instancePath || "/";
    if (err.keyword === "required" && "missingProperty" in err.params) {
      return `${pointer} is missing required property: ${String(err.params.missingProperty)}`;
    }
    return `${pointer} ${err.message ?? "is invalid"}`;
  });
}
