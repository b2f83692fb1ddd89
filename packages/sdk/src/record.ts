/**
 * Mapping between materialized records and table entities
 *
 * Entity layout:
 * - E01..Enn      slot payloads of the serialized domain value
 * - IndexedProperty  canonical JSON of { value: <indexed value> }
 * - DomainObjectType configured type name
 * - SourceIndex      name of the producing index definition
 */

import { CATALOG_PARTITION_KEY } from "./catalog.js";
import { MAX_CHUNK_SIZE, trySplit, isSlotKey, join, type FatEntityLimits } from "./codec/fat-entity.js";
import { edm } from "./codec/property.js";
import { keyEncoder } from "./codec/key-encoder.js";
import { stableStringify } from "./format.js";
import type { IndexDefinition } from "./index-definition.js";
import type {
  FatEntityChunk,
  MaterializedRecord,
  PropertyValue,
  TableEntity,
  TableRecord,
  ValueDecoder,
  ValueSerializer,
} from "./types.js";
import { InvalidKeyError, MalformedRecordError } from "./errors.js";
import { validateEncodedKey } from "./validation.js";

export const PROP_INDEXED_VALUE = "IndexedProperty";
export const PROP_TYPE_NAME = "DomainObjectType";
export const PROP_SOURCE_INDEX = "SourceIndex";

/**
 * Serialized form of an indexed value, as stored and as compared by queries
 */
export function serializeIndexedValue(value: unknown): string {
  return stableStringify({ value: value === undefined ? null : value });
}

/**
 * Outcome of encoding one value for one index. `payload` is the text that did not fit:
 * the serialized value, or the serialized indexed value when that overflows its cell.
 */
export type EncodeResult =
  | { fits: true; record: MaterializedRecord }
  | { fits: false; payload: string; capacity: number };

export interface MaterializeContext {
  typeName: string;
  limits?: FatEntityLimits;
}

/**
 * Build the record an index definition derives from a value.
 * `serialized` is the value's serializer output, computed once per value.
 */
export function materializeRecord<T>(
  value: T,
  serialized: string,
  definition: IndexDefinition<T>,
  ctx: MaterializeContext
): EncodeResult {
  const split = trySplit(serialized, ctx.limits);
  if (!split.fits) {
    return { fits: false, payload: split.payload, capacity: split.capacity };
  }

  // The indexed value is one string cell, bounded like a slot
  const indexedValue = definition.indexedValue(value);
  const indexed = serializeIndexedValue(indexedValue);
  const cellSize = ctx.limits?.chunkSize ?? MAX_CHUNK_SIZE;
  if (indexed.length > cellSize) {
    return { fits: false, payload: indexed, capacity: cellSize };
  }

  return {
    fits: true,
    record: {
      partitionKey: definition.partitionKey(value),
      sortKey: definition.sortKey(value),
      indexedValue,
      chunks: split.chunks,
      sourceIndexName: definition.name,
      typeName: ctx.typeName,
    },
  };
}

/**
 * Encode a record's keys and lay it out as an entity
 * @throws {InvalidKeyError} If a key is too long or the partition is the reserved catalog partition
 */
export function toEntity(record: MaterializedRecord): TableEntity {
  if (record.partitionKey === CATALOG_PARTITION_KEY) {
    throw new InvalidKeyError(record.partitionKey, "partition key is reserved for the index catalog");
  }
  const partitionKey = keyEncoder.encode(record.partitionKey);
  const sortKey = keyEncoder.encode(record.sortKey);
  validateEncodedKey(partitionKey, "partition key");
  validateEncodedKey(sortKey, "sort key");

  const properties: Record<string, PropertyValue> = {};
  for (const chunk of record.chunks) {
    properties[chunk.slotKey] = edm.string(chunk.payload);
  }
  properties[PROP_INDEXED_VALUE] = edm.string(serializeIndexedValue(record.indexedValue));
  properties[PROP_TYPE_NAME] = edm.string(record.typeName);
  properties[PROP_SOURCE_INDEX] = edm.string(record.sourceIndexName);

  return { partitionKey, sortKey, properties };
}

function stringProperty(entity: TableEntity, name: string): string {
  const prop = entity.properties[name];
  return prop?.type === "String" ? prop.value : "";
}

/**
 * Slot chunks carried by an entity
 */
export function entityChunks(entity: TableEntity): FatEntityChunk[] {
  const chunks: FatEntityChunk[] = [];
  for (const [name, prop] of Object.entries(entity.properties)) {
    if (isSlotKey(name) && prop.type === "String") {
      chunks.push({ slotKey: name, payload: prop.value });
    }
  }
  return chunks;
}

/**
 * Rebuild the materialized record an entity holds (keys decoded)
 */
export function fromEntity(entity: TableEntity, serializer: ValueSerializer): MaterializedRecord {
  const rawIndexed = stringProperty(entity, PROP_INDEXED_VALUE);
  let indexedValue: unknown = "";
  if (rawIndexed) {
    const parsed: unknown = serializer.parse(rawIndexed);
    if (parsed !== null && typeof parsed === "object" && "value" in parsed) {
      indexedValue = parsed.value;
    }
  }

  return {
    partitionKey: keyEncoder.decode(entity.partitionKey),
    sortKey: keyEncoder.decode(entity.sortKey),
    indexedValue,
    chunks: entityChunks(entity),
    sourceIndexName: stringProperty(entity, PROP_SOURCE_INDEX),
    typeName: stringProperty(entity, PROP_TYPE_NAME),
  };
}

/**
 * Decode an entity into a typed record
 */
export function decodeRecord<T>(
  entity: TableEntity,
  serializer: ValueSerializer,
  decoder: ValueDecoder<T>
): TableRecord<T> {
  const record = fromEntity(entity, serializer);
  if (record.chunks.length === 0) {
    throw new MalformedRecordError(record.partitionKey, record.sortKey, "no value slots");
  }
  const value = decoder.parse(serializer.parse(join(record.chunks)));

  const decoded: TableRecord<T> = {
    partitionKey: record.partitionKey,
    sortKey: record.sortKey,
    value,
    indexedValue: record.indexedValue,
    sourceIndexName: record.sourceIndexName,
    typeName: record.typeName,
  };
  if (entity.timestamp) decoded.timestamp = entity.timestamp;
  if (entity.etag) decoded.etag = entity.etag;
  return decoded;
}
