/**
 * Core types for tablemat
 */

import type { FilterExpression } from "./filter.js";

/**
 * Typed property value stored in a table entity (closed set of comparable kinds)
 */
export type PropertyValue =
  | { type: "String"; value: string }
  | { type: "Binary"; value: Uint8Array }
  | { type: "Boolean"; value: boolean }
  | { type: "DateTime"; value: Date }
  | { type: "Double"; value: number }
  | { type: "Guid"; value: string }
  | { type: "Int32"; value: number }
  | { type: "Int64"; value: bigint };

/**
 * Tag of a property value
 */
export type PropertyKind = PropertyValue["type"];

/**
 * Plain runtime values accepted wherever a property value is expected.
 * Guid and Int32 cannot be inferred and must be built with `edm.guid` / `edm.int32`.
 */
export type PropertyInput = string | Uint8Array | boolean | Date | number | bigint | PropertyValue;

/**
 * One row of the backing table
 */
export interface TableEntity {
  /** Partition key (already encoded for the backend) */
  partitionKey: string;
  /** Sort key within the partition (already encoded for the backend) */
  sortKey: string;
  /** Named, typed properties */
  properties: Record<string, PropertyValue>;
  /** Last modification time, set by the backend */
  timestamp?: Date;
  /** Opaque version tag, set by the backend */
  etag?: string;
}

/**
 * Write operation kinds understood by the backing store
 */
export type WriteKind =
  | "insert"
  | "insertOrMerge"
  | "insertOrReplace"
  | "merge"
  | "replace"
  | "delete";

/**
 * Operation kinds a caller may request for domain values
 */
export type SaveKind = "insert" | "insertOrMerge" | "insertOrReplace" | "replace" | "delete";

/**
 * Single backend operation
 */
export type TableOperation =
  | { kind: Exclude<WriteKind, "delete">; entity: TableEntity }
  | { kind: "delete"; partitionKey: string; sortKey: string; etag?: string }
  | { kind: "retrieve"; partitionKey: string; sortKey: string };

/**
 * Batchable subset of operations (retrieve is single-shot only)
 */
export type BatchOperation = Exclude<TableOperation, { kind: "retrieve" }>;

/**
 * Query sent to the backend's segmented query endpoint
 */
export interface TableQuery {
  /** Conjunctive filter; omitted means every entity in the table */
  filter?: FilterExpression;
  /** Maximum entities per segment (backend default applies when omitted) */
  take?: number;
}

/**
 * Opaque cursor pointing at the first entity of the next segment
 */
export interface ContinuationToken {
  nextPartitionKey: string;
  nextSortKey: string;
}

/**
 * One page of query results
 */
export interface QuerySegment {
  entities: TableEntity[];
  continuationToken: ContinuationToken | null;
}

/**
 * Per-call options for anything that talks to the backend
 */
export interface RequestOptions {
  /** Aborts the remote call; surfaces as BackendTransientError */
  signal?: AbortSignal;
}

/**
 * Declared behaviour of a backend implementation
 */
export interface BackendCapabilities {
  /** Deleting an absent key succeeds instead of failing with 404 */
  deleteMissingIsNoop: boolean;
}

/**
 * Contract of the partitioned key-value table service
 */
export interface TableBackend {
  readonly capabilities: BackendCapabilities;

  /**
   * Create the table if it does not already exist
   */
  ensureTable(table: string, opts?: RequestOptions): Promise<void>;

  /**
   * Execute one operation. Retrieve resolves to the entity or null; insert, merge and replace
   * variants resolve to the stored entity with its new etag; delete resolves to null.
   * An etag on a replace, merge or delete is a precondition (412 when it no longer matches).
   */
  execute(table: string, op: TableOperation, opts?: RequestOptions): Promise<TableEntity | null>;

  /**
   * Execute an atomic group. Precondition: one partition, at most 100 operations, at most 4 MiB.
   */
  executeBatch(table: string, ops: BatchOperation[], opts?: RequestOptions): Promise<void>;

  /**
   * Fetch one segment of a query, starting at the continuation token when given
   */
  executeQuerySegmented(
    table: string,
    query: TableQuery,
    token: ContinuationToken | null,
    opts?: RequestOptions
  ): Promise<QuerySegment>;
}

/**
 * One slot of a fat entity
 */
export interface FatEntityChunk {
  /** Zero-padded slot key (E01, E02, ...) */
  slotKey: string;
  /** Slice of the serialized value */
  payload: string;
}

/**
 * Denormalized copy of a domain value produced by one index definition.
 * Keys are logical (unencoded); encoding happens when the record becomes an entity.
 */
export interface MaterializedRecord {
  partitionKey: string;
  sortKey: string;
  indexedValue: unknown;
  chunks: FatEntityChunk[];
  sourceIndexName: string;
  typeName: string;
}

/**
 * Decoded record returned by queries
 */
export interface TableRecord<T> {
  partitionKey: string;
  sortKey: string;
  value: T;
  indexedValue: unknown;
  sourceIndexName: string;
  typeName: string;
  timestamp?: Date;
  etag?: string;
}

/**
 * Anything that turns parsed JSON back into a domain value (a zod schema fits)
 */
export interface ValueDecoder<T> {
  parse(raw: unknown): T;
}

/**
 * Turns domain values into the string that is split across slots, and back
 */
export interface ValueSerializer {
  stringify(value: unknown): string;
  parse(text: string): unknown;
}

/**
 * Location of one materialized record
 */
export interface RecordRef {
  indexName: string;
  partitionKey: string;
  sortKey: string;
}

/**
 * A record that could not be written
 */
export interface RecordFailure {
  /** Position of the domain value in the write request, -1 for a record of a backfill the write ran first */
  valueIndex: number;
  indexName: string;
  partitionKey?: string;
  sortKey?: string;
  error: Error;
}

/**
 * Outcome of one dispatched transaction group
 */
export interface GroupResult {
  indexName: string;
  partitionKey: string;
  kind: WriteKind;
  operations: number;
  bytes: number;
  ok: boolean;
  error?: Error;
}

/**
 * Partial-failure report for a write request
 */
export interface WriteReport {
  /** True when every record and every group succeeded */
  ok: boolean;
  kind: SaveKind;
  succeeded: RecordRef[];
  failed: RecordFailure[];
  groups: GroupResult[];
  /** Records of a previous version deleted because the new version no longer produces them */
  pruned: RecordRef[];
}

/**
 * Options shared by every table-level call
 */
export interface CallOptions extends RequestOptions {
  /** Abort after this many milliseconds */
  timeoutMs?: number;
}
