/**
 * In-process table backend
 *
 * Follows the table service contract: batches are checked against their preconditions and
 * applied all-or-nothing, queries page through continuation tokens, and every call
 * honours its abort signal.
 */

import { throwIfAborted } from "../concurrency.js";
import { BackendRequestError } from "../errors.js";
import { pinnedPartitionKey } from "../filter.js";
import type {
  BackendCapabilities,
  BatchOperation,
  ContinuationToken,
  QuerySegment,
  RequestOptions,
  TableBackend,
  TableEntity,
  TableOperation,
  TableQuery,
} from "../types.js";
import {
  applyBatch,
  applyOperation,
  cloneEntity,
  operationPartition,
  pageEntities,
  validateBatch,
  type ApplyContext,
  type PartitionRows,
} from "./partition.js";

export interface MemoryTableBackendOptions {
  /** Reject deletes of absent keys with 404, as hosted table services do (default: true) */
  strictDelete?: boolean;
}

type TableRows = Map<string, PartitionRows>;

export class MemoryTableBackend implements TableBackend {
  readonly capabilities: BackendCapabilities;
  #tables = new Map<string, TableRows>();
  #etag = 0;

  constructor(options: MemoryTableBackendOptions = {}) {
    this.capabilities = { deleteMissingIsNoop: !(options.strictDelete ?? true) };
  }

  #context(): ApplyContext {
    return {
      deleteMissingIsNoop: this.capabilities.deleteMissingIsNoop,
      now: () => new Date(),
      nextEtag: () => `W/"${++this.#etag}"`,
    };
  }

  #table(table: string): TableRows {
    const rows = this.#tables.get(table);
    if (!rows) {
      throw new BackendRequestError(404, "TableNotFound", `Table "${table}" does not exist`);
    }
    return rows;
  }

  async ensureTable(table: string, opts: RequestOptions = {}): Promise<void> {
    throwIfAborted(opts.signal, "ensureTable");
    if (!this.#tables.has(table)) {
      this.#tables.set(table, new Map());
    }
  }

  async execute(table: string, op: TableOperation, opts: RequestOptions = {}): Promise<TableEntity | null> {
    throwIfAborted(opts.signal, op.kind);
    const rows = this.#table(table);
    const partitionKey = operationPartition(op);

    if (op.kind === "retrieve") {
      const entity = rows.get(partitionKey)?.get(op.sortKey);
      return entity ? cloneEntity(entity) : null;
    }

    const partition = rows.get(partitionKey) ?? new Map<string, TableEntity>();
    const stored = applyOperation(partition, op, this.#context());
    this.#commit(rows, partitionKey, partition);
    return stored;
  }

  async executeBatch(table: string, ops: BatchOperation[], opts: RequestOptions = {}): Promise<void> {
    throwIfAborted(opts.signal, "executeBatch");
    const rows = this.#table(table);
    const partitionKey = validateBatch(ops);

    const staged = applyBatch(rows.get(partitionKey) ?? new Map<string, TableEntity>(), ops, this.#context());
    throwIfAborted(opts.signal, "executeBatch");
    this.#commit(rows, partitionKey, staged);
  }

  async executeQuerySegmented(
    table: string,
    query: TableQuery,
    token: ContinuationToken | null,
    opts: RequestOptions = {}
  ): Promise<QuerySegment> {
    throwIfAborted(opts.signal, "query");
    const rows = this.#table(table);

    const pinned = pinnedPartitionKey(query.filter);
    const partitions = pinned !== undefined ? [rows.get(pinned)] : [...rows.values()];
    return pageEntities(
      partitions.flatMap((partition) => (partition ? [...partition.values()] : [])),
      query,
      token
    );
  }

  #commit(rows: TableRows, partitionKey: string, partition: PartitionRows): void {
    if (partition.size === 0) {
      rows.delete(partitionKey);
    } else {
      rows.set(partitionKey, partition);
    }
  }

  /**
   * Number of stored entities, across all partitions or in one
   */
  count(table: string, partitionKey?: string): number {
    const rows = this.#tables.get(table);
    if (!rows) return 0;
    if (partitionKey !== undefined) return rows.get(partitionKey)?.size ?? 0;
    let total = 0;
    for (const partition of rows.values()) total += partition.size;
    return total;
  }

  /**
   * Stored partition keys of a table, sorted
   */
  partitions(table: string): string[] {
    return [...(this.#tables.get(table)?.keys() ?? [])].sort();
  }
}
