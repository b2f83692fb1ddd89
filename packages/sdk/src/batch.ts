/**
 * Batch assembler: packs entity writes into backend-legal transaction groups
 *
 * Invariants:
 * - Every group holds one partition key, at most 100 operations and at most 4 MiB
 * - Groups partition the input exactly; each write lands in exactly one group
 * - Partitions keep first-seen order, writes keep input order within a partition
 * - Dispatch never retries; each group reports its own outcome
 */

import { entityByteSize } from "./codec/property.js";
import { mapWithConcurrency, abortable } from "./concurrency.js";
import { BatchConstraintViolationError } from "./errors.js";
import { logger } from "./observability/logs.js";
import { metrics } from "./observability/metrics.js";
import type {
  BatchOperation,
  GroupResult,
  RequestOptions,
  TableBackend,
  TableEntity,
  WriteKind,
} from "./types.js";

export const MAX_BATCH_OPERATIONS = 100;
export const MAX_BATCH_BYTES = 4194304;

export interface BatchLimits {
  maxOperations?: number;
  maxBytes?: number;
}

/**
 * An entity waiting to be written, tagged with whatever the caller needs to trace it back
 */
export interface PendingWrite<R> {
  entity: TableEntity;
  ref: R;
}

/**
 * One atomic unit of work against the backend
 */
export interface TransactionGroup<R> {
  indexName: string;
  partitionKey: string;
  kind: WriteKind;
  operations: BatchOperation[];
  refs: R[];
  bytes: number;
}

export interface DispatchedGroup<R> {
  group: TransactionGroup<R>;
  result: GroupResult;
}

export interface DispatchOptions extends RequestOptions {
  table: string;
  concurrency: number;
}

/**
 * Turn an entity into the operation a write kind calls for
 */
export function toBatchOperation(entity: TableEntity, kind: WriteKind): BatchOperation {
  if (kind === "delete") {
    const op: Extract<BatchOperation, { kind: "delete" }> = {
      kind: "delete",
      partitionKey: entity.partitionKey,
      sortKey: entity.sortKey,
    };
    if (entity.etag) op.etag = entity.etag;
    return op;
  }
  return { kind, entity };
}

function operationBytes(entity: TableEntity, kind: WriteKind): number {
  if (kind === "delete") {
    return entityByteSize({ partitionKey: entity.partitionKey, sortKey: entity.sortKey, properties: {} });
  }
  return entityByteSize(entity);
}

export class BatchAssembler {
  readonly maxOperations: number;
  readonly maxBytes: number;
  #backend: TableBackend;

  constructor(backend: TableBackend, limits: BatchLimits = {}) {
    this.#backend = backend;
    this.maxOperations = limits.maxOperations ?? MAX_BATCH_OPERATIONS;
    this.maxBytes = limits.maxBytes ?? MAX_BATCH_BYTES;
  }

  /**
   * Group writes by partition, then pack each partition first-fit into groups
   * @throws {BatchConstraintViolationError} If a produced group breaks the limits
   */
  assemble<R>(
    writes: readonly PendingWrite<R>[],
    kind: WriteKind,
    indexName: string
  ): TransactionGroup<R>[] {
    const byPartition = new Map<string, PendingWrite<R>[]>();
    for (const write of writes) {
      const list = byPartition.get(write.entity.partitionKey);
      if (list) {
        list.push(write);
      } else {
        byPartition.set(write.entity.partitionKey, [write]);
      }
    }

    const groups: TransactionGroup<R>[] = [];
    for (const [partitionKey, list] of byPartition) {
      let current: TransactionGroup<R> | null = null;

      for (const write of list) {
        const bytes = operationBytes(write.entity, kind);
        if (
          current &&
          (current.operations.length + 1 > this.maxOperations || current.bytes + bytes > this.maxBytes)
        ) {
          groups.push(current);
          current = null;
        }
        if (!current) {
          current = { indexName, partitionKey, kind, operations: [], refs: [], bytes: 0 };
        }
        current.operations.push(toBatchOperation(write.entity, kind));
        current.refs.push(write.ref);
        current.bytes += bytes;
      }

      if (current) groups.push(current);
    }

    for (const group of groups) {
      this.verify(group);
    }
    return groups;
  }

  /**
   * Check a group against the limits
   * @throws {BatchConstraintViolationError}
   */
  verify<R>(group: TransactionGroup<R>): void {
    if (group.operations.length === 0) {
      throw new BatchConstraintViolationError("empty group");
    }
    if (group.operations.length > this.maxOperations) {
      throw new BatchConstraintViolationError(
        `${group.operations.length} operations exceeds ${this.maxOperations}`
      );
    }
    if (group.bytes > this.maxBytes) {
      throw new BatchConstraintViolationError(`${group.bytes} bytes exceeds ${this.maxBytes}`);
    }
    for (const op of group.operations) {
      const pk = op.kind === "delete" ? op.partitionKey : op.entity.partitionKey;
      if (pk !== group.partitionKey) {
        throw new BatchConstraintViolationError(
          `partition "${pk}" in group for "${group.partitionKey}"`
        );
      }
    }
  }

  /**
   * Send every group as one atomic call, with at most `concurrency` in flight
   */
  async dispatch<R>(
    groups: readonly TransactionGroup<R>[],
    opts: DispatchOptions
  ): Promise<DispatchedGroup<R>[]> {
    return mapWithConcurrency(groups, opts.concurrency, async (group) => {
      const startTime = performance.now();
      const result: GroupResult = {
        indexName: group.indexName,
        partitionKey: group.partitionKey,
        kind: group.kind,
        operations: group.operations.length,
        bytes: group.bytes,
        ok: true,
      };

      try {
        await abortable(opts.signal, "executeBatch", () =>
          this.#backend.executeBatch(opts.table, group.operations, { signal: opts.signal })
        );
      } catch (err) {
        result.ok = false;
        result.error = err instanceof Error ? err : new Error(String(err));
        logger.warn("batch.failed", {
          table: opts.table,
          index: group.indexName,
          partition: group.partitionKey,
          message: result.error.message,
          details: { kind: group.kind, operations: group.operations.length },
        });
      }

      const ms = performance.now() - startTime;
      metrics.recordBatch(opts.table, group.indexName, group.operations.length, result.ok, ms);
      logger.debug("batch.dispatched", {
        table: opts.table,
        index: group.indexName,
        partition: group.partitionKey,
        details: { kind: group.kind, operations: group.operations.length, bytes: group.bytes, ms },
      });

      return { group, result };
    });
  }
}
