/**
 * Table service semantics shared by the in-process backends: single-operation rules,
 * batch preconditions and segmented paging
 */

import { entityByteSize } from "../codec/property.js";
import { MAX_BATCH_BYTES, MAX_BATCH_OPERATIONS } from "../batch.js";
import { BackendRequestError } from "../errors.js";
import { evaluateFilter } from "../filter.js";
import type {
  BatchOperation,
  ContinuationToken,
  QuerySegment,
  TableEntity,
  TableOperation,
  TableQuery,
} from "../types.js";

export const MAX_PAGE_SIZE = 1000;

/**
 * Rows of one partition keyed by sort key
 */
export type PartitionRows = Map<string, TableEntity>;

export interface ApplyContext {
  /** Deleting an absent key succeeds */
  deleteMissingIsNoop: boolean;
  now: () => Date;
  nextEtag: () => string;
}

export function cloneEntity(entity: TableEntity): TableEntity {
  return structuredClone(entity);
}

function notFound(partitionKey: string, sortKey: string): BackendRequestError {
  return new BackendRequestError(
    404,
    "ResourceNotFound",
    `Entity ${partitionKey}/${sortKey} does not exist`
  );
}

function checkEtag(existing: TableEntity, etag: string | undefined): void {
  if (etag && etag !== "*" && etag !== existing.etag) {
    throw new BackendRequestError(
      412,
      "UpdateConditionNotSatisfied",
      `Entity ${existing.partitionKey}/${existing.sortKey} was modified (etag mismatch)`
    );
  }
}

function stamp(entity: TableEntity, ctx: ApplyContext): TableEntity {
  const stored = cloneEntity(entity);
  stored.timestamp = ctx.now();
  stored.etag = ctx.nextEtag();
  return stored;
}

/**
 * Apply one write to a partition in place. Returns the stored entity, or null for deletes.
 * @throws {BackendRequestError} 404 for missing targets, 409 for insert conflicts, 412 for etag mismatches
 */
export function applyOperation(
  rows: PartitionRows,
  op: BatchOperation,
  ctx: ApplyContext
): TableEntity | null {
  if (op.kind === "delete") {
    const existing = rows.get(op.sortKey);
    if (!existing) {
      if (ctx.deleteMissingIsNoop) return null;
      throw notFound(op.partitionKey, op.sortKey);
    }
    checkEtag(existing, op.etag);
    rows.delete(op.sortKey);
    return null;
  }

  const { entity } = op;
  const existing = rows.get(entity.sortKey);
  let stored: TableEntity;

  switch (op.kind) {
    case "insert":
      if (existing) {
        throw new BackendRequestError(
          409,
          "EntityAlreadyExists",
          `Entity ${entity.partitionKey}/${entity.sortKey} already exists`
        );
      }
      stored = stamp(entity, ctx);
      break;
    case "insertOrReplace":
      stored = stamp(entity, ctx);
      break;
    case "insertOrMerge":
      stored = stamp(
        existing ? { ...entity, properties: { ...existing.properties, ...entity.properties } } : entity,
        ctx
      );
      break;
    case "replace":
      if (!existing) throw notFound(entity.partitionKey, entity.sortKey);
      checkEtag(existing, entity.etag);
      stored = stamp(entity, ctx);
      break;
    case "merge":
      if (!existing) throw notFound(entity.partitionKey, entity.sortKey);
      checkEtag(existing, entity.etag);
      stored = stamp({ ...entity, properties: { ...existing.properties, ...entity.properties } }, ctx);
      break;
  }

  rows.set(stored.sortKey, stored);
  return cloneEntity(stored);
}

/**
 * Partition key an operation targets
 */
export function operationPartition(op: TableOperation): string {
  return op.kind === "delete" || op.kind === "retrieve" ? op.partitionKey : op.entity.partitionKey;
}

function operationSortKey(op: BatchOperation): string {
  return op.kind === "delete" ? op.sortKey : op.entity.sortKey;
}

/**
 * Check the preconditions of an entity group transaction. Returns the shared partition key.
 * @throws {BackendRequestError} 400 when a precondition is broken
 */
export function validateBatch(ops: readonly BatchOperation[]): string {
  const first = ops[0];
  if (!first) {
    throw new BackendRequestError(400, "InvalidInput", "Batch contains no operations");
  }
  if (ops.length > MAX_BATCH_OPERATIONS) {
    throw new BackendRequestError(
      400,
      "InvalidInput",
      `Batch contains ${ops.length} operations; the limit is ${MAX_BATCH_OPERATIONS}`
    );
  }

  const partitionKey = operationPartition(first);
  const seen = new Set<string>();
  let bytes = 0;

  ops.forEach((op, index) => {
    if (operationPartition(op) !== partitionKey) {
      throw new BackendRequestError(
        400,
        "CommandsInBatchActOnDifferentPartitions",
        `${index}:All operations in a batch must share one partition key`
      );
    }
    const sortKey = operationSortKey(op);
    if (seen.has(sortKey)) {
      throw new BackendRequestError(
        400,
        "InvalidDuplicateRow",
        `${index}:Batch contains more than one operation for ${partitionKey}/${sortKey}`
      );
    }
    seen.add(sortKey);
    bytes += entityByteSize(
      op.kind === "delete" ? { partitionKey, sortKey, properties: {} } : op.entity
    );
  });

  if (bytes > MAX_BATCH_BYTES) {
    throw new BackendRequestError(
      413,
      "RequestBodyTooLarge",
      `Batch payload is ${bytes} bytes; the limit is ${MAX_BATCH_BYTES}`
    );
  }
  return partitionKey;
}

/**
 * Apply a batch to a copy of the partition; the caller commits the copy only on success
 * @throws {BackendRequestError} The first failing operation, message prefixed with its index
 */
export function applyBatch(rows: PartitionRows, ops: readonly BatchOperation[], ctx: ApplyContext): PartitionRows {
  const staged: PartitionRows = new Map(rows);
  ops.forEach((op, index) => {
    try {
      applyOperation(staged, op, ctx);
    } catch (err) {
      if (err instanceof BackendRequestError) {
        throw new BackendRequestError(err.status, err.reason, `${index}:${err.message}`, { cause: err });
      }
      throw err;
    }
  });
  return staged;
}

function compareKeys(a: TableEntity, b: TableEntity): number {
  if (a.partitionKey !== b.partitionKey) return a.partitionKey < b.partitionKey ? -1 : 1;
  if (a.sortKey !== b.sortKey) return a.sortKey < b.sortKey ? -1 : 1;
  return 0;
}

function atOrAfter(entity: TableEntity, token: ContinuationToken): boolean {
  if (entity.partitionKey !== token.nextPartitionKey) {
    return entity.partitionKey > token.nextPartitionKey;
  }
  return entity.sortKey >= token.nextSortKey;
}

/**
 * Cut one segment out of a candidate set: filter, order by (partition, sort) key,
 * resume at the token and stop after `take` entities
 */
export function pageEntities(
  candidates: Iterable<TableEntity>,
  query: TableQuery,
  token: ContinuationToken | null
): QuerySegment {
  const take = Math.min(Math.max(1, query.take ?? MAX_PAGE_SIZE), MAX_PAGE_SIZE);
  const matching: TableEntity[] = [];
  for (const entity of candidates) {
    if (token && !atOrAfter(entity, token)) continue;
    if (query.filter && !evaluateFilter(query.filter, entity)) continue;
    matching.push(entity);
  }
  matching.sort(compareKeys);

  const page = matching.slice(0, take).map(cloneEntity);
  const next = matching[take];
  return {
    entities: page,
    continuationToken: next ? { nextPartitionKey: next.partitionKey, nextSortKey: next.sortKey } : null,
  };
}
