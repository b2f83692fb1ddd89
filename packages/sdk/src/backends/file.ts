/**
 * File-backed table backend
 *
 * Layout: <root>/<table>/<sha256(partitionKey)>.json, one file per partition.
 *
 * Invariants:
 * - Every mutation rewrites one partition file atomically under that partition's mutex,
 *   so a batch is all-or-nothing
 * - Partition files are validated against their JSON Schema on read
 * - An emptied partition's file is removed
 * - Mutual exclusion is per process; separate processes sharing a root are not coordinated
 */

import { createHash, randomUUID } from "node:crypto";
import { stat } from "node:fs/promises";
import { join } from "node:path";
import { fromWire, toWire, type WirePropertyValue } from "../codec/property.js";
import { KeyedMutex, throwIfAborted } from "../concurrency.js";
import { BackendRequestError, PartitionReadError, errnoCode } from "../errors.js";
import { pinnedPartitionKey } from "../filter.js";
import { stableStringify } from "../format.js";
import { atomicWrite, ensureDirectory, listFiles, readFileIfExists, removeFile } from "../io.js";
import { describeErrors, validatePartitionFile, type PartitionFile } from "../schema/persisted.js";
import type {
  BackendCapabilities,
  BatchOperation,
  ContinuationToken,
  PropertyValue,
  QuerySegment,
  RequestOptions,
  TableBackend,
  TableEntity,
  TableOperation,
  TableQuery,
} from "../types.js";
import { validateTableName } from "../validation.js";
import {
  applyBatch,
  applyOperation,
  operationPartition,
  pageEntities,
  validateBatch,
  type ApplyContext,
  type PartitionRows,
} from "./partition.js";

export interface FileTableBackendOptions {
  /** Directory holding one subdirectory per table */
  root: string;
  /** Reject deletes of absent keys with 404 (default: true) */
  strictDelete?: boolean;
}

/**
 * File name of a partition: hex SHA-256 of its key, so any key maps to a safe name
 */
export function partitionFileName(partitionKey: string): string {
  return `${createHash("sha256").update(partitionKey, "utf8").digest("hex")}.json`;
}

export class FileTableBackend implements TableBackend {
  readonly capabilities: BackendCapabilities;
  readonly root: string;
  #locks = new KeyedMutex();

  constructor(options: FileTableBackendOptions) {
    this.root = options.root;
    this.capabilities = { deleteMissingIsNoop: !(options.strictDelete ?? true) };
  }

  #context(): ApplyContext {
    return {
      deleteMissingIsNoop: this.capabilities.deleteMissingIsNoop,
      now: () => new Date(),
      nextEtag: () => `W/"${randomUUID()}"`,
    };
  }

  tableDir(table: string): string {
    return join(this.root, table);
  }

  partitionPath(table: string, partitionKey: string): string {
    return join(this.tableDir(table), partitionFileName(partitionKey));
  }

  async ensureTable(table: string, opts: RequestOptions = {}): Promise<void> {
    throwIfAborted(opts.signal, "ensureTable");
    validateTableName(table);
    await ensureDirectory(this.tableDir(table));
  }

  async #assertTable(table: string): Promise<void> {
    try {
      const info = await stat(this.tableDir(table));
      if (info.isDirectory()) return;
    } catch (err) {
      if (errnoCode(err) !== "ENOENT") throw err;
    }
    throw new BackendRequestError(404, "TableNotFound", `Table "${table}" does not exist`);
  }

  async #load(filePath: string, partitionKey: string): Promise<PartitionRows> {
    const text = await readFileIfExists(filePath);
    const rows: PartitionRows = new Map();
    if (text === null) return rows;

    const file = parsePartitionFile(filePath, text);
    if (file.partitionKey !== partitionKey) {
      throw new PartitionReadError(filePath, {
        cause: new Error(`file holds partition "${file.partitionKey}", expected "${partitionKey}"`),
      });
    }
    for (const entity of entitiesOf(file)) {
      rows.set(entity.sortKey, entity);
    }
    return rows;
  }

  async #save(filePath: string, partitionKey: string, rows: PartitionRows): Promise<void> {
    if (rows.size === 0) {
      await removeFile(filePath);
      return;
    }

    const file: PartitionFile = { partitionKey, rows: {} };
    for (const [sortKey, entity] of rows) {
      const properties: Record<string, WirePropertyValue> = {};
      for (const [name, prop] of Object.entries(entity.properties)) {
        properties[name] = toWire(prop);
      }
      file.rows[sortKey] = {
        properties,
        timestamp: (entity.timestamp ?? new Date()).toISOString(),
        etag: entity.etag ?? "",
      };
    }
    await atomicWrite(filePath, stableStringify(file, { indent: 2, order: ["partitionKey", "rows"] }) + "\n");
  }

  async execute(table: string, op: TableOperation, opts: RequestOptions = {}): Promise<TableEntity | null> {
    throwIfAborted(opts.signal, op.kind);
    await this.#assertTable(table);
    const partitionKey = operationPartition(op);
    const filePath = this.partitionPath(table, partitionKey);

    if (op.kind === "retrieve") {
      const rows = await this.#load(filePath, partitionKey);
      return rows.get(op.sortKey) ?? null;
    }

    return this.#locks.withLock(filePath, async () => {
      const rows = await this.#load(filePath, partitionKey);
      const stored = applyOperation(rows, op, this.#context());
      throwIfAborted(opts.signal, op.kind);
      await this.#save(filePath, partitionKey, rows);
      return stored;
    });
  }

  async executeBatch(table: string, ops: BatchOperation[], opts: RequestOptions = {}): Promise<void> {
    throwIfAborted(opts.signal, "executeBatch");
    await this.#assertTable(table);
    const partitionKey = validateBatch(ops);
    const filePath = this.partitionPath(table, partitionKey);

    await this.#locks.withLock(filePath, async () => {
      const rows = await this.#load(filePath, partitionKey);
      const staged = applyBatch(rows, ops, this.#context());
      throwIfAborted(opts.signal, "executeBatch");
      await this.#save(filePath, partitionKey, staged);
    });
  }

  async executeQuerySegmented(
    table: string,
    query: TableQuery,
    token: ContinuationToken | null,
    opts: RequestOptions = {}
  ): Promise<QuerySegment> {
    throwIfAborted(opts.signal, "query");
    await this.#assertTable(table);

    const pinned = pinnedPartitionKey(query.filter);
    const candidates: TableEntity[] = [];

    if (pinned !== undefined) {
      const rows = await this.#load(this.partitionPath(table, pinned), pinned);
      candidates.push(...rows.values());
    } else {
      const dir = this.tableDir(table);
      for (const name of await listFiles(dir, ".json")) {
        const filePath = join(dir, name);
        const text = await readFileIfExists(filePath);
        if (text === null) continue;
        candidates.push(...entitiesOf(parsePartitionFile(filePath, text)));
      }
    }

    return pageEntities(candidates, query, token);
  }
}

function parsePartitionFile(filePath: string, text: string): PartitionFile {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new PartitionReadError(filePath, { cause: err });
  }
  if (!validatePartitionFile(parsed)) {
    throw new PartitionReadError(filePath, {
      cause: new Error(describeErrors(validatePartitionFile.errors).join("; ")),
    });
  }
  return parsed;
}

function entitiesOf(file: PartitionFile): TableEntity[] {
  return Object.entries(file.rows).map(([sortKey, row]) => {
    const properties: Record<string, PropertyValue> = {};
    for (const [name, wire] of Object.entries(row.properties)) {
      properties[name] = fromWire(wire);
    }
    return {
      partitionKey: file.partitionKey,
      sortKey,
      properties,
      timestamp: new Date(row.timestamp),
      etag: row.etag,
    };
  });
}
