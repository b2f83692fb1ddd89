/**
 * Materialization engine: fans each domain write out to every matching index definition
 *
 * Per request:
 * 1. Note every registered index name in the catalog; new names schedule a backfill
 * 2. Run a pending backfill from the default index before anything else, retried on
 *    later writes until it completes without failures
 * 3. Build one record per (value, matching definition); oversized values and key
 *    failures are reported per record
 * 4. Dispatch per-index transaction groups through one bounded pool
 *
 * Merge requests are written as replace so a value that shrinks leaves no stale slots.
 */

import type { FatEntityLimits } from "./codec/fat-entity.js";
import type { BatchAssembler, PendingWrite } from "./batch.js";
import type { IndexCatalog } from "./catalog.js";
import { mapWithConcurrency } from "./concurrency.js";
import { entityByteSize } from "./codec/property.js";
import { BatchConstraintViolationError, ObjectTooLargeError } from "./errors.js";
import type { IndexDefinition } from "./index-definition.js";
import { logger } from "./observability/logs.js";
import { metrics } from "./observability/metrics.js";
import type { QueryFacade } from "./query.js";
import { materializeRecord, toEntity } from "./record.js";
import type {
  RecordFailure,
  RecordRef,
  RequestOptions,
  SaveKind,
  ValueSerializer,
  WriteKind,
  WriteReport,
} from "./types.js";

interface WriteRef extends RecordRef {
  valueIndex: number;
}

type PlannedWrites = Map<string, PendingWrite<WriteRef>[]>;

export interface MaterializationEngineOptions<T> {
  catalog: IndexCatalog<T>;
  assembler: BatchAssembler;
  reader: QueryFacade<T>;
  typeName: string;
  serializer: ValueSerializer;
  maxConcurrency: number;
  /** Write each record before deleting it, for stores that reject deletes of absent keys */
  upsertBeforeDelete: boolean;
  /** Delete records a previous version produced that the new version no longer does */
  pruneStaleRecords: boolean;
  limits?: FatEntityLimits;
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

function emptyReport(kind: SaveKind): WriteReport {
  return { ok: true, kind, succeeded: [], failed: [], groups: [], pruned: [] };
}

function recordKey(partitionKey: string, sortKey: string): string {
  return `${partitionKey}\u0000${sortKey}`;
}

function publicRef(ref: WriteRef): RecordRef {
  return { indexName: ref.indexName, partitionKey: ref.partitionKey, sortKey: ref.sortKey };
}

export class MaterializationEngine<T> {
  #catalog: IndexCatalog<T>;
  #assembler: BatchAssembler;
  #reader: QueryFacade<T>;
  #typeName: string;
  #serializer: ValueSerializer;
  #concurrency: number;
  #upsertBeforeDelete: boolean;
  #pruneStaleRecords: boolean;
  #limits: FatEntityLimits | undefined;
  #backfill: Promise<WriteReport> | null = null;
  /** Index names whose backfill has not yet completed without failures */
  #pendingBackfill = new Set<string>();

  constructor(options: MaterializationEngineOptions<T>) {
    this.#catalog = options.catalog;
    this.#assembler = options.assembler;
    this.#reader = options.reader;
    this.#typeName = options.typeName;
    this.#serializer = options.serializer;
    this.#concurrency = options.maxConcurrency;
    this.#upsertBeforeDelete = options.upsertBeforeDelete;
    this.#pruneStaleRecords = options.pruneStaleRecords;
    this.#limits = options.limits;
  }

  /**
   * Materialize a write request across every registered index
   */
  async write(values: readonly T[], kind: SaveKind, opts: RequestOptions = {}): Promise<WriteReport> {
    const startTime = performance.now();
    const report = emptyReport(kind);
    await this.#prepare(report, opts);

    const definitions = [...this.#catalog.definitions];
    const targets = kind === "delete" ? definitions.filter((def) => !def.versioned) : definitions;
    const planned = this.#plan(values, targets, report);

    if (kind === "delete") {
      await this.#remove(planned, report, report.succeeded, opts);
    } else {
      await this.#notePartitions(planned, opts);

      const prune = this.#pruneStaleRecords && kind !== "insert" && !this.#catalog.defaultIndex.versioned;
      const previous = prune ? await this.#readPrevious(values, opts) : new Map<number, T>();

      const writeKind: WriteKind = kind === "insertOrMerge" ? "insertOrReplace" : kind;
      await this.#run(planned, writeKind, report, opts);

      if (previous.size > 0) {
        const stale = this.#planStale(previous, planned, definitions, report);
        await this.#remove(stale, report, report.pruned, opts);
      }
    }

    report.ok = report.failed.length === 0 && report.groups.every((group) => group.ok);
    logger.info("write.complete", {
      table: this.#catalog.tableName,
      details: {
        kind,
        values: values.length,
        succeeded: report.succeeded.length,
        failed: report.failed.length,
        pruned: report.pruned.length,
        ms: Math.round(performance.now() - startTime),
      },
    });
    return report;
  }

  /**
   * Re-materialize every value held by the default index into the given indexes
   * (all non-default indexes when omitted)
   */
  async backfill(indexNames?: readonly string[], opts: RequestOptions = {}): Promise<WriteReport> {
    await this.#catalog.bootstrap(opts);
    const defaultName = this.#catalog.defaultIndex.name;
    const targets = this.#catalog.definitions.filter(
      (def) => def.name !== defaultName && (!indexNames || indexNames.includes(def.name))
    );

    const report = emptyReport("insertOrReplace");
    if (targets.length === 0) {
      return report;
    }

    const startTime = performance.now();
    const source = this.#reader.scan(this.#catalog.defaultIndex.name);
    let values = 0;

    for await (const page of source.pages()) {
      const pageValues = page.map((record) => record.value);
      values += pageValues.length;
      const planned = this.#plan(pageValues, targets, report);
      await this.#notePartitions(planned, opts);
      await this.#run(planned, "insertOrReplace", report, opts);
    }

    report.ok = report.failed.length === 0 && report.groups.every((group) => group.ok);
    const ms = performance.now() - startTime;
    for (const def of targets) {
      metrics.recordBackfillTime(this.#catalog.tableName, def.name, ms);
    }
    logger.info("backfill.complete", {
      table: this.#catalog.tableName,
      details: {
        indexes: targets.map((def) => def.name),
        values,
        records: report.succeeded.length,
        failed: report.failed.length,
        ms: Math.round(ms),
      },
    });
    return report;
  }

  /**
   * Steps 1 and 2: note index partitions and backfill the ones not yet populated.
   * A backfill that fails or throws leaves its indexes pending for the next write;
   * its failures land in the report of every write that waited on it.
   */
  async #prepare(report: WriteReport, opts: RequestOptions): Promise<void> {
    await this.#catalog.bootstrap(opts);

    const names = this.#catalog.definitions.map((def) => def.name);
    const added = await this.#catalog.notePartitionKeys(names, opts);
    const defaultName = this.#catalog.defaultIndex.name;
    for (const name of added) {
      if (name !== defaultName) this.#pendingBackfill.add(name);
    }

    if (this.#pendingBackfill.size > 0 && !this.#backfill) {
      const indexes = [...this.#pendingBackfill];
      logger.info("backfill.scheduled", {
        table: this.#catalog.tableName,
        details: { indexes },
      });
      const run: Promise<WriteReport> = this.backfill(indexes, opts)
        .catch((err: unknown) => {
          const error = toError(err);
          const failed = emptyReport("insertOrReplace");
          failed.ok = false;
          failed.failed.push(...indexes.map((indexName) => ({ valueIndex: -1, indexName, error })));
          return failed;
        })
        .then((result) => {
          if (result.ok) {
            for (const name of indexes) this.#pendingBackfill.delete(name);
          } else {
            logger.warn("backfill.partial", {
              table: this.#catalog.tableName,
              details: { indexes, failed: result.failed.length },
            });
          }
          return result;
        })
        .finally(() => {
          if (this.#backfill === run) this.#backfill = null;
        });
      this.#backfill = run;
    }

    // Writes issued while a backfill runs wait for it and share its failures
    const pending = this.#backfill;
    if (pending) {
      const result = await pending;
      report.groups.push(...result.groups.filter((group) => !group.ok));
      report.failed.push(...result.failed.map((failure) => ({ ...failure, valueIndex: -1 })));
    }
  }

  /**
   * Step 3: derive records, grouped by index name. Within one index a later value
   * replaces an earlier one with the same key.
   */
  #plan(values: readonly T[], definitions: readonly IndexDefinition<T>[], report: WriteReport): PlannedWrites {
    const planned: PlannedWrites = new Map();
    const byKey = new Map<string, Map<string, PendingWrite<WriteRef>>>();

    values.forEach((value, valueIndex) => {
      let serialized: string | undefined;

      for (const definition of definitions) {
        let partitionKey: string | undefined;
        let sortKey: string | undefined;
        try {
          if (!definition.matches(value)) continue;

          serialized ??= this.#serializer.stringify(value);
          const result = materializeRecord(value, serialized, definition, {
            typeName: this.#typeName,
            limits: this.#limits,
          });
          if (!result.fits) {
            metrics.recordRejected(this.#catalog.tableName, definition.name);
            throw new ObjectTooLargeError(result.payload, result.capacity);
          }

          partitionKey = result.record.partitionKey;
          sortKey = result.record.sortKey;
          const entity = toEntity(result.record);
          const bytes = entityByteSize(entity);
          if (bytes > this.#assembler.maxBytes) {
            throw new BatchConstraintViolationError(
              `record of ${bytes} bytes exceeds the ${this.#assembler.maxBytes} byte group budget`
            );
          }
          const write: PendingWrite<WriteRef> = {
            entity,
            ref: { valueIndex, indexName: definition.name, partitionKey, sortKey },
          };

          let keys = byKey.get(definition.name);
          if (!keys) {
            keys = new Map();
            byKey.set(definition.name, keys);
          }
          keys.set(recordKey(entity.partitionKey, entity.sortKey), write);
        } catch (err) {
          const error = toError(err);
          const failure: RecordFailure = { valueIndex, indexName: definition.name, error };
          if (partitionKey !== undefined) failure.partitionKey = partitionKey;
          if (sortKey !== undefined) failure.sortKey = sortKey;
          report.failed.push(failure);
          logger.warn("materialize.rejected", {
            table: this.#catalog.tableName,
            index: definition.name,
            message: error.message,
            details: { valueIndex },
          });
        }
      }
    });

    for (const [indexName, keys] of byKey) {
      planned.set(indexName, [...keys.values()]);
    }
    return planned;
  }

  /**
   * Record dynamic partition keys without scheduling a backfill
   */
  async #notePartitions(planned: PlannedWrites, opts: RequestOptions): Promise<void> {
    const keys = new Set<string>();
    for (const writes of planned.values()) {
      for (const write of writes) keys.add(write.ref.partitionKey);
    }
    if (keys.size > 0) {
      await this.#catalog.notePartitionKeys([...keys], opts);
    }
  }

  /**
   * Step 4: assemble per index and dispatch everything through one pool.
   * Returns the refs that were written.
   */
  async #run(
    planned: PlannedWrites,
    kind: WriteKind,
    report: WriteReport,
    opts: RequestOptions,
    into: RecordRef[] = report.succeeded
  ): Promise<WriteRef[]> {
    const groups = [...planned].flatMap(([indexName, writes]) =>
      this.#assembler.assemble(writes, kind, indexName)
    );
    if (groups.length === 0) return [];

    const dispatched = await this.#assembler.dispatch(groups, {
      table: this.#catalog.tableName,
      concurrency: this.#concurrency,
      signal: opts.signal,
    });

    const written: WriteRef[] = [];
    for (const { group, result } of dispatched) {
      report.groups.push(result);
      for (const ref of group.refs) {
        if (result.ok) {
          written.push(ref);
          into.push(publicRef(ref));
        } else {
          report.failed.push({
            ...publicRef(ref),
            valueIndex: ref.valueIndex,
            error: result.error ?? new Error("transaction group failed"),
          });
        }
      }
    }
    return written;
  }

  /**
   * Delete planned records, writing them first when the store rejects deletes of absent keys
   */
  async #remove(
    planned: PlannedWrites,
    report: WriteReport,
    into: RecordRef[],
    opts: RequestOptions
  ): Promise<void> {
    let targets = planned;

    if (this.#upsertBeforeDelete) {
      const written = await this.#run(planned, "insertOrReplace", report, opts, []);
      const ok = new Set(written);
      targets = new Map();
      for (const [indexName, writes] of planned) {
        const kept = writes.filter((write) => ok.has(write.ref));
        if (kept.length > 0) targets.set(indexName, kept);
      }
    }

    await this.#run(targets, "delete", report, opts, into);
  }

  /**
   * Read the stored version of each value from the default index
   */
  async #readPrevious(values: readonly T[], opts: RequestOptions): Promise<Map<number, T>> {
    const defaultIndex = this.#catalog.defaultIndex;
    const previous = new Map<number, T>();

    await mapWithConcurrency(values, this.#concurrency, async (value, valueIndex) => {
      try {
        const record = await this.#reader.get(
          defaultIndex.partitionKey(value),
          defaultIndex.sortKey(value),
          opts
        );
        if (record) previous.set(valueIndex, record.value);
      } catch (err) {
        // The write itself reports key errors; an unreadable previous version only skips pruning
        logger.warn("prune.skipped", {
          table: this.#catalog.tableName,
          index: defaultIndex.name,
          message: toError(err).message,
          details: { valueIndex },
        });
      }
    });

    return previous;
  }

  /**
   * Records produced by previous versions that the new versions no longer produce.
   * Values with any failed record are left alone.
   */
  #planStale(
    previous: Map<number, T>,
    planned: PlannedWrites,
    definitions: readonly IndexDefinition<T>[],
    report: WriteReport
  ): PlannedWrites {
    const failedValues = new Set(report.failed.map((failure) => failure.valueIndex));
    const current = new Set<string>();
    for (const writes of planned.values()) {
      for (const write of writes) current.add(recordKey(write.entity.partitionKey, write.entity.sortKey));
    }

    const candidates: T[] = [];
    const origin: number[] = [];
    for (const [valueIndex, value] of previous) {
      if (failedValues.has(valueIndex)) continue;
      candidates.push(value);
      origin.push(valueIndex);
    }

    const stableDefinitions = definitions.filter((def) => !def.versioned);
    const scratch = emptyReport("delete");
    const old = this.#plan(candidates, stableDefinitions, scratch);

    const stale: PlannedWrites = new Map();
    for (const [indexName, writes] of old) {
      const kept = writes
        .filter((write) => !current.has(recordKey(write.entity.partitionKey, write.entity.sortKey)))
        .map((write) => ({
          entity: write.entity,
          ref: { ...write.ref, valueIndex: origin[write.ref.valueIndex] ?? write.ref.valueIndex },
        }));
      if (kept.length > 0) stale.set(indexName, kept);
    }
    return stale;
  }
}
