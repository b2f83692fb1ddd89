/**
 * Read side: point lookups and paginated partition scans
 *
 * Keys go through the key encoder on the way out and are decoded on the way back.
 * Sequences are lazy and restartable: each iteration re-runs the query from the first page.
 */

import { keyEncoder } from "./codec/key-encoder.js";
import { abortable } from "./concurrency.js";
import { and, compare, partitionKeyEquals, sortKeyRange, type FilterExpression } from "./filter.js";
import { logger } from "./observability/logs.js";
import { metrics } from "./observability/metrics.js";
import { decodeRecord, PROP_INDEXED_VALUE, serializeIndexedValue } from "./record.js";
import type {
  ContinuationToken,
  PropertyInput,
  QuerySegment,
  RequestOptions,
  TableBackend,
  TableEntity,
  TableQuery,
  TableRecord,
  ValueDecoder,
  ValueSerializer,
} from "./types.js";

export const DEFAULT_PAGE_SIZE = 1000;

export interface ScanOptions extends RequestOptions {
  /** Entities requested per backend segment */
  pageSize?: number;
  /** Stop after this many records */
  limit?: number;
}

/**
 * Lazy, finite, restartable sequence of decoded records
 */
export class RecordSequence<T> implements AsyncIterable<TableRecord<T>> {
  #pageSource: () => AsyncGenerator<TableRecord<T>[]>;

  constructor(pageSource: () => AsyncGenerator<TableRecord<T>[]>) {
    this.#pageSource = pageSource;
  }

  /**
   * Iterate page by page, one backend segment per page
   */
  pages(): AsyncIterable<TableRecord<T>[]> {
    return { [Symbol.asyncIterator]: () => this.#pageSource() };
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<TableRecord<T>> {
    for await (const page of this.#pageSource()) {
      yield* page;
    }
  }

  async *values(): AsyncGenerator<T> {
    for await (const record of this) {
      yield record.value;
    }
  }

  async toArray(): Promise<TableRecord<T>[]> {
    const records: TableRecord<T>[] = [];
    for await (const record of this) {
      records.push(record);
    }
    return records;
  }

  async first(): Promise<TableRecord<T> | null> {
    for await (const record of this) {
      return record;
    }
    return null;
  }
}

export interface QueryFacadeOptions<T> {
  backend: TableBackend;
  table: string;
  serializer: ValueSerializer;
  decoder: ValueDecoder<T>;
  pageSize?: number;
}

export class QueryFacade<T> {
  #backend: TableBackend;
  #table: string;
  #serializer: ValueSerializer;
  #decoder: ValueDecoder<T>;
  #pageSize: number;

  constructor(options: QueryFacadeOptions<T>) {
    this.#backend = options.backend;
    this.#table = options.table;
    this.#serializer = options.serializer;
    this.#decoder = options.decoder;
    this.#pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
  }

  #decode(entity: TableEntity): TableRecord<T> {
    return decodeRecord(entity, this.#serializer, this.#decoder);
  }

  /**
   * Point lookup. Resolves to null when the record does not exist.
   */
  async get(partitionKey: string, sortKey: string, opts: RequestOptions = {}): Promise<TableRecord<T> | null> {
    const startTime = performance.now();
    const entity = await abortable(opts.signal, "retrieve", () =>
      this.#backend.execute(
        this.#table,
        {
          kind: "retrieve",
          partitionKey: keyEncoder.encode(partitionKey),
          sortKey: keyEncoder.encode(sortKey),
        },
        { signal: opts.signal }
      )
    );
    metrics.recordQueryTime(this.#table, partitionKey, performance.now() - startTime);
    return entity ? this.#decode(entity) : null;
  }

  /**
   * Every record of one partition, in sort-key order
   */
  scan(partitionKey: string, opts: ScanOptions = {}): RecordSequence<T> {
    return this.query(partitionKeyEquals(keyEncoder.encode(partitionKey)), opts);
  }

  /**
   * Records whose sort key lies in [min, max]; an empty bound leaves that side open
   */
  scanRange(
    partitionKey: string,
    minSortKey: string,
    maxSortKey: string,
    opts: ScanOptions = {}
  ): RecordSequence<T> {
    const min = minSortKey === "" ? "" : keyEncoder.encode(minSortKey);
    const max = maxSortKey === "" ? "" : keyEncoder.encode(maxSortKey);
    return this.query(sortKeyRange(keyEncoder.encode(partitionKey), min, max), opts);
  }

  /**
   * Records of one partition whose property equals the value. The value's runtime
   * type (or explicit `edm` tag) selects the comparison kind.
   */
  scanWhere(
    partitionKey: string,
    property: string,
    value: PropertyInput,
    opts: ScanOptions = {}
  ): RecordSequence<T> {
    return this.query(
      and(partitionKeyEquals(keyEncoder.encode(partitionKey)), compare(property, "eq", value)),
      opts
    );
  }

  /**
   * Records of one partition whose indexed value equals `value`
   */
  scanIndexedValue(partitionKey: string, value: unknown, opts: ScanOptions = {}): RecordSequence<T> {
    return this.scanWhere(partitionKey, PROP_INDEXED_VALUE, serializeIndexedValue(value), opts);
  }

  /**
   * Run an arbitrary filter, paging through continuation tokens until exhausted
   */
  query(filter: FilterExpression | undefined, opts: ScanOptions = {}): RecordSequence<T> {
    const pageSize = opts.pageSize ?? this.#pageSize;
    const limit = opts.limit;

    return new RecordSequence(() =>
      this.#pages({ filter, take: pageSize }, limit, opts.signal)
    );
  }

  async *#pages(
    query: TableQuery,
    limit: number | undefined,
    signal: AbortSignal | undefined
  ): AsyncGenerator<TableRecord<T>[]> {
    let token: ContinuationToken | null = null;
    let remaining = limit ?? Infinity;
    let page = 0;

    do {
      const startTime = performance.now();
      const segment: QuerySegment = await abortable(signal, "query", () =>
        this.#backend.executeQuerySegmented(this.#table, query, token, { signal })
      );
      page++;

      const records = segment.entities.slice(0, remaining).map((entity) => this.#decode(entity));
      remaining -= records.length;
      token = segment.continuationToken;

      const partition = records[0]?.partitionKey ?? "*";
      metrics.recordPage(this.#table, partition, records.length);
      metrics.recordQueryTime(this.#table, partition, performance.now() - startTime);
      logger.debug("query.page", {
        table: this.#table,
        partition,
        details: { page, records: records.length, more: token !== null },
      });

      if (records.length > 0) {
        yield records;
      }
    } while (token && remaining > 0);
  }
}
