/**
 * Table facade: one catalog, materialization engine and query facade per table
 *
 * @example
 * ```typescript
 * const users = openTable<User>({
 *   backend: new MemoryTableBackend(),
 *   typeName: "User",
 *   decoder: UserSchema,
 *   getId: (u) => u.id,
 * });
 * users.addIndex(users.createIndex("ActiveUsers").defineCriteria((u) => u.status === "Active"));
 * await users.insertOrReplace({ id: "u1", status: "Active" });
 * const active = await users.scan("ActiveUsers").toArray();
 * ```
 */

import type { FatEntityLimits } from "./codec/fat-entity.js";
import {
  chronologicalKey,
  highResolutionClock,
  reverseChronologicalKey,
  type Clock,
} from "./codec/row-keys.js";
import { BatchAssembler, type BatchLimits } from "./batch.js";
import { IndexCatalog } from "./catalog.js";
import { resolveSignal } from "./concurrency.js";
import { parseTableSettings, type TableSettings, type TableSettingsInput } from "./config.js";
import { ConfigError } from "./errors.js";
import { canonicalSerializer } from "./format.js";
import {
  TableIndexDefinition,
  defineIndex,
  serializeId,
  type IdAccessor,
  type IndexDefinition,
  type IndexDefinitionInit,
} from "./index-definition.js";
import { MaterializationEngine } from "./materialize.js";
import { QueryFacade, RecordSequence, type ScanOptions } from "./query.js";
import type {
  CallOptions,
  PropertyInput,
  SaveKind,
  TableBackend,
  TableRecord,
  ValueDecoder,
  ValueSerializer,
  WriteReport,
} from "./types.js";
import { defaultTableName, validateTableName } from "./validation.js";

export interface TableOptions<T> extends TableSettingsInput {
  backend: TableBackend;
  /** Turns parsed JSON back into a domain value (a zod schema fits) */
  decoder: ValueDecoder<T>;
  /** Identity accessor used for default sort keys and getById */
  getId?: IdAccessor<T>;
  /** Indexes registered alongside the default index */
  indexes?: ReadonlyArray<IndexDefinition<T> | IndexDefinitionInit<T>>;
  serializer?: ValueSerializer;
  clock?: Clock;
  /** Overrides of the slot and batch limits */
  limits?: FatEntityLimits & BatchLimits;
}

type Many<T> = T | readonly T[];

function isDefinition<T>(input: IndexDefinition<T> | IndexDefinitionInit<T>): input is IndexDefinition<T> {
  return "matches" in input && typeof input.matches === "function";
}

function isMany<T>(values: Many<T>): values is readonly T[] {
  return Array.isArray(values);
}

export class Table<T> {
  readonly name: string;
  readonly typeName: string;
  readonly settings: TableSettings;
  #getId: IdAccessor<T> | undefined;
  #clock: Clock;
  #catalog: IndexCatalog<T>;
  #reader: QueryFacade<T>;
  #engine: MaterializationEngine<T>;

  constructor(options: TableOptions<T>) {
    const { backend, decoder, getId, indexes = [], serializer = canonicalSerializer, clock, limits } = options;
    this.settings = parseTableSettings({
      tableName: options.tableName,
      typeName: options.typeName,
      defaultIndexName: options.defaultIndexName,
      maxConcurrency: options.maxConcurrency,
      timeoutMs: options.timeoutMs,
      pageSize: options.pageSize,
      upsertBeforeDelete: options.upsertBeforeDelete,
      pruneStaleRecords: options.pruneStaleRecords,
      catalogWriteMode: options.catalogWriteMode,
    });

    const { typeName } = this.settings;
    const tableName = this.settings.tableName ?? (typeName ? defaultTableName(typeName) : undefined);
    if (!tableName) {
      throw new ConfigError("Either tableName or typeName is required");
    }
    validateTableName(tableName);

    this.name = tableName;
    this.typeName = typeName;
    this.#getId = getId;
    this.#clock = clock ?? highResolutionClock;

    const defaultIndex = this.createIndex(this.settings.defaultIndexName).setIndexedValue(() => typeName);
    this.#catalog = new IndexCatalog(backend, tableName, defaultIndex, {
      writeMode: this.settings.catalogWriteMode,
    });
    this.addIndexes(indexes);

    this.#reader = new QueryFacade<T>({
      backend,
      table: tableName,
      serializer,
      decoder,
      pageSize: this.settings.pageSize,
    });
    this.#engine = new MaterializationEngine<T>({
      catalog: this.#catalog,
      assembler: new BatchAssembler(backend, limits),
      reader: this.#reader,
      typeName,
      serializer,
      maxConcurrency: this.settings.maxConcurrency,
      upsertBeforeDelete: this.settings.upsertBeforeDelete ?? !backend.capabilities.deleteMissingIsNoop,
      pruneStaleRecords: this.settings.pruneStaleRecords ?? getId !== undefined,
      limits,
    });
  }

  static chronologicalKey(clock?: Clock): string {
    return chronologicalKey(clock);
  }

  static reverseChronologicalKey(clock?: Clock): string {
    return reverseChronologicalKey(clock);
  }

  get defaultIndexName(): string {
    return this.#catalog.defaultIndex.name;
  }

  /**
   * Registered index definitions, default index first
   */
  get indexes(): readonly IndexDefinition<T>[] {
    return this.#catalog.definitions;
  }

  #signal(opts: CallOptions): CallOptions {
    const signal = resolveSignal({ signal: opts.signal, timeoutMs: opts.timeoutMs ?? this.settings.timeoutMs });
    return signal ? { signal } : {};
  }

  // Writes

  insert(values: Many<T>, opts: CallOptions = {}): Promise<WriteReport> {
    return this.save(values, "insert", opts);
  }

  insertOrMerge(values: Many<T>, opts: CallOptions = {}): Promise<WriteReport> {
    return this.save(values, "insertOrMerge", opts);
  }

  insertOrReplace(values: Many<T>, opts: CallOptions = {}): Promise<WriteReport> {
    return this.save(values, "insertOrReplace", opts);
  }

  replace(values: Many<T>, opts: CallOptions = {}): Promise<WriteReport> {
    return this.save(values, "replace", opts);
  }

  delete(values: Many<T>, opts: CallOptions = {}): Promise<WriteReport> {
    return this.save(values, "delete", opts);
  }

  save(values: Many<T>, kind: SaveKind, opts: CallOptions = {}): Promise<WriteReport> {
    const list: readonly T[] = isMany(values) ? values : [values];
    return this.#engine.write(list, kind, this.#signal(opts));
  }

  // Reads

  async get(partitionKey: string, sortKey: string, opts: CallOptions = {}): Promise<TableRecord<T> | null> {
    const callOpts = this.#signal(opts);
    await this.#catalog.bootstrap(callOpts);
    return this.#reader.get(partitionKey, sortKey, callOpts);
  }

  /**
   * Look a value up by identity in an index partition named after the index
   * (the default index unless given)
   */
  async getById(id: unknown, indexName = this.defaultIndexName, opts: CallOptions = {}): Promise<T | null> {
    if (!this.#catalog.has(indexName)) {
      throw new ConfigError(`Unknown index "${indexName}"`);
    }
    const record = await this.get(indexName, serializeId(id), opts);
    return record ? record.value : null;
  }

  /**
   * Every value held by the default index
   */
  getAll(opts: ScanOptions & CallOptions = {}): RecordSequence<T> {
    return this.scan(this.defaultIndexName, opts);
  }

  scan(partitionKey: string, opts: ScanOptions & CallOptions = {}): RecordSequence<T> {
    return this.#deferred(opts, (scanOpts) => this.#reader.scan(partitionKey, scanOpts));
  }

  scanRange(
    partitionKey: string,
    minSortKey: string,
    maxSortKey: string,
    opts: ScanOptions & CallOptions = {}
  ): RecordSequence<T> {
    return this.#deferred(opts, (scanOpts) =>
      this.#reader.scanRange(partitionKey, minSortKey, maxSortKey, scanOpts)
    );
  }

  scanWhere(
    partitionKey: string,
    property: string,
    value: PropertyInput,
    opts: ScanOptions & CallOptions = {}
  ): RecordSequence<T> {
    return this.#deferred(opts, (scanOpts) => this.#reader.scanWhere(partitionKey, property, value, scanOpts));
  }

  /**
   * Records of an index partition whose indexed value equals `value`
   */
  findByIndexedValue(indexName: string, value: unknown, opts: ScanOptions & CallOptions = {}): RecordSequence<T> {
    return this.#deferred(opts, (scanOpts) => this.#reader.scanIndexedValue(indexName, value, scanOpts));
  }

  /**
   * Bootstrap the catalog before the first page of every iteration
   */
  #deferred(
    opts: ScanOptions & CallOptions,
    make: (scanOpts: ScanOptions) => RecordSequence<T>
  ): RecordSequence<T> {
    return new RecordSequence<T>(() => this.#pagesAfterBootstrap(opts, make));
  }

  async *#pagesAfterBootstrap(
    opts: ScanOptions & CallOptions,
    make: (scanOpts: ScanOptions) => RecordSequence<T>
  ): AsyncGenerator<TableRecord<T>[]> {
    const callOpts = this.#signal(opts);
    await this.#catalog.bootstrap(callOpts);
    yield* make({ ...callOpts, pageSize: opts.pageSize, limit: opts.limit }).pages();
  }

  // Indexes

  /**
   * Builder pre-bound to this table's identity accessor and clock
   */
  createIndex(name: string): TableIndexDefinition<T> {
    return new TableIndexDefinition<T>(name, { getId: this.#getId, clock: this.#clock });
  }

  /**
   * Register an index. Existing values reach it through a backfill on the next write,
   * or right away through reindex(). Returns false when the name is already registered.
   */
  addIndex(definition: IndexDefinition<T> | IndexDefinitionInit<T>): boolean {
    const def = isDefinition(definition)
      ? definition
      : defineIndex(definition, { getId: this.#getId, clock: this.#clock });
    return this.#catalog.register(def);
  }

  addIndexes(definitions: ReadonlyArray<IndexDefinition<T> | IndexDefinitionInit<T>>): boolean[] {
    return definitions.map((def) => this.addIndex(def));
  }

  /**
   * Rebuild indexes from the default index (all non-default indexes when omitted)
   */
  async reindex(indexNames?: readonly string[], opts: CallOptions = {}): Promise<WriteReport> {
    const callOpts = this.#signal(opts);
    await this.#catalog.notePartitionKeys(
      this.#catalog.definitions.map((def) => def.name),
      callOpts
    );
    return this.#engine.backfill(indexNames, callOpts);
  }

  async knownPartitionKeys(opts: CallOptions = {}): Promise<string[]> {
    await this.#catalog.refresh(this.#signal(opts));
    return this.#catalog.knownPartitionKeys();
  }
}

/**
 * Open a table handle. Nothing touches the backend until the first call.
 */
export function openTable<T>(options: TableOptions<T>): Table<T> {
  return new Table<T>(options);
}
