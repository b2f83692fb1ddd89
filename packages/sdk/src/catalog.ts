/**
 * Index catalog: the registered index definitions plus the durable set of known partition keys
 *
 * The partition set lives in the table itself under a reserved partition/sort key pair.
 *
 * Invariants:
 * - Definition names are unique; registering a known name is a no-op
 * - The default index is always registered first
 * - Known partition keys only grow; this library never removes the catalog entry
 * - In "overwrite" mode concurrent writers in other processes can lose each other's updates;
 *   "optimistic" mode uses etag-conditional writes and merges on conflict instead
 */

import { edm } from "./codec/property.js";
import { KeyedMutex } from "./concurrency.js";
import { BackendRequestError, CatalogCorruptError, ConfigError } from "./errors.js";
import type { IndexDefinition } from "./index-definition.js";
import { logger } from "./observability/logs.js";
import { describeErrors, validateCatalogPayload } from "./schema/persisted.js";
import type { RequestOptions, TableBackend, TableEntity } from "./types.js";

export const CATALOG_PARTITION_KEY = "TableMetaData";
export const CATALOG_SORT_KEY = "PartitionSchemas";

const PROP_PARTITION_KEYS = "PartitionKeys";
const PROP_VERSION = "Version";
const MAX_CONFLICT_RETRIES = 5;

export type CatalogWriteMode = "overwrite" | "optimistic";

export interface IndexCatalogOptions {
  /** How the catalog entry is persisted (default: "overwrite") */
  writeMode?: CatalogWriteMode;
}

function isConflict(err: unknown): boolean {
  return err instanceof BackendRequestError && (err.status === 409 || err.status === 412);
}

/**
 * Registry of index definitions and known partitions for one table
 */
export class IndexCatalog<T> {
  #backend: TableBackend;
  #table: string;
  #writeMode: CatalogWriteMode;
  #definitions: IndexDefinition<T>[] = [];
  #known = new Set<string>();
  #version = 0;
  #etag: string | undefined;
  #bootstrap: Promise<void> | null = null;
  #lock = new KeyedMutex();
  readonly defaultIndex: IndexDefinition<T>;

  constructor(
    backend: TableBackend,
    table: string,
    defaultIndex: IndexDefinition<T>,
    options: IndexCatalogOptions = {}
  ) {
    this.#backend = backend;
    this.#table = table;
    this.#writeMode = options.writeMode ?? "overwrite";
    this.defaultIndex = defaultIndex;
    this.register(defaultIndex);
  }

  get tableName(): string {
    return this.#table;
  }

  /**
   * Active definitions in registration order
   */
  get definitions(): readonly IndexDefinition<T>[] {
    return this.#definitions;
  }

  get version(): number {
    return this.#version;
  }

  /**
   * Add a definition. Returns false when the name is already registered.
   * @throws {ConfigError} If the name collides with the reserved catalog partition
   */
  register(definition: IndexDefinition<T>): boolean {
    if (definition.name === CATALOG_PARTITION_KEY) {
      throw new ConfigError(`Index name "${CATALOG_PARTITION_KEY}" is reserved`);
    }
    if (this.has(definition.name)) {
      return false;
    }
    this.#definitions.push(definition);
    return true;
  }

  has(name: string): boolean {
    return this.#definitions.some((def) => def.name === name);
  }

  get(name: string): IndexDefinition<T> | undefined {
    return this.#definitions.find((def) => def.name === name);
  }

  knownPartitionKeys(): string[] {
    return [...this.#known];
  }

  isKnown(partitionKey: string): boolean {
    return this.#known.has(partitionKey);
  }

  /**
   * Load the catalog entry, creating it when the table has none. Runs once per catalog.
   */
  bootstrap(opts: RequestOptions = {}): Promise<void> {
    if (!this.#bootstrap) {
      this.#bootstrap = this.#load(opts).catch((err: unknown) => {
        // Allow a later call to retry
        this.#bootstrap = null;
        throw err;
      });
    }
    return this.#bootstrap;
  }

  async #load(opts: RequestOptions): Promise<void> {
    await this.#backend.ensureTable(this.#table, opts);

    const found = await this.#readEntry(opts);
    if (found) {
      logger.debug("catalog.loaded", {
        table: this.#table,
        details: { partitions: this.#known.size, version: this.#version },
      });
      return;
    }

    this.#known.add(this.defaultIndex.name);
    await this.#persist(opts);
    logger.info("catalog.created", { table: this.#table, partition: this.defaultIndex.name });
  }

  /**
   * Read the stored entry and merge its keys into memory. Returns false when absent.
   */
  async #readEntry(opts: RequestOptions): Promise<boolean> {
    const entity = await this.#backend.execute(
      this.#table,
      { kind: "retrieve", partitionKey: CATALOG_PARTITION_KEY, sortKey: CATALOG_SORT_KEY },
      opts
    );
    if (!entity) {
      return false;
    }

    const payload = this.#parseEntry(entity);
    for (const key of payload.partitionKeys) {
      this.#known.add(key);
    }
    this.#version = payload.version;
    this.#etag = entity.etag;
    return true;
  }

  #parseEntry(entity: TableEntity): { partitionKeys: string[]; version: number } {
    const keysProp = entity.properties[PROP_PARTITION_KEYS];
    const versionProp = entity.properties[PROP_VERSION];

    let partitionKeys: unknown;
    try {
      partitionKeys = keysProp?.type === "String" ? JSON.parse(keysProp.value) : undefined;
    } catch (err) {
      throw new CatalogCorruptError(this.#table, "PartitionKeys is not valid JSON", { cause: err });
    }

    const payload = {
      partitionKeys,
      version: versionProp?.type === "Int64" ? Number(versionProp.value) : 0,
    };
    if (!validateCatalogPayload(payload)) {
      throw new CatalogCorruptError(
        this.#table,
        describeErrors(validateCatalogPayload.errors).join("; ")
      );
    }
    return payload;
  }

  #toEntity(): TableEntity {
    const entity: TableEntity = {
      partitionKey: CATALOG_PARTITION_KEY,
      sortKey: CATALOG_SORT_KEY,
      properties: {
        [PROP_PARTITION_KEYS]: edm.string(JSON.stringify([...this.#known])),
        [PROP_VERSION]: edm.int64(BigInt(this.#version)),
      },
    };
    if (this.#writeMode === "optimistic" && this.#etag) {
      entity.etag = this.#etag;
    }
    return entity;
  }

  async #persist(opts: RequestOptions): Promise<void> {
    if (this.#writeMode === "overwrite") {
      this.#version++;
      const stored = await this.#backend.execute(
        this.#table,
        { kind: "insertOrReplace", entity: this.#toEntity() },
        opts
      );
      this.#etag = stored?.etag;
      return;
    }

    for (let attempt = 0; ; attempt++) {
      this.#version++;
      const entity = this.#toEntity();
      try {
        const stored = await this.#backend.execute(
          this.#table,
          entity.etag ? { kind: "replace", entity } : { kind: "insert", entity },
          opts
        );
        this.#etag = stored?.etag;
        return;
      } catch (err) {
        if (!isConflict(err) || attempt >= MAX_CONFLICT_RETRIES) {
          throw err;
        }
        logger.warn("catalog.conflict", {
          table: this.#table,
          details: { attempt: attempt + 1 },
        });
        await this.#readEntry(opts);
      }
    }
  }

  /**
   * Record a partition key. Returns true when it was not known before.
   */
  async notePartitionKey(partitionKey: string, opts: RequestOptions = {}): Promise<boolean> {
    const added = await this.notePartitionKeys([partitionKey], opts);
    return added.length > 0;
  }

  /**
   * Record several partition keys with at most one write. Returns the newly added ones.
   */
  async notePartitionKeys(partitionKeys: string[], opts: RequestOptions = {}): Promise<string[]> {
    await this.bootstrap(opts);

    return this.#lock.withLock("catalog", async () => {
      const added = [...new Set(partitionKeys)].filter((key) => !this.#known.has(key));
      if (added.length === 0) {
        return [];
      }

      for (const key of added) {
        this.#known.add(key);
      }
      try {
        await this.#persist(opts);
      } catch (err) {
        for (const key of added) {
          this.#known.delete(key);
        }
        throw err;
      }

      logger.info("catalog.partitions.added", {
        table: this.#table,
        details: { partitions: added },
      });
      return added;
    });
  }

  /**
   * Re-read the stored entry, merging keys added by other processes
   */
  async refresh(opts: RequestOptions = {}): Promise<void> {
    await this.bootstrap(opts);
    await this.#lock.withLock("catalog", async () => {
      await this.#readEntry(opts);
    });
  }
}
