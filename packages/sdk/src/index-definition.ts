/**
 * Index definitions: rules that place a domain value into a partition with a sort key
 *
 * Every accessor is an explicit function captured at definition time; nothing inspects
 * the value's shape at runtime.
 */

import { chronologicalKey, highResolutionClock, type Clock } from "./codec/row-keys.js";
import { InvalidKeyError } from "./errors.js";
import { stableStringify } from "./format.js";

/**
 * A named rule deriving {partition key, sort key, indexed value} from a domain value
 */
export interface IndexDefinition<T> {
  readonly name: string;
  /**
   * True when sort keys are not derived from the value (e.g. chronological keys), so every
   * write adds a new record. Versioned records are never pruned or deleted by value.
   */
  readonly versioned: boolean;
  /** Membership predicate */
  matches(value: T): boolean;
  partitionKey(value: T): string;
  sortKey(value: T): string;
  indexedValue(value: T): unknown;
}

/**
 * Plain-object form of an index definition; omitted accessors fall back to the defaults
 */
export interface IndexDefinitionInit<T> {
  name: string;
  where?: (value: T) => boolean;
  partitionKey?: string | ((value: T) => string);
  sortKey?: (value: T) => string;
  /** Marks a custom sort key as producing a new key per write */
  versioned?: boolean;
  indexedValue?: (value: T) => unknown;
}

/**
 * Reads the identity field of a domain value
 */
export type IdAccessor<T> = (value: T) => unknown;

export interface IndexDefaults<T> {
  /** Identity accessor; without one, sort keys default to chronological keys */
  getId?: IdAccessor<T>;
  clock?: Clock;
}

/**
 * Serialize an identity value for use as a sort key. Strings are used verbatim,
 * everything else as canonical JSON.
 */
export function serializeId(id: unknown): string {
  if (typeof id === "string") return id;
  if (typeof id === "bigint") return id.toString();
  return stableStringify(id);
}

/**
 * Index definition with fluent setters
 *
 * @example
 * ```typescript
 * const active = new TableIndexDefinition<User>("ActiveUsers", { getId: (u) => u.id })
 *   .defineCriteria((u) => u.status === "Active")
 *   .setIndexedValue((u) => u.email);
 * ```
 */
export class TableIndexDefinition<T> implements IndexDefinition<T> {
  readonly name: string;
  #getId: IdAccessor<T> | undefined;
  #clock: Clock;
  #criteria: (value: T) => boolean = () => true;
  #partitionKey: (value: T) => string;
  #sortKey: ((value: T) => string) | undefined;
  #versioned: boolean;
  #indexedValue: (value: T) => unknown = () => "";

  constructor(name: string, defaults: IndexDefaults<T> = {}) {
    if (typeof name !== "string" || name.length === 0) {
      throw new InvalidKeyError(String(name), "index name must be a non-empty string");
    }
    this.name = name;
    this.#getId = defaults.getId;
    this.#clock = defaults.clock ?? highResolutionClock;
    this.#partitionKey = () => name;
    this.#versioned = this.#getId === undefined;
  }

  get versioned(): boolean {
    return this.#versioned;
  }

  /**
   * Fixed partition key, or a function deriving one per value
   */
  setPartitionKey(key: string | ((value: T) => string)): this {
    this.#partitionKey = typeof key === "string" ? () => key : key;
    return this;
  }

  /**
   * Membership predicate (default: every value belongs)
   */
  defineCriteria(criteria: (value: T) => boolean): this {
    this.#criteria = criteria;
    return this;
  }

  /**
   * Custom sort key, e.g. a chronological key to keep every version of a value
   */
  setSortKey(sortKey: (value: T) => string, options: { versioned?: boolean } = {}): this {
    this.#sortKey = sortKey;
    this.#versioned = options.versioned ?? false;
    return this;
  }

  setIndexedValue(indexedValue: (value: T) => unknown): this {
    this.#indexedValue = indexedValue;
    return this;
  }

  matches(value: T): boolean {
    return this.#criteria(value);
  }

  partitionKey(value: T): string {
    return this.#partitionKey(value);
  }

  sortKey(value: T): string {
    if (this.#sortKey) {
      return this.#sortKey(value);
    }
    if (!this.#getId) {
      return chronologicalKey(this.#clock);
    }

    const id = this.#getId(value);
    if (id === undefined || id === null) {
      throw new InvalidKeyError("", `value has no identity for index "${this.name}"`);
    }
    return serializeId(id);
  }

  indexedValue(value: T): unknown {
    return this.#indexedValue(value);
  }
}

/**
 * Build an index definition from its plain-object form
 */
export function defineIndex<T>(
  init: IndexDefinitionInit<T>,
  defaults: IndexDefaults<T> = {}
): TableIndexDefinition<T> {
  const def = new TableIndexDefinition<T>(init.name, defaults);
  if (init.where) def.defineCriteria(init.where);
  if (init.partitionKey !== undefined) def.setPartitionKey(init.partitionKey);
  if (init.sortKey) def.setSortKey(init.sortKey, { versioned: init.versioned ?? false });
  if (init.indexedValue) def.setIndexedValue(init.indexedValue);
  return def;
}
