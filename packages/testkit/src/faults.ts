/**
 * Backend wrapper that records calls and fails chosen ones on demand
 *
 * @example
 * ```typescript
 * const backend = new FaultInjectingBackend(new MemoryTableBackend());
 * backend.failNext("executeBatch", () => new BackendTransientError("executeBatch", "throttled"));
 * ```
 */

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
} from "@tablemat/sdk";

export type BackendCall =
  | { method: "ensureTable"; table: string }
  | { method: "execute"; table: string; op: TableOperation }
  | { method: "executeBatch"; table: string; ops: BatchOperation[] }
  | { method: "executeQuerySegmented"; table: string; query: TableQuery; token: ContinuationToken | null };

export type BackendMethod = BackendCall["method"];

export interface FaultOptions {
  /** How many matching calls fail (default: 1) */
  times?: number;
  /** Only calls satisfying this predicate fail */
  when?: (call: BackendCall) => boolean;
}

interface FaultRule {
  method: BackendMethod;
  makeError: () => Error;
  remaining: number;
  when: ((call: BackendCall) => boolean) | undefined;
}

export class FaultInjectingBackend implements TableBackend {
  readonly inner: TableBackend;
  readonly calls: BackendCall[] = [];
  #rules: FaultRule[] = [];

  constructor(inner: TableBackend) {
    this.inner = inner;
  }

  get capabilities(): BackendCapabilities {
    return this.inner.capabilities;
  }

  /**
   * Fail the next matching call(s) of a method with the given error
   */
  failNext(method: BackendMethod, makeError: () => Error, options: FaultOptions = {}): this {
    this.#rules.push({ method, makeError, remaining: options.times ?? 1, when: options.when });
    return this;
  }

  clearFaults(): void {
    this.#rules = [];
  }

  /**
   * Recorded calls of one method
   */
  callsTo<M extends BackendMethod>(method: M): Extract<BackendCall, { method: M }>[] {
    return this.calls.filter((call): call is Extract<BackendCall, { method: M }> => call.method === method);
  }

  #intercept(call: BackendCall): void {
    this.calls.push(call);
    const rule = this.#rules.find(
      (candidate) => candidate.method === call.method && candidate.remaining > 0 && (candidate.when?.(call) ?? true)
    );
    if (rule) {
      rule.remaining--;
      throw rule.makeError();
    }
  }

  async ensureTable(table: string, opts?: RequestOptions): Promise<void> {
    this.#intercept({ method: "ensureTable", table });
    return this.inner.ensureTable(table, opts);
  }

  async execute(table: string, op: TableOperation, opts?: RequestOptions): Promise<TableEntity | null> {
    this.#intercept({ method: "execute", table, op });
    return this.inner.execute(table, op, opts);
  }

  async executeBatch(table: string, ops: BatchOperation[], opts?: RequestOptions): Promise<void> {
    this.#intercept({ method: "executeBatch", table, ops });
    return this.inner.executeBatch(table, ops, opts);
  }

  async executeQuerySegmented(
    table: string,
    query: TableQuery,
    token: ContinuationToken | null,
    opts?: RequestOptions
  ): Promise<QuerySegment> {
    this.#intercept({ method: "executeQuerySegmented", table, query, token });
    return this.inner.executeQuerySegmented(table, query, token, opts);
  }
}
