import { describe, it, expect, beforeEach } from "vitest";
import { FaultInjectingBackend } from "@tablemat/testkit";
import { MemoryTableBackend } from "./backends/memory.js";
import { BatchAssembler, MAX_BATCH_BYTES, MAX_BATCH_OPERATIONS, toBatchOperation, type PendingWrite } from "./batch.js";
import { edm, entityByteSize } from "./codec/property.js";
import { BackendRequestError, BackendTransientError, BatchConstraintViolationError } from "./errors.js";
import { metrics } from "./observability/metrics.js";
import type { BatchOperation, TableEntity } from "./types.js";

const TABLE = "BatchTable";

function entity(partitionKey: string, sortKey: string, payload = "x"): TableEntity {
  return { partitionKey, sortKey, properties: { E01: edm.string(payload) } };
}

function targetsPartition(ops: readonly BatchOperation[], partitionKey: string): boolean {
  const first = ops[0];
  return first !== undefined && (first.kind === "delete" ? first.partitionKey : first.entity.partitionKey) === partitionKey;
}

function writes(specs: Array<[string, string]>): PendingWrite<number>[] {
  return specs.map(([pk, sk], ref) => ({ entity: entity(pk, sk), ref }));
}

describe("toBatchOperation", () => {
  it("should wrap the entity for write kinds", () => {
    const e = entity("p", "k");
    expect(toBatchOperation(e, "insertOrReplace")).toEqual({ kind: "insertOrReplace", entity: e });
  });

  it("should reduce a delete to its keys and etag", () => {
    expect(toBatchOperation({ ...entity("p", "k"), etag: 'W/"7"' }, "delete")).toEqual({
      kind: "delete",
      partitionKey: "p",
      sortKey: "k",
      etag: 'W/"7"',
    });
    expect(toBatchOperation(entity("p", "k"), "delete")).toEqual({ kind: "delete", partitionKey: "p", sortKey: "k" });
  });
});

describe("BatchAssembler", () => {
  const backend = new MemoryTableBackend();

  it("should default to the service limits", () => {
    const assembler = new BatchAssembler(backend);
    expect(assembler.maxOperations).toBe(MAX_BATCH_OPERATIONS);
    expect(assembler.maxBytes).toBe(MAX_BATCH_BYTES);
  });

  describe("assemble()", () => {
    it("should group by partition in first-seen order and cap operations", () => {
      const assembler = new BatchAssembler(backend, { maxOperations: 3 });
      const input = writes([
        ["p1", "a"],
        ["p2", "a"],
        ["p1", "b"],
        ["p1", "c"],
        ["p2", "b"],
        ["p1", "d"],
        ["p1", "e"],
        ["p1", "f"],
        ["p1", "g"],
      ]);

      const groups = assembler.assemble(input, "insertOrReplace", "Default");

      expect(groups.map((g) => [g.partitionKey, g.refs])).toEqual([
        ["p1", [0, 2, 3]],
        ["p1", [5, 6, 7]],
        ["p1", [8]],
        ["p2", [1, 4]],
      ]);
      expect(groups.every((g) => g.indexName === "Default" && g.kind === "insertOrReplace")).toBe(true);
    });

    it("should place every write in exactly one group", () => {
      const assembler = new BatchAssembler(backend, { maxOperations: 4 });
      const input = writes(Array.from({ length: 23 }, (_, i): [string, string] => [`p${i % 3}`, `k${i}`]));

      const refs = assembler
        .assemble(input, "insert", "Default")
        .flatMap((g) => g.refs)
        .sort((a, b) => a - b);

      expect(refs).toEqual(input.map((w) => w.ref));
    });

    it("should start a new group before the byte limit is crossed", () => {
      const size = entityByteSize(entity("p", "k1"));
      const assembler = new BatchAssembler(backend, { maxBytes: size * 2 });
      const input = writes([
        ["p", "k1"],
        ["p", "k2"],
        ["p", "k3"],
        ["p", "k4"],
        ["p", "k5"],
      ]);

      const groups = assembler.assemble(input, "insertOrReplace", "Default");

      expect(groups.map((g) => g.operations.length)).toEqual([2, 2, 1]);
      expect(groups.map((g) => g.bytes)).toEqual([size * 2, size * 2, size]);
    });

    it("should size deletes by their keys only", () => {
      const assembler = new BatchAssembler(backend);
      const [group] = assembler.assemble(
        [{ entity: entity("p", "k", "y".repeat(1000)), ref: 0 }],
        "delete",
        "Default"
      );

      expect(group?.bytes).toBe(entityByteSize({ partitionKey: "p", sortKey: "k", properties: {} }));
      expect(group?.operations).toEqual([{ kind: "delete", partitionKey: "p", sortKey: "k" }]);
    });

    it("should return no groups for no writes", () => {
      expect(new BatchAssembler(backend).assemble([], "insert", "Default")).toEqual([]);
    });
  });

  describe("verify()", () => {
    const assembler = new BatchAssembler(backend, { maxOperations: 2, maxBytes: 1000 });
    const base = { indexName: "Default", partitionKey: "p", kind: "insert" as const, refs: [], bytes: 10 };

    it("should reject an empty group", () => {
      expect(() => assembler.verify({ ...base, operations: [] })).toThrow(BatchConstraintViolationError);
    });

    it("should reject too many operations", () => {
      const operations = [1, 2, 3].map((i) => toBatchOperation(entity("p", `k${i}`), "insert"));
      expect(() => assembler.verify({ ...base, operations })).toThrow("3 operations exceeds 2");
    });

    it("should reject too many bytes", () => {
      const operations = [toBatchOperation(entity("p", "k"), "insert")];
      expect(() => assembler.verify({ ...base, operations, bytes: 1001 })).toThrow("1001 bytes exceeds 1000");
    });

    it("should reject an operation from another partition", () => {
      const operations = [toBatchOperation(entity("q", "k"), "insert")];
      expect(() => assembler.verify({ ...base, operations })).toThrow('partition "q" in group for "p"');
    });
  });

  describe("dispatch()", () => {
    let memory: MemoryTableBackend;

    beforeEach(async () => {
      memory = new MemoryTableBackend();
      await memory.ensureTable(TABLE);
      metrics.reset();
    });

    it("should write every group and report success", async () => {
      const assembler = new BatchAssembler(memory, { maxOperations: 2 });
      const groups = assembler.assemble(
        writes([
          ["p1", "a"],
          ["p1", "b"],
          ["p1", "c"],
          ["p2", "a"],
        ]),
        "insert",
        "Default"
      );

      const dispatched = await assembler.dispatch(groups, { table: TABLE, concurrency: 2 });

      expect(dispatched.map((d) => d.result.ok)).toEqual([true, true, true]);
      expect(memory.count(TABLE)).toBe(4);
      expect(metrics.getMetrics(TABLE, "Default")?.batches).toBe(3);
      expect(metrics.getMetrics(TABLE, "Default")?.recordsWritten).toBe(4);
    });

    it("should report a failing group without stopping the others", async () => {
      const faulty = new FaultInjectingBackend(memory).failNext(
        "executeBatch",
        () => new BackendRequestError(503, "ServerBusy", "busy"),
        { when: (call) => call.method === "executeBatch" && targetsPartition(call.ops, "p2") }
      );
      const assembler = new BatchAssembler(faulty);
      const groups = assembler.assemble(
        writes([
          ["p1", "a"],
          ["p2", "a"],
          ["p3", "a"],
        ]),
        "insert",
        "Default"
      );

      const dispatched = await assembler.dispatch(groups, { table: TABLE, concurrency: 1 });

      expect(dispatched.map((d) => [d.group.partitionKey, d.result.ok])).toEqual([
        ["p1", true],
        ["p2", false],
        ["p3", true],
      ]);
      expect(dispatched[1]?.result.error?.message).toBe("busy");
      expect(memory.count(TABLE)).toBe(2);
      expect(metrics.getMetrics(TABLE, "Default")?.batchesFailed).toBe(1);
    });

    it("should surface a backend rejection of the whole group", async () => {
      await memory.execute(TABLE, { kind: "insert", entity: entity("p1", "b") });
      const assembler = new BatchAssembler(memory);
      const groups = assembler.assemble(
        writes([
          ["p1", "a"],
          ["p1", "b"],
        ]),
        "insert",
        "Default"
      );

      const [dispatched] = await assembler.dispatch(groups, { table: TABLE, concurrency: 1 });

      expect(dispatched?.result.ok).toBe(false);
      expect(dispatched?.result.error).toBeInstanceOf(BackendRequestError);
      expect(memory.count(TABLE, "p1")).toBe(1);
    });

    it("should fail every group once the signal is aborted", async () => {
      const assembler = new BatchAssembler(memory);
      const groups = assembler.assemble(writes([["p1", "a"]]), "insert", "Default");
      const controller = new AbortController();
      controller.abort();

      const [dispatched] = await assembler.dispatch(groups, {
        table: TABLE,
        concurrency: 1,
        signal: controller.signal,
      });

      expect(dispatched?.result.error).toBeInstanceOf(BackendTransientError);
      expect(memory.count(TABLE)).toBe(0);
    });
  });
});
