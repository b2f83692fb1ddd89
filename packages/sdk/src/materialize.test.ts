import { describe, it, expect } from "vitest";
import { FaultInjectingBackend, UserSchema, getUserId, makeUser, makeUsers, type User } from "@tablemat/testkit";
import { MemoryTableBackend } from "./backends/memory.js";
import { BatchAssembler } from "./batch.js";
import { IndexCatalog } from "./catalog.js";
import type { FatEntityLimits } from "./codec/fat-entity.js";
import { chronologicalKey } from "./codec/row-keys.js";
import {
  BackendRequestError,
  BackendTransientError,
  BatchConstraintViolationError,
  InvalidKeyError,
  ObjectTooLargeError,
} from "./errors.js";
import { canonicalSerializer } from "./format.js";
import { TableIndexDefinition } from "./index-definition.js";
import { MaterializationEngine } from "./materialize.js";
import { QueryFacade } from "./query.js";
import type { TableBackend } from "./types.js";

const TABLE = "UserTable";

interface SetupOptions {
  backend?: TableBackend;
  upsertBeforeDelete?: boolean;
  pruneStaleRecords?: boolean;
  limits?: FatEntityLimits;
  maxBatchBytes?: number;
}

function setup(options: SetupOptions = {}) {
  const memory = new MemoryTableBackend();
  const backend = options.backend ?? memory;
  const defaultIndex = new TableIndexDefinition<User>("Default", { getId: getUserId }).setIndexedValue(() => "User");
  const catalog = new IndexCatalog(backend, TABLE, defaultIndex);
  const reader = new QueryFacade<User>({
    backend,
    table: TABLE,
    serializer: canonicalSerializer,
    decoder: UserSchema,
  });
  const engine = new MaterializationEngine<User>({
    catalog,
    assembler: new BatchAssembler(backend, { maxBytes: options.maxBatchBytes }),
    reader,
    typeName: "User",
    serializer: canonicalSerializer,
    maxConcurrency: 4,
    upsertBeforeDelete: options.upsertBeforeDelete ?? true,
    pruneStaleRecords: options.pruneStaleRecords ?? true,
    limits: options.limits,
  });
  return { memory, catalog, reader, engine };
}

function activeIndex(): TableIndexDefinition<User> {
  return new TableIndexDefinition<User>("Active", { getId: getUserId }).defineCriteria((u) => u.status === "Active");
}

describe("MaterializationEngine", () => {
  describe("write()", () => {
    it("should write one record per matching definition", async () => {
      const { memory, catalog, engine } = setup();
      catalog.register(activeIndex());
      catalog.register(new TableIndexDefinition<User>("Never", { getId: getUserId }).defineCriteria(() => false));

      const report = await engine.write([makeUser(1)], "insertOrReplace");

      expect(report.ok).toBe(true);
      expect(report.succeeded).toEqual([
        { indexName: "Default", partitionKey: "Default", sortKey: "u001" },
        { indexName: "Active", partitionKey: "Active", sortKey: "u001" },
      ]);
      expect(memory.count(TABLE, "Default")).toBe(1);
      expect(memory.count(TABLE, "Active")).toBe(1);
      expect(memory.count(TABLE, "Never")).toBe(0);
    });

    it("should note index names and dynamic partitions in the catalog", async () => {
      const { catalog, engine } = setup();
      catalog.register(
        new TableIndexDefinition<User>("ByTeam", { getId: getUserId }).setPartitionKey((u) => `team-${u.team ?? "none"}`)
      );

      await engine.write([makeUser(1, { team: "core" }), makeUser(2)], "insertOrReplace");

      expect(catalog.knownPartitionKeys()).toEqual(["Default", "ByTeam", "team-core", "team-none"]);
    });

    it("should keep the last value when a request repeats a key", async () => {
      const { reader, engine } = setup();

      const report = await engine.write(
        [makeUser(1, { name: "First" }), makeUser(1, { name: "Second" })],
        "insertOrReplace"
      );

      expect(report.succeeded).toHaveLength(1);
      expect((await reader.get("Default", "u001"))?.value.name).toBe("Second");
    });

    it("should report oversized values per record and write the rest", async () => {
      const { memory, catalog, engine } = setup({ limits: { chunkSize: 50, maxSlots: 2 } });
      catalog.register(activeIndex());

      const report = await engine.write(
        [makeUser(1), makeUser(2, { bio: "b".repeat(200) })],
        "insertOrReplace"
      );

      expect(report.ok).toBe(false);
      expect(report.succeeded.map((ref) => `${ref.indexName}/${ref.sortKey}`)).toEqual(["Default/u001", "Active/u001"]);
      expect(report.failed.map((f) => [f.valueIndex, f.indexName])).toEqual([
        [1, "Default"],
        [1, "Active"],
      ]);
      expect(report.failed[0]?.error).toBeInstanceOf(ObjectTooLargeError);
      expect(memory.count(TABLE, "Default")).toBe(1);
    });

    it("should reject an indexed value larger than one cell and keep the other indexes", async () => {
      const { memory, catalog, engine } = setup({ limits: { chunkSize: 200, maxSlots: 16 } });
      catalog.register(new TableIndexDefinition<User>("ByBio", { getId: getUserId }).setIndexedValue((u) => u.bio ?? ""));

      const report = await engine.write(
        [makeUser(1, { bio: "short" }), makeUser(2, { bio: "b".repeat(300) })],
        "insertOrReplace"
      );

      expect(report.ok).toBe(false);
      expect(report.failed.map((f) => [f.valueIndex, f.indexName])).toEqual([[1, "ByBio"]]);
      expect(report.failed[0]?.error).toBeInstanceOf(ObjectTooLargeError);
      expect(report.failed[0]?.error.message).toBe(
        "Object is too large for a fat entity: 312 characters exceeds 200"
      );
      expect(memory.count(TABLE, "Default")).toBe(2);
      expect(memory.count(TABLE, "ByBio")).toBe(1);
    });

    it("should report a record larger than a transaction group per record", async () => {
      const { memory, engine } = setup({ maxBatchBytes: 2000 });

      const report = await engine.write(
        [makeUser(1), makeUser(2, { bio: "b".repeat(3000) }), makeUser(3)],
        "insertOrReplace"
      );

      expect(report.ok).toBe(false);
      expect(report.succeeded.map((ref) => ref.sortKey)).toEqual(["u001", "u003"]);
      expect(report.failed.map((f) => [f.valueIndex, f.indexName, f.sortKey])).toEqual([[1, "Default", "u002"]]);
      expect(report.failed[0]?.error).toBeInstanceOf(BatchConstraintViolationError);
      expect(memory.count(TABLE, "Default")).toBe(2);
    });

    it("should refuse records in the catalog partition", async () => {
      const { memory, catalog, engine } = setup();
      catalog.register(new TableIndexDefinition<User>("Reserved", { getId: getUserId }).setPartitionKey(() => "TableMetaData"));

      const report = await engine.write([makeUser(1)], "insertOrReplace");

      expect(report.failed.map((f) => [f.indexName, f.partitionKey])).toEqual([["Reserved", "TableMetaData"]]);
      expect(report.failed[0]?.error).toBeInstanceOf(InvalidKeyError);
      expect(memory.count(TABLE, "TableMetaData")).toBe(1);
      expect(catalog.knownPartitionKeys()).toEqual(["Default", "Reserved"]);
    });

    it("should report every record of a failed group", async () => {
      const memory = new MemoryTableBackend();
      const faulty = new FaultInjectingBackend(memory).failNext(
        "executeBatch",
        () => new BackendRequestError(503, "ServerBusy", "busy"),
        {
          when: (call) =>
            call.method === "executeBatch" &&
            call.ops.some((op) => op.kind !== "delete" && op.entity.partitionKey === "Active"),
        }
      );
      const { catalog, engine } = setup({ backend: faulty });
      catalog.register(activeIndex());

      const report = await engine.write([makeUser(1), makeUser(2)], "insertOrReplace");

      expect(report.ok).toBe(false);
      expect(report.succeeded.map((ref) => ref.sortKey)).toEqual(["u001", "u002"]);
      expect(report.failed.map((f) => [f.indexName, f.sortKey, f.error.message])).toEqual([
        ["Active", "u001", "busy"],
        ["Active", "u002", "busy"],
      ]);
      expect(report.groups.map((g) => [g.indexName, g.ok])).toEqual([
        ["Default", true],
        ["Active", false],
      ]);
    });

    it("should fail an insert of an existing key", async () => {
      const { engine } = setup();
      await engine.write([makeUser(1)], "insert");

      const report = await engine.write([makeUser(1)], "insert");

      expect(report.ok).toBe(false);
      expect(report.failed[0]?.error).toBeInstanceOf(BackendRequestError);
    });

    it("should write merges as replacements so no stale slots remain", async () => {
      const { memory, engine } = setup({ limits: { chunkSize: 50, maxSlots: 16 } });
      await engine.write([makeUser(1, { bio: "b".repeat(120) })], "insertOrReplace");
      const before = await memory.execute(TABLE, { kind: "retrieve", partitionKey: "Default", sortKey: "u001" });
      expect(before?.properties.E03).toBeDefined();

      const report = await engine.write([makeUser(1)], "insertOrMerge");

      const after = await memory.execute(TABLE, { kind: "retrieve", partitionKey: "Default", sortKey: "u001" });
      expect(report.kind).toBe("insertOrMerge");
      expect(report.groups.map((g) => g.kind)).toEqual(["insertOrReplace"]);
      expect(Object.keys(after?.properties ?? {}).filter((name) => name.startsWith("E"))).toEqual(["E01"]);
    });
  });

  describe("backfill", () => {
    it("should populate a newly registered index on the next write", async () => {
      const { memory, catalog, engine } = setup();
      await engine.write([makeUser(1), makeUser(2, { status: "Inactive" })], "insertOrReplace");
      catalog.register(activeIndex());

      await engine.write([makeUser(3)], "insertOrReplace");

      expect(memory.count(TABLE, "Active")).toBe(2);
      expect(memory.count(TABLE, "Default")).toBe(3);
    });

    it("should retry a failed backfill on the next write", async () => {
      const memory = new MemoryTableBackend();
      const faulty = new FaultInjectingBackend(memory);
      const { catalog, reader, engine } = setup({ backend: faulty });
      await engine.write(makeUsers(3), "insertOrReplace");
      catalog.register(activeIndex());
      faulty.failNext("executeQuerySegmented", () => new BackendTransientError("query", "throttled"));

      const first = await engine.write([makeUser(10)], "insertOrReplace");

      expect(first.ok).toBe(false);
      expect(first.failed.map((f) => [f.valueIndex, f.indexName])).toEqual([[-1, "Active"]]);
      expect(first.failed[0]?.error).toBeInstanceOf(BackendTransientError);
      expect(first.succeeded.map((ref) => `${ref.indexName}/${ref.sortKey}`)).toEqual(["Default/u010", "Active/u010"]);

      const second = await engine.write([makeUser(11)], "insertOrReplace");

      expect(second.ok).toBe(true);
      const active = await reader.scan("Active").toArray();
      expect(active.map((record) => record.sortKey)).toEqual(["u001", "u002", "u003", "u010", "u011"]);
      expect(faulty.callsTo("executeQuerySegmented").length).toBeGreaterThanOrEqual(2);
    });

    it("should not run a completed backfill again", async () => {
      const memory = new MemoryTableBackend();
      const faulty = new FaultInjectingBackend(memory);
      const { catalog, engine } = setup({ backend: faulty });
      await engine.write(makeUsers(2), "insertOrReplace");
      catalog.register(activeIndex());
      await engine.write([makeUser(3)], "insertOrReplace");
      const scans = faulty.callsTo("executeQuerySegmented").length;

      await engine.write([makeUser(4)], "insertOrReplace");

      expect(faulty.callsTo("executeQuerySegmented")).toHaveLength(scans);
      expect(memory.count(TABLE, "Active")).toBe(4);
    });

    it("should rebuild only the named indexes", async () => {
      const { memory, catalog, engine } = setup();
      await engine.write([makeUser(1)], "insertOrReplace");
      catalog.register(activeIndex());
      catalog.register(new TableIndexDefinition<User>("All", { getId: getUserId }));

      const report = await engine.backfill(["All"]);

      expect(report.succeeded).toEqual([{ indexName: "All", partitionKey: "All", sortKey: "u001" }]);
      expect(memory.count(TABLE, "Active")).toBe(0);
    });

    it("should page through the default index", async () => {
      const memory = new MemoryTableBackend();
      const { catalog, engine } = setup({ backend: memory });
      await engine.write(
        Array.from({ length: 5 }, (_, i) => makeUser(i + 1)),
        "insertOrReplace"
      );
      catalog.register(new TableIndexDefinition<User>("All", { getId: getUserId }));
      const reader = new QueryFacade<User>({
        backend: memory,
        table: TABLE,
        serializer: canonicalSerializer,
        decoder: UserSchema,
        pageSize: 2,
      });
      const paged = new MaterializationEngine<User>({
        catalog,
        assembler: new BatchAssembler(memory),
        reader,
        typeName: "User",
        serializer: canonicalSerializer,
        maxConcurrency: 1,
        upsertBeforeDelete: true,
        pruneStaleRecords: true,
      });

      const report = await paged.backfill();

      expect(report.groups).toHaveLength(3);
      expect(memory.count(TABLE, "All")).toBe(5);
    });
  });

  describe("delete", () => {
    it("should remove every record the value produces", async () => {
      const { memory, catalog, engine } = setup();
      catalog.register(activeIndex());
      await engine.write([makeUser(1)], "insertOrReplace");

      const report = await engine.write([makeUser(1)], "delete");

      expect(report.ok).toBe(true);
      expect(report.succeeded).toHaveLength(2);
      expect(memory.count(TABLE, "Default")).toBe(0);
      expect(memory.count(TABLE, "Active")).toBe(0);
    });

    it("should delete values that were never written when upserting first", async () => {
      const { memory, engine } = setup();

      const report = await engine.write([makeUser(9)], "delete");

      expect(report.ok).toBe(true);
      expect(report.groups.map((g) => g.kind)).toEqual(["insertOrReplace", "delete"]);
      expect(memory.count(TABLE, "Default")).toBe(0);
    });

    it("should surface missing keys on a strict backend without the upsert", async () => {
      const { engine } = setup({ upsertBeforeDelete: false });

      const report = await engine.write([makeUser(9)], "delete");

      expect(report.ok).toBe(false);
      expect(report.failed).toHaveLength(1);
      const error = report.failed[0]?.error;
      expect(error instanceof BackendRequestError && error.status).toBe(404);
    });

    it("should only delete records whose upsert succeeded", async () => {
      const faulty = new FaultInjectingBackend(new MemoryTableBackend());
      const { catalog, engine } = setup({ backend: faulty });
      catalog.register(activeIndex());
      await engine.write([makeUser(1)], "insertOrReplace");
      faulty.failNext("executeBatch", () => new BackendRequestError(503, "ServerBusy", "busy"), {
        when: (call) =>
          call.method === "executeBatch" &&
          call.ops.some((op) => op.kind === "insertOrReplace" && op.entity.partitionKey === "Active"),
      });

      const report = await engine.write([makeUser(1)], "delete");

      const deletedPartitions = faulty
        .callsTo("executeBatch")
        .flatMap((call) => call.ops)
        .flatMap((op) => (op.kind === "delete" ? [op.partitionKey] : []));
      expect(deletedPartitions).toEqual(["Default"]);
      expect(report.ok).toBe(false);
      expect(report.succeeded).toEqual([{ indexName: "Default", partitionKey: "Default", sortKey: "u001" }]);
    });

    it("should leave versioned indexes alone", async () => {
      const { memory, catalog, engine } = setup();
      catalog.register(
        new TableIndexDefinition<User>("History", { getId: getUserId }).setSortKey(() => chronologicalKey(), {
          versioned: true,
        })
      );
      await engine.write([makeUser(1)], "insertOrReplace");
      await engine.write([makeUser(1, { name: "Renamed" })], "insertOrReplace");

      await engine.write([makeUser(1)], "delete");

      expect(memory.count(TABLE, "History")).toBe(2);
      expect(memory.count(TABLE, "Default")).toBe(0);
    });
  });

  describe("pruning", () => {
    it("should remove a value from an index it no longer matches", async () => {
      const { memory, catalog, engine } = setup();
      catalog.register(activeIndex());
      await engine.write([makeUser(1)], "insertOrReplace");

      const report = await engine.write([makeUser(1, { status: "Inactive" })], "replace");

      expect(report.ok).toBe(true);
      expect(report.pruned).toEqual([{ indexName: "Active", partitionKey: "Active", sortKey: "u001" }]);
      expect(memory.count(TABLE, "Active")).toBe(0);
    });

    it("should move a value between dynamic partitions", async () => {
      const { memory, catalog, engine } = setup();
      catalog.register(
        new TableIndexDefinition<User>("ByTeam", { getId: getUserId }).setPartitionKey((u) => `team-${u.team ?? "none"}`)
      );
      await engine.write([makeUser(1, { team: "a" })], "insertOrReplace");

      const report = await engine.write([makeUser(1, { team: "b" })], "insertOrReplace");

      expect(report.pruned).toEqual([{ indexName: "ByTeam", partitionKey: "team-a", sortKey: "u001" }]);
      expect(memory.count(TABLE, "team-a")).toBe(0);
      expect(memory.count(TABLE, "team-b")).toBe(1);
    });

    it("should not prune when disabled", async () => {
      const { memory, catalog, engine } = setup({ pruneStaleRecords: false });
      catalog.register(activeIndex());
      await engine.write([makeUser(1)], "insertOrReplace");

      const report = await engine.write([makeUser(1, { status: "Inactive" })], "insertOrReplace");

      expect(report.pruned).toEqual([]);
      expect(memory.count(TABLE, "Active")).toBe(1);
    });

    it("should keep the previous records of a value that failed to write", async () => {
      const { memory, catalog, engine } = setup({ limits: { chunkSize: 50, maxSlots: 2 } });
      catalog.register(activeIndex());
      await engine.write([makeUser(1)], "insertOrReplace");

      const report = await engine.write([makeUser(1, { status: "Inactive", bio: "b".repeat(200) })], "insertOrReplace");

      expect(report.ok).toBe(false);
      expect(report.pruned).toEqual([]);
      expect(memory.count(TABLE, "Active")).toBe(1);
    });
  });
});
