/**
 * Integration tests for CLI commands
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { createTempRoot, parseJsonOutput, removeDir, runCli, type CliResult } from "@tablemat/testkit";
import { run } from "../src/program.js";

describe("CLI", () => {
  let root: string;

  beforeEach(async () => {
    root = await createTempRoot("tablemat-cli-");
  });

  afterEach(async () => {
    await removeDir(root);
  });

  function cli(args: string[], input?: string): Promise<CliResult> {
    return runCli(run, args, {
      env: { TABLEMAT_ROOT: root, TABLEMAT_LOG_LEVEL: "error" },
      input,
    });
  }

  async function writeConfig(config: unknown): Promise<void> {
    await fs.writeFile(path.join(root, "tablemat.config.json"), JSON.stringify(config), "utf8");
  }

  const alice = { id: "u1", name: "Alice", team: "core" };
  const bob = { id: "u2", name: "Bob", team: "edge" };

  describe("init", () => {
    it("should create the table and report where", async () => {
      const result = await cli(["init"]);

      expect(result.exitCode).toBe(0);
      expect(result.stdout).toBe(`Initialized table DocumentTable at ${path.resolve(root)}\n`);
    });

    it("should honor --table", async () => {
      const result = await cli(["--table", "People", "init"]);

      expect(result.stdout).toBe(`Initialized table People at ${path.resolve(root)}\n`);
    });

    it("should reject an invalid table name", async () => {
      const result = await cli(["--table", "bad-name", "init"]);

      expect(result.exitCode).toBe(1);
      expect(result.stderr).toMatch(/^Error: /);
    });
  });

  describe("put and get", () => {
    it("should write inline documents and read them back", async () => {
      const put = await cli(["put", "--data", JSON.stringify([alice, bob])]);
      expect(put.exitCode).toBe(0);
      expect(put.stdout).toBe("Wrote 2 record(s) across 1 index(es)\n");

      const get = await cli(["get", "Default", "u2"]);
      expect(get.exitCode).toBe(0);
      expect(parseJsonOutput(get.stdout)).toEqual(bob);
    });

    it("should read a single document from stdin", async () => {
      const put = await cli(["put"], JSON.stringify(alice));
      expect(put.exitCode).toBe(0);

      const get = await cli(["get", "Default", "u1", "--raw"]);
      expect(get.stdout.trim().split("\n")).toHaveLength(1);
      expect(parseJsonOutput(get.stdout)).toEqual(alice);
    });

    it("should read documents from a file", async () => {
      const file = path.join(root, "docs.json");
      await fs.writeFile(file, JSON.stringify([alice]), "utf8");

      const put = await cli(["put", "--file", file]);

      expect(put.stdout).toBe("Wrote 1 record(s) across 1 index(es)\n");
    });

    it("should exit 2 when the record does not exist", async () => {
      const result = await cli(["get", "Default", "missing"]);

      expect(result.exitCode).toBe(2);
      expect(result.stdout).toBe("");
      expect(result.stderr).toBe("Error: Record not found: Default/missing\n");
    });

    it("should exit 3 when some records fail", async () => {
      await cli(["put", "--data", JSON.stringify(alice)]);
      const result = await cli(["put", "--mode", "insert", "--data", JSON.stringify(alice)]);

      expect(result.exitCode).toBe(3);
      expect(result.stdout).toBe("Wrote 0 record(s) across 0 index(es), 1 failed\n");
      expect(result.stderr).toContain("  value 0 [Default] Default/u1: ");
      expect(result.stderr).toContain("Error: Some records were not written\n");
    });

    it("should suppress the summary with --quiet", async () => {
      const result = await cli(["--quiet", "put", "--data", JSON.stringify(alice)]);

      expect(result.exitCode).toBe(0);
      expect(result.stdout).toBe("");
    });

    it("should reject input that is not an object", async () => {
      const result = await cli(["put", "--data", "[1, 2]"]);

      expect(result.exitCode).toBe(1);
      expect(result.stderr).toBe("Error: Input must be a JSON object or an array of JSON objects\n");
    });

    it("should report invalid JSON", async () => {
      const result = await cli(["put", "--data", "{bad"]);

      expect(result.exitCode).toBe(1);
      expect(result.stderr).toMatch(/^Error: Invalid JSON in --data: /);
    });

    it("should refuse --file together with --data", async () => {
      const result = await cli(["put", "--file", "x.json", "--data", "{}"]);

      expect(result.exitCode).toBe(1);
      expect(result.stderr).toBe("Error: Cannot use both --file and --data; choose one or use stdin\n");
    });

    it("should ask for input when stdin is a terminal", async () => {
      const result = await cli(["put"]);

      expect(result.exitCode).toBe(1);
      expect(result.stderr).toBe("Error: No input provided. Use --file, --data, or pipe JSON to stdin\n");
    });

    it("should reject an unknown write mode", async () => {
      const result = await cli(["put", "--mode", "bogus", "--data", "{}"]);

      expect(result.exitCode).toBe(1);
      expect(result.stderr).toContain("--mode must be one of insert, upsert, merge, replace");
    });
  });

  describe("delete", () => {
    it("should remove the document from the default index", async () => {
      await cli(["put", "--data", JSON.stringify([alice, bob])]);

      const result = await cli(["delete", "--data", JSON.stringify(alice)]);
      expect(result.exitCode).toBe(0);
      expect(result.stdout).toBe("Deleted 1 record(s) across 1 index(es)\n");

      const get = await cli(["get", "Default", "u1"]);
      expect(get.exitCode).toBe(2);
    });
  });

  describe("scan", () => {
    beforeEach(async () => {
      const docs = [alice, bob, { id: "u3", name: "Carol", team: "core" }];
      await cli(["put", "--data", JSON.stringify(docs)]);
    });

    it("should list documents in sort key order", async () => {
      const result = await cli(["scan", "Default"]);

      expect(result.exitCode).toBe(0);
      const docs = parseJsonOutput(result.stdout);
      expect(docs).toEqual([alice, bob, { id: "u3", name: "Carol", team: "core" }]);
    });

    it("should print sort keys with --keys", async () => {
      const result = await cli(["scan", "Default", "--keys"]);

      expect(result.stdout).toBe("u1\nu2\nu3\n");
    });

    it("should apply --limit", async () => {
      const result = await cli(["scan", "Default", "--keys", "--limit", "2"]);

      expect(result.stdout).toBe("u1\nu2\n");
    });

    it("should restrict to a sort key range", async () => {
      const result = await cli(["scan", "Default", "--keys", "--min", "u2", "--max", "u3"]);

      expect(result.stdout).toBe("u2\nu3\n");
    });

    it("should match a stored property with --where", async () => {
      const hit = await cli(["scan", "Default", "--keys", "--where", "DomainObjectType=Document"]);
      const miss = await cli(["scan", "Default", "--keys", "--where", "DomainObjectType=Other"]);

      expect(hit.stdout).toBe("u1\nu2\nu3\n");
      expect(miss.stdout).toBe("");
    });

    it("should refuse --where together with a range", async () => {
      const result = await cli(["scan", "Default", "--where", "a=b", "--min", "u1"]);

      expect(result.exitCode).toBe(1);
      expect(result.stderr).toBe("Error: Use either --where or --min/--max\n");
    });

    it("should refuse --type without --where", async () => {
      const result = await cli(["scan", "Default", "--type", "int32"]);

      expect(result.stderr).toBe("Error: --type only applies to --where\n");
    });

    it("should report a --where value that does not fit its type", async () => {
      const result = await cli(["scan", "Default", "--where", "n=abc", "--type", "boolean"]);

      expect(result.exitCode).toBe(1);
      expect(result.stderr).toBe("Error: Invalid boolean value for --where: Not a boolean: abc\n");
    });

    it("should print nothing for an unknown partition", async () => {
      const result = await cli(["scan", "Nowhere", "--keys"]);

      expect(result.exitCode).toBe(0);
      expect(result.stdout).toBe("");
    });

    it("should fail on a missing partition argument", async () => {
      const result = await cli(["scan"]);

      expect(result.exitCode).toBe(1);
      expect(result.stderr).toContain("missing required argument 'partition'");
    });
  });

  describe("indexes from the config file", () => {
    it("should write to configured indexes and prune stale records", async () => {
      await writeConfig({ indexes: [{ name: "ByTeam", partitionKey: "team-{team}" }] });

      const first = await cli(["put", "--data", JSON.stringify(alice)]);
      expect(first.stdout).toBe("Wrote 2 record(s) across 2 index(es)\n");

      const moved = await cli(["put", "--data", JSON.stringify({ ...alice, team: "edge" })]);
      expect(moved.stdout).toBe("Wrote 2 record(s) across 2 index(es), pruned 1\n");

      expect((await cli(["scan", "team-core", "--keys"])).stdout).toBe("");
      expect((await cli(["scan", "team-edge", "--keys"])).stdout).toBe("u1\n");
    });

    it("should show the catalog", async () => {
      await writeConfig({ indexes: [{ name: "ByTeam", partitionKey: "team-{team}" }] });
      await cli(["put", "--data", JSON.stringify([alice, bob])]);

      const text = await cli(["catalog"]);
      expect(text.stdout).toBe("Default\nByTeam\nteam-core\nteam-edge\n");

      const json = await cli(["catalog", "--json"]);
      expect(parseJsonOutput(json.stdout)).toEqual({
        table: "DocumentTable",
        indexes: ["Default", "ByTeam"],
        partitionKeys: ["Default", "ByTeam", "team-core", "team-edge"],
      });
    });

    it("should use the configured id field and type name", async () => {
      await writeConfig({ idField: "meta.key", typeName: "Person" });
      await cli(["put", "--data", JSON.stringify({ meta: { key: "k1" }, name: "Dana" })]);

      const result = await cli(["get", "Default", "k1"]);
      expect(parseJsonOutput(result.stdout)).toEqual({ meta: { key: "k1" }, name: "Dana" });

      const init = await cli(["init"]);
      expect(init.stdout).toBe(`Initialized table PersonTable at ${path.resolve(root)}\n`);
    });

    it("should reject an invalid config file", async () => {
      await writeConfig({ indexes: [{ name: "" }] });

      const result = await cli(["init"]);

      expect(result.exitCode).toBe(1);
      expect(result.stderr).toMatch(/^Error: /);
    });
  });

  describe("reindex", () => {
    it("should rebuild a newly configured index from the default index", async () => {
      await cli(["put", "--data", JSON.stringify([alice, bob])]);
      await writeConfig({ indexes: [{ name: "ByTeam", partitionKey: "team-{team}" }] });

      const result = await cli(["reindex", "ByTeam"]);

      expect(result.exitCode).toBe(0);
      expect(result.stdout).toBe("Reindexed 2 record(s) across 1 index(es)\n");
      expect((await cli(["scan", "team-core", "--keys"])).stdout).toBe("u1\n");
    });

    it("should reject unknown index names", async () => {
      const result = await cli(["reindex", "Nope"]);

      expect(result.exitCode).toBe(1);
      expect(result.stderr).toBe("Error: Unknown index: Nope\n");
    });
  });

  describe("key commands", () => {
    it("should encode and decode keys", async () => {
      const encoded = await cli(["encode-key", "a/b"]);
      expect(encoded.stdout).toBe("$ENC_a_FS_b\n");

      const decoded = await cli(["decode-key", "$ENC_a_FS_b"]);
      expect(decoded.stdout).toBe("a/b\n");
    });
  });

  describe("program", () => {
    it("should print the version", async () => {
      const result = await cli(["--version"]);

      expect(result.exitCode).toBe(0);
      expect(result.stdout).toBe("0.1.0\n");
    });

    it("should print help to stdout", async () => {
      const result = await cli(["--help"]);

      expect(result.exitCode).toBe(0);
      expect(result.stdout).toContain("Usage: tablemat");
    });

    it("should fail on an unknown command", async () => {
      const result = await cli(["frobnicate"]);

      expect(result.exitCode).toBe(1);
      expect(result.stderr).toContain("unknown command 'frobnicate'");
    });

    it("should print timing metrics in verbose mode", async () => {
      const result = await cli(["--verbose", "init"]);

      expect(result.stderr).toMatch(/^metric cli\.init duration_ms=\d+ success=true\n$/);
    });
  });
});
