/**
 * tablemat command line: commands over a file-backed table
 */

import { createRequire } from "node:module";
import { Command, CommanderError } from "commander";
import { z } from "zod";
import { keyEncoder, logger, readEnv, type SaveKind, type WriteReport } from "@tablemat/sdk";
import {
  parseJson,
  parseNonNegativeInt,
  parseValueKind,
  parseWhere,
  parseWriteMode,
  toTypedValue,
  type ValueKind,
  type WhereClause,
} from "./lib/arg.js";
import { isVerbose, resolveConfigPath, resolveRoot } from "./lib/env.js";
import { CliError, EXIT_NOT_FOUND, EXIT_OK, EXIT_PARTIAL, formatCliError, mapSdkErrorToExitCode } from "./lib/errors.js";
import { readJsonFromFile, type CliIo } from "./lib/io.js";
import { colorize, printFailures, printJson, printLines, summarizeReport } from "./lib/render.js";
import { DocumentSchema, openCliTable, type CliTable, type Document } from "./lib/table.js";
import { withTiming } from "./lib/telemetry.js";

const PackageJsonSchema = z.object({ version: z.string() });
const packageJson = PackageJsonSchema.parse(createRequire(import.meta.url)("@tablemat/cli/package.json"));

const DocumentsSchema = z.union([DocumentSchema, z.array(DocumentSchema)]);

type GlobalOptions = {
  root?: string;
  table?: string;
  config?: string;
  verbose?: boolean;
  quiet?: boolean;
};

interface InputOptions {
  file?: string;
  data?: string;
}

interface PutOptions extends InputOptions {
  mode: SaveKind;
}

interface GetOptions {
  raw?: boolean;
}

interface ScanOptions {
  min?: string;
  max?: string;
  where?: WhereClause;
  type?: ValueKind;
  limit?: number;
  keys?: boolean;
  raw?: boolean;
}

interface JsonOptions {
  json?: boolean;
}

/**
 * Build the command tree. Output goes through `io`; failures propagate to run().
 */
export function createProgram(io: CliIo): Command {
  const program = new Command();

  const globals = (): GlobalOptions => program.opts<GlobalOptions>();
  const verbose = (): boolean => isVerbose(io.env, globals().verbose === true);
  const say = (line: string): void => {
    if (!globals().quiet) io.stdout(line + "\n");
  };

  const open = async (): Promise<CliTable & { root: string }> => {
    const opts = globals();
    const root = resolveRoot(opts.root, io.env);
    const opened = await openCliTable({
      root,
      configPath: resolveConfigPath(opts.config, root),
      table: opts.table,
      env: io.env,
    });
    return { ...opened, root };
  };

  const readDocuments = async (options: InputOptions): Promise<Document[]> => {
    if (options.file !== undefined && options.data !== undefined) {
      throw new CliError("Cannot use both --file and --data; choose one or use stdin");
    }

    let raw: unknown;
    if (options.file !== undefined) {
      raw = await readJsonFromFile(options.file);
    } else if (options.data !== undefined) {
      raw = parseJson(options.data, "--data");
    } else {
      if (io.stdinIsTTY) {
        throw new CliError("No input provided. Use --file, --data, or pipe JSON to stdin");
      }
      const stdin = await io.readStdin();
      if (!stdin.trim()) {
        throw new CliError("stdin is empty");
      }
      raw = parseJson(stdin, "stdin");
    }

    const parsed = DocumentsSchema.safeParse(raw);
    if (!parsed.success) {
      throw new CliError("Input must be a JSON object or an array of JSON objects");
    }
    return Array.isArray(parsed.data) ? parsed.data : [parsed.data];
  };

  const finishWrite = (verb: string, report: WriteReport): void => {
    say(summarizeReport(verb, report));
    if (!report.ok) {
      printFailures(io, report);
      throw new CliError("Some records were not written", { exitCode: EXIT_PARTIAL });
    }
  };

  program
    .name("tablemat")
    .description("tablemat - secondary-index materialization over a partitioned table")
    .version(packageJson.version)
    .option("--root <path>", "Data directory root")
    .option("--table <name>", "Table name")
    .option("--config <path>", "Config file (default: <root>/tablemat.config.json)")
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Suppress non-error output")
    .exitOverride()
    .configureOutput({
      writeOut: (str) => io.stdout(str),
      writeErr: (str) => io.stderr(str),
      outputError: (str, write) => write(colorize(str, "red", io.stderrIsTTY ?? false)),
    })
    .hook("preAction", () => {
      const level = readEnv(io.env).logLevel;
      if (verbose()) {
        logger.setLevel("debug");
      } else if (level) {
        logger.setLevel(level);
      } else if (globals().quiet) {
        logger.setLevel("error");
      }
    });

  program
    .command("init")
    .description("Create the table and its partition catalog")
    .action(async () => {
      await withTiming(io, verbose(), "cli.init", async () => {
        const { table, root } = await open();
        await table.knownPartitionKeys();
        say(`Initialized table ${table.name} at ${root}`);
      });
    });

  program
    .command("put")
    .description("Write one document or an array of documents to every matching index")
    .option("--file <path>", "Read documents from JSON file")
    .option("--data <json>", "Inline JSON documents")
    .option("--mode <mode>", "insert, upsert, merge or replace", parseWriteMode, "insertOrReplace")
    .action(async (options: PutOptions) => {
      await withTiming(io, verbose(), "cli.put", async () => {
        const docs = await readDocuments(options);
        const { table } = await open();
        finishWrite("Wrote", await table.save(docs, options.mode));
      });
    });

  program
    .command("delete")
    .description("Delete documents and every record derived from them")
    .option("--file <path>", "Read documents from JSON file")
    .option("--data <json>", "Inline JSON documents")
    .action(async (options: InputOptions) => {
      await withTiming(io, verbose(), "cli.delete", async () => {
        const docs = await readDocuments(options);
        const { table } = await open();
        finishWrite("Deleted", await table.delete(docs));
      });
    });

  program
    .command("get <partition> <sortKey>")
    .description("Read one record")
    .option("--raw", "Output compact JSON")
    .action(async (partition: string, sortKey: string, options: GetOptions) => {
      await withTiming(io, verbose(), "cli.get", async () => {
        const { table } = await open();
        const record = await table.get(partition, sortKey);
        if (!record) {
          throw new CliError(`Record not found: ${partition}/${sortKey}`, { exitCode: EXIT_NOT_FOUND });
        }
        printJson(io, record.value, { raw: options.raw });
      });
    });

  program
    .command("scan <partition>")
    .description("List records of one partition in sort key order")
    .option("--min <sortKey>", "Lowest sort key (inclusive)")
    .option("--max <sortKey>", "Highest sort key (inclusive)")
    .option("--where <property=value>", "Match a stored property", parseWhere)
    .option("--type <kind>", "Type of the --where value (default: string)", parseValueKind)
    .option("--limit <n>", "Maximum number of records", (val: string) => parseNonNegativeInt(val, "--limit"))
    .option("--keys", "Print sort keys, one per line")
    .option("--raw", "Output compact JSON")
    .action(async (partition: string, options: ScanOptions) => {
      await withTiming(io, verbose(), "cli.scan", async () => {
        const ranged = options.min !== undefined || options.max !== undefined;
        if (options.where && ranged) {
          throw new CliError("Use either --where or --min/--max");
        }
        if (options.type && !options.where) {
          throw new CliError("--type only applies to --where");
        }

        const { where } = options;
        const typed = where ? toTypedValue(where.raw, options.type ?? "string") : undefined;
        const { table } = await open();
        const scanOpts = { limit: options.limit };

        const sequence =
          where && typed
            ? table.scanWhere(partition, where.property, typed, scanOpts)
            : ranged
              ? table.scanRange(partition, options.min ?? "", options.max ?? "", scanOpts)
              : table.scan(partition, scanOpts);
        const records = await sequence.toArray();

        if (options.keys) {
          printLines(io, records.map((record) => record.sortKey));
        } else {
          printJson(io, records.map((record) => record.value), { raw: options.raw });
        }
      });
    });

  program
    .command("catalog")
    .description("Show registered indexes and known partition keys")
    .option("--json", "Output as JSON")
    .action(async (options: JsonOptions) => {
      await withTiming(io, verbose(), "cli.catalog", async () => {
        const { table } = await open();
        const partitionKeys = await table.knownPartitionKeys();
        if (options.json) {
          printJson(io, {
            table: table.name,
            indexes: table.indexes.map((def) => def.name),
            partitionKeys,
          });
        } else {
          printLines(io, partitionKeys);
        }
      });
    });

  program
    .command("reindex [indexes...]")
    .description("Rebuild indexes from the default index (all when none are named)")
    .action(async (names: string[]) => {
      await withTiming(io, verbose(), "cli.reindex", async () => {
        const { table } = await open();
        const registered = table.indexes.map((def) => def.name);
        const unknown = names.filter((name) => !registered.includes(name));
        if (unknown.length > 0) {
          throw new CliError(`Unknown index: ${unknown.join(", ")}`);
        }
        finishWrite("Reindexed", await table.reindex(names.length > 0 ? names : undefined));
      });
    });

  program
    .command("encode-key <value>")
    .description("Show the stored form of a key")
    .action((value: string) => {
      io.stdout(keyEncoder.encode(value) + "\n");
    });

  program
    .command("decode-key <value>")
    .description("Show the logical form of a stored key")
    .action((value: string) => {
      io.stdout(keyEncoder.decode(value) + "\n");
    });

  return program;
}

/**
 * Run the command line against `argv` (arguments after the program name)
 * @returns Process exit code
 */
export async function run(argv: string[], io: CliIo): Promise<number> {
  const program = createProgram(io);

  try {
    await program.parseAsync(argv, { from: "user" });
    return EXIT_OK;
  } catch (err) {
    // Commander has already written its own usage errors, help and version
    if (!(err instanceof CommanderError)) {
      const opts = program.opts<GlobalOptions>();
      io.stderr(`Error: ${formatCliError(err, isVerbose(io.env, opts.verbose === true))}\n`);
    }
    return mapSdkErrorToExitCode(err);
  }
}
