/**
 * Table adapter for CLI
 * Opens a file-backed table described by the config file and TABLEMAT_* variables
 */

import { z } from "zod";
import {
  FileTableBackend,
  compileIndexSpecs,
  getPath,
  loadConfigFile,
  openTable,
  readEnv,
  type ConfigFile,
  type Table,
} from "@tablemat/sdk";

/**
 * Documents handled by the CLI are plain JSON objects
 */
export const DocumentSchema = z.record(z.string(), z.unknown());

export type Document = z.infer<typeof DocumentSchema>;

export const DEFAULT_TYPE_NAME = "Document";
export const DEFAULT_ID_FIELD = "id";

export interface CliTableOptions {
  root: string;
  configPath: string;
  /** --table option */
  table?: string;
  env: NodeJS.ProcessEnv;
}

export interface CliTable {
  table: Table<Document>;
  config: ConfigFile;
}

/**
 * Open the table a command works on
 * Table name priority: --table > TABLEMAT_TABLE > config "table" > derived from the type name
 */
export async function openCliTable(options: CliTableOptions): Promise<CliTable> {
  const env = readEnv(options.env);
  const config = await loadConfigFile(options.configPath);
  const idField = config.idField ?? DEFAULT_ID_FIELD;
  const getId = (doc: Document): unknown => getPath(doc, idField);

  const table = openTable<Document>({
    backend: new FileTableBackend({ root: options.root }),
    tableName: options.table ?? env.tableName ?? config.table,
    typeName: config.typeName ?? DEFAULT_TYPE_NAME,
    decoder: DocumentSchema,
    getId,
    defaultIndexName: config.defaultIndexName,
    indexes: compileIndexSpecs<Document>(config.indexes, { getId }),
    maxConcurrency: env.maxConcurrency ?? config.maxConcurrency,
    timeoutMs: env.timeoutMs ?? config.timeoutMs,
    upsertBeforeDelete: config.upsertBeforeDelete,
    catalogWriteMode: config.catalogWriteMode,
  });

  return { table, config };
}
