/**
 * Configuration: table settings, environment overrides and the project config file
 *
 * Precedence (highest first): explicit options, environment, config file, defaults.
 */

import { z } from "zod";
import { IndexSpecSchema } from "./declarative.js";
import { ConfigError, formatZodIssues } from "./errors.js";
import { readFileIfExists } from "./io.js";
import { isLogLevel, type LogLevel } from "./observability/logs.js";

export const DEFAULT_INDEX_NAME = "Default";
export const DEFAULT_MAX_CONCURRENCY = 16;
export const MAX_CONCURRENCY_LIMIT = 64;
export const CONFIG_FILE_NAME = "tablemat.config.json";

const TableNameSchema = z
  .string()
  .regex(/^[A-Za-z][A-Za-z0-9]{2,62}$/, "must be 3-63 alphanumeric characters starting with a letter");

const ConcurrencySchema = z.number().int().min(1).max(MAX_CONCURRENCY_LIMIT);

/**
 * Scalar table settings shared by the library options, the environment and the config file
 */
export const TableSettingsSchema = z.object({
  tableName: TableNameSchema.optional(),
  typeName: z.string().default(""),
  defaultIndexName: z.string().min(1).default(DEFAULT_INDEX_NAME),
  maxConcurrency: ConcurrencySchema.default(DEFAULT_MAX_CONCURRENCY),
  timeoutMs: z.number().int().positive().optional(),
  pageSize: z.number().int().min(1).max(1000).optional(),
  upsertBeforeDelete: z.boolean().optional(),
  pruneStaleRecords: z.boolean().optional(),
  catalogWriteMode: z.enum(["overwrite", "optimistic"]).default("overwrite"),
});

export type TableSettingsInput = z.input<typeof TableSettingsSchema>;
export type TableSettings = z.output<typeof TableSettingsSchema>;

/**
 * Validate table settings
 * @throws {ConfigError} With one issue per invalid field
 */
export function parseTableSettings(input: unknown): TableSettings {
  const result = TableSettingsSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError("Invalid table options", formatZodIssues(result.error));
  }
  return result.data;
}

const EnvSchema = z.object({
  TABLEMAT_ROOT: z.string().min(1).optional(),
  TABLEMAT_TABLE: TableNameSchema.optional(),
  TABLEMAT_MAX_CONCURRENCY: z.coerce.number().pipe(ConcurrencySchema).optional(),
  TABLEMAT_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  TABLEMAT_LOG_LEVEL: z.string().refine(isLogLevel, "must be debug, info, warn or error").optional(),
});

export interface EnvSettings {
  root?: string;
  tableName?: string;
  maxConcurrency?: number;
  timeoutMs?: number;
  logLevel?: LogLevel;
}

/**
 * Read TABLEMAT_* variables. Empty variables are treated as unset.
 * @throws {ConfigError} If a variable is set to an invalid value
 */
export function readEnv(env: NodeJS.ProcessEnv = process.env): EnvSettings {
  const present: Record<string, string> = {};
  for (const key of Object.keys(EnvSchema.shape)) {
    const value = env[key];
    if (value !== undefined && value !== "") present[key] = value;
  }

  const result = EnvSchema.safeParse(present);
  if (!result.success) {
    throw new ConfigError("Invalid environment", formatZodIssues(result.error));
  }

  const data = result.data;
  const settings: EnvSettings = {};
  if (data.TABLEMAT_ROOT !== undefined) settings.root = data.TABLEMAT_ROOT;
  if (data.TABLEMAT_TABLE !== undefined) settings.tableName = data.TABLEMAT_TABLE;
  if (data.TABLEMAT_MAX_CONCURRENCY !== undefined) settings.maxConcurrency = data.TABLEMAT_MAX_CONCURRENCY;
  if (data.TABLEMAT_TIMEOUT_MS !== undefined) settings.timeoutMs = data.TABLEMAT_TIMEOUT_MS;
  const level = data.TABLEMAT_LOG_LEVEL;
  if (level !== undefined && isLogLevel(level)) settings.logLevel = level;
  return settings;
}

/**
 * Shape of tablemat.config.json
 */
export const ConfigFileSchema = z
  .object({
    table: TableNameSchema.optional(),
    typeName: z.string().optional(),
    /** Dot path of the identity field */
    idField: z.string().min(1).optional(),
    defaultIndexName: z.string().min(1).optional(),
    maxConcurrency: ConcurrencySchema.optional(),
    timeoutMs: z.number().int().positive().optional(),
    upsertBeforeDelete: z.boolean().optional(),
    catalogWriteMode: z.enum(["overwrite", "optimistic"]).optional(),
    indexes: z.array(IndexSpecSchema).default([]),
  })
  .strict();

export type ConfigFile = z.output<typeof ConfigFileSchema>;

/**
 * Load and validate a config file. A missing file yields the defaults.
 * @throws {ConfigError} If the file is not valid JSON or fails validation
 */
export async function loadConfigFile(filePath: string): Promise<ConfigFile> {
  const text = await readFileIfExists(filePath);
  if (text === null) {
    return ConfigFileSchema.parse({});
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`Config file ${filePath} is not valid JSON`, [], { cause: err });
  }

  const result = ConfigFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid config file ${filePath}`, formatZodIssues(result.error));
  }
  return result.data;
}
