/**
 * Declarative index specs: JSON-describable index definitions compiled into accessor closures
 *
 * Field references use dot paths ("profile.country"). Partition and sort keys are templates
 * where "{path}" is replaced by the field's value; a template without placeholders is a
 * literal. The sort key tokens "$chronological" and "$reverseChronological" produce a new
 * key per write.
 */

import { z } from "zod";
import { chronologicalKey, reverseChronologicalKey } from "./codec/row-keys.js";
import { ConfigError, InvalidKeyError, formatZodIssues } from "./errors.js";
import { TableIndexDefinition, serializeId, type IndexDefaults } from "./index-definition.js";

export const CHRONOLOGICAL = "$chronological";
export const REVERSE_CHRONOLOGICAL = "$reverseChronological";

const PLACEHOLDER = /\{([^{}]+)\}/g;
const FIELD_PATH = /^[A-Za-z_$][\w$]*(?:\.[A-Za-z_$][\w$]*|\.\d+)*$/;

const FieldPathSchema = z.string().regex(FIELD_PATH, "must be a dot-separated field path");

const TemplateSchema = z
  .string()
  .min(1)
  .superRefine((template, ctx) => {
    for (const match of template.matchAll(PLACEHOLDER)) {
      const path = match[1] ?? "";
      if (!FIELD_PATH.test(path)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `placeholder "{${path}}" is not a field path`,
        });
      }
    }
  });

export const IndexSpecSchema = z
  .object({
    name: z.string().min(1),
    /** Partition key template (default: the index name) */
    partitionKey: TemplateSchema.optional(),
    /** Sort key template or chronological token (default: the table's id) */
    sortKey: TemplateSchema.optional(),
    /** Field whose value is stored as the indexed value */
    indexedValue: FieldPathSchema.optional(),
    /** Field equalities that must all hold for a value to belong to the index */
    where: z
      .record(FieldPathSchema, z.union([z.string(), z.number(), z.boolean(), z.null()]))
      .optional(),
  })
  .strict();

export type IndexSpec = z.infer<typeof IndexSpecSchema>;

/**
 * Read a nested field by dot path; missing segments read as undefined
 */
export function getPath(obj: unknown, path: string): unknown {
  return path
    .split(".")
    .reduce<unknown>((o, k) => (o !== null && typeof o === "object" ? Reflect.get(o, k) : undefined), obj);
}

/**
 * Substitute "{path}" placeholders with the value's fields
 * @throws {InvalidKeyError} If a referenced field is missing
 */
export function renderTemplate(template: string, value: unknown): string {
  return template.replace(PLACEHOLDER, (_match, path: string) => {
    const field = getPath(value, path);
    if (field === undefined || field === null) {
      throw new InvalidKeyError(template, `field "${path}" is missing`);
    }
    return serializeId(field);
  });
}

function hasPlaceholders(template: string): boolean {
  return template.search(PLACEHOLDER) !== -1;
}

/**
 * Build an index definition from a spec
 */
export function compileIndexSpec<T>(
  spec: IndexSpec,
  defaults: IndexDefaults<T> = {}
): TableIndexDefinition<T> {
  const def = new TableIndexDefinition<T>(spec.name, defaults);

  const { where, partitionKey, sortKey, indexedValue } = spec;
  if (where) {
    const clauses = Object.entries(where);
    def.defineCriteria((value) => clauses.every(([path, expected]) => getPath(value, path) === expected));
  }

  if (partitionKey !== undefined) {
    def.setPartitionKey(
      hasPlaceholders(partitionKey) ? (value) => renderTemplate(partitionKey, value) : partitionKey
    );
  }

  if (sortKey === CHRONOLOGICAL) {
    def.setSortKey(() => chronologicalKey(defaults.clock), { versioned: true });
  } else if (sortKey === REVERSE_CHRONOLOGICAL) {
    def.setSortKey(() => reverseChronologicalKey(defaults.clock), { versioned: true });
  } else if (sortKey !== undefined) {
    def.setSortKey((value) => renderTemplate(sortKey, value));
  }

  if (indexedValue !== undefined) {
    def.setIndexedValue((value) => getPath(value, indexedValue));
  }

  return def;
}

/**
 * Validate and compile a list of specs
 * @throws {ConfigError} If a spec is malformed
 */
export function compileIndexSpecs<T>(specs: unknown, defaults: IndexDefaults<T> = {}): TableIndexDefinition<T>[] {
  const result = z.array(IndexSpecSchema).safeParse(specs);
  if (!result.success) {
    throw new ConfigError("Invalid index specs", formatZodIssues(result.error));
  }
  return result.data.map((spec) => compileIndexSpec(spec, defaults));
}
