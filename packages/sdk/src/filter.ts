/**
 * Filter expressions for segmented queries
 *
 * Only comparisons joined by AND are expressible; there is no OR or NOT.
 * Expressions are plain immutable data so backends can evaluate or render them.
 */

import { comparePropertyValues, edm, toPropertyValue } from "./codec/property.js";
import type { PropertyInput, PropertyValue, TableEntity } from "./types.js";

/** Reserved property names addressing the entity keys */
export const PARTITION_KEY = "PartitionKey";
export const SORT_KEY = "RowKey";

export type ComparisonOperator = "eq" | "ge" | "le";

export interface ComparisonExpression {
  kind: "compare";
  property: string;
  op: ComparisonOperator;
  value: PropertyValue;
}

export interface AndExpression {
  kind: "and";
  clauses: FilterExpression[];
}

export type FilterExpression = ComparisonExpression | AndExpression;

/**
 * Compare a named property (or PartitionKey / RowKey) against a value
 */
export function compare(
  property: string,
  op: ComparisonOperator,
  value: PropertyInput
): ComparisonExpression {
  return { kind: "compare", property, op, value: toPropertyValue(value) };
}

/**
 * Conjunction of clauses. Nested conjunctions are flattened.
 */
export function and(...clauses: FilterExpression[]): FilterExpression {
  const flat: FilterExpression[] = [];
  for (const clause of clauses) {
    if (clause.kind === "and") {
      flat.push(...clause.clauses);
    } else {
      flat.push(clause);
    }
  }
  const only = flat[0];
  return flat.length === 1 && only ? only : { kind: "and", clauses: flat };
}

export function partitionKeyEquals(encodedPartitionKey: string): ComparisonExpression {
  return compare(PARTITION_KEY, "eq", edm.string(encodedPartitionKey));
}

/**
 * Partition equality plus an optional closed sort-key range; empty bounds are omitted
 */
export function sortKeyRange(
  encodedPartitionKey: string,
  minSortKey = "",
  maxSortKey = ""
): FilterExpression {
  const clauses: FilterExpression[] = [partitionKeyEquals(encodedPartitionKey)];
  if (minSortKey !== "") clauses.push(compare(SORT_KEY, "ge", edm.string(minSortKey)));
  if (maxSortKey !== "") clauses.push(compare(SORT_KEY, "le", edm.string(maxSortKey)));
  return and(...clauses);
}

export function propertyEquals(
  encodedPartitionKey: string,
  property: string,
  value: PropertyInput
): FilterExpression {
  return and(partitionKeyEquals(encodedPartitionKey), compare(property, "eq", value));
}

/**
 * Partition key the expression pins with an equality clause, if any
 */
export function pinnedPartitionKey(expr: FilterExpression | undefined): string | undefined {
  if (!expr) return undefined;
  const clauses = expr.kind === "and" ? expr.clauses : [expr];
  for (const clause of clauses) {
    if (
      clause.kind === "compare" &&
      clause.property === PARTITION_KEY &&
      clause.op === "eq" &&
      clause.value.type === "String"
    ) {
      return clause.value.value;
    }
  }
  return undefined;
}

function resolveProperty(entity: TableEntity, property: string): PropertyValue | undefined {
  if (property === PARTITION_KEY) return edm.string(entity.partitionKey);
  if (property === SORT_KEY) return edm.string(entity.sortKey);
  return entity.properties[property];
}

/**
 * Evaluate an expression against an entity. Missing properties and mismatched kinds never match.
 */
export function evaluateFilter(expr: FilterExpression, entity: TableEntity): boolean {
  if (expr.kind === "and") {
    return expr.clauses.every((clause) => evaluateFilter(clause, entity));
  }

  const actual = resolveProperty(entity, expr.property);
  if (!actual) return false;

  const cmp = comparePropertyValues(actual, expr.value);
  if (cmp === undefined) return false;

  switch (expr.op) {
    case "eq":
      return cmp === 0;
    case "ge":
      return cmp >= 0;
    case "le":
      return cmp <= 0;
  }
}

function renderLiteral(value: PropertyValue): string {
  switch (value.type) {
    case "String":
      return `'${value.value.replace(/'/g, "''")}'`;
    case "Binary":
      return `X'${Buffer.from(value.value).toString("hex")}'`;
    case "Boolean":
      return value.value ? "true" : "false";
    case "DateTime":
      return `datetime'${value.value.toISOString()}'`;
    case "Double":
      return Number.isInteger(value.value) ? `${value.value}.0` : String(value.value);
    case "Guid":
      return `guid'${value.value}'`;
    case "Int32":
      return String(value.value);
    case "Int64":
      return `${value.value}L`;
  }
}

/**
 * Render the OData-style filter text used by table services
 */
export function renderFilter(expr: FilterExpression): string {
  if (expr.kind === "compare") {
    return `${expr.property} ${expr.op} ${renderLiteral(expr.value)}`;
  }
  if (expr.clauses.length === 1) {
    const only = expr.clauses[0];
    return only ? renderFilter(only) : "";
  }
  return expr.clauses.map((clause) => `(${renderFilter(clause)})`).join(" and ");
}
