/**
 * Validation utilities for table names and keys
 */

import { ConfigError, InvalidKeyError } from "./errors.js";

/**
 * Table names: alphanumeric, starting with a letter, 3-63 characters
 */
const VALID_TABLE_NAME_PATTERN = /^[A-Za-z][A-Za-z0-9]{2,62}$/;

/**
 * Largest encoded partition or sort key accepted by table services
 */
export const MAX_KEY_LENGTH = 1024;

/**
 * Validate a table name
 * @throws {ConfigError} If the name is not usable
 */
export function validateTableName(name: string): void {
  if (!name || typeof name !== "string") {
    throw new ConfigError("Table name must be a non-empty string");
  }

  if (!VALID_TABLE_NAME_PATTERN.test(name)) {
    throw new ConfigError(
      `Invalid table name "${name}". ` +
        "Use 3-63 alphanumeric characters starting with a letter."
    );
  }

  if (name.toLowerCase() === "tables") {
    throw new ConfigError(`Table name "${name}" is reserved`);
  }
}

/**
 * Derive a default table name from a type name ("User" -> "UserTable")
 */
export function defaultTableName(typeName: string): string {
  const cleaned = typeName.replace(/[^A-Za-z0-9]/g, "");
  return `${cleaned}Table`;
}

/**
 * Validate an already-encoded key
 * @throws {InvalidKeyError} If the key is too long
 */
export function validateEncodedKey(key: string, label: "partition key" | "sort key"): void {
  if (key.length > MAX_KEY_LENGTH) {
    throw new InvalidKeyError(key, `${label} exceeds ${MAX_KEY_LENGTH} characters after encoding`);
  }
}
