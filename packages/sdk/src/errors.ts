/**
 * Error types for table operations
 *
 * Invariants:
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 * - Absent records are not errors: point lookups resolve to null
 */

import type { ZodError } from "zod";

/**
 * Base class for all table store errors
 */
export abstract class TableStoreError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a serialized value needs more slots than a fat entity can hold
 */
export class ObjectTooLargeError extends TableStoreError {
  readonly code = "E_TOO_LARGE";

  constructor(
    public readonly payload: string,
    public readonly maxLength: number,
    options?: ErrorOptions
  ) {
    super(
      `Object is too large for a fat entity: ${payload.length} characters exceeds ${maxLength}`,
      options
    );
  }
}

/**
 * Thrown when an assembled batch breaks its own limits. Indicates a defect, not bad input.
 */
export class BatchConstraintViolationError extends TableStoreError {
  readonly code = "E_BATCH_CONSTRAINT";

  constructor(reason: string, options?: ErrorOptions) {
    super(`Batch constraint violated: ${reason}`, options);
  }
}

/**
 * Network, timeout, throttling or cancellation failure from the backing store.
 * Safe to retry with backoff.
 */
export class BackendTransientError extends TableStoreError {
  readonly code = "E_TRANSIENT";

  constructor(operation: string, reason: string, options?: ErrorOptions) {
    super(`Transient backend failure during ${operation}: ${reason}`, options);
  }
}

/**
 * Non-transient rejection from the backing store (conflict, missing entity, bad request)
 */
export class BackendRequestError extends TableStoreError {
  readonly code = "E_BACKEND";

  constructor(
    public readonly status: number,
    public readonly reason: string,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

/**
 * Thrown when the persisted partition catalog cannot be read back
 */
export class CatalogCorruptError extends TableStoreError {
  readonly code = "E_CATALOG";

  constructor(tableName: string, detail: string, options?: ErrorOptions) {
    super(`Partition catalog for table "${tableName}" is invalid: ${detail}`, options);
  }
}

/**
 * Thrown when a stored entity holds no domain value, such as the catalog entity
 */
export class MalformedRecordError extends TableStoreError {
  readonly code = "E_RECORD";

  constructor(partitionKey: string, sortKey: string, detail: string, options?: ErrorOptions) {
    super(`Entity ${partitionKey}/${sortKey} is not a materialized record: ${detail}`, options);
  }
}

/**
 * Thrown when a key cannot be stored even after encoding
 */
export class InvalidKeyError extends TableStoreError {
  readonly code = "E_KEY";

  constructor(key: string, reason: string, options?: ErrorOptions) {
    super(`Invalid table key "${key.length > 64 ? key.slice(0, 64) + "..." : key}": ${reason}`, options);
  }
}

/**
 * Thrown when table options or a config file fail validation
 */
export class ConfigError extends TableStoreError {
  readonly code = "E_CONFIG";

  constructor(
    message: string,
    public readonly issues: string[] = [],
    options?: ErrorOptions
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message, options);
  }
}

/**
 * Thrown when a partition file read fails
 */
export class PartitionReadError extends TableStoreError {
  readonly code = "READ_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to read partition file: ${filePath}`, options);
  }
}

/**
 * Thrown when a partition file write fails
 */
export class PartitionWriteError extends TableStoreError {
  readonly code = "WRITE_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to write partition file: ${filePath}`, options);
  }
}

/**
 * Thrown when a partition file removal fails
 */
export class PartitionRemoveError extends TableStoreError {
  readonly code = "REMOVE_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to remove partition file: ${filePath}`, options);
  }
}

/**
 * Thrown when a directory operation fails
 */
export class DirectoryError extends TableStoreError {
  readonly code = "DIRECTORY_ERROR";

  constructor(dirPath: string, options?: ErrorOptions) {
    super(`Directory operation failed: ${dirPath}`, options);
  }
}

/**
 * Thrown when listing files in a directory fails
 */
export class ListFilesError extends TableStoreError {
  readonly code = "LIST_ERROR";

  constructor(dirPath: string, options?: ErrorOptions) {
    super(`Failed to list files in directory: ${dirPath}`, options);
  }
}

/**
 * Narrow an unknown failure to a Node errno code
 */
export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Render zod issues as "<path>: <message>" lines
 */
export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`);
}
