/**
 * tablemat SDK
 *
 * Fat-entity storage and secondary-index materialization over a partitioned key-value table
 */

// Re-export types
export type {
  PropertyValue,
  PropertyKind,
  PropertyInput,
  TableEntity,
  WriteKind,
  SaveKind,
  TableOperation,
  BatchOperation,
  TableQuery,
  ContinuationToken,
  QuerySegment,
  RequestOptions,
  CallOptions,
  BackendCapabilities,
  TableBackend,
  FatEntityChunk,
  MaterializedRecord,
  TableRecord,
  ValueDecoder,
  ValueSerializer,
  RecordRef,
  RecordFailure,
  GroupResult,
  WriteReport,
} from "./types.js";

// Codecs
export {
  ENCODED_PREFIX,
  TableKeyEncoder,
  keyEncoder,
  encodeTableKey,
  decodeTableKey,
} from "./codec/key-encoder.js";
export {
  MAX_CHUNK_SIZE,
  MAX_SLOTS,
  FAT_ENTITY_CAPACITY,
  slotKey,
  isSlotKey,
  trySplit,
  split,
  join,
} from "./codec/fat-entity.js";
export type { FatEntityLimits, SplitResult } from "./codec/fat-entity.js";
export { edm, toPropertyValue, comparePropertyValues, entityByteSize } from "./codec/property.js";
export {
  chronologicalKey,
  reverseChronologicalKey,
  highResolutionClock,
  toTicks,
} from "./codec/row-keys.js";
export type { Clock } from "./codec/row-keys.js";
export { stableStringify, jsonEqual, canonicalSerializer } from "./format.js";

// Filters
export {
  PARTITION_KEY,
  SORT_KEY,
  compare,
  and,
  partitionKeyEquals,
  sortKeyRange,
  propertyEquals,
  evaluateFilter,
  renderFilter,
} from "./filter.js";
export type { FilterExpression, ComparisonExpression, ComparisonOperator } from "./filter.js";

// Index model
export { TableIndexDefinition, defineIndex, serializeId } from "./index-definition.js";
export type {
  IndexDefinition,
  IndexDefinitionInit,
  IdAccessor,
  IndexDefaults,
} from "./index-definition.js";
export {
  IndexSpecSchema,
  CHRONOLOGICAL,
  REVERSE_CHRONOLOGICAL,
  compileIndexSpec,
  compileIndexSpecs,
  getPath,
  renderTemplate,
} from "./declarative.js";
export type { IndexSpec } from "./declarative.js";
export { IndexCatalog, CATALOG_PARTITION_KEY, CATALOG_SORT_KEY } from "./catalog.js";
export type { CatalogWriteMode, IndexCatalogOptions } from "./catalog.js";

// Write and read paths
export { BatchAssembler, MAX_BATCH_OPERATIONS, MAX_BATCH_BYTES } from "./batch.js";
export type { BatchLimits, PendingWrite, TransactionGroup } from "./batch.js";
export { MaterializationEngine } from "./materialize.js";
export { QueryFacade, RecordSequence, DEFAULT_PAGE_SIZE } from "./query.js";
export type { ScanOptions } from "./query.js";
export {
  PROP_INDEXED_VALUE,
  PROP_TYPE_NAME,
  PROP_SOURCE_INDEX,
  serializeIndexedValue,
  decodeRecord,
} from "./record.js";

// Table facade
export { Table, openTable } from "./table.js";
export type { TableOptions } from "./table.js";

// Backends
export { MemoryTableBackend } from "./backends/memory.js";
export type { MemoryTableBackendOptions } from "./backends/memory.js";
export { FileTableBackend, partitionFileName } from "./backends/file.js";
export type { FileTableBackendOptions } from "./backends/file.js";

// Configuration
export {
  DEFAULT_INDEX_NAME,
  CONFIG_FILE_NAME,
  TableSettingsSchema,
  ConfigFileSchema,
  parseTableSettings,
  readEnv,
  loadConfigFile,
} from "./config.js";
export type { TableSettings, EnvSettings, ConfigFile } from "./config.js";
export { validateTableName, defaultTableName } from "./validation.js";

// Errors
export {
  TableStoreError,
  ObjectTooLargeError,
  BatchConstraintViolationError,
  BackendTransientError,
  BackendRequestError,
  CatalogCorruptError,
  MalformedRecordError,
  InvalidKeyError,
  ConfigError,
  PartitionReadError,
  PartitionWriteError,
  PartitionRemoveError,
  DirectoryError,
  ListFilesError,
} from "./errors.js";

// Observability
export { logger, isLogLevel } from "./observability/logs.js";
export type { LogLevel, LogEntry } from "./observability/logs.js";
export { metrics } from "./observability/metrics.js";
export type { IndexMetrics } from "./observability/metrics.js";
