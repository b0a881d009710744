// index.ts

export { TableRegistry } from "./litorm/registry.js";
export type { Binding } from "./litorm/registry.js";
export { Litorm, groupOf } from "./litorm/litorm.js";
export type { GenerateOptions } from "./litorm/litorm.js";
export { setup, setupAsync } from "./litorm/setup.js";
export type { SetupOptions } from "./litorm/setup.js";

export {
  Binary,
  Column,
  Email,
  Integer,
  Json,
  PK,
  Text,
  Timestamp,
  UniqueEmail,
  UniqueText,
  column,
  formatTimestamp,
  normalizeEmail,
  parseTimestamp,
} from "./litorm/column.js";
export { ModelDef, defineModel, isModel } from "./litorm/model.js";
export type { FieldsOf, ModelConfig, ModelShape } from "./litorm/model.js";
export { Entity } from "./litorm/record.js";
export { Table } from "./litorm/table.js";
export { Query } from "./litorm/query.js";
export { QueryBuilder } from "./litorm/query-builder.js";
export type { GetOptions, SqlStatement, ValuesOptions } from "./litorm/query-builder.js";
export type { SaveOptions } from "./litorm/persist.js";

export { Executor, connect } from "./litorm/executor.js";
export type { ConnectOptions, Connection, Cursor, Instruction } from "./litorm/executor.js";
export { DeferredStrategy, DirectStrategy, drive, driveAsync } from "./litorm/plan.js";
export type { Plan, Strategy } from "./litorm/plan.js";
export { SerialWorker } from "./litorm/worker.js";

export { diffTable, createTableSQL } from "./litorm/migrations/diffTable.js";
export type { SchemaDiff, SchemaWarning } from "./litorm/migrations/diffTable.js";
export { MigrationLedger, latestAppliedPlan, migratePlan, pendingScripts } from "./litorm/migrations/ledger.js";
export type { MigrationScript } from "./litorm/migrations/ledger.js";
export { loadMigrations } from "./litorm/migrations/loadMigrations.js";
export { migrationName, writeMigration } from "./litorm/migrations/writeMigration.js";

export { loadConfig, resolveConfig, saveConfig } from "./litorm/config.js";
export type { LitormConfig, ResolvedConfig } from "./litorm/config.js";

export {
  ConfigError,
  DescriptorError,
  MigrationError,
  MultipleResults,
  NotFound,
  OrmError,
  UnboundModelError,
  isOrmError,
} from "./litorm/errors.js";
export type { ErrorCode } from "./litorm/errors.js";

export { getLogLevel, setLogLevel } from "./litorm/utils/logger.js";
export type { LogLevel } from "./litorm/utils/logger.js";

export type {
  Codec,
  ColumnOptions,
  Filters,
  Init,
  JsonValue,
  Mode,
  Out,
  PkValue,
  Row,
  SqlValue,
  Stream,
} from "./litorm/model-types.js";
