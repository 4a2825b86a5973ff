export * from './model/index.js';
export * from './query/index.js';
export * from './resolve/index.js';
export {
  TABLE,
  COLUMN,
  ALIAS,
  ENTITY_KINDS,
  MATCH_ROW,
} from './constants.js';
export type { EntityKind } from './constants.js';
export { parseRows, toRows } from './db/executor.js';
export type { QueryExecutor, QueryOptions, Row, SqlParam } from './db/executor.js';
export {
  XRAYDB_PATH_ENV,
  XRAYDB_DEFAULT_REFERENCE_ENV,
  DEFAULT_XRAYDB_PATH,
  getXrayDbPathFromEnv,
  requireXrayDbPathFromEnv,
  createSqliteExecutor,
  loadResolveContextFromEnv,
} from './db/xrayDb.js';
export {
  XrayDbError,
  isXrayDbError,
  formatError,
  log,
  sqlite3JsonQuery,
} from './shared/index.js';
export type { ErrorCode, ErrorPayload, ValidationErrorData, LogLevel } from './shared/index.js';
