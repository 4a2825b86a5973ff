export {
  XrayDbError,
  isXrayDbError,
  validationError,
  unresolvedIdentifier,
  notFound,
  ambiguousMatch,
  queryConflict,
  invalidParams,
  upstreamError,
  describeValue,
  formatError,
} from './errors.js';
export type { ErrorCode, ErrorPayload, ValidationErrorData } from './errors.js';
export { log, getLogLevel, XRAYDB_LOG_LEVEL_ENV } from './log.js';
export type { LogLevel } from './log.js';
export {
  sqlite3JsonQuery,
  sqlStringLiteral,
  sqlLiteral,
  dotCommandArg,
  buildSqliteScript,
  parsePositiveIntEnv,
} from './sqlite3Cli.js';
export type { Sqlite3Param } from './sqlite3Cli.js';
