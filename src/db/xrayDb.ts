import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { invalidParams, sqlite3JsonQuery } from '../shared/index.js';
import { Reference } from '../model/index.js';
import type { ResolveContext } from '../resolve/resolve.js';
import { toRows, type QueryExecutor } from './executor.js';

export const XRAYDB_PATH_ENV = 'XRAYDB_PATH';
export const XRAYDB_DEFAULT_REFERENCE_ENV = 'XRAYDB_DEFAULT_REFERENCE';
export const DEFAULT_XRAYDB_PATH = path.join(os.homedir(), '.xraydb', 'xraydb.sqlite');

function validateFilePath(filePath: string, envName: string): string {
  if (!path.isAbsolute(filePath)) {
    throw invalidParams(`${envName} must be an absolute path`, { env: envName, value: filePath });
  }

  const resolved = path.resolve(filePath);
  if (!fs.existsSync(resolved)) {
    throw invalidParams(`${envName} does not exist`, { env: envName, value: resolved });
  }

  const stat = fs.statSync(resolved);
  if (!stat.isFile()) {
    throw invalidParams(`${envName} must point to a file`, { env: envName, value: resolved });
  }

  return resolved;
}

export function getXrayDbPathFromEnv(): string | undefined {
  const raw = process.env[XRAYDB_PATH_ENV];
  if (!raw || raw.trim().length === 0) return undefined;
  return validateFilePath(raw.trim(), XRAYDB_PATH_ENV);
}

export function requireXrayDbPathFromEnv(): string {
  const p = getXrayDbPathFromEnv();
  if (p) return p;

  if (fs.existsSync(DEFAULT_XRAYDB_PATH) && fs.statSync(DEFAULT_XRAYDB_PATH).isFile()) {
    return DEFAULT_XRAYDB_PATH;
  }

  throw invalidParams(`${XRAYDB_PATH_ENV} is required`, {
    env: XRAYDB_PATH_ENV,
    default_path: DEFAULT_XRAYDB_PATH,
    how_to: 'Set XRAYDB_PATH=/abs/path/to/xraydb.sqlite',
  });
}

export function createSqliteExecutor(dbPath: string): QueryExecutor {
  return async (sql, params, options) => {
    const rows = await sqlite3JsonQuery(dbPath, sql, params, options);
    return toRows(rows, sql);
  };
}

export function loadResolveContextFromEnv(
  overrides: Partial<ResolveContext> = {}
): ResolveContext {
  const rawReference = process.env[XRAYDB_DEFAULT_REFERENCE_ENV]?.trim();
  return {
    ...(rawReference ? { defaultReference: new Reference(rawReference) } : {}),
    ...overrides,
    executor: overrides.executor ?? createSqliteExecutor(requireXrayDbPathFromEnv()),
  };
}
