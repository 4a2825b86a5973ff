import { spawn } from 'child_process';
import { invalidParams, isXrayDbError, upstreamError } from './errors.js';
import { log } from './log.js';

export type Sqlite3Param = string | number;

export function sqlStringLiteral(value: string): string {
  return `'${value.replaceAll("'", "''")}'`;
}

export function sqlLiteral(value: Sqlite3Param): string {
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw invalidParams('SQL parameter must be a finite number', { value: String(value) });
    }
    return String(value);
  }
  return sqlStringLiteral(value);
}

/** Double-quoted argument for a sqlite3 shell dot command. */
export function dotCommandArg(text: string): string {
  const escaped = text
    .replaceAll('\\', '\\\\')
    .replaceAll('"', '\\"')
    .replaceAll('\n', '\\n')
    .replaceAll('\r', '\\r');
  return `"${escaped}"`;
}

/**
 * Script fed to the shell on stdin: one `.parameter set ?N` per positional
 * placeholder, then the statement itself.
 */
export function buildSqliteScript(sql: string, params: readonly Sqlite3Param[]): string {
  const lines = params.map((param, index) => `.parameter set ?${index + 1} ${dotCommandArg(sqlLiteral(param))}`);
  const statement = sql.trimEnd();
  lines.push(statement.endsWith(';') ? statement : `${statement};`);
  return `${lines.join('\n')}\n`;
}

export function parsePositiveIntEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw || raw.trim().length === 0) return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n) || !Number.isInteger(n) || n <= 0) return fallback;
  return n;
}

const SQLITE_MAX_STDOUT_BYTES = parsePositiveIntEnv('XRAYDB_SQLITE_MAX_STDOUT_BYTES', 50 * 1024 * 1024);
const SQLITE_CONCURRENCY = parsePositiveIntEnv('XRAYDB_SQLITE_CONCURRENCY', 4);

let inFlight = 0;
const queue: Array<() => void> = [];

async function withSqliteConcurrencyLimit<T>(fn: () => Promise<T>): Promise<T> {
  if (inFlight >= SQLITE_CONCURRENCY) {
    await new Promise<void>(resolve => queue.push(resolve));
  }

  inFlight += 1;
  try {
    return await fn();
  } finally {
    inFlight -= 1;
    const next = queue.shift();
    if (next) next();
  }
}

function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError';
}

export async function sqlite3JsonQuery(
  dbPath: string,
  sql: string,
  params: readonly Sqlite3Param[] = [],
  options: { signal?: AbortSignal } = {}
): Promise<unknown[]> {
  const script = buildSqliteScript(sql, params);

  return withSqliteConcurrencyLimit(async () => {
    options.signal?.throwIfAborted();
    const args = ['-readonly', '-bail', '-batch', '-safe', '-json', dbPath];

    const res = await new Promise<{ status: number | null; stdout: string; stderr: string }>((resolve, reject) => {
      const child = spawn('sqlite3', args, { stdio: ['pipe', 'pipe', 'pipe'], signal: options.signal });

      let stdout = '';
      let stderr = '';
      let exceeded = false;

      child.stdout?.setEncoding('utf-8');
      child.stderr?.setEncoding('utf-8');

      child.stdout?.on('data', (chunk: string) => {
        if (exceeded) return;
        stdout += chunk;
        if (stdout.length > SQLITE_MAX_STDOUT_BYTES) {
          exceeded = true;
          child.kill();
        }
      });
      child.stderr?.on('data', (chunk: string) => {
        if (stderr.length > 1024 * 1024) return;
        stderr += chunk;
      });
      // A shell that exits early closes its stdin; the exit status reports why.
      child.stdin?.on('error', err => {
        stderr += `\n[stdin] ${err.message}`;
      });

      child.on('error', err => reject(err));
      child.on('close', status => {
        if (exceeded) {
          reject(
            upstreamError('sqlite3 output exceeded XRAYDB_SQLITE_MAX_STDOUT_BYTES', {
              max_bytes: SQLITE_MAX_STDOUT_BYTES,
              sql,
            })
          );
          return;
        }
        resolve({ status, stdout, stderr });
      });

      child.stdin?.end(script);
    }).catch(err => {
      if (isAbortError(err) || isXrayDbError(err)) throw err;
      const e = err as NodeJS.ErrnoException;
      if (e?.code === 'ENOENT') {
        throw invalidParams('sqlite3 not found in PATH; install sqlite3', {
          which: 'sqlite3',
        });
      }
      throw upstreamError('sqlite3 execution failed', {
        code: e?.code,
        message: e instanceof Error ? e.message : String(e),
        sql,
      });
    });

    if (res.status !== 0) {
      log.warn('sqlite3 query failed', { status: res.status, stderr: res.stderr.trim() || undefined });
      throw upstreamError('sqlite3 query failed', {
        status: res.status,
        stderr: res.stderr?.trim() || undefined,
        sql,
      });
    }

    const stdout = (res.stdout ?? '').trim();
    if (stdout.length === 0) return [];

    try {
      const parsed = JSON.parse(stdout) as unknown;
      if (!Array.isArray(parsed)) return [];
      return parsed;
    } catch (err) {
      throw upstreamError('sqlite3 returned non-JSON output', {
        message: err instanceof Error ? err.message : String(err),
        stdout_preview: stdout.slice(0, 2000),
      });
    }
  });
}
