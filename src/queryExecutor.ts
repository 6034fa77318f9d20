import type { QueryResult, ResultValue } from './model';
import type { DbClient } from './schemaExtractor';
import type { SqlStatement } from './queryBuilder';
import { errorMessage } from './errors';

export interface ExecutorOptions {
  /** Deadline per execution in milliseconds (default: 30000) */
  readonly timeoutMs?: number;
  /** Executions allowed in flight at once; further calls wait (default: 4) */
  readonly maxConcurrent?: number;
}

export interface ExecuteOptions {
  readonly signal?: AbortSignal;
  /** Overrides the executor's deadline for this call */
  readonly timeoutMs?: number;
}

const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_MAX_CONCURRENT = 4;

/**
 * Runs validated report SQL and materializes the rows.
 *
 * Failures never throw: a driver error, a timeout or a cancellation comes back as a
 * `QueryResult` with `success: false`. Callers must branch on `success`.
 */
export class QueryExecutor {
  private readonly _slots: Semaphore;
  private readonly _timeoutMs: number;

  constructor(
    private readonly _client: DbClient,
    options: ExecutorOptions = {}
  ) {
    this._timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this._slots = new Semaphore(options.maxConcurrent ?? DEFAULT_MAX_CONCURRENT);
  }

  async execute(query: string | SqlStatement, options: ExecuteOptions = {}): Promise<QueryResult> {
    const { sql, params } = typeof query === 'string' ? { sql: query, params: [] } : query;

    const release = await this._slots.acquire();
    const start = performance.now();
    try {
      if (options.signal?.aborted) {
        throw new Error('Query was cancelled');
      }

      const result = await withDeadline(
        this._client.query<Record<string, unknown>>(sql, params),
        options.timeoutMs ?? this._timeoutMs,
        options.signal
      );

      const columns = result.fields
        ? result.fields.map(f => f.name)
        : Object.keys(result.rows[0] ?? {});

      const typeIds = new Map((result.fields ?? []).map(f => [f.name, f.dataTypeID]));
      const records = result.rows.map(row => {
        const record: Record<string, ResultValue> = {};
        for (const column of columns) {
          record[column] = normalizeValue(row[column], typeIds.get(column));
        }
        return record;
      });

      return {
        success: true,
        records,
        columns,
        rowCount: records.length,
        executionTimeMs: performance.now() - start,
        sql,
      };
    } catch (error) {
      return {
        success: false,
        records: [],
        columns: [],
        rowCount: 0,
        executionTimeMs: performance.now() - start,
        sql,
        error: errorMessage(error),
      };
    } finally {
      release();
    }
  }
}

/** PostgreSQL type OID of `date` */
export const DATE_TYPE_ID = 1082;

/**
 * Dates become `YYYY-MM-DD HH:MM:SS` in the wall-clock time they were stored with;
 * bigints become numbers when they fit.
 *
 * Drivers read `timestamp` as local time, so the local getters give back the stored value.
 * A `date` column arrives as midnight, local (`pg`) or UTC (PGlite), and prints as that day.
 */
export function normalizeValue(value: unknown, dataTypeID?: number): ResultValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'bigint') {
    return Number.isSafeInteger(Number(value)) ? Number(value) : value.toString();
  }
  if (value instanceof Date) {
    return formatTimestamp(value, dataTypeID);
  }
  if (value instanceof Uint8Array) {
    return Buffer.from(value).toString('hex');
  }
  return JSON.stringify(value);
}

function formatTimestamp(value: Date, dataTypeID: number | undefined): string {
  const isLocalMidnight = value.getHours() === 0 && value.getMinutes() === 0 && value.getSeconds() === 0;
  const isUtcMidnight = value.getUTCHours() === 0 && value.getUTCMinutes() === 0 && value.getUTCSeconds() === 0;
  if (dataTypeID === DATE_TYPE_ID && isUtcMidnight && !isLocalMidnight) {
    return `${value.getUTCFullYear()}-${pad2(value.getUTCMonth() + 1)}-${pad2(value.getUTCDate())} 00:00:00`;
  }

  const day = `${value.getFullYear()}-${pad2(value.getMonth() + 1)}-${pad2(value.getDate())}`;
  return `${day} ${pad2(value.getHours())}:${pad2(value.getMinutes())}:${pad2(value.getSeconds())}`;
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * Race a query against its deadline and the caller's abort signal.
 * The driver call keeps running after a timeout; pair this with a server-side
 * `statement_timeout` to stop the work itself.
 */
function withDeadline<T>(promise: Promise<T>, timeoutMs: number, signal?: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      cleanup();
      reject(new Error('Query was cancelled'));
    };
    const timer = setTimeout(() => {
      cleanup();
      reject(new Error(`Query timed out after ${timeoutMs} ms`));
    }, timeoutMs);

    function cleanup() {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }

    signal?.addEventListener('abort', onAbort, { once: true });

    void promise.then(
      value => {
        cleanup();
        resolve(value);
      },
      (error: unknown) => {
        cleanup();
        reject(error);
      }
    );
  });
}

/**
 * Counting semaphore bounding in-flight executions.
 */
class Semaphore {
  private _available: number;
  private readonly _waiting: (() => void)[] = [];

  constructor(capacity: number) {
    this._available = Math.max(1, capacity);
  }

  async acquire(): Promise<() => void> {
    if (this._available > 0) {
      this._available--;
    } else {
      await new Promise<void>(resolve => this._waiting.push(resolve));
    }

    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this._waiting.shift();
      if (next) {
        next();
      } else {
        this._available++;
      }
    };
  }
}
