import Database from 'better-sqlite3';
import { randomUUID } from 'crypto';
import { z } from 'zod';
import {
  canTransition,
  JobPatch,
  JobRecord,
  WorkInfo,
  WorkState,
} from '../../../core/entities/WorkInfo.js';
import { ConflictError, errorMessage, NotFoundError, StoreUnavailableError } from '../../../core/errors.js';
import {
  IWorkStore,
  PutOptions,
  TransitionResult,
  WorkStoreStatistics,
} from '../../../core/interfaces/IWorkStore.js';

const WorkItemRow = z.object({
  id: z.string(),
  name: z.string(),
  priority: z.number(),
  data: z.string(),
  state: z.nativeEnum(WorkState),
  retry_limit: z.number(),
  retry_delay: z.number(),
  retry_backoff: z.number(),
  retry_count: z.number(),
  attempts: z.number(),
  start_after: z.number(),
  expire_in_seconds: z.number(),
  keep_until: z.number(),
  on_complete: z.number(),
  executor: z.string().nullable(),
  endpoint: z.string().nullable(),
  created_at: z.number(),
  started_at: z.number().nullable(),
  completed_at: z.number().nullable(),
  result: z.string().nullable(),
  error: z.string().nullable(),
  dedupe_key: z.string().nullable(),
});

type WorkItemRow = z.infer<typeof WorkItemRow>;

const StateCountRow = z.object({ state: z.nativeEnum(WorkState), count: z.number() });

const DataColumn = z.record(z.unknown());

/**
 * Columns written by a transition patch. Undefined clears only the nullable timestamps and error.
 */
function patchColumns(patch: JobPatch): Array<[string, unknown]> {
  const columns: Array<[string, unknown]> = [];
  const time = (value: Date | undefined) => value?.getTime() ?? null;

  if (patch.retryCount !== undefined) columns.push(['retry_count', patch.retryCount]);
  if (patch.attempts !== undefined) columns.push(['attempts', patch.attempts]);
  if (patch.startAfter !== undefined) columns.push(['start_after', patch.startAfter.getTime()]);
  if (patch.keepUntil !== undefined) columns.push(['keep_until', patch.keepUntil.getTime()]);
  if ('startedAt' in patch) columns.push(['started_at', time(patch.startedAt)]);
  if ('completedAt' in patch) columns.push(['completed_at', time(patch.completedAt)]);
  if ('error' in patch) columns.push(['error', patch.error ?? null]);
  if (patch.result !== undefined) columns.push(['result', JSON.stringify(patch.result)]);
  return columns;
}

function toRecord(raw: unknown): JobRecord {
  const row: WorkItemRow = WorkItemRow.parse(raw);
  return {
    id: row.id,
    name: row.name,
    priority: row.priority,
    data: DataColumn.parse(JSON.parse(row.data)),
    state: row.state,
    retryLimit: row.retry_limit,
    retryDelay: row.retry_delay,
    retryBackoff: row.retry_backoff === 1,
    retryCount: row.retry_count,
    attempts: row.attempts,
    startAfter: new Date(row.start_after),
    expireInSeconds: row.expire_in_seconds,
    keepUntil: new Date(row.keep_until),
    onComplete: row.on_complete === 1,
    executor: row.executor ?? undefined,
    endpoint: row.endpoint ?? undefined,
    createdAt: new Date(row.created_at),
    startedAt: row.started_at === null ? undefined : new Date(row.started_at),
    completedAt: row.completed_at === null ? undefined : new Date(row.completed_at),
    result: row.result === null ? undefined : JSON.parse(row.result),
    error: row.error ?? undefined,
    dedupeKey: row.dedupe_key ?? undefined,
  };
}

const TERMINAL_CLAUSE = `(state IN ('${WorkState.COMPLETED}', '${WorkState.CANCELLED}')
  OR (state = '${WorkState.FAILED}' AND retry_count >= retry_limit))`;

/**
 * SQLite implementation of the work store.
 * Compare-and-swap is a conditional UPDATE keyed on id + expected state.
 */
export class SqliteWorkStore implements IWorkStore {
  constructor(
    private db: Database.Database,
    private clock: () => Date = () => new Date()
  ) {}

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      throw new StoreUnavailableError(`Work store ${operation} failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  async put(job: WorkInfo, options: PutOptions = {}): Promise<string> {
    const id = randomUUID();
    this.guard('put', () =>
      this.db
        .prepare(
          `INSERT INTO work_items (
            id, name, priority, data, state, retry_limit, retry_delay, retry_backoff,
            retry_count, attempts, start_after, expire_in_seconds, keep_until, on_complete,
            executor, endpoint, created_at, dedupe_key
          ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, 0, 0, ?, ?, ?, ?, ?, ?, ?, ?)`
        )
        .run(
          id,
          job.name,
          job.priority,
          JSON.stringify(job.data),
          WorkState.CREATED,
          job.retryLimit,
          job.retryDelay,
          job.retryBackoff ? 1 : 0,
          job.startAfter.getTime(),
          job.expireInSeconds,
          job.keepUntil.getTime(),
          job.onComplete ? 1 : 0,
          job.executor ?? null,
          job.endpoint ?? null,
          this.clock().getTime(),
          options.dedupeKey ?? null
        )
    );
    return id;
  }

  async get(jobId: string): Promise<JobRecord | null> {
    const row = this.guard('get', () =>
      this.db.prepare('SELECT * FROM work_items WHERE id = ?').get(jobId)
    );
    return row === undefined ? null : toRecord(row);
  }

  async updateState(
    jobId: string,
    expectedState: WorkState,
    newState: WorkState,
    patch: JobPatch = {}
  ): Promise<TransitionResult> {
    if (!canTransition(expectedState, newState)) {
      const current = await this.get(jobId);
      if (!current) {
        return { ok: false, error: new NotFoundError(jobId) };
      }
      return { ok: false, error: new ConflictError(jobId, expectedState, current.state) };
    }

    const assignments = ['state = ?'];
    const values: unknown[] = [newState];
    for (const [column, value] of patchColumns(patch)) {
      assignments.push(`${column} = ?`);
      values.push(value);
    }

    const changes = this.guard('updateState', () =>
      this.db
        .prepare(`UPDATE work_items SET ${assignments.join(', ')} WHERE id = ? AND state = ?`)
        .run(...values, jobId, expectedState).changes
    );

    const job = await this.get(jobId);
    if (!job) {
      return { ok: false, error: new NotFoundError(jobId) };
    }
    if (changes !== 1) {
      return { ok: false, error: new ConflictError(jobId, expectedState, job.state) };
    }
    return { ok: true, job };
  }

  async listEligible(now: Date, limit: number = -1): Promise<JobRecord[]> {
    const rows = this.guard('listEligible', () =>
      this.db
        .prepare(
          `SELECT * FROM work_items
           WHERE state = ? AND start_after <= ?
           ORDER BY priority DESC, start_after ASC
           LIMIT ?`
        )
        .all(WorkState.CREATED, now.getTime(), limit)
    );
    return rows.map(toRecord);
  }

  async listExpired(now: Date): Promise<JobRecord[]> {
    const rows = this.guard('listExpired', () =>
      this.db
        .prepare(
          `SELECT * FROM work_items
           WHERE state = ? AND expire_in_seconds > 0 AND started_at IS NOT NULL
             AND started_at + expire_in_seconds * 1000 <= ?`
        )
        .all(WorkState.ACTIVE, now.getTime())
    );
    return rows.map(toRecord);
  }

  async listRetryable(): Promise<JobRecord[]> {
    const rows = this.guard('listRetryable', () =>
      this.db
        .prepare('SELECT * FROM work_items WHERE state = ? AND retry_count < retry_limit ORDER BY completed_at ASC')
        .all(WorkState.FAILED)
    );
    return rows.map(toRecord);
  }

  async list(state?: WorkState): Promise<JobRecord[]> {
    const rows = this.guard('list', () =>
      state === undefined
        ? this.db.prepare('SELECT * FROM work_items ORDER BY created_at DESC').all()
        : this.db.prepare('SELECT * FROM work_items WHERE state = ? ORDER BY created_at DESC').all(state)
    );
    return rows.map(toRecord);
  }

  async findByDedupeKey(dedupeKey: string): Promise<JobRecord | null> {
    const row = this.guard('findByDedupeKey', () =>
      this.db
        .prepare('SELECT * FROM work_items WHERE dedupe_key = ? ORDER BY created_at DESC LIMIT 1')
        .get(dedupeKey)
    );
    return row === undefined ? null : toRecord(row);
  }

  async purge(now: Date): Promise<number> {
    return this.guard('purge', () =>
      this.db
        .prepare(`DELETE FROM work_items WHERE ${TERMINAL_CLAUSE} AND keep_until <= ?`)
        .run(now.getTime()).changes
    );
  }

  async getStatistics(): Promise<WorkStoreStatistics> {
    const rows = this.guard('getStatistics', () =>
      this.db.prepare('SELECT state, COUNT(*) AS count FROM work_items GROUP BY state').all()
    );

    const stats: WorkStoreStatistics = {
      total: 0,
      [WorkState.CREATED]: 0,
      [WorkState.ACTIVE]: 0,
      [WorkState.COMPLETED]: 0,
      [WorkState.FAILED]: 0,
      [WorkState.CANCELLED]: 0,
    };
    for (const raw of rows) {
      const row = StateCountRow.parse(raw);
      stats[row.state] = row.count;
      stats.total += row.count;
    }
    return stats;
  }

  async close(): Promise<void> {
    // The connection belongs to DatabaseConnection
  }
}
