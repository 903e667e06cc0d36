import { JobPatch, JobRecord, WorkInfo, WorkState } from '../entities/WorkInfo.js';
import { ConflictError, NotFoundError } from '../errors.js';

export type TransitionResult =
  | { ok: true; job: JobRecord }
  | { ok: false; error: ConflictError | NotFoundError };

export type WorkStoreStatistics = Record<WorkState, number> & { total: number };

export interface PutOptions {
  dedupeKey?: string;
}

/**
 * Durable persistence for job records.
 * Every implementation must honour the same compare-and-swap contract on updateState.
 */
export interface IWorkStore {
  put(job: WorkInfo, options?: PutOptions): Promise<string>;

  get(jobId: string): Promise<JobRecord | null>;

  /**
   * Move a job from expectedState to newState only if it is still in expectedState
   */
  updateState(
    jobId: string,
    expectedState: WorkState,
    newState: WorkState,
    patch?: JobPatch
  ): Promise<TransitionResult>;

  /**
   * CREATED jobs with startAfter <= now, by priority desc then startAfter asc
   */
  listEligible(now: Date, limit?: number): Promise<JobRecord[]>;

  /**
   * ACTIVE jobs that have run past their expireInSeconds
   */
  listExpired(now: Date): Promise<JobRecord[]>;

  /**
   * FAILED jobs that still have retry budget
   */
  listRetryable(): Promise<JobRecord[]>;

  list(state?: WorkState): Promise<JobRecord[]>;

  findByDedupeKey(dedupeKey: string): Promise<JobRecord | null>;

  /**
   * Delete terminal records whose keepUntil has passed
   */
  purge(now: Date): Promise<number>;

  getStatistics(): Promise<WorkStoreStatistics>;

  close(): Promise<void>;
}
