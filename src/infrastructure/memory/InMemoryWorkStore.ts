import { randomUUID } from 'crypto';
import {
  applyPatch,
  canTransition,
  isTerminal,
  JobPatch,
  JobRecord,
  WorkInfo,
  WorkState,
} from '../../core/entities/WorkInfo.js';
import { ConflictError, NotFoundError } from '../../core/errors.js';
import {
  IWorkStore,
  PutOptions,
  TransitionResult,
  WorkStoreStatistics,
} from '../../core/interfaces/IWorkStore.js';

export function compareEligible(a: JobRecord, b: JobRecord): number {
  if (a.priority !== b.priority) {
    return b.priority - a.priority;
  }
  return a.startAfter.getTime() - b.startAfter.getTime();
}

function clone(job: JobRecord): JobRecord {
  return {
    ...job,
    data: structuredClone(job.data),
    startAfter: new Date(job.startAfter),
    keepUntil: new Date(job.keepUntil),
    createdAt: new Date(job.createdAt),
    startedAt: job.startedAt ? new Date(job.startedAt) : undefined,
    completedAt: job.completedAt ? new Date(job.completedAt) : undefined,
  };
}

/**
 * Single-process store without durability, for tests and development
 */
export class InMemoryWorkStore implements IWorkStore {
  private jobs: Map<string, JobRecord> = new Map();

  constructor(private clock: () => Date = () => new Date()) {}

  async put(job: WorkInfo, options: PutOptions = {}): Promise<string> {
    const id = randomUUID();
    const record: JobRecord = {
      ...job,
      id,
      state: WorkState.CREATED,
      retryCount: 0,
      attempts: 0,
      createdAt: this.clock(),
      dedupeKey: options.dedupeKey,
    };
    this.jobs.set(id, clone(record));
    return id;
  }

  async get(jobId: string): Promise<JobRecord | null> {
    const job = this.jobs.get(jobId);
    return job ? clone(job) : null;
  }

  async updateState(
    jobId: string,
    expectedState: WorkState,
    newState: WorkState,
    patch: JobPatch = {}
  ): Promise<TransitionResult> {
    // No await between the read and the write: the check-and-set is atomic on the event loop
    const current = this.jobs.get(jobId);
    if (!current) {
      return { ok: false, error: new NotFoundError(jobId) };
    }
    if (current.state !== expectedState || !canTransition(expectedState, newState)) {
      return { ok: false, error: new ConflictError(jobId, expectedState, current.state) };
    }

    const next = applyPatch(current, newState, patch);
    this.jobs.set(jobId, next);
    return { ok: true, job: clone(next) };
  }

  async listEligible(now: Date, limit?: number): Promise<JobRecord[]> {
    const eligible = Array.from(this.jobs.values())
      .filter((job) => job.state === WorkState.CREATED && job.startAfter.getTime() <= now.getTime())
      .sort(compareEligible)
      .map(clone);
    return limit === undefined ? eligible : eligible.slice(0, limit);
  }

  async listExpired(now: Date): Promise<JobRecord[]> {
    return Array.from(this.jobs.values())
      .filter(
        (job) =>
          job.state === WorkState.ACTIVE &&
          job.expireInSeconds > 0 &&
          job.startedAt !== undefined &&
          job.startedAt.getTime() + job.expireInSeconds * 1000 <= now.getTime()
      )
      .map(clone);
  }

  async listRetryable(): Promise<JobRecord[]> {
    return Array.from(this.jobs.values())
      .filter((job) => job.state === WorkState.FAILED && job.retryCount < job.retryLimit)
      .map(clone);
  }

  async list(state?: WorkState): Promise<JobRecord[]> {
    return Array.from(this.jobs.values())
      .filter((job) => state === undefined || job.state === state)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .map(clone);
  }

  async findByDedupeKey(dedupeKey: string): Promise<JobRecord | null> {
    for (const job of this.jobs.values()) {
      if (job.dedupeKey === dedupeKey) {
        return clone(job);
      }
    }
    return null;
  }

  async purge(now: Date): Promise<number> {
    let purged = 0;
    for (const [jobId, job] of this.jobs.entries()) {
      if (isTerminal(job) && job.keepUntil.getTime() <= now.getTime()) {
        this.jobs.delete(jobId);
        purged++;
      }
    }
    return purged;
  }

  async getStatistics(): Promise<WorkStoreStatistics> {
    const stats: WorkStoreStatistics = {
      total: 0,
      [WorkState.CREATED]: 0,
      [WorkState.ACTIVE]: 0,
      [WorkState.COMPLETED]: 0,
      [WorkState.FAILED]: 0,
      [WorkState.CANCELLED]: 0,
    };
    for (const job of this.jobs.values()) {
      stats[job.state]++;
      stats.total++;
    }
    return stats;
  }

  async close(): Promise<void> {
    this.jobs.clear();
  }
}
