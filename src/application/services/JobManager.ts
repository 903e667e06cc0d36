import { createHash } from 'crypto';
import { JobRecord, WorkInfo, WorkState } from '../../core/entities/WorkInfo.js';
import { ConflictError, errorMessage, NotFoundError, ValidationError } from '../../core/errors.js';
import { IJobDistributor } from '../../core/interfaces/IJobDistributor.js';
import { IWorkStore } from '../../core/interfaces/IWorkStore.js';
import { DEFAULT_MAX_PAYLOAD_BYTES, parseWorkInfo } from '../../core/validation/workInfoSchema.js';
import { createLogger, Logger } from '../../utils/logger.js';
import { JobScheduler } from './JobScheduler.js';

export type SubmitResult =
  | { ok: true; jobId: string; deduplicated: boolean }
  | { ok: false; error: ValidationError };

export type CancelResult =
  | { ok: true; job: JobRecord }
  | { ok: false; error: ConflictError | NotFoundError };

export interface JobManagerOptions {
  maxPayloadBytes?: number;
  deduplicate?: boolean;
  clock?: () => Date;
  logger?: Logger;
}

/**
 * Stable identity of a submission: name plus payload
 */
export function dedupeKey(name: string, data: Record<string, unknown>): string {
  return createHash('sha256').update(name).update('\0').update(JSON.stringify(data)).digest('hex');
}

/**
 * Entry point for submissions. Owns job identity and forwards admitted jobs to the scheduler.
 */
export class JobManager {
  private readonly maxPayloadBytes: number;
  private readonly deduplicate: boolean;
  private readonly clock: () => Date;
  private readonly logger: Logger;
  private closed = false;

  constructor(
    private store: IWorkStore,
    private distributor: IJobDistributor,
    private scheduler: JobScheduler,
    options: JobManagerOptions = {}
  ) {
    this.maxPayloadBytes = options.maxPayloadBytes ?? DEFAULT_MAX_PAYLOAD_BYTES;
    this.deduplicate = options.deduplicate ?? false;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? createLogger('JobManager');
  }

  /**
   * Validate and persist a job. Launches it right away when it is due and capacity exists;
   * never waits for execution.
   */
  async submit(input: unknown): Promise<SubmitResult> {
    let work: WorkInfo;
    try {
      work = parseWorkInfo(input, this.maxPayloadBytes);
    } catch (error) {
      if (error instanceof ValidationError) {
        this.logger.warn(`Rejected submission: ${error.message}`);
        return { ok: false, error };
      }
      throw error;
    }

    const key = this.deduplicate ? dedupeKey(work.name, work.data) : undefined;
    if (key) {
      const existing = await this.store.findByDedupeKey(key);
      if (existing) {
        this.logger.info(`Duplicate submission of ${work.name}, returning ${existing.id}`);
        return { ok: true, jobId: existing.id, deduplicated: true };
      }
    }

    const jobId = await this.store.put(work, { dedupeKey: key });
    this.logger.info(`Submitted ${work.name} as ${jobId}`);

    const now = this.clock();
    if (!this.closed && work.startAfter.getTime() <= now.getTime() && this.distributor.hasCapacity(work.executor)) {
      // The job is stored; a failed launch leaves it to the scheduler
      try {
        const job = await this.store.get(jobId);
        if (job) {
          await this.scheduler.launch(job);
        }
      } catch (error) {
        this.logger.error(`Immediate launch of ${jobId} failed: ${errorMessage(error)}`);
      }
    }

    return { ok: true, jobId, deduplicated: false };
  }

  async status(jobId: string): Promise<JobRecord | null> {
    return this.store.get(jobId);
  }

  /**
   * Cancel a job that has not reached a terminal state and abort its running call
   */
  async cancel(jobId: string): Promise<CancelResult> {
    const job = await this.store.get(jobId);
    if (!job) {
      return { ok: false, error: new NotFoundError(jobId) };
    }
    if (job.state !== WorkState.CREATED && job.state !== WorkState.ACTIVE) {
      return { ok: false, error: new ConflictError(jobId, 'created or active', job.state) };
    }

    const cancelled = await this.scheduler.transition(jobId, job.state, WorkState.CANCELLED, {
      completedAt: this.clock(),
    });
    if (!cancelled) {
      const current = await this.store.get(jobId);
      return {
        ok: false,
        error: new ConflictError(jobId, job.state, current?.state ?? 'missing'),
      };
    }

    if (job.state === WorkState.ACTIVE) {
      this.scheduler.abort(jobId, 'Cancelled');
    }
    this.logger.info(`Cancelled ${jobId}`);
    return { ok: true, job: cancelled };
  }

  async list(state?: WorkState): Promise<JobRecord[]> {
    return this.store.list(state);
  }

  /**
   * Stop scheduling, abort outstanding calls and release the distributor
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.scheduler.stop();
    try {
      await this.distributor.close();
      await this.scheduler.drain();
    } catch (error) {
      this.logger.error(`Error while closing: ${errorMessage(error)}`);
      throw error;
    }
    this.logger.info('Closed');
  }
}
