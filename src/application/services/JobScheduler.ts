import { isTerminal, JobPatch, JobRecord, WorkState } from '../../core/entities/WorkInfo.js';
import { errorMessage, NoCapacityError } from '../../core/errors.js';
import { IJobDistributor, RunHandle, RunOutcome } from '../../core/interfaces/IJobDistributor.js';
import { IWorkStore } from '../../core/interfaces/IWorkStore.js';
import { canRetry, DEFAULT_RETRY_POLICY, nextStartAfter, RetryPolicyOptions } from '../../core/policies/RetryPolicy.js';
import { createLogger, Logger } from '../../utils/logger.js';

export type TransitionListener = (job: JobRecord, from: WorkState) => void;
export type CompletionListener = (job: JobRecord) => void;

export interface JobSchedulerOptions {
  sweepIntervalMs?: number;
  retryPolicy?: RetryPolicyOptions;
  noCapacityDelaySeconds?: number;
  purge?: boolean;
  clock?: () => Date;
  logger?: Logger;
}

export interface TickSummary {
  launched: number;
  expired: number;
  requeued: number;
  purged: number;
}

/**
 * Periodic sweep that moves jobs through their lifecycle.
 * Every transition is a compare-and-swap on the store, so a lost race is simply skipped.
 */
export class JobScheduler {
  private timer: NodeJS.Timeout | null = null;
  private sweeping = false;
  private handles: Map<string, RunHandle> = new Map();
  private inFlight: Set<Promise<void>> = new Set();
  private transitionListeners: TransitionListener[] = [];
  private completionListeners: CompletionListener[] = [];

  private readonly sweepIntervalMs: number;
  private readonly retryPolicy: RetryPolicyOptions;
  private readonly noCapacityDelaySeconds: number;
  private readonly purgeEnabled: boolean;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(
    private store: IWorkStore,
    private distributor: IJobDistributor,
    options: JobSchedulerOptions = {}
  ) {
    this.sweepIntervalMs = options.sweepIntervalMs ?? 2000;
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.noCapacityDelaySeconds = options.noCapacityDelaySeconds ?? 0;
    this.purgeEnabled = options.purge ?? true;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? createLogger('JobScheduler');
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      if (this.sweeping) return;
      this.tick().catch((error: unknown) => this.logger.error(`Sweep failed: ${errorMessage(error)}`));
    }, this.sweepIntervalMs);
    this.logger.info(`Started, sweeping every ${this.sweepIntervalMs}ms`);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      this.logger.info('Stopped');
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  /**
   * One sweep: expire overdue ACTIVE jobs, requeue FAILED jobs whose retry was never
   * scheduled, launch eligible ones, purge old terminal records.
   * Store failures are logged and left for the next sweep.
   */
  async tick(): Promise<TickSummary> {
    const summary: TickSummary = { launched: 0, expired: 0, requeued: 0, purged: 0 };
    this.sweeping = true;
    try {
      summary.expired = await this.phase('expiry', () => this.expireOverdue());
      summary.requeued = await this.phase('requeue', () => this.requeueFailed());
      summary.launched = await this.phase('dispatch', () => this.launchEligible());
      if (this.purgeEnabled) {
        summary.purged = await this.phase('purge', () => this.store.purge(this.clock()));
      }
    } finally {
      this.sweeping = false;
    }
    if (summary.launched || summary.expired || summary.requeued || summary.purged) {
      this.logger.debug(
        `Sweep: launched ${summary.launched}, expired ${summary.expired}, ` +
          `requeued ${summary.requeued}, purged ${summary.purged}`
      );
    }
    return summary;
  }

  private async phase(name: string, fn: () => Promise<number>): Promise<number> {
    try {
      return await fn();
    } catch (error) {
      this.logger.error(`Sweep ${name} failed: ${errorMessage(error)}`);
      return 0;
    }
  }

  private async launchEligible(): Promise<number> {
    const eligible = await this.store.listEligible(this.clock());
    let launched = 0;
    for (const job of eligible) {
      if (!this.distributor.hasCapacity(job.executor)) {
        continue;
      }
      if (await this.launch(job)) {
        launched++;
      }
    }
    return launched;
  }

  private async expireOverdue(): Promise<number> {
    const expired = await this.store.listExpired(this.clock());
    let count = 0;
    for (const job of expired) {
      this.abort(job.id, 'Execution deadline exceeded');
      const failed = await this.fail(job, `Execution exceeded ${job.expireInSeconds}s`);
      if (failed) count++;
    }
    return count;
  }

  // FAILED with budget left means the FAILED -> CREATED write was lost
  private async requeueFailed(): Promise<number> {
    const stranded = await this.store.listRetryable();
    let count = 0;
    for (const job of stranded) {
      if (await this.retry(job)) count++;
    }
    return count;
  }

  /**
   * Claim a CREATED job and hand it to the distributor. False when another caller claimed it first
   * or the distributor refused the job, in which case it is failed like any other attempt.
   */
  async launch(job: JobRecord): Promise<boolean> {
    const active = await this.transition(job.id, WorkState.CREATED, WorkState.ACTIVE, {
      attempts: job.attempts + 1,
      startedAt: this.clock(),
      completedAt: undefined,
      error: undefined,
    });
    if (!active) {
      return false;
    }
    try {
      this.dispatch(active);
    } catch (error) {
      this.logger.error(`Dispatch of ${job.id} failed: ${errorMessage(error)}`);
      await this.fail(active, errorMessage(error));
      return false;
    }
    return true;
  }

  private dispatch(job: JobRecord): void {
    const handle = this.distributor.submit(job, {
      deadlineMs: job.expireInSeconds > 0 ? job.expireInSeconds * 1000 : undefined,
    });
    this.handles.set(job.id, handle);

    const settled: Promise<void> = handle.result
      .then((outcome) => this.settle(job, handle, outcome))
      .catch((error: unknown) => this.logger.error(`Failed to settle ${job.id}: ${errorMessage(error)}`))
      .finally(() => {
        if (this.handles.get(job.id) === handle) {
          this.handles.delete(job.id);
        }
        this.inFlight.delete(settled);
      });
    this.inFlight.add(settled);
  }

  private async settle(job: JobRecord, handle: RunHandle, outcome: RunOutcome): Promise<void> {
    // Expired or cancelled while running: the store already moved on
    if (this.handles.get(job.id) !== handle) {
      return;
    }

    if (outcome.status === 'succeeded') {
      await this.transition(job.id, WorkState.ACTIVE, WorkState.COMPLETED, {
        result: outcome.output,
        completedAt: this.clock(),
      });
      return;
    }

    if (outcome.error instanceof NoCapacityError) {
      const startAfter = new Date(this.clock().getTime() + this.noCapacityDelaySeconds * 1000);
      await this.transition(job.id, WorkState.ACTIVE, WorkState.CREATED, {
        attempts: Math.max(0, job.attempts - 1),
        startAfter,
        keepUntil: job.keepUntil.getTime() < startAfter.getTime() ? startAfter : undefined,
        startedAt: undefined,
      });
      this.logger.debug(`Re-deferred ${job.id}: ${outcome.error.message}`);
      return;
    }

    this.logger.warn(`Job ${job.id} attempt ${job.attempts} failed: ${outcome.error.message}`);
    await this.fail(job, outcome.error.message);
  }

  /**
   * ACTIVE -> FAILED, then FAILED -> CREATED while retry budget remains
   */
  private async fail(job: JobRecord, error: string): Promise<boolean> {
    const failed = await this.transition(job.id, WorkState.ACTIVE, WorkState.FAILED, {
      error,
      completedAt: this.clock(),
    });
    if (!failed) {
      return false;
    }
    await this.retry(failed);
    return true;
  }

  private async retry(job: JobRecord): Promise<boolean> {
    if (!canRetry(job)) {
      this.logger.info(`Job ${job.id} failed after ${job.attempts} attempt(s)`);
      return false;
    }
    const startAfter = nextStartAfter(job, this.clock(), this.retryPolicy);
    const requeued = await this.transition(job.id, WorkState.FAILED, WorkState.CREATED, {
      retryCount: job.retryCount + 1,
      startAfter,
      keepUntil: job.keepUntil.getTime() < startAfter.getTime() ? startAfter : undefined,
      completedAt: undefined,
    });
    return requeued !== null;
  }

  /**
   * Apply one CAS transition and notify listeners. Null when the CAS was lost.
   */
  async transition(
    jobId: string,
    from: WorkState,
    to: WorkState,
    patch: JobPatch = {}
  ): Promise<JobRecord | null> {
    const result = await this.store.updateState(jobId, from, to, patch);
    if (!result.ok) {
      this.logger.debug(`Transition ${from} -> ${to} skipped for ${jobId}: ${result.error.message}`);
      return null;
    }

    const job = result.job;
    this.notify(this.transitionListeners, (listener) => listener(job, from));
    if (job.onComplete && isTerminal(job)) {
      this.notify(this.completionListeners, (listener) => listener(job));
    }
    return job;
  }

  /**
   * Cancel the local call for a job, if any
   */
  abort(jobId: string, reason?: string): boolean {
    const handle = this.handles.get(jobId);
    if (!handle) {
      return false;
    }
    this.handles.delete(jobId);
    handle.cancel(reason);
    return true;
  }

  /**
   * Wait until every dispatched call has settled
   */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(Array.from(this.inFlight));
    }
  }

  runningCount(): number {
    return this.handles.size;
  }

  onTransition(listener: TransitionListener): void {
    this.transitionListeners.push(listener);
  }

  onJobCompleted(listener: CompletionListener): void {
    this.completionListeners.push(listener);
  }

  private notify<L>(listeners: L[], call: (listener: L) => void): void {
    for (const listener of listeners) {
      try {
        call(listener);
      } catch (error) {
        this.logger.error(`Listener failed: ${errorMessage(error)}`);
      }
    }
  }
}
