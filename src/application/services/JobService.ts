import { DiscoveredNode } from '../../core/entities/DiscoveredNode.js';
import { JobRecord, WorkState } from '../../core/entities/WorkInfo.js';
import { IJobDistributor } from '../../core/interfaces/IJobDistributor.js';
import { IWorkStore, WorkStoreStatistics } from '../../core/interfaces/IWorkStore.js';
import { CancelResult, JobManager, SubmitResult } from './JobManager.js';
import { CompletionListener, JobScheduler } from './JobScheduler.js';
import { ReconciliationLoop } from './ReconciliationLoop.js';

export interface HealthReport {
  status: 'ok' | 'degraded';
  jobs: WorkStoreStatistics;
  scheduler: { running: boolean; inFlight: number };
  discovery: {
    enabled: boolean;
    stopped: boolean;
    routingVersion: number;
    executors: number;
    nodes: number;
  };
  availableSlots: number | null; // null when unbounded
}

/**
 * Operational verbs exposed to transports
 */
export class JobService {
  constructor(
    private manager: JobManager,
    private store: IWorkStore,
    private scheduler: JobScheduler,
    private distributor: IJobDistributor,
    private reconciliation: ReconciliationLoop | null = null
  ) {}

  submitJob(input: unknown): Promise<SubmitResult> {
    return this.manager.submit(input);
  }

  getJobStatus(jobId: string): Promise<JobRecord | null> {
    return this.manager.status(jobId);
  }

  cancelJob(jobId: string): Promise<CancelResult> {
    return this.manager.cancel(jobId);
  }

  listJobs(state?: WorkState): Promise<JobRecord[]> {
    return this.manager.list(state);
  }

  listNodes(): DiscoveredNode[] {
    return this.reconciliation?.nodes() ?? [];
  }

  getStatistics(): Promise<WorkStoreStatistics> {
    return this.store.getStatistics();
  }

  async getHealth(): Promise<HealthReport> {
    const jobs = await this.store.getStatistics();
    const table = this.reconciliation?.routingTable();
    const stopped = this.reconciliation?.isStopped() ?? false;
    const slots = this.distributor.availableSlots();

    return {
      status: stopped || !this.scheduler.isRunning() ? 'degraded' : 'ok',
      jobs,
      scheduler: { running: this.scheduler.isRunning(), inFlight: this.scheduler.runningCount() },
      discovery: {
        enabled: this.reconciliation !== null,
        stopped,
        routingVersion: table?.version ?? 0,
        executors: table?.routes.size ?? 0,
        nodes: this.listNodes().length,
      },
      availableSlots: Number.isFinite(slots) ? slots : null,
    };
  }

  onJobCompleted(listener: CompletionListener): void {
    this.scheduler.onJobCompleted(listener);
  }
}
