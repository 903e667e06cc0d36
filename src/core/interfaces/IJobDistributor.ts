import { JobRecord } from '../entities/WorkInfo.js';
import { ExecutionFailedError, ExecutionTimeoutError, NoCapacityError } from '../errors.js';
import { RoutingTable } from '../routing/RoutingTable.js';

export type RunFailure = NoCapacityError | ExecutionFailedError | ExecutionTimeoutError;

export type RunOutcome =
  | { status: 'succeeded'; output: unknown; address?: string }
  | { status: 'failed'; error: RunFailure; address?: string };

/**
 * Handle to one physical execution. result never rejects.
 */
export interface RunHandle {
  jobId: string;
  result: Promise<RunOutcome>;
  cancel(reason?: string): void;
}

export interface DistributeOptions {
  deadlineMs?: number;
}

/**
 * Decouples the job lifecycle from where a job physically runs
 */
export interface IJobDistributor {
  submit(job: JobRecord, options?: DistributeOptions): RunHandle;

  /**
   * Capacity hint consulted before admitting a job to ACTIVE
   */
  hasCapacity(executor?: string): boolean;

  availableSlots(): number;

  /**
   * Install a new routing table. The previous one stays valid for in-flight reads.
   */
  updateRoutes(table: RoutingTable): void;

  close(): Promise<void>;
}
