import { JobRecord } from '../../core/entities/WorkInfo.js';
import { IJobDistributor, RunHandle } from '../../core/interfaces/IJobDistributor.js';
import { EMPTY_ROUTING_TABLE, RoutingTable } from '../../core/routing/RoutingTable.js';
import { createLogger, Logger } from '../../utils/logger.js';

/**
 * Dry-run strategy: every job succeeds without leaving the process
 */
export class NoopJobDistributor implements IJobDistributor {
  private table: RoutingTable = EMPTY_ROUTING_TABLE;

  constructor(private logger: Logger = createLogger('NoopJobDistributor')) {}

  submit(job: JobRecord): RunHandle {
    this.logger.debug(`Dry run: ${job.name} (${job.id})`);
    return {
      jobId: job.id,
      result: Promise.resolve({ status: 'succeeded', output: { dryRun: true, jobId: job.id } }),
      cancel: () => undefined,
    };
  }

  hasCapacity(): boolean {
    return true;
  }

  availableSlots(): number {
    return Number.POSITIVE_INFINITY;
  }

  updateRoutes(table: RoutingTable): void {
    this.table = table;
  }

  getRoutingTable(): RoutingTable {
    return this.table;
  }

  async close(): Promise<void> {}
}
