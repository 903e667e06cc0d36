import { JobRecord } from '../../core/entities/WorkInfo.js';
import {
  errorMessage,
  ExecutionFailedError,
  ExecutionTimeoutError,
  NoCapacityError,
  WorkerUnavailableError,
} from '../../core/errors.js';
import {
  DistributeOptions,
  IJobDistributor,
  RunHandle,
  RunOutcome,
} from '../../core/interfaces/IJobDistributor.js';
import { IWorkerClient, ProcessRequest } from '../../core/interfaces/IWorkerClient.js';
import { RoutingTable } from '../../core/routing/RoutingTable.js';
import { createLogger, Logger } from '../../utils/logger.js';
import { ConnectionPool } from '../balancer/ConnectionPool.js';
import { ConnectionSlot } from '../balancer/LoadBalancer.js';

export const DEFAULT_ENDPOINT = '/';

/**
 * Routes each job to one discovered node through the connection pool
 */
export class GatewayJobDistributor implements IJobDistributor {
  private inFlight: Map<string, AbortController> = new Map();
  private closed = false;

  constructor(
    private pool: ConnectionPool,
    private workerClient: IWorkerClient,
    private logger: Logger = createLogger('GatewayJobDistributor')
  ) {}

  submit(job: JobRecord, options: DistributeOptions = {}): RunHandle {
    const controller = new AbortController();
    const result = this.run(job, controller, options.deadlineMs ?? 0);
    return {
      jobId: job.id,
      result,
      cancel: (reason?: string) => controller.abort(new Error(reason ?? 'Cancelled')),
    };
  }

  private run(job: JobRecord, controller: AbortController, deadlineMs: number): Promise<RunOutcome> {
    if (this.closed) {
      return Promise.resolve({ status: 'failed', error: new NoCapacityError(job.executor) });
    }

    const slot = this.pool.acquire(job.executor);
    if (!slot) {
      return Promise.resolve({ status: 'failed', error: new NoCapacityError(job.executor) });
    }

    const address = slot.connection.address;
    const request: ProcessRequest = {
      requestId: `${job.id}:${job.attempts}`,
      executor: job.executor ?? slot.connection.executor,
      endpoint: job.endpoint ?? DEFAULT_ENDPOINT,
      parameters: { jobId: job.id, name: job.name, attempt: job.attempts },
      payload: job.data,
    };
    const callId = request.requestId;
    this.inFlight.set(callId, controller);

    this.logger.debug(`Dispatching ${job.id} to ${address} (${request.executor}${request.endpoint})`);

    return new Promise<RunOutcome>((resolve) => {
      let settled = false;
      let timer: NodeJS.Timeout | undefined;

      const settle = (outcome: RunOutcome, slotAction: (slot: ConnectionSlot) => void) => {
        if (settled) return;
        settled = true;
        if (timer) clearTimeout(timer);
        this.inFlight.delete(callId);
        slotAction(slot);
        resolve(outcome);
      };
      const release = (s: ConnectionSlot) => this.pool.release(s);

      if (deadlineMs > 0) {
        timer = setTimeout(() => {
          controller.abort(new ExecutionTimeoutError(deadlineMs, address));
          this.logger.warn(`Job ${job.id} exceeded ${deadlineMs}ms on ${address}`);
          settle({ status: 'failed', error: new ExecutionTimeoutError(deadlineMs, address), address }, release);
        }, deadlineMs);
      }

      this.workerClient.process(address, request, controller.signal).then(
        (response) => settle({ status: 'succeeded', output: response.payload, address }, release),
        (error: unknown) => {
          if (error instanceof WorkerUnavailableError) {
            const unavailable = error;
            settle({ status: 'failed', error: unavailable, address }, (s) => this.pool.fail(s, unavailable));
          } else if (error instanceof ExecutionFailedError) {
            settle({ status: 'failed', error, address }, release);
          } else {
            const failure = new ExecutionFailedError(errorMessage(error), address, { cause: error });
            settle({ status: 'failed', error: failure, address }, release);
          }
        }
      );
    });
  }

  hasCapacity(executor?: string): boolean {
    return !this.closed && this.pool.hasCapacity(executor);
  }

  availableSlots(): number {
    return this.closed ? 0 : this.pool.availableSlots();
  }

  updateRoutes(table: RoutingTable): void {
    this.pool.applyRoutingTable(table);
  }

  async close(): Promise<void> {
    this.closed = true;
    for (const controller of this.inFlight.values()) {
      controller.abort(new Error('Distributor closed'));
    }
    this.inFlight.clear();
    this.workerClient.close();
  }
}
