import { DiscoveredNode, DiscoveryEvent } from '../../core/entities/DiscoveredNode.js';
import { errorMessage, WorkerUnavailableError } from '../../core/errors.js';
import { IJobDistributor } from '../../core/interfaces/IJobDistributor.js';
import { IWorkerClient } from '../../core/interfaces/IWorkerClient.js';
import { EMPTY_ROUTING_TABLE, RoutingTable, routeCount } from '../../core/routing/RoutingTable.js';
import { normalizeAddress, Topology } from '../../core/routing/Topology.js';
import { AsyncQueue } from '../../utils/AsyncQueue.js';
import { createLogger, Logger } from '../../utils/logger.js';
import { isRetryableError, RetryConfig, RetryExhaustedError, sleep, withRetry } from '../../utils/retry.js';

export interface ReconciliationOptions {
  readinessAttempts?: number;
  readinessDelayMs?: number;
  maxErrors?: number;
  errorDelayMs?: number;
  logger?: Logger;
}

interface QueuedEvent {
  service: string;
  event: DiscoveryEvent;
}

class GatewayNotReadyError extends Error {
  constructor(readonly address: string) {
    super(`Gateway ${address} is not ready`);
    this.name = 'GatewayNotReadyError';
  }
}

/**
 * Single consumer of discovery events. Each applied event rebuilds the routing table
 * and hands it to the distributor in one swap.
 */
export class ReconciliationLoop {
  private queue = new AsyncQueue<QueuedEvent>();
  private topology = new Topology();
  private table: RoutingTable = EMPTY_ROUTING_TABLE;
  private running: Promise<void> | null = null;
  private stopping = false;
  private consecutiveErrors = 0;

  private readonly readinessAttempts: number;
  private readonly readinessDelayMs: number;
  private readonly maxErrors: number;
  private readonly errorDelayMs: number;
  private readonly logger: Logger;

  constructor(
    private workerClient: IWorkerClient,
    private distributor: IJobDistributor,
    options: ReconciliationOptions = {}
  ) {
    this.readinessAttempts = options.readinessAttempts ?? 10;
    this.readinessDelayMs = options.readinessDelayMs ?? 1000;
    this.maxErrors = options.maxErrors ?? 5;
    this.errorDelayMs = options.errorDelayMs ?? 1000;
    this.logger = options.logger ?? createLogger('ReconciliationLoop');
  }

  /**
   * Producer side; safe to call from any watch callback
   */
  enqueue(service: string, event: DiscoveryEvent): boolean {
    const accepted = this.queue.push({ service, event });
    if (!accepted) {
      this.logger.warn(`Dropped ${event.type} for ${event.key}: loop is stopped`);
    }
    return accepted;
  }

  start(): Promise<void> {
    if (!this.running) {
      this.running = this.run();
    }
    return this.running;
  }

  /**
   * Consume events until stopped or until maxErrors consecutive failures
   */
  async run(): Promise<void> {
    for (;;) {
      const next = await this.queue.take();
      if (!next || this.stopping) {
        return;
      }

      try {
        this.logger.debug(`Applying ${next.event.type} ${next.event.key} (queued: ${this.queue.size})`);
        await this.apply(next.event);
        this.consecutiveErrors = 0;
      } catch (error) {
        this.consecutiveErrors++;
        this.logger.error(`Error processing ${next.event.type} ${next.event.key}: ${errorMessage(error)}`);
        if (this.consecutiveErrors >= this.maxErrors) {
          this.logger.error(`Reached maximum error limit: ${this.maxErrors}, stopping`);
          this.queue.close();
          return;
        }
        await sleep(this.errorDelayMs);
      }
    }
  }

  /**
   * Finish the event in progress and discard the rest
   */
  async stop(): Promise<void> {
    this.stopping = true;
    this.queue.close();
    if (this.running) {
      await this.running;
    }
  }

  /**
   * Stop accepting events and wait until every queued one has been applied
   */
  async drain(): Promise<void> {
    this.queue.close();
    if (this.running) {
      await this.running;
    }
  }

  isStopped(): boolean {
    return this.queue.isClosed;
  }

  private async apply(event: DiscoveryEvent): Promise<void> {
    switch (event.type) {
      case 'put':
        await this.gatewayOnline(event);
        break;
      case 'delete':
        this.gatewayOffline(event.gateway);
        break;
    }
  }

  private async gatewayOnline(event: DiscoveryEvent): Promise<void> {
    if (!event.value) {
      throw new Error(`put for ${event.key} carries no address`);
    }
    const gateway = normalizeAddress(event.value.controlAddress);
    const metadata = event.value.metadata;

    const retry: RetryConfig = {
      maxAttempts: this.readinessAttempts,
      initialDelayMs: this.readinessDelayMs,
      maxDelayMs: this.readinessDelayMs,
      multiplier: 1,
      timeoutMs: 0,
    };

    try {
      await withRetry(async () => {
        if (!(await this.workerClient.isReady(gateway))) {
          throw new GatewayNotReadyError(gateway);
        }
      }, retry);
    } catch (error) {
      if (error instanceof RetryExhaustedError) {
        this.logger.warn(
          `Gateway is not ready at ${gateway} after ${this.readinessAttempts} attempts, will retry on next event`
        );
        return;
      }
      throw error;
    }

    const endpoints = await withRetry(() => this.workerClient.discoverEndpoints(gateway), {
      ...retry,
      shouldRetry: (error) => error instanceof WorkerUnavailableError || isRetryableError(error),
    });

    const nodes: DiscoveredNode[] = [];
    for (const [executor, addresses] of Object.entries(metadata)) {
      for (const address of addresses) {
        nodes.push({ address, executor, gateway, endpoints: [...endpoints] });
      }
    }

    if (this.topology.putGateway(gateway, nodes)) {
      this.logger.info(`Gateway ${gateway} online with ${nodes.length} node(s)`);
      this.publish();
    } else {
      this.logger.debug(`Gateway ${gateway} unchanged`);
    }
  }

  private gatewayOffline(gatewayAddress: string): void {
    const gateway = normalizeAddress(gatewayAddress);
    if (!this.topology.hasGateway(gateway)) {
      this.logger.debug(`Gateway ${gateway} offline but was never online`);
      return;
    }
    const removed = this.topology.removeGateway(gateway);
    this.logger.info(`Gateway ${gateway} offline, removed ${removed} node(s)`);
    this.publish();
  }

  private publish(): void {
    const table = this.topology.toRoutingTable();
    this.table = table;
    this.distributor.updateRoutes(table);
    this.logger.info(
      `Routing table v${table.version}: ${table.routes.size} executor(s), ${routeCount(table)} address(es)`
    );
  }

  nodes(): DiscoveredNode[] {
    return this.topology.nodes();
  }

  routingTable(): RoutingTable {
    return this.table;
  }
}
