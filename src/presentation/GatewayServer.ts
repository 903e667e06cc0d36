import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { Config } from '../config.js';
import { JobManager } from '../application/services/JobManager.js';
import { JobScheduler } from '../application/services/JobScheduler.js';
import { JobService } from '../application/services/JobService.js';
import { ReconciliationLoop } from '../application/services/ReconciliationLoop.js';
import { errorMessage } from '../core/errors.js';
import { ICoordinationClient } from '../core/interfaces/ICoordinationClient.js';
import { IJobDistributor } from '../core/interfaces/IJobDistributor.js';
import { IWorkerClient } from '../core/interfaces/IWorkerClient.js';
import { IWorkStore } from '../core/interfaces/IWorkStore.js';
import { ConnectionPool } from '../infrastructure/balancer/ConnectionPool.js';
import { createLoggingInterceptor } from '../infrastructure/balancer/LoggingInterceptor.js';
import { DatabaseConnection } from '../infrastructure/database/DatabaseConnection.js';
import { SqliteWorkStore } from '../infrastructure/database/repositories/SqliteWorkStore.js';
import { EtcdCoordinationClient } from '../infrastructure/discovery/EtcdCoordinationClient.js';
import { ServiceResolver } from '../infrastructure/discovery/ServiceResolver.js';
import { GatewayJobDistributor } from '../infrastructure/distribution/GatewayJobDistributor.js';
import { NoopJobDistributor } from '../infrastructure/distribution/NoopJobDistributor.js';
import { GrpcWorkerClient } from '../infrastructure/grpc/GrpcWorkerClient.js';
import { InMemoryWorkStore } from '../infrastructure/memory/InMemoryWorkStore.js';
import { createLogger, Logger } from '../utils/logger.js';
import { registerHealthCheckTool } from './tools/HealthCheckTool.js';
import { registerJobManagementTools } from './tools/JobManagementTools.js';
import { registerNodeTools } from './tools/NodeTools.js';

/**
 * Collaborators that can be swapped out, mostly for tests
 */
export interface GatewayDependencies {
  coordinationClient?: ICoordinationClient;
  workerClient?: IWorkerClient;
  clock?: () => Date;
}

export interface StartOptions {
  stdio?: boolean;
}

/**
 * Composition root: builds every component from configuration and owns their lifecycle
 */
export class GatewayServer {
  private server: McpServer;
  private dbConnection: DatabaseConnection | null = null;
  private store: IWorkStore;
  private workerClient: IWorkerClient | null = null;
  private distributor: IJobDistributor;
  private scheduler: JobScheduler;
  private manager: JobManager;
  private jobService: JobService;
  private coordinationClient: ICoordinationClient | null = null;
  private resolver: ServiceResolver | null = null;
  private reconciliation: ReconciliationLoop | null = null;
  private reconciliationRun: Promise<void> | null = null;
  private logger: Logger;
  private started = false;

  constructor(private config: Config, deps: GatewayDependencies = {}) {
    const debug = config.server.debug;
    const log = (component: string) => createLogger(component, debug);
    this.logger = log('GatewayServer');
    const clock = deps.clock ?? (() => new Date());

    // Store
    if (config.store.backend === 'sqlite') {
      this.dbConnection = new DatabaseConnection(config.store.path);
      this.store = new SqliteWorkStore(this.dbConnection.getDatabase(), clock);
    } else {
      this.store = new InMemoryWorkStore(clock);
    }

    // Worker RPC is needed to dispatch and to probe announced gateways
    if (!config.gateway.dryRun || config.discovery.enabled) {
      this.workerClient =
        deps.workerClient ?? new GrpcWorkerClient(config.worker.protoPath, config.worker.rpcTimeoutMs, log('GrpcWorkerClient'));
    }

    // Distribution strategy is fixed at construction
    if (config.gateway.dryRun || !this.workerClient) {
      this.distributor = new NoopJobDistributor(log('NoopJobDistributor'));
    } else {
      const pool = new ConnectionPool({
        strategy: config.balancer.type,
        slotsPerConnection: config.balancer.slotsPerConnection,
        interceptors: [createLoggingInterceptor(log('LoadBalancer'))],
        logger: log('ConnectionPool'),
      });
      this.distributor = new GatewayJobDistributor(pool, this.workerClient, log('GatewayJobDistributor'));
    }

    this.scheduler = new JobScheduler(this.store, this.distributor, {
      sweepIntervalMs: config.scheduler.sweepIntervalMs,
      retryPolicy: {
        backoffMultiplier: config.scheduler.backoffMultiplier,
        maxRetryDelaySeconds: config.scheduler.maxRetryDelaySeconds,
      },
      noCapacityDelaySeconds: config.scheduler.noCapacityDelaySeconds,
      purge: config.scheduler.purge,
      clock,
      logger: log('JobScheduler'),
    });

    this.manager = new JobManager(this.store, this.distributor, this.scheduler, {
      maxPayloadBytes: config.store.maxPayloadBytes,
      deduplicate: config.store.deduplicate,
      clock,
      logger: log('JobManager'),
    });

    // Discovery
    if (config.discovery.enabled && this.workerClient) {
      this.coordinationClient =
        deps.coordinationClient ?? new EtcdCoordinationClient(config.discovery.etcdHosts, undefined, log('Etcd'));
      this.resolver = new ServiceResolver(this.coordinationClient, config.discovery.namespace, log('ServiceResolver'));
      this.reconciliation = new ReconciliationLoop(this.workerClient, this.distributor, {
        readinessAttempts: config.discovery.readinessAttempts,
        readinessDelayMs: config.discovery.readinessDelayMs,
        maxErrors: config.discovery.maxEventErrors,
        logger: log('ReconciliationLoop'),
      });
    }

    this.jobService = new JobService(this.manager, this.store, this.scheduler, this.distributor, this.reconciliation);
    this.jobService.onJobCompleted((job) => {
      this.logger.info(
        `Completion record: ${JSON.stringify({ id: job.id, name: job.name, state: job.state, attempts: job.attempts })}`
      );
    });

    this.server = new McpServer({
      name: config.server.name,
      version: config.server.version,
    });
    this.registerTools(this.server);
  }

  private registerTools(server: McpServer) {
    registerJobManagementTools(server, this.jobService);
    registerNodeTools(server, this.jobService);
    registerHealthCheckTool(server, this.jobService, this.dbConnection);
  }

  /**
   * Start scheduling and discovery, then connect the stdio transport
   */
  async start(options: StartOptions = {}): Promise<void> {
    if (this.started) return;
    this.started = true;

    if (this.dbConnection) {
      this.logger.debug(`Database at ${this.dbConnection.getDatabasePath()}`);
    }
    const stats = await this.store.getStatistics();
    this.logger.info(`Job store holds ${stats.total} job(s)`);

    this.scheduler.start();

    if (this.resolver && this.reconciliation) {
      const reconciliation = this.reconciliation;
      this.reconciliationRun = reconciliation
        .start()
        .catch((error: unknown) => this.logger.error(`Reconciliation loop failed: ${errorMessage(error)}`));

      const service = this.config.discovery.serviceName;
      await this.resolver.watch(service, (name, event) => {
        reconciliation.enqueue(name, event);
      });
      this.logger.info(`Discovery watching ${this.resolver.keyPrefix(service)}`);
    }

    if (options.stdio ?? true) {
      const transport = new StdioServerTransport();

      process.stdin.on('error', (error) => {
        this.logger.warn(`stdin error (non-fatal): ${error.message}`);
      });
      process.stdin.on('end', () => {
        this.logger.warn('stdin ended - client may have disconnected');
      });

      await this.server.connect(transport);
      this.logger.info(`${this.config.server.name} running on stdio`);
    }
  }

  async shutdown(): Promise<void> {
    this.logger.info('Shutting down...');

    if (this.resolver) {
      await this.resolver.close();
    }
    if (this.reconciliation) {
      await this.reconciliation.stop();
      await this.reconciliationRun;
    }
    await this.manager.close();
    this.coordinationClient?.close();
    await this.server.close();
    await this.store.close();
    this.dbConnection?.close();

    this.logger.info('Shutdown complete');
  }

  getJobService(): JobService {
    return this.jobService;
  }

  getScheduler(): JobScheduler {
    return this.scheduler;
  }

  getDistributor(): IJobDistributor {
    return this.distributor;
  }
}
