import * as dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';
import { ConfigError } from './core/errors.js';
import { Logger } from './utils/logger.js';

// Load environment variables from .env file
dotenv.config();

const booleanField = z.preprocess((value) => {
  if (typeof value !== 'string') return value;
  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes'].includes(normalized)) return true;
  if (['false', '0', 'no'].includes(normalized)) return false;
  return value;
}, z.boolean());

const ConfigSchema = z.object({
  server: z.object({
    name: z.string().min(1, 'Server name must not be empty'),
    version: z.string().min(1, 'Version must not be empty'),
    debug: booleanField,
  }),
  store: z.object({
    backend: z.enum(['memory', 'sqlite']),
    path: z.string().min(1, 'Store path must not be empty'),
    maxPayloadBytes: z.coerce.number().int().min(1),
    deduplicate: booleanField,
  }),
  scheduler: z.object({
    sweepIntervalMs: z.coerce.number().int().min(10),
    backoffMultiplier: z.coerce.number().min(1),
    maxRetryDelaySeconds: z.coerce.number().min(0),
    noCapacityDelaySeconds: z.coerce.number().min(0),
    purge: booleanField,
  }),
  discovery: z.object({
    enabled: booleanField,
    etcdHosts: z.array(z.string().min(1)).min(1, 'At least 1 etcd host is required'),
    namespace: z.string().min(1),
    serviceName: z.string().min(1),
    readinessAttempts: z.coerce.number().int().min(1),
    readinessDelayMs: z.coerce.number().int().min(0),
    maxEventErrors: z.coerce.number().int().min(1),
  }),
  balancer: z.object({
    type: z.enum(['round-robin', 'least-connections']),
    slotsPerConnection: z.coerce.number().int().min(1),
  }),
  worker: z.object({
    protoPath: z.string().min(1),
    rpcTimeoutMs: z.coerce.number().int().min(1),
  }),
  gateway: z.object({
    dryRun: booleanField,
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Parse command line arguments
 * Usage: node dist/src/index.js --store-backend memory --etcd-hosts http://127.0.0.1:2379 --debug
 */
export function parseArgs(argv: string[]): Record<string, string | boolean> {
  const args: Record<string, string | boolean> = {};

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];

    if (arg.startsWith('--')) {
      const key = arg.slice(2);

      // Check if next arg is a value or another flag
      if (i + 1 < argv.length && !argv[i + 1].startsWith('--')) {
        args[key] = argv[++i];
      } else {
        args[key] = true;
      }
    }
  }

  return args;
}

/**
 * Merge CLI flags over environment variables over defaults, then validate.
 * Throws ConfigError listing every issue.
 */
export function getConfig(
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env
): Config {
  const cliArgs = parseArgs(argv);

  const get = (cliKey: string, envKey: string, defaultValue: string | boolean | number) => {
    const cli = cliArgs[cliKey];
    if (cli !== undefined) return cli;
    return env[envKey] ?? defaultValue;
  };

  const getList = (cliKey: string, envKey: string, defaultValue: string[]): string[] => {
    const value = cliArgs[cliKey] ?? env[envKey];
    if (value === undefined || value === true || value === false) return defaultValue;
    return value
      .split(',')
      .map((s) => s.trim())
      .filter((s) => s.length > 0);
  };

  const rawConfig = {
    server: {
      name: get('server-name', 'SERVER_NAME', 'work-gateway'),
      version: get('server-version', 'SERVER_VERSION', '1.0.0'),
      debug: get('debug', 'DEBUG', false),
    },
    store: {
      backend: get('store-backend', 'STORE_BACKEND', 'sqlite'),
      path: get('store-path', 'STORE_PATH', 'data/gateway.db'),
      maxPayloadBytes: get('max-payload-bytes', 'MAX_PAYLOAD_BYTES', 1024 * 1024),
      deduplicate: get('deduplicate', 'DEDUPLICATE', false),
    },
    scheduler: {
      sweepIntervalMs: get('sweep-interval', 'SWEEP_INTERVAL_MS', 2000),
      backoffMultiplier: get('backoff-multiplier', 'BACKOFF_MULTIPLIER', 2),
      maxRetryDelaySeconds: get('max-retry-delay', 'MAX_RETRY_DELAY_SECONDS', 3600),
      noCapacityDelaySeconds: get('no-capacity-delay', 'NO_CAPACITY_DELAY_SECONDS', 0),
      purge: get('purge', 'PURGE_ENABLED', true),
    },
    discovery: {
      enabled: get('discovery', 'DISCOVERY_ENABLED', true),
      etcdHosts: getList('etcd-hosts', 'ETCD_HOSTS', ['http://127.0.0.1:2379']),
      namespace: get('namespace', 'DISCOVERY_NAMESPACE', 'gateway'),
      serviceName: get('service-name', 'DISCOVERY_SERVICE', 'gateway/service'),
      readinessAttempts: get('readiness-attempts', 'READINESS_ATTEMPTS', 10),
      readinessDelayMs: get('readiness-delay', 'READINESS_DELAY_MS', 1000),
      maxEventErrors: get('max-event-errors', 'MAX_EVENT_ERRORS', 5),
    },
    balancer: {
      type: get('load-balancer', 'LOAD_BALANCER', 'round-robin'),
      slotsPerConnection: get('slots-per-connection', 'SLOTS_PER_CONNECTION', 1),
    },
    worker: {
      protoPath: path.resolve(String(get('proto-path', 'WORKER_PROTO_PATH', 'proto/worker.proto'))),
      rpcTimeoutMs: get('rpc-timeout', 'RPC_TIMEOUT_MS', 5000),
    },
    gateway: {
      dryRun: get('dry-run', 'DRY_RUN', false),
    },
  };

  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    const issues = parsed.error.errors.map((err) => `${err.path.join('.') || 'root'}: ${err.message}`);
    throw new ConfigError(`Configuration validation failed: ${issues.join('; ')}`, issues);
  }
  return parsed.data;
}

/**
 * Print the effective configuration
 */
export function printConfigInfo(config: Config, logger: Logger): void {
  logger.info(`${config.server.name} v${config.server.version}${config.server.debug ? ' (debug)' : ''}`);
  logger.info(
    `Store: ${config.store.backend}${config.store.backend === 'sqlite' ? ` at ${config.store.path}` : ''}` +
      ` | dedupe: ${config.store.deduplicate ? 'on' : 'off'}`
  );
  logger.info(
    `Scheduler: sweep ${config.scheduler.sweepIntervalMs}ms | backoff x${config.scheduler.backoffMultiplier}` +
      ` capped at ${config.scheduler.maxRetryDelaySeconds}s`
  );
  if (config.discovery.enabled) {
    logger.info(
      `Discovery: ${config.discovery.etcdHosts.join(', ')} /${config.discovery.namespace}/${config.discovery.serviceName}/`
    );
  } else {
    logger.info('Discovery: disabled');
  }
  logger.info(`Balancer: ${config.balancer.type}, ${config.balancer.slotsPerConnection} slot(s) per connection`);
  if (config.gateway.dryRun) {
    logger.warn('Dry run: jobs complete without calling workers');
  }
}
