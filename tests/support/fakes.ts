import { JobRecord, WorkInfo, WorkState } from '../../src/core/entities/WorkInfo.js';
import { ExecutionFailedError } from '../../src/core/errors.js';
import {
  DistributeOptions,
  IJobDistributor,
  RunHandle,
  RunOutcome,
} from '../../src/core/interfaces/IJobDistributor.js';
import { ICoordinationClient, WatchHandle, WatchHandlers } from '../../src/core/interfaces/ICoordinationClient.js';
import { IWorkerClient, ProcessRequest, ProcessResponse } from '../../src/core/interfaces/IWorkerClient.js';
import { EMPTY_ROUTING_TABLE, RoutingTable } from '../../src/core/routing/RoutingTable.js';

/**
 * Key/value store with prefix watches, standing in for etcd
 */
export class InProcessCoordinationClient implements ICoordinationClient {
  readonly data: Map<string, string> = new Map();
  private watchers: Array<{ prefix: string; handlers: WatchHandlers; active: boolean }> = [];
  private connected = true;
  failReads = false;
  closed = false;

  async getPrefix(prefix: string): Promise<Record<string, string>> {
    if (this.failReads) {
      throw new Error('coordination service unavailable');
    }
    const entries: Record<string, string> = {};
    for (const [key, value] of this.data) {
      if (key.startsWith(prefix)) entries[key] = value;
    }
    return entries;
  }

  async watchPrefix(prefix: string, handlers: WatchHandlers): Promise<WatchHandle> {
    const watcher = { prefix, handlers, active: true };
    this.watchers.push(watcher);
    return {
      cancel: async () => {
        watcher.active = false;
      },
    };
  }

  /**
   * Write a key; watchers only see it while connected
   */
  put(key: string, value: string): void {
    this.data.set(key, value);
    for (const watcher of this.live(key)) watcher.handlers.onPut(key, value);
  }

  delete(key: string): void {
    if (!this.data.delete(key)) return;
    for (const watcher of this.live(key)) watcher.handlers.onDelete(key);
  }

  disconnect(): void {
    this.connected = false;
    for (const watcher of this.watchers) {
      if (watcher.active) watcher.handlers.onDisconnected(new Error('connection lost'));
    }
  }

  reconnect(): void {
    this.connected = true;
    for (const watcher of this.watchers) {
      if (watcher.active) watcher.handlers.onReconnected();
    }
  }

  activeWatches(): number {
    return this.watchers.filter((w) => w.active).length;
  }

  private live(key: string) {
    return this.connected ? this.watchers.filter((w) => w.active && key.startsWith(w.prefix)) : [];
  }

  close(): void {
    this.closed = true;
  }
}

export type ProcessHandler = (
  address: string,
  request: ProcessRequest,
  signal?: AbortSignal
) => Promise<ProcessResponse>;

/**
 * Worker RPC double. Every node is ready and serves `/` unless told otherwise.
 */
export class FakeWorkerClient implements IWorkerClient {
  readonly calls: Array<{ address: string; request: ProcessRequest }> = [];
  readonly readinessProbes: string[] = [];
  notReady: Set<string> = new Set();
  endpoints: string[] = ['/'];
  discoverError: Error | null = null;
  closed = false;
  handler: ProcessHandler = async (_address, request) => ({ requestId: request.requestId, payload: { ok: true } });

  async isReady(address: string): Promise<boolean> {
    this.readinessProbes.push(address);
    return !this.notReady.has(address);
  }

  async discoverEndpoints(): Promise<string[]> {
    if (this.discoverError) {
      throw this.discoverError;
    }
    return [...this.endpoints];
  }

  process(address: string, request: ProcessRequest, signal?: AbortSignal): Promise<ProcessResponse> {
    this.calls.push({ address, request });
    return this.handler(address, request, signal);
  }

  close(): void {
    this.closed = true;
  }
}

/**
 * A node that never answers; rejects only when the call is aborted
 */
export const silentNode: ProcessHandler = (address, _request, signal) =>
  new Promise((_resolve, reject) => {
    signal?.addEventListener('abort', () => reject(new ExecutionFailedError('aborted', address)), {
      once: true,
    });
  });

export const failingNode: ProcessHandler = async (address) => {
  throw new ExecutionFailedError('executor crashed', address);
};

export interface ManualClock {
  now: () => Date;
  advance(ms: number): void;
  set(date: Date): void;
}

export function manualClock(start: Date = new Date('2024-01-01T00:00:00.000Z')): ManualClock {
  let current = start.getTime();
  return {
    now: () => new Date(current),
    advance: (ms: number) => {
      current += ms;
    },
    set: (date: Date) => {
      current = date.getTime();
    },
  };
}

export function workInfo(overrides: Partial<WorkInfo> = {}): WorkInfo {
  const startAfter = overrides.startAfter ?? new Date('2024-01-01T00:00:00.000Z');
  return {
    name: 'extract',
    priority: 0,
    data: { document: 'doc-1' },
    state: WorkState.CREATED,
    retryLimit: 0,
    retryDelay: 0,
    retryBackoff: false,
    startAfter,
    expireInSeconds: 0,
    keepUntil: new Date(startAfter.getTime() + 24 * 60 * 60 * 1000),
    onComplete: false,
    ...overrides,
  };
}

export function announcement(controlAddress: string, metadata: Record<string, string[]>): string {
  return JSON.stringify({ controlAddress, metadata });
}

export interface Submission {
  job: JobRecord;
  deadlineMs?: number;
  cancelReason?: string;
  settle(outcome: RunOutcome): void;
}

/**
 * Distributor whose runs finish only when the test settles them
 */
export class ControlledDistributor implements IJobDistributor {
  readonly submissions: Submission[] = [];
  capacity = true;
  routes: RoutingTable = EMPTY_ROUTING_TABLE;
  closed = false;

  submit(job: JobRecord, options: DistributeOptions = {}): RunHandle {
    let settle: (outcome: RunOutcome) => void = () => undefined;
    const result = new Promise<RunOutcome>((resolve) => {
      settle = resolve;
    });
    const submission: Submission = { job, deadlineMs: options.deadlineMs, settle };
    this.submissions.push(submission);
    return {
      jobId: job.id,
      result,
      cancel: (reason?: string) => {
        submission.cancelReason = reason ?? 'cancelled';
        settle({ status: 'failed', error: new ExecutionFailedError(submission.cancelReason) });
      },
    };
  }

  hasCapacity(): boolean {
    return this.capacity;
  }

  availableSlots(): number {
    return this.capacity ? 1 : 0;
  }

  updateRoutes(table: RoutingTable): void {
    this.routes = table;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
