import { EMPTY_ROUTING_TABLE, RoutingTable } from '../../core/routing/RoutingTable.js';
import { createLogger, Logger } from '../../utils/logger.js';
import { ConnectionSlot, LoadBalancer, LoadBalancerInterceptor, LoadBalancerOptions } from './LoadBalancer.js';
import { ConnectionSelector, CustomLoadBalancer, LeastConnectionsLoadBalancer } from './LeastConnectionsLoadBalancer.js';
import { RoundRobinLoadBalancer } from './RoundRobinLoadBalancer.js';

export type LoadBalancerType = 'round-robin' | 'least-connections';

export type LoadBalancerStrategy = LoadBalancerType | { selector: ConnectionSelector };

export function createLoadBalancer(
  strategy: LoadBalancerStrategy,
  executor: string,
  options: LoadBalancerOptions = {}
): LoadBalancer {
  if (typeof strategy === 'object') {
    return new CustomLoadBalancer(executor, strategy.selector, options);
  }
  switch (strategy) {
    case 'least-connections':
      return new LeastConnectionsLoadBalancer(executor, options);
    case 'round-robin':
      return new RoundRobinLoadBalancer(executor, options);
  }
}

export interface ConnectionPoolOptions {
  strategy?: LoadBalancerStrategy;
  slotsPerConnection?: number;
  interceptors?: LoadBalancerInterceptor[];
  logger?: Logger;
}

/**
 * One load balancer per executor, rebuilt from each routing table
 */
export class ConnectionPool {
  private balancers: ReadonlyMap<string, LoadBalancer> = new Map();
  private table: RoutingTable = EMPTY_ROUTING_TABLE;
  private executorCursor = 0;
  private logger: Logger;

  constructor(private options: ConnectionPoolOptions = {}) {
    this.logger = options.logger ?? createLogger('ConnectionPool');
  }

  /**
   * Build the executor -> balancer map for the table and swap it in.
   * Balancers of surviving executors are reused so in-flight counts carry over.
   */
  applyRoutingTable(table: RoutingTable): void {
    const next = new Map<string, LoadBalancer>();
    for (const [executor, addresses] of table.routes) {
      const balancer =
        this.balancers.get(executor) ??
        createLoadBalancer(this.options.strategy ?? 'round-robin', executor, {
          slotsPerConnection: this.options.slotsPerConnection,
          interceptors: this.options.interceptors,
          logger: this.logger,
        });
      balancer.update(addresses);
      next.set(executor, balancer);
    }

    for (const [executor, balancer] of this.balancers) {
      if (!next.has(executor)) {
        balancer.update([]);
      }
    }

    this.balancers = next;
    this.table = table;
    this.logger.debug(
      `Applied routing table v${table.version}: ${next.size} executor(s), ${this.connectionCount()} connection(s)`
    );
  }

  /**
   * Acquire a slot for the executor, or for any executor when none is given
   */
  acquire(executor?: string): ConnectionSlot | null {
    if (executor !== undefined) {
      return this.balancers.get(executor)?.acquire() ?? null;
    }

    const balancers = Array.from(this.balancers.values());
    for (let step = 0; step < balancers.length; step++) {
      const index = (this.executorCursor + step) % balancers.length;
      const slot = balancers[index].acquire();
      if (slot) {
        this.executorCursor = (index + 1) % balancers.length;
        return slot;
      }
    }
    return null;
  }

  release(slot: ConnectionSlot): void {
    slot.balancer.release(slot);
  }

  fail(slot: ConnectionSlot, error: unknown): void {
    slot.balancer.fail(slot, error);
  }

  availableSlots(executor?: string): number {
    if (executor !== undefined) {
      return this.balancers.get(executor)?.availableSlots() ?? 0;
    }
    let total = 0;
    for (const balancer of this.balancers.values()) {
      total += balancer.availableSlots();
    }
    return total;
  }

  hasCapacity(executor?: string): boolean {
    return this.availableSlots(executor) > 0;
  }

  connectionCount(): number {
    let total = 0;
    for (const balancer of this.balancers.values()) {
      total += balancer.connectionCount();
    }
    return total;
  }

  getBalancer(executor: string): LoadBalancer | undefined {
    return this.balancers.get(executor);
  }

  executors(): string[] {
    return Array.from(this.balancers.keys());
  }

  getRoutingTable(): RoutingTable {
    return this.table;
  }
}
