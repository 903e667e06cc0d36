import { createLogger, Logger } from '../../utils/logger.js';

/**
 * A live connection to one discovered node
 */
export interface Connection {
  readonly address: string;
  readonly executor: string;
  inFlight: number;
  retired: boolean;
}

/**
 * Pooled handle to a connection, owned by the caller until released or failed
 */
export interface ConnectionSlot {
  readonly id: number;
  readonly connection: Readonly<Connection>;
  readonly balancer: LoadBalancer;
  readonly acquiredAt: Date;
}

/**
 * Lifecycle hooks. They run synchronously on the calling path and must return quickly.
 */
export interface LoadBalancerInterceptor {
  onConnectionAcquired?(connection: Readonly<Connection>): void;
  onConnectionReleased?(connection: Readonly<Connection>): void;
  onConnectionFailed?(connection: Readonly<Connection>, error: unknown): void;
  onConnectionsUpdated?(connections: ReadonlyArray<Readonly<Connection>>): void;
}

export interface LoadBalancerOptions {
  slotsPerConnection?: number;
  interceptors?: LoadBalancerInterceptor[];
  logger?: Logger;
}

let nextSlotId = 1;

/**
 * Selects one connection per call among the nodes serving an executor
 */
export abstract class LoadBalancer {
  protected connections: Connection[] = [];
  protected readonly slotsPerConnection: number;
  private interceptors: LoadBalancerInterceptor[];
  private activeSlots: Set<number> = new Set();
  protected logger: Logger;

  constructor(readonly executor: string, options: LoadBalancerOptions = {}) {
    this.slotsPerConnection = Math.max(1, options.slotsPerConnection ?? 1);
    this.interceptors = [...(options.interceptors ?? [])];
    this.logger = options.logger ?? createLogger('LoadBalancer');
  }

  /**
   * Pick the next connection, or undefined when none is usable
   */
  protected abstract select(): Connection | undefined;

  protected isUsable(connection: Connection): boolean {
    return !connection.retired && connection.inFlight < this.slotsPerConnection;
  }

  acquire(): ConnectionSlot | null {
    const connection = this.select();
    if (!connection) {
      return null;
    }

    connection.inFlight++;
    const slot: ConnectionSlot = {
      id: nextSlotId++,
      connection,
      balancer: this,
      acquiredAt: new Date(),
    };
    this.activeSlots.add(slot.id);
    this.notify('acquired', (interceptor) => interceptor.onConnectionAcquired?.(connection));
    return slot;
  }

  release(slot: ConnectionSlot): void {
    const connection = this.settle(slot);
    if (connection) {
      this.notify('released', (interceptor) => interceptor.onConnectionReleased?.(connection));
    }
  }

  /**
   * Retire the slot's connection from rotation until the next update re-admits it
   */
  fail(slot: ConnectionSlot, error: unknown): void {
    const connection = this.settle(slot);
    if (!connection) {
      return;
    }
    connection.retired = true;
    this.logger.warn(`Retired ${connection.address} (${this.executor}) after failure`);
    this.notify('failed', (interceptor) => interceptor.onConnectionFailed?.(connection, error));
  }

  private settle(slot: ConnectionSlot): Connection | undefined {
    if (slot.balancer !== this || !this.activeSlots.delete(slot.id)) {
      return undefined;
    }
    const connection = this.connections.find((c) => c.address === slot.connection.address);
    if (connection) {
      connection.inFlight = Math.max(0, connection.inFlight - 1);
    }
    return connection ?? { ...slot.connection };
  }

  /**
   * Replace the node set. Connections that remain keep their in-flight count;
   * retired ones are re-admitted.
   */
  update(addresses: readonly string[]): void {
    const existing = new Map(this.connections.map((c) => [c.address, c]));
    const next: Connection[] = [];
    for (const address of new Set(addresses)) {
      const current = existing.get(address);
      if (current) {
        current.retired = false;
        next.push(current);
      } else {
        next.push({ address, executor: this.executor, inFlight: 0, retired: false });
      }
    }
    this.connections = next;
    this.onUpdated();

    const snapshot = this.getConnections();
    this.notify('updated', (interceptor) => interceptor.onConnectionsUpdated?.(snapshot));
  }

  /**
   * Hook for subclasses that keep selection state
   */
  protected onUpdated(): void {}

  addInterceptor(interceptor: LoadBalancerInterceptor): void {
    this.interceptors.push(interceptor);
  }

  connectionCount(): number {
    return this.connections.length;
  }

  usableCount(): number {
    return this.connections.filter((c) => !c.retired).length;
  }

  availableSlots(): number {
    return this.connections
      .filter((c) => !c.retired)
      .reduce((sum, c) => sum + Math.max(0, this.slotsPerConnection - c.inFlight), 0);
  }

  getConnections(): ReadonlyArray<Readonly<Connection>> {
    return this.connections.map((c) => ({ ...c }));
  }

  private notify(event: string, call: (interceptor: LoadBalancerInterceptor) => void): void {
    for (const interceptor of this.interceptors) {
      try {
        call(interceptor);
      } catch (error) {
        this.logger.error(`Interceptor failed on ${event} for ${this.executor}:`, error);
      }
    }
  }
}
