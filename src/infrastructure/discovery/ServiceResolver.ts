import { z } from 'zod';
import { DiscoveryEvent, ServiceAddress } from '../../core/entities/DiscoveredNode.js';
import { errorMessage } from '../../core/errors.js';
import { ICoordinationClient, WatchHandle } from '../../core/interfaces/ICoordinationClient.js';
import { DiscoveryListener, IServiceResolver } from '../../core/interfaces/IServiceResolver.js';
import { createLogger, Logger } from '../../utils/logger.js';

// Metadata may arrive as an object or as a JSON-encoded string
const ServiceAddressSchema = z.object({
  controlAddress: z.string().min(1),
  metadata: z.preprocess(
    (value) => (typeof value === 'string' ? JSON.parse(value) : value),
    z.record(z.array(z.string())).default({})
  ),
});

export function decodeServiceAddress(value: string): ServiceAddress | null {
  try {
    const parsed = ServiceAddressSchema.safeParse(JSON.parse(value));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

export function encodeServiceAddress(address: ServiceAddress): string {
  return JSON.stringify(address);
}

type PendingChange = { type: 'put'; key: string; raw: string } | { type: 'delete'; key: string };

interface ServiceWatch {
  handle: WatchHandle;
  known: Map<string, ServiceAddress>;
  listeners: DiscoveryListener[];
  // Changes seen while the initial snapshot is read; null once it has been applied
  pending: PendingChange[] | null;
}

/**
 * Watches `/<namespace>/<service>/<controlAddress>` keys and reports put/delete events
 */
export class ServiceResolver implements IServiceResolver {
  private watches: Map<string, ServiceWatch> = new Map();

  constructor(
    private client: ICoordinationClient,
    private namespace: string = 'gateway',
    private logger: Logger = createLogger('ServiceResolver')
  ) {}

  keyPrefix(service: string): string {
    return `/${this.namespace}/${service}/`;
  }

  async resolve(service: string): Promise<Map<string, ServiceAddress>> {
    const entries = await this.client.getPrefix(this.keyPrefix(service));
    const resolved = new Map<string, ServiceAddress>();
    for (const [key, value] of Object.entries(entries)) {
      const address = decodeServiceAddress(value);
      if (address) {
        resolved.set(key, address);
      } else {
        this.logger.warn(`Skipping undecodable value at ${key}`);
      }
    }
    return resolved;
  }

  /**
   * Emit a put for every current announcement, then follow changes.
   * The watch opens before the snapshot is read, so nothing written in between is lost.
   */
  async watch(service: string, listener: DiscoveryListener): Promise<void> {
    const existing = this.watches.get(service);
    if (existing) {
      existing.listeners.push(listener);
      for (const [key, value] of existing.known) {
        this.emit(service, existing, { type: 'put', key, gateway: value.controlAddress, value }, [listener]);
      }
      return;
    }

    const prefix = this.keyPrefix(service);
    const state: ServiceWatch = {
      // Placeholder handle until the watch is established
      handle: { cancel: async () => undefined },
      known: new Map(),
      listeners: [listener],
      pending: [],
    };
    this.watches.set(service, state);

    try {
      state.handle = await this.client.watchPrefix(prefix, {
        onPut: (key, raw) => {
          if (state.pending) {
            state.pending.push({ type: 'put', key, raw });
          } else {
            this.applyPut(service, state, key, raw);
          }
        },
        onDelete: (key) => {
          if (state.pending) {
            state.pending.push({ type: 'delete', key });
          } else {
            this.applyDelete(service, state, key);
          }
        },
        onDisconnected: (error) => {
          this.logger.warn(`Watch on ${prefix} disconnected${error ? `: ${error.message}` : ''}`);
        },
        onReconnected: () => {
          // The initial snapshot is still to come and covers the gap
          if (state.pending) return;
          this.logger.info(`Watch on ${prefix} reconnected, resynchronizing`);
          this.resyncWatch(service, state).catch((error: unknown) =>
            this.logger.error(`Resync of ${prefix} failed: ${errorMessage(error)}`)
          );
        },
        onError: (error) => this.logger.error(`Watch on ${prefix} failed: ${error.message}`),
      });
    } catch (error) {
      this.watches.delete(service);
      throw error;
    }

    let snapshot: Map<string, ServiceAddress>;
    try {
      snapshot = await this.resolve(service);
    } catch (error) {
      this.watches.delete(service);
      await state.handle.cancel();
      throw error;
    }

    for (const [key, value] of snapshot) {
      state.known.set(key, value);
      this.emit(service, state, { type: 'put', key, gateway: value.controlAddress, value });
    }

    // Replay in order; a put already in the snapshot is re-emitted, which consumers treat as a no-op
    const pending = state.pending ?? [];
    state.pending = null;
    for (const change of pending) {
      if (change.type === 'put') {
        this.applyPut(service, state, change.key, change.raw);
      } else {
        this.applyDelete(service, state, change.key);
      }
    }

    this.logger.info(`Watching ${prefix} (${snapshot.size} announcement(s))`);
  }

  private applyPut(service: string, state: ServiceWatch, key: string, raw: string): void {
    const value = decodeServiceAddress(raw);
    if (!value) {
      this.logger.warn(`Skipping undecodable value at ${key}`);
      return;
    }
    state.known.set(key, value);
    this.emit(service, state, { type: 'put', key, gateway: value.controlAddress, value });
  }

  private applyDelete(service: string, state: ServiceWatch, key: string): void {
    const previous = state.known.get(key);
    state.known.delete(key);
    this.emit(service, state, {
      type: 'delete',
      key,
      gateway: previous?.controlAddress ?? key.slice(this.keyPrefix(service).length),
      value: previous,
    });
  }

  /**
   * Re-read the key set after a disconnect: put for every current key,
   * delete for keys that vanished meanwhile
   */
  async resync(service: string): Promise<void> {
    const state = this.watches.get(service);
    if (state) {
      await this.resyncWatch(service, state);
    }
  }

  private async resyncWatch(service: string, state: ServiceWatch): Promise<void> {
    const current = await this.resolve(service);
    for (const [key, previous] of state.known) {
      if (!current.has(key)) {
        state.known.delete(key);
        this.emit(service, state, { type: 'delete', key, gateway: previous.controlAddress, value: previous });
      }
    }
    for (const [key, value] of current) {
      state.known.set(key, value);
      this.emit(service, state, { type: 'put', key, gateway: value.controlAddress, value });
    }
  }

  private emit(
    service: string,
    state: ServiceWatch,
    event: DiscoveryEvent,
    listeners: DiscoveryListener[] = state.listeners
  ): void {
    for (const listener of listeners) {
      try {
        listener(service, event);
      } catch (error) {
        this.logger.error(`Discovery listener failed for ${event.key}: ${errorMessage(error)}`);
      }
    }
  }

  async close(): Promise<void> {
    const watches = Array.from(this.watches.values());
    this.watches.clear();
    await Promise.all(watches.map((watch) => watch.handle.cancel()));
  }
}
