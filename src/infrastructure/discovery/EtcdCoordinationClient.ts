import { Etcd3 } from 'etcd3';
import { DiscoveryUnavailableError, errorMessage } from '../../core/errors.js';
import { ICoordinationClient, WatchHandle, WatchHandlers } from '../../core/interfaces/ICoordinationClient.js';
import { createLogger, Logger } from '../../utils/logger.js';

/**
 * etcd v3 backing for service discovery
 */
export class EtcdCoordinationClient implements ICoordinationClient {
  private client: Etcd3;

  constructor(
    hosts: string[],
    dialTimeoutMs: number = 5000,
    private logger: Logger = createLogger('EtcdCoordinationClient')
  ) {
    this.client = new Etcd3({ hosts, dialTimeout: dialTimeoutMs });
  }

  async getPrefix(prefix: string): Promise<Record<string, string>> {
    try {
      return await this.client.getAll().prefix(prefix).strings();
    } catch (error) {
      throw new DiscoveryUnavailableError(`Failed to read ${prefix}: ${errorMessage(error)}`, { cause: error });
    }
  }

  async watchPrefix(prefix: string, handlers: WatchHandlers): Promise<WatchHandle> {
    const watcher = await this.client
      .watch()
      .prefix(prefix)
      .create()
      .catch((error: unknown) => {
        throw new DiscoveryUnavailableError(`Failed to watch ${prefix}: ${errorMessage(error)}`, {
          cause: error,
        });
      });

    // create() resolves on the first connect, so any later connect follows a disconnect
    let disconnected = false;
    watcher.on('put', (kv) => handlers.onPut(kv.key.toString(), kv.value.toString()));
    watcher.on('delete', (kv) => handlers.onDelete(kv.key.toString()));
    watcher.on('disconnected', (error) => {
      disconnected = true;
      handlers.onDisconnected(error);
    });
    watcher.on('connected', () => {
      if (disconnected) {
        disconnected = false;
        handlers.onReconnected();
      }
    });
    watcher.on('error', (error) => handlers.onError(error));

    this.logger.debug(`Watching ${prefix}`);
    return { cancel: () => watcher.cancel() };
  }

  close(): void {
    this.client.close();
  }
}
