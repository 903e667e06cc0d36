/**
 * Callbacks fired by a prefix watch on the coordination service
 */
export interface WatchHandlers {
  onPut(key: string, value: string): void;
  onDelete(key: string): void;
  onDisconnected(error?: Error): void;
  onReconnected(): void;
  onError(error: Error): void;
}

export interface WatchHandle {
  cancel(): Promise<void>;
}

/**
 * Minimal key/value store with a watch primitive (etcd in production)
 */
export interface ICoordinationClient {
  getPrefix(prefix: string): Promise<Record<string, string>>;

  watchPrefix(prefix: string, handlers: WatchHandlers): Promise<WatchHandle>;

  close(): void;
}
