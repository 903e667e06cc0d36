import { DiscoveryEvent, ServiceAddress } from '../entities/DiscoveredNode.js';

export type DiscoveryListener = (service: string, event: DiscoveryEvent) => void;

/**
 * Tracks announcements of gateway/worker nodes under a service name
 */
export interface IServiceResolver {
  /**
   * Current announcements keyed by full key path
   */
  resolve(service: string): Promise<Map<string, ServiceAddress>>;

  watch(service: string, listener: DiscoveryListener): Promise<void>;

  close(): Promise<void>;
}
