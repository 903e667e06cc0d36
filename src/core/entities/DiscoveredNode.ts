/**
 * A worker endpoint learned through the coordination service
 */
export interface DiscoveredNode {
  address: string; // host:port
  executor: string;
  gateway: string; // control address of the announcing gateway
  endpoints: string[];
}

/**
 * Value announced under a discovery key
 */
export interface ServiceAddress {
  controlAddress: string;
  metadata: Record<string, string[]>; // executor -> deployment addresses
}

export type DiscoveryEventType = 'put' | 'delete';

export interface DiscoveryEvent {
  type: DiscoveryEventType;
  key: string;
  gateway: string;
  value?: ServiceAddress;
}
