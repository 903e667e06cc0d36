import { DiscoveredNode } from '../entities/DiscoveredNode.js';

/**
 * Immutable executor -> node-address graph.
 * Replaced by reference on every topology change; never mutated in place.
 */
export interface RoutingTable {
  readonly version: number;
  readonly routes: ReadonlyMap<string, readonly string[]>;
}

export const EMPTY_ROUTING_TABLE: RoutingTable = Object.freeze({
  version: 0,
  routes: new Map<string, readonly string[]>(),
});

export function createRoutingTable(nodes: DiscoveredNode[], version: number): RoutingTable {
  const routes = new Map<string, string[]>();
  for (const node of nodes) {
    const addresses = routes.get(node.executor) ?? [];
    if (!addresses.includes(node.address)) {
      addresses.push(node.address);
    }
    routes.set(node.executor, addresses);
  }

  const frozen = new Map<string, readonly string[]>();
  for (const [executor, addresses] of routes) {
    frozen.set(executor, Object.freeze(addresses));
  }
  return Object.freeze({ version, routes: frozen });
}

export function routeCount(table: RoutingTable): number {
  let count = 0;
  for (const addresses of table.routes.values()) {
    count += addresses.length;
  }
  return count;
}
