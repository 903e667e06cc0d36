import { DiscoveredNode } from '../entities/DiscoveredNode.js';
import { createRoutingTable, RoutingTable } from './RoutingTable.js';

/**
 * Strip a scheme such as grpc:// so that the same node always maps to one host:port
 */
export function normalizeAddress(address: string): string {
  if (!address.includes('://')) {
    return address;
  }
  const parsed = new URL(address);
  return parsed.host || address;
}

/**
 * Discovered nodes grouped by the gateway that announced them
 */
export class Topology {
  private byGateway: Map<string, DiscoveredNode[]> = new Map();
  private version = 0;

  /**
   * Replace the node set announced by a gateway. Repeating the same put is a no-op.
   */
  putGateway(gateway: string, nodes: DiscoveredNode[]): boolean {
    const deduped = new Map<string, DiscoveredNode>();
    for (const node of nodes) {
      const normalized = { ...node, address: normalizeAddress(node.address), gateway };
      deduped.set(`${normalized.executor}|${normalized.address}`, normalized);
    }
    const next = Array.from(deduped.values());

    const previous = this.byGateway.get(gateway);
    if (previous && sameNodes(previous, next)) {
      return false;
    }

    this.byGateway.set(gateway, next);
    this.version++;
    return true;
  }

  /**
   * Drop every node tagged with the gateway
   */
  removeGateway(gateway: string): number {
    const removed = this.byGateway.get(gateway)?.length ?? 0;
    if (this.byGateway.delete(gateway)) {
      this.version++;
    }
    return removed;
  }

  hasGateway(gateway: string): boolean {
    return this.byGateway.has(gateway);
  }

  gateways(): string[] {
    return Array.from(this.byGateway.keys());
  }

  nodes(): DiscoveredNode[] {
    const all: DiscoveredNode[] = [];
    for (const nodes of this.byGateway.values()) {
      all.push(...nodes.map((node) => ({ ...node, endpoints: [...node.endpoints] })));
    }
    return all;
  }

  toRoutingTable(): RoutingTable {
    return createRoutingTable(this.nodes(), this.version);
  }

  getVersion(): number {
    return this.version;
  }
}

function sameNodes(a: DiscoveredNode[], b: DiscoveredNode[]): boolean {
  if (a.length !== b.length) return false;
  const key = (node: DiscoveredNode) =>
    `${node.executor}|${node.address}|${[...node.endpoints].sort().join(',')}`;
  const left = a.map(key).sort();
  const right = b.map(key).sort();
  return left.every((value, index) => value === right[index]);
}
