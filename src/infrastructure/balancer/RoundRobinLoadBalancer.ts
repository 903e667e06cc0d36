import { Connection, LoadBalancer } from './LoadBalancer.js';

/**
 * Advances a cursor over the connection list and wraps, skipping unusable connections
 */
export class RoundRobinLoadBalancer extends LoadBalancer {
  private cursor = 0;

  protected select(): Connection | undefined {
    const count = this.connections.length;
    for (let step = 0; step < count; step++) {
      const index = (this.cursor + step) % count;
      const candidate = this.connections[index];
      if (this.isUsable(candidate)) {
        this.cursor = (index + 1) % count;
        return candidate;
      }
    }
    return undefined;
  }

  protected onUpdated(): void {
    if (this.connections.length === 0 || this.cursor >= this.connections.length) {
      this.cursor = 0;
    }
  }
}
