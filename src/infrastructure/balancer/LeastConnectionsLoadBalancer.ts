import { Connection, LoadBalancer, LoadBalancerOptions } from './LoadBalancer.js';

/**
 * Picks the usable connection with the fewest in-flight calls; ties go to list order
 */
export class LeastConnectionsLoadBalancer extends LoadBalancer {
  protected select(): Connection | undefined {
    let best: Connection | undefined;
    for (const candidate of this.connections) {
      if (!this.isUsable(candidate)) continue;
      if (!best || candidate.inFlight < best.inFlight) {
        best = candidate;
      }
    }
    return best;
  }
}

export type ConnectionSelector = (candidates: ReadonlyArray<Readonly<Connection>>) => number;

/**
 * Delegates the choice to a caller-supplied selector returning an index into the usable candidates
 */
export class CustomLoadBalancer extends LoadBalancer {
  constructor(executor: string, private selector: ConnectionSelector, options: LoadBalancerOptions = {}) {
    super(executor, options);
  }

  protected select(): Connection | undefined {
    const candidates = this.connections.filter((c) => this.isUsable(c));
    if (candidates.length === 0) {
      return undefined;
    }
    const index = this.selector(candidates.map((c) => ({ ...c })));
    return candidates[index];
  }
}
