import { createRoutingTable } from '../src/core/routing/RoutingTable.js';
import { ConnectionPool, createLoadBalancer } from '../src/infrastructure/balancer/ConnectionPool.js';
import {
  CustomLoadBalancer,
  LeastConnectionsLoadBalancer,
} from '../src/infrastructure/balancer/LeastConnectionsLoadBalancer.js';
import { ConnectionSlot, LoadBalancer } from '../src/infrastructure/balancer/LoadBalancer.js';
import { createLoggingInterceptor } from '../src/infrastructure/balancer/LoggingInterceptor.js';
import { RoundRobinLoadBalancer } from '../src/infrastructure/balancer/RoundRobinLoadBalancer.js';
import { Logger, silentLogger } from '../src/utils/logger.js';

function take(balancer: LoadBalancer): ConnectionSlot {
  const slot = balancer.acquire();
  if (!slot) throw new Error('no slot');
  return slot;
}

describe('RoundRobinLoadBalancer', () => {
  test('should rotate over the connections evenly', () => {
    const balancer = new RoundRobinLoadBalancer('ocr', { slotsPerConnection: 10, logger: silentLogger });
    balancer.update(['a:1', 'b:1', 'c:1']);

    const picked: string[] = [];
    for (let i = 0; i < 6; i++) {
      const slot = take(balancer);
      picked.push(slot.connection.address);
      balancer.release(slot);
    }

    expect(picked).toEqual(['a:1', 'b:1', 'c:1', 'a:1', 'b:1', 'c:1']);
  });

  test('should skip full connections and return null when all are full', () => {
    const balancer = new RoundRobinLoadBalancer('ocr', { logger: silentLogger });
    balancer.update(['a:1', 'b:1']);

    const first = take(balancer);
    const second = take(balancer);

    expect([first.connection.address, second.connection.address]).toEqual(['a:1', 'b:1']);
    expect(balancer.acquire()).toBeNull();
    expect(balancer.availableSlots()).toBe(0);

    balancer.release(first);
    expect(take(balancer).connection.address).toBe('a:1');
  });

  test('should retire a failed connection until the next update re-admits it', () => {
    const balancer = new RoundRobinLoadBalancer('ocr', { slotsPerConnection: 5, logger: silentLogger });
    balancer.update(['a:1', 'b:1']);

    balancer.fail(take(balancer), new Error('unreachable'));

    expect(balancer.usableCount()).toBe(1);
    expect(take(balancer).connection.address).toBe('b:1');
    expect(take(balancer).connection.address).toBe('b:1');

    balancer.update(['a:1', 'b:1']);
    expect(balancer.usableCount()).toBe(2);
  });

  test('should keep in-flight counts of connections that survive an update', () => {
    const balancer = new RoundRobinLoadBalancer('ocr', { slotsPerConnection: 2, logger: silentLogger });
    balancer.update(['a:1']);
    const slot = take(balancer);

    balancer.update(['a:1', 'b:1']);

    expect(balancer.getConnections()).toEqual([
      { address: 'a:1', executor: 'ocr', inFlight: 1, retired: false },
      { address: 'b:1', executor: 'ocr', inFlight: 0, retired: false },
    ]);
    balancer.release(slot);
    expect(balancer.availableSlots()).toBe(4);
  });

  test('should ignore a second release of the same slot', () => {
    const balancer = new RoundRobinLoadBalancer('ocr', { slotsPerConnection: 2, logger: silentLogger });
    balancer.update(['a:1']);
    const first = take(balancer);
    take(balancer);

    balancer.release(first);
    balancer.release(first);

    expect(balancer.availableSlots()).toBe(1);
  });

  test('should collapse duplicate addresses', () => {
    const balancer = new RoundRobinLoadBalancer('ocr', { logger: silentLogger });
    balancer.update(['a:1', 'a:1']);
    expect(balancer.connectionCount()).toBe(1);
  });
});

describe('LeastConnectionsLoadBalancer', () => {
  test('should pick the connection with the fewest calls in flight', () => {
    const balancer = new LeastConnectionsLoadBalancer('ocr', { slotsPerConnection: 3, logger: silentLogger });
    balancer.update(['a:1', 'b:1']);

    const a1 = take(balancer);
    const b1 = take(balancer);
    const a2 = take(balancer);
    balancer.release(b1);

    expect([a1, b1, a2].map((slot) => slot.connection.address)).toEqual(['a:1', 'b:1', 'a:1']);
    expect(take(balancer).connection.address).toBe('b:1');
  });
});

describe('CustomLoadBalancer', () => {
  test('should use the index returned by the selector among usable candidates', () => {
    const seen: string[][] = [];
    const balancer = new CustomLoadBalancer(
      'ocr',
      (candidates) => {
        seen.push(candidates.map((c) => c.address));
        return candidates.length - 1;
      },
      { logger: silentLogger }
    );
    balancer.update(['a:1', 'b:1', 'c:1']);

    expect(take(balancer).connection.address).toBe('c:1');
    expect(take(balancer).connection.address).toBe('b:1');
    expect(seen).toEqual([
      ['a:1', 'b:1', 'c:1'],
      ['a:1', 'b:1'],
    ]);
  });
});

describe('interceptors', () => {
  test('should report acquire, release, failure and updates', () => {
    const events: string[] = [];
    const balancer = new RoundRobinLoadBalancer('ocr', {
      slotsPerConnection: 2,
      logger: silentLogger,
      interceptors: [
        {
          onConnectionAcquired: (c) => events.push(`acquired ${c.address} ${c.inFlight}`),
          onConnectionReleased: (c) => events.push(`released ${c.address} ${c.inFlight}`),
          onConnectionFailed: (c, error) => events.push(`failed ${c.address} ${String(error)}`),
          onConnectionsUpdated: (cs) => events.push(`updated ${cs.length}`),
        },
      ],
    });

    balancer.update(['a:1']);
    balancer.release(take(balancer));
    balancer.fail(take(balancer), 'down');

    expect(events).toEqual([
      'updated 1',
      'acquired a:1 1',
      'released a:1 0',
      'acquired a:1 1',
      'failed a:1 down',
    ]);
  });

  test('should log and continue when an interceptor throws', () => {
    const errors: string[] = [];
    const logger: Logger = { ...silentLogger, error: (message) => errors.push(message) };
    const balancer = new RoundRobinLoadBalancer('ocr', { logger });
    balancer.addInterceptor({
      onConnectionAcquired: () => {
        throw new Error('hook bug');
      },
    });
    balancer.update(['a:1']);

    expect(balancer.acquire()).not.toBeNull();
    expect(errors).toEqual(['Interceptor failed on acquired for ocr:']);
  });

  test('should log connection changes through the logging interceptor', () => {
    const infos: string[] = [];
    const logger: Logger = { ...silentLogger, info: (message) => infos.push(message) };
    const balancer = new RoundRobinLoadBalancer('ocr', {
      logger: silentLogger,
      interceptors: [createLoggingInterceptor(logger)],
    });

    balancer.update(['a:1', 'b:1']);
    balancer.update([]);

    expect(infos).toEqual(['Connections updated: a:1, b:1', 'Connections updated: none']);
  });
});

describe('ConnectionPool', () => {
  const table = (version: number, routes: Array<[string, string]>) =>
    createRoutingTable(
      routes.map(([executor, address]) => ({ executor, address, gateway: 'gw:9000', endpoints: ['/'] })),
      version
    );

  test('should create one balancer per executor from the routing table', () => {
    const pool = new ConnectionPool({ logger: silentLogger });
    pool.applyRoutingTable(
      table(1, [
        ['ocr', 'a:1'],
        ['ocr', 'b:1'],
        ['ner', 'c:1'],
      ])
    );

    expect(pool.executors().sort()).toEqual(['ner', 'ocr']);
    expect(pool.connectionCount()).toBe(3);
    expect(pool.availableSlots('ocr')).toBe(2);
    expect(pool.hasCapacity('ner')).toBe(true);
    expect(pool.hasCapacity('missing')).toBe(false);
    expect(pool.acquire('missing')).toBeNull();
    expect(pool.getRoutingTable().version).toBe(1);
  });

  test('should spread acquisitions across executors when none is named', () => {
    const pool = new ConnectionPool({ slotsPerConnection: 5, logger: silentLogger });
    pool.applyRoutingTable(
      table(1, [
        ['ocr', 'a:1'],
        ['ner', 'c:1'],
      ])
    );

    const executors: string[] = [];
    for (let i = 0; i < 4; i++) {
      const slot = pool.acquire();
      if (!slot) throw new Error('no slot');
      executors.push(slot.connection.executor);
    }

    expect(executors).toEqual(['ocr', 'ner', 'ocr', 'ner']);
  });

  test('should reuse the balancer of a surviving executor', () => {
    const pool = new ConnectionPool({ slotsPerConnection: 2, logger: silentLogger });
    pool.applyRoutingTable(table(1, [['ocr', 'a:1']]));
    const before = pool.getBalancer('ocr');
    const slot = pool.acquire('ocr');

    pool.applyRoutingTable(table(2, [['ocr', 'a:1'], ['ocr', 'b:1']]));

    expect(pool.getBalancer('ocr')).toBe(before);
    expect(pool.availableSlots('ocr')).toBe(3);
    if (slot) pool.release(slot);
    expect(pool.availableSlots('ocr')).toBe(4);
  });

  test('should drop executors missing from a new table', () => {
    const pool = new ConnectionPool({ logger: silentLogger });
    pool.applyRoutingTable(table(1, [['ocr', 'a:1'], ['ner', 'c:1']]));

    pool.applyRoutingTable(table(2, [['ocr', 'a:1']]));

    expect(pool.executors()).toEqual(['ocr']);
    expect(pool.getBalancer('ner')).toBeUndefined();
  });

  test('should build the requested strategy', () => {
    expect(createLoadBalancer('round-robin', 'ocr')).toBeInstanceOf(RoundRobinLoadBalancer);
    expect(createLoadBalancer('least-connections', 'ocr')).toBeInstanceOf(LeastConnectionsLoadBalancer);
    expect(createLoadBalancer({ selector: () => 0 }, 'ocr')).toBeInstanceOf(CustomLoadBalancer);
  });
});
