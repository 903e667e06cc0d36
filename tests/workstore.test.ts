import { WorkState } from '../src/core/entities/WorkInfo.js';
import { ConflictError, NotFoundError, StoreUnavailableError } from '../src/core/errors.js';
import { IWorkStore } from '../src/core/interfaces/IWorkStore.js';
import { DatabaseConnection } from '../src/infrastructure/database/DatabaseConnection.js';
import { SqliteWorkStore } from '../src/infrastructure/database/repositories/SqliteWorkStore.js';
import { InMemoryWorkStore } from '../src/infrastructure/memory/InMemoryWorkStore.js';
import { manualClock, workInfo } from './support/fakes.js';

interface StoreFixture {
  store: IWorkStore;
  close: () => void;
}

const backends: Array<[string, (clock: () => Date) => StoreFixture]> = [
  ['InMemoryWorkStore', (clock) => ({ store: new InMemoryWorkStore(clock), close: () => undefined })],
  [
    'SqliteWorkStore',
    (clock) => {
      const connection = new DatabaseConnection(':memory:');
      return { store: new SqliteWorkStore(connection.getDatabase(), clock), close: () => connection.close() };
    },
  ],
];

describe.each(backends)('%s', (_name, create) => {
  const t0 = new Date('2024-01-01T00:00:00.000Z');
  let clock: ReturnType<typeof manualClock>;
  let fixture: StoreFixture;
  let store: IWorkStore;

  beforeEach(() => {
    clock = manualClock(t0);
    fixture = create(clock.now);
    store = fixture.store;
  });

  afterEach(() => {
    fixture.close();
  });

  describe('put and get', () => {
    test('should mint a job id and store the record in CREATED', async () => {
      const jobId = await store.put(workInfo({ name: 'ocr', priority: 3, data: { page: 1 } }));
      const job = await store.get(jobId);

      expect(job).not.toBeNull();
      expect(job?.id).toBe(jobId);
      expect(job?.name).toBe('ocr');
      expect(job?.priority).toBe(3);
      expect(job?.data).toEqual({ page: 1 });
      expect(job?.state).toBe(WorkState.CREATED);
      expect(job?.retryCount).toBe(0);
      expect(job?.attempts).toBe(0);
      expect(job?.createdAt).toEqual(t0);
      expect(job?.startAfter).toEqual(t0);
    });

    test('should give two jobs with the same name distinct ids', async () => {
      const a = await store.put(workInfo({ name: 'same' }));
      const b = await store.put(workInfo({ name: 'same' }));
      expect(a).not.toBe(b);
    });

    test('should return null for an unknown id', async () => {
      expect(await store.get('missing')).toBeNull();
    });

    test('should keep routing fields', async () => {
      const jobId = await store.put(workInfo({ executor: 'ner', endpoint: '/extract' }));
      const job = await store.get(jobId);
      expect(job?.executor).toBe('ner');
      expect(job?.endpoint).toBe('/extract');
    });
  });

  describe('updateState', () => {
    test('should apply a legal transition with its patch', async () => {
      const jobId = await store.put(workInfo());
      const startedAt = new Date('2024-01-01T00:00:05.000Z');

      const result = await store.updateState(jobId, WorkState.CREATED, WorkState.ACTIVE, {
        attempts: 1,
        startedAt,
      });

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.job.state).toBe(WorkState.ACTIVE);
        expect(result.job.attempts).toBe(1);
        expect(result.job.startedAt).toEqual(startedAt);
      }
      expect((await store.get(jobId))?.state).toBe(WorkState.ACTIVE);
    });

    test('should report Conflict when the stored state differs from the expected one', async () => {
      const jobId = await store.put(workInfo());

      const result = await store.updateState(jobId, WorkState.ACTIVE, WorkState.COMPLETED);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(ConflictError);
        expect(result.error.message).toBe(`Job ${jobId} is created, expected active`);
      }
      expect((await store.get(jobId))?.state).toBe(WorkState.CREATED);
    });

    test('should report NotFound for an unknown id', async () => {
      const result = await store.updateState('missing', WorkState.CREATED, WorkState.ACTIVE);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(NotFoundError);
      }
    });

    test('should reject edges outside the lifecycle', async () => {
      const jobId = await store.put(workInfo());
      await store.updateState(jobId, WorkState.CREATED, WorkState.ACTIVE);
      await store.updateState(jobId, WorkState.ACTIVE, WorkState.COMPLETED);

      const result = await store.updateState(jobId, WorkState.COMPLETED, WorkState.CREATED);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(ConflictError);
      }
      expect((await store.get(jobId))?.state).toBe(WorkState.COMPLETED);
    });

    test('should let exactly one of two concurrent claims win', async () => {
      const jobId = await store.put(workInfo());

      const results = await Promise.all([
        store.updateState(jobId, WorkState.CREATED, WorkState.ACTIVE, { attempts: 1 }),
        store.updateState(jobId, WorkState.CREATED, WorkState.ACTIVE, { attempts: 1 }),
      ]);

      expect(results.filter((r) => r.ok)).toHaveLength(1);
      expect(results.filter((r) => !r.ok)).toHaveLength(1);
      expect((await store.get(jobId))?.attempts).toBe(1);
    });

    test('should clear startedAt and error when the patch sets them to undefined', async () => {
      const jobId = await store.put(workInfo());
      await store.updateState(jobId, WorkState.CREATED, WorkState.ACTIVE, { startedAt: t0 });
      await store.updateState(jobId, WorkState.ACTIVE, WorkState.FAILED, { error: 'boom' });

      const result = await store.updateState(jobId, WorkState.FAILED, WorkState.CREATED, {
        retryCount: 1,
        startedAt: undefined,
        error: undefined,
      });

      expect(result.ok).toBe(true);
      const job = await store.get(jobId);
      expect(job?.retryCount).toBe(1);
      expect(job?.startedAt).toBeUndefined();
      expect(job?.error).toBeUndefined();
    });

    test('should store the execution result', async () => {
      const jobId = await store.put(workInfo());
      await store.updateState(jobId, WorkState.CREATED, WorkState.ACTIVE);
      await store.updateState(jobId, WorkState.ACTIVE, WorkState.COMPLETED, { result: { pages: 2 } });

      expect((await store.get(jobId))?.result).toEqual({ pages: 2 });
    });
  });

  describe('listEligible', () => {
    test('should order by priority desc then startAfter asc and skip future jobs', async () => {
      const low = await store.put(workInfo({ name: 'low', priority: 1 }));
      const highLate = await store.put(
        workInfo({ name: 'high-late', priority: 5, startAfter: new Date('2024-01-01T00:00:10.000Z') })
      );
      const highEarly = await store.put(workInfo({ name: 'high-early', priority: 5 }));
      await store.put(workInfo({ name: 'future', priority: 9, startAfter: new Date('2024-01-02T00:00:00.000Z') }));

      const eligible = await store.listEligible(new Date('2024-01-01T00:01:00.000Z'));

      expect(eligible.map((job) => job.id)).toEqual([highEarly, highLate, low]);
    });

    test('should honour the limit and ignore jobs that are not CREATED', async () => {
      const first = await store.put(workInfo({ priority: 2 }));
      const second = await store.put(workInfo({ priority: 1 }));
      await store.updateState(first, WorkState.CREATED, WorkState.ACTIVE);
      await store.put(workInfo({ priority: 0 }));

      const eligible = await store.listEligible(t0, 1);

      expect(eligible.map((job) => job.id)).toEqual([second]);
    });
  });

  describe('listExpired', () => {
    test('should return ACTIVE jobs running past their deadline', async () => {
      const expiring = await store.put(workInfo({ expireInSeconds: 1 }));
      const unbounded = await store.put(workInfo({ expireInSeconds: 0 }));
      await store.updateState(expiring, WorkState.CREATED, WorkState.ACTIVE, { startedAt: t0 });
      await store.updateState(unbounded, WorkState.CREATED, WorkState.ACTIVE, { startedAt: t0 });

      expect(await store.listExpired(new Date(t0.getTime() + 999))).toEqual([]);
      const expired = await store.listExpired(new Date(t0.getTime() + 1000));
      expect(expired.map((job) => job.id)).toEqual([expiring]);
    });
  });

  describe('listRetryable', () => {
    test('should return FAILED jobs with retry budget left', async () => {
      const retryable = await store.put(workInfo({ retryLimit: 2 }));
      const exhausted = await store.put(workInfo({ retryLimit: 0 }));
      const running = await store.put(workInfo({ retryLimit: 2 }));
      for (const jobId of [retryable, exhausted, running]) {
        await store.updateState(jobId, WorkState.CREATED, WorkState.ACTIVE);
      }
      await store.updateState(retryable, WorkState.ACTIVE, WorkState.FAILED);
      await store.updateState(exhausted, WorkState.ACTIVE, WorkState.FAILED);

      const jobs = await store.listRetryable();

      expect(jobs.map((job) => job.id)).toEqual([retryable]);
    });
  });

  describe('purge', () => {
    test('should delete terminal records past keepUntil only', async () => {
      const keepUntil = new Date('2024-01-01T01:00:00.000Z');
      const done = await store.put(workInfo({ keepUntil }));
      const retrying = await store.put(workInfo({ keepUntil, retryLimit: 1 }));
      const pending = await store.put(workInfo({ keepUntil }));

      await store.updateState(done, WorkState.CREATED, WorkState.ACTIVE);
      await store.updateState(done, WorkState.ACTIVE, WorkState.COMPLETED);
      await store.updateState(retrying, WorkState.CREATED, WorkState.ACTIVE);
      await store.updateState(retrying, WorkState.ACTIVE, WorkState.FAILED);

      expect(await store.purge(new Date('2024-01-01T00:59:59.000Z'))).toBe(0);
      expect(await store.purge(keepUntil)).toBe(1);

      expect(await store.get(done)).toBeNull();
      expect((await store.get(retrying))?.state).toBe(WorkState.FAILED);
      expect((await store.get(pending))?.state).toBe(WorkState.CREATED);
    });
  });

  describe('list, dedupe and statistics', () => {
    test('should filter by state and count per state', async () => {
      const a = await store.put(workInfo());
      await store.put(workInfo());
      await store.updateState(a, WorkState.CREATED, WorkState.CANCELLED);

      expect((await store.list()).length).toBe(2);
      expect((await store.list(WorkState.CANCELLED)).map((job) => job.id)).toEqual([a]);

      const stats = await store.getStatistics();
      expect(stats.total).toBe(2);
      expect(stats[WorkState.CREATED]).toBe(1);
      expect(stats[WorkState.CANCELLED]).toBe(1);
      expect(stats[WorkState.ACTIVE]).toBe(0);
    });

    test('should find a record by dedupe key', async () => {
      const jobId = await store.put(workInfo(), { dedupeKey: 'key-1' });

      expect((await store.findByDedupeKey('key-1'))?.id).toBe(jobId);
      expect(await store.findByDedupeKey('key-2')).toBeNull();
    });
  });
});

describe('SqliteWorkStore failures', () => {
  test('should surface database errors as StoreUnavailableError', async () => {
    const connection = new DatabaseConnection(':memory:');
    const store = new SqliteWorkStore(connection.getDatabase());
    connection.close();

    await expect(store.get('any')).rejects.toBeInstanceOf(StoreUnavailableError);
  });
});
