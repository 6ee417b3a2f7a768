import { DailyMetric, DailyMetricInput } from '../src/domain/types';
import { mapCsv } from '../src/services/csvColumnMapper';
import { InMemoryHealthStore } from '../src/services/inMemoryStore';
import { importDailyMetrics } from '../src/services/metricImporter';
import { StorageError } from '../src/utils/errors';

class FailingStore extends InMemoryHealthStore {
  private calls = 0;

  constructor(private readonly failOnCall: number) {
    super();
  }

  async upsertDailyMetric(metric: DailyMetricInput): Promise<DailyMetric> {
    this.calls++;
    if (this.calls === this.failOnCall) {
      throw new Error('connection reset');
    }
    return super.upsertDailyMetric(metric);
  }
}

async function importCsv(store: InMemoryHealthStore, csv: string) {
  const mapped = mapCsv(csv);
  return importDailyMetrics(store, mapped.records, mapped.mapping);
}

describe('importDailyMetrics', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('rows that normalize to the same date collapse to the later one', async () => {
    const store = new InMemoryHealthStore();
    const summary = await importCsv(
      store,
      'date,steps,weight\n2024-01-01,1000,70\n2024-01-01 08:00:00,2500,71.5\n'
    );

    expect(summary).toEqual({ processed: 2, skipped: 0, rejected: [] });

    const metrics = await store.listDailyMetrics();
    expect(metrics).toHaveLength(1);
    expect(metrics[0]).toMatchObject({ date: '2024-01-01', steps: 2500, bodyWeight: 71.5 });
  });

  test('a re-import replaces the whole row instead of merging fields', async () => {
    const store = new InMemoryHealthStore();
    await importCsv(store, 'date,steps,weight\n2024-01-02,4000,70.2\n');
    const [first] = await store.listDailyMetrics();
    await importCsv(store, 'date,steps\n2024-01-02,5000\n');

    const [metric] = await store.listDailyMetrics();
    expect(metric.id).toBe(first.id);
    expect(metric.steps).toBe(5000);
    expect(metric.bodyWeight).toBe(0);
  });

  test('sleep in minutes is stored as hours', async () => {
    const store = new InMemoryHealthStore();
    await importCsv(store, 'Time,totalSleep\n2024-01-03 23:10:00,480\n2024-01-04 22:50:00,6.5\n');

    const metrics = await store.listDailyMetrics();
    expect(metrics.map((m) => [m.date, m.sleepHours])).toEqual([
      ['2024-01-03', 8],
      ['2024-01-04', 6.5],
    ]);
  });

  test('counts rows without a date and reports rows with a bad one', async () => {
    const store = new InMemoryHealthStore();
    const summary = await importCsv(
      store,
      'date,steps\n2024-01-05,10\n,20\nsometime soon,30\n2024-01-06,40\n'
    );

    expect(summary).toEqual({
      processed: 2,
      skipped: 1,
      rejected: [{ row: 3, value: 'sometime soon', reason: 'Unrecognized date "sometime soon"' }],
    });
    expect((await store.listDailyMetrics()).map((m) => m.date)).toEqual(['2024-01-05', '2024-01-06']);
  });

  test('a store failure keeps earlier rows and reports how many were saved', async () => {
    const store = new FailingStore(2);

    let caught: unknown;
    try {
      await importCsv(store, 'date,steps\n2024-01-07,1\n2024-01-08,2\n2024-01-09,3\n');
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(StorageError);
    if (caught instanceof StorageError) {
      expect(caught.meta).toEqual({ processed: 1, failedRow: 2 });
      expect(caught.message).toBe(
        'Failed to save row 2; 1 row(s) were saved before the error: connection reset'
      );
    }
    expect((await store.listDailyMetrics()).map((m) => m.date)).toEqual(['2024-01-07']);
  });
});
