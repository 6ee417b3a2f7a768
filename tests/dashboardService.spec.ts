import { DailyMetric, Meal } from '../src/domain/types';
import {
  averageSleep,
  buildDashboard,
  dailyCalories,
  latestBodyWeight,
  weeklySeries,
} from '../src/services/dashboardService';
import { InMemoryHealthStore } from '../src/services/inMemoryStore';

let nextId = 1;

function metric(date: string, fields: Partial<Omit<DailyMetric, 'id' | 'date'>> = {}): DailyMetric {
  return {
    id: nextId++,
    date,
    steps: 0,
    sleepHours: 0,
    deepSleepMinutes: 0,
    minHeartRate: 0,
    maxHeartRate: 0,
    bodyWeight: 0,
    ...fields,
  };
}

function meal(timestamp: string, kcal: number): Meal {
  return { id: nextId++, timestamp, description: 'test meal', kcal, proteinG: 0, carbsG: 0, fatG: 0 };
}

describe('latestBodyWeight', () => {
  test('skips zero weights and returns the last measured one', () => {
    const metrics = [
      metric('2024-01-01'),
      metric('2024-01-02'),
      metric('2024-01-03', { bodyWeight: 62.3 }),
      metric('2024-01-04'),
    ];
    expect(latestBodyWeight(metrics)).toBe(62.3);
  });

  test('is null when no weight was ever measured', () => {
    expect(latestBodyWeight([metric('2024-01-01'), metric('2024-01-02')])).toBeNull();
    expect(latestBodyWeight([])).toBeNull();
  });
});

describe('averageSleep', () => {
  test('is zero over zero days for an empty window', () => {
    expect(averageSleep([], '2024-01-01')).toEqual({ hours: 0, days: 0 });
  });

  test('only counts metrics on or after the window start', () => {
    const metrics = [
      metric('2023-12-31', { sleepHours: 2 }),
      metric('2024-01-01', { sleepHours: 6 }),
      metric('2024-01-02', { sleepHours: 8 }),
    ];
    expect(averageSleep(metrics, '2024-01-01')).toEqual({ hours: 7, days: 2 });
  });

  test('zero-sleep days still count towards the average', () => {
    const metrics = [metric('2024-01-01', { sleepHours: 9 }), metric('2024-01-02')];
    expect(averageSleep(metrics, '2024-01-01')).toEqual({ hours: 4.5, days: 2 });
  });
});

describe('dailyCalories', () => {
  test('sums kcal per calendar day', () => {
    const totals = dailyCalories([
      meal('2024-01-01 08:00:00', 400),
      meal('2024-01-01 13:00:00', 650),
      meal('2024-01-02 19:30:00', 800),
    ]);
    expect([...totals.entries()]).toEqual([
      ['2024-01-01', 1050],
      ['2024-01-02', 800],
    ]);
  });
});

describe('weeklySeries', () => {
  test('joins metrics and calories on date, zero-filling either side', () => {
    const series = weeklySeries(
      [metric('2024-01-02', { steps: 5000, sleepHours: 7 })],
      new Map([['2024-01-01', 1200]])
    );

    expect(series).toEqual([
      { date: '2024-01-01', kcal: 1200, steps: 0, sleepHours: 0 },
      { date: '2024-01-02', kcal: 0, steps: 5000, sleepHours: 7 },
    ]);
  });

  test('keeps the last seven distinct dates in ascending order', () => {
    const metrics = ['05', '06', '07', '08', '09'].map((d) => metric(`2024-01-${d}`, { steps: 1 }));
    const kcal = new Map([
      ['2024-01-01', 100],
      ['2024-01-02', 100],
      ['2024-01-03', 100],
      ['2024-01-09', 300],
    ]);

    const series = weeklySeries(metrics, kcal);

    expect(series.map((p) => p.date)).toEqual([
      '2024-01-02',
      '2024-01-03',
      '2024-01-05',
      '2024-01-06',
      '2024-01-07',
      '2024-01-08',
      '2024-01-09',
    ]);
    expect(series[0]).toEqual({ date: '2024-01-02', kcal: 100, steps: 0, sleepHours: 0 });
    expect(series[6]).toEqual({ date: '2024-01-09', kcal: 300, steps: 1, sleepHours: 0 });
  });

  test('drops older dates beyond the requested length', () => {
    const metrics = Array.from({ length: 10 }, (_, i) => metric(`2024-02-${String(i + 1).padStart(2, '0')}`));
    expect(weeklySeries(metrics, new Map()).map((p) => p.date)).toEqual([
      '2024-02-04',
      '2024-02-05',
      '2024-02-06',
      '2024-02-07',
      '2024-02-08',
      '2024-02-09',
      '2024-02-10',
    ]);
  });
});

describe('buildDashboard', () => {
  test('aggregates the last 30 days from the store', async () => {
    const store = new InMemoryHealthStore();
    const base = { deepSleepMinutes: 0, minHeartRate: 0, maxHeartRate: 0 };

    await store.upsertDailyMetric({ ...base, date: '2024-05-01', steps: 100, sleepHours: 1, bodyWeight: 90 });
    await store.upsertDailyMetric({ ...base, date: '2024-05-20', steps: 6000, sleepHours: 7, bodyWeight: 71 });
    await store.upsertDailyMetric({ ...base, date: '2024-06-10', steps: 8000, sleepHours: 8, bodyWeight: 0 });
    await store.insertMeal({
      timestamp: '2024-06-10 12:00:00',
      description: 'pasta',
      kcal: 700,
      proteinG: 20,
      carbsG: 90,
      fatG: 15,
    });
    await store.insertMeal({
      timestamp: '2024-04-01 12:00:00',
      description: 'old meal',
      kcal: 999,
      proteinG: 0,
      carbsG: 0,
      fatG: 0,
    });

    const summary = await buildDashboard(store, new Date('2024-06-15T10:00:00Z'));

    expect(summary).toEqual({
      currentWeightKg: 71,
      averageSleepHours30d: 7.5,
      sleepDaysAveraged: 2,
      weeklySeries: [
        { date: '2024-05-20', kcal: 0, steps: 6000, sleepHours: 7 },
        { date: '2024-06-10', kcal: 700, steps: 8000, sleepHours: 8 },
      ],
    });
  });

  test('an empty store gives an empty dashboard', async () => {
    const summary = await buildDashboard(new InMemoryHealthStore(), new Date('2024-06-15T10:00:00Z'));

    expect(summary).toEqual({
      currentWeightKg: null,
      averageSleepHours30d: 0,
      sleepDaysAveraged: 0,
      weeklySeries: [],
    });
  });
});
