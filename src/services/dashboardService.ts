import { DailyMetric, DashboardSummary, Meal, WeeklySeriesPoint } from "../domain/types";
import { addDays, todayDateOnly } from "../utils/date";
import { HealthStore } from "./healthStore";

export const DASHBOARD_WINDOW_DAYS = 30;
export const SERIES_DAYS = 7;

/**
 * Last weight that was actually measured. Metrics must be in ascending date
 * order; zero means "not measured" and is skipped.
 */
export function latestBodyWeight(metrics: DailyMetric[]): number | null {
  for (let i = metrics.length - 1; i >= 0; i--) {
    if (metrics[i].bodyWeight > 0) return metrics[i].bodyWeight;
  }
  return null;
}

export interface SleepAverage {
  hours: number;
  days: number;
}

/** Mean sleep over metrics dated on or after `from`; 0 hours over 0 days when empty. */
export function averageSleep(metrics: DailyMetric[], from: string): SleepAverage {
  const inWindow = metrics.filter((m) => m.date >= from);
  if (inWindow.length === 0) return { hours: 0, days: 0 };

  const total = inWindow.reduce((sum, m) => sum + m.sleepHours, 0);
  return { hours: total / inWindow.length, days: inWindow.length };
}

export function dailyCalories(meals: Meal[]): Map<string, number> {
  const totals = new Map<string, number>();
  for (const meal of meals) {
    const date = meal.timestamp.slice(0, 10);
    totals.set(date, (totals.get(date) ?? 0) + meal.kcal);
  }
  return totals;
}

/**
 * Outer join of metrics and calorie totals on date, zero-filled, keeping the
 * most recent `days` distinct dates in ascending order.
 */
export function weeklySeries(
  metrics: DailyMetric[],
  kcalByDate: Map<string, number>,
  days: number = SERIES_DAYS
): WeeklySeriesPoint[] {
  const byDate = new Map<string, DailyMetric>();
  for (const m of metrics) byDate.set(m.date, m);

  const dates = [...new Set([...byDate.keys(), ...kcalByDate.keys()])].sort();

  return dates.slice(-days).map((date) => {
    const metric = byDate.get(date);
    return {
      date,
      kcal: kcalByDate.get(date) ?? 0,
      steps: metric?.steps ?? 0,
      sleepHours: metric?.sleepHours ?? 0,
    };
  });
}

export async function buildDashboard(
  store: HealthStore,
  now: Date = new Date()
): Promise<DashboardSummary> {
  const from = addDays(todayDateOnly(now), -DASHBOARD_WINDOW_DAYS);

  const [metrics, meals] = await Promise.all([
    store.listDailyMetrics({ from }),
    store.listMeals({ from }),
  ]);

  const sleep = averageSleep(metrics, from);

  return {
    currentWeightKg: latestBodyWeight(metrics),
    averageSleepHours30d: sleep.hours,
    sleepDaysAveraged: sleep.days,
    weeklySeries: weeklySeries(metrics, dailyCalories(meals)),
  };
}
