import {
  DailyMetric,
  DailyMetricInput,
  Meal,
  NewMeal,
  NewWorkout,
  Workout,
} from "../domain/types";
import { DateFilter, HealthStore, MealFilter } from "./healthStore";

/**
 * Process-local store for STORAGE_DRIVER=memory and for tests.
 * Mirrors the SQL semantics of PgHealthStore: an upsert replaces every column
 * of the day's record and keeps its id.
 */
export class InMemoryHealthStore implements HealthStore {
  private meals: Meal[] = [];
  private metrics = new Map<string, DailyMetric>();
  private workouts: Workout[] = [];
  private nextId = 1;

  async insertMeal(meal: NewMeal): Promise<Meal> {
    const stored: Meal = { ...meal, id: this.nextId++ };
    this.meals.push(stored);
    return { ...stored };
  }

  async listMeals(filter: MealFilter = {}): Promise<Meal[]> {
    const { from, date } = filter;
    return this.meals
      .filter((m) => (from === undefined ? true : m.timestamp >= from))
      .filter((m) => (date === undefined ? true : m.timestamp.slice(0, 10) === date))
      .sort((a, b) => (a.timestamp < b.timestamp ? -1 : a.timestamp > b.timestamp ? 1 : a.id - b.id))
      .map((m) => ({ ...m }));
  }

  async upsertDailyMetric(metric: DailyMetricInput): Promise<DailyMetric> {
    const existing = this.metrics.get(metric.date);
    const stored: DailyMetric = { ...metric, id: existing ? existing.id : this.nextId++ };
    this.metrics.set(metric.date, stored);
    return { ...stored };
  }

  async listDailyMetrics(filter: DateFilter = {}): Promise<DailyMetric[]> {
    const { from } = filter;
    return [...this.metrics.values()]
      .filter((m) => (from === undefined ? true : m.date >= from))
      .sort((a, b) => (a.date < b.date ? -1 : 1))
      .map((m) => ({ ...m }));
  }

  async insertWorkout(workout: NewWorkout): Promise<Workout> {
    const stored: Workout = { ...workout, id: this.nextId++ };
    this.workouts.push(stored);
    return { ...stored };
  }

  async listWorkouts(filter: DateFilter = {}): Promise<Workout[]> {
    const { from } = filter;
    return this.workouts
      .filter((w) => (from === undefined ? true : w.date >= from))
      .sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : a.id - b.id))
      .map((w) => ({ ...w }));
  }
}
