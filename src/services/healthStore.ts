import {
  DailyMetric,
  DailyMetricInput,
  Meal,
  NewMeal,
  NewWorkout,
  Workout,
} from "../domain/types";

export interface MealFilter {
  /** Inclusive lower bound on the timestamp, `YYYY-MM-DD` or full timestamp. */
  from?: string;
  /** Calendar day of the timestamp. */
  date?: string;
}

export interface DateFilter {
  /** Inclusive `YYYY-MM-DD` lower bound. */
  from?: string;
}

/**
 * Persistence seam for the three record tables. Every method is a single
 * statement; nothing spans calls.
 */
export interface HealthStore {
  insertMeal(meal: NewMeal): Promise<Meal>;
  /** Ordered by timestamp, oldest first. */
  listMeals(filter?: MealFilter): Promise<Meal[]>;

  /** Inserts, or replaces every column of the record for `metric.date` keeping its id. */
  upsertDailyMetric(metric: DailyMetricInput): Promise<DailyMetric>;
  /** Ordered by date, oldest first. */
  listDailyMetrics(filter?: DateFilter): Promise<DailyMetric[]>;

  insertWorkout(workout: NewWorkout): Promise<Workout>;
  listWorkouts(filter?: DateFilter): Promise<Workout[]>;
}
