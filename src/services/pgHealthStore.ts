import { QueryResultRow } from "pg";
import {
  DailyMetric,
  DailyMetricInput,
  Meal,
  NewMeal,
  NewWorkout,
  Workout,
} from "../domain/types";
import { errorMessage, StorageError } from "../utils/errors";
import { DateFilter, HealthStore, MealFilter } from "./healthStore";

/** The slice of `pg.Pool` the store needs; each call checks out and releases a client. */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: QueryResultRow[] }>;
}

const MEAL_COLUMNS = "id, timestamp, description, kcal, protein_g, carbs_g, fat_g";
const METRIC_COLUMNS =
  "id, date, steps, sleep_hours, deep_sleep_minutes, min_heart_rate, max_heart_rate, body_weight";
const WORKOUT_COLUMNS = "id, date, sport_type, duration_minutes, kcal_burned";

function toMeal(row: QueryResultRow): Meal {
  return {
    id: Number(row.id),
    timestamp: String(row.timestamp),
    description: String(row.description),
    kcal: Number(row.kcal) || 0,
    proteinG: Number(row.protein_g) || 0,
    carbsG: Number(row.carbs_g) || 0,
    fatG: Number(row.fat_g) || 0,
  };
}

function toDailyMetric(row: QueryResultRow): DailyMetric {
  return {
    id: Number(row.id),
    date: String(row.date),
    steps: Number(row.steps) || 0,
    sleepHours: Number(row.sleep_hours) || 0,
    deepSleepMinutes: Number(row.deep_sleep_minutes) || 0,
    minHeartRate: Number(row.min_heart_rate) || 0,
    maxHeartRate: Number(row.max_heart_rate) || 0,
    bodyWeight: Number(row.body_weight) || 0,
  };
}

function toWorkout(row: QueryResultRow): Workout {
  return {
    id: Number(row.id),
    date: String(row.date),
    sportType: String(row.sport_type),
    durationMinutes: Number(row.duration_minutes) || 0,
    kcalBurned: Number(row.kcal_burned) || 0,
  };
}

export class PgHealthStore implements HealthStore {
  constructor(private readonly db: Queryable) {}

  private async run(label: string, text: string, values: unknown[] = []): Promise<QueryResultRow[]> {
    try {
      const result = await this.db.query(text, values);
      return result.rows;
    } catch (err) {
      console.error(`[db] ${label} failed:`, err);
      throw new StorageError(`Database error during ${label}: ${errorMessage(err)}`);
    }
  }

  private async one(label: string, text: string, values: unknown[]): Promise<QueryResultRow> {
    const rows = await this.run(label, text, values);
    const row = rows[0];
    if (!row) {
      throw new StorageError(`Database error during ${label}: no row returned`);
    }
    return row;
  }

  async insertMeal(meal: NewMeal): Promise<Meal> {
    const row = await this.one(
      "insert meal",
      `INSERT INTO meals (timestamp, description, kcal, protein_g, carbs_g, fat_g)
       VALUES ($1, $2, $3, $4, $5, $6)
       RETURNING ${MEAL_COLUMNS}`,
      [meal.timestamp, meal.description, meal.kcal, meal.proteinG, meal.carbsG, meal.fatG]
    );
    return toMeal(row);
  }

  async listMeals(filter: MealFilter = {}): Promise<Meal[]> {
    const where: string[] = [];
    const values: unknown[] = [];

    if (filter.from !== undefined) {
      values.push(filter.from);
      where.push(`timestamp >= $${values.length}`);
    }
    if (filter.date !== undefined) {
      values.push(filter.date);
      where.push(`LEFT(timestamp, 10) = $${values.length}`);
    }

    const rows = await this.run(
      "list meals",
      `SELECT ${MEAL_COLUMNS} FROM meals
       ${where.length ? `WHERE ${where.join(" AND ")}` : ""}
       ORDER BY timestamp ASC, id ASC`,
      values
    );
    return rows.map(toMeal);
  }

  async upsertDailyMetric(metric: DailyMetricInput): Promise<DailyMetric> {
    // Full replace: every column is overwritten from the incoming row.
    const row = await this.one(
      "upsert daily metric",
      `INSERT INTO daily_metrics
         (date, steps, sleep_hours, deep_sleep_minutes, min_heart_rate, max_heart_rate, body_weight)
       VALUES ($1, $2, $3, $4, $5, $6, $7)
       ON CONFLICT (date) DO UPDATE SET
         steps = EXCLUDED.steps,
         sleep_hours = EXCLUDED.sleep_hours,
         deep_sleep_minutes = EXCLUDED.deep_sleep_minutes,
         min_heart_rate = EXCLUDED.min_heart_rate,
         max_heart_rate = EXCLUDED.max_heart_rate,
         body_weight = EXCLUDED.body_weight
       RETURNING ${METRIC_COLUMNS}`,
      [
        metric.date,
        metric.steps,
        metric.sleepHours,
        metric.deepSleepMinutes,
        metric.minHeartRate,
        metric.maxHeartRate,
        metric.bodyWeight,
      ]
    );
    return toDailyMetric(row);
  }

  async listDailyMetrics(filter: DateFilter = {}): Promise<DailyMetric[]> {
    const rows =
      filter.from === undefined
        ? await this.run(
            "list daily metrics",
            `SELECT ${METRIC_COLUMNS} FROM daily_metrics ORDER BY date ASC`
          )
        : await this.run(
            "list daily metrics",
            `SELECT ${METRIC_COLUMNS} FROM daily_metrics WHERE date >= $1 ORDER BY date ASC`,
            [filter.from]
          );
    return rows.map(toDailyMetric);
  }

  async insertWorkout(workout: NewWorkout): Promise<Workout> {
    const row = await this.one(
      "insert workout",
      `INSERT INTO workouts (date, sport_type, duration_minutes, kcal_burned)
       VALUES ($1, $2, $3, $4)
       RETURNING ${WORKOUT_COLUMNS}`,
      [workout.date, workout.sportType, workout.durationMinutes, workout.kcalBurned]
    );
    return toWorkout(row);
  }

  async listWorkouts(filter: DateFilter = {}): Promise<Workout[]> {
    const rows =
      filter.from === undefined
        ? await this.run(
            "list workouts",
            `SELECT ${WORKOUT_COLUMNS} FROM workouts ORDER BY date ASC, id ASC`
          )
        : await this.run(
            "list workouts",
            `SELECT ${WORKOUT_COLUMNS} FROM workouts WHERE date >= $1 ORDER BY date ASC, id ASC`,
            [filter.from]
          );
    return rows.map(toWorkout);
  }
}
