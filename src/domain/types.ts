export interface Meal {
  id: number;
  timestamp: string; // YYYY-MM-DD HH:MM:SS
  description: string;
  kcal: number;
  proteinG: number;
  carbsG: number;
  fatG: number;
}

export type NewMeal = Omit<Meal, "id">;

export interface DailyMetric {
  id: number;
  date: string; // YYYY-MM-DD
  steps: number;
  sleepHours: number;
  deepSleepMinutes: number;
  minHeartRate: number;
  maxHeartRate: number;
  bodyWeight: number;
}

export type DailyMetricInput = Omit<DailyMetric, "id">;

export interface Workout {
  id: number;
  date: string; // YYYY-MM-DD
  sportType: string;
  durationMinutes: number;
  kcalBurned: number;
}

export type NewWorkout = Omit<Workout, "id">;

/**
 * Nutrition estimate for a free-text meal description,
 * waiting for the user to confirm or drop it.
 */
export interface MealEstimate {
  description: string;
  kcal: number;
  proteinG: number;
  carbsG: number;
  fatG: number;
}

export interface PendingMeal {
  id: string;
  sourceText: string;
  estimate: MealEstimate;
  createdAt: string; // ISO
}

export interface WeeklySeriesPoint {
  date: string;
  kcal: number;
  steps: number;
  sleepHours: number;
}

export interface DashboardSummary {
  currentWeightKg: number | null;
  averageSleepHours30d: number;
  sleepDaysAveraged: number;
  weeklySeries: WeeklySeriesPoint[];
}
