// Tables are created idempotently at start-up; there is no migration history.

export const HEALTH_SCHEMA = `
-- Meals confirmed after AI analysis (never updated or deleted)
CREATE TABLE IF NOT EXISTS meals (
  id SERIAL PRIMARY KEY,
  timestamp TEXT NOT NULL,
  description TEXT NOT NULL,
  kcal REAL NOT NULL DEFAULT 0,
  protein_g REAL NOT NULL DEFAULT 0,
  carbs_g REAL NOT NULL DEFAULT 0,
  fat_g REAL NOT NULL DEFAULT 0
);

-- One row per calendar day, replaced on re-import
CREATE TABLE IF NOT EXISTS daily_metrics (
  id SERIAL PRIMARY KEY,
  date TEXT NOT NULL UNIQUE,
  steps INTEGER NOT NULL DEFAULT 0,
  sleep_hours REAL NOT NULL DEFAULT 0,
  deep_sleep_minutes INTEGER NOT NULL DEFAULT 0,
  min_heart_rate INTEGER NOT NULL DEFAULT 0,
  max_heart_rate INTEGER NOT NULL DEFAULT 0,
  body_weight REAL NOT NULL DEFAULT 0
);

CREATE TABLE IF NOT EXISTS workouts (
  id SERIAL PRIMARY KEY,
  date TEXT NOT NULL,
  sport_type TEXT NOT NULL,
  duration_minutes INTEGER NOT NULL DEFAULT 0,
  kcal_burned REAL NOT NULL DEFAULT 0
);

CREATE INDEX IF NOT EXISTS idx_meals_timestamp ON meals(timestamp);
CREATE INDEX IF NOT EXISTS idx_workouts_date ON workouts(date);
`;
