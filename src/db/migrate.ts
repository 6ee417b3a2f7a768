import "dotenv/config";
import { Pool } from "pg";
import { createPool } from "./pool";
import { HEALTH_SCHEMA } from "./schema";

export async function migrate(pool: Pool): Promise<void> {
  await pool.query(HEALTH_SCHEMA);
  console.log("[db] ✅ meals, daily_metrics, workouts tables ready");
}

if (require.main === module) {
  const url = process.env.DATABASE_URL;
  if (!url) {
    console.error("[db] DATABASE_URL missing, cannot run migration");
    process.exit(1);
  }

  const pool = createPool(url);
  migrate(pool)
    .then(() => pool.end())
    .catch(async (err: unknown) => {
      console.error("[db] Migration failed:", err);
      await pool.end();
      process.exit(1);
    });
}
