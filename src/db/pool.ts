import { Pool } from "pg";

export function createPool(connectionString: string): Pool {
  const pool = new Pool({
    connectionString,
    ssl: connectionString.includes("sslmode=require")
      ? { rejectUnauthorized: false }
      : undefined,
  });

  pool.on("error", (err) => {
    console.error("[db] Idle client error:", err.message);
  });

  return pool;
}
