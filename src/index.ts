import "dotenv/config";

import { createApp } from "./app";
import { createPool } from "./db/pool";
import { migrate } from "./db/migrate";
import { AuthConfig } from "./middleware/auth";
import { Env, validateEnvironment } from "./middleware/validateEnv";
import { createOpenAiCompletion, MealAnalyzer } from "./services/aiNutritionService";
import { HealthStore } from "./services/healthStore";
import { InMemoryHealthStore } from "./services/inMemoryStore";
import { PendingMealStore } from "./services/pendingMeals";
import { PgHealthStore } from "./services/pgHealthStore";

function authConfigFrom(env: Env): AuthConfig | null {
  if (!env.AUTH_USERNAME || !env.AUTH_PASSWORD_HASH || !env.AUTH_TOKEN_SECRET) {
    return null;
  }
  return {
    username: env.AUTH_USERNAME,
    passwordHash: env.AUTH_PASSWORD_HASH,
    tokenSecret: env.AUTH_TOKEN_SECRET,
    tokenTtl: env.AUTH_TOKEN_TTL,
  };
}

async function createStore(env: Env): Promise<HealthStore> {
  if (env.STORAGE_DRIVER === "memory" || !env.DATABASE_URL) {
    return new InMemoryHealthStore();
  }

  const pool = createPool(env.DATABASE_URL);
  await migrate(pool);
  return new PgHealthStore(pool);
}

async function main(): Promise<void> {
  const env = validateEnvironment();
  const store = await createStore(env);

  const analyzer = new MealAnalyzer(
    env.OPENAI_API_KEY
      ? createOpenAiCompletion({
          apiKey: env.OPENAI_API_KEY,
          model: env.OPENAI_MODEL,
          timeoutMs: env.OPENAI_TIMEOUT_MS,
        })
      : null
  );

  const app = createApp({
    store,
    analyzer,
    pendingMeals: new PendingMealStore(env.PENDING_MEAL_TTL_MINUTES * 60 * 1000),
    auth: authConfigFrom(env),
    allowedOrigins: env.ALLOWED_ORIGINS?.split(",").map((s) => s.trim()),
    uploadMaxBytes: env.UPLOAD_MAX_BYTES,
  });

  app.listen(env.PORT, () => {
    console.log(`Health dashboard backend listening on port ${env.PORT} (${env.STORAGE_DRIVER} storage)`);
  });
}

main().catch((err: unknown) => {
  console.error("Failed to start server:", err);
  process.exit(1);
});
