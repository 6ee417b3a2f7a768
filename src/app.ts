import express, { Express, Request, Response } from "express";
import cors from "cors";
import morgan from "morgan";

import { errorHandler, notFoundHandler } from "./middleware/errorHandler";
import { AuthConfig, authMiddleware, SessionRevocations } from "./middleware/auth";
import { MealAnalyzer } from "./services/aiNutritionService";
import { ColumnMapping } from "./services/csvColumnMapper";
import { HealthStore } from "./services/healthStore";
import { PendingMealStore } from "./services/pendingMeals";

import { createAuthRouter } from "./routes/auth";
import { createDashboardRouter } from "./routes/dashboard";
import { createImportRouter } from "./routes/import";
import { createMealsRouter } from "./routes/meals";
import { createMetricsRouter } from "./routes/metrics";
import { createWorkoutsRouter } from "./routes/workouts";

const JSON_BODY_LIMIT = 10 * 1024 * 1024;

export interface AppDependencies {
  store: HealthStore;
  analyzer: MealAnalyzer;
  pendingMeals: PendingMealStore;
  auth: AuthConfig | null;
  allowedOrigins?: string[];
  uploadMaxBytes: number;
  columnMapping?: ColumnMapping;
  requestLogging?: boolean;
}

export function createApp(deps: AppDependencies): Express {
  const app = express();
  const revokedSessions = new SessionRevocations();

  // ======================================================================
  //                     CORE MIDDLEWARE (CORS, LOGGING, BODY)
  // ======================================================================

  const allowlist = new Set<string>(deps.allowedOrigins ?? []);

  app.use(
    cors({
      origin: (origin, cb) => {
        // Allow server-to-server/no-origin requests
        if (!origin) return cb(null, true);
        if (allowlist.has(origin)) return cb(null, true);
        return cb(new Error(`CORS blocked: ${origin}`));
      },
      methods: ["GET", "POST", "OPTIONS", "DELETE"],
      allowedHeaders: ["Content-Type", "Authorization", "Accept"],
    })
  );

  if (deps.requestLogging !== false) {
    app.use(morgan("dev"));
  }

  // Room for a csv_content body at the upload limit after JSON escaping
  app.use(express.json({ limit: Math.max(JSON_BODY_LIMIT, deps.uploadMaxBytes * 2) }));
  app.use(express.urlencoded({ extended: true }));

  // ======================================================================
  //                       HEALTH CHECK + ROUTES
  // ======================================================================

  app.get("/health", (_req: Request, res: Response) => {
    res.status(200).send("ok");
  });

  app.use("/api/v1/auth", createAuthRouter(deps.auth, deps.pendingMeals, revokedSessions));

  // Everything below requires a valid session
  const requireAuth = authMiddleware(deps.auth, revokedSessions);

  app.use(
    "/api/v1/import",
    requireAuth,
    createImportRouter(deps.store, {
      uploadMaxBytes: deps.uploadMaxBytes,
      columnMapping: deps.columnMapping,
    })
  );
  app.use("/api/v1/metrics", requireAuth, createMetricsRouter(deps.store));
  app.use(
    "/api/v1/meals",
    requireAuth,
    createMealsRouter(deps.store, deps.analyzer, deps.pendingMeals)
  );
  app.use("/api/v1/dashboard", requireAuth, createDashboardRouter(deps.store));
  app.use("/api/v1/workouts", requireAuth, createWorkoutsRouter(deps.store));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
