import { Router } from "express";
import { asyncHandler } from "../middleware/asyncHandler";
import { sendSuccess } from "../middleware/responseHelper";
import { HealthStore } from "../services/healthStore";
import { fromQuerySchema } from "./validation";

export function createMetricsRouter(store: HealthStore): Router {
  const router = Router();

  // GET /api/v1/metrics?from=YYYY-MM-DD
  router.get(
    "/",
    asyncHandler(async (req, res) => {
      const { from } = fromQuerySchema.parse(req.query);
      return sendSuccess(res, await store.listDailyMetrics({ from }));
    })
  );

  return router;
}
