import { Router } from "express";
import { asyncHandler } from "../middleware/asyncHandler";
import { sendSuccess } from "../middleware/responseHelper";
import { buildDashboard } from "../services/dashboardService";
import { HealthStore } from "../services/healthStore";

export function createDashboardRouter(store: HealthStore): Router {
  const router = Router();

  /**
   * GET /api/v1/dashboard
   * Current weight (null when never measured), 30-day sleep average and the
   * 7-day calories / steps series.
   */
  router.get(
    "/",
    asyncHandler(async (_req, res) => {
      return sendSuccess(res, await buildDashboard(store));
    })
  );

  return router;
}
