import { Router } from "express";
import { z } from "zod";
import { asyncHandler } from "../middleware/asyncHandler";
import { sendSuccess } from "../middleware/responseHelper";
import { HealthStore } from "../services/healthStore";
import { todayDateOnly } from "../utils/date";
import { dateOnlySchema, fromQuerySchema } from "./validation";

const createWorkoutSchema = z.object({
  date: dateOnlySchema.optional(), // default today
  sportType: z.string().trim().min(1).max(100),
  durationMinutes: z.number().int().nonnegative(),
  kcalBurned: z.number().nonnegative().default(0),
});

export function createWorkoutsRouter(store: HealthStore): Router {
  const router = Router();

  // POST /api/v1/workouts
  router.post(
    "/",
    asyncHandler(async (req, res) => {
      const parsed = createWorkoutSchema.parse(req.body);
      const workout = await store.insertWorkout({
        date: parsed.date ?? todayDateOnly(),
        sportType: parsed.sportType,
        durationMinutes: parsed.durationMinutes,
        kcalBurned: parsed.kcalBurned,
      });
      return sendSuccess(res, workout, 201);
    })
  );

  // GET /api/v1/workouts?from=YYYY-MM-DD
  router.get(
    "/",
    asyncHandler(async (req, res) => {
      const { from } = fromQuerySchema.parse(req.query);
      return sendSuccess(res, await store.listWorkouts({ from }));
    })
  );

  return router;
}
