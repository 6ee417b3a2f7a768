import { Router } from "express";
import { z } from "zod";
import { asyncHandler } from "../middleware/asyncHandler";
import { requireSession } from "../middleware/auth";
import { sendSuccess } from "../middleware/responseHelper";
import { MealAnalyzer } from "../services/aiNutritionService";
import { HealthStore } from "../services/healthStore";
import { PendingMealStore } from "../services/pendingMeals";
import { formatLocalTimestamp } from "../utils/date";
import { NotFoundError } from "../utils/errors";
import { dateOnlySchema } from "./validation";

const analyzeSchema = z.object({
  text: z.string().trim().min(1, "Describe the meal").max(2000),
});

const listQuerySchema = z.object({
  date: dateOnlySchema.optional(),
  from: dateOnlySchema.optional(),
});

export function createMealsRouter(
  store: HealthStore,
  analyzer: MealAnalyzer,
  pendingMeals: PendingMealStore
): Router {
  const router = Router();

  // POST /api/v1/meals/analyze  { text }
  // Estimate is held as the session's pending meal until confirmed.
  router.post(
    "/analyze",
    asyncHandler(async (req, res) => {
      const session = requireSession(req);
      const { text } = analyzeSchema.parse(req.body);

      const estimate = await analyzer.analyze(text);
      const pending = pendingMeals.put(session.sid, text, estimate);

      return sendSuccess(res, pending);
    })
  );

  // GET /api/v1/meals/pending
  router.get("/pending", (req, res) => {
    const pending = pendingMeals.get(requireSession(req).sid);
    if (!pending) {
      throw new NotFoundError("No meal is waiting for confirmation");
    }
    return sendSuccess(res, pending);
  });

  // DELETE /api/v1/meals/pending
  router.delete("/pending", (req, res) => {
    const cleared = pendingMeals.clear(requireSession(req).sid);
    return sendSuccess(res, { cleared });
  });

  // POST /api/v1/meals/confirm
  // Stores the pending estimate. On a storage error the pending meal stays
  // so the user can try again.
  router.post(
    "/confirm",
    asyncHandler(async (req, res) => {
      const session = requireSession(req);
      const pending = pendingMeals.get(session.sid);
      if (!pending) {
        throw new NotFoundError("No meal is waiting for confirmation");
      }

      const meal = await store.insertMeal({
        timestamp: formatLocalTimestamp(),
        ...pending.estimate,
      });
      pendingMeals.clear(session.sid);

      console.log(`[meals] Saved meal ${meal.id} (${meal.kcal} kcal)`);
      return sendSuccess(res, meal, 201);
    })
  );

  // GET /api/v1/meals?date=YYYY-MM-DD&from=YYYY-MM-DD
  router.get(
    "/",
    asyncHandler(async (req, res) => {
      const { date, from } = listQuerySchema.parse(req.query);
      const meals = await store.listMeals({ date, from });
      return sendSuccess(res, meals);
    })
  );

  return router;
}
