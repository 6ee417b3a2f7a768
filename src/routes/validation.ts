import { z } from "zod";
import { isCalendarDate } from "../utils/date";

export const dateOnlySchema = z
  .string()
  .refine(isCalendarDate, { message: "Date must be a real YYYY-MM-DD day" });

export const fromQuerySchema = z.object({
  from: dateOnlySchema.optional(),
});
