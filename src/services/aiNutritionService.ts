import OpenAI from "openai";
import { MealEstimate } from "../domain/types";
import {
  AiResponseError,
  AppError,
  ConfigurationError,
  errorMessage,
  ValidationError,
} from "../utils/errors";

/** Sends one system + user prompt pair and resolves to the raw reply text. */
export type CompletionFn = (systemPrompt: string, userPrompt: string) => Promise<string>;

export interface OpenAiCompletionOptions {
  apiKey: string;
  model: string;
  timeoutMs: number;
}

/**
 * OpenAI-backed CompletionFn. One attempt per call: a failed request is
 * reported to the user, never retried.
 */
export function createOpenAiCompletion(options: OpenAiCompletionOptions): CompletionFn {
  const openai = new OpenAI({
    apiKey: options.apiKey,
    timeout: options.timeoutMs,
    maxRetries: 0,
  });

  return async (systemPrompt, userPrompt) => {
    const completion = await openai.chat.completions.create({
      model: options.model,
      response_format: { type: "json_object" },
      messages: [
        { role: "system", content: systemPrompt },
        { role: "user", content: userPrompt },
      ],
      temperature: 0.2,
    });

    return completion.choices[0]?.message?.content ?? "";
  };
}

export const MEAL_ANALYSIS_PROMPT = `
You are an expert nutritionist. Analyze the meal the user describes.

Return ONLY a valid JSON object (no markdown fences) with these keys:
- "descrizione": string, a concise summary of what was eaten
- "kcal": integer, estimated calories
- "pro": number, grams of protein
- "carbo": number, grams of carbohydrates
- "fat": number, grams of fat

Use realistic estimates based on common portion sizes if none are given.
If the text does not describe food, return the same keys with null or 0 values.
`.trim();

export function stripCodeFences(text: string): string {
  return text.replace(/```(?:json)?/gi, "").trim();
}

function toNumber(value: unknown): number {
  if (typeof value === "number") return Number.isFinite(value) ? value : 0;
  if (typeof value === "string" && value.trim()) {
    const n = Number(value);
    return Number.isFinite(n) ? n : 0;
  }
  return 0;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parses the model's reply. Anything that is not a JSON object is an
 * AiResponseError; inside the object, null or odd values become 0.
 */
export function parseMealEstimate(raw: string, fallbackDescription: string): MealEstimate {
  const clean = stripCodeFences(raw);

  let parsed: unknown;
  try {
    parsed = JSON.parse(clean);
  } catch {
    console.error("[AI] Failed to parse meal JSON:", raw);
    throw new AiResponseError("AI returned an invalid JSON response.", raw);
  }

  if (!isRecord(parsed)) {
    console.error("[AI] Meal JSON is not an object:", raw);
    throw new AiResponseError("AI returned an unexpected response shape.", raw);
  }

  const summary = parsed.descrizione ?? parsed.description;
  const description =
    typeof summary === "string" && summary.trim() ? summary.trim() : fallbackDescription;

  return {
    description,
    kcal: Math.round(toNumber(parsed.kcal)),
    proteinG: toNumber(parsed.pro),
    carbsG: toNumber(parsed.carbo),
    fatG: toNumber(parsed.fat),
  };
}

export class MealAnalyzer {
  /** `complete` is null when no API key is configured. */
  constructor(private readonly complete: CompletionFn | null) {}

  get configured(): boolean {
    return this.complete !== null;
  }

  async analyze(text: string): Promise<MealEstimate> {
    if (!this.complete) {
      console.warn("[AI] OPENAI_API_KEY is not set – cannot analyze meals.");
      throw new ConfigurationError("OPENAI_API_KEY is not configured");
    }

    const description = text.trim();
    if (!description) {
      throw new ValidationError("No meal description provided.");
    }

    let raw: string;
    try {
      raw = await this.complete(MEAL_ANALYSIS_PROMPT, `Meal description: "${description}"`);
    } catch (err) {
      console.error("[AI] Meal analysis request failed:", err);
      throw new AppError(`AI service request failed: ${errorMessage(err)}`, 502, "AI_SERVICE_ERROR");
    }

    return parseMealEstimate(raw, description);
  }
}
