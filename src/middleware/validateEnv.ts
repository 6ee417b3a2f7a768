// src/middleware/validateEnv.ts
import { z } from "zod";

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

/**
 * Environment variable validation schema.
 * Validates all required environment variables at startup.
 */
const envSchema = z
  .object({
    // Server
    PORT: z.coerce.number().int().positive().default(3000),
    NODE_ENV: z.enum(["development", "production", "test"]).default("development"),

    // Storage
    STORAGE_DRIVER: z.enum(["postgres", "memory"]).default("postgres"),
    DATABASE_URL: optionalString,

    // OpenAI (optional - meal analysis is blocked without it)
    OPENAI_API_KEY: optionalString,
    OPENAI_MODEL: z.string().default("gpt-4.1-mini"),
    OPENAI_TIMEOUT_MS: z.coerce.number().int().positive().default(25000),

    // Single-user credential (login is blocked until all three are set)
    AUTH_USERNAME: optionalString,
    AUTH_PASSWORD_HASH: optionalString,
    AUTH_TOKEN_SECRET: optionalString.refine((v) => v === undefined || v.length >= 32, {
      message: "AUTH_TOKEN_SECRET must be at least 32 characters",
    }),
    AUTH_TOKEN_TTL: z
      .string()
      .regex(/^\d+(d|h|m|s)$/, "AUTH_TOKEN_TTL must look like 30d, 12h, 45m or 60s")
      .default("30d"),

    // CORS
    ALLOWED_ORIGINS: optionalString,

    // Uploads / sessions
    UPLOAD_MAX_BYTES: z.coerce.number().int().positive().default(8 * 1024 * 1024),
    PENDING_MEAL_TTL_MINUTES: z.coerce.number().int().positive().default(30),
  })
  .superRefine((env, ctx) => {
    if (env.STORAGE_DRIVER === "postgres" && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["DATABASE_URL"],
        message: "DATABASE_URL is required when STORAGE_DRIVER=postgres",
      });
    }
  });

export type Env = z.infer<typeof envSchema>;

export type EnvResult =
  | { ok: true; env: Env; warnings: string[] }
  | { ok: false; errors: string[] };

/**
 * Parses an environment map without touching process state.
 * Warnings list optional features that will be unavailable.
 */
export function parseEnvironment(source: NodeJS.ProcessEnv): EnvResult {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    return {
      ok: false,
      errors: result.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`),
    };
  }

  const env = result.data;
  const warnings: string[] = [];

  if (!env.OPENAI_API_KEY) {
    warnings.push("OPENAI_API_KEY is not set - meal analysis will not work");
  }

  if (!env.AUTH_USERNAME || !env.AUTH_PASSWORD_HASH || !env.AUTH_TOKEN_SECRET) {
    warnings.push(
      "AUTH_USERNAME / AUTH_PASSWORD_HASH / AUTH_TOKEN_SECRET not set - login will be refused"
    );
  }

  if (env.STORAGE_DRIVER === "memory") {
    warnings.push("STORAGE_DRIVER=memory - records are lost on restart");
  }

  return { ok: true, env, warnings };
}

let validatedEnv: Env | null = null;

/**
 * Validates environment variables at startup.
 * Throws an error if required variables are missing or invalid.
 * Logs warnings for optional but recommended variables.
 */
export function validateEnvironment(source: NodeJS.ProcessEnv = process.env): Env {
  if (validatedEnv) return validatedEnv;

  const result = parseEnvironment(source);

  if (!result.ok) {
    console.error("Environment validation failed:");
    for (const error of result.errors) {
      console.error(`  - ${error}`);
    }
    throw new Error("Invalid environment configuration. See errors above.");
  }

  if (result.warnings.length > 0) {
    console.warn("\nEnvironment warnings:");
    result.warnings.forEach((w) => console.warn(`  - ${w}`));
    console.warn("");
  }

  validatedEnv = result.env;
  console.log("Environment validation passed");
  return validatedEnv;
}

/**
 * Get validated environment variables.
 * Must call validateEnvironment() first.
 */
export function getEnv(): Env {
  if (!validatedEnv) {
    throw new Error("Environment not validated. Call validateEnvironment() first.");
  }
  return validatedEnv;
}

export default validateEnvironment;
