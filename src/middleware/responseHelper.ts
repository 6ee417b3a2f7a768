// src/middleware/responseHelper.ts
import { Response } from "express";

/**
 * Standardized API response format.
 * All endpoints should use these helpers for consistent responses.
 */
export interface ApiResponse<T> {
  ok: boolean;
  data?: T;
  error?: string;
  code?: string;
  meta?: Record<string, unknown>;
}

/**
 * Send a successful response.
 */
export function sendSuccess<T>(res: Response, data: T, statusCode: number = 200): Response {
  const body: ApiResponse<T> = { ok: true, data };
  return res.status(statusCode).json(body);
}

/**
 * Send an error response.
 */
export function sendError(
  res: Response,
  error: string,
  statusCode: number = 400,
  extra: { code?: string; meta?: Record<string, unknown> } = {}
): Response {
  const body: ApiResponse<never> = { ok: false, error };

  if (extra.code) body.code = extra.code;
  if (extra.meta) body.meta = extra.meta;

  return res.status(statusCode).json(body);
}
