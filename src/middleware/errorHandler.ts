import { Request, Response, NextFunction } from "express";
import multer from "multer";
import { ZodError } from "zod";
import { AppError } from "../utils/errors";
import { sendError } from "./responseHelper";

/**
 * Global error handler. Every failure is scoped to the request that caused
 * it; the process keeps serving.
 */
export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (err instanceof AppError) {
    if (err.statusCode >= 500) {
      console.error(`❌ ${req.method} ${req.originalUrl} ${err.code}:`, err.message);
    }
    sendError(res, err.message, err.statusCode, { code: err.code, meta: err.meta });
    return;
  }

  if (err instanceof ZodError) {
    sendError(res, "Validation failed", 400, {
      code: "VALIDATION_ERROR",
      meta: { details: err.errors.map((e) => `${e.path.join(".") || "body"}: ${e.message}`) },
    });
    return;
  }

  if (err instanceof multer.MulterError) {
    const status = err.code === "LIMIT_FILE_SIZE" ? 413 : 400;
    sendError(res, err.message, status, { code: err.code });
    return;
  }

  // express.json() body errors carry their own 4xx status
  if (err instanceof SyntaxError && "status" in err && err.status === 400) {
    sendError(res, "Malformed JSON body", 400, { code: "BAD_REQUEST" });
    return;
  }

  if (err instanceof Error && "status" in err && err.status === 413) {
    sendError(res, "Request body too large", 413, { code: "PAYLOAD_TOO_LARGE" });
    return;
  }

  const message =
    err instanceof Error ? err.message : typeof err === "string" ? err : "Server error";
  console.error("❌ SERVER ERROR:", err);
  sendError(res, message, 500, { code: "INTERNAL_ERROR" });
}

export function notFoundHandler(req: Request, res: Response): void {
  sendError(res, "Not Found", 404, {
    code: "NOT_FOUND",
    meta: { path: req.originalUrl, method: req.method },
  });
}
