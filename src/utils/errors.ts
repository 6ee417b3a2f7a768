/**
 * Application errors carry the HTTP status and a stable code so the
 * global error handler can answer without knowing where they came from.
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly meta?: Record<string, unknown>;

  constructor(
    message: string,
    statusCode: number = 500,
    code: string = "INTERNAL_ERROR",
    meta?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.meta = meta;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** A feature needs a credential or setting that is not configured. */
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 503, "NOT_CONFIGURED");
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: string[]) {
    super(message, 400, "VALIDATION_ERROR", details ? { details } : undefined);
  }
}

export class CsvParseError extends AppError {
  constructor(message: string) {
    super(message, 400, "CSV_PARSE_ERROR");
  }
}

export class NoRecognizedColumnsError extends AppError {
  public readonly headers: string[];

  constructor(headers: string[]) {
    super(
      "No recognized columns in the CSV file. Check the header row or update the column mapping.",
      422,
      "NO_RECOGNIZED_COLUMNS",
      { headers }
    );
    this.headers = headers;
  }
}

export class PayloadTooLargeError extends AppError {
  constructor(limitBytes: number) {
    super(`Upload exceeds the ${limitBytes}-byte limit`, 413, "PAYLOAD_TOO_LARGE", { limitBytes });
  }
}

export class AiResponseError extends AppError {
  constructor(message: string, raw?: string) {
    super(message, 502, "AI_RESPONSE_ERROR", raw === undefined ? undefined : { raw });
  }
}

export class StorageError extends AppError {
  constructor(message: string, meta?: Record<string, unknown>) {
    super(message, 500, "STORAGE_ERROR", meta);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string = "Resource not found") {
    super(message, 404, "NOT_FOUND");
  }
}

export class UnauthorizedError extends AppError {
  constructor(message: string = "Authentication required") {
    super(message, 401, "UNAUTHORIZED");
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  return "Unknown error";
}
