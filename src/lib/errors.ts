import type { AnalysisCategory } from "@/lib/types";

export class AppError extends Error {
  constructor(
    public code: string,
    message: string,
    public statusCode: number = 400,
    public details?: Array<{ field: string; message: string }>,
  ) {
    super(message);
    this.name = "AppError";
  }
}

export class ValidationError extends AppError {
  constructor(
    message: string = "Validation failed",
    details?: Array<{ field: string; message: string }>,
  ) {
    super("VALIDATION_ERROR", message, 400, details);
    this.name = "ValidationError";
  }
}

export class RateLimitError extends AppError {
  constructor() {
    super("RATE_LIMITED", "Too many requests, try again in a minute", 429);
    this.name = "RateLimitError";
  }
}

/** External NL-to-SQL call failed. Recovered by the next tier, never surfaced. */
export class ProviderError extends AppError {
  constructor(
    public tier: string,
    message: string,
  ) {
    super("PROVIDER_FAILED", `${tier}: ${message}`, 502);
    this.name = "ProviderError";
  }
}

/**
 * SQL execution failed. `message` is safe to show; the driver's text stays in
 * `cause` for the logs.
 */
export class QueryError extends AppError {
  constructor(
    public cause: unknown,
    public category?: AnalysisCategory,
  ) {
    super(
      "QUERY_FAILED",
      category
        ? `The ${category} query could not be executed. Try rephrasing the question.`
        : "The query could not be executed. Try rephrasing the question.",
      422,
    );
    this.name = "QueryError";
  }
}

export class MetricComputationError extends AppError {
  constructor(
    public category: AnalysisCategory,
    public missing: string[],
  ) {
    super("METRIC_COMPUTATION_FAILED", `Rows lack the columns needed for ${category}: ${missing.join(", ")}`, 500);
    this.name = "MetricComputationError";
  }
}
