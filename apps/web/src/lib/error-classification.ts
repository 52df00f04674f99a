/**
 * Error Classification
 *
 * Typed errors raised inside the analysis pipeline, and a classifier that maps
 * any thrown value to a category (used for HTTP status mapping and logging).
 *
 * @module error-classification
 */

export type ErrorCategory =
  | "input_error"
  | "extraction_error"
  | "rate_limit"
  | "provider_outage"
  | "timeout"
  | "unknown";

export type ClassifiedError = {
  category: ErrorCategory;
  message: string;
};

// ============================================================================
// ERROR TYPES
// ============================================================================

/** Blank or missing required input, detected before any I/O. */
export class AnalysisInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AnalysisInputError";
  }
}

/** Text-generation service failure. */
export class UpstreamModelError extends Error {
  constructor(
    message: string,
    public readonly provider: string,
    public readonly status: number | null = null,
  ) {
    super(message);
    this.name = "UpstreamModelError";
  }
}

/** Document or URL text could not be acquired. */
export class ExtractionError extends Error {
  constructor(
    message: string,
    public readonly source: "url" | "file",
  ) {
    super(message);
    this.name = "ExtractionError";
  }
}

// ============================================================================
// PATTERNS
// ============================================================================

/** Patterns indicating LLM provider rate limiting or overload */
const RATE_LIMIT_PATTERNS = [
  /status\s*(?:code\s*)?429/i,
  /status\s*(?:code\s*)?529/i,
  /rate\s*limit/i,
  /too\s*many\s*requests/i,
  /overloaded/i,
  /quota/i,
];

const AUTH_PATTERNS = [
  /api\s*key/i,
  /authentication/i,
  /unauthorized/i,
  /status\s*(?:code\s*)?401/i,
  /status\s*(?:code\s*)?403/i,
];

const TIMEOUT_PATTERNS = [
  /timeout/i,
  /timed?\s*out/i,
  /AbortError/i,
  /ETIMEDOUT/i,
  /ECONNRESET/i,
];

// ============================================================================
// CLASSIFICATION
// ============================================================================

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}

function readStatus(error: unknown): number | null {
  if (error instanceof UpstreamModelError) return error.status;
  if (!error || typeof error !== "object") return null;
  const candidate = "status" in error ? error.status : "statusCode" in error ? error.statusCode : null;
  return typeof candidate === "number" ? candidate : null;
}

function fromStatus(status: number, message: string): ClassifiedError | null {
  if (status === 429 || status === 529 || status === 503) {
    return { category: "rate_limit", message };
  }
  if (status === 401 || status === 403) {
    return { category: "provider_outage", message };
  }
  if (status >= 500) {
    return { category: "provider_outage", message };
  }
  return null;
}

/**
 * Classify an error into the category that picks the HTTP status.
 */
export function classifyError(error: unknown): ClassifiedError {
  const message = toErrorMessage(error);

  if (error instanceof AnalysisInputError) {
    return { category: "input_error", message };
  }
  if (error instanceof ExtractionError) {
    return { category: "extraction_error", message };
  }

  const name = error instanceof Error ? error.name : "";
  if (name === "TimeoutError" || name === "AbortError" || TIMEOUT_PATTERNS.some((p) => p.test(message))) {
    return { category: "timeout", message };
  }

  const status = readStatus(error);
  if (status !== null) {
    const byStatus = fromStatus(status, message);
    if (byStatus) return byStatus;
  }

  if (AUTH_PATTERNS.some((p) => p.test(message))) {
    return { category: "provider_outage", message };
  }
  if (RATE_LIMIT_PATTERNS.some((p) => p.test(message))) {
    return { category: "rate_limit", message };
  }
  if (error instanceof UpstreamModelError) {
    return { category: "provider_outage", message };
  }

  return { category: "unknown", message };
}
