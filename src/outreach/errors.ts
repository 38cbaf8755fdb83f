export class OutreachError extends Error {
  constructor(
    message: string,
    readonly code: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "OutreachError";
  }
}

/** Missing credentials, invalid settings or an unusable session. */
export class ConfigError extends OutreachError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "config", options);
    this.name = "ConfigError";
  }
}

export class IntakeValidationError extends OutreachError {
  constructor(readonly problems: string[]) {
    super(`Invalid application: ${problems.join("; ")}`, "intake_validation");
    this.name = "IntakeValidationError";
  }
}

// =============================================================================
// Error Classification
// =============================================================================

export type ExternalErrorType =
  | "network" // Transient network error
  | "timeout" // Request timed out
  | "auth" // Authentication/authorization error
  | "rate_limit" // Rate limited
  | "quota_exhausted" // Daily allowance used up
  | "not_found" // Resource not found
  | "unknown";

export type ClassifiedError = {
  type: ExternalErrorType;
  message: string;
  isTransient: boolean;
};

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function classifyExternalError(err: unknown): ClassifiedError {
  const message = errorMessage(err);
  const lower = message.toLowerCase();

  if (
    (err instanceof Error && err.name === "AbortError") ||
    lower.includes("timeout") ||
    lower.includes("timed out") ||
    lower.includes("aborted")
  ) {
    return { type: "timeout", message, isTransient: true };
  }
  if (lower.includes("quota") || lower.includes("resource_exhausted")) {
    return { type: "quota_exhausted", message, isTransient: false };
  }
  if (lower.includes("429") || lower.includes("rate limit") || lower.includes("too many requests")) {
    return { type: "rate_limit", message, isTransient: true };
  }
  if (
    lower.includes("401") ||
    lower.includes("403") ||
    lower.includes("unauthorized") ||
    lower.includes("forbidden")
  ) {
    return { type: "auth", message, isTransient: false };
  }
  if (lower.includes("404") || lower.includes("not found")) {
    return { type: "not_found", message, isTransient: false };
  }
  if (
    lower.includes("fetch failed") ||
    lower.includes("network") ||
    lower.includes("econnrefused") ||
    lower.includes("econnreset") ||
    lower.includes("enotfound") ||
    lower.includes("socket") ||
    lower.includes("503")
  ) {
    return { type: "network", message, isTransient: true };
  }
  return { type: "unknown", message, isTransient: false };
}
