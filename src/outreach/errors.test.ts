import { describe, expect, it } from "vitest";
import { ConfigError, IntakeValidationError, classifyExternalError } from "./errors.js";

describe("classifyExternalError", () => {
  it.each([
    ["request timed out after 30000ms", "timeout", true],
    ["RESOURCE_EXHAUSTED: daily quota", "quota_exhausted", false],
    ["HTTP 429 Too Many Requests", "rate_limit", true],
    ["403 Forbidden", "auth", false],
    ["job posting not found", "not_found", false],
    ["connect ECONNREFUSED 127.0.0.1:8780", "network", true],
    ["something odd", "unknown", false],
  ])("classifies %s", (message, type, isTransient) => {
    expect(classifyExternalError(new Error(message))).toEqual({ type, message, isTransient });
  });

  it("treats aborts as timeouts and accepts non-errors", () => {
    const abort = new Error("This operation was aborted");
    abort.name = "AbortError";
    expect(classifyExternalError(abort).type).toBe("timeout");
    expect(classifyExternalError("plain text")).toEqual({
      type: "unknown",
      message: "plain text",
      isTransient: false,
    });
  });
});

describe("error classes", () => {
  it("carries codes and problems", () => {
    expect(new ConfigError("missing key").code).toBe("config");
    const invalid = new IntakeValidationError(["company is required", "jobUrl is required"]);
    expect(invalid.message).toBe("Invalid application: company is required; jobUrl is required");
    expect(invalid.problems).toHaveLength(2);
  });
});
