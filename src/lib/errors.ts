import type { ZodError } from "zod";
import { ERROR_CODES, type ErrorCode } from "@/lib/error-codes";

export type RuleViolation = {
  rule: ErrorCode;
  message: string;
  field?: string;
  hint?: string;
  details?: Record<string, string | number>;
};

export function violation(rule: ErrorCode, message: string, extra: Omit<RuleViolation, "rule" | "message"> = {}): RuleViolation {
  return { rule, message, ...extra };
}

export function zodViolations(error: ZodError): RuleViolation[] {
  return error.issues.map((issue) => {
    const field = issue.path.length ? issue.path.join(".") : undefined;
    return {
      rule: ERROR_CODES.invalidPayload,
      message: field ? `${field}: ${issue.message}` : issue.message,
      field
    };
  });
}

// Raised for faults outside business rules: storage, configuration.
export class InfrastructureError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "InfrastructureError";
  }
}

export class ConfigError extends InfrastructureError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
