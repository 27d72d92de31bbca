// /src/lib/payroll/errors.ts
import { z } from "zod";

/**
 * Raised when the regulatory rule tables are missing, malformed, or do not
 * cover the requested reference date. Numeric misuse never raises; it yields
 * zero results instead.
 */
export class PayrollConfigError extends Error {
  readonly code = "PAYROLL_CONFIG_INVALID";
  readonly issues: Array<{ path: string; message: string }>;

  constructor(message: string, issues: Array<{ path: string; message: string }> = []) {
    super(message);
    this.name = "PayrollConfigError";
    this.issues = issues;
  }
}

/** Raised by a benefit store that cannot read its records. The batch does not catch it. */
export class BenefitStoreError extends Error {
  readonly code = "BENEFIT_STORE_FAILED";
  readonly issues: Array<{ path: string; message: string }>;

  constructor(message: string, issues: Array<{ path: string; message: string }> = [], options?: { cause?: unknown }) {
    super(message, options);
    this.name = "BenefitStoreError";
    this.issues = issues;
  }
}

export type BatchError = {
  error: "INVALID_EMPLOYEE" | "CALCULATION_FAILED";
  message: string;
  issues?: Array<{ path: string; message: string }>;
};

export function zodIssues(err: z.ZodError): Array<{ path: string; message: string }> {
  return err.issues.map((i) => ({ path: i.path.join("."), message: i.message }));
}

/** Shape a per-employee failure for the batch report. */
export function toBatchError(err: unknown): BatchError {
  if (err instanceof z.ZodError) {
    return {
      error: "INVALID_EMPLOYEE",
      message: "Employee record did not match the expected format.",
      issues: zodIssues(err),
    };
  }

  if (err instanceof Error) {
    return { error: "CALCULATION_FAILED", message: err.message };
  }

  return { error: "CALCULATION_FAILED", message: "Unknown error" };
}
