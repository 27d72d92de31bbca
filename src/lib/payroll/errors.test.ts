import { describe, it, expect } from "vitest";
import { z } from "zod";

import { toBatchError } from "./errors";

describe("toBatchError", () => {
  it("lists schema issues for malformed records", () => {
    const parsed = z.object({ baseSalary: z.number() }).safeParse({ baseSalary: "3000" });
    if (parsed.success) throw new Error("expected a parse failure");

    expect(toBatchError(parsed.error)).toEqual({
      error: "INVALID_EMPLOYEE",
      message: "Employee record did not match the expected format.",
      issues: [{ path: "baseSalary", message: "Expected number, received string" }],
    });
  });

  it("keeps the message of other errors", () => {
    expect(toBatchError(new Error("boom"))).toEqual({ error: "CALCULATION_FAILED", message: "boom" });
    expect(toBatchError("boom")).toEqual({ error: "CALCULATION_FAILED", message: "Unknown error" });
  });
});
