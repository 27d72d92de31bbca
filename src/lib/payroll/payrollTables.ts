// /src/lib/payroll/payrollTables.ts
/**
 * Versioned regulatory rule sets (contribution brackets, income-tax brackets,
 * flat rates, labor-cost assumptions).
 *
 * DATA POLICY:
 * - Values live in tables/payroll-rules.json, one entry per effective date.
 * - Calculators never read this module directly; callers resolve a rule set
 *   for their reference date and pass it in.
 * - Tables are validated on load: ascending, contiguous in 0.01 steps,
 *   starting at 0, only the last bracket unbounded.
 */

import { z } from "zod";
import { format, isValid, parseISO } from "date-fns";

import payrollRulesJson from "./tables/payroll-rules.json";
import { PayrollConfigError, zodIssues } from "./errors";
import { roundMoney, type Money } from "./money";

export type TaxTableKind = "marginal" | "flat_with_deduction";

export type TaxBracket = {
  lowerBoundInclusive: Money;
  /** null = unbounded (last bracket only). */
  upperBoundInclusive: Money | null;
  /** Fraction, e.g. 0.075 for 7.5%. */
  rate: number;
  deduction: Money;
};

export type TaxTable = {
  kind: TaxTableKind;
  brackets: TaxBracket[];
};

/** Smallest money unit; adjacent brackets are separated by exactly this step. */
export const BRACKET_STEP: Money = 0.01;

const TaxBracketSchema = z
  .object({
    lowerBoundInclusive: z.number().min(0),
    upperBoundInclusive: z.number().positive().nullable(),
    rate: z.number().min(0).max(1),
    deduction: z.number().min(0),
  })
  .strict();

export const TaxTableSchema = z
  .object({
    kind: z.enum(["marginal", "flat_with_deduction"]),
    brackets: z.array(TaxBracketSchema).min(1),
  })
  .strict()
  .superRefine((table, ctx) => {
    const { brackets } = table;

    if (brackets[0]?.lowerBoundInclusive !== 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["brackets", 0, "lowerBoundInclusive"],
        message: "First bracket must start at 0.",
      });
    }

    brackets.forEach((b, i) => {
      const isLast = i === brackets.length - 1;
      if (isLast && b.upperBoundInclusive !== null) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["brackets", i, "upperBoundInclusive"],
          message: "Last bracket must be unbounded (null).",
        });
      }
      if (isLast) return;

      const next = brackets[i + 1];
      if (b.upperBoundInclusive === null || next === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["brackets", i, "upperBoundInclusive"],
          message: "Only the last bracket may be unbounded.",
        });
        return;
      }
      if (b.upperBoundInclusive < b.lowerBoundInclusive) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["brackets", i],
          message: "Bracket upper bound is below its lower bound.",
        });
      }
      if (roundMoney(b.upperBoundInclusive + BRACKET_STEP) !== roundMoney(next.lowerBoundInclusive)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["brackets", i + 1, "lowerBoundInclusive"],
          message: `Bracket ${i + 1} must start ${BRACKET_STEP} above bracket ${i}.`,
        });
      }
    });
  });

const IsoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "Expected YYYY-MM-DD")
  .refine((s) => isValid(parseISO(s)), "Invalid calendar date");

export const PayrollRuleSetSchema = z
  .object({
    effectiveFrom: IsoDateSchema,
    label: z.string().min(1),
    contribution: z
      .object({
        ceiling: z.number().positive(),
        table: TaxTableSchema.refine((t) => t.kind === "marginal", "Contribution table must be marginal."),
      })
      .strict(),
    incomeTax: z
      .object({
        dependentDeduction: z.number().min(0),
        table: TaxTableSchema.refine(
          (t) => t.kind === "flat_with_deduction",
          "Income-tax table must be flat_with_deduction.",
        ),
      })
      .strict(),
    severancePool: z.object({ rate: z.number().min(0).max(1) }).strict(),
    laborCost: z
      .object({
        employerContributionRate: z.number().min(0).max(1),
        otherChargesRate: z.number().min(0).max(1),
        standardMonthlyHours: z.number().positive(),
      })
      .strict(),
    workday: z.object({ regularHours: z.number().positive().max(24) }).strict(),
  })
  .strict();

export type PayrollRuleSet = z.infer<typeof PayrollRuleSetSchema>;

export const PayrollRulesFileSchema = z
  .object({
    versions: z.array(PayrollRuleSetSchema).min(1),
  })
  .strict()
  .refine(
    (f) => f.versions.every((v, i, all) => i === 0 || (all[i - 1]?.effectiveFrom ?? "") < v.effectiveFrom),
    { message: "Rule set versions must be sorted by effectiveFrom with no duplicates.", path: ["versions"] },
  );

export type PayrollRulesFile = z.infer<typeof PayrollRulesFileSchema>;

/** Parse and validate a rules document (e.g. a tenant override loaded from disk). */
export function parsePayrollRules(json: unknown): PayrollRulesFile {
  const parsed = PayrollRulesFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new PayrollConfigError("Payroll rule tables failed validation.", zodIssues(parsed.error));
  }
  return parsed.data;
}

let bundled: PayrollRulesFile | null = null;

function bundledRules(): PayrollRulesFile {
  if (!bundled) bundled = parsePayrollRules(payrollRulesJson);
  return bundled;
}

export function listPayrollRuleVersions(rules: PayrollRulesFile = bundledRules()): string[] {
  return rules.versions.map((v) => v.effectiveFrom);
}

/**
 * Rule set in force on `referenceDate`: the newest version whose
 * effectiveFrom is on or before it.
 */
export function getPayrollRules(
  referenceDate: Date,
  rules: PayrollRulesFile = bundledRules(),
): PayrollRuleSet {
  if (!isValid(referenceDate)) {
    throw new PayrollConfigError("Reference date is not a valid date.");
  }

  // ISO date strings compare lexicographically in calendar order.
  const day = format(referenceDate, "yyyy-MM-dd");
  let match: PayrollRuleSet | null = null;
  for (const v of rules.versions) {
    if (v.effectiveFrom <= day) match = v;
  }

  if (!match) {
    throw new PayrollConfigError(
      `No payroll rule set is in force on ${day}. Earliest available: ${rules.versions[0]?.effectiveFrom ?? "none"}.`,
    );
  }
  return match;
}
