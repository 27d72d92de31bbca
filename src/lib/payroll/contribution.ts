// /src/lib/payroll/contribution.ts
/**
 * Employee pension contribution (INSS-style): cumulative marginal brackets
 * applied to the salary capped at the contribution ceiling.
 */

import { evaluateTaxTable, type BracketSlice } from "./brackets";
import { roundMoney, toNonNegative, type Money, type Percent } from "./money";
import type { PayrollRuleSet } from "./payrollTables";

export type ContributionResult = {
  amount: Money;
  effectiveRate: Percent;
  cappedBase: Money;
  slices: BracketSlice[];
};

export function calculateContribution(
  baseSalary: Money,
  rules: Pick<PayrollRuleSet, "contribution">,
): ContributionResult {
  const salary = toNonNegative(baseSalary);
  if (salary === 0) {
    return { amount: 0, effectiveRate: 0, cappedBase: 0, slices: [] };
  }

  const cappedBase = Math.min(salary, rules.contribution.ceiling);
  const evaluation = evaluateTaxTable(rules.contribution.table, cappedBase);

  return {
    amount: evaluation.tax,
    effectiveRate: evaluation.effectiveRate,
    cappedBase: roundMoney(cappedBase),
    slices: evaluation.slices,
  };
}
