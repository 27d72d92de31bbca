// /src/lib/payroll/incomeTax.ts
/**
 * Income-tax withholding (IRRF-style).
 *
 * Taxable base = salary - (employee contribution + dependents * per-dependent
 * deduction + other deductions), floored at 0. The tax is the containing
 * bracket's `base * rate - deduction`, floored at 0.
 *
 * Never throws: bad numeric input produces a zero result.
 */

import { evaluateTaxTable } from "./brackets";
import { calculateContribution } from "./contribution";
import { clampMin0, roundMoney, toNonNegative, type Money, type Percent } from "./money";
import type { PayrollRuleSet } from "./payrollTables";

export type IncomeTaxResult = {
  tax: Money;
  /** tax / taxableBase, percent. */
  effectiveRate: Percent;
  /** Nominal rate of the bracket applied, percent. */
  marginalRate: Percent;
  taxableBase: Money;
  totalDeductions: Money;
  contributionDeduction: Money;
  dependentDeduction: Money;
};

export function calculateIncomeTax(
  baseSalary: Money,
  dependentCount: number,
  rules: Pick<PayrollRuleSet, "contribution" | "incomeTax">,
  otherDeductions: Money = 0,
): IncomeTaxResult {
  const salary = toNonNegative(baseSalary);
  if (salary === 0) {
    return {
      tax: 0,
      effectiveRate: 0,
      marginalRate: 0,
      taxableBase: 0,
      totalDeductions: 0,
      contributionDeduction: 0,
      dependentDeduction: 0,
    };
  }

  const dependents = Math.floor(toNonNegative(dependentCount));
  const contribution = calculateContribution(salary, rules).amount;
  const dependentDeduction = dependents * rules.incomeTax.dependentDeduction;
  const totalDeductions = contribution + dependentDeduction + toNonNegative(otherDeductions);
  const taxableBase = clampMin0(salary - totalDeductions);

  const evaluation = evaluateTaxTable(rules.incomeTax.table, taxableBase);

  return {
    tax: evaluation.tax,
    effectiveRate: evaluation.effectiveRate,
    marginalRate: evaluation.marginalRate,
    taxableBase: roundMoney(taxableBase),
    totalDeductions: roundMoney(totalDeductions),
    contributionDeduction: contribution,
    dependentDeduction: roundMoney(dependentDeduction),
  };
}
