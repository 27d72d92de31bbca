// /src/lib/payroll/payslip.ts
// Monthly withholding summary for one employee.

import { calculateContribution, type ContributionResult } from "./contribution";
import { calculateIncomeTax, type IncomeTaxResult } from "./incomeTax";
import { clampMin0, roundMoney, toNonNegative, type Money } from "./money";
import type { PayrollRuleSet } from "./payrollTables";
import { calculateSeverancePool, type SeverancePoolResult } from "./severancePool";

export type PayslipInput = {
  baseSalary: Money;
  dependentCount: number;
  /** Extra income-tax deductions (e.g. health plan). */
  otherDeductions?: Money;
};

export type Payslip = {
  baseSalary: Money;
  contribution: ContributionResult;
  severancePool: SeverancePoolResult;
  incomeTax: IncomeTaxResult;
  /** Salary minus contribution and income tax. The severance pool is paid by the employer. */
  netSalary: Money;
};

export function calculatePayslip(
  input: PayslipInput,
  rules: Pick<PayrollRuleSet, "contribution" | "incomeTax" | "severancePool">,
): Payslip {
  const salary = toNonNegative(input.baseSalary);

  const contribution = calculateContribution(salary, rules);
  const severancePool = calculateSeverancePool(salary, rules);
  const incomeTax = calculateIncomeTax(salary, input.dependentCount, rules, input.otherDeductions ?? 0);

  return {
    baseSalary: roundMoney(salary),
    contribution,
    severancePool,
    incomeTax,
    netSalary: roundMoney(clampMin0(salary - contribution.amount - incomeTax.tax)),
  };
}
