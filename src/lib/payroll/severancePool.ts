// /src/lib/payroll/severancePool.ts
// Employer severance-pool deposit (FGTS-style): flat rate, no cap, no brackets.

import { roundHalfUp, roundMoney, toNonNegative, type Money, type Percent } from "./money";
import type { PayrollRuleSet } from "./payrollTables";

export type SeverancePoolResult = {
  amount: Money;
  rate: Percent;
  base: Money;
};

export function calculateSeverancePool(
  baseSalary: Money,
  rules: Pick<PayrollRuleSet, "severancePool">,
): SeverancePoolResult {
  const salary = toNonNegative(baseSalary);
  if (salary === 0) return { amount: 0, rate: 0, base: 0 };

  return {
    amount: roundMoney(salary * rules.severancePool.rate),
    rate: roundHalfUp(rules.severancePool.rate * 100, 4),
    base: roundMoney(salary),
  };
}
