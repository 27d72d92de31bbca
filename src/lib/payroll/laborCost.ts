// /src/lib/payroll/laborCost.ts
/**
 * Fully-loaded labor cost estimate.
 *
 * Monthly cost = salary + employer contribution (flat approximation)
 * + severance pool + vacation provision (one month plus a third, accrued over
 * 12 months) + thirteenth provision (salary / 12) + other charges.
 *
 * Totals are computed from unrounded components and rounded independently,
 * so totalAnnual / 12 may differ from totalMonthly by a cent.
 */

import { roundMoney, sumMoney, toNonNegative, type Money } from "./money";
import type { PayrollRuleSet } from "./payrollTables";
import { calculateSeverancePool } from "./severancePool";

export type LaborCostBreakdown = {
  baseSalary: Money;
  employerContribution: Money;
  severancePoolContribution: Money;
  vacationProvision: Money;
  thirteenthSalaryProvision: Money;
  otherCharges: Money;
  totalMonthly: Money;
  totalAnnual: Money;
  costPerHour: Money;
};

type LaborCostRules = Pick<PayrollRuleSet, "severancePool" | "laborCost">;

const VACATION_WITH_BONUS_FACTOR = 4 / 3;

export function calculateMonthlyCost(baseSalary: Money, rules: LaborCostRules): LaborCostBreakdown {
  const salary = toNonNegative(baseSalary);
  const { employerContributionRate, otherChargesRate, standardMonthlyHours } = rules.laborCost;

  const employerContribution = salary * employerContributionRate;
  const severancePoolContribution = calculateSeverancePool(salary, rules).amount;
  const vacationProvision = (salary * VACATION_WITH_BONUS_FACTOR) / 12;
  const thirteenthSalaryProvision = salary / 12;
  const otherCharges = salary * otherChargesRate;

  const totalMonthly = sumMoney([
    salary,
    employerContribution,
    severancePoolContribution,
    vacationProvision,
    thirteenthSalaryProvision,
    otherCharges,
  ]);

  return {
    baseSalary: roundMoney(salary),
    employerContribution: roundMoney(employerContribution),
    severancePoolContribution,
    vacationProvision: roundMoney(vacationProvision),
    thirteenthSalaryProvision: roundMoney(thirteenthSalaryProvision),
    otherCharges: roundMoney(otherCharges),
    totalMonthly: roundMoney(totalMonthly),
    totalAnnual: roundMoney(totalMonthly * 12),
    costPerHour: roundMoney(totalMonthly / standardMonthlyHours),
  };
}

export type ProjectAllocation = {
  employeeId?: string;
  employeeCost: LaborCostBreakdown;
  hours: number;
};

export type ProjectAllocationCost = {
  employeeId?: string;
  hours: number;
  costPerHour: Money;
  cost: Money;
};

export type ProjectCost = {
  total: Money;
  perAllocation: ProjectAllocationCost[];
};

/** costPerHour * hours per allocation; negative or non-numeric hours count as 0. */
export function calculateProjectCost(allocations: readonly ProjectAllocation[]): ProjectCost {
  let total = 0;

  const perAllocation = allocations.map((a): ProjectAllocationCost => {
    const hours = toNonNegative(a.hours);
    const cost = a.employeeCost.costPerHour * hours;
    total += cost;

    return {
      ...(a.employeeId !== undefined ? { employeeId: a.employeeId } : {}),
      hours,
      costPerHour: a.employeeCost.costPerHour,
      cost: roundMoney(cost),
    };
  });

  return { total: roundMoney(total), perAllocation };
}

export type LaborCostReportRow = {
  employeeId: string;
  baseSalary: Money;
  totalMonthly: Money;
  costPerHour: Money;
};

export type LaborCostReport = {
  rows: LaborCostReportRow[];
  companyMonthlyTotal: Money;
};

/** Company-wide monthly cost table, one row per employee. */
export function summarizeLaborCosts(
  employees: ReadonlyArray<{ employeeId: string; baseSalary: Money }>,
  rules: LaborCostRules,
): LaborCostReport {
  const rows = employees.map((e) => {
    const cost = calculateMonthlyCost(e.baseSalary, rules);
    return {
      employeeId: e.employeeId,
      baseSalary: cost.baseSalary,
      totalMonthly: cost.totalMonthly,
      costPerHour: cost.costPerHour,
    };
  });

  return {
    rows,
    companyMonthlyTotal: roundMoney(sumMoney(rows.map((r) => r.totalMonthly))),
  };
}
