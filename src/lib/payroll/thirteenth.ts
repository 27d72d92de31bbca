// /src/lib/payroll/thirteenth.ts
/**
 * Thirteenth salary (year-end bonus).
 *
 * Gross = salary / 12 per month worked in the reference year. A calendar
 * month counts when the employee was present for at least 15 of its days;
 * this threshold is statutory and not configurable.
 */

import {
  addDays,
  differenceInCalendarDays,
  isAfter,
  isValid,
  lastDayOfMonth,
  max as maxDate,
  min as minDate,
  startOfDay,
} from "date-fns";

import { calculateContribution } from "./contribution";
import { calculateIncomeTax } from "./incomeTax";
import { clampMin0, roundMoney, toNonNegative, type Money } from "./money";
import type { PayrollRuleSet } from "./payrollTables";

export const MIN_DAYS_FOR_MONTH = 15;

export type ThirteenthInstallment = "first" | "second" | "full";

export function calculateThirteenthGross(baseSalary: Money, monthsWorked: number): Money {
  const salary = toNonNegative(baseSalary);
  const months = Math.min(Math.floor(toNonNegative(monthsWorked)), 12);
  if (salary === 0 || months === 0) return 0;

  return roundMoney((salary / 12) * months);
}

export function calculateMonthsWorked(
  admissionDate: Date,
  referenceYear: number,
  terminationDate?: Date | null,
): number {
  if (!isValid(admissionDate) || !Number.isInteger(referenceYear)) return 0;

  const yearStart = new Date(referenceYear, 0, 1);
  const yearEnd = new Date(referenceYear, 11, 31);

  const windowStart = maxDate([startOfDay(admissionDate), yearStart]);
  const windowEnd =
    terminationDate && isValid(terminationDate)
      ? minDate([startOfDay(terminationDate), yearEnd])
      : yearEnd;

  if (isAfter(windowStart, windowEnd)) return 0;

  let months = 0;
  let cursor = windowStart;

  while (!isAfter(cursor, windowEnd)) {
    const monthEnd = lastDayOfMonth(cursor);
    const presentUntil = minDate([windowEnd, monthEnd]);
    const daysPresent = differenceInCalendarDays(presentUntil, cursor) + 1;

    if (daysPresent >= MIN_DAYS_FOR_MONTH) months++;

    cursor = addDays(monthEnd, 1);
  }

  return Math.min(months, 12);
}

export type ThirteenthInstallmentResult = {
  installment: ThirteenthInstallment;
  gross: Money;
  installmentGross: Money;
  contribution: Money;
  incomeTax: Money;
  otherDeductions: Money;
  totalDeductions: Money;
  net: Money;
};

/**
 * Installment split:
 * - first: half the gross, paid without withholding.
 * - second: the remainder, withholding contribution and income tax on the full gross.
 * - full: single payment with the same withholding.
 */
export function calculateThirteenthInstallment(
  params: {
    baseSalary: Money;
    monthsWorked: number;
    dependentCount: number;
    installment: ThirteenthInstallment;
    otherDeductions?: Money;
  },
  rules: Pick<PayrollRuleSet, "contribution" | "incomeTax">,
): ThirteenthInstallmentResult {
  const gross = calculateThirteenthGross(params.baseSalary, params.monthsWorked);
  const firstInstallment = roundMoney(gross / 2);
  const other = toNonNegative(params.otherDeductions);

  if (params.installment === "first") {
    return {
      installment: "first",
      gross,
      installmentGross: firstInstallment,
      contribution: 0,
      incomeTax: 0,
      otherDeductions: 0,
      totalDeductions: 0,
      net: firstInstallment,
    };
  }

  const installmentGross = params.installment === "second" ? roundMoney(gross - firstInstallment) : gross;
  const contribution = calculateContribution(gross, rules).amount;
  const incomeTax = calculateIncomeTax(gross, params.dependentCount, rules).tax;
  const totalDeductions = contribution + incomeTax + other;

  return {
    installment: params.installment,
    gross,
    installmentGross,
    contribution,
    incomeTax,
    otherDeductions: roundMoney(other),
    totalDeductions: roundMoney(totalDeductions),
    net: roundMoney(clampMin0(installmentGross - totalDeductions)),
  };
}
