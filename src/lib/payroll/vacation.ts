// /src/lib/payroll/vacation.ts
/**
 * Vacation pay.
 *
 * - Daily rate = salary / 30.
 * - Constitutional bonus = one third of the vacation value, plus one third of
 *   the cash-out (pecuniary allowance) value when days are sold.
 * - Each output is rounded on its own; they are persisted as separate line
 *   items, so `total` can differ from the sum of the rounded parts by 0.01.
 */

import { addMonths, addYears, differenceInCalendarDays, isAfter, startOfDay, subDays } from "date-fns";

import { MAX_CASH_OUT_DAYS, MAX_VACATION_DAYS, type VacationRequest } from "@/contracts/vacation";
import { roundMoney, toNonNegative, type Money } from "./money";
import { VACATION_USE_WINDOW_MONTHS, validateVacationPeriod } from "./validators";

export type VacationPayResult = {
  vacationValue: Money;
  cashOutValue: Money;
  constitutionalBonus: Money;
  total: Money;
};

export type AcquisitionPeriod = { start: Date; end: Date };

/**
 * Zeros when the salary or days taken are not positive, or when either day
 * count exceeds its legal maximum (30 taken, 10 cashed out); such requests
 * are reported by validateVacationRequest instead of being paid in part.
 */
export function calculateVacationPay(
  baseSalary: Money,
  daysTaken: number,
  cashOutDays = 0,
): VacationPayResult {
  const salary = toNonNegative(baseSalary);
  const days = Math.floor(toNonNegative(daysTaken));
  const sold = Math.floor(toNonNegative(cashOutDays));

  if (salary === 0 || days === 0 || days > MAX_VACATION_DAYS || sold > MAX_CASH_OUT_DAYS) {
    return { vacationValue: 0, cashOutValue: 0, constitutionalBonus: 0, total: 0 };
  }

  const dailyRate = salary / 30;

  const vacationValue = dailyRate * days;
  let constitutionalBonus = vacationValue / 3;

  let cashOutValue = 0;
  if (sold > 0) {
    cashOutValue = dailyRate * sold;
    constitutionalBonus += cashOutValue / 3;
  }

  const total = vacationValue + cashOutValue + constitutionalBonus;

  return {
    vacationValue: roundMoney(vacationValue),
    cashOutValue: roundMoney(cashOutValue),
    constitutionalBonus: roundMoney(constitutionalBonus),
    total: roundMoney(total),
  };
}

/**
 * Twelve-month accrual window containing `referenceDate`, anchored on the
 * hire date. Full years are counted in 365-day blocks; a reference date
 * before admission yields the first window.
 */
export function calculateAcquisitionPeriod(
  admissionDate: Date,
  referenceDate: Date = new Date(),
): AcquisitionPeriod {
  const admission = startOfDay(admissionDate);
  const elapsedDays = differenceInCalendarDays(startOfDay(referenceDate), admission);
  const fullYears = Math.max(0, Math.floor(elapsedDays / 365));

  const start = addYears(admission, fullYears);
  const end = subDays(addYears(start, 1), 1);

  return { start, end };
}

/** Last day on which leave for this acquisition period may start. */
export function calculateVacationDeadline(acquisitionEnd: Date): Date {
  return addMonths(startOfDay(acquisitionEnd), VACATION_USE_WINDOW_MONTHS);
}

export function isVacationOverdue(acquisitionEnd: Date, asOf: Date = new Date()): boolean {
  return isAfter(startOfDay(asOf), calculateVacationDeadline(acquisitionEnd));
}

export function totalVacationDays(request: Pick<VacationRequest, "daysTaken" | "cashOutDays">): number {
  return request.daysTaken + request.cashOutDays;
}

/** Period legality plus the day-count limits of a leave record. */
export function validateVacationRequest(request: VacationRequest): string[] {
  const violations = validateVacationPeriod(
    request.start,
    request.end,
    request.acquisitionStart,
    request.acquisitionEnd,
  );

  if (!Number.isInteger(request.daysTaken) || request.daysTaken < 1 || request.daysTaken > MAX_VACATION_DAYS) {
    violations.push(`Days taken must be between 1 and ${MAX_VACATION_DAYS}.`);
  }
  if (
    !Number.isInteger(request.cashOutDays) ||
    request.cashOutDays < 0 ||
    request.cashOutDays > MAX_CASH_OUT_DAYS
  ) {
    violations.push(`Cash-out days must be between 0 and ${MAX_CASH_OUT_DAYS}.`);
  }
  if (isAfter(request.acquisitionStart, request.acquisitionEnd)) {
    violations.push("Acquisition period end must not precede its start.");
  }

  return violations;
}
