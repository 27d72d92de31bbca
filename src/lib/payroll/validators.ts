// /src/lib/payroll/validators.ts
/**
 * HR validators. None of these throw: each returns a boolean or a list of
 * human-readable violations (empty = valid) and the caller decides whether
 * to block or warn.
 */

import { addMonths, differenceInCalendarDays, isAfter, isValid } from "date-fns";

export const MINIMUM_WORKING_AGE = 14;
export const MINIMUM_NON_APPRENTICE_AGE = 16;
export const MAX_VACATION_SPAN_DAYS = 30;
export const VACATION_USE_WINDOW_MONTHS = 12;

function checkDigit(digits: number[], firstWeight: number): number {
  let sum = 0;
  digits.forEach((d, i) => {
    sum += d * (firstWeight - i);
  });
  const digit = (sum * 10) % 11;
  return digit === 10 ? 0 : digit;
}

/**
 * Brazilian individual taxpayer ID (CPF). Formatting characters are ignored;
 * eleven identical digits are rejected even though they pass the checksum.
 */
export function isValidNationalId(id: string): boolean {
  const digits = id.replace(/\D/g, "");
  if (digits.length !== 11 || /^(\d)\1{10}$/.test(digits)) return false;

  const nums = digits.split("").map(Number);
  const first = checkDigit(nums.slice(0, 9), 10);
  const second = checkDigit(nums.slice(0, 10), 11);

  return nums[9] === first && nums[10] === second;
}

/** Whole years between two dates, counted as 365-day blocks. */
export function yearsBetween(from: Date, to: Date): number {
  return Math.floor(differenceInCalendarDays(to, from) / 365);
}

export function validateVacationPeriod(
  start: Date,
  end: Date,
  acquisitionStart: Date,
  acquisitionEnd: Date,
): string[] {
  const violations: string[] = [];

  if (![start, end, acquisitionStart, acquisitionEnd].every(isValid)) {
    return ["Vacation and acquisition dates must be valid dates."];
  }

  if (!isAfter(end, start)) {
    violations.push("Vacation end date must be after the start date.");
  }

  const span = differenceInCalendarDays(end, start) + 1;
  if (span > MAX_VACATION_SPAN_DAYS) {
    violations.push(`Vacation period cannot exceed ${MAX_VACATION_SPAN_DAYS} days.`);
  }

  const deadline = addMonths(acquisitionEnd, VACATION_USE_WINDOW_MONTHS);
  if (isAfter(start, deadline)) {
    violations.push(
      `Vacation must start within ${VACATION_USE_WINDOW_MONTHS} months after the acquisition period ends.`,
    );
  }

  return violations;
}

export function validateMinimumAge(birthDate: Date, admissionDate: Date): string[] {
  if (!isValid(birthDate) || !isValid(admissionDate)) {
    return ["Birth and admission dates must be valid dates."];
  }

  const age = yearsBetween(birthDate, admissionDate);

  if (age < MINIMUM_WORKING_AGE) {
    return [`Minimum working age is ${MINIMUM_WORKING_AGE}.`];
  }
  if (age < MINIMUM_NON_APPRENTICE_AGE) {
    return [
      `Between ${MINIMUM_WORKING_AGE} and ${MINIMUM_NON_APPRENTICE_AGE} years old, hiring is allowed only as an apprentice.`,
    ];
  }
  return [];
}
