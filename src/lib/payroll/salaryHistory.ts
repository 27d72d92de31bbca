// /src/lib/payroll/salaryHistory.ts
/**
 * Current-salary resolution over the append-only salary history.
 *
 * Calculators always take the salary as a plain number; callers resolve it
 * here first and only append a history entry when the amount really changed.
 */

import { isAfter } from "date-fns";

import type { SalaryHistoryEntry } from "@/contracts/employee";
import { roundMoney, type Money } from "./money";

/**
 * Amount of the latest entry effective on or before `asOf` (latest overall
 * when `asOf` is omitted); the snapshot's base salary when none applies.
 * Entries sharing an effective date resolve to the one appended last.
 */
export function resolveCurrentSalary(
  baseSalary: Money,
  history: readonly SalaryHistoryEntry[],
  asOf?: Date,
): Money {
  let current: SalaryHistoryEntry | null = null;

  for (const entry of history) {
    if (asOf && isAfter(entry.effectiveDate, asOf)) continue;
    if (!current || entry.effectiveDate.getTime() >= current.effectiveDate.getTime()) {
      current = entry;
    }
  }

  return current ? current.amount : baseSalary;
}

export function shouldRecordSalaryChange(previous: Money | null | undefined, next: Money): boolean {
  if (previous === null || previous === undefined) return true;
  return roundMoney(previous) !== roundMoney(next);
}

/** Returns a new history with `entry` appended, or the same array when the amount is unchanged. */
export function appendSalaryChange(
  history: readonly SalaryHistoryEntry[],
  entry: SalaryHistoryEntry,
): readonly SalaryHistoryEntry[] {
  const previous = history.length > 0 ? resolveCurrentSalary(0, history) : null;
  if (!shouldRecordSalaryChange(previous, entry.amount)) return history;
  return [...history, { ...entry, amount: roundMoney(entry.amount) }];
}
