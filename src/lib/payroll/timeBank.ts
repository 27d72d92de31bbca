// /src/lib/payroll/timeBank.ts
// Daily worked hours from clock punches, split into regular and overtime.

import { format, isValid } from "date-fns";

import { isClockIn, type ClockEvent } from "@/contracts/timeClock";
import { clampMin0, roundHalfUp } from "./money";

export const DEFAULT_REGULAR_HOURS = 8;

const MS_PER_HOUR = 60 * 60 * 1000;

export type WorkedHoursResult = {
  regularHours: number;
  overtimeHours: number;
  totalHours: number;
  /** Closed in/out intervals that contributed to the total. */
  intervals: number;
  /** Unmatched punches; they contribute nothing to the total. */
  warnings: string[];
};

function hhmm(d: Date): string {
  return format(d, "HH:mm");
}

/**
 * Entry and break_end open an interval; exit and break_start close it.
 * A second clock-in while an interval is open restarts the interval from the
 * later punch. A clock-out with nothing open, and an interval left open at
 * the end of the day, are dropped. Every such case is reported in `warnings`.
 */
export function calculateWorkedHours(
  events: readonly ClockEvent[],
  regularHours: number = DEFAULT_REGULAR_HOURS,
): WorkedHoursResult {
  const warnings: string[] = [];

  const valid = events.filter((e) => {
    if (isValid(e.timestamp)) return true;
    warnings.push(`Ignored ${e.kind} punch with an invalid timestamp.`);
    return false;
  });
  const ordered = [...valid].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());

  let totalMs = 0;
  let intervals = 0;
  let openedAt: Date | null = null;

  for (const event of ordered) {
    if (isClockIn(event.kind)) {
      if (openedAt) {
        warnings.push(`Clock-in at ${hhmm(event.timestamp)} replaced an unclosed clock-in at ${hhmm(openedAt)}.`);
      }
      openedAt = event.timestamp;
      continue;
    }

    if (!openedAt) {
      warnings.push(`Clock-out (${event.kind}) at ${hhmm(event.timestamp)} has no matching clock-in.`);
      continue;
    }

    totalMs += event.timestamp.getTime() - openedAt.getTime();
    intervals++;
    openedAt = null;
  }

  if (openedAt) {
    warnings.push(`Clock-in at ${hhmm(openedAt)} was never closed.`);
  }

  const total = totalMs / MS_PER_HOUR;
  const regularCap = regularHours > 0 ? regularHours : DEFAULT_REGULAR_HOURS;

  return {
    regularHours: roundHalfUp(Math.min(total, regularCap), 2),
    overtimeHours: roundHalfUp(clampMin0(total - regularCap), 2),
    totalHours: roundHalfUp(total, 2),
    intervals,
    warnings,
  };
}

export type WorkBlock = {
  /** "HH:mm" */
  entry?: string | null;
  exit?: string | null;
  breakStart?: string | null;
  breakEnd?: string | null;
};

function minutesOf(time: string | null | undefined): number | null {
  if (!time) return null;
  const m = /^(\d{1,2}):(\d{2})$/.exec(time.trim());
  if (!m) return null;
  const hours = Number(m[1]);
  const minutes = Number(m[2]);
  if (hours > 23 || minutes > 59) return null;
  return hours * 60 + minutes;
}

/** Minutes from `from` to `to`, wrapping past midnight. */
function span(from: number, to: number): number {
  return to >= from ? to - from : to + 24 * 60 - from;
}

/**
 * Expected hours of a scheduled work block (exit - entry, minus the break
 * when both break ends are set). null when entry or exit is missing.
 */
export function calculateScheduledHours(block: WorkBlock): number | null {
  const entry = minutesOf(block.entry);
  const exit = minutesOf(block.exit);
  if (entry === null || exit === null) return null;

  let minutes = span(entry, exit);

  const breakStart = minutesOf(block.breakStart);
  const breakEnd = minutesOf(block.breakEnd);
  if (breakStart !== null && breakEnd !== null) {
    minutes -= span(breakStart, breakEnd);
  }

  return roundHalfUp(clampMin0(minutes) / 60, 2);
}
