import { describe, it, expect } from "vitest";

import type { ClockEvent, ClockEventKind } from "@/contracts/timeClock";
import { calculateScheduledHours, calculateWorkedHours } from "./timeBank";

function punch(kind: ClockEventKind, hour: number, minute = 0): ClockEvent {
  return { kind, timestamp: new Date(2024, 5, 3, hour, minute) };
}

const fullDay = [punch("entry", 8), punch("break_start", 12), punch("break_end", 13), punch("exit", 18)];

describe("calculateWorkedHours", () => {
  it("splits a long day into regular and overtime hours", () => {
    expect(calculateWorkedHours(fullDay)).toEqual({
      regularHours: 8,
      overtimeHours: 1,
      totalHours: 9,
      intervals: 2,
      warnings: [],
    });
  });

  it("orders punches by time before pairing them", () => {
    expect(calculateWorkedHours([...fullDay].reverse())).toEqual(calculateWorkedHours(fullDay));
  });

  it("honours a custom regular-hours threshold", () => {
    const r = calculateWorkedHours(fullDay, 6);
    expect(r.regularHours).toBe(6);
    expect(r.overtimeHours).toBe(3);
  });

  it("rounds partial hours to two decimals", () => {
    const r = calculateWorkedHours([punch("entry", 8), punch("exit", 16, 20)]);
    expect(r.totalHours).toBe(8.33);
    expect(r.regularHours).toBe(8);
    expect(r.overtimeHours).toBe(0.33);
  });

  it("drops an interval that is never closed", () => {
    const r = calculateWorkedHours([punch("entry", 8), punch("break_start", 12), punch("break_end", 13)]);
    expect(r.totalHours).toBe(4);
    expect(r.warnings).toEqual(["Clock-in at 13:00 was never closed."]);
  });

  it("restarts the interval on a repeated clock-in", () => {
    const r = calculateWorkedHours([punch("entry", 8), punch("entry", 9), punch("exit", 17)]);
    expect(r.totalHours).toBe(8);
    expect(r.intervals).toBe(1);
    expect(r.warnings).toEqual(["Clock-in at 09:00 replaced an unclosed clock-in at 08:00."]);
  });

  it("ignores a clock-out with nothing open", () => {
    const r = calculateWorkedHours([punch("exit", 7), punch("entry", 8), punch("exit", 12)]);
    expect(r.totalHours).toBe(4);
    expect(r.warnings).toEqual(["Clock-out (exit) at 07:00 has no matching clock-in."]);
  });

  it("skips punches with invalid timestamps", () => {
    const r = calculateWorkedHours([{ kind: "entry", timestamp: new Date(Number.NaN) }, ...fullDay]);
    expect(r.totalHours).toBe(9);
    expect(r.warnings).toEqual(["Ignored entry punch with an invalid timestamp."]);
  });

  it("is zero for an empty day", () => {
    expect(calculateWorkedHours([])).toEqual({
      regularHours: 0,
      overtimeHours: 0,
      totalHours: 0,
      intervals: 0,
      warnings: [],
    });
  });
});

describe("calculateScheduledHours", () => {
  it("subtracts the break from the scheduled block", () => {
    expect(calculateScheduledHours({ entry: "08:00", exit: "17:00", breakStart: "12:00", breakEnd: "13:00" })).toBe(8);
  });

  it("ignores a break with only one end", () => {
    expect(calculateScheduledHours({ entry: "08:00", exit: "17:00", breakStart: "12:00" })).toBe(9);
  });

  it("wraps shifts past midnight", () => {
    expect(calculateScheduledHours({ entry: "22:00", exit: "06:00" })).toBe(8);
    expect(calculateScheduledHours({ entry: "22:00", exit: "06:30", breakStart: "23:45", breakEnd: "00:15" })).toBe(8);
  });

  it("is null without a valid entry and exit", () => {
    expect(calculateScheduledHours({ entry: "08:00" })).toBeNull();
    expect(calculateScheduledHours({ entry: "25:00", exit: "17:00" })).toBeNull();
    expect(calculateScheduledHours({ entry: null, exit: "17:00" })).toBeNull();
  });
});
