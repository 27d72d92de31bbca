import { describe, it, expect } from "vitest";

import {
  calculateAcquisitionPeriod,
  calculateVacationDeadline,
  calculateVacationPay,
  isVacationOverdue,
  totalVacationDays,
  validateVacationRequest,
} from "./vacation";

describe("calculateVacationPay", () => {
  it("pays thirty days plus the one-third bonus", () => {
    expect(calculateVacationPay(3000, 30)).toEqual({
      vacationValue: 3000,
      cashOutValue: 0,
      constitutionalBonus: 1000,
      total: 4000,
    });
  });

  it("adds the bonus on cashed-out days too", () => {
    expect(calculateVacationPay(3000, 20, 10)).toEqual({
      vacationValue: 2000,
      cashOutValue: 1000,
      constitutionalBonus: 1000,
      total: 4000,
    });
    expect(calculateVacationPay(2500, 30, 10)).toEqual({
      vacationValue: 2500,
      cashOutValue: 833.33,
      constitutionalBonus: 1111.11,
      total: 4444.44,
    });
  });

  it("rounds each line item on its own", () => {
    expect(calculateVacationPay(1234.56, 15, 5)).toEqual({
      vacationValue: 617.28,
      cashOutValue: 205.76,
      constitutionalBonus: 274.35,
      total: 1097.39,
    });
  });

  it("pays nothing for day counts above their legal maximums", () => {
    const zero = { vacationValue: 0, cashOutValue: 0, constitutionalBonus: 0, total: 0 };
    expect(calculateVacationPay(3000, 31)).toEqual(zero);
    expect(calculateVacationPay(3000, 20, 11)).toEqual(zero);
    expect(calculateVacationPay(3000, 30, 10).total).toBe(5333.33);
  });

  it("is zero without days or salary", () => {
    const zero = { vacationValue: 0, cashOutValue: 0, constitutionalBonus: 0, total: 0 };
    expect(calculateVacationPay(3000, 0, 10)).toEqual(zero);
    expect(calculateVacationPay(0, 30)).toEqual(zero);
    expect(calculateVacationPay(-3000, 30)).toEqual(zero);
  });
});

describe("calculateAcquisitionPeriod", () => {
  it("finds the accrual year containing the reference date", () => {
    const period = calculateAcquisitionPeriod(new Date(2020, 2, 15), new Date(2024, 5, 1));

    expect(period.start).toEqual(new Date(2024, 2, 15));
    expect(period.end).toEqual(new Date(2025, 2, 14));
  });

  it("returns the first year before the first anniversary", () => {
    const period = calculateAcquisitionPeriod(new Date(2020, 2, 15), new Date(2021, 2, 10));

    expect(period.start).toEqual(new Date(2020, 2, 15));
    expect(period.end).toEqual(new Date(2021, 2, 14));
  });

  it("returns the first year for a reference date before admission", () => {
    const period = calculateAcquisitionPeriod(new Date(2020, 2, 15), new Date(2019, 0, 1));

    expect(period.start).toEqual(new Date(2020, 2, 15));
  });
});

describe("vacation deadline", () => {
  const acquisitionEnd = new Date(2025, 2, 14);

  it("falls twelve months after the acquisition period", () => {
    expect(calculateVacationDeadline(acquisitionEnd)).toEqual(new Date(2026, 2, 14));
  });

  it("is overdue only after the deadline day", () => {
    expect(isVacationOverdue(acquisitionEnd, new Date(2026, 2, 14, 18, 30))).toBe(false);
    expect(isVacationOverdue(acquisitionEnd, new Date(2026, 2, 15))).toBe(true);
  });
});

describe("validateVacationRequest", () => {
  it("accepts a legal request", () => {
    const request = {
      acquisitionStart: new Date(2023, 0, 10),
      acquisitionEnd: new Date(2024, 0, 9),
      start: new Date(2024, 1, 1),
      end: new Date(2024, 1, 20),
      daysTaken: 20,
      cashOutDays: 10,
    };

    expect(validateVacationRequest(request)).toEqual([]);
    expect(totalVacationDays(request)).toBe(30);
  });

  it("reports every violation", () => {
    expect(
      validateVacationRequest({
        acquisitionStart: new Date(2024, 5, 1),
        acquisitionEnd: new Date(2024, 0, 9),
        start: new Date(2025, 2, 1),
        end: new Date(2025, 3, 15),
        daysTaken: 31,
        cashOutDays: 11,
      }),
    ).toEqual([
      "Vacation period cannot exceed 30 days.",
      "Vacation must start within 12 months after the acquisition period ends.",
      "Days taken must be between 1 and 30.",
      "Cash-out days must be between 0 and 10.",
      "Acquisition period end must not precede its start.",
    ]);
  });
});
