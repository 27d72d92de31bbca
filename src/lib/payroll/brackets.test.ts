import { describe, it, expect } from "vitest";

import { evaluateTaxTable, findBracketIndex } from "./brackets";
import type { TaxTable } from "./payrollTables";

const marginal: TaxTable = {
  kind: "marginal",
  brackets: [
    { lowerBoundInclusive: 0, upperBoundInclusive: 100, rate: 0.1, deduction: 0 },
    { lowerBoundInclusive: 100.01, upperBoundInclusive: null, rate: 0.2, deduction: 0 },
  ],
};

const flat: TaxTable = {
  kind: "flat_with_deduction",
  brackets: [
    { lowerBoundInclusive: 0, upperBoundInclusive: 1000, rate: 0, deduction: 0 },
    { lowerBoundInclusive: 1000.01, upperBoundInclusive: null, rate: 0.1, deduction: 100 },
  ],
};

describe("findBracketIndex", () => {
  it("matches inclusive upper bounds", () => {
    expect(findBracketIndex(flat, 1000)).toBe(0);
    expect(findBracketIndex(flat, 1000.01)).toBe(1);
  });

  it("resolves a base inside the step gap to the higher bracket", () => {
    expect(findBracketIndex(flat, 1000.005)).toBe(1);
  });
});

describe("evaluateTaxTable", () => {
  it("taxes each slice of a marginal table separately", () => {
    const r = evaluateTaxTable(marginal, 150);

    expect(r.tax).toBe(20);
    expect(r.effectiveRate).toBe(13.33);
    expect(r.marginalRate).toBe(20);
    expect(r.bracketIndex).toBe(1);
    expect(r.slices).toEqual([
      { bracketIndex: 0, taxedAmount: 100, rate: 10, tax: 10 },
      { bracketIndex: 1, taxedAmount: 49.99, rate: 20, tax: 10 },
    ]);
  });

  it("applies rate and deduction of the containing bracket for flat tables", () => {
    const r = evaluateTaxTable(flat, 2000);

    expect(r.tax).toBe(100);
    expect(r.effectiveRate).toBe(5);
    expect(r.marginalRate).toBe(10);
    expect(r.slices).toEqual([{ bracketIndex: 1, taxedAmount: 2000, rate: 10, tax: 100 }]);
  });

  it("reports the zero-rate bracket below the exemption limit", () => {
    const r = evaluateTaxTable(flat, 500);

    expect(r.tax).toBe(0);
    expect(r.bracketIndex).toBe(0);
    expect(r.marginalRate).toBe(0);
  });

  it("returns an empty evaluation for non-positive or non-finite bases", () => {
    for (const base of [0, -10, Number.NaN, Number.POSITIVE_INFINITY]) {
      expect(evaluateTaxTable(marginal, base)).toEqual({
        tax: 0,
        effectiveRate: 0,
        marginalRate: 0,
        bracketIndex: null,
        slices: [],
      });
    }
  });

  it("does not share slice arrays between empty results", () => {
    const a = evaluateTaxTable(marginal, 0);
    a.slices.push({ bracketIndex: 0, taxedAmount: 1, rate: 1, tax: 1 });

    expect(evaluateTaxTable(marginal, 0).slices).toEqual([]);
  });
});
