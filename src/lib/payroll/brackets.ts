// /src/lib/payroll/brackets.ts
// Progressive bracket evaluator shared by the contribution and income-tax calculators.

import { clampMin0, percentOf, roundHalfUp, roundMoney, type Money, type Percent } from "./money";
import type { TaxBracket, TaxTable } from "./payrollTables";

export type BracketSlice = {
  bracketIndex: number;
  /** Portion of the base taxed in this bracket (marginal) or the whole base (flat). */
  taxedAmount: Money;
  rate: Percent;
  tax: Money;
};

export type BracketEvaluation = {
  tax: Money;
  effectiveRate: Percent;
  /** Rate of the bracket containing the base; 0 when base <= 0. */
  marginalRate: Percent;
  bracketIndex: number | null;
  slices: BracketSlice[];
};

function emptyEvaluation(): BracketEvaluation {
  return { tax: 0, effectiveRate: 0, marginalRate: 0, bracketIndex: null, slices: [] };
}

function upperOf(b: TaxBracket): number {
  return b.upperBoundInclusive ?? Number.POSITIVE_INFINITY;
}

function ratePercent(rate: number): Percent {
  return roundHalfUp(rate * 100, 4);
}

/**
 * Index of the bracket containing `base`.
 * Brackets are contiguous in 0.01 steps, so the first one whose upper bound
 * is >= base is the match; a base with sub-cent precision that falls inside
 * a step gap resolves to the higher bracket.
 */
export function findBracketIndex(table: TaxTable, base: Money): number {
  const idx = table.brackets.findIndex((b) => base <= upperOf(b));
  return idx === -1 ? table.brackets.length - 1 : idx;
}

function evaluateMarginal(table: TaxTable, base: Money): BracketEvaluation {
  let tax = 0;
  const slices: BracketSlice[] = [];

  table.brackets.forEach((b, i) => {
    if (base <= b.lowerBoundInclusive) return;
    const amountInBracket = Math.min(base, upperOf(b)) - b.lowerBoundInclusive;
    if (amountInBracket <= 0) return;

    const sliceTax = amountInBracket * b.rate;
    tax += sliceTax;
    slices.push({
      bracketIndex: i,
      taxedAmount: roundMoney(amountInBracket),
      rate: ratePercent(b.rate),
      tax: roundMoney(sliceTax),
    });
  });

  const idx = findBracketIndex(table, base);
  const bracket = table.brackets[idx];

  return {
    tax: roundMoney(tax),
    effectiveRate: percentOf(tax, base),
    marginalRate: bracket ? ratePercent(bracket.rate) : 0,
    bracketIndex: idx,
    slices,
  };
}

function evaluateFlatWithDeduction(table: TaxTable, base: Money): BracketEvaluation {
  const idx = findBracketIndex(table, base);
  const bracket = table.brackets[idx];
  if (!bracket) return emptyEvaluation();

  const tax = clampMin0(base * bracket.rate - bracket.deduction);

  return {
    tax: roundMoney(tax),
    effectiveRate: percentOf(tax, base),
    marginalRate: ratePercent(bracket.rate),
    bracketIndex: idx,
    slices: [
      {
        bracketIndex: idx,
        taxedAmount: roundMoney(base),
        rate: ratePercent(bracket.rate),
        tax: roundMoney(tax),
      },
    ],
  };
}

/**
 * Evaluate `base` against a progressive table.
 * - marginal: each bracket taxes only the slice of base inside it.
 * - flat_with_deduction: base * rate - deduction of the containing bracket, floored at 0.
 */
export function evaluateTaxTable(table: TaxTable, base: Money): BracketEvaluation {
  if (!(base > 0) || !Number.isFinite(base)) return emptyEvaluation();

  switch (table.kind) {
    case "marginal":
      return evaluateMarginal(table, base);
    case "flat_with_deduction":
      return evaluateFlatWithDeduction(table, base);
    default: {
      const exhaustive: never = table.kind;
      return exhaustive;
    }
  }
}
