/**
 * Fuzzy field matching for extraction results.
 *
 * Model output is not byte-stable, so each field type gets its own
 * tolerance instead of strict equality:
 * - list of acceptable values: membership
 * - string vs string: case-insensitive containment in either direction
 *   ("EDEKA" matches "EDEKA Müller", "TechShop Berlin GmbH" matches "TechShop Berlin")
 * - amounts: absolute difference below amountTolerance
 * - tax rates: absolute difference below taxRateTolerance
 * - everything else: strict equality
 */

export type ExpectedScalar = string | number | boolean;
export type ExpectedValue = ExpectedScalar | readonly ExpectedScalar[];

export type FieldKind = "text" | "amount" | "taxRate";

export interface MatchPolicy {
  /** Currency amounts, major units */
  amountTolerance: number;
  /** Percentage points */
  taxRateTolerance: number;
}

export const DEFAULT_MATCH_POLICY: Readonly<MatchPolicy> = {
  amountTolerance: 0.02,
  taxRateTolerance: 1,
};

function isList(value: ExpectedValue): value is readonly ExpectedScalar[] {
  return Array.isArray(value);
}

export function stringsOverlap(expected: string, actual: string): boolean {
  const e = expected.toLowerCase();
  const a = actual.toLowerCase();
  return a.includes(e) || e.includes(a);
}

export function withinTolerance(expected: number, actual: number, tolerance: number): boolean {
  return Math.abs(actual - expected) < tolerance;
}

export function numericTolerance(kind: FieldKind, policy: MatchPolicy): number {
  return kind === "taxRate" ? policy.taxRateTolerance : policy.amountTolerance;
}

export function matchesExpected(
  expected: ExpectedValue,
  actual: unknown,
  kind: FieldKind = "text",
  policy: MatchPolicy = DEFAULT_MATCH_POLICY
): boolean {
  if (isList(expected)) {
    return expected.some((candidate) => candidate === actual);
  }
  if (typeof expected === "string" && typeof actual === "string") {
    return stringsOverlap(expected, actual);
  }
  if (typeof expected === "number" && typeof actual === "number") {
    return withinTolerance(expected, actual, numericTolerance(kind, policy));
  }
  return actual === expected;
}

/**
 * One-directional coverage: every expected rate needs some actual rate
 * within tolerance. Extra actual rates never fail the check.
 */
export function ratesCovered(
  expectedRates: readonly number[],
  actualRates: readonly number[],
  tolerance: number = DEFAULT_MATCH_POLICY.taxRateTolerance
): boolean {
  return expectedRates.every((expected) =>
    actualRates.some((actual) => withinTolerance(expected, actual, tolerance))
  );
}

/** Rates from `expectedRates` that no actual rate covers */
export function uncoveredRates(
  expectedRates: readonly number[],
  actualRates: readonly number[],
  tolerance: number = DEFAULT_MATCH_POLICY.taxRateTolerance
): number[] {
  return expectedRates.filter(
    (expected) => !actualRates.some((actual) => withinTolerance(expected, actual, tolerance))
  );
}
