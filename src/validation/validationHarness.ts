/**
 * Fixture Validation Harness
 *
 * Runs extraction against documents with known values and scores each field
 * with the fuzzy rules from fieldMatchers. Fixtures run one after another so
 * failures are attributed to exactly one document.
 */

import { resolve } from "node:path";
import type { ReceiptExtraction } from "../extraction/receiptSchema";
import { ConfigError, errorMessage } from "../utils/errors";
import {
  DEFAULT_MATCH_POLICY,
  matchesExpected,
  ratesCovered,
  type ExpectedValue,
  type FieldKind,
  type MatchPolicy,
} from "./fieldMatchers";
import type { ExpectedReceiptFields, ReceiptFixture } from "./receiptFixtures";

// ============================================================================
// Types
// ============================================================================

/** Extracts one document, given its resolved path */
export type ReceiptExtractor = (documentPath: string) => Promise<ReceiptExtraction>;

export interface FieldCheckResult {
  fixtureId: string;
  field: string;
  expected: ExpectedValue;
  actual: unknown;
  passed: boolean;
}

export interface ValidationFailure {
  fixtureId: string;
  field: string;
  /** null when extraction itself failed */
  expected: ExpectedValue | null;
  actual: unknown;
  message: string;
}

export interface FixtureReport {
  fixture: ReceiptFixture;
  documentPath: string;
  checks: FieldCheckResult[];
  passed: number;
  failed: number;
  /** Set when extraction failed and no field was checked */
  error?: string;
}

export interface ValidationReport {
  startedAt: Date;
  completedAt: Date;
  passed: number;
  failed: number;
  failures: ValidationFailure[];
  fixtures: FixtureReport[];
}

export type ValidationEvent =
  | { type: "fixture-start"; fixture: ReceiptFixture; documentPath: string; index: number; total: number }
  | { type: "check"; fixture: ReceiptFixture; result: FieldCheckResult }
  | { type: "fixture-error"; fixture: ReceiptFixture; error: string };

export interface ValidateOptions {
  /** Directory fixture documents are resolved against (default: cwd) */
  fixturesDir?: string;
  /** Tolerances, overridable per run */
  policy?: MatchPolicy;
  /** Only run fixtures with these ids */
  only?: string[];
  onProgress?: (event: ValidationEvent) => void;
}

// ============================================================================
// Field checks
// ============================================================================

interface FieldCheck {
  field: string;
  kind: FieldKind;
  expected: (fields: ExpectedReceiptFields) => ExpectedValue | null | undefined;
  actual: (result: ReceiptExtraction) => unknown;
}

export const FIELD_CHECKS: readonly FieldCheck[] = [
  { field: "issuer.name", kind: "text", expected: (e) => e.issuerName, actual: (r) => r.issuer.name },
  { field: "issuer.address.city", kind: "text", expected: (e) => e.addressCity, actual: (r) => r.issuer.address.city },
  {
    field: "issuer.address.country",
    kind: "text",
    expected: (e) => e.addressCountry,
    actual: (r) => r.issuer.address.country,
  },
  { field: "issuer.vat_id", kind: "text", expected: (e) => e.vatId, actual: (r) => r.issuer.vat_id },
  { field: "receipt.number", kind: "text", expected: (e) => e.receiptNumber, actual: (r) => r.receipt.number },
  { field: "receipt.date", kind: "text", expected: (e) => e.receiptDate, actual: (r) => r.receipt.date },
  { field: "receipt.type", kind: "text", expected: (e) => e.receiptType, actual: (r) => r.receipt.type },
  { field: "amounts.gross", kind: "amount", expected: (e) => e.amountsGross, actual: (r) => r.amounts.gross },
  { field: "amounts.net", kind: "amount", expected: (e) => e.amountsNet, actual: (r) => r.amounts.net },
  { field: "amounts.currency", kind: "text", expected: (e) => e.amountsCurrency, actual: (r) => r.amounts.currency },
  { field: "payment.method", kind: "text", expected: (e) => e.paymentMethod, actual: (r) => r.payment.method },
  { field: "payment.card_last_4", kind: "text", expected: (e) => e.cardLast4, actual: (r) => r.payment.card_last_4 },
  { field: "issuer.tax_number", kind: "text", expected: (e) => e.taxNumber, actual: (r) => r.issuer.tax_number },
];

export const TAX_RATES_FIELD = "taxes.rates";

/**
 * Render a value for report lines: lists as "[19, 7]", null as "null".
 */
export function formatValue(value: unknown): string {
  if (Array.isArray(value)) return `[${value.map(formatValue).join(", ")}]`;
  if (value === null) return "null";
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

export function describeFailure(field: string, expected: ExpectedValue, actual: unknown): string {
  if (field === TAX_RATES_FIELD) {
    return `${field}: expected ${formatValue(expected)}, got ${formatValue(actual)}`;
  }
  return `${field}: expected '${formatValue(expected)}', got '${formatValue(actual)}'`;
}

/**
 * Score one extraction result against a fixture's expectations.
 * Expectations that are null or missing produce no check at all.
 */
export function checkFields(
  fixture: ReceiptFixture,
  result: ReceiptExtraction,
  policy: MatchPolicy = DEFAULT_MATCH_POLICY
): FieldCheckResult[] {
  const checks: FieldCheckResult[] = [];

  for (const check of FIELD_CHECKS) {
    const expected = check.expected(fixture.expected);
    if (expected === null || expected === undefined) continue;

    const actual = check.actual(result);
    checks.push({
      fixtureId: fixture.id,
      field: check.field,
      expected,
      actual,
      passed: matchesExpected(expected, actual, check.kind, policy),
    });
  }

  const expectedRates = fixture.expected.taxRates;
  if (expectedRates !== null && expectedRates !== undefined) {
    const actualRates = result.taxes.map((tax) => tax.rate);
    checks.push({
      fixtureId: fixture.id,
      field: TAX_RATES_FIELD,
      expected: expectedRates,
      actual: actualRates,
      passed: ratesCovered(expectedRates, actualRates, policy.taxRateTolerance),
    });
  }

  return checks;
}

// ============================================================================
// Runner
// ============================================================================

function selectFixtures(fixtures: readonly ReceiptFixture[], only?: string[]): readonly ReceiptFixture[] {
  if (!only?.length) return fixtures;

  const unknown = only.filter((id) => !fixtures.some((fixture) => fixture.id === id));
  if (unknown.length > 0) {
    throw new ConfigError(`Unknown fixture id(s): ${unknown.join(", ")}`);
  }
  return fixtures.filter((fixture) => only.includes(fixture.id));
}

export async function validateFixtures(
  fixtures: readonly ReceiptFixture[],
  extractor: ReceiptExtractor,
  options: ValidateOptions = {}
): Promise<ValidationReport> {
  const startedAt = new Date();
  const policy = options.policy ?? DEFAULT_MATCH_POLICY;
  const selected = selectFixtures(fixtures, options.only);

  const reports: FixtureReport[] = [];
  const failures: ValidationFailure[] = [];

  for (let i = 0; i < selected.length; i++) {
    const fixture = selected[i];
    const documentPath = resolve(options.fixturesDir ?? ".", fixture.document);
    options.onProgress?.({ type: "fixture-start", fixture, documentPath, index: i, total: selected.length });

    let result: ReceiptExtraction;
    try {
      result = await extractor(documentPath);
    } catch (error) {
      // Counts as a single failure; this fixture's field checks are skipped
      const message = errorMessage(error);
      options.onProgress?.({ type: "fixture-error", fixture, error: message });
      failures.push({
        fixtureId: fixture.id,
        field: "extraction",
        expected: null,
        actual: null,
        message: `extraction: ${message}`,
      });
      reports.push({ fixture, documentPath, checks: [], passed: 0, failed: 1, error: message });
      continue;
    }

    const checks = checkFields(fixture, result, policy);
    for (const check of checks) {
      options.onProgress?.({ type: "check", fixture, result: check });
      if (!check.passed) {
        failures.push({
          fixtureId: fixture.id,
          field: check.field,
          expected: check.expected,
          actual: check.actual,
          message: describeFailure(check.field, check.expected, check.actual),
        });
      }
    }

    const passed = checks.filter((check) => check.passed).length;
    reports.push({ fixture, documentPath, checks, passed, failed: checks.length - passed });
  }

  return {
    startedAt,
    completedAt: new Date(),
    passed: reports.reduce((sum, report) => sum + report.passed, 0),
    failed: reports.reduce((sum, report) => sum + report.failed, 0),
    failures,
    fixtures: reports,
  };
}

/** A run fails as soon as any fixture has at least one failed check */
export function validationSucceeded(report: ValidationReport): boolean {
  return report.failed === 0;
}
