/**
 * Command surface tests: extract-receipts and validate-receipts
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join, resolve } from "node:path";
import { EXTRACT_USAGE, runExtractCommand, type CliIO } from "../cli/extractCommand";
import { runValidateCommand } from "../cli/validateCommand";
import { RECEIPT_FIXTURES } from "../validation/receiptFixtures";
import type { ReceiptExtractor } from "../validation/validationHarness";
import {
  TEST_API_KEY,
  TEST_CONFIG,
  createElectronicsExtraction,
  createSupermarketExtraction,
  mockGeminiFetch,
  silenceConsoleError,
} from "./setup";

function captureIO(): CliIO & { out: () => string; err: () => string } {
  let out = "";
  let err = "";
  return {
    stdout: (text) => {
      out += text;
    },
    stderr: (text) => {
      err += text;
    },
    out: () => out,
    err: () => err,
  };
}

describe("extract-receipts", () => {
  let dir: string;

  beforeEach(() => {
    silenceConsoleError();
    dir = mkdtempSync(join(tmpdir(), "receipt-cli-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("prints usage without arguments", async () => {
    const io = captureIO();

    expect(await runExtractCommand([], { io })).toBe(1);
    expect(io.err()).toBe(`${EXTRACT_USAGE}\n`);
  });

  it("prints a single record as indented JSON with literal non-ASCII text", async () => {
    const path = join(dir, "slip.jpg");
    writeFileSync(path, "jpeg");
    const record = createSupermarketExtraction();
    const io = captureIO();

    const code = await runExtractCommand([path], {
      io,
      extractOptions: { apiKey: TEST_API_KEY, config: TEST_CONFIG, fetchFn: mockGeminiFetch(record) },
    });

    expect(code).toBe(0);
    expect(io.out()).toBe(`${JSON.stringify(record, null, 2)}\n`);
    expect(io.out()).toContain('"city": "München"');
  });

  it("prints an array for several documents", async () => {
    const first = join(dir, "a.jpg");
    const second = join(dir, "b.png");
    writeFileSync(first, "jpeg");
    writeFileSync(second, "png");
    const record = createElectronicsExtraction();
    const io = captureIO();

    await runExtractCommand([first, second], {
      io,
      extractOptions: { apiKey: TEST_API_KEY, config: TEST_CONFIG, fetchFn: mockGeminiFetch(record) },
    });

    expect(JSON.parse(io.out())).toEqual([record, record]);
  });

  it("names a missing path before calling the API", async () => {
    const present = join(dir, "a.jpg");
    const missing = join(dir, "missing.jpg");
    writeFileSync(present, "jpeg");
    const fetchFn = mockGeminiFetch(createSupermarketExtraction());
    const io = captureIO();

    const code = await runExtractCommand([present, missing], {
      io,
      extractOptions: { apiKey: TEST_API_KEY, config: TEST_CONFIG, fetchFn },
    });

    expect(code).toBe(1);
    expect(io.err()).toBe(`Error: File not found: ${missing}\n`);
    expect(io.out()).toBe("");
    expect(fetchFn).not.toHaveBeenCalled();
  });
});

describe("validate-receipts", () => {
  beforeEach(() => {
    silenceConsoleError();
  });

  it("prints per-field lines and exits 0 when everything passes", async () => {
    const io = captureIO();
    const extractor = vi.fn<ReceiptExtractor>(async () => createElectronicsExtraction());

    const code = await runValidateCommand(["electronics-invoice"], {
      io,
      extractor,
      fixturesDir: "fixtures",
      extractOptions: { config: TEST_CONFIG },
    });

    expect(code).toBe(0);
    const lines = io.out().split("\n");
    expect(lines).toContain(`Testing: ${resolve("fixtures", "ai_receipt_02.jpg")}`);
    expect(lines).toContain("Description: TechShop Berlin invoice");
    expect(lines).toContain("  ✓ issuer.name: TechShop Berlin");
    expect(lines).toContain("  ✓ taxes.rates: [19]");
    expect(lines).toContain("RESULTS: 14 passed, 0 failed");
    expect(lines).toContain("All tests passed!");
  });

  it("lists failed checks and exits 1", async () => {
    const io = captureIO();
    const record = createSupermarketExtraction();
    const extractor = vi.fn<ReceiptExtractor>(async () => ({
      ...record,
      payment: { method: "cash", card_last_4: null },
    }));

    const code = await runValidateCommand(["supermarket-receipt"], {
      io,
      extractor,
      extractOptions: { config: TEST_CONFIG },
    });

    expect(code).toBe(1);
    const lines = io.out().split("\n");
    expect(lines).toContain("  ✗ payment.method: expected 'card', got 'cash'");
    expect(lines).toContain("RESULTS: 11 passed, 2 failed");
    expect(lines).toContain("  - payment.card_last_4: expected '1234', got 'null'");
  });

  it("prints FATAL for a fixture whose extraction fails", async () => {
    const io = captureIO();
    const extractor = vi.fn<ReceiptExtractor>(async () => {
      throw new Error("Gemini API call timed out after 60000ms");
    });

    const code = await runValidateCommand([], {
      io,
      fixtures: RECEIPT_FIXTURES,
      extractor,
      extractOptions: { config: TEST_CONFIG },
    });

    expect(code).toBe(1);
    const lines = io.out().split("\n");
    expect(lines.filter((line) => line === "FATAL: Gemini API call timed out after 60000ms")).toHaveLength(2);
    expect(lines).toContain("RESULTS: 0 passed, 2 failed");
  });

  it("fails up front when no credential is available for live extraction", async () => {
    const io = captureIO();
    const fetchFn = mockGeminiFetch(createSupermarketExtraction());

    const code = await runValidateCommand([], {
      io,
      extractOptions: {
        credentialResolvers: [{ source: "env:GEMINI_API_KEY", resolve: () => null }],
        config: TEST_CONFIG,
        fetchFn,
      },
    });

    expect(code).toBe(1);
    expect(io.err()).toBe(
      "Error: GEMINI_API_KEY not set (checked: env:GEMINI_API_KEY). Get one at https://aistudio.google.com/apikey\n"
    );
    expect(io.out()).toBe("");
    expect(fetchFn).not.toHaveBeenCalled();
  });
});
