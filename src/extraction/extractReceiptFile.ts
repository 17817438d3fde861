/**
 * File-level entry points: locate the document on disk, then hand the bytes
 * to the Gemini extractor. Batches run strictly one document at a time.
 */

import { existsSync, statSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import { extractReceipt, resolveApiKey, type ExtractReceiptOptions } from "./geminiReceiptParser";
import type { ReceiptExtraction } from "./receiptSchema";
import { DocumentNotFoundError } from "../utils/errors";

export type FileExtractionOutcome =
  | { path: string; ok: true; result: ReceiptExtraction }
  | { path: string; ok: false; error: Error };

export interface ExtractFilesOptions extends ExtractReceiptOptions {
  /** Keep going after a failed document instead of rethrowing */
  continueOnError?: boolean;
  onProgress?: (completed: number, total: number, current: FileExtractionOutcome) => void;
}

export function assertDocumentExists(path: string): void {
  if (!existsSync(path) || !statSync(path).isFile()) {
    throw new DocumentNotFoundError(path);
  }
}

export async function extractReceiptFile(
  path: string,
  options: ExtractReceiptOptions = {}
): Promise<ReceiptExtraction> {
  assertDocumentExists(path);
  const document = await readFile(path);
  return extractReceipt(document, basename(path), options);
}

/**
 * Extract several documents in order. Results line up with `paths`.
 * Fail-fast by default; with `continueOnError` every document settles on
 * its own and failures are reported in place.
 */
export async function extractReceiptFiles(
  paths: string[],
  options: ExtractFilesOptions = {}
): Promise<FileExtractionOutcome[]> {
  const { continueOnError = false, onProgress, ...rest } = options;
  // A missing credential aborts the whole batch, never a single document
  const extractOptions: ExtractReceiptOptions = { ...rest, apiKey: resolveApiKey(rest) };
  const outcomes: FileExtractionOutcome[] = [];

  for (const path of paths) {
    let outcome: FileExtractionOutcome;
    try {
      outcome = { path, ok: true, result: await extractReceiptFile(path, extractOptions) };
    } catch (error) {
      if (!continueOnError) throw error;
      outcome = {
        path,
        ok: false,
        error: error instanceof Error ? error : new Error(String(error)),
      };
      console.error(`[Extraction] ${path} failed: ${outcome.error.message}`);
    }
    outcomes.push(outcome);
    onProgress?.(outcomes.length, paths.length, outcome);
  }

  return outcomes;
}
