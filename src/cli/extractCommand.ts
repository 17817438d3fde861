import {
  assertDocumentExists,
  extractReceiptFiles,
} from "../extraction/extractReceiptFile";
import type { ExtractReceiptOptions } from "../extraction/geminiReceiptParser";
import { errorMessage } from "../utils/errors";

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

export const processIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

export const EXTRACT_USAGE = "Usage: extract-receipts <image> [image...]";

/**
 * extract-receipts <file> [file...]
 *
 * Prints one record for a single document, an array for several, as
 * indented JSON. Returns the process exit code.
 */
export async function runExtractCommand(
  args: string[],
  options: { io?: CliIO; extractOptions?: ExtractReceiptOptions } = {}
): Promise<number> {
  const io = options.io ?? processIO;

  if (args.length === 0) {
    io.stderr(`${EXTRACT_USAGE}\n`);
    return 1;
  }

  try {
    // Every path must exist before the first API call goes out
    for (const path of args) assertDocumentExists(path);

    const outcomes = await extractReceiptFiles(args, options.extractOptions);
    const results = outcomes.flatMap((outcome) => (outcome.ok ? [outcome.result] : []));

    io.stdout(`${JSON.stringify(results.length === 1 ? results[0] : results, null, 2)}\n`);
    return 0;
  } catch (error) {
    io.stderr(`Error: ${errorMessage(error)}\n`);
    return 1;
  }
}
