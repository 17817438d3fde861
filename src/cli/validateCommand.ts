import { extractReceiptFile } from "../extraction/extractReceiptFile";
import {
  resolveApiKey,
  resolveExtractionConfig,
  type ExtractReceiptOptions,
} from "../extraction/geminiReceiptParser";
import { errorMessage } from "../utils/errors";
import { RECEIPT_FIXTURES, type ReceiptFixture } from "../validation/receiptFixtures";
import {
  formatValue,
  validateFixtures,
  validationSucceeded,
  describeFailure,
  type ReceiptExtractor,
  type ValidationEvent,
} from "../validation/validationHarness";
import { processIO, type CliIO } from "./extractCommand";

const RULE = "=".repeat(60);

export interface ValidateCommandOptions {
  io?: CliIO;
  fixtures?: readonly ReceiptFixture[];
  fixturesDir?: string;
  /** Defaults to live Gemini extraction of each fixture document */
  extractor?: ReceiptExtractor;
  extractOptions?: ExtractReceiptOptions;
}

function printEvent(io: CliIO, event: ValidationEvent): void {
  switch (event.type) {
    case "fixture-start":
      io.stdout(`\n${RULE}\nTesting: ${event.documentPath}\nDescription: ${event.fixture.description}\n${RULE}\n`);
      break;
    case "fixture-error":
      io.stdout(`FATAL: ${event.error}\n`);
      break;
    case "check": {
      const { field, expected, actual, passed } = event.result;
      io.stdout(
        passed
          ? `  ✓ ${field}: ${formatValue(actual)}\n`
          : `  ✗ ${describeFailure(field, expected, actual)}\n`
      );
      break;
    }
  }
}

/**
 * validate-receipts [fixtureId...]
 *
 * Runs the embedded fixtures through extraction and prints one line per
 * field check. Exit code 1 when any check failed.
 */
export async function runValidateCommand(
  args: string[],
  options: ValidateCommandOptions = {}
): Promise<number> {
  const io = options.io ?? processIO;

  try {
    const extractOptions = options.extractOptions ?? {};
    const config = resolveExtractionConfig(extractOptions);

    let extractor = options.extractor;
    if (!extractor) {
      // A missing key fails the whole run up front, not every fixture
      const liveOptions: ExtractReceiptOptions = { ...extractOptions, apiKey: resolveApiKey(extractOptions, config) };
      extractor = (documentPath) => extractReceiptFile(documentPath, liveOptions);
    }

    io.stdout(`\n${RULE}\nReceipt Extraction Fixture Validation\n${RULE}\n`);

    const report = await validateFixtures(options.fixtures ?? RECEIPT_FIXTURES, extractor, {
      fixturesDir: options.fixturesDir ?? config.fixturesDir,
      only: args,
      onProgress: (event) => printEvent(io, event),
    });

    io.stdout(`\n${RULE}\nRESULTS: ${report.passed} passed, ${report.failed} failed\n${RULE}\n`);

    if (!validationSucceeded(report)) {
      io.stdout("\nFailed checks:\n");
      for (const failure of report.failures) {
        io.stdout(`  - ${failure.message}\n`);
      }
      return 1;
    }

    io.stdout("\nAll tests passed!\n");
    return 0;
  } catch (error) {
    io.stderr(`Error: ${errorMessage(error)}\n`);
    return 1;
  }
}
