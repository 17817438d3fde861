/**
 * Error taxonomy for receipt extraction.
 *
 * Every failure carries a machine-readable code so callers (CLIs, the
 * validation harness) can tell a missing file from a missing credential
 * from a bad upstream response without string matching.
 */

export type ExtractionErrorCode =
  | "document-not-found"
  | "credential-missing"
  | "upstream-error"
  | "invalid-config";

export class ExtractionError extends Error {
  constructor(
    public readonly code: ExtractionErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ExtractionError";
  }
}

/**
 * Input document path does not resolve to a readable file.
 */
export class DocumentNotFoundError extends ExtractionError {
  constructor(public readonly path: string) {
    super("document-not-found", `File not found: ${path}`);
    this.name = "DocumentNotFoundError";
  }
}

/**
 * No API key could be resolved. Raised before any network activity.
 */
export class CredentialMissingError extends ExtractionError {
  constructor(public readonly variable: string, sources: string[]) {
    super(
      "credential-missing",
      `${variable} not set (checked: ${sources.join(", ") || "none"}). Get one at https://aistudio.google.com/apikey`
    );
    this.name = "CredentialMissingError";
  }
}

/**
 * Gemini returned a non-success status, timed out, or produced a payload
 * that does not decode into a receipt record.
 */
export class UpstreamError extends ExtractionError {
  constructor(
    message: string,
    public readonly status: number | null = null,
    options?: { cause?: unknown }
  ) {
    super("upstream-error", message, options);
    this.name = "UpstreamError";
  }
}

export class ConfigError extends ExtractionError {
  constructor(message: string) {
    super("invalid-config", message);
    this.name = "ConfigError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
