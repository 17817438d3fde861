import { z } from "zod";
import { ConfigError } from "../utils/errors";

// Model options (fastest to most accurate)
// gemini-2.0-flash-lite: lowest cost, weaker on dense receipts
// gemini-2.5-flash: good balance, default
// gemini-2.5-pro: best accuracy, slow
export const DEFAULT_GEMINI_MODEL = "gemini-2.5-flash";

export const DEFAULT_GEMINI_BASE_URL = "https://generativelanguage.googleapis.com/v1beta";

export const DEFAULT_TIMEOUT_MS = 60_000;

export const API_KEY_VARIABLE = "GEMINI_API_KEY";

const envSchema = z.object({
  GEMINI_MODEL: z.string().min(1).default(DEFAULT_GEMINI_MODEL),
  GEMINI_API_BASE_URL: z.string().url().default(DEFAULT_GEMINI_BASE_URL),
  GEMINI_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  GEMINI_CREDENTIALS_FILE: z.string().min(1).default(".env"),
  RECEIPT_FIXTURES_DIR: z.string().min(1).default("examples"),
});

export interface ExtractionConfig {
  model: string;
  baseUrl: string;
  timeoutMs: number;
  /** Key-value file consulted when GEMINI_API_KEY is not in the environment */
  credentialsFile: string;
  fixturesDir: string;
}

/**
 * Read extraction settings from the environment.
 * Empty strings count as unset so `GEMINI_MODEL=` falls back to the default.
 */
export function loadExtractionConfig(
  env: Record<string, string | undefined> = process.env
): ExtractionConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== "")
  );
  const parsed = envSchema.safeParse(present);

  if (!parsed.success) {
    const fields = Object.keys(parsed.error.flatten().fieldErrors).join(", ");
    throw new ConfigError(`Invalid environment variables: ${fields}`);
  }

  return {
    model: parsed.data.GEMINI_MODEL,
    baseUrl: parsed.data.GEMINI_API_BASE_URL.replace(/\/+$/, ""),
    timeoutMs: parsed.data.GEMINI_TIMEOUT_MS,
    credentialsFile: parsed.data.GEMINI_CREDENTIALS_FILE,
    fixturesDir: parsed.data.RECEIPT_FIXTURES_DIR,
  };
}
