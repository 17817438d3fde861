import type { GenerateContentRequest, Part } from "@google-cloud/vertexai";
import { z } from "zod";
import { loadExtractionConfig, type ExtractionConfig } from "../config/extractionConfig";
import {
  defaultCredentialResolvers,
  resolveCredential,
  type CredentialResolver,
} from "../config/credentials";
import { logAIUsage, type AIUsage } from "../utils/aiUsage";
import { UpstreamError, errorMessage } from "../utils/errors";
import { resolveMimeType } from "./mimeTypes";
import { buildReceiptPrompt } from "./receiptPrompt";
import {
  RECEIPT_RESPONSE_SCHEMA,
  describeSchemaIssues,
  receiptExtractionSchema,
  type ReceiptExtraction,
} from "./receiptSchema";

export interface ExtractReceiptOptions {
  /** Skips credential resolution when given */
  apiKey?: string;
  /** Defaults to GEMINI_API_KEY from the environment, then the credentials file */
  credentialResolvers?: CredentialResolver[];
  /** Overrides for values otherwise read from the environment */
  config?: Partial<ExtractionConfig>;
  fetchFn?: typeof fetch;
}

// Only the parts of the generateContent envelope we read
const generateContentEnvelopeSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() })).optional(),
          })
          .optional(),
        finishReason: z.string().optional(),
      })
    )
    .optional(),
  promptFeedback: z.object({ blockReason: z.string().optional() }).optional(),
  usageMetadata: z
    .object({
      promptTokenCount: z.number().optional(),
      candidatesTokenCount: z.number().optional(),
    })
    .optional(),
});

export type GenerateContentEnvelope = z.infer<typeof generateContentEnvelopeSchema>;

/**
 * Assemble the generateContent request for one document: instruction text,
 * inline base64 document with its MIME type, and a JSON response schema.
 */
export function buildExtractionRequest(
  document: Uint8Array,
  fileNameOrExtension: string
): GenerateContentRequest {
  const filePart: Part = {
    inlineData: {
      mimeType: resolveMimeType(fileNameOrExtension),
      data: Buffer.from(document).toString("base64"),
    },
  };

  return {
    contents: [{ role: "user", parts: [{ text: buildReceiptPrompt() }, filePart] }],
    generationConfig: {
      responseMimeType: "application/json",
      responseSchema: RECEIPT_RESPONSE_SCHEMA,
    },
  };
}

export function generateContentUrl(baseUrl: string, model: string, apiKey: string): string {
  return `${baseUrl}/models/${encodeURIComponent(model)}:generateContent?key=${encodeURIComponent(apiKey)}`;
}

export function resolveExtractionConfig(options: ExtractReceiptOptions = {}): ExtractionConfig {
  return { ...loadExtractionConfig(), ...options.config };
}

export function resolveApiKey(
  options: ExtractReceiptOptions,
  config: ExtractionConfig = resolveExtractionConfig(options)
): string {
  if (options.apiKey) return options.apiKey;
  return resolveCredential(options.credentialResolvers ?? defaultCredentialResolvers(config.credentialsFile));
}

async function postGenerateContent(
  url: string,
  body: GenerateContentRequest,
  timeoutMs: number,
  fetchFn: typeof fetch
): Promise<string> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetchFn(url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
      signal: controller.signal,
    });
    const text = await response.text();

    if (!response.ok) {
      throw new UpstreamError(
        `Gemini API error: ${response.status} ${response.statusText} ${text.substring(0, 500)}`.trim(),
        response.status
      );
    }
    return text;
  } catch (error) {
    if (error instanceof UpstreamError) throw error;
    if (controller.signal.aborted) {
      throw new UpstreamError(`Gemini API call timed out after ${timeoutMs}ms`, null, { cause: error });
    }
    throw new UpstreamError(`Gemini API request failed: ${errorMessage(error)}`, null, { cause: error });
  } finally {
    clearTimeout(timeoutId);
  }
}

function parseEnvelope(body: string): GenerateContentEnvelope {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    throw new UpstreamError(`Gemini response is not JSON: ${body.substring(0, 200)}`, null, { cause: error });
  }

  const envelope = generateContentEnvelopeSchema.safeParse(json);
  if (!envelope.success) {
    throw new UpstreamError(`Unexpected Gemini response envelope: ${describeSchemaIssues(envelope.error)}`);
  }
  return envelope.data;
}

/**
 * Second decoding pass: the structured record arrives as a JSON string
 * inside the first candidate's text part.
 */
export function decodeReceiptPayload(envelope: GenerateContentEnvelope): ReceiptExtraction {
  const candidate = envelope.candidates?.[0];
  const text = candidate?.content?.parts?.find((part) => part.text !== undefined)?.text;

  if (text === undefined) {
    const reason = envelope.promptFeedback?.blockReason ?? candidate?.finishReason ?? "no candidates";
    throw new UpstreamError(`Gemini returned no structured payload (${reason})`);
  }

  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch (error) {
    console.error("[Gemini] Payload is not JSON. Raw response:", text.substring(0, 500));
    throw new UpstreamError("Gemini payload is not valid JSON", null, { cause: error });
  }

  const decoded = receiptExtractionSchema.safeParse(payload);
  if (!decoded.success) {
    throw new UpstreamError(`Gemini payload does not match receipt schema: ${describeSchemaIssues(decoded.error)}`);
  }
  return decoded.data;
}

/**
 * Extract a structured receipt record from document bytes with one
 * synchronous generateContent call. Never returns a partial record: any
 * upstream or decoding problem raises UpstreamError.
 */
export async function extractReceipt(
  document: Uint8Array,
  fileNameOrExtension: string,
  options: ExtractReceiptOptions = {}
): Promise<ReceiptExtraction> {
  const config = resolveExtractionConfig(options);
  // Resolved before anything touches the network
  const apiKey = resolveApiKey(options, config);

  const request = buildExtractionRequest(document, fileNameOrExtension);
  const url = generateContentUrl(config.baseUrl, config.model, apiKey);

  const apiStart = Date.now();
  const body = await postGenerateContent(url, request, config.timeoutMs, options.fetchFn ?? fetch);
  console.error(`[Gemini] API call took ${Date.now() - apiStart}ms (model: ${config.model})`);

  const envelope = parseEnvelope(body);

  const usage: AIUsage = {
    model: config.model,
    inputTokens: envelope.usageMetadata?.promptTokenCount || 0,
    outputTokens: envelope.usageMetadata?.candidatesTokenCount || 0,
  };
  logAIUsage(usage, { fileName: fileNameOrExtension });

  return decodeReceiptPayload(envelope);
}
