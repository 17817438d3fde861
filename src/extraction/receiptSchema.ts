/**
 * Receipt extraction schema.
 *
 * Two views of the same shape:
 * - RECEIPT_RESPONSE_SCHEMA is sent to Gemini so it performs constrained
 *   decoding instead of free-form text generation
 * - receiptExtractionSchema decodes whatever comes back; Gemini can still
 *   violate the declared schema, so the response is never trusted as-is
 *
 * Keep both in sync when adding a field.
 */

import { SchemaType, type ResponseSchema } from "@google-cloud/vertexai";
import { z } from "zod";

export const RECEIPT_SCHEMA_VERSION = "1";

export const RECEIPT_TYPES = ["invoice", "receipt", "cash_register", "credit_note"] as const;
export type ReceiptType = (typeof RECEIPT_TYPES)[number];

export const PAYMENT_METHODS = ["card", "cash", "transfer", "paypal", "unknown"] as const;
export type PaymentMethod = (typeof PAYMENT_METHODS)[number];

export const RECEIPT_GROUPS = ["receipt", "amounts", "taxes", "issuer", "payment", "raw_text"] as const;

// ============================================================================
// Gemini response schema
// ============================================================================

export const RECEIPT_RESPONSE_SCHEMA: ResponseSchema = {
  type: SchemaType.OBJECT,
  properties: {
    receipt: {
      type: SchemaType.OBJECT,
      properties: {
        date: { type: SchemaType.STRING, description: "Date in ISO format YYYY-MM-DD" },
        number: { type: SchemaType.STRING, nullable: true },
        type: { type: SchemaType.STRING, enum: [...RECEIPT_TYPES] },
      },
      required: ["date", "number", "type"],
    },
    amounts: {
      type: SchemaType.OBJECT,
      properties: {
        gross: { type: SchemaType.NUMBER },
        net: { type: SchemaType.NUMBER, nullable: true },
        currency: { type: SchemaType.STRING, description: "ISO 4217 code (EUR, USD, PEN, CHF)" },
      },
      required: ["gross", "net", "currency"],
    },
    taxes: {
      type: SchemaType.ARRAY,
      items: {
        type: SchemaType.OBJECT,
        properties: {
          rate: { type: SchemaType.NUMBER, description: "Tax rate as percentage (e.g. 19 not 0.19)" },
          amount: { type: SchemaType.NUMBER },
        },
        required: ["rate", "amount"],
      },
    },
    issuer: {
      type: SchemaType.OBJECT,
      properties: {
        name: { type: SchemaType.STRING },
        address: {
          type: SchemaType.OBJECT,
          properties: {
            street: { type: SchemaType.STRING, nullable: true },
            postal_code: { type: SchemaType.STRING, nullable: true },
            city: { type: SchemaType.STRING, nullable: true },
            country: { type: SchemaType.STRING, description: "ISO 3166-1 alpha-2 code (DE, AT, US, PE)" },
          },
          required: ["street", "postal_code", "city", "country"],
        },
        vat_id: { type: SchemaType.STRING, nullable: true },
        tax_number: { type: SchemaType.STRING, nullable: true },
      },
      required: ["name", "address", "vat_id", "tax_number"],
    },
    payment: {
      type: SchemaType.OBJECT,
      properties: {
        method: { type: SchemaType.STRING, enum: [...PAYMENT_METHODS] },
        card_last_4: { type: SchemaType.STRING, nullable: true },
      },
      required: ["method", "card_last_4"],
    },
    raw_text: { type: SchemaType.STRING, description: "Complete OCR text" },
  },
  required: [...RECEIPT_GROUPS],
};

// ============================================================================
// Decoder
// ============================================================================

// Absent nullable fields become null so consumers can rely on field presence
const nullableString = z.string().nullable().default(null);
const nullableNumber = z.number().nullable().default(null);

export const receiptExtractionSchema = z.object({
  receipt: z.object({
    date: z.string(),
    number: nullableString,
    type: z.enum(RECEIPT_TYPES),
  }),
  amounts: z.object({
    gross: z.number(),
    net: nullableNumber,
    currency: z.string(),
  }),
  taxes: z.array(
    z.object({
      rate: z.number(),
      amount: z.number(),
    })
  ),
  issuer: z.object({
    name: z.string(),
    address: z.object({
      street: nullableString,
      postal_code: nullableString,
      city: nullableString,
      country: z.string(),
    }),
    vat_id: nullableString,
    tax_number: nullableString,
  }),
  payment: z.object({
    method: z.enum(PAYMENT_METHODS),
    card_last_4: nullableString,
  }),
  raw_text: z.string(),
});

/** Decoded, schema-conforming extraction result for one document */
export type ReceiptExtraction = z.infer<typeof receiptExtractionSchema>;

/**
 * Describe every zod issue on one line each, e.g.
 * "amounts.gross: Expected number, received string"
 */
export function describeSchemaIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}
