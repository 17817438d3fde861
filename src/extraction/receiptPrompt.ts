/**
 * Instruction text sent alongside the document.
 *
 * Gemini's defaults drift across locales (dates, decimal commas, tax written
 * as 0.19), and there is no post-processing step, so the normalization rules
 * live here.
 */
export const RECEIPT_NORMALIZATION_RULES = [
  'date: Convert to YYYY-MM-DD (e.g. "20/11/25" becomes 2025-11-20)',
  "card_last_4: Extract last 4 digits from masked card numbers like ****1234",
  "tax rate: Percentage as integer (19 not 0.19)",
  "currency: ISO 4217 code (e.g. EUR, USD, CHF)",
  "country: ISO 3166-1 alpha-2 code (e.g. DE, AT, US)",
] as const;

export function buildReceiptPrompt(): string {
  return `Extract all information from this receipt/invoice image.

Rules:
${RECEIPT_NORMALIZATION_RULES.map((rule) => `- ${rule}`).join("\n")}
- Use null for any field that is not visible on the document`;
}
