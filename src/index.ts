export {
  extractReceipt,
  buildExtractionRequest,
  decodeReceiptPayload,
  generateContentUrl,
  resolveApiKey,
  resolveExtractionConfig,
  type ExtractReceiptOptions,
  type GenerateContentEnvelope,
} from "./extraction/geminiReceiptParser";
export {
  extractReceiptFile,
  extractReceiptFiles,
  assertDocumentExists,
  type ExtractFilesOptions,
  type FileExtractionOutcome,
} from "./extraction/extractReceiptFile";
export { resolveMimeType, fileExtension, MIME_TYPES, DEFAULT_MIME_TYPE } from "./extraction/mimeTypes";
export { buildReceiptPrompt, RECEIPT_NORMALIZATION_RULES } from "./extraction/receiptPrompt";
export {
  RECEIPT_RESPONSE_SCHEMA,
  RECEIPT_SCHEMA_VERSION,
  RECEIPT_TYPES,
  PAYMENT_METHODS,
  receiptExtractionSchema,
  type ReceiptExtraction,
  type ReceiptType,
  type PaymentMethod,
} from "./extraction/receiptSchema";
export {
  resolveCredential,
  envCredentialResolver,
  dotenvFileCredentialResolver,
  defaultCredentialResolvers,
  type CredentialResolver,
} from "./config/credentials";
export { loadExtractionConfig, type ExtractionConfig } from "./config/extractionConfig";
export {
  ExtractionError,
  DocumentNotFoundError,
  CredentialMissingError,
  UpstreamError,
  ConfigError,
  type ExtractionErrorCode,
} from "./utils/errors";
export {
  matchesExpected,
  ratesCovered,
  uncoveredRates,
  DEFAULT_MATCH_POLICY,
  type MatchPolicy,
  type ExpectedValue,
  type FieldKind,
} from "./validation/fieldMatchers";
export { RECEIPT_FIXTURES, type ReceiptFixture, type ExpectedReceiptFields } from "./validation/receiptFixtures";
export {
  validateFixtures,
  validationSucceeded,
  checkFields,
  type ReceiptExtractor,
  type ValidationReport,
  type ValidationFailure,
  type FixtureReport,
  type FieldCheckResult,
} from "./validation/validationHarness";
