import { describe, it, expect } from "vitest";
import { SchemaType } from "@google-cloud/vertexai";
import {
  PAYMENT_METHODS,
  RECEIPT_GROUPS,
  RECEIPT_RESPONSE_SCHEMA,
  RECEIPT_TYPES,
  receiptExtractionSchema,
} from "../receiptSchema";
import { createSupermarketExtraction } from "../../test/setup";

const groups = RECEIPT_RESPONSE_SCHEMA.properties ?? {};

describe("RECEIPT_RESPONSE_SCHEMA", () => {
  it("declares exactly the six top-level groups, all required", () => {
    expect(RECEIPT_RESPONSE_SCHEMA.type).toBe(SchemaType.OBJECT);
    expect(Object.keys(groups)).toEqual([...RECEIPT_GROUPS]);
    expect(RECEIPT_RESPONSE_SCHEMA.required).toEqual([...RECEIPT_GROUPS]);
  });

  it("requires every property of every object so fields are never omitted", () => {
    const objects = [
      groups.receipt,
      groups.amounts,
      groups.issuer,
      groups.issuer.properties?.address,
      groups.payment,
      groups.taxes.items,
    ];
    for (const schema of objects) {
      expect(schema?.type).toBe(SchemaType.OBJECT);
      expect([...(schema?.required ?? [])].sort()).toEqual(Object.keys(schema?.properties ?? {}).sort());
    }
  });

  it("marks the optional fields nullable", () => {
    expect(groups.receipt.properties?.number.nullable).toBe(true);
    expect(groups.amounts.properties?.net.nullable).toBe(true);
    expect(groups.issuer.properties?.vat_id.nullable).toBe(true);
    expect(groups.issuer.properties?.tax_number.nullable).toBe(true);
    expect(groups.payment.properties?.card_last_4.nullable).toBe(true);
    expect(groups.amounts.properties?.gross.nullable).toBeUndefined();
  });

  it("constrains the categorical fields", () => {
    expect(groups.receipt.properties?.type.enum).toEqual(["invoice", "receipt", "cash_register", "credit_note"]);
    expect(groups.payment.properties?.method.enum).toEqual(["card", "cash", "transfer", "paypal", "unknown"]);
    expect(RECEIPT_TYPES).toHaveLength(4);
    expect(PAYMENT_METHODS).toHaveLength(5);
  });
});

describe("receiptExtractionSchema", () => {
  it("turns missing nullable fields into null", () => {
    const record = createSupermarketExtraction();
    const payload = {
      ...record,
      receipt: { date: "2025-12-03", type: "receipt" },
      amounts: { gross: 12.5, currency: "EUR" },
      payment: { method: "cash" },
    };

    const decoded = receiptExtractionSchema.parse(payload);

    expect(decoded.receipt.number).toBeNull();
    expect(decoded.amounts.net).toBeNull();
    expect(decoded.payment.card_last_4).toBeNull();
    expect(decoded.issuer.tax_number).toBeNull();
  });

  it("drops unknown top-level groups", () => {
    const decoded = receiptExtractionSchema.parse({ ...createSupermarketExtraction(), line_items: [] });
    expect(Object.keys(decoded).sort()).toEqual([...RECEIPT_GROUPS].sort());
  });

  it("rejects a record missing a required field", () => {
    const { raw_text: _rawText, ...withoutText } = createSupermarketExtraction();
    const result = receiptExtractionSchema.safeParse(withoutText);
    expect(result.success).toBe(false);
  });

  it("rejects values outside the categorical sets", () => {
    const record = createSupermarketExtraction();
    const result = receiptExtractionSchema.safeParse({
      ...record,
      payment: { method: "bitcoin", card_last_4: null },
    });
    expect(result.success).toBe(false);
  });

  it("round-trips through JSON field for field", () => {
    const record = createSupermarketExtraction();
    const decoded = receiptExtractionSchema.parse(JSON.parse(JSON.stringify(record)));
    expect(decoded).toEqual(record);
  });
});
