import type { PaymentMethod, ReceiptType } from "../extraction/receiptSchema";

/**
 * Known-good values for one document. Omitted (or null) expectations are not
 * checked: absence here says nothing about the field.
 */
export interface ExpectedReceiptFields {
  issuerName?: string | null;
  addressCity?: string | null;
  addressCountry?: string | null;
  vatId?: string | null;
  taxNumber?: string | null;
  receiptNumber?: string | null;
  receiptDate?: string | null;
  /** A list when more than one type is a fair reading of the document */
  receiptType?: ReceiptType | readonly ReceiptType[] | null;
  amountsGross?: number | null;
  amountsNet?: number | null;
  amountsCurrency?: string | null;
  taxRates?: readonly number[] | null;
  paymentMethod?: PaymentMethod | null;
  cardLast4?: string | null;
}

export interface ReceiptFixture {
  id: string;
  /** Document path, relative to the fixtures directory */
  document: string;
  description: string;
  expected: ExpectedReceiptFields;
}

// Synthetic sample documents; the images live in the fixtures directory
export const RECEIPT_FIXTURES: readonly ReceiptFixture[] = [
  {
    id: "supermarket-receipt",
    document: "ai_invoice_01.jpg",
    description: "EDEKA supermarket receipt",
    expected: {
      issuerName: "EDEKA Müller",
      addressCity: "München",
      addressCountry: "DE",
      vatId: "DE123456789",
      receiptNumber: "0847",
      receiptDate: "2025-12-03",
      // Both readings are valid for a supermarket slip
      receiptType: ["cash_register", "receipt"],
      amountsGross: 50.0,
      amountsNet: 41.93,
      amountsCurrency: "EUR",
      taxRates: [19, 7],
      paymentMethod: "card",
      cardLast4: "1234",
    },
  },
  {
    id: "electronics-invoice",
    document: "ai_receipt_02.jpg",
    description: "TechShop Berlin invoice",
    expected: {
      issuerName: "TechShop Berlin GmbH",
      addressCity: "Berlin",
      addressCountry: "DE",
      vatId: "DE298456712",
      taxNumber: "30/123/45678",
      receiptNumber: "RE-2025-004521",
      receiptDate: "2025-12-03",
      receiptType: "invoice",
      amountsGross: 100.0,
      amountsNet: 84.03,
      amountsCurrency: "EUR",
      taxRates: [19],
      paymentMethod: "card",
      cardLast4: "4829",
    },
  },
];
