/**
 * Shared test fixtures: seller callbacks for one mutual-fund exchange and a
 * deterministic synthesis environment.
 */

import type { SynthesisEnv } from "../../packages/bap/src/synthesis/index.js";

export const TXN = "T1";
export const BPP_ID = "api.cybrilla.com";
export const BPP_URI = "https://api.cybrilla.com/ondc";
export const BAP_ID = "investment.example.com";
export const BAP_URI = "https://investment.example.com/ondc";
export const PAN = "ABCDE1234F";
export const CALLBACK_TIME = "2026-03-10T06:30:00.000Z";
export const FIXED_NOW = new Date("2026-03-10T06:31:00.000Z");

export const SELLER = { transaction_id: TXN, bpp_id: BPP_ID, bpp_uri: BPP_URI };

// ---------------------------------------------------------------------------
// Synthesis environment
// ---------------------------------------------------------------------------

export function createTestEnv(overrides: Partial<SynthesisEnv> = {}): SynthesisEnv {
  let counter = 0;
  return {
    bapId: BAP_ID,
    bapUri: BAP_URI,
    arn: "ARN-000001",
    euin: "E000001",
    bapTermsUrl: "https://buyer.example.com/terms",
    bppTermsUrl: "https://seller.example.com/terms",
    now: () => FIXED_NOW,
    newMessageId: () => {
      counter += 1;
      return `msg-${counter}`;
    },
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// Callback envelopes
// ---------------------------------------------------------------------------

export function createCallbackContext(action: string, overrides: Record<string, unknown> = {}) {
  return {
    location: { country: { code: "IND" }, city: { code: "*" } },
    domain: "ONDC:FIS14",
    timestamp: CALLBACK_TIME,
    bap_id: BAP_ID,
    bap_uri: BAP_URI,
    transaction_id: TXN,
    message_id: `${action}-msg`,
    version: "2.0.0",
    ttl: "PT10M",
    bpp_id: BPP_ID,
    bpp_uri: BPP_URI,
    action,
    ...overrides,
  };
}

export function createCallback(
  action: string,
  message: Record<string, unknown>,
  contextOverrides: Record<string, unknown> = {},
) {
  return { context: createCallbackContext(action, contextOverrides), message };
}

// ---------------------------------------------------------------------------
// Order parts
// ---------------------------------------------------------------------------

export function createAgent() {
  return {
    person: { id: "E000001" },
    organization: { creds: [{ id: "ARN-000001", type: "ARN" }] },
  };
}

export function createPaymentMethodTag(mode: string) {
  return {
    descriptor: { name: "Payment Method", code: "PAYMENT_METHOD" },
    list: [{ descriptor: { code: "MODE" }, value: mode }],
  };
}

export function createQuotedPayment(overrides: Record<string, unknown> = {}) {
  return {
    id: "PAY-1",
    collected_by: "BPP",
    status: "NOT-PAID",
    params: {
      amount: "3000",
      currency: "INR",
      source_bank_code: "TEST0000001",
      source_bank_account_number: "000111222333",
      source_bank_account_name: "Test Investor",
    },
    type: "ON_ORDER",
    tags: [createPaymentMethodTag("NETBANKING")],
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// Callback payloads
// ---------------------------------------------------------------------------

export function createCatalogItem(id: string, fulfillmentIds: string[], isin: string) {
  return {
    id,
    descriptor: { name: `Test Growth Fund ${id}` },
    fulfillment_ids: fulfillmentIds,
    tags: [
      {
        descriptor: { name: "Plan Identifiers", code: "PLAN_IDENTIFIERS" },
        list: [{ descriptor: { name: "ISIN", code: "ISIN" }, value: isin }],
      },
    ],
  };
}

export function createOnSearch(
  providers: unknown[] = [
    {
      id: "32",
      descriptor: { name: "Test Mutual Fund" },
      items: [createCatalogItem("12391", ["101679"], "INF000TEST01")],
      fulfillments: [{ id: "101679", type: "LUMPSUM" }],
    },
  ],
  contextOverrides: Record<string, unknown> = {},
) {
  return createCallback("on_search", { catalog: { providers } }, contextOverrides);
}

export function createOnSelect(
  order: Record<string, unknown> = {},
  contextOverrides: Record<string, unknown> = {},
) {
  return createCallback(
    "on_select",
    {
      order: {
        provider: { id: "32" },
        items: [
          {
            id: "12391",
            quantity: { selected: { measure: { value: "3000", unit: "INR" } } },
            fulfillment_ids: ["101679"],
          },
        ],
        fulfillments: [
          {
            id: "101679",
            type: "LUMPSUM",
            customer: { person: { id: `pan:${PAN}` } },
            agent: createAgent(),
          },
        ],
        payments: [{ collected_by: "BPP", type: "ON_ORDER" }],
        xinput: { form: { id: "F01", url: "https://forms.example.com/kyc/F01" } },
        ...order,
      },
    },
    contextOverrides,
  );
}

export function createOnInit(
  order: Record<string, unknown> = {},
  contextOverrides: Record<string, unknown> = {},
) {
  return createCallback(
    "on_init",
    {
      order: {
        id: "ORD-9001",
        provider: { id: "32" },
        items: [
          {
            id: "12391",
            quantity: { selected: { measure: { value: "3000", unit: "INR" } } },
            fulfillment_ids: ["101679"],
            payment_ids: ["PAY-1"],
          },
        ],
        fulfillments: [
          {
            id: "101679",
            type: "LUMPSUM",
            customer: {
              person: { id: `pan:${PAN}`, creds: [{ id: "203.0.113.7", type: "IP_ADDRESS" }] },
              contact: { phone: "9000000001" },
            },
            agent: createAgent(),
          },
        ],
        payments: [createQuotedPayment()],
        ...order,
      },
    },
    contextOverrides,
  );
}

export function createOnConfirm(
  order: Record<string, unknown> = {},
  contextOverrides: Record<string, unknown> = {},
) {
  return createOnInit(
    { status: "ACCEPTED", ...order },
    { action: "on_confirm", message_id: "on_confirm-msg", ...contextOverrides },
  );
}

export function createOnStatus(
  order: Record<string, unknown> = {},
  contextOverrides: Record<string, unknown> = {},
) {
  return createOnSelect(
    {
      id: "ORD-9001",
      xinput: {
        form: { id: "F02" },
        form_response: { status: "SUCCESS", submission_id: "SUB-77" },
      },
      tags: [
        {
          display: false,
          descriptor: { name: "BAP Terms of Engagement", code: "BAP_TERMS" },
          list: [
            {
              descriptor: { name: "Static Terms (Transaction Level)", code: "STATIC_TERMS" },
              value: "https://buyer.example.com/echoed-terms",
            },
          ],
        },
      ],
      ...order,
    },
    { action: "on_status", message_id: "on_status-msg", ...contextOverrides },
  );
}
