import {
  BecknAction,
  MalformedUpstreamPayload,
  ValidationError,
  bapTermsTag,
  type BecknRequest,
  type Credential,
  type Fulfillment,
  type OrderMessage,
  type Payment,
  type Tag,
} from "@fis-bap/shared";
import { envelope, type SellerTarget, type SynthesisEnv } from "./envelope.js";
import { FlowKind, profileOf } from "./flow-kinds.js";
import type { OrderSnapshot } from "./snapshots.js";

export interface BankDetails {
  ifsc: string;
  account_number: string;
  account_name: string;
}

export interface InitInput extends SellerTarget {
  kind: FlowKind;
  /** Investor's address, sent as the IP_ADDRESS credential. */
  ip: string;
  phone: string;
  /** Overrides the folio the seller echoed in on_select. */
  folio?: string;
  /** Required for purchases. */
  bank?: BankDetails;
  /** Required for purchases, e.g. "NETBANKING" or "UPI_AUTOPAY". */
  payment_mode?: string;
}

export function paymentMethodTag(mode: string): Tag {
  return {
    descriptor: { name: "Payment Method", code: "PAYMENT_METHOD" },
    list: [{ descriptor: { code: "MODE" }, value: mode }],
  };
}

function payoutAccountTag(identifier: string): Tag {
  return {
    descriptor: { name: "Payout Bank Account", code: "PAYOUT_BANK_ACCOUNT" },
    list: [{ descriptor: { name: "Identifier", code: "IDENTIFIER" }, value: identifier }],
  };
}

function folioOf(order: OrderSnapshot, input: InitInput): string {
  if (input.folio !== undefined) return input.folio;
  const echoed = order.fulfillment.creds.find((cred) => cred.type === "FOLIO");
  if (echoed === undefined) {
    throw new MalformedUpstreamPayload(
      "message.order.fulfillments[0].customer.person.creds[type=FOLIO]",
      "on_select",
    );
  }
  return echoed.id;
}

function payoutIdentifier(order: OrderSnapshot): string {
  const value = order.fulfillment.tags[1]?.list[0]?.value;
  if (value === undefined || value === "") {
    throw new MalformedUpstreamPayload(
      "message.order.fulfillments[0].tags[1].list[0].value",
      "on_select",
    );
  }
  return value;
}

function purchasePayment(order: OrderSnapshot, input: InitInput): Payment {
  const [quoted] = order.payments;
  if (quoted === undefined) {
    throw new MalformedUpstreamPayload("message.order.payments[0]", "on_select");
  }
  if (quoted.type === undefined) {
    throw new MalformedUpstreamPayload("message.order.payments[0].type", "on_select");
  }
  if (input.bank === undefined) {
    throw new ValidationError("ifsc, account_number and account_name are required for purchases.");
  }
  if (input.payment_mode === undefined) {
    throw new ValidationError("payment_mode is required for purchases.");
  }

  return {
    collected_by: quoted.collectedBy,
    params: {
      amount: order.item.amount,
      currency: "INR",
      source_bank_code: input.bank.ifsc,
      source_bank_account_number: input.bank.account_number,
      source_bank_account_name: input.bank.account_name,
    },
    type: quoted.type,
    tags: [paymentMethodTag(input.payment_mode)],
  };
}

/**
 * Build an init from the on_select the seller answered with.
 *
 * Purchases carry one payment the investor funds from their bank account;
 * redemptions carry the payout account identifier the seller quoted
 * instead.
 */
export function synthesizeInit(
  order: OrderSnapshot,
  input: InitInput,
  env: SynthesisEnv,
): BecknRequest<OrderMessage> {
  const profile = profileOf(input.kind);
  const source = order.fulfillment;

  const creds: Credential[] = [];
  if (profile.usesFolio) {
    creds.push({ id: folioOf(order, input), type: "FOLIO" });
  }
  creds.push({ id: input.ip, type: "IP_ADDRESS" });

  const fulfillment: Fulfillment = {
    id: source.id,
    type: source.type,
    customer: {
      person: { id: source.customerId, creds },
      contact: { phone: input.phone },
    },
  };
  if (source.agent !== undefined) fulfillment.agent = source.agent;
  if (source.frequency !== undefined) {
    fulfillment.stops = [{ time: { schedule: { frequency: source.frequency } } }];
  }

  if (profile.payment === "payout") {
    fulfillment.tags = [payoutAccountTag(payoutIdentifier(order))];
  }
  const payments =
    profile.payment === "purchase" ? { payments: [purchasePayment(order, input)] } : {};

  const message: OrderMessage = {
    order: {
      provider: { id: order.providerId },
      items: [
        {
          id: order.item.id,
          quantity: { selected: { measure: { value: order.item.amount, unit: "INR" } } },
          fulfillment_ids: [order.item.fulfillmentIds[0] ?? source.id],
        },
      ],
      fulfillments: [fulfillment],
      ...payments,
      tags: [bapTermsTag(env.bapTermsUrl)],
    },
  };

  return envelope(env, BecknAction.init, input, message);
}
