import {
  BecknAction,
  MalformedUpstreamPayload,
  bapTermsTag,
  bppTermsTag,
  type BecknRequest,
  type Fulfillment,
  type OrderItem,
  type OrderMessage,
  type Payment,
} from "@fis-bap/shared";
import { envelope, type SellerTarget, type SynthesisEnv } from "./envelope.js";
import { FlowKind, profileOf } from "./flow-kinds.js";
import type { OrderSnapshot, PaymentSnapshot } from "./snapshots.js";

export type PaymentType = "PRE_FULFILLMENT" | "ON_FULFILLMENT" | "POST_FULFILLMENT";

export interface ConfirmInput extends SellerTarget {
  kind: FlowKind;
}

/**
 * Mandates are registered before the first instalment, UPI collects at
 * fulfillment, and everything else settles afterwards.
 */
export function classifyPaymentType(method: string): PaymentType {
  switch (method) {
    case "MANDATE_REGISTRATION":
      return "PRE_FULFILLMENT";
    case "UPI_ON_DELIVERY":
      return "ON_FULFILLMENT";
    default:
      return "POST_FULFILLMENT";
  }
}

function required(value: string | undefined, path: string): string {
  if (value === undefined) {
    throw new MalformedUpstreamPayload(`message.order.payments[0].${path}`, "on_init");
  }
  return value;
}

function confirmedPayment(quoted: PaymentSnapshot): Payment {
  const id = required(quoted.id, "id");
  const method = required(quoted.method, "tags[0].list[0].value");
  const [methodTag] = quoted.tags;

  return {
    id,
    collected_by: quoted.collectedBy,
    status: quoted.status,
    params: {
      amount: required(quoted.amount, "params.amount"),
      currency: "INR",
      source_bank_code: required(quoted.bankCode, "params.source_bank_code"),
      source_bank_account_number: required(
        quoted.accountNumber,
        "params.source_bank_account_number",
      ),
      source_bank_account_name: required(quoted.accountName, "params.source_bank_account_name"),
      transaction_id: id,
    },
    type: classifyPaymentType(method),
    tags: methodTag === undefined ? [] : [methodTag],
  };
}

function quotedPayment(order: OrderSnapshot): PaymentSnapshot {
  const [quoted] = order.payments;
  if (quoted === undefined) {
    throw new MalformedUpstreamPayload("message.order.payments[0]", "on_init");
  }
  return quoted;
}

/**
 * Build a confirm from the on_init: the seller's order id, the order as the
 * seller echoed it, and the payment with its type derived from the payment
 * method.
 */
export function synthesizeConfirm(
  order: OrderSnapshot,
  input: ConfirmInput,
  env: SynthesisEnv,
): BecknRequest<OrderMessage> {
  const profile = profileOf(input.kind);
  if (order.id === undefined) {
    throw new MalformedUpstreamPayload("message.order.id", "on_init");
  }

  const source = order.fulfillment;
  const item: OrderItem = {
    id: order.item.id,
    quantity: { selected: { measure: { value: order.item.amount, unit: "INR" } } },
    fulfillment_ids: [order.item.fulfillmentIds[0] ?? source.id],
  };
  const [paymentId] = order.item.paymentIds;
  if (paymentId !== undefined) item.payment_ids = [paymentId];

  const fulfillment: Fulfillment = {
    id: source.id,
    type: source.type,
    customer:
      source.phone === undefined
        ? { person: { id: source.customerId, creds: source.creds } }
        : {
            person: { id: source.customerId, creds: source.creds },
            contact: { phone: source.phone },
          },
  };
  if (source.agent !== undefined) fulfillment.agent = source.agent;
  if (source.frequency !== undefined) {
    fulfillment.stops = [{ time: { schedule: { frequency: source.frequency } } }];
  }
  if (source.tags.length > 0) fulfillment.tags = source.tags;

  const payments =
    profile.payment === "purchase" ? { payments: [confirmedPayment(quotedPayment(order))] } : {};

  return envelope(env, BecknAction.confirm, input, {
    order: {
      id: order.id,
      provider: { id: order.providerId },
      items: [item],
      fulfillments: [fulfillment],
      ...payments,
      tags: [bapTermsTag(env.bapTermsUrl), bppTermsTag(env.bppTermsUrl)],
    },
  });
}
