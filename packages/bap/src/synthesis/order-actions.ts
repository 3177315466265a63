import {
  BecknAction,
  MalformedUpstreamPayload,
  type BecknRequest,
  type CancelMessage,
  type StatusMessage,
  type UpdateMessage,
} from "@fis-bap/shared";
import { envelope, type SellerTarget, type SynthesisEnv } from "./envelope.js";
import { paymentMethodTag } from "./init.js";
import type { OrderSnapshot } from "./snapshots.js";

/** Reason code the seller shows as "cancelled by the investor". */
export const CONSUMER_CANCELLATION_REASON = "07";

export interface OrderTarget extends SellerTarget {
  /** Defaults to the order id from the stored callback. */
  order_id?: string;
}

export interface CancelInput extends OrderTarget {
  ip: string;
}

/** The caller's order id, else the one the seller assigned in `order`. */
export function orderIdOf(order: OrderSnapshot, stage: string, override?: string): string {
  const id = override ?? order.id;
  if (id === undefined) {
    throw new MalformedUpstreamPayload("message.order.id", stage);
  }
  return id;
}

export function synthesizeStatus(
  orderId: string,
  input: SellerTarget,
  env: SynthesisEnv,
): BecknRequest<StatusMessage> {
  return envelope(env, BecknAction.status, input, { order_id: orderId });
}

export function synthesizeCancel(
  orderId: string,
  input: CancelInput,
  env: SynthesisEnv,
): BecknRequest<CancelMessage> {
  return envelope(env, BecknAction.cancel, input, {
    order_id: orderId,
    cancellation_reason_id: CONSUMER_CANCELLATION_REASON,
    tags: [
      {
        display: true,
        descriptor: { name: "Consumer Info", code: "CONSUMER_INFO" },
        list: [{ descriptor: { name: "IP Address", code: "IP_ADDRESS" }, value: input.ip }],
      },
    ],
  });
}

/**
 * Retry a failed payment: resend the order's payment block so the seller
 * issues a fresh payment link. `stage` names where `order` came from
 * (`on_update`, or `on_init` before the first update).
 */
export function synthesizeUpdate(
  order: OrderSnapshot,
  stage: string,
  input: OrderTarget,
  env: SynthesisEnv,
): BecknRequest<UpdateMessage> {
  const [payment] = order.payments;
  if (payment === undefined) {
    throw new MalformedUpstreamPayload("message.order.payments[0]", stage);
  }
  const field = (value: string | undefined, path: string): string => {
    if (value === undefined) {
      throw new MalformedUpstreamPayload(`message.order.payments[0].${path}`, stage);
    }
    return value;
  };

  return envelope(env, BecknAction.update, input, {
    update_target: "order.payments",
    order: {
      id: orderIdOf(order, stage, input.order_id),
      payments: [
        {
          collected_by: payment.collectedBy,
          params: {
            amount: field(payment.amount, "params.amount"),
            currency: payment.currency ?? "INR",
            source_bank_code: field(payment.bankCode, "params.source_bank_code"),
            source_bank_account_number: field(
              payment.accountNumber,
              "params.source_bank_account_number",
            ),
            source_bank_account_name: field(
              payment.accountName,
              "params.source_bank_account_name",
            ),
          },
          type: field(payment.type, "type"),
          tags: [paymentMethodTag(field(payment.method, "tags[0].list[0].value"))],
        },
      ],
    },
  });
}
