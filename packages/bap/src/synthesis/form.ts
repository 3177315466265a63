import {
  BecknAction,
  bapTermsTag,
  type BecknRequest,
  type Fulfillment,
  type OrderMessage,
} from "@fis-bap/shared";
import { envelope, type SellerTarget, type SynthesisEnv } from "./envelope.js";
import { tagValue, type OrderSnapshot } from "./snapshots.js";

export interface FormResponse {
  formId: string;
  submissionId: string;
}

/**
 * Repeat the seller's order as a select that answers one of its forms.
 * Used after a KYC form submission and for the DigiLocker and e-sign steps.
 */
export function synthesizeFormSelect(
  order: OrderSnapshot,
  form: FormResponse,
  target: SellerTarget,
  env: SynthesisEnv,
): BecknRequest<OrderMessage> {
  const { item, fulfillment: source } = order;

  const fulfillment: Fulfillment = {
    id: source.id,
    type: source.type,
    customer: { person: { id: source.customerId } },
  };
  if (source.agent !== undefined) fulfillment.agent = source.agent;
  if (source.frequency !== undefined) {
    fulfillment.stops = [{ time: { schedule: { frequency: source.frequency } } }];
  }

  const termsUrl =
    tagValue(order.tags, "BAP_TERMS", "STATIC_TERMS") ?? env.bapTermsUrl;

  return envelope(env, BecknAction.select, target, {
    order: {
      provider: { id: order.providerId },
      items: [
        {
          id: item.id,
          quantity: { selected: { measure: { value: item.amount, unit: item.unit ?? "INR" } } },
          fulfillment_ids: item.fulfillmentIds.length > 0 ? item.fulfillmentIds : [source.id],
        },
      ],
      fulfillments: [fulfillment],
      xinput: {
        form: { id: form.formId },
        form_response: { submission_id: form.submissionId },
      },
      tags: [bapTermsTag(termsUrl)],
    },
  });
}
