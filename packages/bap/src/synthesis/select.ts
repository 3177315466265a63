import {
  BecknAction,
  NoMatchingFulfillment,
  ValidationError,
  bapTermsTag,
  type BecknRequest,
  type Credential,
  type Fulfillment,
  type OrderMessage,
} from "@fis-bap/shared";
import { envelope, type SellerTarget, type SynthesisEnv } from "./envelope.js";
import { FlowKind, profileOf } from "./flow-kinds.js";
import { buildFrequency, type CadenceInput } from "./frequency.js";
import type {
  CatalogItem,
  CatalogProvider,
  FulfillmentOffer,
  SearchSnapshot,
} from "./snapshots.js";

export interface SelectInput extends SellerTarget {
  kind: FlowKind;
  amount: string;
  pan: string;
  provider_id?: string;
  item_id?: string;
  isin?: string;
  /** Existing folio; required for redemption. */
  folio?: string;
  /** Required for recurring flows. */
  cadence?: CadenceInput;
}

function chooseProvider(catalog: SearchSnapshot, providerId?: string): CatalogProvider {
  if (providerId !== undefined) {
    const provider = catalog.providers.find((candidate) => candidate.id === providerId);
    if (provider === undefined) {
      throw new ValidationError(`Provider '${providerId}' is not in the seller's catalog.`);
    }
    return provider;
  }
  const [only, ...others] = catalog.providers;
  if (only === undefined) {
    throw new ValidationError("The seller's catalog has no providers.");
  }
  if (others.length > 0) {
    throw new ValidationError(
      "The seller's catalog lists several providers; provider_id is required.",
    );
  }
  return only;
}

function chooseItem(provider: CatalogProvider, input: SelectInput): CatalogItem {
  if (input.item_id !== undefined) {
    const item = provider.items.find((candidate) => candidate.id === input.item_id);
    if (item === undefined) {
      throw new ValidationError(
        `Item '${input.item_id}' is not offered by provider '${provider.id}'.`,
      );
    }
    return item;
  }
  if (input.isin !== undefined) {
    const item = provider.items.find((candidate) => candidate.isin === input.isin);
    if (item === undefined) {
      throw new ValidationError(`No plan with ISIN '${input.isin}' from provider '${provider.id}'.`);
    }
    return item;
  }
  const [first] = provider.items;
  if (first === undefined) {
    throw new ValidationError(`Provider '${provider.id}' offers no items.`);
  }
  return first;
}

/**
 * Fulfillment of the flow's type, preferring one the chosen item links to.
 */
export function chooseFulfillment(
  provider: CatalogProvider,
  item: CatalogItem,
  type: string,
): FulfillmentOffer {
  const ofType = provider.fulfillments.filter((offer) => offer.type === type);
  const linked = ofType.find((offer) => item.fulfillmentIds.includes(offer.id));
  const chosen = linked ?? ofType[0];
  if (chosen === undefined) {
    throw new NoMatchingFulfillment(type);
  }
  return chosen;
}

/**
 * Build a select from the seller's on_search catalog.
 *
 * Purchases and redemptions share the shape; recurring flows add the
 * schedule and folio flows add the folio as a customer credential.
 */
export function synthesizeSelect(
  catalog: SearchSnapshot,
  input: SelectInput,
  env: SynthesisEnv,
): BecknRequest<OrderMessage> {
  const profile = profileOf(input.kind);

  const provider = chooseProvider(catalog, input.provider_id);
  const item = chooseItem(provider, input);
  const offer = chooseFulfillment(provider, item, profile.fulfillmentType);

  const creds: Credential[] = [];
  if (profile.payment === "payout") {
    if (input.folio === undefined) {
      throw new ValidationError("folio is required for redemption.");
    }
    creds.push({ id: input.folio, type: "FOLIO" });
  }

  const fulfillment: Fulfillment = {
    id: offer.id,
    type: offer.type,
    customer: {
      person: creds.length > 0 ? { id: `pan:${input.pan}`, creds } : { id: `pan:${input.pan}` },
    },
    agent: {
      person: { id: env.euin },
      organization: { creds: [{ id: env.arn, type: "ARN" }] },
    },
  };

  if (profile.recurring) {
    if (input.cadence === undefined) {
      throw new ValidationError("frequency, repeat and day_number are required for SIP.");
    }
    fulfillment.stops = [
      { time: { schedule: { frequency: buildFrequency(input.cadence, env.now()) } } },
    ];
  }

  return envelope(env, BecknAction.select, input, {
    order: {
      provider: { id: provider.id },
      items: [
        {
          id: item.id,
          quantity: { selected: { measure: { value: input.amount, unit: "INR" } } },
          fulfillment_ids: [offer.id],
        },
      ],
      fulfillments: [fulfillment],
      tags: [bapTermsTag(env.bapTermsUrl)],
    },
  });
}
