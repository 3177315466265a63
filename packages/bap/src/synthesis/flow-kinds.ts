import { ValidationError } from "@fis-bap/shared";

export enum FlowKind {
  SIP_NEW_FOLIO = "SIP_NEW_FOLIO",
  SIP_EXISTING_FOLIO = "SIP_EXISTING_FOLIO",
  LUMPSUM_NEW_FOLIO = "LUMPSUM_NEW_FOLIO",
  LUMPSUM_EXISTING_FOLIO = "LUMPSUM_EXISTING_FOLIO",
  REDEMPTION = "REDEMPTION",
  PAYMENT_RETRY = "PAYMENT_RETRY",
}

export type FulfillmentType = "SIP" | "LUMPSUM" | "REDEMPTION";

export interface FlowProfile {
  /** Fulfillment type picked from the catalog at select. */
  fulfillmentType: FulfillmentType;
  /** Select carries a repeating schedule. */
  recurring: boolean;
  /** Customer creds carry the investor's folio. */
  usesFolio: boolean;
  /** Purchases pay in; redemptions are paid out to a bank account. */
  payment: "purchase" | "payout";
  /** Init and confirm must name the on_select / on_init they build on. */
  requiresPriorMessageId: boolean;
}

const PROFILES: Record<FlowKind, FlowProfile> = {
  [FlowKind.SIP_NEW_FOLIO]: {
    fulfillmentType: "SIP",
    recurring: true,
    usesFolio: false,
    payment: "purchase",
    requiresPriorMessageId: true,
  },
  [FlowKind.SIP_EXISTING_FOLIO]: {
    fulfillmentType: "SIP",
    recurring: true,
    usesFolio: true,
    payment: "purchase",
    requiresPriorMessageId: false,
  },
  [FlowKind.LUMPSUM_NEW_FOLIO]: {
    fulfillmentType: "LUMPSUM",
    recurring: false,
    usesFolio: false,
    payment: "purchase",
    requiresPriorMessageId: true,
  },
  [FlowKind.LUMPSUM_EXISTING_FOLIO]: {
    fulfillmentType: "LUMPSUM",
    recurring: false,
    usesFolio: true,
    payment: "purchase",
    requiresPriorMessageId: false,
  },
  [FlowKind.REDEMPTION]: {
    fulfillmentType: "REDEMPTION",
    recurring: false,
    usesFolio: true,
    payment: "payout",
    requiresPriorMessageId: false,
  },
  [FlowKind.PAYMENT_RETRY]: {
    fulfillmentType: "LUMPSUM",
    recurring: false,
    usesFolio: false,
    payment: "purchase",
    requiresPriorMessageId: false,
  },
};

export function profileOf(kind: FlowKind): FlowProfile {
  return PROFILES[kind];
}

export function parseFlowKind(value: unknown): FlowKind {
  const kind = Object.values(FlowKind).find((candidate) => candidate === value);
  if (kind === undefined) {
    throw new ValidationError(`kind must be one of ${Object.values(FlowKind).join(", ")}`);
  }
  return kind;
}
