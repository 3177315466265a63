import { randomUUID } from "node:crypto";
import {
  FIS14_CORE_VERSION,
  FIS14_DOMAIN,
  FIS14_TTL,
  type BecknAction,
  type BecknContext,
} from "./types.js";

export interface BuildContextParams {
  action: BecknAction;
  bap_id: string;
  bap_uri: string;
  transaction_id: string;
  /** Absent for the broadcast search. */
  bpp_id?: string;
  bpp_uri?: string;
  /** Generated when omitted. */
  message_id?: string;
  /** Defaults to now. */
  timestamp?: Date;
}

/**
 * Protocol timestamp: ISO-8601, millisecond precision, UTC `Z` suffix.
 */
export function formatTimestamp(date: Date): string {
  return date.toISOString();
}

/**
 * Build an FIS14 request context.
 *
 * City is the wildcard `*` and the country is always India; the seller
 * fields are only emitted when both are known.
 */
export function buildContext(params: BuildContextParams): BecknContext {
  const context: BecknContext = {
    location: {
      country: { code: "IND" },
      city: { code: "*" },
    },
    domain: FIS14_DOMAIN,
    timestamp: formatTimestamp(params.timestamp ?? new Date()),
    bap_id: params.bap_id,
    bap_uri: params.bap_uri,
    transaction_id: params.transaction_id,
    message_id: params.message_id ?? randomUUID(),
    version: FIS14_CORE_VERSION,
    ttl: FIS14_TTL,
    action: params.action,
  };

  if (params.bpp_id !== undefined && params.bpp_uri !== undefined) {
    // re-create so action stays the last key
    const { action, ...rest } = context;
    return { ...rest, bpp_id: params.bpp_id, bpp_uri: params.bpp_uri, action };
  }
  return context;
}
