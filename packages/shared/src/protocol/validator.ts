import type { BecknCallbackAction } from "./types.js";

// ISO 8601 timestamp pattern (basic check)
const ISO_TIMESTAMP_REGEX =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(\.\d+)?(Z|[+-]\d{2}:\d{2})$/;

const REQUIRED_CONTEXT_FIELDS = [
  "message_id",
  "transaction_id",
  "timestamp",
  "action",
] as const;

export type CallbackRejectionReason =
  | "missing-context"
  | "action-mismatch"
  | "bad-timestamp";

export interface CallbackContext {
  action: string;
  transaction_id: string;
  message_id: string;
  timestamp: Date;
  /** Empty string when the seller left it out. */
  bpp_id: string;
  bpp_uri: string;
}

export type CallbackValidation =
  | { valid: true; context: CallbackContext }
  | { valid: false; reason: CallbackRejectionReason; errors: string[] };

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function nonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

/** True when the fields name a real calendar day and time of day. */
function isCalendarDateTime(fields: number[]): boolean {
  const [year = 0, month = 0, day = 0, hour = 0, minute = 0, second = 0] = fields;
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day &&
    hour < 24 &&
    minute < 60 &&
    second < 60
  );
}

/**
 * Parse a protocol timestamp. Returns null for anything that is not a
 * full ISO-8601 date-time with a zone designator, and for dates that do
 * not exist (Feb 31 would otherwise roll into March).
 */
export function parseTimestamp(value: string): Date | null {
  const match = ISO_TIMESTAMP_REGEX.exec(value);
  if (match === null) return null;
  if (!isCalendarDateTime(match.slice(1, 7).map(Number))) return null;
  const millis = Date.parse(value);
  return isNaN(millis) ? null : new Date(millis);
}

/**
 * Validate the context of an inbound callback.
 *
 * Checks run in a fixed order and the first failing group wins:
 *   1. body and context are objects carrying message_id, transaction_id,
 *      timestamp and action
 *   2. context.action equals the endpoint's action
 *   3. context.timestamp parses
 */
export function validateCallbackContext(
  body: unknown,
  expectedAction: BecknCallbackAction,
): CallbackValidation {
  if (!isRecord(body) || !isRecord(body["context"])) {
    return {
      valid: false,
      reason: "missing-context",
      errors: ["context is required and must be an object."],
    };
  }

  const context = body["context"];
  const errors: string[] = [];
  for (const field of REQUIRED_CONTEXT_FIELDS) {
    if (!nonEmptyString(context[field])) {
      errors.push(`context.${field} is required.`);
    }
  }

  const action = context["action"];
  const transactionId = context["transaction_id"];
  const messageId = context["message_id"];
  const rawTimestamp = context["timestamp"];
  if (
    errors.length > 0 ||
    !nonEmptyString(action) ||
    !nonEmptyString(transactionId) ||
    !nonEmptyString(messageId) ||
    !nonEmptyString(rawTimestamp)
  ) {
    return { valid: false, reason: "missing-context", errors };
  }

  if (action !== expectedAction) {
    return {
      valid: false,
      reason: "action-mismatch",
      errors: [`context.action must be "${expectedAction}". Received: "${action}".`],
    };
  }

  const timestamp = parseTimestamp(rawTimestamp);
  if (timestamp === null) {
    return {
      valid: false,
      reason: "bad-timestamp",
      errors: ["context.timestamp must be a valid ISO 8601 timestamp."],
    };
  }

  const bppId = context["bpp_id"];
  const bppUri = context["bpp_uri"];
  return {
    valid: true,
    context: {
      action,
      transaction_id: transactionId,
      message_id: messageId,
      timestamp,
      bpp_id: typeof bppId === "string" ? bppId : "",
      bpp_uri: typeof bppUri === "string" ? bppUri : "",
    },
  };
}
