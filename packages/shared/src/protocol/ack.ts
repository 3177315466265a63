import { formatBecknError, type OndcErrorCode } from "./error-codes.js";
import type { BecknAck, BecknNack } from "./types.js";

/** Synchronous ACK for an accepted callback. */
export function ack(): BecknAck {
  return {
    message: {
      ack: {
        status: "ACK",
      },
    },
  };
}

/**
 * NACK carrying the error category derived from `code`.
 * @param message - Overrides the code's default message.
 */
export function nack(code: OndcErrorCode, message?: string): BecknNack {
  return {
    message: {
      ack: {
        status: "NACK",
      },
    },
    error: formatBecknError(code, message),
  };
}
