import { OndcErrorCode, formatBecknError } from "./error-codes.js";
import type { BecknNack } from "./types.js";

/**
 * Base for every error the adapter raises on purpose. Carries the HTTP
 * status it maps to and the NACK code reported to the caller.
 */
export class BapError extends Error {
  constructor(
    message: string,
    readonly statusCode: number,
    readonly errorCode: OndcErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }

  toNack(): BecknNack {
    return {
      message: { ack: { status: "NACK" } },
      error: formatBecknError(this.errorCode, this.message),
    };
  }
}

/** Caller input failed validation. Raised before any network call. */
export class ValidationError extends BapError {
  constructor(message: string) {
    super(message, 400, OndcErrorCode.MANDATORY_FIELD_MISSING);
  }
}

export type CorrelationKey = Readonly<
  Record<string, string | undefined>
>;

/** The stored record a step depends on does not exist. */
export class CorrelationMiss extends BapError {
  constructor(
    readonly stage: string,
    readonly key: CorrelationKey,
  ) {
    const described = Object.entries(key)
      .filter(([, value]) => value !== undefined)
      .map(([name, value]) => `${name}=${value}`)
      .join(", ");
    super(`No ${stage} record found for ${described}`, 404, OndcErrorCode.ORDER_NOT_FOUND);
  }
}

/** A stored seller payload lacks a field the next step needs. */
export class MalformedUpstreamPayload extends BapError {
  constructor(
    readonly path: string,
    readonly stage?: string,
  ) {
    super(
      stage === undefined
        ? `Missing or invalid field ${path}`
        : `Missing or invalid field ${path} in ${stage} payload`,
      400,
      OndcErrorCode.INVALID_DOMAIN_RESPONSE,
    );
  }
}

/** The catalog has no fulfillment of the requested type. */
export class NoMatchingFulfillment extends BapError {
  constructor(readonly fulfillmentType: string) {
    super(
      `No fulfillment with type '${fulfillmentType}' found.`,
      404,
      OndcErrorCode.FULFILLMENT_NOT_FOUND,
    );
  }
}

/**
 * The seller, gateway or form vendor answered with a non-2xx status, or
 * could not be reached (reported as 502). The upstream body is passed
 * through to the caller unchanged.
 */
export class UpstreamTransportFailure extends BapError {
  constructor(
    readonly upstreamStatus: number,
    readonly upstreamBody: unknown,
    options?: { cause?: unknown },
  ) {
    super(
      `Upstream responded with status ${upstreamStatus}`,
      upstreamStatus,
      OndcErrorCode.DEPENDENCY_FAILURE,
      options,
    );
  }
}

/** The expected callback did not arrive before the deadline. */
export class CallbackTimeout extends BapError {
  constructor(
    readonly stage: string,
    readonly waitedMs: number,
  ) {
    super(
      `Timed out after ${waitedMs}ms waiting for ${stage}`,
      408,
      OndcErrorCode.TIMEOUT,
    );
  }
}

/** Store or other internal failure; details stay in the logs. */
export class InternalFailure extends BapError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 500, OndcErrorCode.TECHNICAL_ERROR, options);
  }
}
