import { describe, it, expect } from "vitest";
import {
  OndcErrorCode,
  OndcErrorType,
  errorTypeFromCode,
  formatBecknError,
} from "./error-codes.js";

describe("errorTypeFromCode", () => {
  it.each([
    [OndcErrorCode.INVALID_REQUEST, OndcErrorType.CONTEXT_ERROR],
    [OndcErrorCode.INVALID_DOMAIN_RESPONSE, OndcErrorType.DOMAIN_ERROR],
    [OndcErrorCode.MANDATORY_FIELD_MISSING, OndcErrorType.POLICY_ERROR],
    [OndcErrorCode.ORDER_NOT_FOUND, OndcErrorType.BUSINESS_ERROR],
    [OndcErrorCode.TIMEOUT, OndcErrorType.TECHNICAL_ERROR],
  ])("maps %i to %s", (code, type) => {
    expect(errorTypeFromCode(code)).toBe(type);
  });
});

describe("formatBecknError", () => {
  it("uses the default message", () => {
    expect(formatBecknError(OndcErrorCode.FULFILLMENT_NOT_FOUND)).toEqual({
      type: "DOMAIN-ERROR",
      code: "20006",
      message: "Fulfillment not found",
    });
  });

  it("prefers a custom message", () => {
    expect(
      formatBecknError(OndcErrorCode.MANDATORY_FIELD_MISSING, "pan is required").message,
    ).toBe("pan is required");
  });
});
