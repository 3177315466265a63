// ---------------------------------------------------------------------------
// NACK error taxonomy
// ---------------------------------------------------------------------------
// 10000-10099: Context errors (missing fields, invalid format)
// 20000-20099: Domain errors (payload shape, catalog content)
// 30000-30099: Policy errors (caller input)
// 40000-40099: Business errors (order / correlation state)
// 50000-50099: Technical errors (internal, timeout, dependency)
// ---------------------------------------------------------------------------

export enum OndcErrorType {
  CONTEXT_ERROR = "CONTEXT-ERROR",
  DOMAIN_ERROR = "DOMAIN-ERROR",
  POLICY_ERROR = "POLICY-ERROR",
  BUSINESS_ERROR = "BUSINESS-ERROR",
  TECHNICAL_ERROR = "TECHNICAL-ERROR",
}

export enum OndcErrorCode {
  INVALID_REQUEST = 10000,
  INVALID_CONTEXT_ACTION = 10005,
  INVALID_CONTEXT_TIMESTAMP = 10012,

  FULFILLMENT_NOT_FOUND = 20006,
  INVALID_DOMAIN_RESPONSE = 20008,

  MANDATORY_FIELD_MISSING = 30004,

  ORDER_NOT_FOUND = 40001,

  TECHNICAL_ERROR = 50000,
  TIMEOUT = 50001,
  DEPENDENCY_FAILURE = 50002,
}

const DEFAULT_MESSAGES: Record<OndcErrorCode, string> = {
  [OndcErrorCode.INVALID_REQUEST]: "Invalid request",
  [OndcErrorCode.INVALID_CONTEXT_ACTION]: "Invalid context action",
  [OndcErrorCode.INVALID_CONTEXT_TIMESTAMP]: "Invalid context timestamp",
  [OndcErrorCode.FULFILLMENT_NOT_FOUND]: "Fulfillment not found",
  [OndcErrorCode.INVALID_DOMAIN_RESPONSE]: "Invalid domain response",
  [OndcErrorCode.MANDATORY_FIELD_MISSING]: "Mandatory field missing",
  [OndcErrorCode.ORDER_NOT_FOUND]: "Order not found",
  [OndcErrorCode.TECHNICAL_ERROR]: "Technical error",
  [OndcErrorCode.TIMEOUT]: "Timeout",
  [OndcErrorCode.DEPENDENCY_FAILURE]: "Dependency failure",
};

/**
 * Derive the error category from a code's numeric range.
 */
export function errorTypeFromCode(code: OndcErrorCode): OndcErrorType {
  if (code < 20000) return OndcErrorType.CONTEXT_ERROR;
  if (code < 30000) return OndcErrorType.DOMAIN_ERROR;
  if (code < 40000) return OndcErrorType.POLICY_ERROR;
  if (code < 50000) return OndcErrorType.BUSINESS_ERROR;
  return OndcErrorType.TECHNICAL_ERROR;
}

/**
 * Format an error into the shape of a NACK `error` field.
 */
export function formatBecknError(
  code: OndcErrorCode,
  customMessage?: string,
): { type: string; code: string; message: string } {
  return {
    type: errorTypeFromCode(code),
    code: String(code),
    message: customMessage ?? DEFAULT_MESSAGES[code],
  };
}
