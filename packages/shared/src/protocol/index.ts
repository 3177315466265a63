export * from "./types.js";
export { ack, nack } from "./ack.js";
export { buildContext, formatTimestamp } from "./context.js";
export type { BuildContextParams } from "./context.js";
export {
  isRecord,
  parseTimestamp,
  validateCallbackContext,
} from "./validator.js";
export type {
  CallbackContext,
  CallbackRejectionReason,
  CallbackValidation,
} from "./validator.js";
export {
  OndcErrorCode,
  OndcErrorType,
  errorTypeFromCode,
  formatBecknError,
} from "./error-codes.js";
export {
  BapError,
  CallbackTimeout,
  CorrelationMiss,
  InternalFailure,
  MalformedUpstreamPayload,
  NoMatchingFulfillment,
  UpstreamTransportFailure,
  ValidationError,
} from "./errors.js";
export type { CorrelationKey } from "./errors.js";
export {
  DEFAULT_BAP_TERMS_URL,
  DEFAULT_BPP_TERMS_URL,
  bapTermsTag,
  bppTermsTag,
} from "./terms.js";
