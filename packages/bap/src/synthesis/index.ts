export { PayloadReader } from "./payload-reader.js";
export type { MissingPath, Result } from "./payload-reader.js";
export { buildFrequency, isCadence } from "./frequency.js";
export type { Cadence, CadenceInput } from "./frequency.js";
export { FlowKind, parseFlowKind, profileOf } from "./flow-kinds.js";
export type { FlowProfile, FulfillmentType } from "./flow-kinds.js";
export { envelope } from "./envelope.js";
export type { SellerTarget, SynthesisEnv } from "./envelope.js";
export {
  readOrderSnapshot,
  readPlanIsin,
  readSearchSnapshot,
  readTags,
  tagValue,
} from "./snapshots.js";
export type {
  CatalogItem,
  CatalogProvider,
  FulfillmentOffer,
  OrderSnapshot,
  PaymentSnapshot,
  SearchSnapshot,
} from "./snapshots.js";
export { synthesizeSearch } from "./search.js";
export type { SearchInput } from "./search.js";
export { chooseFulfillment, synthesizeSelect } from "./select.js";
export type { SelectInput } from "./select.js";
export { synthesizeFormSelect } from "./form.js";
export type { FormResponse } from "./form.js";
export { paymentMethodTag, synthesizeInit } from "./init.js";
export type { BankDetails, InitInput } from "./init.js";
export { classifyPaymentType, synthesizeConfirm } from "./confirm.js";
export type { ConfirmInput, PaymentType } from "./confirm.js";
export {
  CONSUMER_CANCELLATION_REASON,
  orderIdOf,
  synthesizeCancel,
  synthesizeStatus,
  synthesizeUpdate,
} from "./order-actions.js";
export type { CancelInput, OrderTarget } from "./order-actions.js";
