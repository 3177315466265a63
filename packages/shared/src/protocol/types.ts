// ---------------------------------------------------------------------------
// Action enums (the FIS14 investment subset)
// ---------------------------------------------------------------------------

export enum BecknAction {
  search = "search",
  select = "select",
  init = "init",
  confirm = "confirm",
  status = "status",
  cancel = "cancel",
  update = "update",
}

export enum BecknCallbackAction {
  on_search = "on_search",
  on_select = "on_select",
  on_init = "on_init",
  on_confirm = "on_confirm",
  on_status = "on_status",
  on_cancel = "on_cancel",
  on_update = "on_update",
}

export const FIS14_DOMAIN = "ONDC:FIS14";
export const FIS14_CORE_VERSION = "2.0.0";
export const FIS14_TTL = "PT10M";

// ---------------------------------------------------------------------------
// Order building blocks
// ---------------------------------------------------------------------------

export interface Descriptor {
  name?: string;
  code?: string;
  short_desc?: string;
}

export interface TagEntry {
  descriptor: Descriptor;
  value: string;
}

export interface Tag {
  display?: boolean;
  descriptor: Descriptor;
  list: TagEntry[];
}

export interface Credential {
  id: string;
  type: string;
}

export interface Person {
  id: string;
  creds?: Credential[];
}

export interface Customer {
  person: Person;
  contact?: { phone: string };
}

export interface Agent {
  person: { id: string };
  organization: { creds: Credential[] };
}

export interface Stop {
  time: { schedule: { frequency: string } };
}

export interface Fulfillment {
  id: string;
  type: string;
  customer?: Customer;
  agent?: Agent;
  stops?: Stop[];
  tags?: Tag[];
}

export interface Measure {
  value: string;
  unit: string;
}

export interface OrderItem {
  id: string;
  quantity: { selected: { measure: Measure } };
  fulfillment_ids: string[];
  payment_ids?: string[];
}

export interface PaymentParams {
  amount: string;
  currency: string;
  source_bank_code: string;
  source_bank_account_number: string;
  source_bank_account_name: string;
  transaction_id?: string;
}

export interface Payment {
  id?: string;
  collected_by: string;
  status?: string;
  params: PaymentParams;
  type: string;
  tags: Tag[];
}

export interface XInput {
  form: { id: string };
  form_response?: { submission_id: string };
}

export interface Order {
  id?: string;
  provider: { id: string };
  items: OrderItem[];
  fulfillments: Fulfillment[];
  payments?: Payment[];
  xinput?: XInput;
  tags: Tag[];
}

export interface SearchIntent {
  category: { descriptor: { code: string } };
  fulfillment: { agent: { organization: { creds: Credential[] } } };
  tags: Tag[];
}

// ---------------------------------------------------------------------------
// Messages per outbound action
// ---------------------------------------------------------------------------

export interface SearchMessage {
  intent: SearchIntent;
}

export interface OrderMessage {
  order: Order;
}

export interface StatusMessage {
  order_id: string;
}

export interface CancelMessage {
  order_id: string;
  cancellation_reason_id: string;
  tags: Tag[];
}

export interface UpdateMessage {
  update_target: string;
  order: { id: string; payments: Payment[] };
}

export type OutboundMessage =
  | SearchMessage
  | OrderMessage
  | StatusMessage
  | CancelMessage
  | UpdateMessage;

// ---------------------------------------------------------------------------
// Envelope
// ---------------------------------------------------------------------------

export interface BecknContextLocation {
  country: { code: string };
  city: { code: string };
}

/**
 * Key order matters: the body is signed over its serialized bytes, and
 * builders emit fields in exactly this order.
 */
export interface BecknContext {
  location: BecknContextLocation;
  domain: string;
  timestamp: string;
  bap_id: string;
  bap_uri: string;
  transaction_id: string;
  message_id: string;
  version: string;
  ttl: string;
  bpp_id?: string;
  bpp_uri?: string;
  action: BecknAction | BecknCallbackAction;
}

export interface BecknRequest<M extends OutboundMessage = OutboundMessage> {
  context: BecknContext;
  message: M;
}

// ---------------------------------------------------------------------------
// Ack / Nack
// ---------------------------------------------------------------------------

export interface BecknAck {
  message: {
    ack: {
      status: "ACK";
    };
  };
}

export interface BecknNack {
  message: {
    ack: {
      status: "NACK";
    };
  };
  error?: {
    type: string;
    code: string;
    message: string;
  };
}
