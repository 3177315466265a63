import type { Agent, Credential, Descriptor, Tag, TagEntry } from "@fis-bap/shared";
import { PayloadReader } from "./payload-reader.js";

// ---------------------------------------------------------------------------
// Snapshot shapes
// ---------------------------------------------------------------------------

export interface CatalogItem {
  id: string;
  fulfillmentIds: string[];
  isin?: string;
}

export interface FulfillmentOffer {
  id: string;
  type: string;
}

export interface CatalogProvider {
  id: string;
  items: CatalogItem[];
  fulfillments: FulfillmentOffer[];
}

/** One seller's on_search catalog. */
export interface SearchSnapshot {
  providers: CatalogProvider[];
}

export interface PaymentSnapshot {
  id?: string;
  collectedBy: string;
  status?: string;
  type?: string;
  amount?: string;
  currency?: string;
  bankCode?: string;
  accountNumber?: string;
  accountName?: string;
  /** First value of the first payment tag, e.g. MANDATE_REGISTRATION. */
  method?: string;
  tags: Tag[];
}

export interface OrderFulfillment {
  id: string;
  type: string;
  customerId: string;
  creds: Credential[];
  phone?: string;
  agent?: Agent;
  frequency?: string;
  tags: Tag[];
}

export interface OrderItemSnapshot {
  id: string;
  amount: string;
  unit?: string;
  fulfillmentIds: string[];
  paymentIds: string[];
}

/** The `message.order` of an on_select, on_init, on_confirm, on_status or on_update. */
export interface OrderSnapshot {
  id?: string;
  providerId: string;
  item: OrderItemSnapshot;
  fulfillment: OrderFulfillment;
  payments: PaymentSnapshot[];
  xinput?: {
    formId?: string;
    formUrl?: string;
    submissionId?: string;
  };
  tags: Tag[];
}

// ---------------------------------------------------------------------------
// Readers
// ---------------------------------------------------------------------------

function stringList(reader: PayloadReader, path: string): string[] {
  const ids: string[] = [];
  for (const entry of reader.each(path)) {
    const id = entry.optionalString("");
    if (id !== undefined) ids.push(id);
  }
  return ids;
}

function readDescriptor(reader: PayloadReader): Descriptor {
  const descriptor: Descriptor = {};
  const name = reader.optionalString("name");
  const code = reader.optionalString("code");
  if (name !== undefined) descriptor.name = name;
  if (code !== undefined) descriptor.code = code;
  return descriptor;
}

export function readTags(reader: PayloadReader, path: string): Tag[] {
  return reader.each(path).map((tag) => {
    const list: TagEntry[] = tag.each("list").map((entry) => ({
      descriptor: readDescriptor(entry.child("descriptor")),
      value: entry.optionalString("value") ?? "",
    }));
    const display = tag.at("display");
    const parsed: Tag = { descriptor: readDescriptor(tag.child("descriptor")), list };
    if (display.ok && typeof display.value === "boolean") {
      return { display: display.value, ...parsed };
    }
    return parsed;
  });
}

function readCreds(reader: PayloadReader, path: string): Credential[] {
  return reader.each(path).map((cred) => ({
    id: cred.requireString("id"),
    type: cred.requireString("type"),
  }));
}

function readAgent(reader: PayloadReader): Agent | undefined {
  if (!reader.has("")) return undefined;
  return {
    person: { id: reader.requireString("person.id") },
    organization: { creds: readCreds(reader, "organization.creds") },
  };
}

/** Value of a tag entry found by tag code and entry code. */
export function tagValue(tags: Tag[], tagCode: string, entryCode: string): string | undefined {
  const tag = tags.find((candidate) => candidate.descriptor.code === tagCode);
  return tag?.list.find((entry) => entry.descriptor.code === entryCode)?.value;
}

export function readPlanIsin(item: PayloadReader): string | undefined {
  return tagValue(readTags(item, "tags"), "PLAN_IDENTIFIERS", "ISIN");
}

export function readSearchSnapshot(payload: unknown): SearchSnapshot {
  const root = PayloadReader.of(payload, "on_search");
  const providers = root.requireEach("message.catalog.providers").map((provider) => ({
    id: provider.requireString("id"),
    items: provider.each("items").map((item) => {
      const catalogItem: CatalogItem = {
        id: item.requireString("id"),
        fulfillmentIds: stringList(item, "fulfillment_ids"),
      };
      const isin = readPlanIsin(item);
      if (isin !== undefined) catalogItem.isin = isin;
      return catalogItem;
    }),
    fulfillments: provider.each("fulfillments").map((fulfillment) => ({
      id: fulfillment.requireString("id"),
      type: fulfillment.requireString("type"),
    })),
  }));
  return { providers };
}

function readPayment(payment: PayloadReader): PaymentSnapshot {
  const tags = readTags(payment, "tags");
  return {
    id: payment.optionalString("id"),
    collectedBy: payment.requireString("collected_by"),
    status: payment.optionalString("status"),
    type: payment.optionalString("type"),
    amount: payment.optionalString("params.amount"),
    currency: payment.optionalString("params.currency"),
    bankCode: payment.optionalString("params.source_bank_code"),
    accountNumber: payment.optionalString("params.source_bank_account_number"),
    accountName: payment.optionalString("params.source_bank_account_name"),
    method: tags[0]?.list[0]?.value,
    tags,
  };
}

export function readOrderSnapshot(payload: unknown, stage: string): OrderSnapshot {
  const order = PayloadReader.of(payload, stage).child("message.order");

  const item = order.requireFirst("items");
  const measure = item.child("quantity.selected.measure");
  const fulfillment = order.requireFirst("fulfillments");
  const person = fulfillment.child("customer.person");

  const snapshot: OrderSnapshot = {
    id: order.optionalString("id"),
    providerId: order.requireString("provider.id"),
    item: {
      id: item.requireString("id"),
      amount: measure.requireString("value"),
      unit: measure.optionalString("unit"),
      fulfillmentIds: stringList(item, "fulfillment_ids"),
      paymentIds: stringList(item, "payment_ids"),
    },
    fulfillment: {
      id: fulfillment.requireString("id"),
      type: fulfillment.requireString("type"),
      customerId: person.requireString("id"),
      creds: readCreds(person, "creds"),
      phone: fulfillment.optionalString("customer.contact.phone"),
      agent: readAgent(fulfillment.child("agent")),
      frequency: fulfillment.optionalString("stops[0].time.schedule.frequency"),
      tags: readTags(fulfillment, "tags"),
    },
    payments: order.each("payments").map(readPayment),
    tags: readTags(order, "tags"),
  };

  if (order.has("xinput")) {
    snapshot.xinput = {
      formId: order.optionalString("xinput.form.id"),
      formUrl: order.optionalString("xinput.form.url"),
      submissionId: order.optionalString("xinput.form_response.submission_id"),
    };
  }
  return snapshot;
}
