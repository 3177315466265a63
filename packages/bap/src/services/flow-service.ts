import {
  MalformedUpstreamPayload,
  UpstreamTransportFailure,
  ValidationError,
  createLogger,
  type BecknRequest,
} from "@fis-bap/shared";
import {
  orderIdOf,
  profileOf,
  readOrderSnapshot,
  readSearchSnapshot,
  synthesizeCancel,
  synthesizeConfirm,
  synthesizeFormSelect,
  synthesizeInit,
  synthesizeSearch,
  synthesizeSelect,
  synthesizeStatus,
  synthesizeUpdate,
  type CancelInput,
  type ConfirmInput,
  type InitInput,
  type OrderTarget,
  type SearchInput,
  type SelectInput,
  type SellerTarget,
  type SynthesisEnv,
} from "../synthesis/index.js";
import type { BecknClient } from "./beckn-client.js";
import type { CorrelationScope, Correlator } from "./correlator.js";
import type { FormVendor } from "./form-vendor.js";
import type { MessageStore } from "./message-store.js";

const logger = createLogger("bap-flows");

export interface InitRequest extends InitInput {
  /** The select whose on_select this init answers. */
  message_id_select?: string;
}

export interface ConfirmRequest extends ConfirmInput {
  /** The init whose on_init this confirm answers. */
  message_id_init?: string;
}

export interface FormSubmissionRequest extends SellerTarget {
  message_id_select?: string;
  form_data: Record<string, unknown>;
}

export interface KycFollowUpRequest extends SellerTarget {
  /** Defaults to the submission id the seller reported in on_status. */
  submission_id?: string;
}

export type KycStep = "digilocker" | "esign";

/** What every outbound action returns to the caller. */
export interface ActionResult {
  transaction_id: string;
  message_id: string;
  status_code: number;
  response: unknown;
}

export interface FormSubmissionResult extends ActionResult {
  submission_id: string;
}

export interface FlowServiceDeps {
  store: MessageStore;
  correlator: Correlator;
  client: BecknClient;
  formVendor: FormVendor;
  env: SynthesisEnv;
}

function scopeOf(target: SellerTarget): CorrelationScope {
  return {
    transaction_id: target.transaction_id,
    bpp_id: target.bpp_id,
    bpp_uri: target.bpp_uri,
  };
}

/**
 * One pipeline for every outbound step: correlate, synthesize, store the
 * outbound message, then sign and send it.
 *
 * Caller and correlation errors surface before anything is stored or sent.
 */
export class FlowService {
  private readonly store: MessageStore;
  private readonly correlator: Correlator;
  private readonly client: BecknClient;
  private readonly formVendor: FormVendor;
  private readonly env: SynthesisEnv;

  constructor(deps: FlowServiceDeps) {
    this.store = deps.store;
    this.correlator = deps.correlator;
    this.client = deps.client;
    this.formVendor = deps.formVendor;
    this.env = deps.env;
  }

  search(input: SearchInput): Promise<ActionResult> {
    return this.send(synthesizeSearch(input, this.env));
  }

  async select(input: SelectInput): Promise<ActionResult> {
    const record = await this.correlator.forSelect(scopeOf(input));
    const catalog = readSearchSnapshot(record.payload);
    return this.send(synthesizeSelect(catalog, input, this.env));
  }

  /**
   * Submit the investor's KYC form to the vendor the seller named, then
   * answer the on_select with the vendor's submission id.
   */
  async submitForm(input: FormSubmissionRequest): Promise<FormSubmissionResult> {
    const record = await this.correlator.forFormSubmission(
      scopeOf(input),
      input.message_id_select,
    );
    const order = readOrderSnapshot(record.payload, "on_select");
    const formUrl = order.xinput?.formUrl;
    if (formUrl === undefined) {
      throw new MalformedUpstreamPayload("message.order.xinput.form.url", "on_select");
    }
    const formId = order.xinput?.formId;
    if (formId === undefined) {
      throw new MalformedUpstreamPayload("message.order.xinput.form.id", "on_select");
    }

    const { submissionId } = await this.formVendor.submit(formUrl, input.form_data);
    const request = synthesizeFormSelect(order, { formId, submissionId }, input, this.env);

    await this.store.recordSubmission({
      transaction_id: input.transaction_id,
      message_id: request.context.message_id,
      submission_id: submissionId,
      bpp_id: input.bpp_id,
      bpp_uri: input.bpp_uri,
      timestamp: this.env.now(),
    });

    const result = await this.send(request);
    return { ...result, submission_id: submissionId };
  }

  /** DigiLocker and e-sign steps answer the form named in the latest on_status. */
  async kycFollowUp(step: KycStep, input: KycFollowUpRequest): Promise<ActionResult> {
    const record = await this.correlator.forKycFollowUp(scopeOf(input));
    const order = readOrderSnapshot(record.payload, "on_status");
    const formId = order.xinput?.formId;
    if (formId === undefined) {
      throw new MalformedUpstreamPayload("message.order.xinput.form.id", "on_status");
    }
    const submissionId = input.submission_id ?? order.xinput?.submissionId;
    if (submissionId === undefined) {
      throw new MalformedUpstreamPayload(
        "message.order.xinput.form_response.submission_id",
        "on_status",
      );
    }

    logger.info({ step, transactionId: input.transaction_id, formId }, "KYC follow-up");
    return this.send(synthesizeFormSelect(order, { formId, submissionId }, input, this.env));
  }

  async init(input: InitRequest): Promise<ActionResult> {
    if (profileOf(input.kind).requiresPriorMessageId && input.message_id_select === undefined) {
      throw new ValidationError(`message_id_select is required for ${input.kind}.`);
    }
    const record = await this.correlator.forInit(scopeOf(input), input.message_id_select);
    const order = readOrderSnapshot(record.payload, "on_select");
    return this.send(synthesizeInit(order, input, this.env));
  }

  async confirm(input: ConfirmRequest): Promise<ActionResult> {
    if (profileOf(input.kind).requiresPriorMessageId && input.message_id_init === undefined) {
      throw new ValidationError(`message_id_init is required for ${input.kind}.`);
    }
    const record = await this.correlator.forConfirm(scopeOf(input), input.message_id_init);
    const order = readOrderSnapshot(record.payload, "on_init");
    return this.send(synthesizeConfirm(order, input, this.env));
  }

  async status(input: OrderTarget): Promise<ActionResult> {
    const orderId = await this.orderIdFor(input);
    return this.send(synthesizeStatus(orderId, input, this.env));
  }

  async cancel(input: CancelInput): Promise<ActionResult> {
    const orderId = await this.orderIdFor(input);
    return this.send(synthesizeCancel(orderId, input, this.env));
  }

  /** The caller's order id; the stored on_confirm is consulted only without one. */
  private async orderIdFor(input: OrderTarget): Promise<string> {
    if (input.order_id !== undefined) return input.order_id;
    const record = await this.correlator.forOrder(scopeOf(input));
    return orderIdOf(readOrderSnapshot(record.payload, "on_confirm"), "on_confirm");
  }

  /** Payment retry: resend the payment from the last update, or the init. */
  async update(input: OrderTarget): Promise<ActionResult> {
    const record = await this.correlator.forPaymentRetry(scopeOf(input));
    const order = readOrderSnapshot(record.payload, record.stage);
    return this.send(synthesizeUpdate(order, record.stage, input, this.env));
  }

  private async send(request: BecknRequest): Promise<ActionResult> {
    const { context } = request;

    await this.store.ensureTransaction(context.transaction_id);
    const recorded = await this.store.recordOutbound({
      message_id: context.message_id,
      transaction_id: context.transaction_id,
      action: context.action,
      bpp_id: context.bpp_id ?? "",
      bpp_uri: context.bpp_uri ?? "",
      payload: request,
      timestamp: new Date(context.timestamp),
    });
    if (!recorded) {
      logger.warn(
        { action: context.action, messageId: context.message_id },
        "Message id already recorded; keeping the first outbound body",
      );
    }

    const result = await this.client.dispatch(request);
    if (!result.ok) {
      throw new UpstreamTransportFailure(result.statusCode, result.body);
    }

    return {
      transaction_id: context.transaction_id,
      message_id: context.message_id,
      status_code: result.statusCode,
      response: result.body,
    };
  }
}
