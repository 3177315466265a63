import { randomUUID } from "node:crypto";
import { ValidationError, createLogger } from "@fis-bap/shared";
import {
  FlowKind,
  PayloadReader,
  readOrderSnapshot,
  type BankDetails,
  type CadenceInput,
} from "../synthesis/index.js";
import type { ActionResult, FlowService } from "./flow-service.js";
import type { MessageStore, StageRecord } from "./message-store.js";
import { waitForRecord } from "./wait-for.js";

const logger = createLogger("bap-orchestrator");

export interface CompleteFlowInput {
  /** A fresh id is generated when omitted. */
  transaction_id?: string;
  bpp_id: string;
  bpp_uri: string;
  kind: FlowKind;
  amount: string;
  pan: string;
  provider_id?: string;
  item_id?: string;
  isin?: string;
  cadence?: CadenceInput;
  /** Submitted when the seller's on_select asks for a form. */
  form_data?: Record<string, unknown>;
  ip: string;
  phone: string;
  bank: BankDetails;
  payment_mode: string;
}

export interface FlowStep {
  action: string;
  message_id: string;
  status_code: number;
}

export interface CompleteFlowResult {
  transaction_id: string;
  /** `message.order` of the on_confirm. */
  order: unknown;
  steps: FlowStep[];
}

export interface OrchestratorOptions {
  intervalMs: number;
  timeoutMs: number;
}

const SUPPORTED_KINDS: readonly FlowKind[] = [FlowKind.SIP_NEW_FOLIO, FlowKind.LUMPSUM_NEW_FOLIO];

/**
 * Runs a new-folio purchase end to end: search, select, an optional KYC
 * form, init and confirm, waiting for each callback before the next step.
 */
export class FlowOrchestrator {
  constructor(
    private readonly flows: FlowService,
    private readonly store: MessageStore,
    private readonly options: OrchestratorOptions,
  ) {}

  async run(input: CompleteFlowInput, signal?: AbortSignal): Promise<CompleteFlowResult> {
    if (!SUPPORTED_KINDS.includes(input.kind)) {
      throw new ValidationError(
        `kind must be one of ${SUPPORTED_KINDS.join(", ")} for the complete flow.`,
      );
    }

    const transactionId = input.transaction_id ?? randomUUID();
    const seller = { transaction_id: transactionId, bpp_id: input.bpp_id, bpp_uri: input.bpp_uri };
    const steps: FlowStep[] = [];
    const track = (action: string, result: ActionResult): ActionResult => {
      steps.push({ action, message_id: result.message_id, status_code: result.status_code });
      logger.info({ transactionId, action, messageId: result.message_id }, "Flow step sent");
      return result;
    };

    track("search", await this.flows.search({ transaction_id: transactionId }));
    await this.waitFor(
      "on_search",
      () => this.store.findLatest({ stage: "on_search", ...seller }),
      signal,
    );

    const selected = track(
      "select",
      await this.flows.select({
        ...seller,
        kind: input.kind,
        amount: input.amount,
        pan: input.pan,
        provider_id: input.provider_id,
        item_id: input.item_id,
        isin: input.isin,
        cadence: input.cadence,
      }),
    );
    let onSelect = await this.waitForExact("on_select", seller, selected.message_id, signal);

    const formUrl = readOrderSnapshot(onSelect.payload, "on_select").xinput?.formUrl;
    if (input.form_data !== undefined && formUrl !== undefined) {
      const submitted = track(
        "form-submission",
        await this.flows.submitForm({
          ...seller,
          message_id_select: onSelect.message_id,
          form_data: input.form_data,
        }),
      );
      onSelect = await this.waitForExact("on_select", seller, submitted.message_id, signal);
    }

    const initialised = track(
      "init",
      await this.flows.init({
        ...seller,
        kind: input.kind,
        message_id_select: onSelect.message_id,
        ip: input.ip,
        phone: input.phone,
        bank: input.bank,
        payment_mode: input.payment_mode,
      }),
    );
    const onInit = await this.waitForExact("on_init", seller, initialised.message_id, signal);

    const confirmed = track(
      "confirm",
      await this.flows.confirm({ ...seller, kind: input.kind, message_id_init: onInit.message_id }),
    );
    const onConfirm = await this.waitForExact("on_confirm", seller, confirmed.message_id, signal);

    const order = PayloadReader.of(onConfirm.payload).at("message.order");
    logger.info({ transactionId, steps: steps.length }, "Flow complete");
    return { transaction_id: transactionId, order: order.ok ? order.value : null, steps };
  }

  private waitFor(
    stage: string,
    probe: () => Promise<StageRecord | null>,
    signal: AbortSignal | undefined,
  ): Promise<StageRecord> {
    return waitForRecord(probe, { stage, ...this.options, signal });
  }

  private waitForExact(
    stage: "on_select" | "on_init" | "on_confirm",
    seller: { transaction_id: string; bpp_id: string; bpp_uri: string },
    messageId: string,
    signal: AbortSignal | undefined,
  ): Promise<StageRecord> {
    return this.waitFor(
      stage,
      () => this.store.findExact({ stage, ...seller, message_id: messageId }),
      signal,
    );
  }
}
