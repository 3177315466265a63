import {
  BecknCallbackAction,
  InternalFailure,
  createLogger,
  validateCallbackContext,
  type CallbackRejectionReason,
  type CallbackStage,
} from "@fis-bap/shared";
import { PayloadReader, readPlanIsin } from "../synthesis/index.js";
import { disabledAnalytics, type AnalyticsSink } from "./analytics.js";
import type { MessageStore } from "./message-store.js";

const logger = createLogger("bap-callback-ingestor");

const STAGE_OF_ACTION: Record<BecknCallbackAction, CallbackStage> = {
  [BecknCallbackAction.on_search]: "on_search",
  [BecknCallbackAction.on_select]: "on_select",
  [BecknCallbackAction.on_init]: "on_init",
  [BecknCallbackAction.on_confirm]: "on_confirm",
  [BecknCallbackAction.on_status]: "on_status",
  [BecknCallbackAction.on_cancel]: "on_cancel",
  [BecknCallbackAction.on_update]: "on_update",
};

export type IngestRejectionReason = CallbackRejectionReason | "unknown-transaction";

export type IngestOutcome =
  | { status: "stored" }
  | { status: "duplicate" }
  | { status: "rejected"; reason: IngestRejectionReason; errors: string[] };

/** Investor PAN from the order's customer id, without the `pan:` prefix. */
export function derivePan(payload: unknown): string | null {
  const id = PayloadReader.of(payload).optionalString(
    "message.order.fulfillments[0].customer.person.id",
  );
  if (id === undefined) return null;
  return id.startsWith("pan:") ? id.slice("pan:".length) : id;
}

/** First plan ISIN anywhere in an on_search catalog. */
export function deriveIsin(payload: unknown): string | null {
  const root = PayloadReader.of(payload);
  for (const provider of root.each("message.catalog.providers")) {
    for (const item of provider.each("items")) {
      const isin = readPlanIsin(item);
      if (isin !== undefined) return isin;
    }
  }
  return null;
}

/**
 * Validates and stores seller callbacks.
 *
 * Redelivery of the same (stage, message_id, bpp_id) is a no-op that still
 * ACKs; the first stored body wins.
 */
export class CallbackIngestor {
  constructor(
    private readonly store: MessageStore,
    private readonly analytics: AnalyticsSink = disabledAnalytics,
  ) {}

  async ingest(action: BecknCallbackAction, body: unknown): Promise<IngestOutcome> {
    const validation = validateCallbackContext(body, action);
    if (!validation.valid) {
      logger.warn({ action, reason: validation.reason, errors: validation.errors }, "Callback rejected");
      return { status: "rejected", reason: validation.reason, errors: validation.errors };
    }

    const { context } = validation;
    const stage = STAGE_OF_ACTION[action];

    try {
      if (!(await this.store.transactionExists(context.transaction_id))) {
        logger.warn(
          { action, transactionId: context.transaction_id },
          "Callback for unknown transaction",
        );
        return {
          status: "rejected",
          reason: "unknown-transaction",
          errors: [`Unknown transaction_id: ${context.transaction_id}`],
        };
      }

      const outcome = await this.store.putStageRecord({
        stage,
        transaction_id: context.transaction_id,
        message_id: context.message_id,
        bpp_id: context.bpp_id,
        bpp_uri: context.bpp_uri,
        payload: body,
        timestamp: context.timestamp,
        isin: deriveIsin(body),
        pan: derivePan(body),
      });

      if (outcome === "duplicate") {
        await this.compareWithStored(stage, context, body);
        return { status: "duplicate" };
      }
    } catch (err) {
      throw new InternalFailure(`Failed to store ${action} callback`, { cause: err });
    }

    logger.info(
      {
        action,
        transactionId: context.transaction_id,
        messageId: context.message_id,
        bppId: context.bpp_id,
      },
      "Callback stored",
    );
    void this.analytics.forward(action, body);
    return { status: "stored" };
  }

  private async compareWithStored(
    stage: CallbackStage,
    context: { transaction_id: string; message_id: string; bpp_id: string },
    body: unknown,
  ): Promise<void> {
    const stored = await this.store.findExact({
      stage,
      transaction_id: context.transaction_id,
      message_id: context.message_id,
      bpp_id: context.bpp_id,
    });
    const logContext = {
      stage,
      transactionId: context.transaction_id,
      messageId: context.message_id,
    };
    if (stored !== null && JSON.stringify(stored.payload) !== JSON.stringify(body)) {
      logger.warn(logContext, "Redelivered callback differs from the stored one; keeping the first");
    } else {
      logger.debug(logContext, "Duplicate callback ignored");
    }
  }
}
