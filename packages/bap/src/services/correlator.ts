import { CorrelationMiss, type CallbackStage } from "@fis-bap/shared";
import type { MessageStore, StageRecord } from "./message-store.js";

/** Every lookup is pinned to one transaction and one seller. */
export interface CorrelationScope {
  transaction_id: string;
  bpp_id: string;
  bpp_uri: string;
}

/**
 * Finds the stored callback the next outbound step builds on. A miss is a
 * CorrelationMiss raised before anything is sent.
 */
export class Correlator {
  constructor(private readonly store: MessageStore) {}

  /** Newest record of `stage` from this seller in this transaction. */
  async latest(stage: CallbackStage, scope: CorrelationScope): Promise<StageRecord> {
    const record = await this.store.findLatest({ stage, ...scope });
    if (record === null) {
      throw new CorrelationMiss(stage, { ...scope });
    }
    return record;
  }

  /** The record answering `messageId` when one is named, else the newest. */
  async exactOrLatest(
    stage: CallbackStage,
    scope: CorrelationScope,
    messageId?: string,
  ): Promise<StageRecord> {
    if (messageId === undefined) return this.latest(stage, scope);
    const record = await this.store.findExact({ stage, ...scope, message_id: messageId });
    if (record === null) {
      throw new CorrelationMiss(stage, { ...scope, message_id: messageId });
    }
    return record;
  }

  forSelect(scope: CorrelationScope): Promise<StageRecord> {
    return this.latest("on_search", scope);
  }

  forFormSubmission(scope: CorrelationScope, selectMessageId?: string): Promise<StageRecord> {
    return this.exactOrLatest("on_select", scope, selectMessageId);
  }

  forInit(scope: CorrelationScope, selectMessageId?: string): Promise<StageRecord> {
    return this.exactOrLatest("on_select", scope, selectMessageId);
  }

  forConfirm(scope: CorrelationScope, initMessageId?: string): Promise<StageRecord> {
    return this.exactOrLatest("on_init", scope, initMessageId);
  }

  /** DigiLocker and e-sign steps answer the form named in the latest on_status. */
  forKycFollowUp(scope: CorrelationScope): Promise<StageRecord> {
    return this.latest("on_status", scope);
  }

  /** Status and cancel read the order id from here when the caller names none. */
  forOrder(scope: CorrelationScope): Promise<StageRecord> {
    return this.latest("on_confirm", scope);
  }

  /** A payment retry builds on the last update, or on the init before any update. */
  async forPaymentRetry(scope: CorrelationScope): Promise<StageRecord> {
    const updated = await this.store.findLatest({ stage: "on_update", ...scope });
    if (updated !== null) return updated;
    const initialised = await this.store.findLatest({ stage: "on_init", ...scope });
    if (initialised === null) {
      throw new CorrelationMiss("on_update or on_init", { ...scope });
    }
    return initialised;
  }
}
