import type { CallbackStage } from "@fis-bap/shared";

/** Where a transaction stands, named after the last thing that happened to it. */
export enum Stage {
  Searched = "Searched",
  Selected = "Selected",
  FormSubmitted = "FormSubmitted",
  Initialized = "Initialized",
  Confirmed = "Confirmed",
  StatusPolled = "StatusPolled",
  Cancelled = "Cancelled",
  Updated = "Updated",
}

export const STAGE_OF_CALLBACK: Record<CallbackStage, Stage> = {
  on_search: Stage.Searched,
  on_select: Stage.Selected,
  on_init: Stage.Initialized,
  on_confirm: Stage.Confirmed,
  on_status: Stage.StatusPolled,
  on_cancel: Stage.Cancelled,
  on_update: Stage.Updated,
};

/** One outbound request, stored with the exact body that was signed. */
export interface OutboundMessageRecord {
  message_id: string;
  transaction_id: string;
  action: string;
  bpp_id: string;
  bpp_uri: string;
  payload: unknown;
  timestamp: Date;
}

export interface NewStageRecord {
  stage: CallbackStage;
  transaction_id: string;
  message_id: string;
  bpp_id: string;
  bpp_uri: string;
  payload: unknown;
  /** Callback context timestamp; decides "latest". */
  timestamp: Date;
  isin: string | null;
  pan: string | null;
}

export interface StageRecord extends NewStageRecord {
  /** Ingestion time; only breaks timestamp ties. */
  received_at: Date;
}

export interface StageQuery {
  stage: CallbackStage;
  transaction_id?: string;
  message_id?: string;
  bpp_id?: string;
  bpp_uri?: string;
  pan?: string;
  isin?: string;
}

export type ExactStageQuery = StageQuery & { message_id: string };

export interface SubmissionRecord {
  transaction_id: string;
  /** The select that carried the submission. */
  message_id: string;
  submission_id: string;
  bpp_id: string;
  bpp_uri: string;
  timestamp: Date;
}

export interface TransactionState {
  transaction_id: string;
  stage: Stage;
  timestamp: Date;
  message_id: string;
  bpp_id: string;
  bpp_uri: string;
  /** Callback body, or `{ submission_id }` for a form submission. */
  payload: unknown;
}

export type PutOutcome = "stored" | "duplicate";

/**
 * Insert-only persistence of every exchanged message.
 *
 * Lookups return null when nothing matches; storage failures throw.
 */
export interface MessageStore {
  ensureTransaction(transactionId: string): Promise<void>;
  transactionExists(transactionId: string): Promise<boolean>;
  /** False when a message with the same id was already recorded. */
  recordOutbound(message: OutboundMessageRecord): Promise<boolean>;
  putStageRecord(record: NewStageRecord): Promise<PutOutcome>;
  findLatest(query: StageQuery): Promise<StageRecord | null>;
  findExact(query: ExactStageQuery): Promise<StageRecord | null>;
  /** Newest first. */
  listStageRecords(query: StageQuery): Promise<StageRecord[]>;
  recordSubmission(submission: SubmissionRecord): Promise<void>;
  transactionState(transactionId: string): Promise<TransactionState | null>;
}

/** Newest protocol timestamp first, later ingestion first on a tie. */
export function compareNewestFirst(
  a: { timestamp: Date; received_at: Date },
  b: { timestamp: Date; received_at: Date },
): number {
  const byTimestamp = b.timestamp.getTime() - a.timestamp.getTime();
  if (byTimestamp !== 0) return byTimestamp;
  return b.received_at.getTime() - a.received_at.getTime();
}

/**
 * Pick the transaction's current stage from its newest callback and newest
 * form submission.
 */
export function deriveTransactionState(
  transactionId: string,
  latestCallback: StageRecord | null,
  latestSubmission: SubmissionRecord | null,
): TransactionState | null {
  const fromCallback: TransactionState | null =
    latestCallback === null
      ? null
      : {
          transaction_id: transactionId,
          stage: STAGE_OF_CALLBACK[latestCallback.stage],
          timestamp: latestCallback.timestamp,
          message_id: latestCallback.message_id,
          bpp_id: latestCallback.bpp_id,
          bpp_uri: latestCallback.bpp_uri,
          payload: latestCallback.payload,
        };
  const fromSubmission: TransactionState | null =
    latestSubmission === null
      ? null
      : {
          transaction_id: transactionId,
          stage: Stage.FormSubmitted,
          timestamp: latestSubmission.timestamp,
          message_id: latestSubmission.message_id,
          bpp_id: latestSubmission.bpp_id,
          bpp_uri: latestSubmission.bpp_uri,
          payload: { submission_id: latestSubmission.submission_id },
        };

  if (fromCallback === null) return fromSubmission;
  if (fromSubmission === null) return fromCallback;
  return fromSubmission.timestamp.getTime() > fromCallback.timestamp.getTime()
    ? fromSubmission
    : fromCallback;
}
