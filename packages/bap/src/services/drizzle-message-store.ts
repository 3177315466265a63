import { and, desc, eq, type SQL } from "drizzle-orm";
import {
  messages,
  stageRecords,
  submissions,
  transactions,
  type Database,
} from "@fis-bap/shared";
import {
  deriveTransactionState,
  type ExactStageQuery,
  type MessageStore,
  type NewStageRecord,
  type OutboundMessageRecord,
  type PutOutcome,
  type StageQuery,
  type StageRecord,
  type SubmissionRecord,
  type TransactionState,
} from "./message-store.js";

type StageRecordRow = typeof stageRecords.$inferSelect;

function toStageRecord(row: StageRecordRow): StageRecord {
  return {
    stage: row.stage,
    transaction_id: row.transaction_id,
    message_id: row.message_id,
    bpp_id: row.bpp_id,
    bpp_uri: row.bpp_uri,
    payload: row.payload,
    timestamp: row.timestamp,
    isin: row.isin,
    pan: row.pan,
    received_at: row.received_at,
  };
}

function conditionsFor(query: StageQuery): SQL | undefined {
  const conditions: SQL[] = [eq(stageRecords.stage, query.stage)];
  if (query.transaction_id !== undefined) {
    conditions.push(eq(stageRecords.transaction_id, query.transaction_id));
  }
  if (query.message_id !== undefined) {
    conditions.push(eq(stageRecords.message_id, query.message_id));
  }
  if (query.bpp_id !== undefined) {
    conditions.push(eq(stageRecords.bpp_id, query.bpp_id));
  }
  if (query.bpp_uri !== undefined) {
    conditions.push(eq(stageRecords.bpp_uri, query.bpp_uri));
  }
  if (query.pan !== undefined) {
    conditions.push(eq(stageRecords.pan, query.pan));
  }
  if (query.isin !== undefined) {
    conditions.push(eq(stageRecords.isin, query.isin));
  }
  return and(...conditions);
}

/**
 * PostgreSQL-backed store. Duplicate inserts are absorbed by the unique
 * indexes (`ON CONFLICT DO NOTHING`) rather than checked beforehand.
 */
export class DrizzleMessageStore implements MessageStore {
  constructor(private readonly db: Database) {}

  async ensureTransaction(transactionId: string): Promise<void> {
    await this.db
      .insert(transactions)
      .values({ transaction_id: transactionId })
      .onConflictDoNothing();
  }

  async transactionExists(transactionId: string): Promise<boolean> {
    const rows = await this.db
      .select({ id: transactions.id })
      .from(transactions)
      .where(eq(transactions.transaction_id, transactionId))
      .limit(1);
    return rows.length > 0;
  }

  async recordOutbound(message: OutboundMessageRecord): Promise<boolean> {
    const inserted = await this.db
      .insert(messages)
      .values(message)
      .onConflictDoNothing()
      .returning({ id: messages.id });
    return inserted.length > 0;
  }

  async putStageRecord(record: NewStageRecord): Promise<PutOutcome> {
    const inserted = await this.db
      .insert(stageRecords)
      .values(record)
      .onConflictDoNothing()
      .returning({ id: stageRecords.id });
    return inserted.length > 0 ? "stored" : "duplicate";
  }

  async findLatest(query: StageQuery): Promise<StageRecord | null> {
    const [row] = await this.db
      .select()
      .from(stageRecords)
      .where(conditionsFor(query))
      .orderBy(desc(stageRecords.timestamp), desc(stageRecords.received_at))
      .limit(1);
    return row === undefined ? null : toStageRecord(row);
  }

  async findExact(query: ExactStageQuery): Promise<StageRecord | null> {
    return this.findLatest(query);
  }

  async listStageRecords(query: StageQuery): Promise<StageRecord[]> {
    const rows = await this.db
      .select()
      .from(stageRecords)
      .where(conditionsFor(query))
      .orderBy(desc(stageRecords.timestamp), desc(stageRecords.received_at));
    return rows.map(toStageRecord);
  }

  async recordSubmission(submission: SubmissionRecord): Promise<void> {
    await this.db.insert(submissions).values(submission);
  }

  async transactionState(transactionId: string): Promise<TransactionState | null> {
    const [callback] = await this.db
      .select()
      .from(stageRecords)
      .where(eq(stageRecords.transaction_id, transactionId))
      .orderBy(desc(stageRecords.timestamp), desc(stageRecords.received_at))
      .limit(1);
    const [submission] = await this.db
      .select()
      .from(submissions)
      .where(eq(submissions.transaction_id, transactionId))
      .orderBy(desc(submissions.timestamp))
      .limit(1);

    return deriveTransactionState(
      transactionId,
      callback === undefined ? null : toStageRecord(callback),
      submission ?? null,
    );
  }
}
