import {
  pgTable,
  pgEnum,
  uuid,
  text,
  timestamp,
  jsonb,
  index,
  unique,
} from "drizzle-orm/pg-core";

// ---------------------------------------------------------------------------
// Enums
// ---------------------------------------------------------------------------

export const callbackStageEnum = pgEnum("callback_stage", [
  "on_search",
  "on_select",
  "on_init",
  "on_confirm",
  "on_status",
  "on_update",
  "on_cancel",
]);

export type CallbackStage = (typeof callbackStageEnum.enumValues)[number];

// ---------------------------------------------------------------------------
// Tables (insert-only)
// ---------------------------------------------------------------------------

export const transactions = pgTable("transactions", {
  id: uuid("id").primaryKey().defaultRandom(),
  transaction_id: text("transaction_id").unique().notNull(),
  status: text("status"),
  created_at: timestamp("created_at", { withTimezone: true })
    .notNull()
    .defaultNow(),
});

/** One row per outbound request, holding the exact body that was signed. */
export const messages = pgTable(
  "messages",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    message_id: text("message_id").unique().notNull(),
    transaction_id: text("transaction_id")
      .notNull()
      .references(() => transactions.transaction_id),
    action: text("action").notNull(),
    bpp_id: text("bpp_id").notNull().default(""),
    bpp_uri: text("bpp_uri").notNull().default(""),
    payload: jsonb("payload").notNull(),
    timestamp: timestamp("timestamp", { withTimezone: true }).notNull(),
    created_at: timestamp("created_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    index("idx_messages_transaction_id").on(table.transaction_id),
  ],
);

/**
 * Inbound callbacks. A search fans out to many sellers that all answer
 * with the search's message id, hence the seller in the uniqueness key.
 */
export const stageRecords = pgTable(
  "stage_records",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    stage: callbackStageEnum("stage").notNull(),
    transaction_id: text("transaction_id")
      .notNull()
      .references(() => transactions.transaction_id),
    message_id: text("message_id").notNull(),
    bpp_id: text("bpp_id").notNull().default(""),
    bpp_uri: text("bpp_uri").notNull().default(""),
    payload: jsonb("payload").notNull(),
    timestamp: timestamp("timestamp", { withTimezone: true }).notNull(),
    isin: text("isin"),
    pan: text("pan"),
    received_at: timestamp("received_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    unique("uq_stage_records_stage_message_bpp").on(
      table.stage,
      table.message_id,
      table.bpp_id,
    ),
    index("idx_stage_records_lookup").on(
      table.stage,
      table.transaction_id,
      table.bpp_id,
    ),
    index("idx_stage_records_pan").on(table.stage, table.pan),
    index("idx_stage_records_isin").on(table.isin),
  ],
);

export const submissions = pgTable(
  "submissions",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    transaction_id: text("transaction_id")
      .notNull()
      .references(() => transactions.transaction_id),
    message_id: text("message_id").notNull(),
    submission_id: text("submission_id").notNull(),
    bpp_id: text("bpp_id").notNull().default(""),
    bpp_uri: text("bpp_uri").notNull().default(""),
    timestamp: timestamp("timestamp", { withTimezone: true }).notNull(),
  },
  (table) => [
    index("idx_submissions_transaction_id").on(table.transaction_id),
  ],
);
