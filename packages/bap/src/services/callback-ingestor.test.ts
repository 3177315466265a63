import { describe, it, expect, vi, beforeEach } from "vitest";
import { BecknCallbackAction, InternalFailure } from "@fis-bap/shared";
import { MemoryMessageStore } from "../../../../tests/helpers/memory-store.js";
import {
  BPP_ID,
  PAN,
  TXN,
  createOnInit,
  createOnSearch,
  createOnStatus,
} from "../../../../tests/helpers/fixtures.js";
import { CallbackIngestor, deriveIsin, derivePan } from "./callback-ingestor.js";

function createAnalytics() {
  return { forward: vi.fn(async (_kind: string, _payload: unknown) => {}) };
}

describe("CallbackIngestor", () => {
  let store: MemoryMessageStore;
  let analytics: ReturnType<typeof createAnalytics>;
  let ingestor: CallbackIngestor;

  beforeEach(async () => {
    store = new MemoryMessageStore();
    await store.ensureTransaction(TXN);
    analytics = createAnalytics();
    ingestor = new CallbackIngestor(store, analytics);
  });

  it("stores a valid callback with its context fields", async () => {
    const body = createOnInit();

    await expect(ingestor.ingest(BecknCallbackAction.on_init, body)).resolves.toEqual({
      status: "stored",
    });

    expect(store.records).toHaveLength(1);
    expect(store.records[0]).toMatchObject({
      stage: "on_init",
      transaction_id: TXN,
      message_id: "on_init-msg",
      bpp_id: BPP_ID,
      timestamp: new Date("2026-03-10T06:30:00.000Z"),
      payload: body,
    });
    expect(analytics.forward).toHaveBeenCalledWith("on_init", body);
  });

  it("derives the ISIN from an on_search catalog", async () => {
    await ingestor.ingest(BecknCallbackAction.on_search, createOnSearch());

    expect(store.records[0]).toMatchObject({ isin: "INF000TEST01", pan: null });
  });

  it("derives the PAN from an on_status order", async () => {
    await ingestor.ingest(BecknCallbackAction.on_status, createOnStatus());

    expect(store.records[0]).toMatchObject({ pan: PAN, isin: null });
  });

  it("rejects a callback without a timestamp and stores nothing", async () => {
    const body = createOnInit({}, { timestamp: undefined });

    const outcome = await ingestor.ingest(BecknCallbackAction.on_init, body);

    expect(outcome).toEqual({
      status: "rejected",
      reason: "missing-context",
      errors: ["context.timestamp is required."],
    });
    expect(store.records).toHaveLength(0);
    expect(analytics.forward).not.toHaveBeenCalled();
  });

  it("rejects a callback posted to the wrong endpoint", async () => {
    const outcome = await ingestor.ingest(BecknCallbackAction.on_confirm, createOnInit());

    expect(outcome).toMatchObject({ status: "rejected", reason: "action-mismatch" });
  });

  it("rejects an unparseable timestamp", async () => {
    const outcome = await ingestor.ingest(
      BecknCallbackAction.on_init,
      createOnInit({}, { timestamp: "10/03/2026 06:30" }),
    );

    expect(outcome).toMatchObject({ status: "rejected", reason: "bad-timestamp" });
  });

  it("rejects a callback for a transaction this adapter never started", async () => {
    const outcome = await ingestor.ingest(
      BecknCallbackAction.on_init,
      createOnInit({}, { transaction_id: "T-unknown" }),
    );

    expect(outcome).toEqual({
      status: "rejected",
      reason: "unknown-transaction",
      errors: ["Unknown transaction_id: T-unknown"],
    });
  });

  it("treats a redelivery as a duplicate and keeps the first body", async () => {
    const first = createOnInit();
    const second = createOnInit({ id: "ORD-CHANGED" });

    await ingestor.ingest(BecknCallbackAction.on_init, first);
    const outcome = await ingestor.ingest(BecknCallbackAction.on_init, second);

    expect(outcome).toEqual({ status: "duplicate" });
    expect(store.records).toHaveLength(1);
    expect(store.records[0]?.payload).toEqual(first);
    expect(analytics.forward).toHaveBeenCalledTimes(1);
  });

  it("stores the same message id from two sellers separately", async () => {
    await ingestor.ingest(BecknCallbackAction.on_search, createOnSearch());
    await ingestor.ingest(
      BecknCallbackAction.on_search,
      createOnSearch(undefined, {
        bpp_id: "other-seller.example.com",
        bpp_uri: "https://other-seller.example.com/ondc",
      }),
    );

    expect(store.records.map((record) => record.bpp_id)).toEqual([
      BPP_ID,
      "other-seller.example.com",
    ]);
  });

  it("reports a storage failure as an internal failure", async () => {
    store.failWrites = true;

    await expect(ingestor.ingest(BecknCallbackAction.on_init, createOnInit())).rejects.toThrow(
      InternalFailure,
    );
  });
});

describe("derived fields", () => {
  it("strips the pan: prefix", () => {
    const payload = {
      message: { order: { fulfillments: [{ customer: { person: { id: "pan:XYZAB9876C" } } }] } },
    };
    expect(derivePan(payload)).toBe("XYZAB9876C");
  });

  it("leaves fields null when the paths are missing", () => {
    expect(derivePan({ message: {} })).toBeNull();
    expect(
      deriveIsin({ message: { catalog: { providers: [{ items: [{ id: "1" }] }] } } }),
    ).toBeNull();
  });
});
