import { describe, it, expect, beforeEach } from "vitest";
import { CorrelationMiss, type CallbackStage } from "@fis-bap/shared";
import { MemoryMessageStore } from "../../../../tests/helpers/memory-store.js";
import { BPP_ID, BPP_URI, SELLER, TXN } from "../../../../tests/helpers/fixtures.js";
import { Correlator } from "./correlator.js";

async function put(
  store: MemoryMessageStore,
  stage: CallbackStage,
  messageId: string,
  timestamp: string,
  overrides: { bpp_id?: string; bpp_uri?: string } = {},
): Promise<void> {
  await store.putStageRecord({
    stage,
    transaction_id: TXN,
    message_id: messageId,
    bpp_id: overrides.bpp_id ?? BPP_ID,
    bpp_uri: overrides.bpp_uri ?? BPP_URI,
    payload: { marker: messageId },
    timestamp: new Date(timestamp),
    isin: null,
    pan: null,
  });
}

describe("Correlator", () => {
  let store: MemoryMessageStore;
  let correlator: Correlator;

  beforeEach(async () => {
    store = new MemoryMessageStore();
    await store.ensureTransaction(TXN);
    correlator = new Correlator(store);
  });

  it("returns the newest on_search from the seller", async () => {
    await put(store, "on_search", "search-1", "2026-03-10T06:00:00.000Z");
    await put(store, "on_search", "search-2", "2026-03-10T06:05:00.000Z");

    const record = await correlator.forSelect(SELLER);
    expect(record.message_id).toBe("search-2");
  });

  it("breaks timestamp ties by ingestion order", async () => {
    await put(store, "on_status", "status-1", "2026-03-10T06:00:00.000Z");
    await put(store, "on_status", "status-2", "2026-03-10T06:00:00.000Z");

    const record = await correlator.forKycFollowUp(SELLER);
    expect(record.message_id).toBe("status-2");
  });

  it("never crosses sellers", async () => {
    await put(store, "on_search", "search-1", "2026-03-10T06:00:00.000Z", {
      bpp_id: "other-seller.example.com",
      bpp_uri: "https://other-seller.example.com/ondc",
    });

    await expect(correlator.forSelect(SELLER)).rejects.toThrow(CorrelationMiss);
  });

  it("matches the named on_select exactly", async () => {
    await put(store, "on_select", "select-1", "2026-03-10T06:00:00.000Z");
    await put(store, "on_select", "select-2", "2026-03-10T06:05:00.000Z");

    const record = await correlator.forInit(SELLER, "select-1");
    expect(record.message_id).toBe("select-1");
  });

  it("names the key it could not find", async () => {
    await expect(correlator.forConfirm(SELLER, "init-9")).rejects.toThrow(
      "No on_init record found for transaction_id=T1, bpp_id=api.cybrilla.com, " +
        "bpp_uri=https://api.cybrilla.com/ondc, message_id=init-9",
    );
  });

  it("needs an on_confirm for order lookups", async () => {
    await expect(correlator.forOrder(SELLER)).rejects.toThrow(CorrelationMiss);
  });

  describe("forPaymentRetry", () => {
    it("prefers the latest on_update", async () => {
      await put(store, "on_init", "init-1", "2026-03-10T06:10:00.000Z");
      await put(store, "on_update", "update-1", "2026-03-10T06:00:00.000Z");

      const record = await correlator.forPaymentRetry(SELLER);
      expect(record.stage).toBe("on_update");
    });

    it("falls back to the on_init", async () => {
      await put(store, "on_init", "init-1", "2026-03-10T06:10:00.000Z");

      const record = await correlator.forPaymentRetry(SELLER);
      expect(record.message_id).toBe("init-1");
    });

    it("misses when neither exists", async () => {
      await expect(correlator.forPaymentRetry(SELLER)).rejects.toThrow(
        "No on_update or on_init record found",
      );
    });
  });
});
