import { describe, it, expect, beforeEach } from "vitest";
import {
  BecknCallbackAction,
  CorrelationMiss,
  NoMatchingFulfillment,
  UpstreamTransportFailure,
  ValidationError,
  bapTermsTag,
} from "@fis-bap/shared";
import {
  BPP_ID,
  FIXED_NOW,
  PAN,
  SELLER,
  createOnConfirm,
  createOnInit,
  createOnSearch,
  createOnSelect,
  createOnStatus,
} from "../../../../tests/helpers/fixtures.js";
import { createHarness, type Harness } from "../../../../tests/helpers/harness.js";
import { FlowKind } from "../synthesis/index.js";

const ACK = { message: { ack: { status: "ACK" } } };
const lumpsum = { ...SELLER, kind: FlowKind.LUMPSUM_NEW_FOLIO, amount: "3000", pan: PAN };
const bank = {
  ifsc: "TEST0000001",
  account_number: "000111222333",
  account_name: "Test Investor",
};

describe("FlowService", () => {
  let harness: Harness;

  beforeEach(() => {
    harness = createHarness();
  });

  describe("search", () => {
    it("broadcasts through the gateway and opens the transaction", async () => {
      const result = await harness.flows.search({ transaction_id: "T1" });

      expect(result).toEqual({
        transaction_id: "T1",
        message_id: "msg-1",
        status_code: 200,
        response: ACK,
      });
      expect(harness.transport.calls[0]?.url).toBe("https://gateway.example.com/search");
      expect(harness.store.transactions.has("T1")).toBe(true);
      expect(harness.store.outbound[0]).toMatchObject({
        message_id: "msg-1",
        action: "search",
        bpp_id: "",
        bpp_uri: "",
      });
    });
  });

  describe("select", () => {
    it("builds on the seller's stored catalog", async () => {
      await harness.deliver(BecknCallbackAction.on_search, createOnSearch());

      const result = await harness.flows.select(lumpsum);

      expect(result.message_id).toBe("msg-1");
      expect(harness.transport.calls[0]?.url).toBe("https://api.cybrilla.com/ondc/select");
      expect(harness.store.outbound[0]).toMatchObject({
        message_id: "msg-1",
        transaction_id: "T1",
        action: "select",
        bpp_id: BPP_ID,
        timestamp: FIXED_NOW,
      });
    });

    it("sends nothing when no on_search was stored", async () => {
      await expect(harness.flows.select(lumpsum)).rejects.toThrow(CorrelationMiss);

      expect(harness.transport.calls).toHaveLength(0);
      expect(harness.store.outbound).toHaveLength(0);
    });

    it("sends nothing when the catalog has no SIP fulfillment", async () => {
      await harness.deliver(BecknCallbackAction.on_search, createOnSearch());

      await expect(
        harness.flows.select({
          ...lumpsum,
          kind: FlowKind.SIP_NEW_FOLIO,
          cadence: { frequency: "monthly", repeat: 12, day_number: 15 },
        }),
      ).rejects.toThrow(NoMatchingFulfillment);
      expect(harness.transport.calls).toHaveLength(0);
    });
  });

  describe("submitForm", () => {
    it("posts to the vendor and answers the on_select with the submission", async () => {
      await harness.deliver(BecknCallbackAction.on_select, createOnSelect());

      const result = await harness.flows.submitForm({
        ...SELLER,
        message_id_select: "on_select-msg",
        form_data: { pan: PAN },
      });

      expect(result.submission_id).toBe("SUB-1");
      expect(harness.formVendor.submissions).toEqual([
        { url: "https://forms.example.com/kyc/F01", formData: { pan: PAN } },
      ]);
      expect(harness.store.submissions[0]).toMatchObject({
        message_id: "msg-1",
        submission_id: "SUB-1",
        bpp_id: BPP_ID,
      });
      expect(harness.transport.bodiesFor("select")[0]).toMatchObject({
        message: {
          order: {
            xinput: { form: { id: "F01" }, form_response: { submission_id: "SUB-1" } },
          },
        },
      });
    });

    it("needs the form url from the on_select", async () => {
      await harness.deliver(
        BecknCallbackAction.on_select,
        createOnSelect({ xinput: { form: { id: "F01" } } }),
      );

      await expect(
        harness.flows.submitForm({ ...SELLER, form_data: {} }),
      ).rejects.toThrow("Missing or invalid field message.order.xinput.form.url in on_select payload");
      expect(harness.formVendor.submissions).toHaveLength(0);
    });
  });

  describe("kycFollowUp", () => {
    it("answers the form named in the latest on_status", async () => {
      await harness.deliver(BecknCallbackAction.on_status, createOnStatus());

      await harness.flows.kycFollowUp("digilocker", SELLER);

      expect(harness.transport.bodiesFor("select")[0]).toMatchObject({
        message: {
          order: {
            xinput: { form: { id: "F02" }, form_response: { submission_id: "SUB-77" } },
            tags: [bapTermsTag("https://buyer.example.com/echoed-terms")],
          },
        },
      });
    });

    it("takes the caller's submission id over the seller's", async () => {
      await harness.deliver(BecknCallbackAction.on_status, createOnStatus());

      await harness.flows.kycFollowUp("esign", { ...SELLER, submission_id: "SUB-99" });

      expect(harness.transport.bodiesFor("select")[0]).toMatchObject({
        message: { order: { xinput: { form_response: { submission_id: "SUB-99" } } } },
      });
    });
  });

  describe("init and confirm", () => {
    it("requires message_id_select for new-folio flows", async () => {
      await harness.deliver(BecknCallbackAction.on_select, createOnSelect());

      await expect(
        harness.flows.init({
          ...SELLER,
          kind: FlowKind.LUMPSUM_NEW_FOLIO,
          ip: "203.0.113.7",
          phone: "9000000001",
          bank,
          payment_mode: "NETBANKING",
        }),
      ).rejects.toThrow(new ValidationError("message_id_select is required for LUMPSUM_NEW_FOLIO."));
      expect(harness.transport.calls).toHaveLength(0);
    });

    it("inits against the named on_select", async () => {
      await harness.deliver(BecknCallbackAction.on_select, createOnSelect());

      await harness.flows.init({
        ...SELLER,
        kind: FlowKind.LUMPSUM_NEW_FOLIO,
        message_id_select: "on_select-msg",
        ip: "203.0.113.7",
        phone: "9000000001",
        bank,
        payment_mode: "NETBANKING",
      });

      expect(harness.transport.calls[0]?.url).toBe("https://api.cybrilla.com/ondc/init");
    });

    it("confirms the seller's order id", async () => {
      await harness.deliver(BecknCallbackAction.on_init, createOnInit());

      await harness.flows.confirm({
        ...SELLER,
        kind: FlowKind.LUMPSUM_NEW_FOLIO,
        message_id_init: "on_init-msg",
      });

      expect(harness.transport.bodiesFor("confirm")[0]).toMatchObject({
        message: { order: { id: "ORD-9001" } },
      });
    });
  });

  describe("order actions", () => {
    it("polls status for the confirmed order", async () => {
      await harness.deliver(BecknCallbackAction.on_confirm, createOnConfirm());

      await harness.flows.status(SELLER);

      expect(harness.transport.bodiesFor("status")[0]).toMatchObject({
        message: { order_id: "ORD-9001" },
      });
    });

    it("cancels with the investor's address", async () => {
      await harness.deliver(BecknCallbackAction.on_confirm, createOnConfirm());

      await harness.flows.cancel({ ...SELLER, ip: "198.51.100.4" });

      expect(harness.transport.bodiesFor("cancel")[0]).toMatchObject({
        message: {
          order_id: "ORD-9001",
          cancellation_reason_id: "07",
          tags: [{ list: [{ value: "198.51.100.4" }] }],
        },
      });
    });

    it("polls status for a caller-named order without a stored on_confirm", async () => {
      const result = await harness.flows.status({ ...SELLER, order_id: "ORD-1" });

      expect(result.status_code).toBe(200);
      expect(harness.transport.bodiesFor("status")[0]).toMatchObject({
        message: { order_id: "ORD-1" },
      });
    });

    it("cancels a caller-named order without a stored on_confirm", async () => {
      await harness.flows.cancel({ ...SELLER, order_id: "ORD-1", ip: "198.51.100.4" });

      expect(harness.transport.bodiesFor("cancel")[0]).toMatchObject({
        message: { order_id: "ORD-1", cancellation_reason_id: "07" },
      });
    });

    it("needs the on_confirm when no order id is given", async () => {
      await expect(harness.flows.status(SELLER)).rejects.toThrow(
        "No on_confirm record found for transaction_id=T1",
      );
      expect(harness.transport.calls).toHaveLength(0);
    });

    it("retries payment from the on_init before any update", async () => {
      await harness.deliver(BecknCallbackAction.on_init, createOnInit());

      await harness.flows.update(SELLER);

      expect(harness.transport.bodiesFor("update")[0]).toMatchObject({
        message: {
          update_target: "order.payments",
          order: { id: "ORD-9001", payments: [{ params: { amount: "3000" } }] },
        },
      });
    });

    it("passes a seller rejection through after recording the request", async () => {
      await harness.deliver(BecknCallbackAction.on_confirm, createOnConfirm());
      harness.transport.reply({ statusCode: 500, text: '{"error":"seller down"}' });

      const failure = await harness.flows.status(SELLER).catch((err: unknown) => err);

      expect(failure).toBeInstanceOf(UpstreamTransportFailure);
      expect(failure).toMatchObject({
        upstreamStatus: 500,
        upstreamBody: { error: "seller down" },
      });
      expect(harness.store.outbound).toHaveLength(1);
    });
  });
});
