import { describe, it, expect } from "vitest";
import { buildContext } from "./context.js";
import { BecknAction } from "./types.js";

const FIXED = new Date("2026-03-05T09:15:30.123Z");

describe("buildContext", () => {
  it("emits the FIS14 envelope keys in wire order for a seller-bound action", () => {
    const context = buildContext({
      action: BecknAction.select,
      bap_id: "investor.example.com",
      bap_uri: "https://investor.example.com/ondc",
      transaction_id: "T1",
      message_id: "M1",
      bpp_id: "api.cybrilla.com",
      bpp_uri: "https://api.cybrilla.com/ondc",
      timestamp: FIXED,
    });

    expect(Object.keys(context)).toEqual([
      "location",
      "domain",
      "timestamp",
      "bap_id",
      "bap_uri",
      "transaction_id",
      "message_id",
      "version",
      "ttl",
      "bpp_id",
      "bpp_uri",
      "action",
    ]);
    expect(JSON.stringify(context)).toBe(
      '{"location":{"country":{"code":"IND"},"city":{"code":"*"}},' +
        '"domain":"ONDC:FIS14","timestamp":"2026-03-05T09:15:30.123Z",' +
        '"bap_id":"investor.example.com","bap_uri":"https://investor.example.com/ondc",' +
        '"transaction_id":"T1","message_id":"M1","version":"2.0.0","ttl":"PT10M",' +
        '"bpp_id":"api.cybrilla.com","bpp_uri":"https://api.cybrilla.com/ondc",' +
        '"action":"select"}',
    );
  });

  it("omits seller fields for search", () => {
    const context = buildContext({
      action: BecknAction.search,
      bap_id: "b",
      bap_uri: "https://b",
      transaction_id: "T1",
      timestamp: FIXED,
    });
    expect(context.bpp_id).toBeUndefined();
    expect("bpp_uri" in context).toBe(false);
    expect(Object.keys(context).at(-1)).toBe("action");
  });

  it("generates a message id when none is given", () => {
    const context = buildContext({
      action: BecknAction.search,
      bap_id: "b",
      bap_uri: "https://b",
      transaction_id: "T1",
    });
    expect(context.message_id).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/,
    );
  });
});
