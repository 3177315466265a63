import { describe, it, expect } from "vitest";
import { bapTermsTag } from "@fis-bap/shared";
import {
  PAN,
  SELLER,
  createAgent,
  createOnSelect,
  createOnStatus,
  createTestEnv,
} from "../../../../tests/helpers/fixtures.js";
import { synthesizeFormSelect } from "./form.js";
import { readOrderSnapshot } from "./snapshots.js";

describe("synthesizeFormSelect", () => {
  it("repeats the on_select order with the form response", () => {
    const order = readOrderSnapshot(createOnSelect(), "on_select");
    const request = synthesizeFormSelect(
      order,
      { formId: "F01", submissionId: "SUB-1" },
      SELLER,
      createTestEnv(),
    );

    expect(request.context.action).toBe("select");
    expect(request.message.order).toEqual({
      provider: { id: "32" },
      items: [
        {
          id: "12391",
          quantity: { selected: { measure: { value: "3000", unit: "INR" } } },
          fulfillment_ids: ["101679"],
        },
      ],
      fulfillments: [
        {
          id: "101679",
          type: "LUMPSUM",
          customer: { person: { id: `pan:${PAN}` } },
          agent: createAgent(),
        },
      ],
      xinput: { form: { id: "F01" }, form_response: { submission_id: "SUB-1" } },
      tags: [bapTermsTag("https://buyer.example.com/terms")],
    });
  });

  it("reuses the terms the seller echoed in on_status", () => {
    const order = readOrderSnapshot(createOnStatus(), "on_status");
    const request = synthesizeFormSelect(
      order,
      { formId: "F02", submissionId: "SUB-77" },
      SELLER,
      createTestEnv(),
    );
    expect(request.message.order.tags).toEqual([
      bapTermsTag("https://buyer.example.com/echoed-terms"),
    ]);
  });
});
