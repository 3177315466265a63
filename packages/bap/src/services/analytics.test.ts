import { describe, it, expect, vi } from "vitest";
import { FakeTransport } from "../../../../tests/helpers/fake-transport.js";
import { createAnalyticsSink, disabledAnalytics } from "./analytics.js";

vi.mock("@fis-bap/shared", async (importOriginal) => {
  const actual = await importOriginal<typeof import("@fis-bap/shared")>();
  return {
    ...actual,
    createLogger: () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }),
  };
});

describe("createAnalyticsSink", () => {
  it("posts {type, data} with the bearer token", async () => {
    const transport = new FakeTransport();
    const sink = createAnalyticsSink("https://analytics.example.com/logs", "test-secret", transport);

    await sink.forward("confirm", { context: { action: "confirm" } });

    expect(transport.calls).toEqual([
      {
        url: "https://analytics.example.com/logs",
        body: '{"type":"confirm","data":{"context":{"action":"confirm"}}}',
        headers: {
          "Content-Type": "application/json",
          Authorization: "Bearer test-secret",
        },
      },
    ]);
  });

  it("never rejects when the sink is down", async () => {
    const transport = new FakeTransport().reply(new Error("ECONNRESET"));
    const sink = createAnalyticsSink("https://analytics.example.com/logs", "test-secret", transport);

    await expect(sink.forward("search", {})).resolves.toBeUndefined();
  });

  it("never rejects on an error status", async () => {
    const transport = new FakeTransport().reply({ statusCode: 500, text: "boom" });
    const sink = createAnalyticsSink("https://analytics.example.com/logs", "test-secret", transport);

    await expect(sink.forward("search", {})).resolves.toBeUndefined();
  });

  it("is disabled without a url", async () => {
    const transport = new FakeTransport();
    const sink = createAnalyticsSink("", "test-secret", transport);

    await sink.forward("search", {});

    expect(sink).toBe(disabledAnalytics);
    expect(transport.calls).toHaveLength(0);
  });
});
