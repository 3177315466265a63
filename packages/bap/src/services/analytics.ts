import { createLogger } from "@fis-bap/shared";
import type { Transport } from "./transport.js";

const logger = createLogger("bap-analytics");

/**
 * Receives a copy of every outbound request and stored callback.
 * Forwarding is best-effort: `forward` never rejects.
 */
export interface AnalyticsSink {
  forward(kind: string, payload: unknown): Promise<void>;
}

export const disabledAnalytics: AnalyticsSink = {
  async forward() {},
};

/**
 * POST `{type, data}` to the network's transaction-log endpoint with a
 * bearer token.
 *
 * @param url - Log ingestion endpoint; forwarding is disabled when empty.
 * @param token - Bearer token issued for this buyer app.
 */
export function createAnalyticsSink(
  url: string,
  token: string,
  transport: Transport,
): AnalyticsSink {
  if (url === "") {
    logger.info("ANALYTICS_URL not set; analytics forwarding disabled");
    return disabledAnalytics;
  }

  return {
    async forward(kind, payload) {
      try {
        const { statusCode, text } = await transport.post(
          url,
          JSON.stringify({ type: kind, data: payload }),
          {
            "Content-Type": "application/json",
            Authorization: `Bearer ${token}`,
          },
        );

        if (statusCode >= 400) {
          logger.warn({ kind, statusCode, response: text }, "Analytics sink returned error status");
        } else {
          logger.debug({ kind, statusCode }, "Analytics record delivered");
        }
      } catch (err) {
        logger.error({ err, kind }, "Failed to forward analytics record");
      }
    },
  };
}
