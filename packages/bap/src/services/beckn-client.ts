import {
  BecknAction,
  UpstreamTransportFailure,
  ValidationError,
  createLogger,
  type BecknRequest,
  type Signer,
} from "@fis-bap/shared";
import { disabledAnalytics, type AnalyticsSink } from "./analytics.js";
import { safeJson, type Transport } from "./transport.js";

const logger = createLogger("bap-beckn-client");

export interface BecknClientOptions {
  signer: Signer;
  transport: Transport;
  gatewayUrl: string;
  /** Sent as X-Gateway-Subscriber-Id. */
  gatewaySubscriberId: string;
  /** Sent as X-Gateway-Authorization. */
  signedUniqueReqId: string;
  analytics?: AnalyticsSink;
}

export interface DispatchResult {
  statusCode: number;
  ok: boolean;
  /** Parsed JSON, or the raw text when the peer did not answer JSON. */
  body: unknown;
}

function joinUrl(base: string, action: string): string {
  return `${base.replace(/\/+$/, "")}/${action}`;
}

/**
 * Signs and sends outbound protocol requests.
 *
 * `search` is broadcast through the gateway; every other action goes
 * straight to the seller at `{bpp_uri}/{action}`. The body is serialized
 * once and the same string is both signed and sent.
 */
export class BecknClient {
  private readonly analytics: AnalyticsSink;

  constructor(private readonly options: BecknClientOptions) {
    this.analytics = options.analytics ?? disabledAnalytics;
  }

  targetUrl(request: BecknRequest): string {
    const { action, bpp_uri } = request.context;
    if (action === BecknAction.search) {
      return joinUrl(this.options.gatewayUrl, action);
    }
    if (bpp_uri === undefined || bpp_uri === "") {
      throw new ValidationError("context.bpp_uri is required for non-search actions.");
    }
    return joinUrl(bpp_uri, action);
  }

  async dispatch(request: BecknRequest): Promise<DispatchResult> {
    const { action, transaction_id, message_id } = request.context;
    const url = this.targetUrl(request);
    const body = JSON.stringify(request);

    const headers = {
      "Content-Type": "application/json",
      Authorization: this.options.signer.sign(body),
      "X-Gateway-Authorization": this.options.signedUniqueReqId,
      "X-Gateway-Subscriber-Id": this.options.gatewaySubscriberId,
    };

    logger.info(
      { url, action, transactionId: transaction_id, messageId: message_id },
      "Sending request",
    );

    let statusCode: number;
    let text: string;
    try {
      ({ statusCode, text } = await this.options.transport.post(url, body, headers));
    } catch (err) {
      logger.error({ err, url, action }, "Failed to reach network participant");
      throw new UpstreamTransportFailure(
        502,
        { error: `Could not reach ${url}` },
        { cause: err },
      );
    }

    const ok = statusCode >= 200 && statusCode < 300;
    if (!ok) {
      logger.warn({ url, action, statusCode, response: text }, "Peer returned non-2xx status");
    }

    // never rejects; kept off the caller's path
    void this.analytics.forward(action, request);

    return { statusCode, ok, body: safeJson(text) };
  }
}
