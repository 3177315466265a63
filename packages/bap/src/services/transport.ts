import { request as httpRequest } from "undici";

export interface TransportResponse {
  statusCode: number;
  text: string;
}

/**
 * Outbound HTTP seam. The body is posted exactly as given, so a signature
 * computed over it stays valid.
 */
export interface Transport {
  post(url: string, body: string, headers: Record<string, string>): Promise<TransportResponse>;
}

export interface UndiciTransportOptions {
  /** Applied to both headers and body; undici's default when omitted. */
  timeoutMs?: number;
}

export function createUndiciTransport(options: UndiciTransportOptions = {}): Transport {
  return {
    async post(url, body, headers) {
      const { statusCode, body: responseBody } = await httpRequest(url, {
        method: "POST",
        headers,
        body,
        headersTimeout: options.timeoutMs,
        bodyTimeout: options.timeoutMs,
      });
      return { statusCode, text: await responseBody.text() };
    },
  };
}

/** Parsed JSON when the text is JSON, the raw text otherwise, `{}` when empty. */
export function safeJson(text: string): unknown {
  if (text.trim() === "") return {};
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}
