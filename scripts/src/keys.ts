import { randomBytes } from "node:crypto";
import { generateKeyPair } from "@fis-bap/shared";

export const OUTPUT_FORMATS = ["env", "json", "text"] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

export interface SubscriberKeys {
  subscriber_id: string;
  unique_key_id: string;
  signing_private_key: string;
  /** Registered with the network registry against the unique key id. */
  signing_public_key: string;
}

export function createSubscriberKeys(subscriberId: string, uniqueKeyId?: string): SubscriberKeys {
  const { privateKey, publicKey } = generateKeyPair();
  return {
    subscriber_id: subscriberId,
    unique_key_id: uniqueKeyId ?? `key-${randomBytes(4).toString("hex")}`,
    signing_private_key: privateKey,
    signing_public_key: publicKey,
  };
}

/**
 * Render keys for the terminal. `env` prints the variables the adapter reads
 * at startup; the public key goes in a comment since only the registry needs it.
 */
export function renderKeys(keys: SubscriberKeys, format: OutputFormat): string {
  switch (format) {
    case "json":
      return JSON.stringify(keys, null, 2);
    case "env":
      return [
        `BAP_ID=${keys.subscriber_id}`,
        `BAP_UNIQUE_KEY_ID=${keys.unique_key_id}`,
        `BAP_PRIVATE_KEY=${keys.signing_private_key}`,
        `# signing public key: ${keys.signing_public_key}`,
      ].join("\n");
    case "text":
      return [
        "=== FIS14 BAP signing keys ===",
        "",
        `Subscriber ID       : ${keys.subscriber_id}`,
        `Unique Key ID       : ${keys.unique_key_id}`,
        `Signing Public Key  : ${keys.signing_public_key}`,
        `Signing Private Key : ${keys.signing_private_key}`,
      ].join("\n");
  }
}
