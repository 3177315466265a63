import { hashBody } from "./blake512.js";
import { sign, verify } from "./ed25519.js";

/** Validity window of a signature header, in seconds. */
export const SIGNATURE_VALIDITY_SECONDS = 300;

export interface SigningIdentity {
  subscriberId: string;
  uniqueKeyId: string;
  privateKey: string;
}

export interface BuildAuthHeaderParams extends SigningIdentity {
  /** Serialized request body, byte-for-byte what will be sent. */
  body: string;
  /** Unix seconds; defaults to now. */
  created?: number;
}

export interface ParsedAuthHeader {
  keyId: string;
  algorithm: string;
  created: string;
  expires: string;
  headers: string;
  signature: string;
  subscriberId: string;
  uniqueKeyId: string;
}

export interface VerifyAuthHeaderParams {
  header: string;
  body: string;
  publicKey: string;
  /** Unix seconds; defaults to now. */
  now?: number;
}

/**
 * Produces the Authorization header for an already-serialized body.
 */
export interface Signer {
  sign(body: string): string;
}

/**
 * Signing string layout:
 *   (created): <unix_timestamp>
 *   (expires): <unix_timestamp>
 *   digest: BLAKE-512=<base64_digest>
 */
function buildSigningString(
  created: number,
  expires: number,
  digest: string,
): string {
  return `(created): ${created}\n(expires): ${expires}\ndigest: BLAKE-512=${digest}`;
}

/**
 * Build the Authorization header for an outbound network request.
 *
 * The digest is computed over `body` as given, so the same string must be
 * used as the HTTP payload.
 */
export function buildAuthHeader(params: BuildAuthHeaderParams): string {
  const { subscriberId, uniqueKeyId, privateKey, body } = params;

  const created = params.created ?? Math.floor(Date.now() / 1000);
  const expires = created + SIGNATURE_VALIDITY_SECONDS;

  const signingString = buildSigningString(created, expires, hashBody(body));
  const signature = sign(signingString, privateKey);

  return (
    `Signature keyId="${subscriberId}|${uniqueKeyId}|ed25519",` +
    `algorithm="ed25519",` +
    `created="${created}",` +
    `expires="${expires}",` +
    `headers="(created) (expires) digest",` +
    `signature="${signature}"`
  );
}

/**
 * Bind a signing identity into a {@link Signer}.
 */
export function createSigner(
  identity: SigningIdentity,
  clock: () => number = () => Math.floor(Date.now() / 1000),
): Signer {
  return {
    sign: (body: string) =>
      buildAuthHeader({ ...identity, body, created: clock() }),
  };
}

/**
 * Parse a Signature header string into its components.
 *
 * Expected format:
 *   Signature keyId="...",algorithm="...",created="...",expires="...",headers="...",signature="..."
 */
export function parseAuthHeader(header: string): ParsedAuthHeader {
  const headerBody = header.startsWith("Signature ")
    ? header.slice("Signature ".length)
    : header;

  const params = new Map<string, string>();
  for (const match of headerBody.matchAll(/(\w+)="([^"]*)"/g)) {
    const [, key, value] = match;
    if (key !== undefined && value !== undefined) params.set(key, value);
  }

  const keyId = params.get("keyId") ?? "";
  const [subscriberId = "", uniqueKeyId = ""] = keyId.split("|");

  return {
    keyId,
    algorithm: params.get("algorithm") ?? "",
    created: params.get("created") ?? "",
    expires: params.get("expires") ?? "",
    headers: params.get("headers") ?? "",
    signature: params.get("signature") ?? "",
    subscriberId,
    uniqueKeyId,
  };
}

/**
 * Verify a Signature header against the serialized body and a public key.
 * Returns false for a malformed, expired or future-dated header.
 */
export function verifyAuthHeader(params: VerifyAuthHeaderParams): boolean {
  const { header, body, publicKey } = params;
  const parsed = parseAuthHeader(header);

  const now = params.now ?? Math.floor(Date.now() / 1000);
  const expires = parseInt(parsed.expires, 10);
  if (isNaN(expires) || now > expires) {
    return false;
  }

  // 30s clock skew tolerance
  const created = parseInt(parsed.created, 10);
  if (isNaN(created) || created > now + 30) {
    return false;
  }

  if (parsed.signature.length === 0) {
    return false;
  }

  const signingString = buildSigningString(created, expires, hashBody(body));
  try {
    return verify(signingString, parsed.signature, publicKey);
  } catch {
    // wrong-length key or signature bytes
    return false;
  }
}
