import { blake2b } from "blakejs";

/**
 * BLAKE2b-512 digest of a request body, base64-encoded.
 *
 * Takes the serialized body rather than an object: the digest has to cover
 * the exact bytes that go on the wire, so callers serialize once and pass
 * the same string here and to the transport.
 */
export function hashBody(body: string): string {
  const hashBytes = blake2b(new TextEncoder().encode(body), undefined, 64);
  return Buffer.from(hashBytes).toString("base64");
}

/**
 * Create a Digest header value using BLAKE-512.
 * @returns Digest header string in the format `BLAKE-512=<base64_digest>`.
 */
export function createDigestHeader(body: string): string {
  return `BLAKE-512=${hashBody(body)}`;
}
