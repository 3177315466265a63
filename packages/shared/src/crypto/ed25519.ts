import * as ed from "@noble/ed25519";
import { createHash } from "node:crypto";

// @noble/ed25519 v2 ships no synchronous sha512
ed.etc.sha512Sync = (...messages: Uint8Array[]): Uint8Array => {
  const hash = createHash("sha512");
  for (const msg of messages) {
    hash.update(msg);
  }
  return new Uint8Array(hash.digest());
};

export interface Ed25519KeyPair {
  privateKey: string;
  publicKey: string;
}

/**
 * Registry portals hand out signing keys either as the 32-byte seed or as the
 * 64-byte libsodium form (seed followed by public key). Both are accepted.
 */
function decodeSeed(privateKeyBase64: string): Uint8Array {
  const raw = Buffer.from(privateKeyBase64, "base64");
  if (raw.length === 32) return new Uint8Array(raw);
  if (raw.length === 64) return new Uint8Array(raw.subarray(0, 32));
  throw new Error(
    `Ed25519 private key must decode to 32 or 64 bytes, got ${raw.length}`,
  );
}

/**
 * Generate an Ed25519 key pair.
 * @returns Object with base64-encoded privateKey (32-byte seed) and publicKey.
 */
export function generateKeyPair(): Ed25519KeyPair {
  const privateKeyBytes = ed.utils.randomPrivateKey();
  const publicKeyBytes = ed.getPublicKey(privateKeyBytes);

  return {
    privateKey: Buffer.from(privateKeyBytes).toString("base64"),
    publicKey: Buffer.from(publicKeyBytes).toString("base64"),
  };
}

/** Derive the base64 public key for a base64 private key (seed or seed+public). */
export function publicKeyFor(privateKeyBase64: string): string {
  return Buffer.from(ed.getPublicKey(decodeSeed(privateKeyBase64))).toString(
    "base64",
  );
}

/**
 * Sign a message using Ed25519.
 * @param message - The plaintext message to sign.
 * @param privateKeyBase64 - Base64-encoded 32-byte seed or 64-byte seed+public key.
 * @returns Base64-encoded signature.
 */
export function sign(message: string, privateKeyBase64: string): string {
  const messageBytes = new TextEncoder().encode(message);
  const signature = ed.sign(messageBytes, decodeSeed(privateKeyBase64));
  return Buffer.from(signature).toString("base64");
}

/**
 * Verify an Ed25519 signature.
 * @returns True if the signature is valid.
 */
export function verify(
  message: string,
  signatureBase64: string,
  publicKeyBase64: string,
): boolean {
  const publicKeyBytes = Buffer.from(publicKeyBase64, "base64");
  const signatureBytes = Buffer.from(signatureBase64, "base64");
  const messageBytes = new TextEncoder().encode(message);
  return ed.verify(signatureBytes, messageBytes, publicKeyBytes);
}
