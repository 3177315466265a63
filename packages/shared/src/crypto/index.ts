export { generateKeyPair, publicKeyFor, sign, verify } from "./ed25519.js";
export type { Ed25519KeyPair } from "./ed25519.js";
export { hashBody, createDigestHeader } from "./blake512.js";
export {
  SIGNATURE_VALIDITY_SECONDS,
  buildAuthHeader,
  createSigner,
  parseAuthHeader,
  verifyAuthHeader,
} from "./auth-header.js";
export type {
  BuildAuthHeaderParams,
  ParsedAuthHeader,
  Signer,
  SigningIdentity,
  VerifyAuthHeaderParams,
} from "./auth-header.js";
