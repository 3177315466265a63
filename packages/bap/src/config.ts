import { randomUUID } from "node:crypto";
import { BAP_ENV_REQUIREMENTS, validateEnvironment } from "@fis-bap/shared";
import type { SynthesisEnv } from "./synthesis/index.js";

export interface BapConfig {
  port: number;
  databaseUrl: string;
  bapId: string;
  bapUri: string;
  privateKey: string;
  uniqueKeyId: string;
  gatewayUrl: string;
  gatewaySubscriberId: string;
  signedUniqueReqId: string;
  arn: string;
  euin: string;
  bapTermsUrl: string;
  bppTermsUrl: string;
  analyticsUrl: string;
  analyticsToken: string;
  callbackPollIntervalMs: number;
  callbackTimeoutMs: number;
}

/**
 * Read and validate the adapter's environment.
 *
 * With `exitOnError` the process exits on a bad configuration, as at
 * startup; otherwise an Error listing every problem is thrown.
 */
export function loadBapConfig(
  env: NodeJS.ProcessEnv = process.env,
  exitOnError = true,
): BapConfig {
  const result = validateEnvironment(BAP_ENV_REQUIREMENTS, exitOnError, env);
  if (!result.valid) {
    throw new Error(`Invalid configuration: ${result.errors.join("; ")}`);
  }

  const value = (name: string): string => result.values[name] ?? "";
  const bapId = value("BAP_ID");

  return {
    port: Number(value("BAP_PORT")),
    databaseUrl: value("DATABASE_URL"),
    bapId,
    bapUri: value("BAP_URI"),
    privateKey: value("BAP_PRIVATE_KEY"),
    uniqueKeyId: value("BAP_UNIQUE_KEY_ID"),
    gatewayUrl: value("GATEWAY_URL"),
    gatewaySubscriberId: value("GATEWAY_SUBSCRIBER_ID") || bapId,
    signedUniqueReqId: value("SIGNED_UNIQUE_REQ_ID"),
    arn: value("ARN"),
    euin: value("EUIN"),
    bapTermsUrl: value("BAP_TERMS_URL"),
    bppTermsUrl: value("BPP_TERMS_URL"),
    analyticsUrl: value("ANALYTICS_URL"),
    analyticsToken: value("ANALYTICS_TOKEN"),
    callbackPollIntervalMs: Number(value("CALLBACK_POLL_INTERVAL_MS")),
    callbackTimeoutMs: Number(value("CALLBACK_TIMEOUT_MS")),
  };
}

/** Identity, wall clock and random message ids for the payload builders. */
export function synthesisEnvFrom(config: BapConfig): SynthesisEnv {
  return {
    bapId: config.bapId,
    bapUri: config.bapUri,
    arn: config.arn,
    euin: config.euin,
    bapTermsUrl: config.bapTermsUrl,
    bppTermsUrl: config.bppTermsUrl,
    now: () => new Date(),
    newMessageId: () => randomUUID(),
  };
}
