/**
 * Environment Variable Validator
 *
 * Checks the adapter's configuration at startup so that a missing key or a
 * malformed URL fails the boot instead of the first outbound call.
 */

import { createLogger } from "./logger.js";

const logger = createLogger("env-validator");

export type EnvValueKind = "string" | "integer" | "url";

export interface EnvRequirement {
  /** Environment variable name */
  name: string;
  /** Whether the variable is required (service won't start without it) */
  required: boolean;
  /** Default value if not set (only for optional vars) */
  default?: string;
  /** Shape the value must have; "string" when omitted */
  kind?: EnvValueKind;
  /** Description for error messages */
  description?: string;
}

export interface EnvValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
  values: Record<string, string>;
}

function checkKind(name: string, value: string, kind: EnvValueKind): string | null {
  switch (kind) {
    case "integer":
      return /^\d+$/.test(value) ? null : `${name} must be a non-negative integer, got "${value}"`;
    case "url":
      try {
        new URL(value);
        return null;
      } catch {
        return `${name} must be an absolute URL, got "${value}"`;
      }
    case "string":
      return null;
  }
}

/**
 * Validate environment variables against a set of requirements.
 *
 * @param requirements - Array of environment variable requirements
 * @param exitOnError - If true, process.exit(1) on validation failure. Default: true
 * @param env - Source of values; defaults to process.env
 * @returns Validation result with resolved values
 */
export function validateEnvironment(
  requirements: EnvRequirement[],
  exitOnError = true,
  env: NodeJS.ProcessEnv = process.env,
): EnvValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];
  const values: Record<string, string> = {};

  for (const req of requirements) {
    const value = env[req.name];

    if (value === undefined || value === "") {
      if (req.required) {
        errors.push(
          `Missing required env var: ${req.name}${req.description ? ` (${req.description})` : ""}`,
        );
      } else if (req.default !== undefined) {
        values[req.name] = req.default;
        warnings.push(`${req.name} not set, using default: "${req.default}"`);
      } else {
        values[req.name] = "";
        warnings.push(
          `Optional env var ${req.name} not set${req.description ? ` (${req.description})` : ""}`,
        );
      }
      continue;
    }

    const kindError = checkKind(req.name, value, req.kind ?? "string");
    if (kindError !== null) {
      errors.push(kindError);
    }
    values[req.name] = value;
  }

  if (warnings.length > 0) {
    logger.warn({ warnings }, "Environment variable warnings");
  }

  if (errors.length > 0) {
    logger.error({ errors }, "Environment variable validation failed");
    if (exitOnError) {
      process.exit(1);
    }
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
    values,
  };
}

// ---------------------------------------------------------------------------
// Buyer adapter requirement set
// ---------------------------------------------------------------------------

export const BAP_ENV_REQUIREMENTS: EnvRequirement[] = [
  { name: "DATABASE_URL", required: true, description: "PostgreSQL connection string" },
  { name: "BAP_PORT", required: false, default: "3004", kind: "integer" },
  { name: "BAP_ID", required: false, default: "investment.example.com", description: "BAP subscriber ID" },
  { name: "BAP_URI", required: false, default: "https://investment.example.com/ondc", kind: "url", description: "BAP callback URI" },
  { name: "BAP_PRIVATE_KEY", required: true, description: "Base64 Ed25519 signing key (32-byte seed or 64-byte seed+public)" },
  { name: "BAP_UNIQUE_KEY_ID", required: false, default: "key-1" },
  { name: "GATEWAY_URL", required: false, default: "https://staging.gateway.proteantech.in", kind: "url", description: "Gateway base URL for search" },
  { name: "GATEWAY_SUBSCRIBER_ID", required: false, description: "Sent as X-Gateway-Subscriber-Id; BAP_ID when unset" },
  { name: "SIGNED_UNIQUE_REQ_ID", required: false, description: "Sent as X-Gateway-Authorization" },
  { name: "ARN", required: false, description: "Distributor ARN quoted in search and select" },
  { name: "EUIN", required: false, description: "Employee EUIN quoted in select" },
  { name: "BAP_TERMS_URL", required: false, default: "https://buyerapp.com/legal/ondc:fis14/static_terms?v=0.1", kind: "url" },
  { name: "BPP_TERMS_URL", required: false, default: "https://sellerapp.com/legal/ondc:fis14/static_terms?v=0.1", kind: "url" },
  { name: "ANALYTICS_URL", required: false, description: "Observability sink; forwarding is off when unset" },
  { name: "ANALYTICS_TOKEN", required: false, description: "Bearer token for the observability sink" },
  { name: "CALLBACK_POLL_INTERVAL_MS", required: false, default: "2000", kind: "integer" },
  { name: "CALLBACK_TIMEOUT_MS", required: false, default: "30000", kind: "integer" },
];
