export { createLogger, REDACTED_PATHS } from "./logger.js";
export {
  validateEnvironment,
  BAP_ENV_REQUIREMENTS,
} from "./env-validator.js";
export type {
  EnvRequirement,
  EnvValidationResult,
  EnvValueKind,
} from "./env-validator.js";
