// @fairdraw/shared - Common types, config, permutation and verification
export const VERSION = "0.1.0";

// Types
export type {
  AppEnv,
  Hex,
  Hash,
  Address,
  CardId,
  RoundPhase,
  RoundSnapshot,
  RoundEvent,
  CommittedEvent,
  RevealedEvent,
  CardDrawnEvent,
  RoundResetEvent,
} from "./types.js";

export { ENV_VARS } from "./types.js";

// Config
export {
  getAppConfig,
  validateAppConfigEnv,
  clearAppConfigCache,
  requireEnv,
  requireAddress,
  optionalAddress,
  parsePositiveInt,
  parseAppEnv,
  isValidAddress,
  normalizeAddress,
  ConfigError,
  LOCAL_AUTHORITY,
  type AppConfig,
} from "./config.js";

// Permutation
export {
  derivePermutation,
  computeCommitment,
  encodeIndexPreimage,
  generateSecret,
  secretFromText,
  isPermutation,
  isSecret,
  isDigest,
  isValidDeckSize,
  PermutationError,
  DEFAULT_DECK_SIZE,
  MAX_DECK_SIZE,
} from "./permutation.js";

// Verification
export { verifyRound, type VerificationInput, type VerificationResult } from "./verification.js";

export { cardToString } from "./cards.js";
