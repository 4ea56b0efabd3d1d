// @fairdraw/shared - Type definitions

/**
 * Deployment environments
 */
export type AppEnv = "local" | "staging" | "production";

/**
 * 0x-prefixed hex string
 */
export type Hex = `0x${string}`;

/**
 * 32-byte keccak256 digest (0x + 64 hex characters)
 */
export type Hash = `0x${string}`;

/**
 * Account address (0x-prefixed, 42 characters)
 */
export type Address = `0x${string}`;

/**
 * Opaque card identifier, 0 .. deckSize-1
 */
export type CardId = number;

/**
 * Round lifecycle phase
 *
 * "drawing" is "revealed" with at least one card drawn; "exhausted" means
 * every card of the permutation has been drawn.
 */
export type RoundPhase = "idle" | "committed" | "revealed" | "drawing" | "exhausted";

/**
 * Public view of a round. The secret is only present once disclosed.
 */
export interface RoundSnapshot {
  tableId: string;
  roundNumber: number;
  phase: RoundPhase;
  deckSize: number;
  authority: Address;
  committedDigest: Hash | null;
  disclosedSecret: Hex | null;
  cursor: number;
  remaining: number;
  drawnCards: CardId[];
  permutation: CardId[];
}

export interface CommittedEvent {
  type: "committed";
  tableId: string;
  roundNumber: number;
  digest: Hash;
}

export interface RevealedEvent {
  type: "revealed";
  tableId: string;
  roundNumber: number;
  secret: Hex;
}

export interface CardDrawnEvent {
  type: "card_drawn";
  tableId: string;
  roundNumber: number;
  caller: Address;
  card: CardId;
  /** Zero-based draw position within the round */
  position: number;
}

export interface RoundResetEvent {
  type: "round_reset";
  tableId: string;
  /** Number of the fresh round */
  roundNumber: number;
}

export type RoundEvent = CommittedEvent | RevealedEvent | CardDrawnEvent | RoundResetEvent;

/**
 * Environment variable names
 */
export const ENV_VARS = {
  APP_ENV: "APP_ENV",
  PORT: "PORT",

  // Dealer
  AUTHORITY_ADDRESS: "AUTHORITY_ADDRESS",
  JWT_SECRET: "JWT_SECRET",
  DECK_SIZE: "DECK_SIZE",
  DEFAULT_TABLE_ID: "DEFAULT_TABLE_ID",
  CORS_ALLOWED_ORIGINS: "CORS_ALLOWED_ORIGINS",

  // Verifier
  DEALER_URL: "DEALER_URL",
  TABLE_ID: "TABLE_ID",
  POLL_INTERVAL_MS: "POLL_INTERVAL_MS",
} as const;
