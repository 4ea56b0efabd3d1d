import type { Address } from "@fairdraw/shared";

/**
 * What a signed-in wallet may do at the dealer: the authority runs rounds,
 * players draw
 */
export type CallerRole = "authority" | "player";

/**
 * Identity resolved from a session token, handed to draw sessions as the caller
 */
export interface Caller {
  address: Address;
  role: CallerRole;
}

/**
 * Pending sign-in: the exact text the wallet must sign, valid once
 */
export interface SignInChallenge {
  nonce: string;
  address: Address;
  role: CallerRole;
  message: string;
  expiresAt: number;
}

export interface SignInResult {
  token: string;
  expiresAt: number;
  caller: Caller;
}

export interface WalletAuthConfig {
  /** HS256 key, at least 32 characters */
  jwtSecret: string;
  /** Address signed-in wallets are compared against to assign roles */
  authority: Address;
  /** Challenge lifetime (default: 5 minutes) */
  challengeTtlMs?: number;
  /** Session lifetime (default: 24 hours) */
  sessionTtlMs?: number;
}

export const DEFAULT_CHALLENGE_TTL_MS = 5 * 60 * 1000;
export const DEFAULT_SESSION_TTL_MS = 24 * 60 * 60 * 1000;
