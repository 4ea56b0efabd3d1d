import { verifyMessage } from "viem";
import { isValidAddress, normalizeAddress, type Address, type Hex } from "@fairdraw/shared";
import { AccessGuard } from "../guard/index.js";
import { ChallengeBook } from "./challenges.js";
import { SessionTokens } from "./sessionTokens.js";
import {
  DEFAULT_CHALLENGE_TTL_MS,
  DEFAULT_SESSION_TTL_MS,
  type Caller,
  type CallerRole,
  type SignInChallenge,
  type SignInResult,
  type WalletAuthConfig,
} from "./types.js";

/**
 * Error thrown when a wallet sign-in fails
 */
export class AuthError extends Error {
  constructor(
    message: string,
    public code: "INVALID_ADDRESS" | "INVALID_NONCE" | "INVALID_SIGNATURE"
  ) {
    super(message);
    this.name = "AuthError";
  }
}

/**
 * Wallet sign-in for the dealer. A wallet signs a one-time challenge and
 * receives a session naming it as the authority or a player; the session
 * address is the caller every draw session sees.
 */
export class WalletAuth {
  private readonly guard: AccessGuard;
  private readonly challenges: ChallengeBook;
  private readonly tokens: SessionTokens;

  constructor(config: WalletAuthConfig) {
    this.guard = new AccessGuard(config.authority);
    this.challenges = new ChallengeBook(config.challengeTtlMs ?? DEFAULT_CHALLENGE_TTL_MS);
    this.tokens = new SessionTokens(config.jwtSecret, config.sessionTtlMs ?? DEFAULT_SESSION_TTL_MS);
  }

  roleOf(address: Address): CallerRole {
    return this.guard.isAuthority(address) ? "authority" : "player";
  }

  /**
   * Start a sign-in (GET /auth/nonce)
   */
  challenge(address: string): SignInChallenge {
    if (!isValidAddress(address)) {
      throw new AuthError("Invalid address", "INVALID_ADDRESS");
    }
    const wallet = normalizeAddress(address);
    return this.challenges.issue(wallet, this.roleOf(wallet));
  }

  /**
   * Finish a sign-in (POST /auth/verify). The challenge is spent even when
   * the signature is wrong.
   */
  async signIn(address: string, nonce: string, signature: string): Promise<SignInResult> {
    if (!isValidAddress(address)) {
      throw new AuthError("Invalid address", "INVALID_ADDRESS");
    }
    if (!isSignature(signature)) {
      throw new AuthError("Invalid signature format", "INVALID_SIGNATURE");
    }

    const wallet = normalizeAddress(address);
    const challenge = this.challenges.take(nonce, wallet);
    if (!challenge) {
      throw new AuthError("Invalid or expired nonce", "INVALID_NONCE");
    }

    let signed = false;
    try {
      signed = await verifyMessage({ address: wallet, message: challenge.message, signature });
    } catch (error) {
      console.warn(`[Auth] signature check failed for ${wallet}:`, error);
    }
    if (!signed) {
      throw new AuthError("Signature verification failed", "INVALID_SIGNATURE");
    }

    const caller: Caller = { address: wallet, role: challenge.role };
    const { token, expiresAt } = await this.tokens.issue(caller);
    console.log(`[Auth] ${caller.role} session issued for ${wallet}`);

    return { token, expiresAt, caller };
  }

  /**
   * Resolve a bearer token to its caller. A role that no longer matches the
   * configured authority is refused.
   */
  async authenticate(token: string): Promise<Caller | null> {
    const caller = await this.tokens.read(token);
    if (!caller || caller.role !== this.roleOf(caller.address)) {
      return null;
    }
    return caller;
  }

  /**
   * Open a session without a signature (tests and local tooling)
   */
  async openSession(address: Address): Promise<string> {
    const wallet = normalizeAddress(address);
    const { token } = await this.tokens.issue({ address: wallet, role: this.roleOf(wallet) });
    return token;
  }
}

/**
 * 65-byte signature: 0x followed by 130 hex characters
 */
function isSignature(value: string): value is Hex {
  return /^0x[a-fA-F0-9]{130}$/.test(value);
}
