import { randomBytes } from "node:crypto";
import type { Address } from "@fairdraw/shared";
import type { CallerRole, SignInChallenge } from "./types.js";

/**
 * Text a wallet signs to open a dealer session. It names the role the
 * session will carry so the signer sees whether they are signing in as
 * the round authority.
 */
export function signInMessage(challenge: Omit<SignInChallenge, "message">): string {
  return [
    "Sign in to the fairdraw dealer",
    "",
    `Wallet: ${challenge.address}`,
    `Role: ${challenge.role}`,
    `Nonce: ${challenge.nonce}`,
    `Expires: ${new Date(challenge.expiresAt).toISOString()}`,
  ].join("\n");
}

/**
 * Outstanding sign-in challenges, one use each. Expired entries are pruned
 * whenever a new challenge is issued.
 */
export class ChallengeBook {
  private pending = new Map<string, SignInChallenge>();

  constructor(private readonly ttlMs: number) {}

  issue(address: Address, role: CallerRole, now: number = Date.now()): SignInChallenge {
    this.prune(now);

    const base = {
      nonce: randomBytes(16).toString("hex"),
      address,
      role,
      expiresAt: now + this.ttlMs,
    };
    const challenge: SignInChallenge = { ...base, message: signInMessage(base) };
    this.pending.set(challenge.nonce, challenge);
    return challenge;
  }

  /**
   * Remove and return the challenge if it is live and was issued to address
   */
  take(nonce: string, address: Address, now: number = Date.now()): SignInChallenge | null {
    const challenge = this.pending.get(nonce);
    if (!challenge) return null;

    this.pending.delete(nonce);
    if (now > challenge.expiresAt || challenge.address !== address) {
      return null;
    }
    return challenge;
  }

  pendingCount(): number {
    return this.pending.size;
  }

  private prune(now: number): void {
    for (const [nonce, challenge] of this.pending) {
      if (now > challenge.expiresAt) {
        this.pending.delete(nonce);
      }
    }
  }
}
