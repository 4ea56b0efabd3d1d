import * as jose from "jose";
import { isValidAddress } from "@fairdraw/shared";
import type { Caller, CallerRole } from "./types.js";

const ISSUER = "fairdraw-dealer";

function isCallerRole(value: unknown): value is CallerRole {
  return value === "authority" || value === "player";
}

/**
 * HS256 session tokens carrying the caller's address (sub) and role
 */
export class SessionTokens {
  private readonly key: Uint8Array;

  constructor(
    jwtSecret: string,
    private readonly ttlMs: number
  ) {
    this.key = new TextEncoder().encode(jwtSecret);
  }

  /**
   * @returns The token and its expiry in ms since epoch
   */
  async issue(caller: Caller): Promise<{ token: string; expiresAt: number }> {
    const issuedAt = Math.floor(Date.now() / 1000);
    const exp = issuedAt + Math.floor(this.ttlMs / 1000);

    const token = await new jose.SignJWT({ role: caller.role })
      .setProtectedHeader({ alg: "HS256" })
      .setSubject(caller.address)
      .setIssuer(ISSUER)
      .setIssuedAt(issuedAt)
      .setExpirationTime(exp)
      .sign(this.key);

    return { token, expiresAt: exp * 1000 };
  }

  /**
   * @returns The caller, or null for a bad signature, expiry, issuer or claim
   */
  async read(token: string): Promise<Caller | null> {
    let payload: jose.JWTPayload;
    try {
      ({ payload } = await jose.jwtVerify(token, this.key, { issuer: ISSUER }));
    } catch {
      return null;
    }

    const { sub, role } = payload;
    if (!sub || !isValidAddress(sub) || !isCallerRole(role)) {
      return null;
    }
    return { address: sub, role };
  }
}
