import { normalizeAddress, type Address } from "@fairdraw/shared";

/**
 * Operations only the authority may perform
 */
export type GuardedAction = "commit" | "reveal" | "reset" | "create table";

/**
 * Error thrown when a caller is not the authority
 */
export class AccessError extends Error {
  constructor(message: string, public code: "UNAUTHORIZED") {
    super(message);
    this.name = "AccessError";
  }
}

/**
 * Authority check composed in front of state-mutating operations.
 * The authority is fixed at construction; addresses compare case-insensitively.
 */
export class AccessGuard {
  readonly authority: Address;

  constructor(authority: Address) {
    this.authority = normalizeAddress(authority);
  }

  isAuthority(caller: Address | null | undefined): boolean {
    return !!caller && normalizeAddress(caller) === this.authority;
  }

  /**
   * @throws AccessError UNAUTHORIZED if caller is not the authority
   */
  authorize(caller: Address | null | undefined, action: GuardedAction): void {
    if (!this.isAuthority(caller)) {
      throw new AccessError(`Only the authority may ${action}`, "UNAUTHORIZED");
    }
  }
}
