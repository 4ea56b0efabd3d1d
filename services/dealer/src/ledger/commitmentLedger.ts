import { computeCommitment, derivePermutation, type Hash, type Hex } from "@fairdraw/shared";
import type { CommittedRound, RevealedRound, Round } from "../session/round.js";

/**
 * Error thrown when the commit -> reveal ordering or binding is violated
 */
export class LedgerError extends Error {
  constructor(
    message: string,
    public code: "ALREADY_COMMITTED" | "NOT_COMMITTED" | "ALREADY_REVEALED" | "SEED_MISMATCH"
  ) {
    super(message);
    this.name = "LedgerError";
  }
}

/**
 * Record the authority's commitment for an idle round.
 * The digest is taken as given: it should be keccak256 of a secret only the
 * authority knows at this point.
 *
 * @returns The committed round
 * @throws LedgerError ALREADY_COMMITTED unless the round is idle
 */
export function commit(round: Round, digest: Hash): CommittedRound {
  if (round.phase !== "idle") {
    throw new LedgerError(
      `Round ${round.roundNumber} already has a commitment`,
      "ALREADY_COMMITTED"
    );
  }

  return {
    phase: "committed",
    roundNumber: round.roundNumber,
    cursor: 0,
    committedDigest: digest,
  };
}

/**
 * Disclose the committed secret and fix the round's permutation.
 *
 * The binding check keccak256(secret) == committedDigest is what stops the
 * authority from picking a secret after seeing the permutation it yields.
 * Nothing is derived unless it passes.
 *
 * @returns The revealed round, cursor at 0
 * @throws LedgerError NOT_COMMITTED, ALREADY_REVEALED or SEED_MISMATCH
 */
export function reveal(round: Round, secret: Hex, deckSize: number): RevealedRound {
  if (round.phase === "idle") {
    throw new LedgerError(`Round ${round.roundNumber} has no commitment to reveal`, "NOT_COMMITTED");
  }
  if (round.phase !== "committed") {
    throw new LedgerError(`Round ${round.roundNumber} is already revealed`, "ALREADY_REVEALED");
  }

  const digest = computeCommitment(secret);
  if (digest.toLowerCase() !== round.committedDigest.toLowerCase()) {
    throw new LedgerError(
      `Secret does not match the commitment for round ${round.roundNumber}`,
      "SEED_MISMATCH"
    );
  }

  return {
    phase: "revealed",
    roundNumber: round.roundNumber,
    cursor: 0,
    committedDigest: round.committedDigest,
    disclosedSecret: secret,
    permutation: derivePermutation(secret, deckSize),
  };
}
