import type { CardId, Hash, Hex } from "@fairdraw/shared";

/**
 * A round that has not been committed to
 */
export interface IdleRound {
  phase: "idle";
  roundNumber: number;
  cursor: 0;
}

/**
 * A round whose digest is fixed but whose secret is still hidden
 */
export interface CommittedRound {
  phase: "committed";
  roundNumber: number;
  cursor: 0;
  committedDigest: Hash;
}

/**
 * A round whose secret is disclosed and whose permutation is fixed.
 * The phase follows the cursor: "revealed" before the first draw,
 * "drawing" while cards remain, "exhausted" once all are drawn.
 */
export interface RevealedRound {
  phase: "revealed" | "drawing" | "exhausted";
  roundNumber: number;
  cursor: number;
  committedDigest: Hash;
  disclosedSecret: Hex;
  permutation: readonly CardId[];
}

export type Round = IdleRound | CommittedRound | RevealedRound;

/**
 * Allocate a fresh round at the initial phase
 */
export function createRound(roundNumber: number): IdleRound {
  return { phase: "idle", roundNumber, cursor: 0 };
}

export function isRevealed(round: Round): round is RevealedRound {
  return round.phase === "revealed" || round.phase === "drawing" || round.phase === "exhausted";
}
