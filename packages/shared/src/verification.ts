// @fairdraw/shared - Independent round verification

import { computeCommitment, derivePermutation, isSecret, isValidDeckSize } from "./permutation.js";
import type { CardId, Hash, Hex } from "./types.js";

/**
 * Published round data to check
 */
export interface VerificationInput {
  deckSize: number;
  committedDigest: Hash;
  secret: Hex;
  /** Permutation published by the dealer, if any */
  permutation?: readonly CardId[];
  /** Cards drawn so far, in draw order */
  drawnCards?: readonly CardId[];
}

export interface VerificationResult {
  valid: boolean;
  checks: {
    commitment: boolean;
    /** null when no permutation was supplied */
    permutation: boolean | null;
    /** null when no draws were supplied */
    draws: boolean | null;
  };
  expectedPermutation: CardId[];
  issues: string[];
}

/**
 * Recompute a round from its disclosed secret and compare against what was
 * published: the commitment, the permutation, and the draw sequence.
 */
export function verifyRound(input: VerificationInput): VerificationResult {
  const { deckSize, committedDigest, secret } = input;

  if (!isSecret(secret)) {
    return failed("Secret is not 0x-prefixed hex of whole bytes");
  }
  if (!isValidDeckSize(deckSize)) {
    return failed(`Invalid deck size: ${deckSize}`);
  }

  const issues: string[] = [];

  const actualDigest = computeCommitment(secret);
  const commitment = actualDigest.toLowerCase() === committedDigest.toLowerCase();
  if (!commitment) {
    issues.push(`Commitment mismatch: keccak256(secret)=${actualDigest}, committed=${committedDigest}`);
  }

  const expectedPermutation = derivePermutation(secret, deckSize);

  let permutation: boolean | null = null;
  if (input.permutation) {
    permutation =
      input.permutation.length === expectedPermutation.length &&
      input.permutation.every((card, i) => card === expectedPermutation[i]);
    if (!permutation) {
      issues.push("Published permutation does not match the derived permutation");
    }
  }

  let draws: boolean | null = null;
  if (input.drawnCards) {
    const drawnCards = input.drawnCards;
    if (drawnCards.length > deckSize) {
      draws = false;
      issues.push(`${drawnCards.length} draws exceed deck size ${deckSize}`);
    } else {
      const mismatch = drawnCards.findIndex((card, i) => card !== expectedPermutation[i]);
      draws = mismatch === -1;
      if (!draws) {
        issues.push(
          `Draw ${mismatch} was card ${drawnCards[mismatch]}, expected ${expectedPermutation[mismatch]}`
        );
      }
    }
  }

  return {
    valid: commitment && permutation !== false && draws !== false,
    checks: { commitment, permutation, draws },
    expectedPermutation,
    issues,
  };
}

function failed(issue: string): VerificationResult {
  return {
    valid: false,
    checks: { commitment: false, permutation: null, draws: null },
    expectedPermutation: [],
    issues: [issue],
  };
}
