// @fairdraw/shared - Commitments and deterministic deck permutation
//
// The permutation is part of the public verification contract: any
// re-implementation must reproduce these digests bit for bit.

import { randomBytes } from "node:crypto";
import { encodePacked, hexToBigInt, isHex, keccak256, stringToHex, toHex } from "viem";
import type { CardId, Hash, Hex } from "./types.js";

/**
 * Largest deck a round may use. Derivation costs one keccak256 per card and
 * runs synchronously, so decks stay in the range of physical card games.
 */
export const MAX_DECK_SIZE = 1024;

/**
 * Default deck size (standard 52-card deck)
 */
export const DEFAULT_DECK_SIZE = 52;

/**
 * Error thrown for invalid permutation inputs
 */
export class PermutationError extends Error {
  constructor(message: string, public code: "INVALID_DECK_SIZE" | "INVALID_SECRET") {
    super(message);
    this.name = "PermutationError";
  }
}

/**
 * Whether a value is a whole-byte 0x-prefixed hex string (empty "0x" allowed)
 */
export function isSecret(value: unknown): value is Hex {
  return typeof value === "string" && isHex(value, { strict: true }) && value.length % 2 === 0;
}

/**
 * Whether a value is a 32-byte digest
 */
export function isDigest(value: unknown): value is Hash {
  return typeof value === "string" && /^0x[0-9a-fA-F]{64}$/.test(value);
}

/**
 * Whether a deck size can be permuted
 */
export function isValidDeckSize(deckSize: number): boolean {
  return Number.isInteger(deckSize) && deckSize >= 0 && deckSize <= MAX_DECK_SIZE;
}

/**
 * Generate a fresh 32-byte secret for the authority to commit to
 * @returns 0x-prefixed hex string (66 characters total)
 */
export function generateSecret(): Hex {
  return toHex(randomBytes(32));
}

/**
 * Encode a UTF-8 string as secret bytes
 */
export function secretFromText(text: string): Hex {
  return stringToHex(text);
}

/**
 * Commitment to a secret: keccak256 over its raw bytes
 */
export function computeCommitment(secret: Hex): Hash {
  if (!isSecret(secret)) {
    throw new PermutationError("Secret must be 0x-prefixed hex of whole bytes", "INVALID_SECRET");
  }
  return keccak256(secret);
}

/**
 * Hash preimage for swap index i: the secret bytes followed by i as a
 * 4-byte big-endian unsigned integer, i.e. abi.encodePacked(bytes, uint32)
 */
export function encodeIndexPreimage(secret: Hex, index: number): Hex {
  return encodePacked(["bytes", "uint32"], [secret, index]);
}

/**
 * Derive the deck permutation for a disclosed secret.
 *
 * Fisher-Yates from the canonical order [0 .. deckSize-1], walking i from
 * deckSize-1 down to 1 and swapping i with
 * j = uint256(keccak256(secret ‖ uint32(i))) mod (i + 1).
 */
export function derivePermutation(secret: Hex, deckSize: number): CardId[] {
  if (!isValidDeckSize(deckSize)) {
    throw new PermutationError(
      `Invalid deck size: ${deckSize}. Must be an integer between 0 and ${MAX_DECK_SIZE}`,
      "INVALID_DECK_SIZE"
    );
  }
  if (!isSecret(secret)) {
    throw new PermutationError("Secret must be 0x-prefixed hex of whole bytes", "INVALID_SECRET");
  }

  const deck: CardId[] = Array.from({ length: deckSize }, (_, card) => card);

  for (let i = deckSize - 1; i > 0; i--) {
    const digest = keccak256(encodeIndexPreimage(secret, i));
    const j = Number(hexToBigInt(digest) % BigInt(i + 1));
    [deck[i], deck[j]] = [deck[j], deck[i]];
  }

  return deck;
}

/**
 * Whether cards is exactly a permutation of [0 .. deckSize-1]
 */
export function isPermutation(cards: readonly CardId[], deckSize: number): boolean {
  if (cards.length !== deckSize) return false;
  const seen = new Set<CardId>();
  for (const card of cards) {
    if (!Number.isInteger(card) || card < 0 || card >= deckSize || seen.has(card)) {
      return false;
    }
    seen.add(card);
  }
  return true;
}
