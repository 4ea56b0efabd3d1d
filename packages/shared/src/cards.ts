import type { CardId } from "./types.js";

const RANKS = ["2", "3", "4", "5", "6", "7", "8", "9", "T", "J", "Q", "K", "A"];
const SUITS = ["c", "d", "h", "s"]; // clubs, diamonds, hearts, spades

/**
 * Convert a card of a standard 52-card deck to a short label
 *
 * Mapping card ids to real cards is up to the consumer; this is the
 * convention used in logs and verification reports.
 *
 * @returns String like "Ac" (Ace of clubs), "Kd" (King of diamonds), or
 *   "#n" for ids outside 0-51
 */
export function cardToString(card: CardId): string {
  if (!Number.isInteger(card) || card < 0 || card >= 52) {
    return `#${card}`;
  }
  const suit = Math.floor(card / 13);
  const rank = card % 13;

  return `${RANKS[rank]}${SUITS[suit]}`;
}
