import {
  DEFAULT_DECK_SIZE,
  MAX_DECK_SIZE,
  cardToString,
  isValidDeckSize,
  type Address,
  type CardId,
  type Hash,
  type Hex,
  type RoundPhase,
  type RoundSnapshot,
} from "@fairdraw/shared";
import { commit, reveal } from "../ledger/index.js";
import { AccessGuard, ObserverHub, type GuardedAction, type RoundObserver } from "../guard/index.js";
import { createRound, isRevealed, type Round } from "./round.js";

/**
 * Error thrown when a draw or reset is not allowed in the current phase
 */
export class SessionError extends Error {
  constructor(
    message: string,
    public code: "NOT_REVEALED" | "DECK_EXHAUSTED" | "ROUND_IN_PROGRESS" | "INVALID_DECK_SIZE"
  ) {
    super(message);
    this.name = "SessionError";
  }
}

export interface DrawSessionConfig {
  /** Principal allowed to commit, reveal and reset */
  authority: Address;
  /** Fixed number of cards per round (default: 52) */
  deckSize?: number;
  /** Identifier carried on every event (default: "1") */
  tableId?: string;
  observers?: RoundObserver[];
}

/**
 * Draw session for a single table.
 *
 * Owns exactly one round at a time and drives it through
 * idle -> committed -> revealed -> drawing -> exhausted, then back to a
 * fresh idle round on reset. Every operation is synchronous and either
 * applies completely or throws with the round untouched.
 */
export class DrawSession {
  readonly tableId: string;
  readonly deckSize: number;
  private readonly guard: AccessGuard;
  private readonly observers: ObserverHub;
  private round: Round;

  constructor(config: DrawSessionConfig) {
    const deckSize = config.deckSize ?? DEFAULT_DECK_SIZE;
    if (!isValidDeckSize(deckSize) || deckSize < 1) {
      throw new SessionError(
        `Invalid deck size: ${deckSize}. Must be an integer between 1 and ${MAX_DECK_SIZE}`,
        "INVALID_DECK_SIZE"
      );
    }

    this.tableId = config.tableId ?? "1";
    this.deckSize = deckSize;
    this.guard = new AccessGuard(config.authority);
    this.observers = new ObserverHub(config.observers);
    this.round = createRound(1);
  }

  get authority(): Address {
    return this.guard.authority;
  }

  get phase(): RoundPhase {
    return this.round.phase;
  }

  get roundNumber(): number {
    return this.round.roundNumber;
  }

  /**
   * Register an observer for this table's events
   * @returns Function removing the observer again
   */
  subscribe(observer: RoundObserver): () => void {
    return this.observers.add(observer);
  }

  /**
   * Check the caller may perform an authority-only action, before any
   * other precondition is looked at
   * @throws AccessError UNAUTHORIZED
   */
  requireAuthority(caller: Address, action: GuardedAction): void {
    this.guard.authorize(caller, action);
  }

  /**
   * Commit to keccak256(secret) for the current round (authority only)
   */
  commit(caller: Address, digest: Hash): void {
    this.guard.authorize(caller, "commit");
    this.round = commit(this.round, digest);

    console.log(`[Dealer] table=${this.tableId} round=${this.round.roundNumber} committed digest=${digest}`);
    this.observers.publish({
      type: "committed",
      tableId: this.tableId,
      roundNumber: this.round.roundNumber,
      digest,
    });
  }

  /**
   * Disclose the committed secret and fix the permutation (authority only)
   */
  reveal(caller: Address, secret: Hex): void {
    this.guard.authorize(caller, "reveal");
    this.round = reveal(this.round, secret, this.deckSize);

    console.log(`[Dealer] table=${this.tableId} round=${this.round.roundNumber} revealed`);
    this.observers.publish({
      type: "revealed",
      tableId: this.tableId,
      roundNumber: this.round.roundNumber,
      secret,
    });
  }

  /**
   * Draw the next card of the permutation. Open to any caller.
   *
   * @throws SessionError NOT_REVEALED before a valid reveal,
   *   DECK_EXHAUSTED once every card has been drawn
   */
  draw(caller: Address): CardId {
    const round = this.round;
    if (!isRevealed(round)) {
      throw new SessionError(
        `Round ${round.roundNumber} has not been revealed`,
        "NOT_REVEALED"
      );
    }
    if (round.cursor >= this.deckSize) {
      throw new SessionError(
        `Round ${round.roundNumber} has no cards left`,
        "DECK_EXHAUSTED"
      );
    }

    const position = round.cursor;
    const card = round.permutation[position];
    const cursor = position + 1;

    this.round = {
      ...round,
      cursor,
      phase: cursor === this.deckSize ? "exhausted" : "drawing",
    };

    const label = this.deckSize === 52 ? ` (${cardToString(card)})` : "";
    console.log(
      `[Dealer] table=${this.tableId} round=${round.roundNumber} draw #${position} card=${card}${label} caller=${caller}`
    );
    this.observers.publish({
      type: "card_drawn",
      tableId: this.tableId,
      roundNumber: round.roundNumber,
      caller,
      card,
      position,
    });

    return card;
  }

  /**
   * Cards left to draw in the current round
   */
  remaining(): number {
    return this.deckSize - this.round.cursor;
  }

  /**
   * Discard the current round and start a fresh one (authority only).
   * Allowed only before a commitment or after the last card was drawn.
   *
   * @throws SessionError ROUND_IN_PROGRESS otherwise
   */
  reset(caller: Address): void {
    this.guard.authorize(caller, "reset");

    const round = this.round;
    if (round.phase !== "idle" && round.phase !== "exhausted") {
      throw new SessionError(
        `Round ${round.roundNumber} is in progress (${round.phase}, ${this.remaining()} cards left)`,
        "ROUND_IN_PROGRESS"
      );
    }

    this.round = createRound(round.roundNumber + 1);

    console.log(`[Dealer] table=${this.tableId} reset, round=${this.round.roundNumber}`);
    this.observers.publish({
      type: "round_reset",
      tableId: this.tableId,
      roundNumber: this.round.roundNumber,
    });
  }

  /**
   * The round's full permutation, empty until revealed
   */
  getPermutation(): CardId[] {
    return isRevealed(this.round) ? [...this.round.permutation] : [];
  }

  /**
   * Cards drawn so far, in draw order
   */
  getDrawnCards(): CardId[] {
    return isRevealed(this.round) ? this.round.permutation.slice(0, this.round.cursor) : [];
  }

  /**
   * Public view of the current round
   */
  snapshot(): RoundSnapshot {
    const round = this.round;
    return {
      tableId: this.tableId,
      roundNumber: round.roundNumber,
      phase: round.phase,
      deckSize: this.deckSize,
      authority: this.authority,
      committedDigest: round.phase === "idle" ? null : round.committedDigest,
      disclosedSecret: isRevealed(round) ? round.disclosedSecret : null,
      cursor: round.cursor,
      remaining: this.remaining(),
      drawnCards: this.getDrawnCards(),
      permutation: this.getPermutation(),
    };
  }
}
