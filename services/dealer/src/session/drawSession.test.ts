import { describe, it, beforeEach } from "node:test";
import assert from "node:assert/strict";
import {
  MAX_DECK_SIZE,
  computeCommitment,
  derivePermutation,
  secretFromText,
  type Address,
  type RoundEvent,
} from "@fairdraw/shared";
import { DrawSession, SessionError } from "./drawSession.js";
import { LedgerError } from "../ledger/index.js";
import { AccessError } from "../guard/index.js";

const AUTHORITY: Address = "0xabcdefabcdefabcdefabcdefabcdefabcdefabcd";
const PLAYER: Address = "0x2222222222222222222222222222222222222222";

const SECRET = secretFromText("x");
const DIGEST = computeCommitment(SECRET);

function isCode(code: string): (err: unknown) => boolean {
  return (err: unknown) =>
    (err instanceof SessionError || err instanceof LedgerError || err instanceof AccessError) &&
    err.code === code;
}

function drawAll(session: DrawSession): number[] {
  const cards: number[] = [];
  while (session.remaining() > 0) {
    cards.push(session.draw(PLAYER));
  }
  return cards;
}

describe("DrawSession", () => {
  let session: DrawSession;
  let events: RoundEvent[];

  beforeEach(() => {
    events = [];
    session = new DrawSession({
      authority: AUTHORITY,
      deckSize: 4,
      tableId: "t1",
      observers: [
        {
          onCommitted: (e) => events.push(e),
          onRevealed: (e) => events.push(e),
          onCardDrawn: (e) => events.push(e),
          onRoundReset: (e) => events.push(e),
        },
      ],
    });
  });

  describe("construction", () => {
    it("starts idle with the full deck remaining", () => {
      assert.equal(session.phase, "idle");
      assert.equal(session.roundNumber, 1);
      assert.equal(session.remaining(), 4);
      assert.deepEqual(session.getPermutation(), []);
    });

    it("defaults to a 52-card deck", () => {
      const standard = new DrawSession({ authority: AUTHORITY });
      assert.equal(standard.deckSize, 52);
      assert.equal(standard.remaining(), 52);
      assert.equal(standard.tableId, "1");
    });

    it("rejects non-positive or fractional deck sizes", () => {
      for (const deckSize of [0, -3, 2.5, MAX_DECK_SIZE + 1, 2 ** 32]) {
        assert.throws(
          () => new DrawSession({ authority: AUTHORITY, deckSize }),
          isCode("INVALID_DECK_SIZE")
        );
      }
    });
  });

  it("plays a round on the largest allowed deck", () => {
    const large = new DrawSession({ authority: AUTHORITY, deckSize: MAX_DECK_SIZE });
    large.commit(AUTHORITY, DIGEST);
    large.reveal(AUTHORITY, SECRET);

    assert.equal(large.phase, "revealed");
    assert.equal(large.remaining(), MAX_DECK_SIZE);
    assert.equal(new Set(large.getPermutation()).size, MAX_DECK_SIZE);
  });

  describe("commit", () => {
    it("records the digest and moves to committed", () => {
      session.commit(AUTHORITY, DIGEST);

      assert.equal(session.phase, "committed");
      assert.equal(session.snapshot().committedDigest, DIGEST);
      assert.deepEqual(events, [{ type: "committed", tableId: "t1", roundNumber: 1, digest: DIGEST }]);
    });

    it("accepts the authority in any letter case", () => {
      session.commit("0xABCDEFABCDEFABCDEFABCDEFABCDEFABCDEFABCD", DIGEST);
      assert.equal(session.phase, "committed");
    });

    it("rejects a second commitment", () => {
      session.commit(AUTHORITY, DIGEST);
      assert.throws(() => session.commit(AUTHORITY, DIGEST), isCode("ALREADY_COMMITTED"));
      assert.equal(events.length, 1);
    });

    it("is authority only", () => {
      assert.throws(() => session.commit(PLAYER, DIGEST), isCode("UNAUTHORIZED"));
      assert.equal(session.phase, "idle");
      assert.equal(events.length, 0);
    });
  });

  describe("reveal", () => {
    it("fails before a commitment", () => {
      assert.throws(() => session.reveal(AUTHORITY, SECRET), isCode("NOT_COMMITTED"));
      assert.equal(session.phase, "idle");
    });

    it("computes the permutation and moves to revealed", () => {
      session.commit(AUTHORITY, DIGEST);
      session.reveal(AUTHORITY, SECRET);

      assert.equal(session.phase, "revealed");
      assert.deepEqual(session.getPermutation(), derivePermutation(SECRET, 4));
      assert.equal(session.snapshot().disclosedSecret, SECRET);
      assert.deepEqual(events[1], { type: "revealed", tableId: "t1", roundNumber: 1, secret: SECRET });
    });

    it("rejects a secret that does not match and leaves the round committed", () => {
      session.commit(AUTHORITY, DIGEST);

      assert.throws(() => session.reveal(AUTHORITY, secretFromText("y")), isCode("SEED_MISMATCH"));
      assert.equal(session.phase, "committed");
      assert.deepEqual(session.getPermutation(), []);
      assert.equal(session.snapshot().disclosedSecret, null);

      session.reveal(AUTHORITY, SECRET);
      assert.equal(session.phase, "revealed");
    });

    it("matches digests regardless of hex letter case", () => {
      session.commit(AUTHORITY, `0x${DIGEST.slice(2).toUpperCase()}`);
      session.reveal(AUTHORITY, SECRET);
      assert.equal(session.phase, "revealed");
    });

    it("rejects a second reveal", () => {
      session.commit(AUTHORITY, DIGEST);
      session.reveal(AUTHORITY, SECRET);
      session.draw(PLAYER);

      assert.throws(() => session.reveal(AUTHORITY, SECRET), isCode("ALREADY_REVEALED"));
      assert.equal(session.phase, "drawing");
    });

    it("checks authority before phase", () => {
      assert.throws(() => session.reveal(PLAYER, SECRET), isCode("UNAUTHORIZED"));
    });

    it("exposes the authority check on its own", () => {
      assert.throws(() => session.requireAuthority(PLAYER, "reveal"), isCode("UNAUTHORIZED"));
      session.requireAuthority("0xABCDEFABCDEFABCDEFABCDEFABCDEFABCDEFABCD", "reveal");
      assert.equal(session.phase, "idle");
    });
  });

  describe("draw", () => {
    it("fails before reveal", () => {
      assert.throws(() => session.draw(PLAYER), isCode("NOT_REVEALED"));
      session.commit(AUTHORITY, DIGEST);
      assert.throws(() => session.draw(PLAYER), isCode("NOT_REVEALED"));
    });

    it("returns the permutation in order, then fails when exhausted", () => {
      const expected = derivePermutation(SECRET, 4);
      session.commit(AUTHORITY, DIGEST);
      session.reveal(AUTHORITY, SECRET);

      assert.equal(session.draw(PLAYER), expected[0]);
      assert.equal(session.phase, "drawing");
      assert.equal(session.remaining(), 3);
      assert.equal(session.draw(AUTHORITY), expected[1]);
      assert.equal(session.draw(PLAYER), expected[2]);
      assert.equal(session.draw(PLAYER), expected[3]);

      assert.equal(session.phase, "exhausted");
      assert.equal(session.remaining(), 0);
      assert.throws(() => session.draw(PLAYER), isCode("DECK_EXHAUSTED"));
      assert.deepEqual(session.getDrawnCards(), expected);
    });

    it("notifies observers once per card in draw order", () => {
      const expected = derivePermutation(SECRET, 4);
      session.commit(AUTHORITY, DIGEST);
      session.reveal(AUTHORITY, SECRET);
      drawAll(session);

      const draws = events.filter((e) => e.type === "card_drawn");
      assert.deepEqual(draws, [
        { type: "card_drawn", tableId: "t1", roundNumber: 1, caller: PLAYER, card: expected[0], position: 0 },
        { type: "card_drawn", tableId: "t1", roundNumber: 1, caller: PLAYER, card: expected[1], position: 1 },
        { type: "card_drawn", tableId: "t1", roundNumber: 1, caller: PLAYER, card: expected[2], position: 2 },
        { type: "card_drawn", tableId: "t1", roundNumber: 1, caller: PLAYER, card: expected[3], position: 3 },
      ]);
    });

    it("never repeats a card on a full deck", () => {
      const standard = new DrawSession({ authority: AUTHORITY });
      const secret = secretFromText("test-secret");
      standard.commit(AUTHORITY, computeCommitment(secret));
      standard.reveal(AUTHORITY, secret);

      const cards = drawAll(standard);
      assert.equal(cards.length, 52);
      assert.equal(new Set(cards).size, 52);
    });

    it("exhausts a single-card deck on its only draw", () => {
      const single = new DrawSession({ authority: AUTHORITY, deckSize: 1 });
      single.commit(AUTHORITY, DIGEST);
      single.reveal(AUTHORITY, SECRET);

      assert.equal(single.draw(PLAYER), 0);
      assert.equal(single.phase, "exhausted");
    });
  });

  describe("reset", () => {
    it("is allowed on a never-committed round", () => {
      session.reset(AUTHORITY);

      assert.equal(session.phase, "idle");
      assert.equal(session.roundNumber, 2);
      assert.deepEqual(events, [{ type: "round_reset", tableId: "t1", roundNumber: 2 }]);
    });

    it("refuses while the round is committed or partly drawn", () => {
      session.commit(AUTHORITY, DIGEST);
      assert.throws(() => session.reset(AUTHORITY), isCode("ROUND_IN_PROGRESS"));

      session.reveal(AUTHORITY, SECRET);
      assert.throws(() => session.reset(AUTHORITY), isCode("ROUND_IN_PROGRESS"));

      session.draw(PLAYER);
      assert.throws(() => session.reset(AUTHORITY), isCode("ROUND_IN_PROGRESS"));
      assert.equal(session.phase, "drawing");
      assert.equal(session.remaining(), 3);
    });

    it("is authority only", () => {
      assert.throws(() => session.reset(PLAYER), isCode("UNAUTHORIZED"));
      assert.equal(session.roundNumber, 1);
    });

    it("starts a clean round after exhaustion", () => {
      session.commit(AUTHORITY, DIGEST);
      session.reveal(AUTHORITY, SECRET);
      drawAll(session);
      session.reset(AUTHORITY);

      const snapshot = session.snapshot();
      assert.equal(snapshot.phase, "idle");
      assert.equal(snapshot.roundNumber, 2);
      assert.equal(snapshot.remaining, 4);
      assert.equal(snapshot.cursor, 0);
      assert.equal(snapshot.committedDigest, null);
      assert.equal(snapshot.disclosedSecret, null);
      assert.deepEqual(snapshot.permutation, []);
      assert.deepEqual(snapshot.drawnCards, []);

      // The same commitment may be reused in a later round
      session.commit(AUTHORITY, DIGEST);
      assert.equal(session.phase, "committed");
    });
  });

  describe("end to end", () => {
    it("plays a 4-card round committed to the secret \"x\"", () => {
      const permutation = [3, 1, 2, 0];
      assert.deepEqual(derivePermutation(SECRET, 4), permutation);

      session.commit(AUTHORITY, DIGEST);
      assert.equal(session.phase, "committed");

      session.reveal(AUTHORITY, SECRET);
      assert.equal(session.phase, "revealed");
      assert.deepEqual(session.getPermutation(), permutation);

      assert.deepEqual(drawAll(session), permutation);
      assert.throws(() => session.draw(PLAYER), isCode("DECK_EXHAUSTED"));

      session.reset(AUTHORITY);
      assert.equal(session.remaining(), 4);
      assert.deepEqual(
        events.map((e) => e.type),
        ["committed", "revealed", "card_drawn", "card_drawn", "card_drawn", "card_drawn", "round_reset"]
      );
    });
  });

  describe("observers", () => {
    it("keeps the state change when an observer throws", () => {
      const seen: string[] = [];
      session.subscribe({
        onCommitted: () => {
          throw new Error("observer failure");
        },
      });
      session.subscribe({ onCommitted: (e) => seen.push(e.digest) });

      session.commit(AUTHORITY, DIGEST);

      assert.equal(session.phase, "committed");
      assert.deepEqual(seen, [DIGEST]);
    });

    it("stops notifying after unsubscribe", () => {
      const seen: string[] = [];
      const unsubscribe = session.subscribe({ onRoundReset: (e) => seen.push(e.type) });

      session.reset(AUTHORITY);
      unsubscribe();
      session.reset(AUTHORITY);

      assert.deepEqual(seen, ["round_reset"]);
    });
  });
});
