// @fairdraw/shared - Permutation tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { concat, hexToBigInt, keccak256, numberToHex } from "viem";
import {
  derivePermutation,
  computeCommitment,
  encodeIndexPreimage,
  generateSecret,
  secretFromText,
  isPermutation,
  isSecret,
  isDigest,
  isValidDeckSize,
  PermutationError,
  MAX_DECK_SIZE,
} from "./permutation.js";
import { cardToString } from "./cards.js";
import type { Hex } from "./types.js";

const SECRETS: Hex[] = [
  "0x",
  "0x78",
  "0x1234567890abcdef1234567890abcdef1234567890abcdef1234567890abcdef",
  secretFromText("test-secret"),
  secretFromText("another round"),
];

// Straight-line re-implementation used as an independent reference
function referencePermutation(secret: Hex, deckSize: number): number[] {
  const deck = [...Array(deckSize).keys()];
  for (let i = deckSize - 1; i >= 1; i--) {
    const digest = keccak256(concat([secret, numberToHex(i, { size: 4 })]));
    const j = Number(hexToBigInt(digest) % BigInt(i + 1));
    const tmp = deck[i];
    deck[i] = deck[j];
    deck[j] = tmp;
  }
  return deck;
}

describe("encodeIndexPreimage", () => {
  it("appends the index as a 4-byte big-endian integer", () => {
    assert.equal(encodeIndexPreimage("0x78", 1), "0x7800000001");
    assert.equal(encodeIndexPreimage("0xabcd", 258), "0xabcd00000102");
    assert.equal(encodeIndexPreimage("0x", 51), "0x00000033");
  });
});

describe("computeCommitment", () => {
  it("hashes the raw secret bytes with keccak256", () => {
    assert.equal(
      computeCommitment("0x"),
      "0xc5d2460186f7233c927e7db2dcc703c0e500b653ca82273b7bfad8045d85a470"
    );
    assert.equal(computeCommitment("0x78"), keccak256("0x78"));
  });

  it("returns a 32-byte digest", () => {
    assert.ok(isDigest(computeCommitment(secretFromText("x"))));
  });

  it("rejects malformed secrets", () => {
    assert.throws(
      () => computeCommitment("0xabc"),
      (err: unknown) => err instanceof PermutationError && err.code === "INVALID_SECRET"
    );
  });
});

describe("derivePermutation", () => {
  it("reproduces known permutations", () => {
    assert.deepEqual(derivePermutation("0x78", 4), [3, 1, 2, 0]);
    assert.deepEqual(
      derivePermutation(secretFromText("test-secret"), 52),
      [
        28, 39, 35, 51, 44, 33, 22, 40, 0, 21, 17, 37, 41, 43, 10, 23, 48, 6, 14, 4, 1, 36, 11, 15, 19, 5,
        31, 24, 2, 46, 12, 9, 25, 26, 16, 42, 8, 32, 13, 7, 29, 50, 34, 30, 20, 45, 18, 3, 49, 38, 27, 47,
      ]
    );
    assert.deepEqual(
      derivePermutation("0x78", 52),
      [
        29, 38, 46, 14, 15, 10, 51, 25, 24, 7, 28, 37, 39, 16, 0, 30, 18, 35, 41, 34, 6, 47, 26, 43, 23, 50,
        33, 31, 21, 3, 4, 27, 36, 5, 40, 48, 32, 2, 45, 49, 17, 11, 19, 1, 9, 42, 13, 12, 8, 44, 20, 22,
      ]
    );
  });

  it("is deterministic", () => {
    for (const secret of SECRETS) {
      assert.deepEqual(derivePermutation(secret, 52), derivePermutation(secret, 52));
    }
  });

  it("always yields a permutation of the canonical deck", () => {
    for (const secret of SECRETS) {
      for (const deckSize of [2, 3, 4, 10, 52, 100]) {
        const cards = derivePermutation(secret, deckSize);
        assert.ok(isPermutation(cards, deckSize), `secret=${secret} deckSize=${deckSize}`);
      }
    }
  });

  it("matches an independent hash-chain Fisher-Yates", () => {
    for (const secret of SECRETS) {
      assert.deepEqual(derivePermutation(secret, 52), referencePermutation(secret, 52));
      assert.deepEqual(derivePermutation(secret, 4), referencePermutation(secret, 4));
    }
  });

  it("uses a single swap on a 2-card deck", () => {
    const digest = keccak256(encodeIndexPreimage("0x78", 1));
    const swapped = hexToBigInt(digest) % 2n === 0n;
    assert.deepEqual(derivePermutation("0x78", 2), swapped ? [1, 0] : [0, 1]);
  });

  it("returns trivial permutations for decks of 0 and 1", () => {
    assert.deepEqual(derivePermutation("0x78", 0), []);
    assert.deepEqual(derivePermutation("0x78", 1), [0]);
  });

  it("differs between secrets", () => {
    const a = derivePermutation(secretFromText("round-a"), 52);
    const b = derivePermutation(secretFromText("round-b"), 52);
    assert.notDeepEqual(a, b);
  });

  it("accepts the largest allowed deck", () => {
    assert.equal(MAX_DECK_SIZE, 1024);
    assert.ok(isValidDeckSize(MAX_DECK_SIZE));
    assert.ok(isPermutation(derivePermutation("0x78", MAX_DECK_SIZE), MAX_DECK_SIZE));
  });

  it("rejects invalid deck sizes", () => {
    assert.equal(isValidDeckSize(MAX_DECK_SIZE + 1), false);
    for (const deckSize of [-1, 1.5, Number.NaN, MAX_DECK_SIZE + 1, 2 ** 32]) {
      assert.throws(
        () => derivePermutation("0x78", deckSize),
        (err: unknown) => err instanceof PermutationError && err.code === "INVALID_DECK_SIZE"
      );
    }
  });

  it("rejects secrets that are not whole-byte hex", () => {
    for (const secret of ["0x7", "78", "0xzz"]) {
      assert.throws(
        () => derivePermutation(secret as Hex, 4),
        (err: unknown) => err instanceof PermutationError && err.code === "INVALID_SECRET"
      );
    }
  });
});

describe("isPermutation", () => {
  it("detects duplicates, omissions and out-of-range cards", () => {
    assert.equal(isPermutation([2, 0, 1], 3), true);
    assert.equal(isPermutation([0, 0, 1], 3), false);
    assert.equal(isPermutation([0, 1], 3), false);
    assert.equal(isPermutation([0, 1, 3], 3), false);
    assert.equal(isPermutation([0, 1, 1.5], 3), false);
  });
});

describe("secrets", () => {
  it("generates 0x-prefixed 32-byte secrets", () => {
    const secret = generateSecret();
    assert.match(secret, /^0x[0-9a-f]{64}$/);
    assert.ok(isSecret(secret));
  });

  it("generates unique secrets", () => {
    const secrets = new Set<string>();
    for (let i = 0; i < 50; i++) {
      secrets.add(generateSecret());
    }
    assert.equal(secrets.size, 50);
  });

  it("encodes text as UTF-8 bytes", () => {
    assert.equal(secretFromText("x"), "0x78");
    assert.equal(secretFromText(""), "0x");
  });

  it("accepts the empty secret", () => {
    assert.equal(isSecret("0x"), true);
    assert.equal(isSecret("0x1"), false);
    assert.equal(isSecret(42), false);
  });
});

describe("cardToString", () => {
  it("maps 52-card ids to rank and suit", () => {
    assert.equal(cardToString(0), "2c");
    assert.equal(cardToString(12), "Ac");
    assert.equal(cardToString(13), "2d");
    assert.equal(cardToString(51), "As");
  });

  it("labels ids outside a standard deck by number", () => {
    assert.equal(cardToString(60), "#60");
  });
});
