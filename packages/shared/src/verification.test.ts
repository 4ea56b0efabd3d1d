// @fairdraw/shared - Verification tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { verifyRound } from "./verification.js";
import { computeCommitment, derivePermutation, secretFromText } from "./permutation.js";

const secret = secretFromText("test-secret");
const digest = computeCommitment(secret);
const permutation = derivePermutation(secret, 52);

describe("verifyRound", () => {
  it("accepts an honest round", () => {
    const result = verifyRound({
      deckSize: 52,
      committedDigest: digest,
      secret,
      permutation,
      drawnCards: permutation.slice(0, 5),
    });

    assert.equal(result.valid, true);
    assert.deepEqual(result.checks, { commitment: true, permutation: true, draws: true });
    assert.deepEqual(result.expectedPermutation, permutation);
    assert.deepEqual(result.issues, []);
  });

  it("compares digests case-insensitively", () => {
    const result = verifyRound({
      deckSize: 52,
      committedDigest: `0x${digest.slice(2).toUpperCase()}`,
      secret,
    });
    assert.equal(result.valid, true);
    assert.deepEqual(result.checks, { commitment: true, permutation: null, draws: null });
  });

  it("flags a secret that does not match the commitment", () => {
    const other = secretFromText("other-secret");
    const result = verifyRound({ deckSize: 52, committedDigest: digest, secret: other });

    assert.equal(result.valid, false);
    assert.equal(result.checks.commitment, false);
    assert.equal(
      result.issues[0],
      `Commitment mismatch: keccak256(secret)=${computeCommitment(other)}, committed=${digest}`
    );
  });

  it("flags a tampered permutation", () => {
    const tampered = [...permutation];
    [tampered[0], tampered[1]] = [tampered[1], tampered[0]];

    const result = verifyRound({ deckSize: 52, committedDigest: digest, secret, permutation: tampered });

    assert.equal(result.valid, false);
    assert.equal(result.checks.permutation, false);
    assert.deepEqual(result.issues, ["Published permutation does not match the derived permutation"]);
  });

  it("reports the first out-of-order draw", () => {
    const drawnCards = [permutation[0], permutation[2]];
    const result = verifyRound({ deckSize: 52, committedDigest: digest, secret, drawnCards });

    assert.equal(result.valid, false);
    assert.equal(result.checks.draws, false);
    assert.deepEqual(result.issues, [
      `Draw 1 was card ${permutation[2]}, expected ${permutation[1]}`,
    ]);
  });

  it("flags more draws than cards", () => {
    const small = derivePermutation(secret, 2);
    const result = verifyRound({
      deckSize: 2,
      committedDigest: digest,
      secret,
      drawnCards: [...small, small[0]],
    });

    assert.equal(result.valid, false);
    assert.deepEqual(result.issues, ["3 draws exceed deck size 2"]);
  });

  it("rejects malformed input without throwing", () => {
    const badSecret = verifyRound({ deckSize: 52, committedDigest: digest, secret: "0x1" });
    assert.equal(badSecret.valid, false);
    assert.deepEqual(badSecret.issues, ["Secret is not 0x-prefixed hex of whole bytes"]);

    const badSize = verifyRound({ deckSize: -4, committedDigest: digest, secret });
    assert.equal(badSize.valid, false);
    assert.deepEqual(badSize.issues, ["Invalid deck size: -4"]);
  });
});
