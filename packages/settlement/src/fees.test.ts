import assert from "node:assert/strict";
import test from "node:test";
import { isSettlementError } from "./errors";
import {
  MAX_FEE_BPS,
  assertInitialFeeBps,
  assertUpdatedFeeBps,
  computeSolverRefund,
  computeVerificationFee,
  splitVerificationFee
} from "./fees";

const ONE = 10n ** 18n;

test("verification fee is floor(amount * bps / 10000)", () => {
  assert.equal(computeVerificationFee(10n * ONE, 500n), ONE / 2n);
  assert.equal(computeVerificationFee(199n, 50n), 0n);
  assert.equal(computeVerificationFee(200n, 50n), 1n);
});

test("split returns fee and net amount that sum to the input", () => {
  assert.deepEqual(splitVerificationFee(10n * ONE, 500n), {
    verificationFee: ONE / 2n,
    amountAfterFee: 95n * ONE / 10n
  });
});

test("solver refund adds the tip to the net amount", () => {
  assert.equal(computeSolverRefund(10n * ONE, ONE / 2n, ONE), 105n * ONE / 10n);
});

test("initial fee bps must be within (0, MAX]", () => {
  assert.throws(() => assertInitialFeeBps(0n), (error) => isSettlementError(error, "InvalidFeeBps"));
  assert.throws(() => assertInitialFeeBps(MAX_FEE_BPS + 1n), (error) => isSettlementError(error, "InvalidFeeBps"));
  assert.doesNotThrow(() => assertInitialFeeBps(MAX_FEE_BPS));
});

test("updated fee bps distinguishes threshold from zero", () => {
  assert.throws(
    () => assertUpdatedFeeBps(MAX_FEE_BPS + 1n),
    (error) => isSettlementError(error, "FeeBpsExceedsThreshold")
  );
  assert.throws(() => assertUpdatedFeeBps(0n), (error) => isSettlementError(error, "InvalidFeeBps"));
  assert.doesNotThrow(() => assertUpdatedFeeBps(1n));
});
