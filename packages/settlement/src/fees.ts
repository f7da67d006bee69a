import { SettlementError } from "./errors";
import type { VerificationFeeSplit } from "./types";

export const BPS_DIVISOR = 10_000n;
export const MAX_FEE_BPS = 5_000n;

export function computeVerificationFee(amountIn: bigint, feeBps: bigint): bigint {
  return (amountIn * feeBps) / BPS_DIVISOR;
}

export function splitVerificationFee(amountIn: bigint, feeBps: bigint): VerificationFeeSplit {
  const verificationFee = computeVerificationFee(amountIn, feeBps);
  return { verificationFee, amountAfterFee: amountIn - verificationFee };
}

/** Amount owed to whoever fulfills the request: the net input plus the solver's tip. */
export function computeSolverRefund(amountIn: bigint, verificationFee: bigint, solverFee: bigint): bigint {
  return amountIn - verificationFee + solverFee;
}

export function assertInitialFeeBps(feeBps: bigint) {
  if (feeBps <= 0n || feeBps > MAX_FEE_BPS) {
    throw new SettlementError("InvalidFeeBps", { feeBps });
  }
}

export function assertUpdatedFeeBps(feeBps: bigint) {
  if (feeBps > MAX_FEE_BPS) {
    throw new SettlementError("FeeBpsExceedsThreshold", { feeBps, max: MAX_FEE_BPS });
  }
  if (feeBps <= 0n) {
    throw new SettlementError("InvalidFeeBps", { feeBps });
  }
}
