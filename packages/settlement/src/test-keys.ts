import type { Hex } from "viem";
import { privateKeyToAccount } from "viem/accounts";

/** Deterministic development keys; never fund these outside a local ledger. */
export function devKey(seed: number): Hex {
  if (!Number.isInteger(seed) || seed < 1 || seed > 14) throw new Error(`Unsupported dev key seed ${seed}`);
  return `0x${seed.toString(16).repeat(64)}`;
}

export function devAccount(seed: number) {
  return privateKeyToAccount(devKey(seed));
}
