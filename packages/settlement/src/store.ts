import { getAddress, type Address, type Hex } from "viem";
import type { Journaled } from "./chain";
import type { ScheduledUpgrade, SwapRequestParameters, SwapRequestReceipt } from "./types";

export const ONE_DAY = 86_400n;
export const MIN_CANCELLATION_WINDOW = ONE_DAY;
export const MIN_UPGRADE_DELAY = 2n * ONE_DAY;

export type RouterState = {
  admins: Set<Address>;
  verificationFeeBps: bigint;
  swapRequestValidator: Address;
  contractUpgradeValidator: Address;
  hookGateway: Address | null;
  permitRelay: Address | null;
  allowedDstChainIds: Set<bigint>;
  /** `${srcToken}:${dstChainId}` → destination tokens, insertion ordered */
  tokenMappings: Map<string, Address[]>;
  swapRequestNonce: bigint;
  requests: Map<Hex, SwapRequestParameters>;
  receipts: Map<Hex, SwapRequestReceipt>;
  solverRefunds: Map<Hex, bigint>;
  verificationFeeBalances: Map<Address, bigint>;
  unfulfilledSolverRefunds: Set<Hex>;
  fulfilledSolverRefunds: Set<Hex>;
  cancelledSwapRequests: Set<Hex>;
  fulfilledTransfers: Set<Hex>;
  cancellationStagedAt: Map<Hex, bigint>;
  cancellationWindow: bigint;
  governanceNonce: bigint;
  minimumUpgradeDelay: bigint;
  implementation: Address;
  scheduledUpgrade: ScheduledUpgrade | null;
};

export type RouterStoreInit = {
  owner: Address;
  verificationFeeBps: bigint;
  swapRequestValidator: Address;
  contractUpgradeValidator: Address;
  implementation: Address;
};

/** Router storage; lives with the proxy so it survives implementation swaps. */
export class RouterStore implements Journaled {
  state: RouterState;

  constructor(init: RouterStoreInit) {
    this.state = {
      admins: new Set([getAddress(init.owner)]),
      verificationFeeBps: init.verificationFeeBps,
      swapRequestValidator: init.swapRequestValidator,
      contractUpgradeValidator: init.contractUpgradeValidator,
      hookGateway: null,
      permitRelay: null,
      allowedDstChainIds: new Set(),
      tokenMappings: new Map(),
      swapRequestNonce: 0n,
      requests: new Map(),
      receipts: new Map(),
      solverRefunds: new Map(),
      verificationFeeBalances: new Map(),
      unfulfilledSolverRefunds: new Set(),
      fulfilledSolverRefunds: new Set(),
      cancelledSwapRequests: new Set(),
      fulfilledTransfers: new Set(),
      cancellationStagedAt: new Map(),
      cancellationWindow: MIN_CANCELLATION_WINDOW,
      governanceNonce: 0n,
      minimumUpgradeDelay: MIN_UPGRADE_DELAY,
      implementation: init.implementation,
      scheduledUpgrade: null
    };
  }

  checkpoint(): () => void {
    const saved = structuredClone(this.state);
    return () => {
      this.state = saved;
    };
  }

  isAdmin(account: Address): boolean {
    return this.state.admins.has(getAddress(account));
  }

  feeBalance(token: Address): bigint {
    return this.state.verificationFeeBalances.get(getAddress(token)) ?? 0n;
  }

  setFeeBalance(token: Address, amount: bigint) {
    this.state.verificationFeeBalances.set(getAddress(token), amount);
  }

  mappedTokens(srcToken: Address, dstChainId: bigint): Address[] {
    return this.state.tokenMappings.get(tokenMappingKey(srcToken, dstChainId)) ?? [];
  }

  setMappedTokens(srcToken: Address, dstChainId: bigint, tokens: Address[]) {
    const key = tokenMappingKey(srcToken, dstChainId);
    if (tokens.length === 0) {
      this.state.tokenMappings.delete(key);
      return;
    }
    this.state.tokenMappings.set(key, tokens);
  }
}

function tokenMappingKey(srcToken: Address, dstChainId: bigint): string {
  return `${getAddress(srcToken)}:${dstChainId.toString()}`;
}
