import type { Address, Hex } from "viem";

export type { Address, Hex };

export type Hook = {
  target: Address;
  callData: Hex;
  gasLimit: bigint;
};

export type SwapRequestParameters = {
  sender: Address;
  recipient: Address;
  tokenIn: Address;
  tokenOut: Address;
  amountIn: bigint;
  amountOut: bigint;
  srcChainId: bigint;
  dstChainId: bigint;
  verificationFee: bigint;
  solverFee: bigint;
  nonce: bigint;
  executed: boolean;
  requestedAt: bigint;
  preHooks: Hook[];
  postHooks: Hook[];
};

/** Fields that determine a request id; both ledgers derive it from these alone. */
export type SwapRequestIdentity = {
  sender: Address;
  recipient: Address;
  tokenIn: Address;
  tokenOut: Address;
  amountOut: bigint;
  srcChainId: bigint;
  dstChainId: bigint;
  nonce: bigint;
  preHooks: readonly Hook[];
  postHooks: readonly Hook[];
};

export type SwapRequestReceipt = {
  requestId: Hex;
  srcChainId: bigint;
  dstChainId: bigint;
  sender: Address;
  tokenIn: Address;
  tokenOut: Address;
  fulfilled: boolean;
  solver: Address;
  recipient: Address;
  amountOut: bigint;
  fulfilledAt: bigint;
};

export type ScheduledUpgrade = {
  implementation: Address;
  calldata: Hex;
  upgradeTime: bigint;
};

export type VerificationFeeSplit = {
  verificationFee: bigint;
  amountAfterFee: bigint;
};

export type RequestCrossChainSwapInput = {
  tokenIn: Address;
  tokenOut: Address;
  amountIn: bigint;
  amountOut: bigint;
  solverFee: bigint;
  dstChainId: bigint;
  recipient: Address;
  preHooks?: Hook[];
  postHooks?: Hook[];
};

export type PermitSignature = {
  nonce: bigint;
  deadline: bigint;
  signature: Hex;
};

export type RequestCrossChainSwapPermit2Input = RequestCrossChainSwapInput & {
  requester: Address;
  additionalData?: Hex;
  permit: PermitSignature;
};

export type RelayTokensInput = {
  solverRefundAddress: Address;
  requestId: Hex;
  sender: Address;
  recipient: Address;
  tokenIn: Address;
  tokenOut: Address;
  amountOut: bigint;
  srcChainId: bigint;
  nonce: bigint;
  preHooks?: Hook[];
  postHooks?: Hook[];
};

export type RelayTokensPermit2Input = RelayTokensInput & {
  solver: Address;
  permit: PermitSignature;
};

export type ValidatorKind = "swap_request" | "contract_upgrade";

export type GovernanceParameter = "upgrade_delay" | "cancellation_window";
