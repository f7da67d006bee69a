import type { Address, Hex } from "viem";
import type { LogEntry } from "./chain";
import type { GovernanceParameter, ValidatorKind } from "./types";

export type RouterEvent =
  | { type: "SwapRequested"; requestId: Hex; srcChainId: bigint; dstChainId: bigint }
  | { type: "SwapRequestFulfilled"; requestId: Hex; srcChainId: bigint; dstChainId: bigint }
  | { type: "SwapRequestSolverFeeUpdated"; requestId: Hex; solverFee: bigint }
  | { type: "SolverPayoutFulfilled"; requestId: Hex; solver: Address; amount: bigint }
  | { type: "SwapRequestCancellationStaged"; requestId: Hex; sender: Address; stagedAt: bigint }
  | { type: "SwapRequestRefundClaimed"; requestId: Hex; sender: Address; recipient: Address; amount: bigint }
  | { type: "VerificationFeeWithdrawn"; token: Address; recipient: Address; amount: bigint }
  | { type: "VerificationFeeBpsUpdated"; feeBps: bigint }
  | { type: "DestinationChainIdPermitted"; chainId: bigint }
  | { type: "DestinationChainIdBlocked"; chainId: bigint }
  | { type: "TokenMappingAdded"; dstChainId: bigint; dstToken: Address; srcToken: Address }
  | { type: "TokenMappingRemoved"; dstChainId: bigint; dstToken: Address; srcToken: Address }
  | { type: "HookGatewayUpdated"; gateway: Address }
  | { type: "PermitRelayUpdated"; relay: Address }
  | { type: "AdminRoleUpdated"; account: Address; granted: boolean }
  | { type: "ValidatorUpdated"; kind: ValidatorKind; validator: Address }
  | { type: "GovernanceParameterUpdated"; parameter: GovernanceParameter; value: bigint }
  | { type: "UpgradeScheduled"; implementation: Address; upgradeTime: bigint }
  | { type: "UpgradeCancelled"; implementation: Address }
  | { type: "UpgradeExecuted"; implementation: Address; version: string };

export type RouterEventType = RouterEvent["type"];

export type RouterLogEntry = LogEntry<RouterEvent>;

export function isRouterEvent<T extends RouterEventType>(
  entry: RouterLogEntry,
  type: T
): entry is LogEntry<Extract<RouterEvent, { type: T }>> {
  return entry.event.type === type;
}
