import { encodeAbiParameters, keccak256, type Address, type Hex } from "viem";
import type { GovernanceParameter, Hook, SwapRequestIdentity, SwapRequestParameters, ValidatorKind } from "./types";

export const SWAP_REQUEST_DOMAIN = "swap-v1";
export const CONTRACT_UPGRADE_DOMAIN = "upgrade-v1";

export type UpgradeAction = "schedule" | "cancel";

const hookComponents = [
  { name: "target", type: "address" },
  { name: "callData", type: "bytes" },
  { name: "gasLimit", type: "uint256" }
] as const;

export function hashHooks(hooks: readonly Hook[]): Hex {
  return keccak256(encodeAbiParameters([{ type: "tuple[]", components: hookComponents }], [hooks]));
}

export function deriveRequestId(request: SwapRequestIdentity): Hex {
  return keccak256(
    encodeAbiParameters(
      [
        { name: "sender", type: "address" },
        { name: "recipient", type: "address" },
        { name: "tokenIn", type: "address" },
        { name: "tokenOut", type: "address" },
        { name: "amountOut", type: "uint256" },
        { name: "srcChainId", type: "uint256" },
        { name: "dstChainId", type: "uint256" },
        { name: "nonce", type: "uint256" },
        { name: "preHooksHash", type: "bytes32" },
        { name: "postHooksHash", type: "bytes32" }
      ],
      [
        request.sender,
        request.recipient,
        request.tokenIn,
        request.tokenOut,
        request.amountOut,
        request.srcChainId,
        request.dstChainId,
        request.nonce,
        hashHooks(request.preHooks),
        hashHooks(request.postHooks)
      ]
    )
  );
}

/** Message the swap committee signs to authorize repaying `solver` for a request. */
export function encodeSwapRequestMessage(solver: Address, request: SwapRequestParameters): Hex {
  return encodeAbiParameters(
    [
      { name: "solver", type: "address" },
      { name: "sender", type: "address" },
      { name: "recipient", type: "address" },
      { name: "tokenIn", type: "address" },
      { name: "tokenOut", type: "address" },
      { name: "amountIn", type: "uint256" },
      { name: "amountOut", type: "uint256" },
      { name: "srcChainId", type: "uint256" },
      { name: "dstChainId", type: "uint256" },
      { name: "nonce", type: "uint256" },
      { name: "preHooksHash", type: "bytes32" },
      { name: "postHooksHash", type: "bytes32" }
    ],
    [
      solver,
      request.sender,
      request.recipient,
      request.tokenIn,
      request.tokenOut,
      request.amountIn,
      request.amountOut,
      request.srcChainId,
      request.dstChainId,
      request.nonce,
      hashHooks(request.preHooks),
      hashHooks(request.postHooks)
    ]
  );
}

export type GovernanceScope = {
  chainId: bigint;
  router: Address;
  nonce: bigint;
};

export function encodeUpgradeMessage(
  scope: GovernanceScope,
  action: UpgradeAction,
  pendingImplementation: Address,
  newImplementation: Address,
  calldata: Hex,
  upgradeTime: bigint
): Hex {
  return encodeAbiParameters(
    [
      { name: "action", type: "string" },
      { name: "chainId", type: "uint256" },
      { name: "router", type: "address" },
      { name: "pendingImplementation", type: "address" },
      { name: "newImplementation", type: "address" },
      { name: "calldata", type: "bytes" },
      { name: "upgradeTime", type: "uint256" },
      { name: "nonce", type: "uint256" }
    ],
    [action, scope.chainId, scope.router, pendingImplementation, newImplementation, calldata, upgradeTime, scope.nonce]
  );
}

export function validatorUpdateAction(kind: ValidatorKind): string {
  return kind === "swap_request" ? "change-swap-request-validator" : "change-contract-upgrade-validator";
}

export function encodeValidatorUpdateMessage(scope: GovernanceScope, kind: ValidatorKind, validator: Address): Hex {
  return encodeAbiParameters(
    [
      { name: "action", type: "string" },
      { name: "chainId", type: "uint256" },
      { name: "router", type: "address" },
      { name: "validator", type: "address" },
      { name: "nonce", type: "uint256" }
    ],
    [validatorUpdateAction(kind), scope.chainId, scope.router, validator, scope.nonce]
  );
}

export function governanceParameterAction(parameter: GovernanceParameter): string {
  return parameter === "upgrade_delay" ? "change-upgrade-delay" : "change-cancellation-window";
}

export function encodeGovernanceParameterMessage(
  scope: GovernanceScope,
  parameter: GovernanceParameter,
  value: bigint
): Hex {
  return encodeAbiParameters(
    [
      { name: "action", type: "string" },
      { name: "chainId", type: "uint256" },
      { name: "router", type: "address" },
      { name: "value", type: "uint256" },
      { name: "nonce", type: "uint256" }
    ],
    [governanceParameterAction(parameter), scope.chainId, scope.router, value, scope.nonce]
  );
}

/** Digest a quorum member signs: the message bound to one application domain. */
export function domainDigest(domain: string, message: Hex): Hex {
  return keccak256(
    encodeAbiParameters(
      [
        { name: "domain", type: "string" },
        { name: "message", type: "bytes" }
      ],
      [domain, message]
    )
  );
}
