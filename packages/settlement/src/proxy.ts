import { getAddress, isAddressEqual, zeroAddress, type Address, type Hex } from "viem";
import type { ContractRegistry, LedgerChain } from "./chain";
import { SettlementError } from "./errors";
import type { RouterEvent } from "./events";
import { assertInitialFeeBps } from "./fees";
import {
  deriveRequestId,
  encodeGovernanceParameterMessage,
  encodeUpgradeMessage,
  encodeValidatorUpdateMessage,
  type UpgradeAction
} from "./hashing";
import type { HookGateway } from "./hooks";
import type { PermitTransferRelay } from "./permit";
import { normalizeRequestId, type RouterContext, type SwapRouterLogic } from "./router";
import { RouterStore } from "./store";
import type { TokenLedger } from "./token-ledger";
import type {
  GovernanceParameter,
  RelayTokensInput,
  RelayTokensPermit2Input,
  RequestCrossChainSwapInput,
  RequestCrossChainSwapPermit2Input,
  ScheduledUpgrade,
  SwapRequestIdentity,
  SwapRequestParameters,
  SwapRequestReceipt,
  ValidatorKind,
  VerificationFeeSplit
} from "./types";
import { ScheduledUpgradeController, type GovernanceContext } from "./upgrade-controller";
import type { SignatureVerifier } from "./verifier";

export type RouterRegistries = {
  verifiers: ContractRegistry<SignatureVerifier>;
  hookGateways: ContractRegistry<HookGateway>;
  permitRelays: ContractRegistry<PermitTransferRelay>;
  implementations: ContractRegistry<SwapRouterLogic>;
};

export type RouterProxyOptions = {
  address: Address;
  chain: LedgerChain<RouterEvent>;
  tokens: TokenLedger;
  registries: RouterRegistries;
  owner: Address;
  implementation: Address;
  verificationFeeBps: bigint;
  swapRequestValidator: Address;
  contractUpgradeValidator: Address;
};

// Every call is queued on the ledger and dispatched to the implementation current when it runs.
export class RouterProxy {
  readonly address: Address;
  readonly chain: LedgerChain<RouterEvent>;
  private readonly tokens: TokenLedger;
  private readonly registries: RouterRegistries;
  private readonly store: RouterStore;
  private readonly governance = new ScheduledUpgradeController();

  constructor(options: RouterProxyOptions) {
    assertInitialFeeBps(options.verificationFeeBps);
    for (const [field, validator] of [
      ["swapRequestValidator", options.swapRequestValidator],
      ["contractUpgradeValidator", options.contractUpgradeValidator]
    ] as const) {
      if (isAddressEqual(validator, zeroAddress)) throw new SettlementError("ZeroAddress", { field });
      if (!options.registries.verifiers.has(validator)) throw new SettlementError("UnknownValidator", { validator });
    }
    if (isAddressEqual(options.owner, zeroAddress)) throw new SettlementError("ZeroAddress", { field: "owner" });
    if (!options.registries.implementations.has(options.implementation)) {
      throw new SettlementError("UnknownImplementation", { implementation: options.implementation });
    }

    this.address = getAddress(options.address);
    this.chain = options.chain;
    this.tokens = options.tokens;
    this.registries = options.registries;
    this.store = new RouterStore({
      owner: options.owner,
      verificationFeeBps: options.verificationFeeBps,
      swapRequestValidator: getAddress(options.swapRequestValidator),
      contractUpgradeValidator: getAddress(options.contractUpgradeValidator),
      implementation: getAddress(options.implementation)
    });
    this.chain.register(this.store);
  }

  requestCrossChainSwap(caller: Address, input: RequestCrossChainSwapInput): Promise<Hex> {
    return this.call((impl, ctx) => impl.requestCrossChainSwap(ctx, caller, input));
  }

  requestCrossChainSwapPermit2(caller: Address, input: RequestCrossChainSwapPermit2Input): Promise<Hex> {
    return this.call((impl, ctx) => impl.requestCrossChainSwapPermit2(ctx, caller, input));
  }

  updateSolverFeesIfUnfulfilled(caller: Address, requestId: Hex, newFee: bigint): Promise<void> {
    return this.call((impl, ctx) => impl.updateSolverFeesIfUnfulfilled(ctx, caller, requestId, newFee));
  }

  relayTokens(caller: Address, input: RelayTokensInput): Promise<void> {
    return this.call((impl, ctx) => impl.relayTokens(ctx, caller, input));
  }

  relayTokensPermit2(caller: Address, input: RelayTokensPermit2Input): Promise<void> {
    return this.call((impl, ctx) => impl.relayTokensPermit2(ctx, caller, input));
  }

  rebalanceSolver(caller: Address, solver: Address, requestId: Hex, signature: Hex): Promise<void> {
    return this.call((impl, ctx) => impl.rebalanceSolver(ctx, caller, solver, requestId, signature));
  }

  stageSwapRequestCancellation(caller: Address, requestId: Hex): Promise<void> {
    return this.call((impl, ctx) => impl.stageSwapRequestCancellation(ctx, caller, requestId));
  }

  cancelSwapRequestAndRefund(caller: Address, requestId: Hex, refundRecipient: Address): Promise<void> {
    return this.call((impl, ctx) => impl.cancelSwapRequestAndRefund(ctx, caller, requestId, refundRecipient));
  }

  setVerificationFeeBps(caller: Address, feeBps: bigint): Promise<void> {
    return this.call((impl, ctx) => impl.setVerificationFeeBps(ctx, caller, feeBps));
  }

  permitDestinationChainId(caller: Address, chainId: bigint): Promise<void> {
    return this.call((impl, ctx) => impl.permitDestinationChainId(ctx, caller, chainId));
  }

  blockDestinationChainId(caller: Address, chainId: bigint): Promise<void> {
    return this.call((impl, ctx) => impl.blockDestinationChainId(ctx, caller, chainId));
  }

  setTokenMapping(caller: Address, dstChainId: bigint, dstToken: Address, srcToken: Address): Promise<void> {
    return this.call((impl, ctx) => impl.setTokenMapping(ctx, caller, dstChainId, dstToken, srcToken));
  }

  removeTokenMapping(caller: Address, dstChainId: bigint, dstToken: Address, srcToken: Address): Promise<void> {
    return this.call((impl, ctx) => impl.removeTokenMapping(ctx, caller, dstChainId, dstToken, srcToken));
  }

  withdrawVerificationFee(caller: Address, token: Address, to: Address): Promise<bigint> {
    return this.call((impl, ctx) => impl.withdrawVerificationFee(ctx, caller, token, to));
  }

  setHookGateway(caller: Address, gateway: Address): Promise<void> {
    return this.call((impl, ctx) => impl.setHookGateway(ctx, caller, gateway));
  }

  setPermitRelay(caller: Address, relay: Address): Promise<void> {
    return this.call((impl, ctx) => impl.setPermitRelay(ctx, caller, relay));
  }

  grantAdmin(caller: Address, account: Address): Promise<void> {
    return this.call((impl, ctx) => impl.grantAdmin(ctx, caller, account));
  }

  revokeAdmin(caller: Address, account: Address): Promise<void> {
    return this.call((impl, ctx) => impl.revokeAdmin(ctx, caller, account));
  }

  // Governance: callable by anyone holding a quorum signature.

  scheduleUpgrade(newImplementation: Address, calldata: Hex, upgradeTime: bigint, signature: Hex): Promise<void> {
    return this.callGovernance((ctx) =>
      this.governance.scheduleUpgrade(ctx, newImplementation, calldata, upgradeTime, signature)
    );
  }

  cancelUpgrade(signature: Hex): Promise<void> {
    return this.callGovernance((ctx) => this.governance.cancelUpgrade(ctx, signature));
  }

  executeUpgrade(): Promise<void> {
    return this.callGovernance(async (ctx) => {
      const executed = this.governance.executeUpgrade(ctx);
      const implementation = this.currentImplementation();
      await implementation.initialize(ctx, executed.calldata);
      ctx.emit({ type: "UpgradeExecuted", implementation: executed.implementation, version: implementation.version });
    });
  }

  setSwapRequestValidator(validator: Address, signature: Hex): Promise<void> {
    return this.callGovernance((ctx) => this.governance.setValidator(ctx, "swap_request", validator, signature));
  }

  setContractUpgradeValidator(validator: Address, signature: Hex): Promise<void> {
    return this.callGovernance((ctx) => this.governance.setValidator(ctx, "contract_upgrade", validator, signature));
  }

  setMinimumContractUpgradeDelay(delay: bigint, signature: Hex): Promise<void> {
    return this.callGovernance((ctx) => this.governance.setParameter(ctx, "upgrade_delay", delay, signature));
  }

  setCancellationWindow(window: bigint, signature: Hex): Promise<void> {
    return this.callGovernance((ctx) => this.governance.setParameter(ctx, "cancellation_window", window, signature));
  }

  getVersion(): string {
    return this.currentImplementation().version;
  }

  getChainId(): bigint {
    return this.chain.chainId;
  }

  getImplementation(): Address {
    return this.store.state.implementation;
  }

  getSwapRequestParameters(requestId: Hex): SwapRequestParameters | undefined {
    const request = this.store.state.requests.get(normalizeRequestId(requestId));
    return request ? structuredClone(request) : undefined;
  }

  getSwapRequestReceipt(requestId: Hex): SwapRequestReceipt | undefined {
    const receipt = this.store.state.receipts.get(normalizeRequestId(requestId));
    return receipt ? structuredClone(receipt) : undefined;
  }

  getSwapRequestId(identity: SwapRequestIdentity): Hex {
    return deriveRequestId(identity);
  }

  getVerificationFeeAmount(amountIn: bigint): VerificationFeeSplit {
    return this.currentImplementation().getVerificationFeeAmount(this.readContext(), amountIn);
  }

  getVerificationFeeBps(): bigint {
    return this.store.state.verificationFeeBps;
  }

  getTotalVerificationFeeBalance(token: Address): bigint {
    return this.store.feeBalance(token);
  }

  getSolverRefundAmount(requestId: Hex): bigint {
    return this.store.state.solverRefunds.get(normalizeRequestId(requestId)) ?? 0n;
  }

  getUnfulfilledSolverRefunds(): Hex[] {
    return [...this.store.state.unfulfilledSolverRefunds];
  }

  getFulfilledSolverRefunds(): Hex[] {
    return [...this.store.state.fulfilledSolverRefunds];
  }

  getCancelledSwapRequests(): Hex[] {
    return [...this.store.state.cancelledSwapRequests];
  }

  getFulfilledTransfers(): Hex[] {
    return [...this.store.state.fulfilledTransfers];
  }

  swapRequestCancellationInitiatedAt(requestId: Hex): bigint {
    return this.store.state.cancellationStagedAt.get(normalizeRequestId(requestId)) ?? 0n;
  }

  getCancellationWindow(): bigint {
    return this.store.state.cancellationWindow;
  }

  getMinimumContractUpgradeDelay(): bigint {
    return this.store.state.minimumUpgradeDelay;
  }

  getScheduledUpgrade(): ScheduledUpgrade | null {
    const scheduled = this.store.state.scheduledUpgrade;
    return scheduled ? { ...scheduled } : null;
  }

  isDestinationChainIdAllowed(chainId: bigint): boolean {
    return this.store.state.allowedDstChainIds.has(chainId);
  }

  getAllowedDstChainIds(): bigint[] {
    return [...this.store.state.allowedDstChainIds];
  }

  getTokenMapping(srcToken: Address, dstChainId: bigint): Address[] {
    return [...this.store.mappedTokens(srcToken, dstChainId)];
  }

  isDstTokenMapped(srcToken: Address, dstChainId: bigint, dstToken: Address): boolean {
    return this.store.mappedTokens(srcToken, dstChainId).some((token) => isAddressEqual(token, dstToken));
  }

  isAdmin(account: Address): boolean {
    return this.store.isAdmin(account);
  }

  currentSwapRequestNonce(): bigint {
    return this.store.state.swapRequestNonce;
  }

  currentNonce(): bigint {
    return this.store.state.governanceNonce;
  }

  getSwapRequestValidator(): Address {
    return this.store.state.swapRequestValidator;
  }

  getContractUpgradeValidator(): Address {
    return this.store.state.contractUpgradeValidator;
  }

  getHookGateway(): Address | null {
    return this.store.state.hookGateway;
  }

  getPermitRelay(): Address | null {
    return this.store.state.permitRelay;
  }

  // Message builders for off-ledger signers; governance ones target the next nonce.

  swapRequestParametersToBytes(requestId: Hex, solver: Address): Hex {
    return this.currentImplementation().swapRequestParametersToBytes(this.readContext(), requestId, solver);
  }

  contractUpgradeParamsToBytes(
    action: UpgradeAction,
    pendingImplementation: Address,
    newImplementation: Address,
    calldata: Hex,
    upgradeTime: bigint
  ): Hex {
    const scope = this.governance.scope(this.readContext());
    return encodeUpgradeMessage(scope, action, pendingImplementation, newImplementation, calldata, upgradeTime);
  }

  validatorUpdateParamsToBytes(kind: ValidatorKind, validator: Address): Hex {
    return encodeValidatorUpdateMessage(this.governance.scope(this.readContext()), kind, validator);
  }

  governanceParamsToBytes(parameter: GovernanceParameter, value: bigint): Hex {
    return encodeGovernanceParameterMessage(this.governance.scope(this.readContext()), parameter, value);
  }

  private currentImplementation(): SwapRouterLogic {
    const implementation = this.registries.implementations.resolve(this.store.state.implementation);
    if (!implementation) {
      throw new SettlementError("UnknownImplementation", { implementation: this.store.state.implementation });
    }
    return implementation;
  }

  private readContext(): GovernanceContext {
    return this.context(this.chain.clock.now());
  }

  private context(now: bigint): GovernanceContext {
    return {
      address: this.address,
      chainId: this.chain.chainId,
      now,
      store: this.store,
      tokens: this.tokens,
      verifiers: this.registries.verifiers,
      hookGateways: this.registries.hookGateways,
      permitRelays: this.registries.permitRelays,
      implementations: this.registries.implementations,
      emit: (event) => {
        this.chain.emit(this.address, event);
      }
    };
  }

  private call<T>(fn: (implementation: SwapRouterLogic, ctx: RouterContext) => Promise<T> | T): Promise<T> {
    return this.chain.transact((tx) => fn(this.currentImplementation(), this.context(tx.timestamp)));
  }

  private callGovernance<T>(fn: (ctx: GovernanceContext) => Promise<T> | T): Promise<T> {
    return this.chain.transact((tx) => fn(this.context(tx.timestamp)));
  }
}
