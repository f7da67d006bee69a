import { encodeAbiParameters, getAddress, isAddressEqual, isHex, zeroAddress, type Address, type Hex } from "viem";
import type { ContractRegistry } from "./chain";
import { SettlementError } from "./errors";
import type { RouterEvent } from "./events";
import { assertUpdatedFeeBps, computeSolverRefund, splitVerificationFee } from "./fees";
import { deriveRequestId, encodeSwapRequestMessage } from "./hashing";
import type { HookGateway } from "./hooks";
import type { PermitTransferRelay, PermitWitnessTransfer } from "./permit";
import type { RouterStore } from "./store";
import type { TokenLedger } from "./token-ledger";
import type {
  Hook,
  RelayTokensInput,
  RelayTokensPermit2Input,
  RequestCrossChainSwapInput,
  RequestCrossChainSwapPermit2Input,
  SwapRequestParameters,
  VerificationFeeSplit
} from "./types";
import type { SignatureVerifier } from "./verifier";

/** Everything an implementation may touch during one call. */
export type RouterContext = {
  address: Address;
  chainId: bigint;
  now: bigint;
  store: RouterStore;
  tokens: TokenLedger;
  verifiers: ContractRegistry<SignatureVerifier>;
  hookGateways: ContractRegistry<HookGateway>;
  permitRelays: ContractRegistry<PermitTransferRelay>;
  emit(event: RouterEvent): void;
};

/** Settlement logic for one code version. State lives in the {@link RouterStore}. */
export class SwapRouterLogic {
  readonly version: string;

  constructor(version = "1.0.0") {
    this.version = version;
  }

  /** Runs once when this implementation becomes current through an upgrade. */
  initialize(_ctx: RouterContext, _calldata: Hex): Promise<void> | void {}

  getVerificationFeeAmount(ctx: RouterContext, amountIn: bigint): VerificationFeeSplit {
    return splitVerificationFee(amountIn, ctx.store.state.verificationFeeBps);
  }

  swapRequestParametersToBytes(ctx: RouterContext, requestId: Hex, solver: Address): Hex {
    if (isAddressEqual(solver, zeroAddress)) throw new SettlementError("ZeroAddress", { field: "solver" });
    const request = ctx.store.state.requests.get(normalizeRequestId(requestId));
    if (!request) throw new SettlementError("SwapRequestNotFound", { requestId });
    return encodeSwapRequestMessage(solver, request);
  }

  async requestCrossChainSwap(ctx: RouterContext, caller: Address, input: RequestCrossChainSwapInput): Promise<Hex> {
    return await this.createRequest(ctx, caller, input, async (amount) => {
      await ctx.tokens.transferFrom(input.tokenIn, ctx.address, caller, ctx.address, amount);
    });
  }

  async requestCrossChainSwapPermit2(
    ctx: RouterContext,
    _caller: Address,
    input: RequestCrossChainSwapPermit2Input
  ): Promise<Hex> {
    const relay = resolvePermitRelay(ctx);
    return await this.createRequest(ctx, input.requester, input, async (amount) => {
      const transfer: PermitWitnessTransfer = {
        owner: input.requester,
        token: input.tokenIn,
        amount,
        spender: ctx.address,
        nonce: input.permit.nonce,
        deadline: input.permit.deadline,
        witness: {
          kind: "swap_request",
          value: {
            router: ctx.address,
            tokenIn: input.tokenIn,
            tokenOut: input.tokenOut,
            amountIn: input.amountIn,
            amountOut: input.amountOut,
            solverFee: input.solverFee,
            dstChainId: input.dstChainId,
            recipient: input.recipient,
            additionalData: input.additionalData ?? "0x"
          }
        }
      };
      await relay.permitWitnessTransferFrom(ctx.address, transfer, ctx.address, input.permit.signature);
    });
  }

  private async createRequest(
    ctx: RouterContext,
    sender: Address,
    input: RequestCrossChainSwapInput,
    pullFunds: (amount: bigint) => Promise<void>
  ): Promise<Hex> {
    if (input.amountIn === 0n || input.amountOut === 0n) throw new SettlementError("ZeroAmount");
    requireNonZero(input.recipient, "recipient");
    requireNonZero(input.tokenIn, "tokenIn");
    requireNonZero(input.tokenOut, "tokenOut");
    if (input.solverFee <= 0n) throw new SettlementError("FeeTooLow", { solverFee: input.solverFee });

    const state = ctx.store.state;
    if (input.dstChainId === ctx.chainId || !state.allowedDstChainIds.has(input.dstChainId)) {
      throw new SettlementError("DestinationChainIdNotSupported", { dstChainId: input.dstChainId });
    }
    const mapped = ctx.store.mappedTokens(input.tokenIn, input.dstChainId);
    if (!mapped.some((token) => isAddressEqual(token, input.tokenOut))) {
      throw new SettlementError("TokenNotSupported", { tokenIn: input.tokenIn, tokenOut: input.tokenOut });
    }

    const { verificationFee } = this.getVerificationFeeAmount(ctx, input.amountIn);
    state.swapRequestNonce += 1n;

    const preHooks = cloneHooks(input.preHooks);
    const postHooks = cloneHooks(input.postHooks);
    const request: SwapRequestParameters = {
      sender: getAddress(sender),
      recipient: getAddress(input.recipient),
      tokenIn: getAddress(input.tokenIn),
      tokenOut: getAddress(input.tokenOut),
      amountIn: input.amountIn,
      amountOut: input.amountOut,
      srcChainId: ctx.chainId,
      dstChainId: input.dstChainId,
      verificationFee,
      solverFee: input.solverFee,
      nonce: state.swapRequestNonce,
      executed: false,
      requestedAt: ctx.now,
      preHooks,
      postHooks
    };
    const requestId = deriveRequestId(request);

    state.requests.set(requestId, request);
    state.unfulfilledSolverRefunds.add(requestId);
    state.solverRefunds.set(requestId, computeSolverRefund(input.amountIn, verificationFee, input.solverFee));
    ctx.store.setFeeBalance(request.tokenIn, ctx.store.feeBalance(request.tokenIn) + verificationFee);

    await executeHooks(ctx, preHooks);
    await pullFunds(input.amountIn + input.solverFee);

    ctx.emit({ type: "SwapRequested", requestId, srcChainId: ctx.chainId, dstChainId: input.dstChainId });
    return requestId;
  }

  async updateSolverFeesIfUnfulfilled(
    ctx: RouterContext,
    caller: Address,
    requestId: Hex,
    newFee: bigint
  ): Promise<void> {
    const id = normalizeRequestId(requestId);
    const state = ctx.store.state;
    const request = state.requests.get(id);
    if (request?.executed) throw new SettlementError("AlreadyFulfilled", { requestId: id });
    if (!request || !isAddressEqual(request.sender, caller)) {
      throw new SettlementError("UnauthorisedCaller", { requestId: id, caller });
    }
    if (newFee <= request.solverFee) {
      throw new SettlementError("NewFeeTooLow", { newFee, currentFee: request.solverFee });
    }

    const delta = newFee - request.solverFee;
    request.solverFee = newFee;
    state.solverRefunds.set(id, (state.solverRefunds.get(id) ?? 0n) + delta);

    await ctx.tokens.transferFrom(request.tokenIn, ctx.address, caller, ctx.address, delta);
    ctx.emit({ type: "SwapRequestSolverFeeUpdated", requestId: id, solverFee: newFee });
  }

  async relayTokens(ctx: RouterContext, caller: Address, input: RelayTokensInput): Promise<void> {
    const requestId = this.recordFulfillment(ctx, input);
    await ctx.tokens.transferFrom(input.tokenOut, ctx.address, caller, input.recipient, input.amountOut);
    await this.completeFulfillment(ctx, requestId, input);
  }

  async relayTokensPermit2(ctx: RouterContext, _caller: Address, input: RelayTokensPermit2Input): Promise<void> {
    const relay = resolvePermitRelay(ctx);
    const requestId = this.recordFulfillment(ctx, input);
    const transfer: PermitWitnessTransfer = {
      owner: input.solver,
      token: input.tokenOut,
      amount: input.amountOut,
      spender: ctx.address,
      nonce: input.permit.nonce,
      deadline: input.permit.deadline,
      witness: {
        kind: "relayer",
        value: {
          requestId,
          recipient: input.recipient,
          additionalData: encodeSolverRefundAddress(input.solverRefundAddress)
        }
      }
    };
    await relay.permitWitnessTransferFrom(ctx.address, transfer, input.recipient, input.permit.signature);
    await this.completeFulfillment(ctx, requestId, input);
  }

  private recordFulfillment(ctx: RouterContext, input: RelayTokensInput): Hex {
    const requestId = normalizeRequestId(input.requestId);
    const state = ctx.store.state;
    if (state.fulfilledTransfers.has(requestId)) throw new SettlementError("AlreadyFulfilled", { requestId });

    requireNonZero(input.solverRefundAddress, "solverRefundAddress");
    if (isAddressEqual(input.recipient, zeroAddress) || isAddressEqual(input.tokenOut, zeroAddress)) {
      throw new SettlementError("InvalidTokenOrRecipient");
    }
    if (input.amountOut === 0n) throw new SettlementError("ZeroAmount");
    if (input.srcChainId === ctx.chainId) {
      throw new SettlementError("SourceChainIdShouldBeDifferentFromDestination", { srcChainId: input.srcChainId });
    }

    const derived = deriveRequestId({
      sender: input.sender,
      recipient: input.recipient,
      tokenIn: input.tokenIn,
      tokenOut: input.tokenOut,
      amountOut: input.amountOut,
      srcChainId: input.srcChainId,
      dstChainId: ctx.chainId,
      nonce: input.nonce,
      preHooks: input.preHooks ?? [],
      postHooks: input.postHooks ?? []
    });
    if (derived !== requestId) {
      throw new SettlementError("SwapRequestParametersMismatch", { requestId, derived });
    }

    state.fulfilledTransfers.add(requestId);
    state.receipts.set(requestId, {
      requestId,
      srcChainId: input.srcChainId,
      dstChainId: ctx.chainId,
      sender: getAddress(input.sender),
      tokenIn: getAddress(input.tokenIn),
      tokenOut: getAddress(input.tokenOut),
      fulfilled: true,
      solver: getAddress(input.solverRefundAddress),
      recipient: getAddress(input.recipient),
      amountOut: input.amountOut,
      fulfilledAt: ctx.now
    });
    return requestId;
  }

  private async completeFulfillment(ctx: RouterContext, requestId: Hex, input: RelayTokensInput) {
    await executeHooks(ctx, input.postHooks ?? []);
    ctx.emit({ type: "SwapRequestFulfilled", requestId, srcChainId: input.srcChainId, dstChainId: ctx.chainId });
  }

  async rebalanceSolver(
    ctx: RouterContext,
    _caller: Address,
    solver: Address,
    requestId: Hex,
    signature: Hex
  ): Promise<void> {
    const id = normalizeRequestId(requestId);
    const state = ctx.store.state;
    const request = state.requests.get(id);
    if (request?.executed) throw new SettlementError("AlreadyFulfilled", { requestId: id });
    if (!request || request.srcChainId !== ctx.chainId) {
      throw new SettlementError("SourceChainIdMismatch", { requestId: id, chainId: ctx.chainId });
    }
    requireNonZero(solver, "solver");

    const verifier = resolveVerifier(ctx, state.swapRequestValidator);
    const message = encodeSwapRequestMessage(solver, request);
    if (!(await verifier.verify(message, signature))) {
      throw new SettlementError("SignatureVerificationFailed", { requestId: id });
    }

    request.executed = true;
    request.preHooks = [];
    request.postHooks = [];
    state.unfulfilledSolverRefunds.delete(id);
    state.fulfilledSolverRefunds.add(id);
    const amount = state.solverRefunds.get(id) ?? 0n;
    state.solverRefunds.delete(id);

    await ctx.tokens.transfer(request.tokenIn, ctx.address, solver, amount);
    ctx.emit({ type: "SolverPayoutFulfilled", requestId: id, solver: getAddress(solver), amount });
  }

  stageSwapRequestCancellation(ctx: RouterContext, caller: Address, requestId: Hex): void {
    const id = normalizeRequestId(requestId);
    const state = ctx.store.state;
    const request = state.requests.get(id);
    if (request?.executed) throw new SettlementError("AlreadyFulfilled", { requestId: id });
    if (!request || !isAddressEqual(request.sender, caller)) {
      throw new SettlementError("UnauthorisedCaller", { requestId: id, caller });
    }
    if (state.cancellationStagedAt.has(id)) {
      throw new SettlementError("SwapRequestCancellationAlreadyStaged", { requestId: id });
    }

    state.cancellationStagedAt.set(id, ctx.now);
    ctx.emit({ type: "SwapRequestCancellationStaged", requestId: id, sender: request.sender, stagedAt: ctx.now });
  }

  async cancelSwapRequestAndRefund(
    ctx: RouterContext,
    caller: Address,
    requestId: Hex,
    refundRecipient: Address
  ): Promise<void> {
    const id = normalizeRequestId(requestId);
    const state = ctx.store.state;
    const request = state.requests.get(id);
    if (request?.executed) throw new SettlementError("AlreadyFulfilled", { requestId: id });
    if (!request || !isAddressEqual(request.sender, caller)) {
      throw new SettlementError("UnauthorisedCaller", { requestId: id, caller });
    }
    const stagedAt = state.cancellationStagedAt.get(id);
    if (stagedAt === undefined) throw new SettlementError("SwapRequestCancellationNotStaged", { requestId: id });
    const unlocksAt = stagedAt + state.cancellationWindow;
    if (ctx.now < unlocksAt) {
      throw new SettlementError("SwapRequestCancellationWindowNotPassed", { requestId: id, unlocksAt });
    }
    requireNonZero(refundRecipient, "refundRecipient");
    const feeBalance = ctx.store.feeBalance(request.tokenIn);
    if (feeBalance < request.verificationFee) {
      throw new SettlementError("InsufficientVerificationFeeBalance", {
        token: request.tokenIn,
        balance: feeBalance,
        required: request.verificationFee
      });
    }

    request.executed = true;
    request.preHooks = [];
    request.postHooks = [];
    state.unfulfilledSolverRefunds.delete(id);
    state.cancelledSwapRequests.add(id);
    const amount = (state.solverRefunds.get(id) ?? 0n) + request.verificationFee;
    state.solverRefunds.delete(id);
    ctx.store.setFeeBalance(request.tokenIn, feeBalance - request.verificationFee);

    await ctx.tokens.transfer(request.tokenIn, ctx.address, refundRecipient, amount);
    ctx.emit({
      type: "SwapRequestRefundClaimed",
      requestId: id,
      sender: request.sender,
      recipient: getAddress(refundRecipient),
      amount
    });
  }

  setVerificationFeeBps(ctx: RouterContext, caller: Address, feeBps: bigint): void {
    requireAdmin(ctx, caller);
    assertUpdatedFeeBps(feeBps);
    ctx.store.state.verificationFeeBps = feeBps;
    ctx.emit({ type: "VerificationFeeBpsUpdated", feeBps });
  }

  permitDestinationChainId(ctx: RouterContext, caller: Address, chainId: bigint): void {
    requireAdmin(ctx, caller);
    if (chainId === ctx.chainId || chainId <= 0n) {
      throw new SettlementError("DestinationChainIdNotSupported", { dstChainId: chainId });
    }
    ctx.store.state.allowedDstChainIds.add(chainId);
    ctx.emit({ type: "DestinationChainIdPermitted", chainId });
  }

  blockDestinationChainId(ctx: RouterContext, caller: Address, chainId: bigint): void {
    requireAdmin(ctx, caller);
    ctx.store.state.allowedDstChainIds.delete(chainId);
    ctx.emit({ type: "DestinationChainIdBlocked", chainId });
  }

  setTokenMapping(ctx: RouterContext, caller: Address, dstChainId: bigint, dstToken: Address, srcToken: Address): void {
    requireAdmin(ctx, caller);
    requireNonZero(dstToken, "dstToken");
    requireNonZero(srcToken, "srcToken");
    if (!ctx.store.state.allowedDstChainIds.has(dstChainId)) {
      throw new SettlementError("DestinationChainIdNotSupported", { dstChainId });
    }
    const mapped = ctx.store.mappedTokens(srcToken, dstChainId);
    if (mapped.some((token) => isAddressEqual(token, dstToken))) {
      throw new SettlementError("TokenMappingAlreadyExists", { dstChainId, dstToken, srcToken });
    }
    ctx.store.setMappedTokens(srcToken, dstChainId, [...mapped, getAddress(dstToken)]);
    ctx.emit({ type: "TokenMappingAdded", dstChainId, dstToken: getAddress(dstToken), srcToken: getAddress(srcToken) });
  }

  removeTokenMapping(ctx: RouterContext, caller: Address, dstChainId: bigint, dstToken: Address, srcToken: Address): void {
    requireAdmin(ctx, caller);
    if (!ctx.store.state.allowedDstChainIds.has(dstChainId)) {
      throw new SettlementError("DestinationChainIdNotSupported", { dstChainId });
    }
    const mapped = ctx.store.mappedTokens(srcToken, dstChainId);
    const remaining = mapped.filter((token) => !isAddressEqual(token, dstToken));
    if (remaining.length === mapped.length) {
      throw new SettlementError("TokenNotSupported", { tokenIn: srcToken, tokenOut: dstToken });
    }
    ctx.store.setMappedTokens(srcToken, dstChainId, remaining);
    ctx.emit({
      type: "TokenMappingRemoved",
      dstChainId,
      dstToken: getAddress(dstToken),
      srcToken: getAddress(srcToken)
    });
  }

  async withdrawVerificationFee(ctx: RouterContext, caller: Address, token: Address, to: Address): Promise<bigint> {
    requireAdmin(ctx, caller);
    requireNonZero(to, "to");
    const amount = ctx.store.feeBalance(token);
    if (amount === 0n) throw new SettlementError("ZeroAmount", { token });

    ctx.store.setFeeBalance(token, 0n);
    await ctx.tokens.transfer(token, ctx.address, to, amount);
    ctx.emit({ type: "VerificationFeeWithdrawn", token: getAddress(token), recipient: getAddress(to), amount });
    return amount;
  }

  setHookGateway(ctx: RouterContext, caller: Address, gateway: Address): void {
    requireAdmin(ctx, caller);
    requireNonZero(gateway, "gateway");
    ctx.store.state.hookGateway = getAddress(gateway);
    ctx.emit({ type: "HookGatewayUpdated", gateway: getAddress(gateway) });
  }

  setPermitRelay(ctx: RouterContext, caller: Address, relay: Address): void {
    requireAdmin(ctx, caller);
    requireNonZero(relay, "relay");
    ctx.store.state.permitRelay = getAddress(relay);
    ctx.emit({ type: "PermitRelayUpdated", relay: getAddress(relay) });
  }

  grantAdmin(ctx: RouterContext, caller: Address, account: Address): void {
    requireAdmin(ctx, caller);
    requireNonZero(account, "account");
    ctx.store.state.admins.add(getAddress(account));
    ctx.emit({ type: "AdminRoleUpdated", account: getAddress(account), granted: true });
  }

  revokeAdmin(ctx: RouterContext, caller: Address, account: Address): void {
    requireAdmin(ctx, caller);
    ctx.store.state.admins.delete(getAddress(account));
    ctx.emit({ type: "AdminRoleUpdated", account: getAddress(account), granted: false });
  }
}

export function normalizeRequestId(requestId: Hex): Hex {
  const normalized = requestId.toLowerCase();
  if (!isHex(normalized, { strict: true }) || normalized.length !== 66) {
    throw new SettlementError("SwapRequestNotFound", { requestId }, `Malformed request id ${requestId}`);
  }
  return normalized;
}

export function encodeSolverRefundAddress(solverRefundAddress: Address): Hex {
  return encodeAbiParameters([{ name: "solverRefundAddress", type: "address" }], [solverRefundAddress]);
}

function requireAdmin(ctx: RouterContext, caller: Address) {
  if (!ctx.store.isAdmin(caller)) {
    throw new SettlementError("AccessControlUnauthorizedAccount", { account: caller });
  }
}

function requireNonZero(address: Address, field: string) {
  if (isAddressEqual(address, zeroAddress)) throw new SettlementError("ZeroAddress", { field });
}

function cloneHooks(hooks: readonly Hook[] | undefined): Hook[] {
  return (hooks ?? []).map((hook) => ({ target: getAddress(hook.target), callData: hook.callData, gasLimit: hook.gasLimit }));
}

async function executeHooks(ctx: RouterContext, hooks: readonly Hook[]) {
  if (hooks.length === 0) return;
  const address = ctx.store.state.hookGateway;
  const gateway = address ? ctx.hookGateways.resolve(address) : undefined;
  if (!gateway) throw new SettlementError("HookGatewayNotSet");
  await gateway.execute(ctx.address, hooks);
}

function resolvePermitRelay(ctx: RouterContext): PermitTransferRelay {
  const address = ctx.store.state.permitRelay;
  const relay = address ? ctx.permitRelays.resolve(address) : undefined;
  if (!relay) throw new SettlementError("PermitRelayNotSet");
  return relay;
}

export function resolveVerifier(ctx: RouterContext, address: Address): SignatureVerifier {
  const verifier = ctx.verifiers.resolve(address);
  if (!verifier) throw new SettlementError("UnknownValidator", { validator: address });
  return verifier;
}
