import type { Address, Hex } from "viem";
import { ManualClock } from "./chain";
import { deployLedger, type LedgerDeployment } from "./deploy";
import { CONTRACT_UPGRADE_DOMAIN, SWAP_REQUEST_DOMAIN } from "./hashing";
import { devAccount, devKey } from "./test-keys";
import type { RelayTokensInput, RequestCrossChainSwapInput } from "./types";
import { signQuorumMessage } from "./verifier";

export const ONE = 10n ** 18n;
export const SRC_CHAIN_ID = 31337n;
export const DST_CHAIN_ID = 43113n;

export const OWNER = devAccount(7).address;
export const USER = devAccount(8).address;
export const SOLVER = devAccount(9).address;
export const RECIPIENT: Address = "0x7000000000000000000000000000000000000007";
export const TOKEN_SRC: Address = "0x1000000000000000000000000000000000000001";
export const TOKEN_DST: Address = "0x2000000000000000000000000000000000000002";

export const SWAP_COMMITTEE_KEYS = [devKey(1), devKey(2), devKey(3)];
export const UPGRADE_COMMITTEE_KEYS = [devKey(4), devKey(5), devKey(6)];

export type SwapFixture = {
  src: LedgerDeployment;
  dst: LedgerDeployment;
  srcClock: ManualClock;
  dstClock: ManualClock;
};

/** Two ledgers with a router each, mapped to each other, with a funded user and solver. */
export async function createSwapFixture(options?: { feeBps?: bigint }): Promise<SwapFixture> {
  const srcClock = new ManualClock(1_700_000_000n);
  const dstClock = new ManualClock(1_700_000_000n);
  const committees = {
    swapCommittee: { members: [devAccount(1).address, devAccount(2).address, devAccount(3).address], threshold: 2 },
    upgradeCommittee: { members: [devAccount(4).address, devAccount(5).address, devAccount(6).address], threshold: 2 }
  };
  const src = await deployLedger({
    chainId: SRC_CHAIN_ID,
    owner: OWNER,
    verificationFeeBps: options?.feeBps ?? 500n,
    clock: srcClock,
    ...committees
  });
  const dst = await deployLedger({
    chainId: DST_CHAIN_ID,
    owner: OWNER,
    verificationFeeBps: options?.feeBps ?? 500n,
    clock: dstClock,
    ...committees
  });

  await src.router.permitDestinationChainId(OWNER, DST_CHAIN_ID);
  await src.router.setTokenMapping(OWNER, DST_CHAIN_ID, TOKEN_DST, TOKEN_SRC);
  await dst.router.permitDestinationChainId(OWNER, SRC_CHAIN_ID);
  await dst.router.setTokenMapping(OWNER, SRC_CHAIN_ID, TOKEN_SRC, TOKEN_DST);

  src.tokens.mint(TOKEN_SRC, USER, 100n * ONE);
  src.tokens.approve(TOKEN_SRC, USER, src.router.address, 100n * ONE);
  dst.tokens.mint(TOKEN_DST, SOLVER, 100n * ONE);
  dst.tokens.approve(TOKEN_DST, SOLVER, dst.router.address, 100n * ONE);

  return { src, dst, srcClock, dstClock };
}

export function swapInput(partial?: Partial<RequestCrossChainSwapInput>): RequestCrossChainSwapInput {
  return {
    tokenIn: TOKEN_SRC,
    tokenOut: TOKEN_DST,
    amountIn: 10n * ONE,
    amountOut: 10n * ONE,
    solverFee: ONE,
    dstChainId: DST_CHAIN_ID,
    recipient: RECIPIENT,
    ...partial
  };
}

/** Relay parameters a solver would reconstruct from the source request. */
export function relayInputFor(fixture: SwapFixture, requestId: Hex, solverRefundAddress: Address = SOLVER): RelayTokensInput {
  const request = fixture.src.router.getSwapRequestParameters(requestId);
  if (!request) throw new Error(`unknown request ${requestId}`);
  return {
    solverRefundAddress,
    requestId,
    sender: request.sender,
    recipient: request.recipient,
    tokenIn: request.tokenIn,
    tokenOut: request.tokenOut,
    amountOut: request.amountOut,
    srcChainId: request.srcChainId,
    nonce: request.nonce,
    preHooks: request.preHooks,
    postHooks: request.postHooks
  };
}

export async function signRebalance(
  fixture: SwapFixture,
  requestId: Hex,
  solver: Address,
  keys: readonly Hex[] = SWAP_COMMITTEE_KEYS.slice(0, 2)
): Promise<Hex> {
  const message = fixture.src.router.swapRequestParametersToBytes(requestId, solver);
  return await signQuorumMessage(SWAP_REQUEST_DOMAIN, message, keys);
}

export async function signGovernance(message: Hex, keys: readonly Hex[] = UPGRADE_COMMITTEE_KEYS.slice(0, 2)): Promise<Hex> {
  return await signQuorumMessage(CONTRACT_UPGRADE_DOMAIN, message, keys);
}
