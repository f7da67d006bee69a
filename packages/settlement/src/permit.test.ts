import assert from "node:assert/strict";
import test from "node:test";
import type { Hex } from "viem";
import { isSettlementError, type SettlementErrorCode } from "./errors";
import { signPermitWitnessTransfer, type PermitWitnessTransfer } from "./permit";
import { encodeSolverRefundAddress } from "./router";
import { devKey } from "./test-keys";
import {
  DST_CHAIN_ID,
  ONE,
  RECIPIENT,
  SOLVER,
  SRC_CHAIN_ID,
  TOKEN_DST,
  TOKEN_SRC,
  USER,
  createSwapFixture,
  relayInputFor,
  swapInput,
  type SwapFixture
} from "./test-fixtures";
import type { RequestCrossChainSwapInput } from "./types";

const USER_KEY = devKey(8);
const SOLVER_KEY = devKey(9);

function rejectsWith(code: SettlementErrorCode) {
  return (error: unknown) => isSettlementError(error, code);
}

async function fixtureWithRelayApprovals(): Promise<SwapFixture> {
  const fixture = await createSwapFixture();
  fixture.src.tokens.approve(TOKEN_SRC, USER, fixture.src.addresses.permitRelay, 100n * ONE);
  fixture.dst.tokens.approve(TOKEN_DST, SOLVER, fixture.dst.addresses.permitRelay, 100n * ONE);
  return fixture;
}

function swapTransfer(
  fixture: SwapFixture,
  input: RequestCrossChainSwapInput,
  nonce: bigint,
  deadline: bigint
): PermitWitnessTransfer {
  const router = fixture.src.router.address;
  return {
    owner: USER,
    token: input.tokenIn,
    amount: input.amountIn + input.solverFee,
    spender: router,
    nonce,
    deadline,
    witness: {
      kind: "swap_request",
      value: {
        router,
        tokenIn: input.tokenIn,
        tokenOut: input.tokenOut,
        amountIn: input.amountIn,
        amountOut: input.amountOut,
        solverFee: input.solverFee,
        dstChainId: input.dstChainId,
        recipient: input.recipient,
        additionalData: "0x"
      }
    }
  };
}

async function signSwapPermit(fixture: SwapFixture, input: RequestCrossChainSwapInput, nonce: bigint, deadline: bigint) {
  return await signPermitWitnessTransfer(
    USER_KEY,
    { chainId: SRC_CHAIN_ID, relay: fixture.src.addresses.permitRelay },
    swapTransfer(fixture, input, nonce, deadline)
  );
}

test("a signed permit funds a request submitted by someone else", async () => {
  const fixture = await fixtureWithRelayApprovals();
  const { src, srcClock } = fixture;
  const input = swapInput();
  const deadline = srcClock.now() + 600n;
  const signature = await signSwapPermit(fixture, input, 1n, deadline);

  const requestId = await src.router.requestCrossChainSwapPermit2(SOLVER, {
    ...input,
    requester: USER,
    permit: { nonce: 1n, deadline, signature }
  });

  assert.equal(src.router.getSwapRequestParameters(requestId)?.sender, USER);
  assert.equal(src.tokens.balanceOf(TOKEN_SRC, USER), 89n * ONE);
  assert.equal(src.tokens.balanceOf(TOKEN_SRC, src.router.address), 11n * ONE);
  assert.equal(src.permitRelay.isNonceUsed(USER, 1n), true);
  assert.equal(src.tokens.allowance(TOKEN_SRC, USER, src.router.address), 100n * ONE);
});

test("a permit signed over different terms is rejected and leaves no trace", async () => {
  const fixture = await fixtureWithRelayApprovals();
  const { src, srcClock } = fixture;
  const deadline = srcClock.now() + 600n;
  const signature = await signSwapPermit(fixture, swapInput(), 1n, deadline);

  await assert.rejects(
    src.router.requestCrossChainSwapPermit2(SOLVER, {
      ...swapInput({ amountOut: 9n * ONE }),
      requester: USER,
      permit: { nonce: 1n, deadline, signature }
    }),
    rejectsWith("InvalidPermitSignature")
  );
  assert.equal(src.router.currentSwapRequestNonce(), 0n);
  assert.equal(src.permitRelay.isNonceUsed(USER, 1n), false);
  assert.equal(src.tokens.balanceOf(TOKEN_SRC, USER), 100n * ONE);
  assert.equal(src.router.getTotalVerificationFeeBalance(TOKEN_SRC), 0n);
});

test("permit nonces work once and deadlines are enforced", async () => {
  const fixture = await fixtureWithRelayApprovals();
  const { src, srcClock } = fixture;
  const input = swapInput();
  const deadline = srcClock.now() + 600n;
  const signature = await signSwapPermit(fixture, input, 7n, deadline);
  const permit2Input = { ...input, requester: USER, permit: { nonce: 7n, deadline, signature } };

  await src.router.requestCrossChainSwapPermit2(USER, permit2Input);
  await assert.rejects(src.router.requestCrossChainSwapPermit2(USER, permit2Input), rejectsWith("PermitNonceUsed"));

  const lateSignature = await signSwapPermit(fixture, input, 8n, deadline);
  srcClock.advance(601n);
  await assert.rejects(
    src.router.requestCrossChainSwapPermit2(USER, {
      ...input,
      requester: USER,
      permit: { nonce: 8n, deadline, signature: lateSignature }
    }),
    rejectsWith("PermitExpired")
  );
});

test("the relay only honours the spender named in the permit", async () => {
  const fixture = await fixtureWithRelayApprovals();
  const { src, srcClock } = fixture;
  const input = swapInput();
  const deadline = srcClock.now() + 600n;
  const transfer = swapTransfer(fixture, input, 1n, deadline);
  const signature = await signSwapPermit(fixture, input, 1n, deadline);

  await assert.rejects(
    src.chain.transact(() => src.permitRelay.permitWitnessTransferFrom(SOLVER, transfer, SOLVER, signature)),
    rejectsWith("InvalidPermitSignature")
  );
});

test("a solver relays with a permit bound to the request and refund address", async () => {
  const fixture = await fixtureWithRelayApprovals();
  const { src, dst, dstClock } = fixture;
  const requestId = await src.router.requestCrossChainSwap(USER, swapInput());
  const relayInput = relayInputFor(fixture, requestId);
  const deadline = dstClock.now() + 600n;

  const sign = async (refund: Hex) =>
    await signPermitWitnessTransfer(
      SOLVER_KEY,
      { chainId: DST_CHAIN_ID, relay: dst.addresses.permitRelay },
      {
        owner: SOLVER,
        token: TOKEN_DST,
        amount: relayInput.amountOut,
        spender: dst.router.address,
        nonce: 3n,
        deadline,
        witness: { kind: "relayer", value: { requestId, recipient: RECIPIENT, additionalData: refund } }
      }
    );

  // a permit naming another refund address does not cover this relay
  await assert.rejects(
    dst.router.relayTokensPermit2(SOLVER, {
      ...relayInput,
      solver: SOLVER,
      permit: { nonce: 3n, deadline, signature: await sign(encodeSolverRefundAddress(RECIPIENT)) }
    }),
    rejectsWith("InvalidPermitSignature")
  );
  assert.equal(dst.router.getSwapRequestReceipt(requestId), undefined);

  await dst.router.relayTokensPermit2(USER, {
    ...relayInput,
    solver: SOLVER,
    permit: { nonce: 3n, deadline, signature: await sign(encodeSolverRefundAddress(SOLVER)) }
  });
  assert.equal(dst.tokens.balanceOf(TOKEN_DST, RECIPIENT), 10n * ONE);
  assert.equal(dst.tokens.balanceOf(TOKEN_DST, SOLVER), 90n * ONE);
  assert.equal(dst.router.getSwapRequestReceipt(requestId)?.solver, SOLVER);
  assert.deepEqual(dst.router.getFulfilledTransfers(), [requestId]);
});
