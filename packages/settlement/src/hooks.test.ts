import assert from "node:assert/strict";
import test from "node:test";
import type { Address } from "viem";
import { isSettlementError, SettlementError } from "./errors";
import type { HookCall } from "./hooks";
import {
  ONE,
  OWNER,
  RECIPIENT,
  SOLVER,
  TOKEN_DST,
  TOKEN_SRC,
  USER,
  createSwapFixture,
  relayInputFor,
  swapInput
} from "./test-fixtures";
import type { Hook } from "./types";

const HOOK_TARGET: Address = "0x4000000000000000000000000000000000000004";
const hook: Hook = { target: HOOK_TARGET, callData: "0x1234", gasLimit: 50_000n };

async function hookFailure(promise: Promise<unknown>): Promise<SettlementError> {
  try {
    await promise;
  } catch (error) {
    if (isSettlementError(error, "HookExecutionFailed")) return error;
    throw error;
  }
  assert.fail("expected HookExecutionFailed");
}

test("pre-hooks run through the gateway with the router as caller", async () => {
  const { src } = await createSwapFixture();
  const calls: HookCall[] = [];
  src.hookGateway.registerTarget(HOOK_TARGET, (call) => {
    calls.push(call);
    return 21_000n;
  });

  const requestId = await src.router.requestCrossChainSwap(USER, swapInput({ preHooks: [hook, hook] }));
  assert.deepEqual(calls, [
    { caller: src.router.address, callData: "0x1234", gasLimit: 50_000n },
    { caller: src.router.address, callData: "0x1234", gasLimit: 50_000n }
  ]);
  assert.deepEqual(src.router.getSwapRequestParameters(requestId)?.preHooks, [hook, hook]);
});

test("a failing pre-hook rolls the request back", async () => {
  const { src } = await createSwapFixture();
  src.hookGateway.registerTarget(HOOK_TARGET, () => {
    throw new Error("boom");
  });

  const error = await hookFailure(src.router.requestCrossChainSwap(USER, swapInput({ preHooks: [hook] })));
  assert.deepEqual(error.details, { index: 0, target: HOOK_TARGET, reason: "boom" });
  assert.equal(src.router.currentSwapRequestNonce(), 0n);
  assert.equal(src.tokens.balanceOf(TOKEN_SRC, USER), 100n * ONE);
  assert.equal(src.router.getTotalVerificationFeeBalance(TOKEN_SRC), 0n);
  assert.deepEqual(src.router.getUnfulfilledSolverRefunds(), []);
});

test("hooks exceeding their gas limit or without code fail", async () => {
  const { src } = await createSwapFixture();
  src.hookGateway.registerTarget(HOOK_TARGET, () => 50_001n);

  const outOfGas = await hookFailure(src.router.requestCrossChainSwap(USER, swapInput({ preHooks: [hook] })));
  assert.equal(outOfGas.details.reason, "out_of_gas");

  const missing = { ...hook, target: TOKEN_DST };
  const noCode = await hookFailure(src.router.requestCrossChainSwap(USER, swapInput({ preHooks: [missing] })));
  assert.deepEqual(noCode.details, { index: 0, target: TOKEN_DST, reason: "no_code" });
});

test("hooks need a registered gateway; requests without hooks do not", async () => {
  const { src } = await createSwapFixture();
  await src.router.setHookGateway(OWNER, HOOK_TARGET);

  await assert.rejects(
    src.router.requestCrossChainSwap(USER, swapInput({ preHooks: [hook] })),
    (error: unknown) => isSettlementError(error, "HookGatewayNotSet")
  );
  await src.router.requestCrossChainSwap(USER, swapInput());
  assert.equal(src.router.currentSwapRequestNonce(), 1n);
});

test("a post-hook that re-enters the relay fails the outer relay", async () => {
  const fixture = await createSwapFixture();
  const { src, dst } = fixture;
  const requestId = await src.router.requestCrossChainSwap(USER, swapInput({ postHooks: [hook] }));
  const relayInput = relayInputFor(fixture, requestId);

  dst.hookGateway.registerTarget(HOOK_TARGET, async () => {
    await dst.router.relayTokens(SOLVER, relayInput);
    return 30_000n;
  });

  const error = await hookFailure(dst.router.relayTokens(SOLVER, relayInput));
  assert.equal(error.details.reason, `AlreadyFulfilled(requestId=${requestId})`);
  assert.equal(dst.router.getSwapRequestReceipt(requestId), undefined);
  assert.deepEqual(dst.router.getFulfilledTransfers(), []);
  assert.equal(dst.tokens.balanceOf(TOKEN_DST, SOLVER), 100n * ONE);
});

test("a relay that fails inside a post-hook leaves no trace when the hook recovers", async () => {
  const fixture = await createSwapFixture();
  const { src, dst } = fixture;
  const first = await src.router.requestCrossChainSwap(USER, swapInput({ postHooks: [hook] }));
  const second = await src.router.requestCrossChainSwap(USER, swapInput());
  dst.tokens.approve(TOKEN_DST, SOLVER, dst.router.address, 10n * ONE);

  let innerError: unknown;
  dst.hookGateway.registerTarget(HOOK_TARGET, async () => {
    try {
      await dst.router.relayTokens(SOLVER, relayInputFor(fixture, second));
    } catch (error) {
      innerError = error;
    }
    return 30_000n;
  });

  await dst.router.relayTokens(SOLVER, relayInputFor(fixture, first));
  assert.ok(isSettlementError(innerError, "InsufficientAllowance"));
  assert.equal(dst.router.getSwapRequestReceipt(second), undefined);
  assert.deepEqual(dst.router.getFulfilledTransfers(), [first]);
  assert.equal(dst.tokens.balanceOf(TOKEN_DST, RECIPIENT), 10n * ONE);
  assert.deepEqual(
    dst.chain
      .getLogs()
      .flatMap(({ event }) => (event.type === "SwapRequestFulfilled" ? [event.requestId] : [])),
    [first]
  );
});

test("post-hooks run after the recipient is paid", async () => {
  const fixture = await createSwapFixture();
  const { src, dst } = fixture;
  const requestId = await src.router.requestCrossChainSwap(USER, swapInput({ postHooks: [hook] }));
  const relayInput = relayInputFor(fixture, requestId);

  let recipientBalance = -1n;
  dst.hookGateway.registerTarget(HOOK_TARGET, () => {
    recipientBalance = dst.tokens.balanceOf(TOKEN_DST, relayInput.recipient);
    return 1n;
  });

  await dst.router.relayTokens(SOLVER, relayInput);
  assert.equal(recipientBalance, 10n * ONE);
  assert.equal(dst.chain.getLogs().at(-1)?.event.type, "SwapRequestFulfilled");
});
