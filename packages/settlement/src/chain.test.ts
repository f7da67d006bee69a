import assert from "node:assert/strict";
import test from "node:test";
import { LedgerChain, ManualClock } from "./chain";
import { isSettlementError } from "./errors";
import { InMemoryTokenLedger } from "./token-ledger";

const EMITTER = "0x1111111111111111111111111111111111111111";
const TOKEN = "0x2222222222222222222222222222222222222222";
const ALICE = "0x3333333333333333333333333333333333333333";
const BOB = "0x4444444444444444444444444444444444444444";

type TestEvent = { type: "Moved"; amount: bigint };

function setup() {
  const clock = new ManualClock(1_000n);
  const chain = new LedgerChain<TestEvent>(31337n, clock);
  const tokens = new InMemoryTokenLedger();
  chain.register(tokens);
  tokens.mint(TOKEN, ALICE, 100n);
  return { clock, chain, tokens };
}

test("a failing call leaves no balance change and no log", async () => {
  const { chain, tokens } = setup();
  await assert.rejects(
    chain.transact(async () => {
      await tokens.transfer(TOKEN, ALICE, BOB, 40n);
      chain.emit(EMITTER, { type: "Moved", amount: 40n });
      await tokens.transfer(TOKEN, ALICE, BOB, 100n);
    }),
    (error) => isSettlementError(error, "InsufficientBalance")
  );
  assert.equal(tokens.balanceOf(TOKEN, ALICE), 100n);
  assert.equal(tokens.balanceOf(TOKEN, BOB), 0n);
  assert.equal(chain.getLogCount(), 0);
});

test("successful calls log with the call timestamp", async () => {
  const { chain, clock, tokens } = setup();
  clock.advance(5n);
  await chain.transact(async () => {
    await tokens.transfer(TOKEN, ALICE, BOB, 10n);
    chain.emit(EMITTER, { type: "Moved", amount: 10n });
  });
  assert.deepEqual(chain.getLogs(), [
    { index: 0, chainId: 31337n, emitter: EMITTER, timestamp: 1_005n, event: { type: "Moved", amount: 10n } }
  ]);
});

test("calls run one at a time in submission order", async () => {
  const { chain } = setup();
  const order: string[] = [];
  const first = chain.transact(async () => {
    order.push("first:start");
    await new Promise((resolve) => setTimeout(resolve, 10));
    order.push("first:end");
  });
  const second = chain.transact(() => {
    order.push("second");
  });
  await Promise.all([first, second]);
  assert.deepEqual(order, ["first:start", "first:end", "second"]);
});

test("nested calls run inline and share the outer rollback", async () => {
  const { chain, tokens } = setup();
  await assert.rejects(
    chain.transact(async () => {
      await chain.transact(async () => {
        await tokens.transfer(TOKEN, ALICE, BOB, 10n);
      });
      throw new Error("outer failure");
    }),
    /outer failure/
  );
  assert.equal(tokens.balanceOf(TOKEN, BOB), 0n);
});

test("a nested call that fails is rolled back even when its caller recovers", async () => {
  const { chain, tokens } = setup();
  let inner: unknown;
  await chain.transact(async () => {
    await tokens.transfer(TOKEN, ALICE, BOB, 10n);
    try {
      await chain.transact(async () => {
        await tokens.transfer(TOKEN, ALICE, BOB, 20n);
        chain.emit(EMITTER, { type: "Moved", amount: 20n });
        await tokens.transfer(TOKEN, ALICE, BOB, 500n);
      });
    } catch (error) {
      inner = error;
    }
    chain.emit(EMITTER, { type: "Moved", amount: 10n });
  });

  assert.ok(isSettlementError(inner, "InsufficientBalance"));
  assert.equal(tokens.balanceOf(TOKEN, ALICE), 90n);
  assert.equal(tokens.balanceOf(TOKEN, BOB), 10n);
  assert.deepEqual(
    chain.getLogs().map((entry) => entry.event),
    [{ type: "Moved", amount: 10n }]
  );
});

test("a failed call does not block the queue", async () => {
  const { chain } = setup();
  await assert.rejects(chain.transact(() => {
    throw new Error("boom");
  }), /boom/);
  assert.equal(await chain.transact(() => 7), 7);
});

test("emitting outside a call is rejected", () => {
  const { chain } = setup();
  assert.throws(
    () => chain.emit(EMITTER, { type: "Moved", amount: 1n }),
    (error) => isSettlementError(error, "NoActiveTransaction")
  );
});
