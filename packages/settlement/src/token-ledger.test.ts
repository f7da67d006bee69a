import assert from "node:assert/strict";
import test from "node:test";
import { isSettlementError } from "./errors";
import { InMemoryTokenLedger } from "./token-ledger";

const TOKEN = "0x1111111111111111111111111111111111111111";
const ALICE = "0x2222222222222222222222222222222222222222";
const BOB = "0x3333333333333333333333333333333333333333";
const SPENDER = "0x4444444444444444444444444444444444444444";

test("mint, transfer and balances", async () => {
  const tokens = new InMemoryTokenLedger();
  tokens.mint(TOKEN, ALICE, 100n);
  await tokens.transfer(TOKEN, ALICE, BOB, 30n);
  assert.equal(tokens.balanceOf(TOKEN, ALICE), 70n);
  assert.equal(tokens.balanceOf(TOKEN, BOB), 30n);
  assert.equal(tokens.totalSupply(TOKEN), 100n);
});

test("transfer fails without balance", async () => {
  const tokens = new InMemoryTokenLedger();
  await assert.rejects(
    tokens.transfer(TOKEN, ALICE, BOB, 1n),
    (error) => isSettlementError(error, "InsufficientBalance")
  );
});

test("transferFrom consumes allowance", async () => {
  const tokens = new InMemoryTokenLedger();
  tokens.mint(TOKEN, ALICE, 100n);
  tokens.approve(TOKEN, ALICE, SPENDER, 60n);
  await tokens.transferFrom(TOKEN, SPENDER, ALICE, BOB, 40n);
  assert.equal(tokens.allowance(TOKEN, ALICE, SPENDER), 20n);
  await assert.rejects(
    tokens.transferFrom(TOKEN, SPENDER, ALICE, BOB, 21n),
    (error) => isSettlementError(error, "InsufficientAllowance")
  );
  assert.equal(tokens.balanceOf(TOKEN, BOB), 40n);
});

test("checkpoint restores balances and allowances", async () => {
  const tokens = new InMemoryTokenLedger();
  tokens.mint(TOKEN, ALICE, 100n);
  tokens.approve(TOKEN, ALICE, SPENDER, 10n);
  const restore = tokens.checkpoint();
  await tokens.transfer(TOKEN, ALICE, BOB, 50n);
  tokens.approve(TOKEN, ALICE, SPENDER, 0n);
  restore();
  assert.equal(tokens.balanceOf(TOKEN, ALICE), 100n);
  assert.equal(tokens.balanceOf(TOKEN, BOB), 0n);
  assert.equal(tokens.allowance(TOKEN, ALICE, SPENDER), 10n);
});

test("receivers are notified after a credit", async () => {
  const tokens = new InMemoryTokenLedger();
  tokens.mint(TOKEN, ALICE, 5n);
  const seen: bigint[] = [];
  tokens.onReceive(BOB, ({ amount }) => {
    seen.push(amount);
  });
  await tokens.transfer(TOKEN, ALICE, BOB, 5n);
  assert.deepEqual(seen, [5n]);
});
