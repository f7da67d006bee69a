import assert from "node:assert/strict";
import test from "node:test";
import type { SwapRequestParameters } from "./types";
import { parseSwapRequest, stringifyWire, uintSchema } from "./wire";

const request: SwapRequestParameters = {
  sender: "0x1111111111111111111111111111111111111111",
  recipient: "0x2222222222222222222222222222222222222222",
  tokenIn: "0x3333333333333333333333333333333333333333",
  tokenOut: "0x4444444444444444444444444444444444444444",
  amountIn: 10n ** 19n,
  amountOut: 10n ** 19n,
  srcChainId: 31337n,
  dstChainId: 43113n,
  verificationFee: 5n * 10n ** 17n,
  solverFee: 10n ** 18n,
  nonce: 1n,
  executed: false,
  requestedAt: 1_700_000_000n,
  preHooks: [],
  postHooks: [{ target: "0x5555555555555555555555555555555555555555", callData: "0xabcd", gasLimit: 100_000n }]
};

test("uint256 values travel as decimal strings", () => {
  const json = stringifyWire({ amount: 10n ** 19n });
  assert.equal(json, '{"amount":"10000000000000000000"}');
});

test("requests decode back to native bigint fields", () => {
  const decoded = parseSwapRequest(JSON.parse(stringifyWire(request)));
  assert.deepEqual(decoded, request);
});

test("uint schema rejects negative and fractional values", () => {
  assert.equal(uintSchema.safeParse("-1").success, false);
  assert.equal(uintSchema.safeParse(1.5).success, false);
  assert.equal(uintSchema.safeParse("0x10").success, false);
  assert.equal(uintSchema.parse(7), 7n);
});

test("addresses are checksummed on decode", () => {
  const decoded = parseSwapRequest(
    JSON.parse(stringifyWire({ ...request, sender: "0xabcdefabcdefabcdefabcdefabcdefabcdefabcd" }))
  );
  assert.equal(decoded.sender.toLowerCase(), "0xabcdefabcdefabcdefabcdefabcdefabcdefabcd");
  assert.notEqual(decoded.sender, "0xabcdefabcdefabcdefabcdefabcdefabcdefabcd");
});
