import assert from "node:assert/strict";
import test from "node:test";
import { getAddress } from "viem";
import { collectSettlementLogs } from "./request-log";

const ROUTER = "0x00000000000000000000000000000000000000aa";
const REQUEST_A = `0x${"a1".repeat(32)}`;
const REQUEST_B = `0x${"b2".repeat(32)}`;

function requested(index: number, requestId: string, chainId: bigint | string = 31337n) {
  return {
    index,
    chainId,
    emitter: ROUTER,
    timestamp: 1_700_000_000n,
    event: { type: "SwapRequested", requestId, srcChainId: 31337n, dstChainId: 43113n }
  };
}

test("merges in-process and JSON entries sorted by chain and index", () => {
  const fulfilled = {
    index: 0,
    chainId: "43113",
    emitter: ROUTER,
    timestamp: "1700000100",
    event: { type: "SwapRequestFulfilled", requestId: REQUEST_A.toUpperCase().replace("0X", "0x"), srcChainId: "31337", dstChainId: "43113" }
  };

  const logs = collectSettlementLogs([fulfilled, requested(3, REQUEST_B), requested(1, REQUEST_A)]);

  assert.deepEqual(
    logs.map((log) => [log.kind, log.chainId, log.logIndex, log.requestId]),
    [
      ["swap_requested", 31337n, 1n, REQUEST_A],
      ["swap_requested", 31337n, 3n, REQUEST_B],
      ["swap_fulfilled", 43113n, 0n, REQUEST_A]
    ]
  );
  assert.equal(logs[2]?.timestamp, 1_700_000_100n);
  assert.equal(logs[0]?.emitter, getAddress(ROUTER));
});

test("dedupes repeated positions and keeps the first seen", () => {
  const logs = collectSettlementLogs([requested(2, REQUEST_A), requested(2, REQUEST_B, "31337")]);
  assert.equal(logs.length, 1);
  assert.equal(logs[0]?.requestId, REQUEST_A);
});

test("skips other events and malformed entries", () => {
  const logs = collectSettlementLogs([
    { index: 0, chainId: 31337n, emitter: ROUTER, timestamp: 0n, event: { type: "VerificationFeeBpsUpdated", feeBps: 100n } },
    { ...requested(1, REQUEST_A), emitter: "0x1234" },
    { ...requested(2, REQUEST_A), chainId: "-1" },
    requested(3, "0xdeadbeef"),
    null,
    "SwapRequested",
    requested(4, REQUEST_B)
  ]);
  assert.deepEqual(
    logs.map((log) => log.logIndex),
    [4n]
  );
});
