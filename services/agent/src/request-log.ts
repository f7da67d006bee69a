import { getAddress, isAddress, isHex, type Address, type Hex } from "viem";

export type SettlementLogKind = "swap_requested" | "swap_fulfilled";

export type NormalizedSettlementLog = {
  kind: SettlementLogKind;
  requestId: Hex;
  srcChainId: bigint;
  dstChainId: bigint;
  /** Chain id of the ledger that emitted the entry. */
  chainId: bigint;
  logIndex: bigint;
  emitter: Address;
  timestamp: bigint;
};

const eventKinds: Record<string, SettlementLogKind> = {
  SwapRequested: "swap_requested",
  SwapRequestFulfilled: "swap_fulfilled"
};

/**
 * Picks the request and fulfillment entries out of a ledger log page. Entries may come straight
 * from an in-process ledger or from its JSON feed, so every field is read defensively; entries
 * that do not parse are skipped. Output is ordered by (chainId, logIndex) and unique per position.
 */
export function collectSettlementLogs(entries: readonly unknown[]): NormalizedSettlementLog[] {
  const normalized: NormalizedSettlementLog[] = [];
  for (const entry of entries) {
    const parsed = normalizeSettlementLog(entry);
    if (parsed) normalized.push(parsed);
  }

  normalized.sort((a, b) => {
    if (a.chainId !== b.chainId) return a.chainId < b.chainId ? -1 : 1;
    if (a.logIndex !== b.logIndex) return a.logIndex < b.logIndex ? -1 : 1;
    return 0;
  });

  const deduped: NormalizedSettlementLog[] = [];
  const seen = new Set<string>();
  for (const log of normalized) {
    const key = `${log.chainId.toString()}:${log.logIndex.toString()}`;
    if (seen.has(key)) continue;
    seen.add(key);
    deduped.push(log);
  }
  return deduped;
}

function normalizeSettlementLog(entry: unknown): NormalizedSettlementLog | undefined {
  if (!isRecord(entry) || !isRecord(entry.event)) return undefined;
  const type = entry.event.type;
  const kind = typeof type === "string" && Object.prototype.hasOwnProperty.call(eventKinds, type) ? eventKinds[type] : undefined;
  if (!kind) return undefined;

  const requestId = asBytes32(entry.event.requestId);
  const srcChainId = asBigInt(entry.event.srcChainId);
  const dstChainId = asBigInt(entry.event.dstChainId);
  const chainId = asBigInt(entry.chainId);
  const logIndex = asBigInt(entry.index);
  const emitter = asAddress(entry.emitter);
  const timestamp = asBigInt(entry.timestamp) ?? 0n;

  if (
    !requestId
    || srcChainId === undefined
    || dstChainId === undefined
    || chainId === undefined
    || logIndex === undefined
    || !emitter
  ) {
    return undefined;
  }

  return { kind, requestId, srcChainId, dstChainId, chainId, logIndex, emitter, timestamp };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

export function asBigInt(value: unknown): bigint | undefined {
  if (typeof value === "bigint") return value;
  if (typeof value === "number" && Number.isInteger(value)) return BigInt(value);
  if (typeof value === "string" && /^\d+$/.test(value)) return BigInt(value);
  return undefined;
}

function asBytes32(value: unknown): Hex | undefined {
  if (typeof value !== "string") return undefined;
  const lower = value.toLowerCase();
  return lower.length === 66 && isHex(lower, { strict: true }) ? lower : undefined;
}

function asAddress(value: unknown): Address | undefined {
  if (typeof value !== "string" || !isAddress(value, { strict: false })) return undefined;
  return getAddress(value);
}
