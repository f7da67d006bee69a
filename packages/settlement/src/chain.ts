import { AsyncLocalStorage } from "node:async_hooks";
import type { Address } from "viem";
import { SettlementError } from "./errors";

/** Anything whose state must roll back when a ledger call fails. */
export interface Journaled {
  /** Captures current state and returns a function that restores it. */
  checkpoint(): () => void;
}

export interface LedgerClock {
  /** Current ledger time in whole seconds. */
  now(): bigint;
}

export class SystemClock implements LedgerClock {
  now(): bigint {
    return BigInt(Math.floor(Date.now() / 1000));
  }
}

export class ManualClock implements LedgerClock {
  private current: bigint;

  constructor(start = 1_700_000_000n) {
    this.current = start;
  }

  now(): bigint {
    return this.current;
  }

  advance(seconds: bigint) {
    this.current += seconds;
  }

  set(timestamp: bigint) {
    this.current = timestamp;
  }
}

export type LogEntry<E> = {
  index: number;
  chainId: bigint;
  emitter: Address;
  timestamp: bigint;
  event: E;
};

export type TransactionContext = {
  timestamp: bigint;
};

export class ContractRegistry<T> {
  private readonly contracts = new Map<string, T>();

  register(address: Address, contract: T) {
    this.contracts.set(address.toLowerCase(), contract);
  }

  resolve(address: Address): T | undefined {
    return this.contracts.get(address.toLowerCase());
  }

  has(address: Address): boolean {
    return this.contracts.has(address.toLowerCase());
  }
}

/**
 * One ledger instance: a clock, an append-only log and a strictly ordered queue of calls.
 * Each call runs against a checkpoint of every registered participant and is rolled back on
 * any thrown error. Calls made from inside an active call (re-entry) run inline within it.
 */
export class LedgerChain<E> implements Journaled {
  readonly chainId: bigint;
  readonly clock: LedgerClock;
  private readonly participants: Journaled[] = [];
  private readonly active = new AsyncLocalStorage<TransactionContext>();
  private logs: LogEntry<E>[] = [];
  private queue: Promise<unknown> = Promise.resolve();

  constructor(chainId: bigint, clock: LedgerClock = new SystemClock()) {
    this.chainId = chainId;
    this.clock = clock;
    this.participants.push(this);
  }

  register(participant: Journaled) {
    this.participants.push(participant);
  }

  checkpoint(): () => void {
    const length = this.logs.length;
    return () => {
      this.logs = this.logs.slice(0, length);
    };
  }

  async transact<T>(fn: (tx: TransactionContext) => Promise<T> | T): Promise<T> {
    const current = this.active.getStore();
    if (current) return await this.journaled(() => fn(current));

    const run = async (): Promise<T> => {
      const tx: TransactionContext = { timestamp: this.clock.now() };
      return await this.journaled(() => this.active.run(tx, () => fn(tx)));
    };

    const result = this.queue.then(run, run);
    this.queue = result.catch(() => undefined);
    return await result;
  }

  // A nested call that fails restores to its own entry point even when its caller catches the error.
  private async journaled<T>(body: () => Promise<T> | T): Promise<T> {
    const restores = this.participants.map((participant) => participant.checkpoint());
    try {
      return await body();
    } catch (error) {
      for (const restore of restores.reverse()) restore();
      throw error;
    }
  }

  emit(emitter: Address, event: E): LogEntry<E> {
    const tx = this.active.getStore();
    if (!tx) throw new SettlementError("NoActiveTransaction", {}, "Events can only be emitted inside a ledger call");
    const entry: LogEntry<E> = {
      index: this.logs.length,
      chainId: this.chainId,
      emitter,
      timestamp: tx.timestamp,
      event
    };
    this.logs.push(entry);
    return entry;
  }

  getLogs(fromIndex = 0, limit?: number): LogEntry<E>[] {
    const end = limit === undefined ? undefined : fromIndex + limit;
    return this.logs.slice(fromIndex, end);
  }

  getLogCount(): number {
    return this.logs.length;
  }
}
