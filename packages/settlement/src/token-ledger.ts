import { getAddress, type Address } from "viem";
import type { Journaled } from "./chain";
import { SettlementError } from "./errors";

/** Fungible-token transfer primitives the settlement engine consumes. */
export interface TokenLedger {
  balanceOf(token: Address, account: Address): bigint;
  allowance(token: Address, owner: Address, spender: Address): bigint;
  approve(token: Address, owner: Address, spender: Address, amount: bigint): void;
  transfer(token: Address, from: Address, to: Address, amount: bigint): Promise<void>;
  transferFrom(token: Address, spender: Address, from: Address, to: Address, amount: bigint): Promise<void>;
}

export type TransferListener = (transfer: {
  token: Address;
  from: Address;
  to: Address;
  amount: bigint;
}) => Promise<void> | void;

type TokenState = {
  balances: Map<Address, bigint>;
  allowances: Map<string, bigint>;
  totalSupply: bigint;
};

/**
 * Balances for any number of tokens on one ledger. Receivers registered with
 * {@link onReceive} are called after each credit, which lets tests model callback tokens.
 */
export class InMemoryTokenLedger implements TokenLedger, Journaled {
  private tokens = new Map<Address, TokenState>();
  private readonly listeners = new Map<Address, TransferListener>();

  checkpoint(): () => void {
    const saved = structuredClone(this.tokens);
    return () => {
      this.tokens = saved;
    };
  }

  mint(token: Address, to: Address, amount: bigint) {
    const state = this.tokenState(token);
    const account = getAddress(to);
    state.balances.set(account, (state.balances.get(account) ?? 0n) + amount);
    state.totalSupply += amount;
  }

  totalSupply(token: Address): bigint {
    return this.tokens.get(getAddress(token))?.totalSupply ?? 0n;
  }

  onReceive(account: Address, listener: TransferListener) {
    this.listeners.set(getAddress(account), listener);
  }

  balanceOf(token: Address, account: Address): bigint {
    return this.tokens.get(getAddress(token))?.balances.get(getAddress(account)) ?? 0n;
  }

  allowance(token: Address, owner: Address, spender: Address): bigint {
    return this.tokens.get(getAddress(token))?.allowances.get(allowanceKey(owner, spender)) ?? 0n;
  }

  approve(token: Address, owner: Address, spender: Address, amount: bigint) {
    this.tokenState(token).allowances.set(allowanceKey(owner, spender), amount);
  }

  async transfer(token: Address, from: Address, to: Address, amount: bigint): Promise<void> {
    this.move(token, from, to, amount);
    await this.notify(token, from, to, amount);
  }

  async transferFrom(token: Address, spender: Address, from: Address, to: Address, amount: bigint): Promise<void> {
    const state = this.tokenState(token);
    const key = allowanceKey(from, spender);
    const allowed = state.allowances.get(key) ?? 0n;
    if (allowed < amount) {
      throw new SettlementError("InsufficientAllowance", { token, owner: from, spender, allowed, amount });
    }
    this.move(token, from, to, amount);
    state.allowances.set(key, allowed - amount);
    await this.notify(token, from, to, amount);
  }

  private move(token: Address, from: Address, to: Address, amount: bigint) {
    const state = this.tokenState(token);
    const sender = getAddress(from);
    const receiver = getAddress(to);
    const balance = state.balances.get(sender) ?? 0n;
    if (balance < amount) {
      throw new SettlementError("InsufficientBalance", { token, account: sender, balance, amount });
    }
    state.balances.set(sender, balance - amount);
    state.balances.set(receiver, (state.balances.get(receiver) ?? 0n) + amount);
  }

  private async notify(token: Address, from: Address, to: Address, amount: bigint) {
    const listener = this.listeners.get(getAddress(to));
    if (listener) await listener({ token: getAddress(token), from: getAddress(from), to: getAddress(to), amount });
  }

  private tokenState(token: Address): TokenState {
    const key = getAddress(token);
    let state = this.tokens.get(key);
    if (!state) {
      state = { balances: new Map(), allowances: new Map(), totalSupply: 0n };
      this.tokens.set(key, state);
    }
    return state;
  }
}

function allowanceKey(owner: Address, spender: Address): string {
  return `${getAddress(owner)}:${getAddress(spender)}`;
}
