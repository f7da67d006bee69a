import type { Address, Hex } from "viem";
import { SettlementError } from "./errors";
import type { Hook } from "./types";

export type HookCall = {
  /** The router that dispatched the batch. */
  caller: Address;
  callData: Hex;
  gasLimit: bigint;
};

/** A callable hook target; resolves with the gas it consumed. */
export type HookTarget = (call: HookCall) => Promise<bigint> | bigint;

/** Executes an ordered batch of calls; any failure aborts the whole batch. */
export interface HookGateway {
  execute(caller: Address, hooks: readonly Hook[]): Promise<void>;
}

export class InProcessHookGateway implements HookGateway {
  private readonly targets = new Map<string, HookTarget>();

  registerTarget(address: Address, target: HookTarget) {
    this.targets.set(address.toLowerCase(), target);
  }

  async execute(caller: Address, hooks: readonly Hook[]): Promise<void> {
    for (const [index, hook] of hooks.entries()) {
      const target = this.targets.get(hook.target.toLowerCase());
      if (!target) {
        throw new SettlementError("HookExecutionFailed", { index, target: hook.target, reason: "no_code" });
      }

      let gasUsed: bigint;
      try {
        gasUsed = await target({ caller, callData: hook.callData, gasLimit: hook.gasLimit });
      } catch (error) {
        throw new SettlementError("HookExecutionFailed", {
          index,
          target: hook.target,
          reason: error instanceof Error ? error.message : String(error)
        });
      }
      if (gasUsed > hook.gasLimit) {
        throw new SettlementError("HookExecutionFailed", { index, target: hook.target, reason: "out_of_gas" });
      }
    }
  }
}
