import { getAddress, isAddressEqual, zeroAddress, type Address, type Hex } from "viem";
import type { ContractRegistry } from "./chain";
import { SettlementError } from "./errors";
import {
  encodeGovernanceParameterMessage,
  encodeUpgradeMessage,
  encodeValidatorUpdateMessage,
  type GovernanceScope
} from "./hashing";
import { resolveVerifier, type RouterContext, type SwapRouterLogic } from "./router";
import { MIN_CANCELLATION_WINDOW, MIN_UPGRADE_DELAY } from "./store";
import type { GovernanceParameter, ScheduledUpgrade, ValidatorKind } from "./types";

export type GovernanceContext = RouterContext & {
  implementations: ContractRegistry<SwapRouterLogic>;
};

/**
 * Signature-gated governance: scheduled code replacement plus the parameters that protect it.
 * Every accepted signature must cover `currentNonce + 1`; each accepted action consumes it.
 */
export class ScheduledUpgradeController {
  scope(ctx: RouterContext): GovernanceScope {
    return { chainId: ctx.chainId, router: ctx.address, nonce: ctx.store.state.governanceNonce + 1n };
  }

  async scheduleUpgrade(
    ctx: GovernanceContext,
    newImplementation: Address,
    calldata: Hex,
    upgradeTime: bigint,
    signature: Hex
  ): Promise<void> {
    const state = ctx.store.state;
    const candidate = ctx.implementations.resolve(newImplementation);
    if (!candidate) throw new SettlementError("UnknownImplementation", { implementation: newImplementation });

    const versions = [this.versionAt(ctx, state.implementation)];
    if (state.scheduledUpgrade) versions.push(this.versionAt(ctx, state.scheduledUpgrade.implementation));
    if (versions.includes(candidate.version)) {
      throw new SettlementError("SameVersionUpgradeNotAllowed", { version: candidate.version });
    }

    const earliest = ctx.now + state.minimumUpgradeDelay;
    if (upgradeTime < earliest) {
      throw new SettlementError("UpgradeTimeMustRespectDelay", { minimumDelay: state.minimumUpgradeDelay, earliest });
    }

    const pending = state.scheduledUpgrade?.implementation ?? zeroAddress;
    const message = encodeUpgradeMessage(this.scope(ctx), "schedule", pending, newImplementation, calldata, upgradeTime);
    await this.authorize(ctx, message, signature);

    state.scheduledUpgrade = { implementation: getAddress(newImplementation), calldata, upgradeTime };
    ctx.emit({ type: "UpgradeScheduled", implementation: getAddress(newImplementation), upgradeTime });
  }

  async cancelUpgrade(ctx: GovernanceContext, signature: Hex): Promise<void> {
    const state = ctx.store.state;
    const scheduled = state.scheduledUpgrade;
    if (!scheduled) throw new SettlementError("NoUpgradePending");
    if (ctx.now >= scheduled.upgradeTime) {
      throw new SettlementError("TooLateToCancelUpgrade", { upgradeTime: scheduled.upgradeTime });
    }

    const message = encodeUpgradeMessage(
      this.scope(ctx),
      "cancel",
      scheduled.implementation,
      scheduled.implementation,
      scheduled.calldata,
      scheduled.upgradeTime
    );
    await this.authorize(ctx, message, signature);

    state.scheduledUpgrade = null;
    ctx.emit({ type: "UpgradeCancelled", implementation: scheduled.implementation });
  }

  /** Swaps the implementation pointer; the caller runs the new code's initializer. */
  executeUpgrade(ctx: GovernanceContext): ScheduledUpgrade {
    const state = ctx.store.state;
    const scheduled = state.scheduledUpgrade;
    if (!scheduled) throw new SettlementError("NoUpgradePending");
    if (ctx.now < scheduled.upgradeTime) {
      throw new SettlementError("UpgradeTooEarly", { upgradeTime: scheduled.upgradeTime });
    }
    if (!ctx.implementations.has(scheduled.implementation)) {
      throw new SettlementError("UnknownImplementation", { implementation: scheduled.implementation });
    }

    state.scheduledUpgrade = null;
    state.implementation = scheduled.implementation;
    return scheduled;
  }

  async setValidator(ctx: GovernanceContext, kind: ValidatorKind, validator: Address, signature: Hex): Promise<void> {
    if (isAddressEqual(validator, zeroAddress)) throw new SettlementError("ZeroAddress", { field: "validator" });
    if (!ctx.verifiers.has(validator)) throw new SettlementError("UnknownValidator", { validator });

    await this.authorize(ctx, encodeValidatorUpdateMessage(this.scope(ctx), kind, validator), signature);

    const state = ctx.store.state;
    if (kind === "swap_request") {
      state.swapRequestValidator = getAddress(validator);
    } else {
      state.contractUpgradeValidator = getAddress(validator);
    }
    ctx.emit({ type: "ValidatorUpdated", kind, validator: getAddress(validator) });
  }

  async setParameter(ctx: GovernanceContext, parameter: GovernanceParameter, value: bigint, signature: Hex): Promise<void> {
    if (parameter === "upgrade_delay" && value < MIN_UPGRADE_DELAY) {
      throw new SettlementError("UpgradeDelayTooShort", { value, minimum: MIN_UPGRADE_DELAY });
    }
    if (parameter === "cancellation_window" && value < MIN_CANCELLATION_WINDOW) {
      throw new SettlementError("SwapRequestCancellationWindowTooShort", { value, minimum: MIN_CANCELLATION_WINDOW });
    }

    await this.authorize(ctx, encodeGovernanceParameterMessage(this.scope(ctx), parameter, value), signature);

    const state = ctx.store.state;
    if (parameter === "upgrade_delay") {
      state.minimumUpgradeDelay = value;
    } else {
      state.cancellationWindow = value;
    }
    ctx.emit({ type: "GovernanceParameterUpdated", parameter, value });
  }

  private versionAt(ctx: GovernanceContext, implementation: Address): string | undefined {
    return ctx.implementations.resolve(implementation)?.version;
  }

  private async authorize(ctx: RouterContext, message: Hex, signature: Hex) {
    const verifier = resolveVerifier(ctx, ctx.store.state.contractUpgradeValidator);
    if (!(await verifier.verify(message, signature))) {
      throw new SettlementError("SignatureVerificationFailed", { nonce: ctx.store.state.governanceNonce + 1n });
    }
    ctx.store.state.governanceNonce += 1n;
  }
}
