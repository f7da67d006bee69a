import {
  addressSchema,
  bytes32Schema,
  hexSchema,
  hookListSchema,
  isSettlementError,
  uintSchema,
  type LedgerDeployment,
  type RouterProxy,
  type SettlementErrorCategory
} from "@relayswap/settlement";
import { z } from "zod";

export type OperationResult =
  | { ok: true; result: Record<string, unknown> }
  | { ok: false; status: number; body: Record<string, unknown> };

type OperationRunner = (ledger: LedgerDeployment, body: unknown) => Promise<OperationResult>;

const categoryStatus: Record<SettlementErrorCategory, number> = {
  validation: 400,
  authorization: 403,
  state_conflict: 409,
  external: 502
};

function operation<S extends z.ZodTypeAny>(
  schema: S,
  run: (router: RouterProxy, input: z.output<S>, ledger: LedgerDeployment) => Promise<Record<string, unknown> | void>
): OperationRunner {
  return async (ledger, body) => {
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      return { ok: false, status: 400, body: { error: "invalid_payload", issues: parsed.error.flatten() } };
    }
    const result = await run(ledger.router, parsed.data, ledger);
    return { ok: true, result: typeof result === "object" ? result : {} };
  };
}

const callerField = { caller: addressSchema };
const permitSchema = z.object({ nonce: uintSchema, deadline: uintSchema, signature: hexSchema });

const swapFields = {
  tokenIn: addressSchema,
  tokenOut: addressSchema,
  amountIn: uintSchema,
  amountOut: uintSchema,
  solverFee: uintSchema,
  dstChainId: uintSchema,
  recipient: addressSchema,
  preHooks: hookListSchema,
  postHooks: hookListSchema
};

const relayFields = {
  solverRefundAddress: addressSchema,
  requestId: bytes32Schema,
  sender: addressSchema,
  recipient: addressSchema,
  tokenIn: addressSchema,
  tokenOut: addressSchema,
  amountOut: uintSchema,
  srcChainId: uintSchema,
  nonce: uintSchema,
  preHooks: hookListSchema,
  postHooks: hookListSchema
};

const tokenMappingSchema = z.object({
  ...callerField,
  dstChainId: uintSchema,
  dstToken: addressSchema,
  srcToken: addressSchema
});

/** Every mutating operation reachable over `POST /internal/tx/:operation`. */
export const ledgerOperations: Record<string, OperationRunner> = {
  // spender defaults to the router
  approve: operation(
    z.object({ ...callerField, token: addressSchema, spender: addressSchema.optional(), amount: uintSchema }),
    async (router, input, { chain, tokens }) => {
      const spender = input.spender ?? router.address;
      await chain.transact(() => tokens.approve(input.token, input.caller, spender, input.amount));
      return { allowance: tokens.allowance(input.token, input.caller, spender) };
    }
  ),

  requestCrossChainSwap: operation(z.object({ ...callerField, ...swapFields }), async (router, { caller, ...input }) => ({
    requestId: await router.requestCrossChainSwap(caller, input)
  })),

  requestCrossChainSwapPermit2: operation(
    z.object({ ...callerField, ...swapFields, requester: addressSchema, additionalData: hexSchema.optional(), permit: permitSchema }),
    async (router, { caller, ...input }) => ({ requestId: await router.requestCrossChainSwapPermit2(caller, input) })
  ),

  updateSolverFeesIfUnfulfilled: operation(
    z.object({ ...callerField, requestId: bytes32Schema, newFee: uintSchema }),
    async (router, input) => {
      await router.updateSolverFeesIfUnfulfilled(input.caller, input.requestId, input.newFee);
    }
  ),

  relayTokens: operation(z.object({ ...callerField, ...relayFields }), async (router, { caller, ...input }) => {
    await router.relayTokens(caller, input);
  }),

  relayTokensPermit2: operation(
    z.object({ ...callerField, ...relayFields, solver: addressSchema, permit: permitSchema }),
    async (router, { caller, ...input }) => {
      await router.relayTokensPermit2(caller, input);
    }
  ),

  rebalanceSolver: operation(
    z.object({ ...callerField, solver: addressSchema, requestId: bytes32Schema, signature: hexSchema }),
    async (router, input) => {
      await router.rebalanceSolver(input.caller, input.solver, input.requestId, input.signature);
    }
  ),

  stageSwapRequestCancellation: operation(z.object({ ...callerField, requestId: bytes32Schema }), async (router, input) => {
    await router.stageSwapRequestCancellation(input.caller, input.requestId);
  }),

  cancelSwapRequestAndRefund: operation(
    z.object({ ...callerField, requestId: bytes32Schema, refundRecipient: addressSchema }),
    async (router, input) => {
      await router.cancelSwapRequestAndRefund(input.caller, input.requestId, input.refundRecipient);
    }
  ),

  setVerificationFeeBps: operation(z.object({ ...callerField, feeBps: uintSchema }), async (router, input) => {
    await router.setVerificationFeeBps(input.caller, input.feeBps);
  }),

  permitDestinationChainId: operation(z.object({ ...callerField, chainId: uintSchema }), async (router, input) => {
    await router.permitDestinationChainId(input.caller, input.chainId);
  }),

  blockDestinationChainId: operation(z.object({ ...callerField, chainId: uintSchema }), async (router, input) => {
    await router.blockDestinationChainId(input.caller, input.chainId);
  }),

  setTokenMapping: operation(tokenMappingSchema, async (router, input) => {
    await router.setTokenMapping(input.caller, input.dstChainId, input.dstToken, input.srcToken);
  }),

  removeTokenMapping: operation(tokenMappingSchema, async (router, input) => {
    await router.removeTokenMapping(input.caller, input.dstChainId, input.dstToken, input.srcToken);
  }),

  withdrawVerificationFee: operation(
    z.object({ ...callerField, token: addressSchema, to: addressSchema }),
    async (router, input) => ({ amount: await router.withdrawVerificationFee(input.caller, input.token, input.to) })
  ),

  setHookGateway: operation(z.object({ ...callerField, gateway: addressSchema }), async (router, input) => {
    await router.setHookGateway(input.caller, input.gateway);
  }),

  setPermitRelay: operation(z.object({ ...callerField, relay: addressSchema }), async (router, input) => {
    await router.setPermitRelay(input.caller, input.relay);
  }),

  grantAdmin: operation(z.object({ ...callerField, account: addressSchema }), async (router, input) => {
    await router.grantAdmin(input.caller, input.account);
  }),

  revokeAdmin: operation(z.object({ ...callerField, account: addressSchema }), async (router, input) => {
    await router.revokeAdmin(input.caller, input.account);
  }),

  scheduleUpgrade: operation(
    z.object({ newImplementation: addressSchema, calldata: hexSchema, upgradeTime: uintSchema, signature: hexSchema }),
    async (router, input) => {
      await router.scheduleUpgrade(input.newImplementation, input.calldata, input.upgradeTime, input.signature);
    }
  ),

  cancelUpgrade: operation(z.object({ signature: hexSchema }), async (router, input) => {
    await router.cancelUpgrade(input.signature);
  }),

  executeUpgrade: operation(z.object({}), async (router) => {
    await router.executeUpgrade();
    return { version: router.getVersion() };
  }),

  setSwapRequestValidator: operation(
    z.object({ validator: addressSchema, signature: hexSchema }),
    async (router, input) => {
      await router.setSwapRequestValidator(input.validator, input.signature);
    }
  ),

  setContractUpgradeValidator: operation(
    z.object({ validator: addressSchema, signature: hexSchema }),
    async (router, input) => {
      await router.setContractUpgradeValidator(input.validator, input.signature);
    }
  ),

  setMinimumContractUpgradeDelay: operation(
    z.object({ delay: uintSchema, signature: hexSchema }),
    async (router, input) => {
      await router.setMinimumContractUpgradeDelay(input.delay, input.signature);
    }
  ),

  setCancellationWindow: operation(z.object({ window: uintSchema, signature: hexSchema }), async (router, input) => {
    await router.setCancellationWindow(input.window, input.signature);
  })
};

/**
 * Runs one named operation. Settlement errors become an HTTP status by category; anything
 * else propagates to the caller.
 */
export async function executeOperation(ledger: LedgerDeployment, name: string, body: unknown): Promise<OperationResult> {
  const runner = Object.prototype.hasOwnProperty.call(ledgerOperations, name) ? ledgerOperations[name] : undefined;
  if (!runner) {
    return { ok: false, status: 404, body: { error: "unknown_operation", operation: name } };
  }
  try {
    return await runner(ledger, body);
  } catch (error) {
    if (!isSettlementError(error)) throw error;
    return {
      ok: false,
      status: categoryStatus[error.category],
      body: { error: error.code, category: error.category, message: error.message, details: error.details }
    };
  }
}
