import { getAddress, isAddress, isHex, type Address, type Hex } from "viem";
import { z } from "zod";
import type { SwapRequestParameters, SwapRequestReceipt } from "./types";

/** JSON replacer for payloads that carry uint256 values. */
export function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? value.toString() : value;
}

export function stringifyWire(value: unknown): string {
  return JSON.stringify(value, bigintReplacer);
}

export const uintSchema = z
  .union([z.string().regex(/^\d+$/), z.number().int().nonnegative()])
  .transform((value) => BigInt(value));

export const addressSchema = z
  .string()
  .refine((value) => isAddress(value, { strict: false }), { message: "invalid address" })
  .transform((value): Address => getAddress(value));

export const hexSchema = z.string().refine((value): value is Hex => isHex(value, { strict: true }), {
  message: "invalid hex"
});

export const bytes32Schema = hexSchema.refine((value) => value.length === 66, { message: "expected 32 bytes" });

export const hookSchema = z.object({
  target: addressSchema,
  callData: hexSchema,
  gasLimit: uintSchema
});

export const hookListSchema = z.array(hookSchema).default([]);

export const swapRequestSchema = z.object({
  sender: addressSchema,
  recipient: addressSchema,
  tokenIn: addressSchema,
  tokenOut: addressSchema,
  amountIn: uintSchema,
  amountOut: uintSchema,
  srcChainId: uintSchema,
  dstChainId: uintSchema,
  verificationFee: uintSchema,
  solverFee: uintSchema,
  nonce: uintSchema,
  executed: z.boolean(),
  requestedAt: uintSchema,
  preHooks: z.array(hookSchema),
  postHooks: z.array(hookSchema)
});

export const swapRequestReceiptSchema = z.object({
  requestId: bytes32Schema,
  srcChainId: uintSchema,
  dstChainId: uintSchema,
  sender: addressSchema,
  tokenIn: addressSchema,
  tokenOut: addressSchema,
  fulfilled: z.boolean(),
  solver: addressSchema,
  recipient: addressSchema,
  amountOut: uintSchema,
  fulfilledAt: uintSchema
});

export function parseSwapRequest(value: unknown): SwapRequestParameters {
  return swapRequestSchema.parse(value);
}

export function parseSwapRequestReceipt(value: unknown): SwapRequestReceipt {
  return swapRequestReceiptSchema.parse(value);
}
