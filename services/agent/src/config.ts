import type { Address, Hex } from "viem";
import { z } from "zod";
import { addressSchema, hexSchema } from "@relayswap/settlement";
import { DEV_INTERNAL_AUTH_SECRET, splitCsv } from "@relayswap/ledger/config";

export type LedgerEndpoint = {
  chainId: bigint;
  baseUrl: string;
};

export type AgentServiceConfig = {
  runtimeEnv: string;
  isProduction: boolean;
  port: number;
  ledgers: LedgerEndpoint[];
  solver: Address;
  committeeKeys: Hex[];
  statePath: string;
  pollIntervalMs: number;
  logPageSize: number;
  approveRelayAmount: boolean;
  retry: {
    baseDelayMs: number;
    maxDelayMs: number;
    maxAttempts: number;
  };
  internalAuth: {
    secret: string;
    serviceName: string;
  };
};

const positiveInt = z.coerce.number().int().positive();
const flag = z.enum(["0", "1"]).transform((value) => value === "1");
const privateKeySchema = hexSchema.refine((value) => value.length === 66, { message: "expected a 32-byte private key" });

// chainId=url, comma separated
const ledgerListSchema = z
  .string()
  .transform((value, ctx) => {
    const ledgers: LedgerEndpoint[] = [];
    for (const entry of splitCsv(value)) {
      const separator = entry.indexOf("=");
      const chainId = entry.slice(0, separator).trim();
      const baseUrl = entry.slice(separator + 1).trim();
      const url = z.string().url().safeParse(baseUrl);
      if (separator <= 0 || !/^[1-9]\d*$/.test(chainId) || !url.success) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid ledger endpoint ${entry}`, fatal: true });
        return z.NEVER;
      }
      ledgers.push({ chainId: BigInt(chainId), baseUrl: url.data });
    }
    return ledgers;
  })
  .refine((ledgers) => ledgers.length > 0, { message: "expected at least one ledger" })
  .refine((ledgers) => new Set(ledgers.map((ledger) => ledger.chainId)).size === ledgers.length, {
    message: "duplicate chain id"
  });

const keyListSchema = z
  .string()
  .transform((value, ctx) => {
    const keys: Hex[] = [];
    for (const entry of splitCsv(value)) {
      const parsed = privateKeySchema.safeParse(entry);
      if (!parsed.success) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: "invalid private key", fatal: true });
        return z.NEVER;
      }
      keys.push(parsed.data);
    }
    return keys;
  })
  .refine((keys) => keys.length > 0, { message: "expected at least one key" });

const envSchema = z.object({
  AGENT_ENV: z.string().optional(),
  NODE_ENV: z.string().optional(),
  AGENT_PORT: positiveInt.default(3070),
  AGENT_LEDGERS: ledgerListSchema,
  AGENT_SOLVER_ADDRESS: addressSchema,
  SWAP_COMMITTEE_PRIVATE_KEYS: keyListSchema,
  AGENT_STATE_PATH: z.string().trim().min(1).default("./data/agent-state.json"),
  AGENT_POLL_INTERVAL_MS: positiveInt.default(3_000),
  AGENT_LOG_PAGE_SIZE: positiveInt.max(1_000).default(500),
  AGENT_APPROVE_RELAY_AMOUNT: flag.default("1"),
  AGENT_RETRY_BASE_DELAY_MS: positiveInt.default(5_000),
  AGENT_RETRY_MAX_DELAY_MS: positiveInt.default(300_000),
  AGENT_RETRY_MAX_ATTEMPTS: positiveInt.default(8),
  INTERNAL_API_AUTH_SECRET: z.string().optional(),
  INTERNAL_API_SERVICE_NAME: z.string().trim().min(1).default("agent")
});

export function loadAgentConfig(env: NodeJS.ProcessEnv = process.env): AgentServiceConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid agent configuration: ${issues.join("; ")}`);
  }
  const vars = parsed.data;
  const runtimeEnv = (vars.AGENT_ENV ?? vars.NODE_ENV ?? "development").toLowerCase();
  const isProduction = runtimeEnv === "production";

  return {
    runtimeEnv,
    isProduction,
    port: vars.AGENT_PORT,
    ledgers: vars.AGENT_LEDGERS,
    solver: vars.AGENT_SOLVER_ADDRESS,
    committeeKeys: vars.SWAP_COMMITTEE_PRIVATE_KEYS,
    statePath: vars.AGENT_STATE_PATH,
    pollIntervalMs: vars.AGENT_POLL_INTERVAL_MS,
    logPageSize: vars.AGENT_LOG_PAGE_SIZE,
    approveRelayAmount: vars.AGENT_APPROVE_RELAY_AMOUNT,
    retry: {
      baseDelayMs: vars.AGENT_RETRY_BASE_DELAY_MS,
      maxDelayMs: vars.AGENT_RETRY_MAX_DELAY_MS,
      maxAttempts: vars.AGENT_RETRY_MAX_ATTEMPTS
    },
    internalAuth: {
      secret: vars.INTERNAL_API_AUTH_SECRET ?? (isProduction ? "" : DEV_INTERNAL_AUTH_SECRET),
      serviceName: vars.INTERNAL_API_SERVICE_NAME
    }
  };
}

export function validateStartupConfig(config: AgentServiceConfig) {
  if (!config.internalAuth.secret) {
    throw new Error("Missing INTERNAL_API_AUTH_SECRET");
  }
  if (config.isProduction && config.internalAuth.secret === DEV_INTERNAL_AUTH_SECRET) {
    throw new Error("INTERNAL_API_AUTH_SECRET cannot use dev default in production");
  }
  if (config.retry.baseDelayMs > config.retry.maxDelayMs) {
    throw new Error("AGENT_RETRY_BASE_DELAY_MS exceeds AGENT_RETRY_MAX_DELAY_MS");
  }
}
