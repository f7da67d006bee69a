import { addressSchema } from "@relayswap/settlement";
import type { Address } from "viem";
import { z } from "zod";

export const DEV_INTERNAL_AUTH_SECRET = "dev-internal-auth-secret";

export type TokenMappingConfig = {
  srcToken: Address;
  dstChainId: bigint;
  dstToken: Address;
};

export type LedgerServiceConfig = {
  runtimeEnv: string;
  isProduction: boolean;
  port: number;
  chainId: bigint;
  owner: Address;
  verificationFeeBps: bigint;
  version: string;
  swapCommittee: { members: Address[]; threshold: number };
  upgradeCommittee: { members: Address[]; threshold: number };
  peerChainIds: bigint[];
  tokenMappings: TokenMappingConfig[];
  faucetEnabled: boolean;
  corsAllowOrigin: string;
  internalAuth: {
    secret: string;
    previousSecret: string;
    allowedServices: Set<string>;
    allowedIps: Set<string>;
    requirePrivateIp: boolean;
    trustProxy: boolean;
    maxSkewMs: number;
  };
  rateLimits: {
    publicWindowMs: number;
    publicMaxRequests: number;
    internalWindowMs: number;
    internalMaxRequests: number;
  };
};

const flag = z.enum(["0", "1"]).transform((value) => value === "1");
const chainIdSchema = z.string().trim().regex(/^[1-9]\d*$/, "expected a positive integer").transform(BigInt);
const positiveInt = z.coerce.number().int().positive();

const addressListSchema = z
  .string()
  .transform((value, ctx) => {
    const members: Address[] = [];
    for (const entry of splitCsv(value)) {
      const parsed = addressSchema.safeParse(entry);
      if (!parsed.success) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid address ${entry}`, fatal: true });
        return z.NEVER;
      }
      members.push(parsed.data);
    }
    return members;
  })
  .refine((members) => members.length > 0, { message: "expected at least one address" });

const chainIdListSchema = z.string().transform((value, ctx) => {
  const ids: bigint[] = [];
  for (const entry of splitCsv(value)) {
    const parsed = chainIdSchema.safeParse(entry);
    if (!parsed.success) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid chain id ${entry}`, fatal: true });
      return z.NEVER;
    }
    ids.push(parsed.data);
  }
  return ids;
});

// srcToken:dstChainId:dstToken, comma separated
const tokenMappingListSchema = z.string().transform((value, ctx) => {
  const mappings: TokenMappingConfig[] = [];
  for (const entry of splitCsv(value)) {
    const [srcToken, dstChainId, dstToken, ...rest] = entry.split(":");
    const parsed = z
      .object({ srcToken: addressSchema, dstChainId: chainIdSchema, dstToken: addressSchema })
      .safeParse({ srcToken, dstChainId, dstToken });
    if (!parsed.success || rest.length > 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid token mapping ${entry}`, fatal: true });
      return z.NEVER;
    }
    mappings.push(parsed.data);
  }
  return mappings;
});

const envSchema = z.object({
  LEDGER_ENV: z.string().optional(),
  NODE_ENV: z.string().optional(),
  LEDGER_PORT: positiveInt.default(3060),
  LEDGER_CHAIN_ID: chainIdSchema,
  LEDGER_OWNER: addressSchema,
  LEDGER_VERIFICATION_FEE_BPS: z.string().regex(/^\d+$/).transform(BigInt).default("500"),
  LEDGER_VERSION: z.string().trim().min(1).default("1.0.0"),
  SWAP_COMMITTEE_MEMBERS: addressListSchema,
  SWAP_COMMITTEE_THRESHOLD: positiveInt,
  UPGRADE_COMMITTEE_MEMBERS: addressListSchema,
  UPGRADE_COMMITTEE_THRESHOLD: positiveInt,
  LEDGER_PEER_CHAIN_IDS: chainIdListSchema.default(""),
  LEDGER_TOKEN_MAPPINGS: tokenMappingListSchema.default(""),
  LEDGER_FAUCET_ENABLED: flag.optional(),
  CORS_ALLOW_ORIGIN: z.string().default("*"),
  INTERNAL_API_AUTH_SECRET: z.string().optional(),
  INTERNAL_API_AUTH_PREVIOUS_SECRET: z.string().default(""),
  INTERNAL_API_ALLOWED_SERVICES: z.string().default("agent,e2e"),
  INTERNAL_API_ALLOWED_IPS: z.string().default(""),
  INTERNAL_API_REQUIRE_PRIVATE_IP: flag.optional(),
  INTERNAL_API_TRUST_PROXY: flag.default("0"),
  INTERNAL_API_AUTH_MAX_SKEW_MS: positiveInt.default(60_000),
  API_RATE_WINDOW_MS: positiveInt.default(60_000),
  API_RATE_MAX_REQUESTS: positiveInt.default(1_200),
  INTERNAL_API_RATE_WINDOW_MS: positiveInt.default(60_000),
  INTERNAL_API_RATE_MAX_REQUESTS: positiveInt.default(2_400)
});

export function loadLedgerConfig(env: NodeJS.ProcessEnv = process.env): LedgerServiceConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid ledger configuration: ${issues.join("; ")}`);
  }
  const vars = parsed.data;
  const runtimeEnv = (vars.LEDGER_ENV ?? vars.NODE_ENV ?? "development").toLowerCase();
  const isProduction = runtimeEnv === "production";

  return {
    runtimeEnv,
    isProduction,
    port: vars.LEDGER_PORT,
    chainId: vars.LEDGER_CHAIN_ID,
    owner: vars.LEDGER_OWNER,
    verificationFeeBps: vars.LEDGER_VERIFICATION_FEE_BPS,
    version: vars.LEDGER_VERSION,
    swapCommittee: { members: vars.SWAP_COMMITTEE_MEMBERS, threshold: vars.SWAP_COMMITTEE_THRESHOLD },
    upgradeCommittee: { members: vars.UPGRADE_COMMITTEE_MEMBERS, threshold: vars.UPGRADE_COMMITTEE_THRESHOLD },
    peerChainIds: vars.LEDGER_PEER_CHAIN_IDS,
    tokenMappings: vars.LEDGER_TOKEN_MAPPINGS,
    faucetEnabled: vars.LEDGER_FAUCET_ENABLED ?? !isProduction,
    corsAllowOrigin: vars.CORS_ALLOW_ORIGIN,
    internalAuth: {
      secret: vars.INTERNAL_API_AUTH_SECRET ?? (isProduction ? "" : DEV_INTERNAL_AUTH_SECRET),
      previousSecret: vars.INTERNAL_API_AUTH_PREVIOUS_SECRET.trim(),
      allowedServices: new Set(splitCsv(vars.INTERNAL_API_ALLOWED_SERVICES)),
      allowedIps: new Set(splitCsv(vars.INTERNAL_API_ALLOWED_IPS)),
      requirePrivateIp: vars.INTERNAL_API_REQUIRE_PRIVATE_IP ?? isProduction,
      trustProxy: vars.INTERNAL_API_TRUST_PROXY,
      maxSkewMs: vars.INTERNAL_API_AUTH_MAX_SKEW_MS
    },
    rateLimits: {
      publicWindowMs: vars.API_RATE_WINDOW_MS,
      publicMaxRequests: vars.API_RATE_MAX_REQUESTS,
      internalWindowMs: vars.INTERNAL_API_RATE_WINDOW_MS,
      internalMaxRequests: vars.INTERNAL_API_RATE_MAX_REQUESTS
    }
  };
}

export function validateStartupConfig(config: LedgerServiceConfig) {
  const { internalAuth } = config;
  if (!internalAuth.secret) {
    throw new Error("Missing INTERNAL_API_AUTH_SECRET");
  }
  if (config.isProduction && internalAuth.secret === DEV_INTERNAL_AUTH_SECRET) {
    throw new Error("INTERNAL_API_AUTH_SECRET cannot use dev default in production");
  }
  if (config.isProduction && config.corsAllowOrigin.trim() === "*") {
    throw new Error("CORS_ALLOW_ORIGIN cannot be '*' in production");
  }
  if (config.isProduction && !internalAuth.requirePrivateIp && internalAuth.allowedIps.size === 0) {
    throw new Error("Set INTERNAL_API_REQUIRE_PRIVATE_IP=1 or configure INTERNAL_API_ALLOWED_IPS in production");
  }
  if (config.isProduction && config.faucetEnabled) {
    throw new Error("LEDGER_FAUCET_ENABLED cannot be set in production");
  }
  for (const [name, committee] of [
    ["SWAP_COMMITTEE", config.swapCommittee],
    ["UPGRADE_COMMITTEE", config.upgradeCommittee]
  ] as const) {
    if (committee.threshold > committee.members.length) {
      throw new Error(`${name}_THRESHOLD exceeds the number of ${name}_MEMBERS`);
    }
  }
  for (const mapping of config.tokenMappings) {
    if (!config.peerChainIds.includes(mapping.dstChainId)) {
      throw new Error(`LEDGER_TOKEN_MAPPINGS names chain ${mapping.dstChainId.toString()} missing from LEDGER_PEER_CHAIN_IDS`);
    }
  }
}

export function splitCsv(value: string): string[] {
  return value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}
