import type { Address, Hex } from "viem";
import { z } from "zod";
import {
  SettlementError,
  isSettlementErrorCode,
  parseSwapRequest,
  parseSwapRequestReceipt,
  stringifyWire,
  type LedgerDeployment,
  type RelayTokensInput,
  type SwapRequestParameters,
  type SwapRequestReceipt
} from "@relayswap/settlement";
import { signInternalRequest } from "@relayswap/ledger/internal-auth";

export type LogPage = {
  entries: unknown[];
  nextIndex: bigint;
};

/** What the agent needs from one ledger, whether it runs in this process or behind its HTTP API. */
export interface LedgerClient {
  readonly chainId: bigint;
  getLogs(fromIndex: bigint, limit: number): Promise<LogPage>;
  getSwapRequest(requestId: Hex): Promise<SwapRequestParameters | undefined>;
  getSwapRequestReceipt(requestId: Hex): Promise<SwapRequestReceipt | undefined>;
  /** Sets the router's allowance over `caller`'s `token` on this ledger. */
  approveRouter(caller: Address, token: Address, amount: bigint): Promise<void>;
  relayTokens(caller: Address, input: RelayTokensInput): Promise<void>;
  rebalanceSolver(caller: Address, solver: Address, requestId: Hex, signature: Hex): Promise<void>;
}

export class InProcessLedgerClient implements LedgerClient {
  readonly chainId: bigint;

  constructor(private readonly deployment: LedgerDeployment) {
    this.chainId = deployment.chain.chainId;
  }

  async getLogs(fromIndex: bigint, limit: number): Promise<LogPage> {
    const entries = this.deployment.chain.getLogs(Number(fromIndex), limit);
    return { entries, nextIndex: fromIndex + BigInt(entries.length) };
  }

  async getSwapRequest(requestId: Hex): Promise<SwapRequestParameters | undefined> {
    return this.deployment.router.getSwapRequestParameters(requestId);
  }

  async getSwapRequestReceipt(requestId: Hex): Promise<SwapRequestReceipt | undefined> {
    return this.deployment.router.getSwapRequestReceipt(requestId);
  }

  async approveRouter(caller: Address, token: Address, amount: bigint): Promise<void> {
    const { chain, tokens, router } = this.deployment;
    await chain.transact(() => tokens.approve(token, caller, router.address, amount));
  }

  async relayTokens(caller: Address, input: RelayTokensInput): Promise<void> {
    await this.deployment.router.relayTokens(caller, input);
  }

  async rebalanceSolver(caller: Address, solver: Address, requestId: Hex, signature: Hex): Promise<void> {
    await this.deployment.router.rebalanceSolver(caller, solver, requestId, signature);
  }
}

export type InternalCredentials = {
  secret: string;
  serviceName: string;
};

const logPageSchema = z.object({
  entries: z.array(z.unknown()),
  nextIndex: z.union([z.number().int().nonnegative(), z.string().regex(/^\d+$/)]).transform((value) => BigInt(value))
});

const errorBodySchema = z.object({
  error: z.unknown(),
  message: z.string().optional(),
  details: z.record(z.unknown()).optional()
});

const REQUEST_TIMEOUT_MS = 10_000;

/** Talks to a ledger service. Mutations go through its signed internal routes. */
export class HttpLedgerClient implements LedgerClient {
  constructor(
    private readonly baseUrl: string,
    readonly chainId: bigint,
    private readonly credentials: InternalCredentials,
    private readonly fetchImpl: typeof fetch = fetch
  ) {}

  async getLogs(fromIndex: bigint, limit: number): Promise<LogPage> {
    const query = new URLSearchParams({ fromIndex: fromIndex.toString(), limit: String(limit) });
    const body = await this.get(`/logs?${query.toString()}`);
    return logPageSchema.parse(body);
  }

  async getSwapRequest(requestId: Hex): Promise<SwapRequestParameters | undefined> {
    const body = await this.get(`/requests/${requestId}`, { allowNotFound: true });
    return body === undefined ? undefined : parseSwapRequest(body);
  }

  async getSwapRequestReceipt(requestId: Hex): Promise<SwapRequestReceipt | undefined> {
    const body = await this.get(`/receipts/${requestId}`, { allowNotFound: true });
    return body === undefined ? undefined : parseSwapRequestReceipt(body);
  }

  async approveRouter(caller: Address, token: Address, amount: bigint): Promise<void> {
    await this.postInternal("/internal/tx/approve", { caller, token, amount });
  }

  async relayTokens(caller: Address, input: RelayTokensInput): Promise<void> {
    await this.postInternal("/internal/tx/relayTokens", { caller, ...input });
  }

  async rebalanceSolver(caller: Address, solver: Address, requestId: Hex, signature: Hex): Promise<void> {
    await this.postInternal("/internal/tx/rebalanceSolver", { caller, solver, requestId, signature });
  }

  private async get(routePath: string, options?: { allowNotFound?: boolean }): Promise<unknown> {
    const res = await this.send(routePath, { method: "GET" });
    if (res.status === 404 && options?.allowNotFound) return undefined;
    if (!res.ok) throw await responseError(routePath, res);
    return await res.json();
  }

  private async postInternal(routePath: string, body: Record<string, unknown>): Promise<unknown> {
    const rawBody = stringifyWire(body);
    const headers = signInternalRequest({
      secret: this.credentials.secret,
      callerService: this.credentials.serviceName,
      method: "POST",
      routePath,
      rawBody
    });
    const res = await this.send(routePath, {
      method: "POST",
      headers: { "content-type": "application/json", ...headers },
      body: rawBody
    });
    if (!res.ok) throw await responseError(routePath, res);
    const contentType = res.headers.get("content-type") ?? "";
    if (contentType.includes("application/json")) {
      return await res.json();
    }
    return undefined;
  }

  private async send(routePath: string, init: RequestInit): Promise<Response> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), REQUEST_TIMEOUT_MS);
    try {
      return await this.fetchImpl(new URL(routePath, this.baseUrl).toString(), { ...init, signal: controller.signal });
    } finally {
      clearTimeout(timeout);
    }
  }
}

/** Rebuilds a SettlementError from the ledger's error body so callers can branch on its category. */
async function responseError(routePath: string, res: Response): Promise<Error> {
  const text = await res.text();
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    parsed = undefined;
  }
  const body = errorBodySchema.safeParse(parsed);
  if (body.success && typeof body.data.error === "string" && isSettlementErrorCode(body.data.error)) {
    return new SettlementError(body.data.error, body.data.details ?? {}, body.data.message);
  }
  return new Error(`Failed ledger call ${routePath}: ${res.status} ${text}`);
}
