import { randomUUID } from "node:crypto";
import express from "express";
import type { Hex } from "viem";
import { z } from "zod";
import {
  addressSchema,
  bigintReplacer,
  bytes32Schema,
  isSettlementError,
  uintSchema,
  type LedgerDeployment
} from "@relayswap/settlement";
import { bootstrapLedger } from "./bootstrap";
import { DEV_INTERNAL_AUTH_SECRET, loadLedgerConfig, validateStartupConfig } from "./config";
import {
  INTERNAL_SERVICE_HEADER,
  INTERNAL_SIG_HEADER,
  INTERNAL_TS_HEADER,
  InternalAuthVerifier,
  internalNetworkRejection,
  normalizeIp
} from "./internal-auth";
import { executeOperation } from "./operations";

type RequestWithMeta = express.Request & { rawBody?: string; requestId?: string };

const config = loadLedgerConfig();
validateStartupConfig(config);

const deployment: LedgerDeployment = await bootstrapLedger(config);
const router = deployment.router;
const authVerifier = new InternalAuthVerifier({
  secret: config.internalAuth.secret,
  previousSecret: config.internalAuth.previousSecret,
  allowedServices: config.internalAuth.allowedServices,
  maxSkewMs: config.internalAuth.maxSkewMs
});
const rateBuckets = new Map<string, { count: number; resetAt: number }>();

if (!config.isProduction && config.internalAuth.secret === DEV_INTERNAL_AUTH_SECRET) {
  console.warn("Ledger is using default INTERNAL_API_AUTH_SECRET. Override it before production.");
}
if (config.internalAuth.previousSecret.length > 0) {
  console.log("Ledger internal auth previous secret enabled for key rotation.");
}

const logsQuerySchema = z.object({
  fromIndex: z.coerce.number().int().nonnegative().default(0),
  limit: z.coerce.number().int().positive().max(1_000).default(500)
});

const faucetSchema = z.object({
  token: addressSchema,
  to: addressSchema,
  amount: uintSchema
});

const app = express();
app.set("trust proxy", config.internalAuth.trustProxy);
app.set("json replacer", bigintReplacer);
app.use(
  express.json({
    limit: "1mb",
    verify: (req, _res, buf) => {
      (req as RequestWithMeta).rawBody = buf.toString("utf8");
    }
  })
);
app.use((req, res, next) => {
  const requestId = req.header("x-request-id")?.trim() || randomUUID();
  (req as RequestWithMeta).requestId = requestId;
  res.setHeader("x-request-id", requestId);
  next();
});
app.use((req, res, next) => {
  res.setHeader("Access-Control-Allow-Origin", config.corsAllowOrigin);
  res.setHeader("Access-Control-Allow-Methods", "GET,POST,OPTIONS");
  res.setHeader(
    "Access-Control-Allow-Headers",
    ["content-type", "x-request-id", INTERNAL_TS_HEADER, INTERNAL_SIG_HEADER, INTERNAL_SERVICE_HEADER].join(",")
  );
  if (req.method === "OPTIONS") {
    res.status(204).end();
    return;
  }
  next();
});

app.use(rateLimitMiddleware);
app.use("/internal", requireInternalNetwork, requireInternalAuth);

app.get("/health", (_req, res) => {
  res.json({ ok: true, chainId: router.getChainId(), version: router.getVersion(), logCount: deployment.chain.getLogCount() });
});

app.get("/router", (_req, res) => {
  res.json({
    address: router.address,
    chainId: router.getChainId(),
    version: router.getVersion(),
    addresses: deployment.addresses,
    verificationFeeBps: router.getVerificationFeeBps(),
    allowedDstChainIds: router.getAllowedDstChainIds(),
    swapRequestNonce: router.currentSwapRequestNonce()
  });
});

app.get("/logs", (req, res) => {
  const parsed = logsQuerySchema.safeParse(req.query);
  if (!parsed.success) {
    res.status(400).json({ error: parsed.error.flatten() });
    return;
  }
  const entries = deployment.chain.getLogs(parsed.data.fromIndex, parsed.data.limit);
  res.json({ entries, nextIndex: parsed.data.fromIndex + entries.length });
});

app.get("/requests/:requestId", (req, res) => {
  respondWithQuery(req as RequestWithMeta, res, (requestId) => router.getSwapRequestParameters(requestId));
});

app.get("/receipts/:requestId", (req, res) => {
  respondWithQuery(req as RequestWithMeta, res, (requestId) => router.getSwapRequestReceipt(requestId));
});

app.get("/requests/:requestId/message", (req, res) => {
  const solver = addressSchema.safeParse(req.query.solver);
  if (!solver.success) {
    res.status(400).json({ error: "invalid_solver" });
    return;
  }
  respondWithQuery(req as RequestWithMeta, res, (requestId) => ({
    message: router.swapRequestParametersToBytes(requestId, solver.data)
  }));
});

app.get("/fees/:token", (req, res) => {
  const token = addressSchema.safeParse(req.params.token);
  if (!token.success) {
    res.status(400).json({ error: "invalid_token" });
    return;
  }
  res.json({
    token: token.data,
    verificationFeeBps: router.getVerificationFeeBps(),
    balance: router.getTotalVerificationFeeBalance(token.data)
  });
});

app.get("/sets", (_req, res) => {
  res.json({
    unfulfilledSolverRefunds: router.getUnfulfilledSolverRefunds(),
    fulfilledSolverRefunds: router.getFulfilledSolverRefunds(),
    cancelledSwapRequests: router.getCancelledSwapRequests(),
    fulfilledTransfers: router.getFulfilledTransfers()
  });
});

app.get("/upgrade", (_req, res) => {
  res.json({
    version: router.getVersion(),
    implementation: router.getImplementation(),
    scheduled: router.getScheduledUpgrade(),
    currentNonce: router.currentNonce(),
    minimumContractUpgradeDelay: router.getMinimumContractUpgradeDelay(),
    cancellationWindow: router.getCancellationWindow(),
    swapRequestValidator: router.getSwapRequestValidator(),
    contractUpgradeValidator: router.getContractUpgradeValidator()
  });
});

app.get("/balances/:token/:account", (req, res) => {
  const token = addressSchema.safeParse(req.params.token);
  const account = addressSchema.safeParse(req.params.account);
  if (!token.success || !account.success) {
    res.status(400).json({ error: "invalid_address" });
    return;
  }
  res.json({
    token: token.data,
    account: account.data,
    balance: deployment.tokens.balanceOf(token.data, account.data),
    routerAllowance: deployment.tokens.allowance(token.data, account.data, router.address)
  });
});

app.post("/internal/tx/:operation", async (req, res) => {
  const request = req as RequestWithMeta;
  const operation = req.params.operation;
  try {
    const outcome = await executeOperation(deployment, operation, req.body);
    if (!outcome.ok) {
      auditLog(request, "tx_rejected", { operation, status: outcome.status, error: outcome.body.error });
      res.status(outcome.status).json(outcome.body);
      return;
    }
    auditLog(request, "tx_applied", { operation, logCount: deployment.chain.getLogCount() });
    res.json(outcome.result);
  } catch (error) {
    auditLog(request, "tx_error", { operation, message: error instanceof Error ? error.message : String(error) });
    res.status(500).json({ error: "internal_error" });
  }
});

app.post("/internal/faucet", async (req, res) => {
  const request = req as RequestWithMeta;
  if (!config.faucetEnabled) {
    auditLog(request, "faucet_rejected", { reason: "disabled" });
    res.status(404).json({ error: "faucet_disabled" });
    return;
  }
  const parsed = faucetSchema.safeParse(req.body);
  if (!parsed.success) {
    auditLog(request, "faucet_rejected", { reason: "invalid_payload" });
    res.status(400).json({ error: parsed.error.flatten() });
    return;
  }
  const { token, to, amount } = parsed.data;
  // mints join the ledger queue
  await deployment.chain.transact(() => deployment.tokens.mint(token, to, amount));
  auditLog(request, "faucet_minted", {
    token: parsed.data.token,
    to: parsed.data.to,
    amount: parsed.data.amount.toString()
  });
  res.json({ balance: deployment.tokens.balanceOf(parsed.data.token, parsed.data.to) });
});

app.listen(config.port, () => {
  console.log(`Ledger API listening on :${config.port}`);
  console.log(`Ledger chain=${config.chainId.toString()} router=${router.address} version=${router.getVersion()}`);
});

function respondWithQuery(req: RequestWithMeta, res: express.Response, query: (requestId: Hex) => object | undefined) {
  const requestId = bytes32Schema.safeParse(req.params.requestId);
  if (!requestId.success) {
    res.status(400).json({ error: "invalid_request_id" });
    return;
  }
  try {
    const result = query(requestId.data);
    if (!result) {
      res.status(404).json({ error: "not_found" });
      return;
    }
    res.json(result);
  } catch (error) {
    if (!isSettlementError(error)) throw error;
    auditLog(req, "query_rejected", { error: error.code });
    res.status(error.code === "SwapRequestNotFound" ? 404 : 400).json({ error: error.code, message: error.message });
  }
}

function requireInternalAuth(req: express.Request, res: express.Response, next: express.NextFunction) {
  const request = req as RequestWithMeta;
  const result = authVerifier.verify({
    method: req.method,
    path: req.originalUrl.split("?")[0] ?? req.path,
    timestamp: req.header(INTERNAL_TS_HEADER),
    signature: req.header(INTERNAL_SIG_HEADER),
    callerService: req.header(INTERNAL_SERVICE_HEADER),
    rawBody: request.rawBody ?? ""
  });
  if (!result.ok) {
    auditLog(request, "internal_auth_rejected", { reason: result.reason });
    res.status(result.status).json({ error: result.error });
    return;
  }
  auditLog(request, "internal_auth_ok", { callerService: result.callerService, keyVersion: result.keyVersion });
  next();
}

function requireInternalNetwork(req: express.Request, res: express.Response, next: express.NextFunction) {
  const source = normalizeIp(req.ip ?? req.socket.remoteAddress ?? "");
  const clientIp = source.length > 0 ? source : null;
  const reason = internalNetworkRejection(clientIp, config.internalAuth);
  if (reason) {
    auditLog(req as RequestWithMeta, "internal_network_rejected", { reason, clientIp });
    res.status(403).json({ error: "internal_network_rejected" });
    return;
  }
  next();
}

function rateLimitMiddleware(req: express.Request, res: express.Response, next: express.NextFunction) {
  const now = Date.now();
  const isInternal = req.path.startsWith("/internal");
  const windowMs = isInternal ? config.rateLimits.internalWindowMs : config.rateLimits.publicWindowMs;
  const maxRequests = isInternal ? config.rateLimits.internalMaxRequests : config.rateLimits.publicMaxRequests;
  const bucketKey = `${isInternal ? "internal" : "public"}:${req.ip ?? req.socket.remoteAddress ?? "unknown"}`;
  const existing = rateBuckets.get(bucketKey);

  if (!existing || existing.resetAt <= now) {
    rateBuckets.set(bucketKey, { count: 1, resetAt: now + windowMs });
    next();
    return;
  }

  if (existing.count >= maxRequests) {
    auditLog(req as RequestWithMeta, "rate_limit_rejected", { isInternal, bucketKey });
    res.status(429).json({ error: "rate_limited" });
    return;
  }

  existing.count += 1;
  next();
}

function auditLog(req: RequestWithMeta | undefined, action: string, fields?: Record<string, unknown>) {
  const payload: Record<string, unknown> = {
    ts: new Date().toISOString(),
    service: "ledger",
    chainId: config.chainId.toString(),
    action
  };
  if (req) {
    payload.requestId = req.requestId ?? "unknown";
    payload.method = req.method;
    payload.path = req.originalUrl.split("?")[0] ?? req.path;
  }
  if (fields) {
    for (const [key, value] of Object.entries(fields)) {
      payload[key] = value;
    }
  }
  console.log(JSON.stringify(payload, bigintReplacer));
}
