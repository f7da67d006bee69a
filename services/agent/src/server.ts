import express from "express";
import { bigintReplacer } from "@relayswap/settlement";
import { SettlementAgent, createAuditLogger } from "./agent";
import { loadAgentState, saveAgentState } from "./agent-state";
import { loadAgentConfig, validateStartupConfig } from "./config";
import { HttpLedgerClient } from "./ledger-client";

const config = loadAgentConfig();
validateStartupConfig(config);

const auditLog = createAuditLogger("agent");
const agent = new SettlementAgent({
  ledgers: config.ledgers.map((ledger) => new HttpLedgerClient(ledger.baseUrl, ledger.chainId, config.internalAuth)),
  solver: config.solver,
  committeeKeys: config.committeeKeys,
  state: loadAgentState(config.statePath),
  persist: (state) => saveAgentState(config.statePath, state),
  retry: config.retry,
  approveRelayAmount: config.approveRelayAmount,
  logPageSize: config.logPageSize,
  log: auditLog
});

const app = express();
app.set("json replacer", bigintReplacer);

app.get("/health", (_req, res) => {
  res.json({
    ok: true,
    solver: config.solver,
    ledgers: config.ledgers.map((ledger) => ({ chainId: ledger.chainId, cursor: agent.state.cursors[ledger.chainId.toString()] ?? 0n }))
  });
});

app.get("/tasks", (_req, res) => {
  res.json({ tasks: agent.tasks() });
});

app.listen(config.port, () => {
  console.log(`Agent API listening on :${config.port}`);
  console.log(`Agent solver=${config.solver} ledgers=${config.ledgers.map((ledger) => ledger.chainId.toString()).join(",")}`);
  setInterval(() => {
    agent.poll().catch((error) => {
      auditLog("poll_failed", { message: error instanceof Error ? error.message : String(error) });
      console.error("Agent poll error", error);
    });
  }, config.pollIntervalMs);
  setInterval(() => {
    agent.processQueue().catch((error) => {
      console.error("Agent task queue error", error);
    });
  }, config.pollIntervalMs);
});
