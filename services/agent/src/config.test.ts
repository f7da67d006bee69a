import assert from "node:assert/strict";
import test from "node:test";
import { DEV_INTERNAL_AUTH_SECRET } from "@relayswap/ledger/config";
import { SOLVER, devKey } from "@relayswap/settlement/testing";
import { loadAgentConfig, validateStartupConfig } from "./config";

const baseEnv = {
  AGENT_LEDGERS: "31337=http://127.0.0.1:3060, 43113=http://127.0.0.1:3061",
  AGENT_SOLVER_ADDRESS: SOLVER.toLowerCase(),
  SWAP_COMMITTEE_PRIVATE_KEYS: `${devKey(1)},${devKey(2)}`
};

test("development defaults", () => {
  const config = loadAgentConfig(baseEnv);
  assert.equal(config.isProduction, false);
  assert.equal(config.port, 3070);
  assert.deepEqual(config.ledgers, [
    { chainId: 31337n, baseUrl: "http://127.0.0.1:3060" },
    { chainId: 43113n, baseUrl: "http://127.0.0.1:3061" }
  ]);
  assert.equal(config.solver, SOLVER);
  assert.deepEqual(config.committeeKeys, [devKey(1), devKey(2)]);
  assert.equal(config.statePath, "./data/agent-state.json");
  assert.equal(config.approveRelayAmount, true);
  assert.equal(loadAgentConfig({ ...baseEnv, AGENT_APPROVE_RELAY_AMOUNT: "0" }).approveRelayAmount, false);
  assert.deepEqual(config.retry, { baseDelayMs: 5_000, maxDelayMs: 300_000, maxAttempts: 8 });
  assert.deepEqual(config.internalAuth, { secret: DEV_INTERNAL_AUTH_SECRET, serviceName: "agent" });
  assert.doesNotThrow(() => validateStartupConfig(config));
});

test("malformed ledgers and keys are reported by variable name", () => {
  assert.throws(
    () => loadAgentConfig({ ...baseEnv, AGENT_LEDGERS: "31337" }),
    /Invalid agent configuration: AGENT_LEDGERS: invalid ledger endpoint 31337/
  );
  assert.throws(
    () => loadAgentConfig({ ...baseEnv, AGENT_LEDGERS: "1=http://a.local,1=http://b.local" }),
    /AGENT_LEDGERS: duplicate chain id/
  );
  assert.throws(
    () => loadAgentConfig({ ...baseEnv, SWAP_COMMITTEE_PRIVATE_KEYS: "0x1234" }),
    /SWAP_COMMITTEE_PRIVATE_KEYS: invalid private key/
  );
});

test("a malformed list entry is reported once, without running the list checks", () => {
  assert.throws(
    () => loadAgentConfig({ ...baseEnv, AGENT_LEDGERS: "31337=http://127.0.0.1:3060,nope", SWAP_COMMITTEE_PRIVATE_KEYS: "0x1234" }),
    (error: unknown) => {
      assert.ok(error instanceof Error);
      assert.equal(
        error.message,
        "Invalid agent configuration: AGENT_LEDGERS: invalid ledger endpoint nope; SWAP_COMMITTEE_PRIVATE_KEYS: invalid private key"
      );
      return true;
    }
  );
});

test("production requires a real internal auth secret", () => {
  const production = { ...baseEnv, NODE_ENV: "production" };
  assert.throws(() => validateStartupConfig(loadAgentConfig(production)), /Missing INTERNAL_API_AUTH_SECRET/);
  assert.throws(
    () => validateStartupConfig(loadAgentConfig({ ...production, INTERNAL_API_AUTH_SECRET: DEV_INTERNAL_AUTH_SECRET })),
    /dev default/
  );
  assert.doesNotThrow(() => validateStartupConfig(loadAgentConfig({ ...production, INTERNAL_API_AUTH_SECRET: "test-secret" })));
});

test("retry base delay cannot exceed the cap", () => {
  assert.throws(
    () => validateStartupConfig(loadAgentConfig({ ...baseEnv, AGENT_RETRY_BASE_DELAY_MS: "10000", AGENT_RETRY_MAX_DELAY_MS: "5000" })),
    /AGENT_RETRY_BASE_DELAY_MS exceeds/
  );
});
