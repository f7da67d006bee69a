import assert from "node:assert/strict";
import test from "node:test";
import { ManualClock } from "@relayswap/settlement";
import { devAccount } from "@relayswap/settlement/testing";
import { bootstrapLedger } from "./bootstrap";
import { DEV_INTERNAL_AUTH_SECRET, loadLedgerConfig, validateStartupConfig } from "./config";

const SRC_TOKEN = "0x1000000000000000000000000000000000000001";
const DST_TOKEN = "0x2000000000000000000000000000000000000002";

const baseEnv = {
  LEDGER_CHAIN_ID: "31337",
  LEDGER_OWNER: devAccount(7).address,
  SWAP_COMMITTEE_MEMBERS: `${devAccount(1).address}, ${devAccount(2).address}`,
  SWAP_COMMITTEE_THRESHOLD: "2",
  UPGRADE_COMMITTEE_MEMBERS: devAccount(4).address,
  UPGRADE_COMMITTEE_THRESHOLD: "1"
};

const productionEnv = {
  ...baseEnv,
  NODE_ENV: "production",
  INTERNAL_API_AUTH_SECRET: "test-secret",
  CORS_ALLOW_ORIGIN: "https://swap.example"
};

test("development defaults", () => {
  const config = loadLedgerConfig(baseEnv);
  assert.equal(config.isProduction, false);
  assert.equal(config.port, 3060);
  assert.equal(config.chainId, 31337n);
  assert.equal(config.verificationFeeBps, 500n);
  assert.equal(config.version, "1.0.0");
  assert.deepEqual(config.swapCommittee, { members: [devAccount(1).address, devAccount(2).address], threshold: 2 });
  assert.equal(config.faucetEnabled, true);
  assert.equal(config.internalAuth.secret, DEV_INTERNAL_AUTH_SECRET);
  assert.equal(config.internalAuth.requirePrivateIp, false);
  assert.deepEqual([...config.internalAuth.allowedServices], ["agent", "e2e"]);
  assert.doesNotThrow(() => validateStartupConfig(config));
});

test("peer chains and token mappings parse from lists", () => {
  const config = loadLedgerConfig({
    ...baseEnv,
    LEDGER_PEER_CHAIN_IDS: "43113, 84532",
    LEDGER_TOKEN_MAPPINGS: `${SRC_TOKEN}:43113:${DST_TOKEN}`
  });
  assert.deepEqual(config.peerChainIds, [43113n, 84532n]);
  assert.deepEqual(config.tokenMappings, [{ srcToken: SRC_TOKEN, dstChainId: 43113n, dstToken: DST_TOKEN }]);
});

test("malformed values are reported by variable name", () => {
  assert.throws(
    () => loadLedgerConfig({ ...baseEnv, LEDGER_OWNER: "0x1234" }),
    /Invalid ledger configuration: LEDGER_OWNER: invalid address/
  );
  assert.throws(
    () => loadLedgerConfig({ ...baseEnv, LEDGER_TOKEN_MAPPINGS: `${SRC_TOKEN}:43113` }),
    /LEDGER_TOKEN_MAPPINGS: invalid token mapping/
  );
  assert.throws(() => loadLedgerConfig({ ...baseEnv, LEDGER_CHAIN_ID: "0" }), /LEDGER_CHAIN_ID/);
  assert.throws(
    () => loadLedgerConfig({ ...baseEnv, SWAP_COMMITTEE_MEMBERS: "0x1234" }),
    (error: unknown) => {
      assert.ok(error instanceof Error);
      assert.equal(error.message, "Invalid ledger configuration: SWAP_COMMITTEE_MEMBERS: invalid address 0x1234");
      return true;
    }
  );
});

test("production guards", () => {
  assert.doesNotThrow(() => validateStartupConfig(loadLedgerConfig(productionEnv)));
  assert.equal(loadLedgerConfig(productionEnv).faucetEnabled, false);

  const { INTERNAL_API_AUTH_SECRET: _secret, ...withoutSecret } = productionEnv;
  assert.throws(() => validateStartupConfig(loadLedgerConfig(withoutSecret)), /Missing INTERNAL_API_AUTH_SECRET/);
  assert.throws(
    () => validateStartupConfig(loadLedgerConfig({ ...productionEnv, INTERNAL_API_AUTH_SECRET: DEV_INTERNAL_AUTH_SECRET })),
    /dev default/
  );
  assert.throws(() => validateStartupConfig(loadLedgerConfig({ ...productionEnv, CORS_ALLOW_ORIGIN: "*" })), /CORS_ALLOW_ORIGIN/);
  assert.throws(
    () => validateStartupConfig(loadLedgerConfig({ ...productionEnv, INTERNAL_API_REQUIRE_PRIVATE_IP: "0" })),
    /INTERNAL_API_REQUIRE_PRIVATE_IP/
  );
  assert.throws(
    () => validateStartupConfig(loadLedgerConfig({ ...productionEnv, LEDGER_FAUCET_ENABLED: "1" })),
    /LEDGER_FAUCET_ENABLED/
  );
});

test("committee thresholds and mappings are checked against each other", () => {
  assert.throws(
    () => validateStartupConfig(loadLedgerConfig({ ...baseEnv, SWAP_COMMITTEE_THRESHOLD: "3" })),
    /SWAP_COMMITTEE_THRESHOLD exceeds/
  );
  assert.throws(
    () => validateStartupConfig(loadLedgerConfig({ ...baseEnv, LEDGER_TOKEN_MAPPINGS: `${SRC_TOKEN}:43113:${DST_TOKEN}` })),
    /chain 43113 missing from LEDGER_PEER_CHAIN_IDS/
  );
});

test("bootstrap applies peer chains and mappings", async () => {
  const config = loadLedgerConfig({
    ...baseEnv,
    LEDGER_PEER_CHAIN_IDS: "43113",
    LEDGER_TOKEN_MAPPINGS: `${SRC_TOKEN}:43113:${DST_TOKEN}`
  });
  const deployment = await bootstrapLedger(config, new ManualClock());
  assert.deepEqual(deployment.router.getAllowedDstChainIds(), [43113n]);
  assert.equal(deployment.router.isDstTokenMapped(SRC_TOKEN, 43113n, DST_TOKEN), true);
  assert.equal(deployment.router.isAdmin(devAccount(7).address), true);
  assert.equal(deployment.chain.getLogCount(), 4);
});
