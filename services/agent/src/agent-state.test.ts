import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import test from "node:test";
import { createInitialAgentState, loadAgentState, saveAgentState, taskId, type AgentTask } from "./agent-state";

const REQUEST_ID = `0x${"c3".repeat(32)}` as const;

function tempStatePath(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "agent-state-"));
  return path.join(dir, "nested", "state.json");
}

function sampleTask(): AgentTask {
  return {
    id: taskId("rebalance", REQUEST_ID),
    kind: "rebalance",
    payload: { requestId: REQUEST_ID, srcChainId: "31337", dstChainId: "43113" },
    attempts: 2,
    nextAttemptAt: 5_000,
    createdAt: 1_000,
    updatedAt: 2_000,
    terminal: true,
    terminalReason: "ledger_rejected",
    lastError: "AlreadyFulfilled"
  };
}

test("missing state file is created with the initial state", () => {
  const filePath = tempStatePath();
  const state = loadAgentState(filePath);
  assert.deepEqual(state, createInitialAgentState());
  assert.equal(fs.existsSync(filePath), true);
});

test("cursors and tasks survive a save and load", () => {
  const filePath = tempStatePath();
  const state = loadAgentState(filePath);
  state.cursors["31337"] = 12n;
  state.cursors["43113"] = 3n;
  const task = sampleTask();
  state.tasks[task.id] = task;
  saveAgentState(filePath, state);

  const reloaded = loadAgentState(filePath);
  assert.deepEqual(reloaded.cursors, { "31337": 12n, "43113": 3n });
  assert.deepEqual(reloaded.tasks[task.id], task);
  assert.deepEqual(
    fs.readdirSync(path.dirname(filePath)).filter((name) => name.includes(".tmp-")),
    []
  );
});

test("malformed tasks and cursors are dropped", () => {
  const filePath = tempStatePath();
  loadAgentState(filePath);
  const valid = sampleTask();
  fs.writeFileSync(
    filePath,
    JSON.stringify({
      version: 1,
      cursors: { "31337": "7", "43113": -1, mainnet: "4" },
      tasks: {
        [valid.id]: { ...valid, terminal: "yes", lastError: 42 },
        "fulfill:bad-kind": { ...valid, kind: "deposit" },
        "fulfill:bad-id": { ...valid, payload: { ...valid.payload, requestId: "0x1234" } },
        "fulfill:no-attempts": { ...valid, attempts: "2" }
      }
    })
  );

  const state = loadAgentState(filePath);
  assert.deepEqual(state.cursors, { "31337": 7n });
  assert.deepEqual(Object.keys(state.tasks), [valid.id]);
  assert.equal(state.tasks[valid.id]?.terminal, false);
  assert.equal(state.tasks[valid.id]?.lastError, undefined);
});

test("unreadable and foreign files fall back to the initial state", () => {
  const filePath = tempStatePath();
  loadAgentState(filePath);

  fs.writeFileSync(filePath, "{not json");
  assert.deepEqual(loadAgentState(filePath), createInitialAgentState());

  fs.writeFileSync(filePath, JSON.stringify({ version: 2, lastSpokeBlock: "9" }));
  assert.deepEqual(loadAgentState(filePath), createInitialAgentState());
});
