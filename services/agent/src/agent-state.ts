import fs from "node:fs";
import path from "node:path";
import type { Hex } from "viem";
import { z } from "zod";
import { bytes32Schema } from "@relayswap/settlement";

export type AgentTaskKind = "fulfill" | "rebalance";

export type AgentTaskPayload = {
  requestId: Hex;
  srcChainId: string;
  dstChainId: string;
};

export type AgentTask = {
  id: string;
  kind: AgentTaskKind;
  payload: AgentTaskPayload;
  attempts: number;
  nextAttemptAt: number;
  createdAt: number;
  updatedAt: number;
  terminal?: boolean;
  terminalReason?: string;
  lastError?: string;
};

export type AgentPersistentState = {
  version: 1;
  /** Next log index to read, per ledger chain id. */
  cursors: Record<string, bigint>;
  tasks: Record<string, AgentTask>;
};

type SerializedAgentStateV1 = {
  version: 1;
  cursors: Record<string, string>;
  tasks: Record<string, AgentTask>;
};

const finiteNumber = z.number().finite();
const chainIdString = z.string().regex(/^\d+$/);

const taskSchema = z.object({
  kind: z.enum(["fulfill", "rebalance"]),
  payload: z.object({ requestId: bytes32Schema, srcChainId: chainIdString, dstChainId: chainIdString }),
  attempts: finiteNumber,
  nextAttemptAt: finiteNumber,
  createdAt: finiteNumber,
  updatedAt: finiteNumber,
  terminal: z.unknown().optional(),
  terminalReason: z.unknown().optional(),
  lastError: z.unknown().optional()
});

const stateSchema = z.object({
  version: z.literal(1),
  cursors: z.record(z.unknown()).default({}),
  tasks: z.record(z.unknown()).default({})
});

export function createInitialAgentState(): AgentPersistentState {
  return {
    version: 1,
    cursors: {},
    tasks: {}
  };
}

export function taskId(kind: AgentTaskKind, requestId: string): string {
  return `${kind}:${requestId.toLowerCase()}`;
}

/** Reads the state file, creating it when absent. Unreadable or foreign files start over from the initial state. */
export function loadAgentState(filePath: string): AgentPersistentState {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });

  if (!fs.existsSync(filePath)) {
    const initial = createInitialAgentState();
    saveAgentState(filePath, initial);
    return initial;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (error) {
    console.warn(`Discarding unreadable agent state at ${filePath}`, error);
    return createInitialAgentState();
  }

  const parsed = stateSchema.safeParse(raw);
  if (!parsed.success) return createInitialAgentState();
  return {
    version: 1,
    cursors: sanitizeCursors(parsed.data.cursors),
    tasks: sanitizeTasks(parsed.data.tasks)
  };
}

export function saveAgentState(filePath: string, state: AgentPersistentState) {
  const cursors: Record<string, string> = {};
  for (const [chainId, cursor] of Object.entries(state.cursors)) {
    cursors[chainId] = cursor.toString();
  }
  const serialized: SerializedAgentStateV1 = {
    version: 1,
    cursors,
    tasks: sanitizeTasks(state.tasks)
  };
  const tmpPath = `${filePath}.tmp-${process.pid}-${Date.now()}`;
  fs.writeFileSync(tmpPath, JSON.stringify(serialized, null, 2));
  fs.renameSync(tmpPath, filePath);
}

function sanitizeCursors(cursors: Record<string, unknown>): Record<string, bigint> {
  const result: Record<string, bigint> = {};
  for (const [chainId, cursor] of Object.entries(cursors)) {
    if (!/^\d+$/.test(chainId)) continue;
    if (typeof cursor !== "string" || !/^\d+$/.test(cursor)) continue;
    result[chainId] = BigInt(cursor);
  }
  return result;
}

function sanitizeTasks(tasks: Record<string, unknown>): Record<string, AgentTask> {
  const result: Record<string, AgentTask> = {};
  for (const [id, value] of Object.entries(tasks)) {
    const parsed = taskSchema.safeParse(value);
    if (!parsed.success) continue;
    const task = parsed.data;
    result[id] = {
      id,
      kind: task.kind,
      payload: {
        requestId: task.payload.requestId,
        srcChainId: task.payload.srcChainId,
        dstChainId: task.payload.dstChainId
      },
      attempts: task.attempts,
      nextAttemptAt: task.nextAttemptAt,
      createdAt: task.createdAt,
      updatedAt: task.updatedAt,
      terminal: task.terminal === true,
      terminalReason: typeof task.terminalReason === "string" ? task.terminalReason : undefined,
      lastError: typeof task.lastError === "string" ? task.lastError : undefined
    };
  }
  return result;
}
