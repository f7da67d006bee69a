import type { Address, Hex } from "viem";
import {
  SWAP_REQUEST_DOMAIN,
  bigintReplacer,
  encodeSwapRequestMessage,
  isSettlementError,
  signQuorumMessage
} from "@relayswap/settlement";
import { taskId, type AgentPersistentState, type AgentTask, type AgentTaskKind } from "./agent-state";
import type { LedgerClient } from "./ledger-client";
import { collectSettlementLogs, type NormalizedSettlementLog } from "./request-log";

export type RetryPolicy = {
  baseDelayMs: number;
  maxDelayMs: number;
  maxAttempts: number;
};

export type AuditLogger = (action: string, fields?: Record<string, unknown>) => void;

export type SettlementAgentOptions = {
  ledgers: readonly LedgerClient[];
  /** Account that relays on destination ledgers and receives repayment on source ledgers. */
  solver: Address;
  /** Swap committee keys used to sign repayment messages; at least the committee threshold. */
  committeeKeys: readonly Hex[];
  state: AgentPersistentState;
  persist?: (state: AgentPersistentState) => void;
  retry: RetryPolicy;
  /** Grant the router exactly `amountOut` before each relay instead of relying on a standing allowance. */
  approveRelayAmount?: boolean;
  logPageSize?: number;
  now?: () => number;
  log?: AuditLogger;
};

export function computeRetryDelayMs(attempts: number, policy: Pick<RetryPolicy, "baseDelayMs" | "maxDelayMs">): number {
  const exp = Math.max(0, attempts - 1);
  const delay = policy.baseDelayMs * (2 ** Math.min(exp, 10));
  return Math.min(policy.maxDelayMs, delay);
}

export function createAuditLogger(service: string): AuditLogger {
  return (action, fields) => {
    const payload: Record<string, unknown> = { ts: new Date().toISOString(), service, action };
    if (fields) {
      for (const [key, value] of Object.entries(fields)) {
        payload[key] = value;
      }
    }
    console.log(JSON.stringify(payload, bigintReplacer));
  };
}

/**
 * Watches every configured ledger and drives requests to completion: a `SwapRequested` log on a
 * source ledger becomes a fulfill task against the destination ledger, and a
 * `SwapRequestFulfilled` log on a destination ledger becomes a rebalance task against the source.
 */
export class SettlementAgent {
  private readonly ledgers = new Map<string, LedgerClient>();
  private readonly persist: (state: AgentPersistentState) => void;
  private readonly now: () => number;
  private readonly log: AuditLogger;
  private readonly logPageSize: number;
  private isPolling = false;
  private isProcessingQueue = false;

  constructor(private readonly options: SettlementAgentOptions) {
    for (const ledger of options.ledgers) {
      this.ledgers.set(ledger.chainId.toString(), ledger);
    }
    this.persist = options.persist ?? (() => undefined);
    this.now = options.now ?? Date.now;
    this.log = options.log ?? createAuditLogger("agent");
    this.logPageSize = options.logPageSize ?? 500;
  }

  get state(): AgentPersistentState {
    return this.options.state;
  }

  tasks(): AgentTask[] {
    return Object.values(this.options.state.tasks).sort((a, b) => a.createdAt - b.createdAt);
  }

  /** Reads new log entries from every ledger and enqueues the work they imply. */
  async poll(): Promise<void> {
    if (this.isPolling) return;
    this.isPolling = true;
    try {
      for (const ledger of this.ledgers.values()) {
        try {
          await this.pollLedger(ledger);
        } catch (error) {
          this.log("poll_failed", { chainId: ledger.chainId, message: error instanceof Error ? error.message : String(error) });
        }
      }
    } finally {
      this.isPolling = false;
    }
  }

  private async pollLedger(ledger: LedgerClient) {
    const key = ledger.chainId.toString();
    const cursor = this.options.state.cursors[key] ?? 0n;
    const page = await ledger.getLogs(cursor, this.logPageSize);
    if (page.nextIndex === cursor) return;

    for (const log of collectSettlementLogs(page.entries)) {
      if (log.chainId !== ledger.chainId) continue;
      this.enqueueFor(log);
    }
    this.options.state.cursors[key] = page.nextIndex;
    this.log("ledger_polled", { chainId: ledger.chainId, fromIndex: cursor, nextIndex: page.nextIndex });
    this.persist(this.options.state);
  }

  private enqueueFor(log: NormalizedSettlementLog) {
    if (log.kind === "swap_requested") {
      if (!this.ledgers.has(log.dstChainId.toString())) return;
      this.enqueue("fulfill", log);
      return;
    }
    if (!this.ledgers.has(log.srcChainId.toString())) return;
    this.enqueue("rebalance", log);
  }

  private enqueue(kind: AgentTaskKind, log: NormalizedSettlementLog) {
    const id = taskId(kind, log.requestId);
    if (this.options.state.tasks[id]) return;
    const now = this.now();
    this.options.state.tasks[id] = {
      id,
      kind,
      payload: {
        requestId: log.requestId,
        srcChainId: log.srcChainId.toString(),
        dstChainId: log.dstChainId.toString()
      },
      attempts: 0,
      nextAttemptAt: now,
      createdAt: now,
      updatedAt: now
    };
    this.log("task_enqueued", { taskId: id, kind, requestId: log.requestId, logIndex: log.logIndex });
  }

  /** Runs every task that is due, once. */
  async processQueue(): Promise<void> {
    if (this.isProcessingQueue) return;
    this.isProcessingQueue = true;
    try {
      const now = this.now();
      const due = this.tasks().filter((task) => !task.terminal && task.nextAttemptAt <= now);
      for (const task of due) {
        await this.processTask(task);
      }
    } finally {
      this.isProcessingQueue = false;
    }
  }

  private async processTask(task: AgentTask) {
    const now = this.now();
    task.attempts += 1;
    task.updatedAt = now;

    try {
      const outcome = task.kind === "fulfill" ? await this.runFulfillTask(task) : await this.runRebalanceTask(task);
      delete this.options.state.tasks[task.id];
      this.log("task_completed", { taskId: task.id, outcome, attempts: task.attempts });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      if (isSettlementError(error, "AlreadyFulfilled")) {
        delete this.options.state.tasks[task.id];
        this.log("task_completed", { taskId: task.id, outcome: "already_settled", attempts: task.attempts });
        return;
      }

      const terminalFailure = isSettlementError(error) && error.category !== "external";
      if (terminalFailure || task.attempts >= this.options.retry.maxAttempts) {
        task.terminal = true;
        task.terminalReason = terminalFailure ? "ledger_rejected" : "max_attempts_exhausted";
        task.lastError = message;
        task.updatedAt = this.now();
        this.log("task_terminal", { taskId: task.id, terminalReason: task.terminalReason, lastError: message });
      } else {
        task.lastError = message;
        task.nextAttemptAt = now + computeRetryDelayMs(task.attempts, this.options.retry);
        task.updatedAt = this.now();
        this.log("task_retry_scheduled", {
          taskId: task.id,
          attempts: task.attempts,
          nextRetryAt: new Date(task.nextAttemptAt).toISOString(),
          lastError: message
        });
      }
    } finally {
      this.persist(this.options.state);
    }
  }

  private async runFulfillTask(task: AgentTask): Promise<string> {
    const { requestId } = task.payload;
    const source = this.ledger(task.payload.srcChainId);
    const destination = this.ledger(task.payload.dstChainId);

    const request = await source.getSwapRequest(requestId);
    if (!request) throw new Error(`request ${requestId} not found on source ledger ${task.payload.srcChainId}`);
    if (request.executed) return "skipped_executed";
    const receipt = await destination.getSwapRequestReceipt(requestId);
    if (receipt?.fulfilled) return "skipped_fulfilled";

    if (this.options.approveRelayAmount) {
      await destination.approveRouter(this.options.solver, request.tokenOut, request.amountOut);
    }
    await destination.relayTokens(this.options.solver, {
      solverRefundAddress: this.options.solver,
      requestId,
      sender: request.sender,
      recipient: request.recipient,
      tokenIn: request.tokenIn,
      tokenOut: request.tokenOut,
      amountOut: request.amountOut,
      srcChainId: request.srcChainId,
      nonce: request.nonce,
      preHooks: request.preHooks,
      postHooks: request.postHooks
    });
    return "relayed";
  }

  private async runRebalanceTask(task: AgentTask): Promise<string> {
    const { requestId } = task.payload;
    const source = this.ledger(task.payload.srcChainId);
    const destination = this.ledger(task.payload.dstChainId);

    const receipt = await destination.getSwapRequestReceipt(requestId);
    if (!receipt?.fulfilled) throw new Error(`request ${requestId} has no fulfillment receipt on ledger ${task.payload.dstChainId}`);
    const request = await source.getSwapRequest(requestId);
    if (!request) throw new Error(`request ${requestId} not found on source ledger ${task.payload.srcChainId}`);
    if (request.executed) return "skipped_executed";

    const message = encodeSwapRequestMessage(receipt.solver, request);
    const signature = await signQuorumMessage(SWAP_REQUEST_DOMAIN, message, this.options.committeeKeys);
    await source.rebalanceSolver(this.options.solver, receipt.solver, requestId, signature);
    return "rebalanced";
  }

  private ledger(chainId: string): LedgerClient {
    const ledger = this.ledgers.get(chainId);
    if (!ledger) throw new Error(`no ledger configured for chain ${chainId}`);
    return ledger;
  }
}
