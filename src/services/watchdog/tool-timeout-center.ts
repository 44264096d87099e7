// Liveness watchdog for running tool invocations.
// A call times out when it reports no progress for `timeoutSeconds`; every
// markProgress() pushes the deadline forward again.

import { systemClock, type Clock } from '../../utils/clock.js';
import { ToolCancelledError, ToolTimeoutError } from '../../utils/errors.js';

export const DEFAULT_TOOL_TIMEOUT_SECONDS = 30;
export const MIN_TOOL_TIMEOUT_SECONDS = 1;
export const MAX_TOOL_TIMEOUT_SECONDS = 600;
export const DEFAULT_POLL_INTERVAL_MS = 200;

export function clampToolTimeoutSeconds(value: number | undefined): number {
  if (value === undefined || !Number.isFinite(value)) {
    return DEFAULT_TOOL_TIMEOUT_SECONDS;
  }
  return Math.min(MAX_TOOL_TIMEOUT_SECONDS, Math.max(MIN_TOOL_TIMEOUT_SECONDS, value));
}

export interface ToolInvocationState {
  toolCallId: string;
  toolName: string;
  targetFile?: string;
  startedAt: number;
  lastProgressAt: number;
  timeoutSeconds: number;
}

export interface ActiveToolInvocation extends ToolInvocationState {
  remainingSeconds: number;
}

export type ToolInterruption = ToolTimeoutError | ToolCancelledError;

export interface ToolTimeoutCenterOptions {
  clock?: Clock;
  pollIntervalMs?: number;
}

export class ToolTimeoutCenter {
  private readonly clock: Clock;
  private readonly pollIntervalMs: number;
  private readonly invocations = new Map<string, ToolInvocationState>();
  // Ids of a live batch that have not begun yet; only these accept an early cancel.
  private readonly pending = new Set<string>();
  private readonly cancelled = new Set<string>();

  constructor(options: ToolTimeoutCenterOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  }

  begin(toolCallId: string, toolName: string, targetFile: string | undefined, timeoutSeconds: number): void {
    const now = this.clock.now();
    this.invocations.set(toolCallId, {
      toolCallId,
      toolName,
      targetFile,
      startedAt: now,
      lastProgressAt: now,
      timeoutSeconds: clampToolTimeoutSeconds(timeoutSeconds),
    });
  }

  markProgress(toolCallId: string): void {
    const state = this.invocations.get(toolCallId);
    if (state) {
      state.lastProgressAt = this.clock.now();
    }
  }

  /** Marks the ids of a batch about to run, so they can be cancelled while queued. */
  track(toolCallIds: readonly string[]): void {
    for (const id of toolCallIds) this.pending.add(id);
  }

  /** Ends a batch: its ids stop accepting cancellation and leftover flags are dropped. */
  release(toolCallIds: readonly string[]): void {
    for (const id of toolCallIds) {
      this.pending.delete(id);
      if (!this.invocations.has(id)) this.cancelled.delete(id);
    }
  }

  /** Returns false, and records nothing, for ids that are neither running nor pending. */
  cancel(toolCallId: string): boolean {
    if (!this.invocations.has(toolCallId) && !this.pending.has(toolCallId)) {
      return false;
    }
    this.cancelled.add(toolCallId);
    return true;
  }

  isPending(toolCallId: string): boolean {
    return this.pending.has(toolCallId);
  }

  isCancelled(toolCallId: string): boolean {
    return this.cancelled.has(toolCallId);
  }

  isActive(toolCallId: string): boolean {
    return this.invocations.has(toolCallId);
  }

  remainingSeconds(toolCallId: string): number | undefined {
    const state = this.invocations.get(toolCallId);
    if (!state) return undefined;
    const deadline = state.lastProgressAt + state.timeoutSeconds * 1000;
    return (deadline - this.clock.now()) / 1000;
  }

  finish(toolCallId: string): void {
    this.invocations.delete(toolCallId);
    this.cancelled.delete(toolCallId);
  }

  active(): ActiveToolInvocation[] {
    return Array.from(this.invocations.values()).map((state) => ({
      ...state,
      remainingSeconds: this.remainingSeconds(state.toolCallId) ?? 0,
    }));
  }

  /**
   * Polls the call until it is cancelled, runs out of time, or `stopSignal`
   * aborts. Resolves with the interruption, or null when stopped.
   */
  async supervise(toolCallId: string, stopSignal: AbortSignal): Promise<ToolInterruption | null> {
    while (!stopSignal.aborted) {
      const state = this.invocations.get(toolCallId);
      if (!state) return null;

      if (this.cancelled.has(toolCallId)) {
        return new ToolCancelledError(state.toolName);
      }

      const remaining = this.remainingSeconds(toolCallId);
      if (remaining !== undefined && remaining <= 0) {
        return new ToolTimeoutError(state.toolName, state.timeoutSeconds);
      }

      try {
        await this.clock.sleep(this.pollIntervalMs, stopSignal);
      } catch {
        return null;
      }
    }
    return null;
  }
}
