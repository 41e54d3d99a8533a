import type { Goal } from "./goal.js";
import type { HistoryEntry } from "./context.js";

export type RunPhase =
  | "idle"
  | "perceiving"
  | "reasoning"
  | "safety_check"
  | "executing"
  | "awaiting_confirmation"
  | "blocked"
  | "monitoring"
  | "paused"
  | "stopped";

export type TerminationReason =
  | "goal_satisfied"
  | "emergency_stop"
  | "cycle_budget_exceeded"
  | "aborted";

export type PauseReason =
  | "perception_exhausted"
  | "reasoning_exhausted"
  | "consecutive_failures";

export interface RunCounters {
  perceptionFailures: number;
  reasoningFailures: number;
  executionFailures: number;
  consecutiveFailures: number;
}

/** Read-only view handed to observers; the orchestrator keeps the only mutable copy. */
export interface RunStateView {
  readonly runId: string;
  readonly phase: RunPhase;
  readonly cycle: number;
  readonly goal: Goal;
  readonly emergency: boolean;
  readonly counters: Readonly<RunCounters>;
  readonly pauseReason: PauseReason | null;
  readonly history: readonly HistoryEntry[];
}

export interface RunSummary {
  runId: string;
  goal: string;
  reason: TerminationReason;
  detail?: string;
  cycles: number;
  executed: number;
  failed: number;
  blocked: number;
  completionRate: number;
  durationMs: number;
  startedAt: string;
  endedAt: string;
}
