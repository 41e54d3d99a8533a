export type {
  ActionKind,
  ActionProposal,
  ActionTarget,
  FileOperation,
  GoalSatisfied,
  ModelReply,
  Point,
} from "./action.js";
export { ACTION_KINDS } from "./action.js";
export type { Goal, GoalConstraints } from "./goal.js";
export type { Bounds, ImageHandle, Snapshot, SnapshotSummary, TextRegion, UiElement } from "./snapshot.js";
export type {
  RiskLevel,
  RiskTable,
  SafetyDecision,
  SafetyLimits,
  SafetyPolicy,
  SafetyStats,
  SafetyVerdict,
} from "./policy.js";
export type { ActionOutcome, ExecutionResult, ExecutionStatus } from "./execution.js";
export type { HistoryEntry, ReasoningRequest } from "./context.js";
export type {
  PauseReason,
  RunCounters,
  RunPhase,
  RunStateView,
  RunSummary,
  TerminationReason,
} from "./loop.js";
export type * from "./events.js";
export type * from "./ports.js";
