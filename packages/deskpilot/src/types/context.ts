import type { ActionProposal } from "./action.js";
import type { ExecutionResult } from "./execution.js";
import type { Goal } from "./goal.js";
import type { SafetyDecision } from "./policy.js";
import type { ImageHandle, SnapshotSummary } from "./snapshot.js";

export interface HistoryEntry {
  cycle: number;
  snapshot: SnapshotSummary;
  proposal: ActionProposal;
  decision: SafetyDecision;
  /** Present only when the decision let the action through. */
  result?: ExecutionResult;
}

export interface ReasoningRequest {
  runId: string;
  cycle: number;
  goal: Goal;
  history: readonly HistoryEntry[];
  snapshot: SnapshotSummary;
  image: ImageHandle;
}
