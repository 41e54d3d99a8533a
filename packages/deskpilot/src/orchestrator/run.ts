import { nanoid } from "nanoid";
import { resolveRunConfig, type RunConfigInput } from "../config/schema.js";
import { ConfirmationBroker } from "../execution/confirmation.js";
import type { Goal, GoalConstraints } from "../types/goal.js";
import type { RunStateView, RunSummary } from "../types/loop.js";
import { frozenCopy } from "../utils/freeze.js";
import { CycleOrchestrator, type OrchestratorDeps } from "./orchestrator.js";
import type { PhaseTransition } from "./state-machine.js";

export interface RunHandle {
  readonly runId: string;
  readonly goal: Goal;
  /** Settles once the run reaches `stopped`. */
  readonly done: Promise<RunSummary>;
  state(): RunStateView;
  /** Idempotent; returns true only for the call that stopped the run. */
  emergencyStop(reason?: string): boolean;
  /** Leaves `paused`. Returns false outside that phase. */
  resume(): boolean;
  /** Ends a paused run with reason `aborted`. Returns false outside `paused`. */
  abort(): boolean;
  /**
   * Answers the pending confirmation for `cycle` when the run uses the
   * in-process broker. Returns false if nothing was waiting.
   */
  confirm(cycle: number, approved: boolean): boolean;
  onPhaseChange(listener: (transition: PhaseTransition) => void): () => void;
}

export function createGoal(text: string, constraints: GoalConstraints = {}): Goal {
  const trimmed = text.trim();
  if (!trimmed) {
    throw new Error("Goal text must not be empty");
  }
  return Object.freeze({
    id: nanoid(),
    text: trimmed,
    constraints: frozenCopy(constraints),
    createdAtMs: Date.now(),
  });
}

/**
 * Validates the configuration, then starts the cycle loop in the background.
 * Configuration errors throw synchronously; everything after start is
 * reported through `done`, events and the logger.
 */
export function startRun(goal: Goal | string, config: RunConfigInput, deps: OrchestratorDeps): RunHandle {
  const resolved = resolveRunConfig(config);
  const runGoal = typeof goal === "string" ? createGoal(goal) : goal;
  const orchestrator = new CycleOrchestrator(runGoal, resolved, deps);
  const channel = orchestrator.confirmations;

  return {
    runId: orchestrator.runId,
    goal: orchestrator.goal,
    done: orchestrator.run(),
    state: () => orchestrator.view(),
    emergencyStop: (reason) => orchestrator.triggerEmergency(reason),
    resume: () => orchestrator.resume(),
    abort: () => orchestrator.abort(),
    confirm: (cycle, approved) =>
      channel instanceof ConfirmationBroker ? channel.respond(cycle, approved, orchestrator.runId) : false,
    onPhaseChange: (listener) => orchestrator.onPhaseChange(listener),
  };
}
