/**
 * Phase state machine for one run. Enforces the legal phase graph and keeps a
 * bounded transition history for observers.
 *
 * idle -> perceiving -> reasoning -> safety_check
 *   -> executing | awaiting_confirmation | blocked -> monitoring -> idle
 *
 * `stopped` is reachable from every live phase and is final. `paused` is
 * entered on exhausted retries or a failure streak and left by resume or stop.
 */

import type { RunPhase } from "../types/loop.js";

export interface PhaseTransition {
  readonly from: RunPhase;
  readonly to: RunPhase;
  readonly cycle: number;
  readonly timestamp: number;
}

export type TransitionHandler = (transition: PhaseTransition) => void;

const DEFAULT_MAX_HISTORY_SIZE = 200;

const VALID_TRANSITIONS: Readonly<Record<RunPhase, readonly RunPhase[]>> = {
  idle: ["perceiving", "stopped"],
  perceiving: ["reasoning", "paused", "stopped"],
  reasoning: ["safety_check", "paused", "stopped"],
  safety_check: ["executing", "awaiting_confirmation", "blocked", "stopped"],
  awaiting_confirmation: ["executing", "blocked", "stopped"],
  executing: ["monitoring", "stopped"],
  blocked: ["monitoring", "stopped"],
  monitoring: ["idle", "paused", "stopped"],
  paused: ["idle", "stopped"],
  stopped: [],
};

export class InvalidTransitionError extends Error {
  constructor(
    readonly from: RunPhase,
    readonly to: RunPhase,
  ) {
    super(`Invalid phase transition: ${from} -> ${to}`);
    this.name = "InvalidTransitionError";
  }
}

export class RunStateMachine {
  private phase: RunPhase = "idle";
  private readonly history: PhaseTransition[] = [];
  private readonly handlers = new Set<TransitionHandler>();

  constructor(private readonly maxHistorySize = DEFAULT_MAX_HISTORY_SIZE) {}

  getPhase(): RunPhase {
    return this.phase;
  }

  getHistory(): readonly PhaseTransition[] {
    return this.history;
  }

  canTransition(to: RunPhase): boolean {
    return VALID_TRANSITIONS[this.phase].includes(to);
  }

  transition(to: RunPhase, cycle: number): PhaseTransition {
    if (!this.canTransition(to)) {
      throw new InvalidTransitionError(this.phase, to);
    }

    const record: PhaseTransition = { from: this.phase, to, cycle, timestamp: Date.now() };
    this.phase = to;
    this.history.push(record);
    if (this.history.length > this.maxHistorySize) {
      this.history.shift();
    }

    for (const handler of this.handlers) {
      handler(record);
    }
    return record;
  }

  onTransition(handler: TransitionHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }
}
