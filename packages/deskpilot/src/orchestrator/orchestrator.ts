import { nanoid } from "nanoid";
import type { RunConfig } from "../config/schema.js";
import { EmergencyMonitor, EmergencyStop, type TriggerSource } from "../control/emergency.js";
import { backoffDelayMs, runGuarded, sleepWithSignal } from "../control/guarded.js";
import { OperationCancelledError, OperationTimeoutError, PerceptionFailure, toErrorInfo } from "../errors.js";
import type { AuditActionRecord } from "../execution/audit-log.js";
import { ConfirmationBroker } from "../execution/confirmation.js";
import { riskLevelFor, SafetyGate, withinRateWindow } from "../execution/safety-gate.js";
import { getLogger, type RuntimeLogger } from "../logging/logger.js";
import { ModelGateway } from "../reasoning/gateway.js";
import { buildReasoningRequest, summarizeSnapshot } from "../reasoning/request.js";
import type { ActionProposal, GoalSatisfied } from "../types/action.js";
import type { HistoryEntry } from "../types/context.js";
import type { MetricEvent } from "../types/events.js";
import type { ExecutionResult } from "../types/execution.js";
import type { Goal } from "../types/goal.js";
import type {
  PauseReason,
  RunCounters,
  RunPhase,
  RunStateView,
  RunSummary,
  TerminationReason,
} from "../types/loop.js";
import type { SafetyDecision } from "../types/policy.js";
import type {
  ActionPort,
  ConfirmationChannel,
  ConfirmationOutcome,
  MetricsSink,
  PerceptionPort,
  ReasoningEndpoint,
} from "../types/ports.js";
import type { Snapshot } from "../types/snapshot.js";
import { deepFreeze, frozenCopy } from "../utils/freeze.js";
import { CycleHistory } from "./history.js";
import { RunStateMachine, type PhaseTransition } from "./state-machine.js";

export interface OrchestratorDeps {
  perception: PerceptionPort;
  actions: ActionPort;
  /** Tried in order on every reasoning step. */
  endpoints: readonly ReasoningEndpoint[];
  confirmations?: ConfirmationChannel;
  metrics?: MetricsSink;
  logger?: RuntimeLogger;
  /** External emergency triggers (signals, hotkeys) attached for the run's lifetime. */
  triggerSources?: readonly TriggerSource[];
}

type Termination = { reason: TerminationReason; detail?: string };

/** Outcome of a phase that may end the cycle early. */
type Interrupt = { interrupt: "pause"; reason: PauseReason } | { interrupt: "cancelled" };

type Reasoned = { proposal: ActionProposal } | { completion: GoalSatisfied };

type RunState = {
  cycle: number;
  counters: RunCounters;
  pauseReason: PauseReason | null;
  executed: number;
  failed: number;
  blocked: number;
  executedAtMs: number[];
  highRiskExecuted: number;
  sameActionFailures: Map<string, number>;
};

const noopSink: MetricsSink = { record() {} };

const freshCounters = (): RunCounters => ({
  perceptionFailures: 0,
  reasoningFailures: 0,
  executionFailures: 0,
  consecutiveFailures: 0,
});

function fingerprint(proposal: ActionProposal): string {
  return `${proposal.kind}:${JSON.stringify(proposal.target)}`;
}

/**
 * Drives one run from goal intake to termination. The orchestrator is the
 * only writer of its run state; observers get frozen views and events.
 */
export class CycleOrchestrator {
  readonly runId: string;
  readonly goal: Goal;
  readonly emergency = new EmergencyStop();
  readonly confirmations: ConfirmationChannel;

  private readonly machine = new RunStateMachine();
  private readonly history: CycleHistory;
  private readonly gate: SafetyGate;
  private readonly gateway: ModelGateway;
  private readonly monitor: EmergencyMonitor;
  private readonly logger: RuntimeLogger;
  private readonly metrics: MetricsSink;
  private readonly state: RunState = {
    cycle: 0,
    counters: freshCounters(),
    pauseReason: null,
    executed: 0,
    failed: 0,
    blocked: 0,
    executedAtMs: [],
    highRiskExecuted: 0,
    sameActionFailures: new Map(),
  };
  private pauseWaiter: ((decision: "resume" | "abort") => void) | null = null;
  private started = false;

  constructor(
    goal: Goal,
    private readonly config: RunConfig,
    private readonly deps: OrchestratorDeps,
  ) {
    this.runId = nanoid();
    this.goal = frozenCopy(goal);
    this.logger = (deps.logger ?? getLogger()).child({ module: "orchestrator", runId: this.runId });
    this.metrics = deps.metrics ?? noopSink;
    this.confirmations = deps.confirmations ?? new ConfirmationBroker();
    this.history = new CycleHistory(config.historyLimit);
    this.gate = new SafetyGate({
      riskLevels: config.riskLevels,
      denylist: config.denylist,
      safeZones: config.safeZones,
      limits: config.limits,
      allowedApps: this.goal.constraints.allowedApps,
    });
    this.gateway = new ModelGateway(deps.endpoints, {
      metrics: { record: (event) => this.emit(event) },
      logger: this.logger,
    });
    this.monitor = new EmergencyMonitor(this.emergency, deps.triggerSources ?? [], this.logger);

    this.machine.onTransition((transition) => this.onTransition(transition));
  }

  get phase(): RunPhase {
    return this.machine.getPhase();
  }

  view(): RunStateView {
    return Object.freeze({
      runId: this.runId,
      phase: this.machine.getPhase(),
      cycle: this.state.cycle,
      goal: this.goal,
      emergency: this.emergency.triggered,
      counters: Object.freeze({ ...this.state.counters }),
      pauseReason: this.state.pauseReason,
      history: Object.freeze(this.history.entries()),
    });
  }

  onPhaseChange(listener: (transition: PhaseTransition) => void): () => void {
    return this.machine.onTransition((transition) => {
      try {
        listener(transition);
      } catch (err) {
        this.logger.warn("Phase listener threw", { error: toErrorInfo(err).message });
      }
    });
  }

  triggerEmergency(reason = "operator"): boolean {
    return this.monitor.trigger(reason);
  }

  resume(): boolean {
    if (this.machine.getPhase() !== "paused" || !this.pauseWaiter) return false;
    this.pauseWaiter("resume");
    return true;
  }

  abort(): boolean {
    if (this.machine.getPhase() !== "paused" || !this.pauseWaiter) return false;
    this.pauseWaiter("abort");
    return true;
  }

  async run(): Promise<RunSummary> {
    if (this.started) {
      throw new Error(`Run ${this.runId} already started`);
    }
    this.started = true;
    const startedAt = Date.now();
    this.monitor.start();
    this.logger.info("Run started", { goal: this.goal.text, endpoints: this.gateway.endpointNames });

    let termination: Termination;
    try {
      termination = await this.loop(startedAt);
    } finally {
      this.monitor.dispose();
    }

    return this.finish(termination, startedAt);
  }

  private async loop(startedAt: number): Promise<Termination> {
    for (;;) {
      if (this.emergency.triggered) {
        return { reason: "emergency_stop", detail: this.emergency.reason ?? undefined };
      }

      const outcome = await this.runCycle(startedAt);
      if (outcome === "next") continue;

      if ("pause" in outcome) {
        const decision = await this.pause(outcome.pause);
        if (decision === "resume") continue;
        if (decision === "abort") return { reason: "aborted" };
        return { reason: "emergency_stop", detail: this.emergency.reason ?? undefined };
      }

      return outcome;
    }
  }

  private async runCycle(startedAt: number): Promise<"next" | Termination | { pause: PauseReason }> {
    const cycle = ++this.state.cycle;
    const cycleStartedAt = Date.now();
    const log = this.logger.child({ cycle });
    const emergencyStop = (): Termination => ({
      reason: "emergency_stop",
      detail: this.emergency.reason ?? undefined,
    });

    this.transition("perceiving");
    const snapshot = await this.perceive(cycle, log);
    if ("interrupt" in snapshot) {
      return snapshot.interrupt === "pause" ? { pause: snapshot.reason } : emergencyStop();
    }

    this.transition("reasoning");
    const reasoned = await this.reason(cycle, snapshot, log);
    if ("interrupt" in reasoned) {
      return reasoned.interrupt === "pause" ? { pause: reasoned.reason } : emergencyStop();
    }
    if ("completion" in reasoned) {
      log.info("Goal satisfied", { rationale: reasoned.completion.rationale });
      return { reason: "goal_satisfied", detail: reasoned.completion.rationale };
    }

    const proposal = frozenCopy(reasoned.proposal);
    this.transition("safety_check");
    let decision = this.check(cycle, proposal);

    if (decision.verdict === "pending_confirmation") {
      this.transition("awaiting_confirmation");
      const outcome = await this.awaitConfirmation(cycle, proposal, decision, log);
      decision = this.gate.resolveConfirmation(decision, outcome);
      this.recordDecision(cycle, proposal, decision);
      if (outcome === "cancelled") {
        return emergencyStop();
      }
    }

    const summary = deepFreeze(summarizeSnapshot(snapshot));

    if (decision.verdict === "denied") {
      this.transition("blocked");
      log.warn("Proposal blocked", { kind: proposal.kind, reason: decision.reason });
      this.transition("monitoring");
      return this.monitorCycle(cycle, cycleStartedAt, startedAt, { cycle, snapshot: summary, proposal, decision });
    }

    if (decision.verdict === "approved_with_log") {
      log.info("Approved with log", { kind: proposal.kind, reason: decision.reason, riskLevel: decision.riskLevel });
    }

    this.transition("executing");
    const result = await this.execute(cycle, proposal, decision, log);
    const entry: HistoryEntry = { cycle, snapshot: summary, proposal, decision, result };

    if (result.status === "cancelled") {
      this.history.push(deepFreeze(entry));
      this.emit({
        kind: "CycleCompleted",
        runId: this.runId,
        cycle,
        at: Date.now(),
        outcome: "cancelled",
        durationMs: Date.now() - cycleStartedAt,
      });
      return emergencyStop();
    }

    this.transition("monitoring");
    return this.monitorCycle(cycle, cycleStartedAt, startedAt, entry);
  }

  private async perceive(cycle: number, log: RuntimeLogger): Promise<Snapshot | Interrupt> {
    for (let attempt = 1; ; attempt += 1) {
      const outcome = await runGuarded((options) => this.deps.perception.capture(options), {
        timeoutMs: this.config.timeouts.perceptionMs,
        stop: this.emergency.signal,
      });

      let failure: Error | undefined;
      switch (outcome.status) {
        case "ok":
          break;
        case "timeout":
          failure = new OperationTimeoutError("Perception", this.config.timeouts.perceptionMs);
          break;
        case "cancelled":
          failure = new OperationCancelledError("Perception");
          break;
        case "error":
          failure = new PerceptionFailure(toErrorInfo(outcome.error).message, { cause: outcome.error });
          break;
      }

      this.emit({
        kind: "PerceptionAttempt",
        runId: this.runId,
        cycle,
        at: Date.now(),
        attempt,
        ok: outcome.status === "ok",
        durationMs: outcome.durationMs,
        error: failure?.message,
      });

      if (outcome.status === "ok") {
        this.state.counters.perceptionFailures = 0;
        return outcome.value;
      }
      if (outcome.status === "cancelled") {
        return { interrupt: "cancelled" };
      }

      const counters = this.state.counters;
      counters.perceptionFailures += 1;
      counters.consecutiveFailures += 1;
      if (outcome.status === "error") {
        log.error("Perception failed", failure);
      } else {
        log.warn("Perception timed out", { attempt, timeoutMs: this.config.timeouts.perceptionMs });
      }

      if (counters.perceptionFailures > this.config.maxPerceptionRetries) {
        return { interrupt: "pause", reason: "perception_exhausted" };
      }
      if (counters.consecutiveFailures > this.config.maxConsecutiveFailures) {
        return { interrupt: "pause", reason: "consecutive_failures" };
      }

      const delay = backoffDelayMs(this.config.retryBackoff, counters.perceptionFailures);
      if (!(await sleepWithSignal(delay, this.emergency.signal))) {
        return { interrupt: "cancelled" };
      }
    }
  }

  private async reason(cycle: number, snapshot: Snapshot, log: RuntimeLogger): Promise<Reasoned | Interrupt> {
    const request = buildReasoningRequest({
      runId: this.runId,
      cycle,
      goal: this.goal,
      history: this.history.entries(),
      snapshot,
      historyWindow: this.config.reasoningHistoryWindow,
    });

    for (;;) {
      const result = await this.gateway.invoke(request, this.emergency.signal);

      if (result.status === "cancelled") {
        return { interrupt: "cancelled" };
      }

      if (result.status === "reply") {
        this.state.counters.reasoningFailures = 0;
        log.debug("Model replied", { endpoint: result.endpoint, attempts: result.attempts });
        return result.reply.type === "goal_satisfied"
          ? { completion: result.reply.completion }
          : { proposal: result.reply.proposal };
      }

      const counters = this.state.counters;
      counters.reasoningFailures += 1;
      counters.consecutiveFailures += 1;
      log.warn("Reasoning exhausted every endpoint", { attempts: result.attempts });

      if (counters.reasoningFailures > this.config.maxReasoningRetries) {
        return { interrupt: "pause", reason: "reasoning_exhausted" };
      }
      if (counters.consecutiveFailures > this.config.maxConsecutiveFailures) {
        return { interrupt: "pause", reason: "consecutive_failures" };
      }

      const delay = backoffDelayMs(this.config.retryBackoff, counters.reasoningFailures);
      if (!(await sleepWithSignal(delay, this.emergency.signal))) {
        return { interrupt: "cancelled" };
      }
    }
  }

  private check(cycle: number, proposal: ActionProposal): SafetyDecision {
    const priorFailures = this.state.sameActionFailures.get(fingerprint(proposal)) ?? 0;

    const decision: SafetyDecision =
      priorFailures >= this.config.maxSameActionFailures
        ? {
            verdict: "denied",
            reason: "repeated_failure",
            riskLevel: riskLevelFor(this.config, proposal),
            audit: false,
          }
        : this.gate.evaluate(proposal, {
            executedAtMs: this.state.executedAtMs,
            highRiskExecuted: this.state.highRiskExecuted,
            nowMs: Date.now(),
          });

    this.recordDecision(cycle, proposal, decision);
    return decision;
  }

  private recordDecision(cycle: number, proposal: ActionProposal, decision: SafetyDecision): void {
    this.emit({
      kind: "SafetyDecisionMade",
      runId: this.runId,
      cycle,
      at: Date.now(),
      actionKind: proposal.kind,
      verdict: decision.verdict,
      riskLevel: decision.riskLevel,
      reason: decision.reason,
    });

    if (!decision.audit) return;

    const record: AuditActionRecord = {
      id: nanoid(),
      runId: this.runId,
      cycle,
      atMs: Date.now(),
      proposal,
      decision,
      status:
        decision.verdict === "denied"
          ? "denied"
          : decision.reason === "confirmed_by_operator"
            ? "confirmed"
            : "approved",
    };
    this.emit({ kind: "AuditRecorded", runId: this.runId, cycle, at: record.atMs, record: frozenCopy(record) });
  }

  private async awaitConfirmation(
    cycle: number,
    proposal: ActionProposal,
    decision: SafetyDecision,
    log: RuntimeLogger,
  ): Promise<ConfirmationOutcome> {
    const windowMs = this.config.timeouts.confirmationWindowMs;
    log.info("Awaiting operator confirmation", { kind: proposal.kind, windowMs });

    const guarded = await runGuarded(
      (options) =>
        this.confirmations.request(
          { runId: this.runId, cycle, proposal, reason: decision.reason, requestedAtMs: Date.now() },
          { windowMs, signal: options.signal },
        ),
      { timeoutMs: windowMs, stop: this.emergency.signal },
    );

    let outcome: ConfirmationOutcome;
    switch (guarded.status) {
      case "ok":
        outcome = guarded.value;
        break;
      case "cancelled":
        outcome = "cancelled";
        break;
      case "timeout":
        outcome = "timeout";
        break;
      case "error":
        log.error("Confirmation channel failed", guarded.error);
        outcome = "timeout";
        break;
    }

    this.emit({ kind: "ConfirmationResolved", runId: this.runId, cycle, at: Date.now(), outcome });
    return outcome;
  }

  private async execute(
    cycle: number,
    proposal: ActionProposal,
    decision: SafetyDecision,
    log: RuntimeLogger,
  ): Promise<ExecutionResult> {
    const startedAtMs = Date.now();
    const outcome = await runGuarded((options) => this.deps.actions.execute(proposal, options), {
      timeoutMs: this.config.timeouts.actionMs,
      stop: this.emergency.signal,
    });

    let result: ExecutionResult;
    switch (outcome.status) {
      case "ok":
        result = outcome.value.ok
          ? { status: "succeeded", startedAtMs, durationMs: outcome.durationMs }
          : { status: "failed", reason: outcome.value.reason, startedAtMs, durationMs: outcome.durationMs };
        break;
      case "timeout":
        result = { status: "failed", reason: "timeout", startedAtMs, durationMs: outcome.durationMs };
        break;
      case "error":
        result = {
          status: "failed",
          reason: toErrorInfo(outcome.error).message,
          startedAtMs,
          durationMs: outcome.durationMs,
        };
        break;
      case "cancelled":
        result = { status: "cancelled", reason: "emergency_stop", startedAtMs, durationMs: outcome.durationMs };
        break;
    }

    if (result.status !== "cancelled") {
      this.state.executedAtMs = [...withinRateWindow(this.state.executedAtMs, startedAtMs), startedAtMs];
      if (decision.riskLevel >= 2) this.state.highRiskExecuted += 1;
    }

    if (outcome.status === "error") {
      log.error("Action driver threw", outcome.error);
    } else if (result.status === "failed") {
      log.warn("Action failed", { kind: proposal.kind, reason: result.reason });
    }

    this.emit({
      kind: "ActionAttempt",
      runId: this.runId,
      cycle,
      at: Date.now(),
      actionKind: proposal.kind,
      status: result.status,
      durationMs: result.durationMs,
      reason: result.reason,
    });
    return result;
  }

  private monitorCycle(
    cycle: number,
    cycleStartedAt: number,
    runStartedAt: number,
    entry: HistoryEntry,
  ): "next" | Termination | { pause: PauseReason } {
    this.history.push(deepFreeze(entry));

    const counters = this.state.counters;
    let outcome: "executed" | "failed" | "blocked";
    if (!entry.result) {
      outcome = "blocked";
      this.state.blocked += 1;
    } else if (entry.result.status === "succeeded") {
      outcome = "executed";
      this.state.executed += 1;
      counters.consecutiveFailures = 0;
      counters.executionFailures = 0;
    } else {
      outcome = "failed";
      this.state.failed += 1;
      counters.executionFailures += 1;
      counters.consecutiveFailures += 1;
      const key = fingerprint(entry.proposal);
      this.state.sameActionFailures.set(key, (this.state.sameActionFailures.get(key) ?? 0) + 1);
    }

    this.emit({
      kind: "CycleCompleted",
      runId: this.runId,
      cycle,
      at: Date.now(),
      outcome,
      durationMs: Date.now() - cycleStartedAt,
    });

    if (cycle >= this.config.maxCycles) {
      return { reason: "cycle_budget_exceeded", detail: "max_cycles" };
    }
    if (Date.now() - runStartedAt >= this.config.maxWallClockMs) {
      return { reason: "cycle_budget_exceeded", detail: "wall_clock" };
    }
    if (counters.consecutiveFailures > this.config.maxConsecutiveFailures) {
      return { pause: "consecutive_failures" };
    }

    this.transition("idle");
    return "next";
  }

  private async pause(reason: PauseReason): Promise<"resume" | "abort" | "emergency"> {
    this.state.pauseReason = reason;
    const signal = this.emergency.signal;

    // Installed before entering `paused`: a phase listener may resume or abort synchronously.
    const decision = new Promise<"resume" | "abort" | "emergency">((resolve) => {
      if (signal.aborted) {
        resolve("emergency");
        return;
      }
      const onAbort = () => {
        this.pauseWaiter = null;
        resolve("emergency");
      };
      signal.addEventListener("abort", onAbort, { once: true });
      this.pauseWaiter = (choice) => {
        this.pauseWaiter = null;
        signal.removeEventListener("abort", onAbort);
        resolve(choice);
      };
    });

    this.transition("paused");
    this.emit({ kind: "RunPaused", runId: this.runId, cycle: this.state.cycle, at: Date.now(), reason });
    this.logger.warn("Run paused; waiting for resume or abort", { reason, counters: { ...this.state.counters } });

    const choice = await decision;

    if (choice === "resume") {
      this.state.counters = freshCounters();
      this.state.pauseReason = null;
      this.transition("idle");
      this.emit({ kind: "RunResumed", runId: this.runId, cycle: this.state.cycle, at: Date.now() });
      this.logger.info("Run resumed");
    }
    return choice;
  }

  private finish(termination: Termination, startedAt: number): RunSummary {
    if (this.machine.getPhase() !== "stopped") {
      this.transition("stopped");
    }

    const endedAt = Date.now();
    const { cycle, executed, failed, blocked } = this.state;
    const summary: RunSummary = {
      runId: this.runId,
      goal: this.goal.text,
      reason: termination.reason,
      detail: termination.detail,
      cycles: cycle,
      executed,
      failed,
      blocked,
      completionRate: cycle > 0 ? executed / cycle : 0,
      durationMs: endedAt - startedAt,
      startedAt: new Date(startedAt).toISOString(),
      endedAt: new Date(endedAt).toISOString(),
    };

    this.emit({
      kind: "RunTerminated",
      runId: this.runId,
      cycle,
      at: endedAt,
      reason: termination.reason,
      summary,
    });
    this.logger.info("Run terminated", { reason: termination.reason, detail: termination.detail, cycles: cycle });
    return summary;
  }

  private transition(to: RunPhase): void {
    this.machine.transition(to, this.state.cycle);
  }

  private onTransition(transition: PhaseTransition): void {
    this.emit({
      kind: "PhaseChanged",
      runId: this.runId,
      cycle: transition.cycle,
      at: transition.timestamp,
      from: transition.from,
      to: transition.to,
    });
  }

  private emit(event: MetricEvent): void {
    try {
      this.metrics.record(event);
    } catch (err) {
      this.logger.warn("Metrics sink rejected event", { kind: event.kind, error: toErrorInfo(err).message });
    }
  }
}
