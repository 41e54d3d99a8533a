import type { AuditActionRecord } from "../execution/audit-log.js";
import type { ActionKind } from "./action.js";
import type { ExecutionStatus } from "./execution.js";
import type { PauseReason, RunPhase, RunSummary, TerminationReason } from "./loop.js";
import type { RiskLevel, SafetyVerdict } from "./policy.js";

type EventBase = {
  runId: string;
  cycle: number;
  at: number;
};

export type PerceptionAttemptEvent = EventBase & {
  kind: "PerceptionAttempt";
  attempt: number;
  ok: boolean;
  durationMs: number;
  error?: string;
};

export type ModelAttemptEvent = EventBase & {
  kind: "ModelAttempt";
  endpoint: string;
  ok: boolean;
  outcome: "reply" | "timeout" | "unavailable" | "malformed" | "cancelled";
  latencyMs: number;
  error?: string;
};

export type SafetyDecisionEvent = EventBase & {
  kind: "SafetyDecisionMade";
  actionKind: ActionKind;
  verdict: SafetyVerdict;
  riskLevel: RiskLevel;
  reason: string;
};

export type ConfirmationResolvedEvent = EventBase & {
  kind: "ConfirmationResolved";
  outcome: "approved" | "denied" | "timeout" | "cancelled";
};

export type ActionAttemptEvent = EventBase & {
  kind: "ActionAttempt";
  actionKind: ActionKind;
  status: ExecutionStatus;
  durationMs: number;
  reason?: string;
};

export type AuditRecordedEvent = EventBase & {
  kind: "AuditRecorded";
  record: AuditActionRecord;
};

export type CycleCompletedEvent = EventBase & {
  kind: "CycleCompleted";
  outcome: "executed" | "failed" | "blocked" | "cancelled";
  durationMs: number;
};

export type PhaseChangedEvent = EventBase & {
  kind: "PhaseChanged";
  from: RunPhase;
  to: RunPhase;
};

export type RunPausedEvent = EventBase & {
  kind: "RunPaused";
  reason: PauseReason;
};

export type RunResumedEvent = EventBase & {
  kind: "RunResumed";
};

export type RunTerminatedEvent = EventBase & {
  kind: "RunTerminated";
  reason: TerminationReason;
  summary: RunSummary;
};

export type MetricEvent =
  | PerceptionAttemptEvent
  | ModelAttemptEvent
  | SafetyDecisionEvent
  | ConfirmationResolvedEvent
  | ActionAttemptEvent
  | AuditRecordedEvent
  | CycleCompletedEvent
  | PhaseChangedEvent
  | RunPausedEvent
  | RunResumedEvent
  | RunTerminatedEvent;

export type MetricEventKind = MetricEvent["kind"];
