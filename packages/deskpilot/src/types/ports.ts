import type { ActionProposal } from "./action.js";
import type { ReasoningRequest } from "./context.js";
import type { MetricEvent } from "./events.js";
import type { ActionOutcome } from "./execution.js";
import type { Snapshot } from "./snapshot.js";

export type CallOptions = {
  timeoutMs: number;
  /** Aborted on timeout or emergency stop. */
  signal: AbortSignal;
};

export interface PerceptionPort {
  capture(options: CallOptions): Promise<Snapshot>;
}

export interface ActionPort {
  execute(proposal: ActionProposal, options: CallOptions): Promise<ActionOutcome>;
}

/** One backing model. Returns the raw reply; the gateway does the parsing. */
export interface ReasoningEndpoint {
  readonly name: string;
  readonly timeoutMs: number;
  infer(request: ReasoningRequest, options: CallOptions): Promise<unknown>;
}

export interface MetricsSink {
  record(event: MetricEvent): void;
}

export type ConfirmationRequest = {
  runId: string;
  cycle: number;
  proposal: ActionProposal;
  reason: string;
  requestedAtMs: number;
};

export type ConfirmationOutcome = "approved" | "denied" | "timeout" | "cancelled";

export interface ConfirmationChannel {
  request(
    request: ConfirmationRequest,
    options: { windowMs: number; signal: AbortSignal },
  ): Promise<ConfirmationOutcome>;
}
