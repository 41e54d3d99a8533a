export type ExecutionStatus = "succeeded" | "failed" | "cancelled";

export type ExecutionResult = {
  status: ExecutionStatus;
  reason?: string;
  startedAtMs: number;
  durationMs: number;
};

/** What an action driver reports back. */
export type ActionOutcome = { ok: true; detail?: string } | { ok: false; reason: string };
