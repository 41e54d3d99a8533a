import type { ActionProposal } from "../types/action.js";
import type { SafetyDecision } from "../types/policy.js";

export type AuditActionRecord = {
  id: string;
  runId: string;
  cycle: number;
  atMs: number;
  proposal: ActionProposal;
  decision: SafetyDecision;
  status: "approved" | "confirmed" | "denied";
};
