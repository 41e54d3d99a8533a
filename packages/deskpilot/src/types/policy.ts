import type { ActionKind } from "./action.js";

export type RiskLevel = 0 | 1 | 2 | 3;

export type RiskTable = Readonly<Record<ActionKind, RiskLevel>>;

export type SafetyVerdict = "approved" | "approved_with_log" | "pending_confirmation" | "denied";

export type SafetyDecision = {
  verdict: SafetyVerdict;
  reason: string;
  riskLevel: RiskLevel;
  /** Level 2 approvals and confirmation outcomes go to the audit log. */
  audit: boolean;
};

export type SafetyLimits = {
  maxActionsPerMinute?: number;
  maxHighRiskPerRun?: number;
};

export type SafetyPolicy = {
  riskLevels: RiskTable;
  denylist: readonly string[];
  safeZones: readonly string[];
  limits: SafetyLimits;
  /** Apps an `app_launch` may start; empty or absent allows any. */
  allowedApps?: readonly string[];
};

export type SafetyStats = {
  /** Execution start times (ms) of actions in this run. */
  executedAtMs: readonly number[];
  highRiskExecuted: number;
  nowMs: number;
};
