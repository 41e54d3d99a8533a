import type { ActionProposal, FileOperation } from "../types/action.js";
import type { ConfirmationOutcome } from "../types/ports.js";
import type { RiskLevel, SafetyDecision, SafetyPolicy, SafetyStats } from "../types/policy.js";

const RATE_WINDOW_MS = 60_000;

const DESTRUCTIVE_OPERATIONS = new Set<FileOperation>(["delete", "move", "format"]);

export function riskLevelFor(policy: SafetyPolicy, proposal: ActionProposal): RiskLevel {
  const configured = policy.riskLevels[proposal.kind] ?? 3;
  const hint = proposal.riskHint ?? 0;
  return hint > configured ? hint : configured;
}

function scannableText(proposal: ActionProposal): string {
  const { target } = proposal;
  return [
    proposal.rationale,
    target.description,
    target.text,
    target.command,
    target.path,
    target.app,
    target.keys?.join(" "),
  ]
    .filter((part): part is string => typeof part === "string" && part.length > 0)
    .join("\n")
    .toLowerCase();
}

export function findDenylistMatch(denylist: readonly string[], proposal: ActionProposal): string | null {
  const text = scannableText(proposal);
  for (const term of denylist) {
    if (text.includes(term.toLowerCase())) {
      return term;
    }
  }
  return null;
}

/** Zones with a separator are path prefixes; bare names match any path segment. */
export function isInsideSafeZone(path: string, zones: readonly string[]): boolean {
  const normalized = path.replace(/\\/g, "/").toLowerCase();
  const segments = normalized.split("/").filter(Boolean);
  return zones.some((zone) => {
    const z = zone.replace(/\\/g, "/").toLowerCase();
    return z.includes("/") ? normalized.startsWith(z) : segments.includes(z);
  });
}

export function isAllowedApp(app: string, allowed: readonly string[]): boolean {
  const name = app.trim().toLowerCase();
  return allowed.some((entry) => entry.trim().toLowerCase() === name);
}

/** Execution times that still count toward the per-minute rate at `nowMs`. */
export function withinRateWindow(executedAtMs: readonly number[], nowMs: number): number[] {
  return executedAtMs.filter((at) => nowMs - at < RATE_WINDOW_MS);
}

function enforceLimits(policy: SafetyPolicy, level: RiskLevel, stats: SafetyStats | undefined): SafetyDecision | null {
  const limits = policy.limits;
  if (!stats) return null;

  if (limits.maxActionsPerMinute != null) {
    const recent = withinRateWindow(stats.executedAtMs, stats.nowMs).length;
    if (recent >= limits.maxActionsPerMinute) {
      return { verdict: "denied", reason: "rate_limited", riskLevel: level, audit: false };
    }
  }

  if (limits.maxHighRiskPerRun != null && level >= 2) {
    if (stats.highRiskExecuted >= limits.maxHighRiskPerRun) {
      return { verdict: "denied", reason: "max_high_risk_per_run", riskLevel: level, audit: false };
    }
  }

  return null;
}

export function evaluate(policy: SafetyPolicy, proposal: ActionProposal, stats?: SafetyStats): SafetyDecision {
  const level = riskLevelFor(policy, proposal);

  const term = findDenylistMatch(policy.denylist, proposal);
  if (term !== null) {
    return { verdict: "denied", reason: `denylist:${term}`, riskLevel: level, audit: true };
  }

  const { target } = proposal;
  if (
    proposal.kind === "app_launch" &&
    policy.allowedApps !== undefined &&
    policy.allowedApps.length > 0 &&
    !isAllowedApp(target.app ?? "", policy.allowedApps)
  ) {
    return { verdict: "denied", reason: "app_not_allowed", riskLevel: level, audit: true };
  }

  if (
    proposal.kind === "file_operation" &&
    policy.safeZones.length > 0 &&
    target.operation !== undefined &&
    DESTRUCTIVE_OPERATIONS.has(target.operation) &&
    !isInsideSafeZone(target.path ?? "", policy.safeZones)
  ) {
    return { verdict: "denied", reason: "unsafe_location", riskLevel: level, audit: true };
  }

  const limitDecision = enforceLimits(policy, level, stats);
  if (limitDecision) return limitDecision;

  switch (level) {
    case 0:
      return { verdict: "approved", reason: "risk_level_0", riskLevel: level, audit: false };
    case 1:
      return { verdict: "approved_with_log", reason: "risk_level_1", riskLevel: level, audit: false };
    case 2:
      return { verdict: "approved_with_log", reason: "risk_level_2", riskLevel: level, audit: true };
    case 3:
      return { verdict: "pending_confirmation", reason: "confirmation_required", riskLevel: level, audit: false };
  }
}

/** Turns a pending decision into its final form. Anything but an explicit approval is a denial. */
export function resolveConfirmation(pending: SafetyDecision, outcome: ConfirmationOutcome): SafetyDecision {
  switch (outcome) {
    case "approved":
      return { verdict: "approved_with_log", reason: "confirmed_by_operator", riskLevel: pending.riskLevel, audit: true };
    case "denied":
      return { verdict: "denied", reason: "denied_by_operator", riskLevel: pending.riskLevel, audit: true };
    case "timeout":
      return { verdict: "denied", reason: "confirmation_timeout", riskLevel: pending.riskLevel, audit: true };
    case "cancelled":
      return { verdict: "denied", reason: "emergency_stop", riskLevel: pending.riskLevel, audit: true };
  }
}

export class SafetyGate {
  constructor(private readonly policy: SafetyPolicy) {}

  evaluate(proposal: ActionProposal, stats?: SafetyStats): SafetyDecision {
    return evaluate(this.policy, proposal, stats);
  }

  resolveConfirmation(pending: SafetyDecision, outcome: ConfirmationOutcome): SafetyDecision {
    return resolveConfirmation(pending, outcome);
  }
}
