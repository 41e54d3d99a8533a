import type { HistoryEntry, ReasoningRequest } from "../types/context.js";
import type { Goal } from "../types/goal.js";
import type { Snapshot, SnapshotSummary } from "../types/snapshot.js";
import { ACTION_KINDS } from "../types/action.js";

const MAX_SUMMARY_TEXT = 2000;
const MAX_SUMMARY_ELEMENTS = 40;

export function summarizeSnapshot(snapshot: Snapshot): SnapshotSummary {
  const text = snapshot.textRegions
    .map((region) => region.text.trim())
    .filter(Boolean)
    .join("\n");

  return {
    snapshotId: snapshot.id,
    capturedAtMs: snapshot.capturedAtMs,
    text: text.length > MAX_SUMMARY_TEXT ? `${text.slice(0, MAX_SUMMARY_TEXT)}…` : text,
    elementCount: snapshot.elements.length,
    elements: snapshot.elements
      .slice(0, MAX_SUMMARY_ELEMENTS)
      .map(({ id, role, label }) => ({ id, role, label })),
    description: snapshot.description,
  };
}

export function buildReasoningRequest(input: {
  runId: string;
  cycle: number;
  goal: Goal;
  history: readonly HistoryEntry[];
  snapshot: Snapshot;
  historyWindow: number;
}): ReasoningRequest {
  const history = input.historyWindow > 0 ? input.history.slice(-input.historyWindow) : [];
  return {
    runId: input.runId,
    cycle: input.cycle,
    goal: input.goal,
    history,
    snapshot: summarizeSnapshot(input.snapshot),
    image: input.snapshot.image,
  };
}

export const SYSTEM_PROMPT = [
  "You operate a desktop computer one action at a time.",
  "Reply with a single JSON object and nothing else.",
  `To act: {"kind": one of ${ACTION_KINDS.join(", ")}, "target": {...}, "rationale": string, "confidence": 0..1, "riskHint": 0..3}.`,
  'When the goal is already achieved: {"goalSatisfied": true, "rationale": string, "confidence": 0..1}.',
].join("\n");

function describeEntry(entry: HistoryEntry): string {
  const outcome = entry.result
    ? entry.result.status + (entry.result.reason ? ` (${entry.result.reason})` : "")
    : `not executed: ${entry.decision.verdict} (${entry.decision.reason})`;
  return `#${entry.cycle} ${entry.proposal.kind} ${JSON.stringify(entry.proposal.target)} -> ${outcome}`;
}

export function renderPrompt(request: ReasoningRequest): string {
  const lines = [`GOAL: ${request.goal.text}`];

  const notes = request.goal.constraints.notes ?? [];
  if (notes.length > 0) {
    lines.push(`CONSTRAINTS: ${notes.join("; ")}`);
  }

  lines.push("", "RECENT ACTIONS:");
  lines.push(...(request.history.length > 0 ? request.history.map(describeEntry) : ["(none)"]));

  lines.push("", `SCREEN (cycle ${request.cycle}):`);
  if (request.snapshot.description) {
    lines.push(request.snapshot.description);
  }
  lines.push(`Elements (${request.snapshot.elementCount}):`);
  for (const element of request.snapshot.elements) {
    lines.push(`- [${element.id}] ${element.role} "${element.label}"`);
  }
  lines.push("Text:", request.snapshot.text || "(no text)");

  return lines.join("\n");
}
