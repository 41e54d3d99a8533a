import { describe, it, expect } from "vitest";
import { buildReasoningRequest, renderPrompt, summarizeSnapshot } from "../src/reasoning/request.js";
import type { HistoryEntry } from "../src/types/context.js";
import type { UiElement } from "../src/types/snapshot.js";
import { makeGoal, makeSnapshot, proposal } from "./fakes.js";

function entry(cycle: number, overrides: Partial<HistoryEntry> = {}): HistoryEntry {
  return {
    cycle,
    snapshot: summarizeSnapshot(makeSnapshot()),
    proposal: proposal(),
    decision: { verdict: "approved", reason: "risk_level_0", riskLevel: 0, audit: false },
    result: { status: "succeeded", startedAtMs: 0, durationMs: 5 },
    ...overrides,
  };
}

describe("snapshot summary", () => {
  it("joins the non-empty text regions", () => {
    const snapshot = makeSnapshot();
    snapshot.textRegions.push({ text: "   ", bounds: { x: 0, y: 0, width: 1, height: 1 }, confidence: 1 });
    snapshot.textRegions.push({ text: " Budget.xlsx ", bounds: { x: 0, y: 0, width: 1, height: 1 }, confidence: 1 });

    const summary = summarizeSnapshot(snapshot);
    expect(summary.text).toBe("Report.docx\nBudget.xlsx");
    expect(summary.elements).toEqual([{ id: "icon-report", role: "icon", label: "Report.docx" }]);
  });

  it("truncates long text and element lists", () => {
    const element: UiElement = { id: "e", role: "button", label: "OK", bounds: { x: 0, y: 0, width: 1, height: 1 } };
    const snapshot = {
      ...makeSnapshot("big", "a".repeat(2_500)),
      elements: Array.from({ length: 45 }, (_, i) => ({ ...element, id: `e${i}` })),
    };

    const summary = summarizeSnapshot(snapshot);
    expect(summary.text).toHaveLength(2_001);
    expect(summary.text.endsWith("…")).toBe(true);
    expect(summary.elementCount).toBe(45);
    expect(summary.elements).toHaveLength(40);
  });
});

describe("reasoning request", () => {
  it("keeps only the configured history window", () => {
    const history = [entry(1), entry(2), entry(3)];
    const input = { runId: "run-1", cycle: 4, goal: makeGoal(), history, snapshot: makeSnapshot() };

    expect(buildReasoningRequest({ ...input, historyWindow: 2 }).history.map((e) => e.cycle)).toEqual([2, 3]);
    expect(buildReasoningRequest({ ...input, historyWindow: 0 }).history).toEqual([]);
  });

  it("renders goal, history and screen into the prompt", () => {
    const history = [
      entry(1),
      entry(2, {
        proposal: proposal({ kind: "system_command", target: { command: "sudo ls" } }),
        decision: { verdict: "denied", reason: "denylist:sudo", riskLevel: 3, audit: true },
        result: undefined,
      }),
      entry(3, { result: { status: "failed", reason: "timeout", startedAtMs: 0, durationMs: 200 } }),
    ];
    const request = buildReasoningRequest({
      runId: "run-1",
      cycle: 4,
      goal: { ...makeGoal(), constraints: { notes: ["Do not close other windows"] } },
      history,
      snapshot: makeSnapshot(),
      historyWindow: 5,
    });

    expect(renderPrompt(request).split("\n")).toEqual([
      "GOAL: Open the report on the desktop",
      "CONSTRAINTS: Do not close other windows",
      "",
      "RECENT ACTIONS:",
      '#1 double_click {"point":{"x":32,"y":32},"description":"report icon"} -> succeeded',
      '#2 system_command {"command":"sudo ls"} -> not executed: denied (denylist:sudo)',
      '#3 double_click {"point":{"x":32,"y":32},"description":"report icon"} -> failed (timeout)',
      "",
      "SCREEN (cycle 4):",
      "Elements (1):",
      '- [icon-report] icon "Report.docx"',
      "Text:",
      "Report.docx",
    ]);
  });

  it("says so when there is no history yet", () => {
    const request = buildReasoningRequest({
      runId: "run-1",
      cycle: 1,
      goal: makeGoal(),
      history: [],
      snapshot: { ...makeSnapshot(), description: "A desktop with one file" },
      historyWindow: 5,
    });

    const lines = renderPrompt(request).split("\n");
    expect(lines.slice(2, 7)).toEqual(["RECENT ACTIONS:", "(none)", "", "SCREEN (cycle 1):", "A desktop with one file"]);
  });
});
