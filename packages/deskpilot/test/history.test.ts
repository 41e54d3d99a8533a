import { describe, it, expect } from "vitest";
import { CycleHistory } from "../src/orchestrator/history.js";
import { summarizeSnapshot } from "../src/reasoning/request.js";
import type { HistoryEntry } from "../src/types/context.js";
import { makeSnapshot, proposal } from "./fakes.js";

function entry(cycle: number): HistoryEntry {
  return {
    cycle,
    snapshot: summarizeSnapshot(makeSnapshot(`snap-${cycle}`)),
    proposal: proposal(),
    decision: { verdict: "approved", reason: "risk_level_0", riskLevel: 0, audit: false },
    result: { status: "succeeded", startedAtMs: cycle, durationMs: 1 },
  };
}

describe("cycle history", () => {
  it("keeps entries oldest first until full", () => {
    const history = new CycleHistory(3);
    history.push(entry(1));
    history.push(entry(2));

    expect(history.length).toBe(2);
    expect(history.entries().map((e) => e.cycle)).toEqual([1, 2]);
    expect(history.last()?.cycle).toBe(2);
  });

  it("evicts the oldest entry once capacity is reached", () => {
    const history = new CycleHistory(2);
    history.push(entry(1));
    history.push(entry(2));
    const evicted = history.push(entry(3));

    expect(evicted?.cycle).toBe(1);
    expect(history.length).toBe(2);
    expect(history.entries().map((e) => e.cycle)).toEqual([2, 3]);
  });

  it("returns the most recent entries", () => {
    const history = new CycleHistory(5);
    for (let cycle = 1; cycle <= 5; cycle += 1) history.push(entry(cycle));

    expect(history.recent(2).map((e) => e.cycle)).toEqual([4, 5]);
    expect(history.recent(10)).toHaveLength(5);
    expect(history.recent(0)).toEqual([]);
  });

  it("rejects entries out of cycle order", () => {
    const history = new CycleHistory(3);
    history.push(entry(2));
    expect(() => history.push(entry(2))).toThrow(RangeError);
    expect(() => history.push(entry(1))).toThrow("History entry for cycle 1 arrived after cycle 2");
  });

  it("rejects a non-positive capacity", () => {
    expect(() => new CycleHistory(0)).toThrow(RangeError);
  });

  it("is empty at start", () => {
    const history = new CycleHistory(1);
    expect(history.last()).toBeUndefined();
    expect(history.entries()).toEqual([]);
  });
});
