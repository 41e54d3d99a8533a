import { describe, it, expect } from "vitest";
import { ConfigError, ModelMalformedResponseError, ModelUnavailableError } from "../src/errors.js";
import { createMemoryMetricsSink } from "../src/metrics/sinks.js";
import { ModelGateway } from "../src/reasoning/gateway.js";
import { buildReasoningRequest } from "../src/reasoning/request.js";
import { ScriptedEndpoint, actionReply, goalSatisfiedReply, makeGoal, makeSnapshot, silentLogger } from "./fakes.js";

const request = buildReasoningRequest({
  runId: "run-1",
  cycle: 1,
  goal: makeGoal(),
  history: [],
  snapshot: makeSnapshot(),
  historyWindow: 5,
});

function setup(...endpoints: ScriptedEndpoint[]) {
  const metrics = createMemoryMetricsSink();
  const gateway = new ModelGateway(endpoints, { metrics, logger: silentLogger });
  return { gateway, metrics };
}

describe("model gateway", () => {
  it("returns the first endpoint's parsed reply", async () => {
    const primary = new ScriptedEndpoint("vision", [actionReply()]);
    const secondary = new ScriptedEndpoint("text", [actionReply()]);
    const { gateway, metrics } = setup(primary, secondary);

    const result = await gateway.invoke(request, new AbortController().signal);

    expect(result.status).toBe("reply");
    expect(result.status === "reply" && result.endpoint).toBe("vision");
    expect(secondary.calls).toBe(0);
    expect(metrics.ofKind("ModelAttempt").map((e) => [e.endpoint, e.outcome])).toEqual([["vision", "reply"]]);
  });

  it("falls back when an endpoint times out", async () => {
    const primary = new ScriptedEndpoint("vision", [{ hangMs: 1_000 }], 20);
    const secondary = new ScriptedEndpoint("text", [goalSatisfiedReply]);
    const { gateway, metrics } = setup(primary, secondary);

    const result = await gateway.invoke(request, new AbortController().signal);

    expect(result).toMatchObject({ status: "reply", endpoint: "text", attempts: 2 });
    expect(result.status === "reply" && result.reply.type).toBe("goal_satisfied");
    expect(metrics.ofKind("ModelAttempt").map((e) => e.outcome)).toEqual(["timeout", "reply"]);
  });

  it("treats a malformed reply as that endpoint's failure", async () => {
    const primary = new ScriptedEndpoint("vision", ["I think you should click somewhere"]);
    const secondary = new ScriptedEndpoint("text", [actionReply()]);
    const { gateway, metrics } = setup(primary, secondary);

    const result = await gateway.invoke(request, new AbortController().signal);

    expect(result.status === "reply" && result.endpoint).toBe("text");
    const [first] = metrics.ofKind("ModelAttempt");
    expect(first).toMatchObject({ endpoint: "vision", ok: false, outcome: "malformed", error: "No JSON object found in reply" });
  });

  it("separates unavailable endpoints from malformed bodies", async () => {
    const down = new ScriptedEndpoint("down", [new ModelUnavailableError("down", "HTTP 503 Service Unavailable")]);
    const garbled = new ScriptedEndpoint("garbled", [new ModelMalformedResponseError("no response text")]);
    const { gateway, metrics } = setup(down, garbled);

    const result = await gateway.invoke(request, new AbortController().signal);

    expect(result.status).toBe("exhausted");
    expect(metrics.ofKind("ModelAttempt").map((e) => e.outcome)).toEqual(["unavailable", "malformed"]);
  });

  it("reports exhaustion once every endpoint failed", async () => {
    const { gateway } = setup(
      new ScriptedEndpoint("a", [new Error("refused")]),
      new ScriptedEndpoint("b", ["{}"]),
    );

    const result = await gateway.invoke(request, new AbortController().signal);

    expect(result.status).toBe("exhausted");
    if (result.status !== "exhausted") return;
    expect(result.attempts).toBe(2);
    expect(result.error.message).toBe("All 2 reasoning endpoints failed");
  });

  it("returns cancelled as soon as the stop signal fires", async () => {
    const primary = new ScriptedEndpoint("vision", [{ hangMs: 5_000 }], 5_000);
    const secondary = new ScriptedEndpoint("text", [actionReply()]);
    const { gateway, metrics } = setup(primary, secondary);
    const stop = new AbortController();
    setTimeout(() => stop.abort(), 10);

    const startedAt = Date.now();
    const result = await gateway.invoke(request, stop.signal);

    expect(result).toEqual({ status: "cancelled", attempts: 1 });
    expect(Date.now() - startedAt).toBeLessThan(1_000);
    expect(secondary.calls).toBe(0);
    expect(metrics.ofKind("ModelAttempt").map((e) => e.outcome)).toEqual(["cancelled"]);
  });

  it("requires at least one endpoint", () => {
    expect(() => setup()).toThrow(ConfigError);
  });

  it("rejects an endpoint timeout a timer cannot hold", () => {
    const slow = new ScriptedEndpoint("slow", [actionReply()], 3_000_000_000);
    expect(() => setup(new ScriptedEndpoint("vision", [actionReply()]), slow)).toThrow(/endpoints\.slow\.timeoutMs/);
  });
});
