import { TimerMsSchema } from "../config/schema.js";
import { runGuarded } from "../control/guarded.js";
import {
  ConfigError,
  ModelMalformedResponseError,
  ReasoningExhaustedError,
  toErrorInfo,
} from "../errors.js";
import type { RuntimeLogger } from "../logging/logger.js";
import type { ModelReply } from "../types/action.js";
import type { ReasoningRequest } from "../types/context.js";
import type { ModelAttemptEvent } from "../types/events.js";
import type { MetricsSink, ReasoningEndpoint } from "../types/ports.js";
import { parseModelReply } from "./reply-schema.js";

export type GatewayResult =
  | { status: "reply"; reply: ModelReply; endpoint: string; attempts: number }
  | { status: "exhausted"; error: ReasoningExhaustedError; attempts: number }
  | { status: "cancelled"; attempts: number };

export interface ModelGatewayDeps {
  metrics: MetricsSink;
  logger: RuntimeLogger;
}

/**
 * Ordered fallback over reasoning endpoints. Each endpoint gets its own
 * deadline; a timeout, an error or an unparseable reply moves on to the next
 * one. Every attempt is reported as a ModelAttempt event.
 */
export class ModelGateway {
  private readonly endpoints: readonly ReasoningEndpoint[];

  constructor(
    endpoints: readonly ReasoningEndpoint[],
    private readonly deps: ModelGatewayDeps,
  ) {
    if (endpoints.length === 0) {
      throw new ConfigError(["endpoints: at least one reasoning endpoint is required"]);
    }
    const issues = endpoints.flatMap((endpoint) => {
      const parsed = TimerMsSchema.safeParse(endpoint.timeoutMs);
      if (parsed.success) return [];
      return parsed.error.issues.map((issue) => `endpoints.${endpoint.name}.timeoutMs: ${issue.message}`);
    });
    if (issues.length > 0) {
      throw new ConfigError(issues);
    }
    this.endpoints = [...endpoints];
  }

  get endpointNames(): string[] {
    return this.endpoints.map((endpoint) => endpoint.name);
  }

  async invoke(request: ReasoningRequest, stop: AbortSignal): Promise<GatewayResult> {
    let attempts = 0;

    for (const endpoint of this.endpoints) {
      if (stop.aborted) {
        return { status: "cancelled", attempts };
      }

      attempts += 1;
      const outcome = await runGuarded((options) => endpoint.infer(request, options), {
        timeoutMs: endpoint.timeoutMs,
        stop,
      });

      const base = {
        kind: "ModelAttempt",
        runId: request.runId,
        cycle: request.cycle,
        endpoint: endpoint.name,
        latencyMs: outcome.durationMs,
      } as const;

      if (outcome.status === "cancelled") {
        this.report({ ...base, at: Date.now(), ok: false, outcome: "cancelled" });
        return { status: "cancelled", attempts };
      }

      if (outcome.status === "timeout") {
        this.report({ ...base, at: Date.now(), ok: false, outcome: "timeout" });
        this.deps.logger.warn("Model endpoint timed out", {
          endpoint: endpoint.name,
          timeoutMs: endpoint.timeoutMs,
        });
        continue;
      }

      if (outcome.status === "error") {
        const info = toErrorInfo(outcome.error);
        const malformed = outcome.error instanceof ModelMalformedResponseError;
        this.report({
          ...base,
          at: Date.now(),
          ok: false,
          outcome: malformed ? "malformed" : "unavailable",
          error: info.message,
        });
        this.deps.logger.warn("Model endpoint unavailable", { endpoint: endpoint.name, error: info.message });
        continue;
      }

      let reply: ModelReply;
      try {
        reply = parseModelReply(outcome.value);
      } catch (err) {
        if (!(err instanceof ModelMalformedResponseError)) throw err;
        this.report({ ...base, at: Date.now(), ok: false, outcome: "malformed", error: err.message });
        this.deps.logger.debug("Discarding malformed model reply", { endpoint: endpoint.name, error: err.message });
        continue;
      }

      this.report({ ...base, at: Date.now(), ok: true, outcome: "reply" });
      return { status: "reply", reply, endpoint: endpoint.name, attempts };
    }

    return { status: "exhausted", error: new ReasoningExhaustedError(attempts), attempts };
  }

  private report(event: ModelAttemptEvent): void {
    this.deps.metrics.record(event);
  }
}
