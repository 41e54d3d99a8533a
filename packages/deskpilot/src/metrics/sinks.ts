import { appendJsonLines, resolveArtifactPath, writeRunState } from "../orchestrator/artifact-writer.js";
import { toErrorInfo } from "../errors.js";
import { getLogger, type RuntimeLogger } from "../logging/logger.js";
import type { MetricEvent, MetricEventKind } from "../types/events.js";
import type { MetricsSink } from "../types/ports.js";

export type EndpointStats = {
  attempts: number;
  successes: number;
  meanLatencyMs: number;
};

export type MetricsSummary = {
  events: number;
  byKind: Partial<Record<MetricEventKind, number>>;
  perception: { attempts: number; failures: number };
  endpoints: Record<string, EndpointStats>;
  actions: { succeeded: number; failed: number; cancelled: number };
  cycles: number;
};

export interface MemoryMetricsSink extends MetricsSink {
  events(): MetricEvent[];
  ofKind<K extends MetricEventKind>(kind: K): Array<Extract<MetricEvent, { kind: K }>>;
  summary(): MetricsSummary;
}

export function createMemoryMetricsSink(): MemoryMetricsSink {
  const recorded: MetricEvent[] = [];

  return {
    record(event) {
      recorded.push(event);
    },
    events() {
      return [...recorded];
    },
    ofKind<K extends MetricEventKind>(kind: K) {
      return recorded.filter((event): event is Extract<MetricEvent, { kind: K }> => event.kind === kind);
    },
    summary() {
      return summarize(recorded);
    },
  };
}

export function summarize(events: readonly MetricEvent[]): MetricsSummary {
  const summary: MetricsSummary = {
    events: events.length,
    byKind: {},
    perception: { attempts: 0, failures: 0 },
    endpoints: {},
    actions: { succeeded: 0, failed: 0, cancelled: 0 },
    cycles: 0,
  };

  for (const event of events) {
    summary.byKind[event.kind] = (summary.byKind[event.kind] ?? 0) + 1;

    switch (event.kind) {
      case "PerceptionAttempt":
        summary.perception.attempts += 1;
        if (!event.ok) summary.perception.failures += 1;
        break;
      case "ModelAttempt": {
        const stats = summary.endpoints[event.endpoint] ?? { attempts: 0, successes: 0, meanLatencyMs: 0 };
        stats.meanLatencyMs = (stats.meanLatencyMs * stats.attempts + event.latencyMs) / (stats.attempts + 1);
        stats.attempts += 1;
        if (event.ok) stats.successes += 1;
        summary.endpoints[event.endpoint] = stats;
        break;
      }
      case "ActionAttempt":
        summary.actions[event.status] += 1;
        break;
      case "CycleCompleted":
        summary.cycles += 1;
        break;
      default:
        break;
    }
  }

  return summary;
}

export interface JsonlMetricsSinkOptions {
  workspaceDir: string;
  /** Events held in memory before the oldest are dropped. */
  maxQueue?: number;
  logger?: RuntimeLogger;
}

export interface JsonlMetricsSink extends MetricsSink {
  /** Resolves once every event recorded so far has been written. */
  flush(): Promise<void>;
  readonly dropped: number;
  readonly writeErrors: number;
}

/**
 * Appends events to `.deskpilot/runs/<runId>/events.jsonl` from a background
 * drain started on the next microtask. `record` only enqueues; when the queue
 * is full the oldest event is dropped and counted.
 */
export function createJsonlMetricsSink(options: JsonlMetricsSinkOptions): JsonlMetricsSink {
  const maxQueue = options.maxQueue ?? 1000;
  const logger = (options.logger ?? getLogger()).child({ module: "metrics-jsonl" });
  const queue: MetricEvent[] = [];
  let dropped = 0;
  let writeErrors = 0;
  let draining: Promise<void> | null = null;

  const writeBatch = async (batch: MetricEvent[]) => {
    const byRun = new Map<string, MetricEvent[]>();
    for (const event of batch) {
      const list = byRun.get(event.runId) ?? [];
      list.push(event);
      byRun.set(event.runId, list);
    }

    for (const [runId, events] of byRun) {
      await appendJsonLines(resolveArtifactPath(options.workspaceDir, runId, "events"), events);

      const audits = events.flatMap((event) => (event.kind === "AuditRecorded" ? [event.record] : []));
      await appendJsonLines(resolveArtifactPath(options.workspaceDir, runId, "audit_actions"), audits);

      for (const event of events) {
        if (event.kind === "RunTerminated") {
          await writeRunState(options.workspaceDir, runId, event.summary);
        }
      }
    }
  };

  const drain = async () => {
    while (queue.length > 0) {
      const batch = queue.splice(0, queue.length);
      try {
        await writeBatch(batch);
      } catch (err) {
        writeErrors += 1;
        logger.error("Failed to write metric events", err);
      }
    }
  };

  const schedule = (): Promise<void> | null => {
    if (!draining) {
      draining = Promise.resolve()
        .then(drain)
        .finally(() => {
          draining = null;
          if (queue.length > 0) void schedule();
        });
    }
    return draining;
  };

  return {
    record(event) {
      if (queue.length >= maxQueue) {
        queue.shift();
        dropped += 1;
      }
      queue.push(event);
      void schedule();
    },
    async flush() {
      while (draining || queue.length > 0) {
        await schedule();
      }
    },
    get dropped() {
      return dropped;
    },
    get writeErrors() {
      return writeErrors;
    },
  };
}

/** Forwards each event to every sink; one sink throwing does not starve the rest. */
export function fanOutSink(...sinks: MetricsSink[]): MetricsSink {
  let logger: RuntimeLogger | undefined;

  return {
    record(event) {
      for (const sink of sinks) {
        try {
          sink.record(event);
        } catch (err) {
          if (!logger) logger = getLogger().child({ module: "metrics-fanout" });
          logger.warn("Metrics sink rejected event", { kind: event.kind, error: toErrorInfo(err).message });
        }
      }
    },
  };
}
