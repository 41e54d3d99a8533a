/**
 * Deskpilot - cycle orchestrator for desktop automation agents.
 *
 * Exports:
 * - Types and port interfaces
 * - Run configuration
 * - Safety gate, confirmation broker, emergency stop
 * - Model gateway and the Ollama endpoint
 * - Metrics sinks
 * - Orchestrator and run handle
 */

// Types
export type * from "./types/index.js";
export { ACTION_KINDS } from "./types/index.js";

// Errors
export {
  ConfigError,
  DeskpilotError,
  ModelMalformedResponseError,
  ModelUnavailableError,
  OperationCancelledError,
  OperationTimeoutError,
  PerceptionFailure,
  ReasoningExhaustedError,
  toErrorInfo,
  type ErrorCode,
  type ErrorInfo,
} from "./errors.js";

// Logging
export {
  createLogger,
  createRuntimeLogger,
  createSilentLogger,
  getLogger,
  type LogLevel,
  type LoggerConfig,
  type RuntimeLogger,
} from "./logging/logger.js";

// Configuration
export {
  DEFAULT_DENYLIST,
  DEFAULT_RISK_LEVELS,
  DEFAULT_SAFE_ZONES,
  MAX_TIMER_MS,
  RunConfigSchema,
  TimerMsSchema,
  loadRunConfig,
  resolveRunConfig,
  type RunConfig,
  type RunConfigInput,
} from "./config/schema.js";

// Control
export { backoffDelayMs, runGuarded, sleepWithSignal, type BackoffPolicy, type Guarded } from "./control/guarded.js";
export {
  EmergencyMonitor,
  EmergencyStop,
  emitterSource,
  processSignalSource,
  type TriggerSource,
} from "./control/emergency.js";

// Safety
export {
  SafetyGate,
  evaluate,
  findDenylistMatch,
  isAllowedApp,
  isInsideSafeZone,
  resolveConfirmation,
  riskLevelFor,
  withinRateWindow,
} from "./execution/safety-gate.js";
export { ConfirmationBroker, type ConfirmationListener } from "./execution/confirmation.js";
export type { AuditActionRecord } from "./execution/audit-log.js";

// Reasoning
export { ModelGateway, type GatewayResult } from "./reasoning/gateway.js";
export { parseModelReply, extractJsonObject, ActionProposalSchema } from "./reasoning/reply-schema.js";
export { buildReasoningRequest, renderPrompt, summarizeSnapshot, SYSTEM_PROMPT } from "./reasoning/request.js";
export {
  createOllamaEndpoint,
  DEFAULT_OLLAMA_HOST,
  type FetchLike,
  type OllamaEndpointOptions,
} from "./reasoning/ollama-endpoint.js";

// Metrics
export {
  createJsonlMetricsSink,
  createMemoryMetricsSink,
  fanOutSink,
  summarize,
  type JsonlMetricsSink,
  type MemoryMetricsSink,
  type MetricsSummary,
} from "./metrics/sinks.js";
export { resolveArtifactPath, resolveDeskpilotRoot, writeRunState } from "./orchestrator/artifact-writer.js";

// Orchestrator
export { CycleHistory } from "./orchestrator/history.js";
export { InvalidTransitionError, RunStateMachine, type PhaseTransition } from "./orchestrator/state-machine.js";
export { CycleOrchestrator, type OrchestratorDeps } from "./orchestrator/orchestrator.js";
export { createGoal, startRun, type RunHandle } from "./orchestrator/run.js";

// Convenience wrapper
import type { RunConfigInput } from "./config/schema.js";
import { createJsonlMetricsSink, fanOutSink } from "./metrics/sinks.js";
import type { OrchestratorDeps } from "./orchestrator/orchestrator.js";
import { startRun } from "./orchestrator/run.js";
import type { RunSummary } from "./types/loop.js";

export interface RunDeskpilotOptions extends OrchestratorDeps {
  goal: string;
  /** Run artifacts go under `<workspaceDir>/.deskpilot/runs/<runId>/`. */
  workspaceDir: string;
  config?: RunConfigInput;
}

/**
 * Starts a run that also persists its events, audit records and summary
 * under the workspace, and resolves once everything has been written.
 */
export async function runDeskpilot(options: RunDeskpilotOptions): Promise<RunSummary> {
  const { goal, workspaceDir, config, ...deps } = options;
  const jsonl = createJsonlMetricsSink({ workspaceDir, logger: deps.logger });
  const metrics = deps.metrics ? fanOutSink(deps.metrics, jsonl) : jsonl;

  const handle = startRun(goal, config ?? {}, { ...deps, metrics });
  try {
    return await handle.done;
  } finally {
    await jsonl.flush();
  }
}
