export type ErrorCode =
  | "perception_failure"
  | "model_unavailable"
  | "model_malformed_response"
  | "reasoning_exhausted"
  | "config_invalid"
  | "timeout"
  | "cancelled";

export interface ErrorInfo {
  code: string;
  message: string;
}

export class DeskpilotError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DeskpilotError";
    this.code = code;
  }
}

export class PerceptionFailure extends DeskpilotError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("perception_failure", message, options);
    this.name = "PerceptionFailure";
  }
}

export class ModelUnavailableError extends DeskpilotError {
  readonly endpoint: string;

  constructor(endpoint: string, message: string, options?: { cause?: unknown }) {
    super("model_unavailable", message, options);
    this.name = "ModelUnavailableError";
    this.endpoint = endpoint;
  }
}

export class ModelMalformedResponseError extends DeskpilotError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("model_malformed_response", message, options);
    this.name = "ModelMalformedResponseError";
  }
}

export class ReasoningExhaustedError extends DeskpilotError {
  readonly attempts: number;

  constructor(attempts: number) {
    super("reasoning_exhausted", `All ${attempts} reasoning endpoints failed`);
    this.name = "ReasoningExhaustedError";
    this.attempts = attempts;
  }
}

export class ConfigError extends DeskpilotError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("config_invalid", `Invalid run configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export class OperationTimeoutError extends DeskpilotError {
  constructor(label: string, timeoutMs: number) {
    super("timeout", `${label} timed out after ${timeoutMs}ms`);
    this.name = "OperationTimeoutError";
  }
}

export class OperationCancelledError extends DeskpilotError {
  constructor(label: string) {
    super("cancelled", `${label} cancelled`);
    this.name = "OperationCancelledError";
  }
}

export function toErrorInfo(err: unknown): ErrorInfo {
  if (err instanceof DeskpilotError) {
    return { code: err.code, message: err.message };
  }
  if (err instanceof Error) {
    return { code: err.name || "error", message: err.message };
  }
  return { code: "error", message: String(err) };
}
