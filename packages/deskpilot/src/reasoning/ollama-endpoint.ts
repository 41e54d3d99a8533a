import { z } from "zod";
import { TimerMsSchema } from "../config/schema.js";
import { ConfigError, ModelMalformedResponseError, ModelUnavailableError } from "../errors.js";
import type { ReasoningRequest } from "../types/context.js";
import type { CallOptions, ReasoningEndpoint } from "../types/ports.js";
import { renderPrompt, SYSTEM_PROMPT } from "./request.js";

export type FetchLike = (
  url: string,
  init: { method: string; headers: Record<string, string>; body: string; signal: AbortSignal },
) => Promise<{ ok: boolean; status: number; statusText: string; json(): Promise<unknown> }>;

export interface OllamaEndpointOptions {
  model: string;
  name?: string;
  host?: string;
  timeoutMs?: number;
  /** Attach the snapshot image to the request. */
  vision?: boolean;
  temperature?: number;
  maxTokens?: number;
  system?: string;
  fetch?: FetchLike;
}

const GenerateResponseSchema = z.object({
  response: z.string(),
});

export const DEFAULT_OLLAMA_HOST = "http://localhost:11434";

/** Endpoint backed by an Ollama-compatible `/api/generate` server. */
export function createOllamaEndpoint(options: OllamaEndpointOptions): ReasoningEndpoint {
  const host = (options.host ?? DEFAULT_OLLAMA_HOST).replace(/\/+$/, "");
  const name = options.name ?? options.model;
  const doFetch: FetchLike = options.fetch ?? fetch;
  const timeoutMs = TimerMsSchema.safeParse(options.timeoutMs ?? 60_000);
  if (!timeoutMs.success) {
    throw new ConfigError(timeoutMs.error.issues.map((issue) => `${name}.timeoutMs: ${issue.message}`));
  }

  return {
    name,
    timeoutMs: timeoutMs.data,
    async infer(request: ReasoningRequest, call: CallOptions): Promise<unknown> {
      const payload: Record<string, unknown> = {
        model: options.model,
        prompt: renderPrompt(request),
        system: options.system ?? SYSTEM_PROMPT,
        stream: false,
        format: "json",
        options: {
          temperature: options.temperature ?? 0.2,
          num_predict: options.maxTokens ?? 512,
        },
      };

      if (options.vision && request.image.loadBase64) {
        payload.images = [await request.image.loadBase64()];
      }

      let response: Awaited<ReturnType<FetchLike>>;
      try {
        response = await doFetch(`${host}/api/generate`, {
          method: "POST",
          headers: { "content-type": "application/json" },
          body: JSON.stringify(payload),
          signal: call.signal,
        });
      } catch (err) {
        throw new ModelUnavailableError(name, `Request to ${host} failed`, { cause: err });
      }

      if (!response.ok) {
        throw new ModelUnavailableError(name, `HTTP ${response.status} ${response.statusText}`);
      }

      const body = GenerateResponseSchema.safeParse(await response.json());
      if (!body.success) {
        throw new ModelMalformedResponseError(`${name}: response body has no "response" text`);
      }
      return body.data.response;
    },
  };
}
