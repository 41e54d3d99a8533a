import { describe, it, expect } from "vitest";
import { ConfigError, ModelMalformedResponseError, ModelUnavailableError } from "../src/errors.js";
import { createOllamaEndpoint, type FetchLike } from "../src/reasoning/ollama-endpoint.js";
import { buildReasoningRequest, renderPrompt, SYSTEM_PROMPT } from "../src/reasoning/request.js";
import { actionReply, makeGoal, makeSnapshot } from "./fakes.js";

type Call = { url: string; body: unknown };

function fakeFetch(reply: { ok?: boolean; status?: number; statusText?: string; body?: unknown } = {}) {
  const calls: Call[] = [];
  const fetch: FetchLike = async (url, init) => {
    calls.push({ url, body: JSON.parse(init.body) });
    return {
      ok: reply.ok ?? true,
      status: reply.status ?? 200,
      statusText: reply.statusText ?? "OK",
      json: async () => reply.body ?? { response: actionReply() },
    };
  };
  return { fetch, calls };
}

const snapshot = makeSnapshot();
const request = buildReasoningRequest({
  runId: "run-1",
  cycle: 1,
  goal: makeGoal(),
  history: [],
  snapshot: { ...snapshot, image: { ...snapshot.image, loadBase64: async () => "aW1hZ2U=" } },
  historyWindow: 5,
});
const call = { timeoutMs: 1_000, signal: new AbortController().signal };

describe("ollama endpoint", () => {
  it("posts a non-streaming JSON generate request", async () => {
    const { fetch, calls } = fakeFetch();
    const endpoint = createOllamaEndpoint({ model: "llama3.2", fetch });

    const raw = await endpoint.infer(request, call);

    expect(raw).toBe(actionReply());
    expect(endpoint.name).toBe("llama3.2");
    expect(endpoint.timeoutMs).toBe(60_000);
    expect(calls).toHaveLength(1);
    expect(calls[0].url).toBe("http://localhost:11434/api/generate");
    expect(calls[0].body).toEqual({
      model: "llama3.2",
      prompt: renderPrompt(request),
      system: SYSTEM_PROMPT,
      stream: false,
      format: "json",
      options: { temperature: 0.2, num_predict: 512 },
    });
  });

  it("attaches the snapshot image for vision models", async () => {
    const { fetch, calls } = fakeFetch();
    const endpoint = createOllamaEndpoint({
      model: "llava",
      name: "vision",
      host: "http://gpu-box:11434/",
      vision: true,
      fetch,
    });

    await endpoint.infer(request, call);

    expect(endpoint.name).toBe("vision");
    expect(calls[0].url).toBe("http://gpu-box:11434/api/generate");
    expect(calls[0].body).toMatchObject({ model: "llava", images: ["aW1hZ2U="] });
  });

  it("reports HTTP errors as an unavailable model", async () => {
    const { fetch } = fakeFetch({ ok: false, status: 500, statusText: "Internal Server Error" });
    const endpoint = createOllamaEndpoint({ model: "llama3.2", fetch });

    const failure = endpoint.infer(request, call);
    await expect(failure).rejects.toBeInstanceOf(ModelUnavailableError);
    await expect(failure).rejects.toThrow("HTTP 500 Internal Server Error");
  });

  it("reports network errors as an unavailable model", async () => {
    const fetch: FetchLike = async () => {
      throw new Error("ECONNREFUSED");
    };
    const endpoint = createOllamaEndpoint({ model: "llama3.2", fetch });

    await expect(endpoint.infer(request, call)).rejects.toThrow("Request to http://localhost:11434 failed");
  });

  it("rejects a timeout outside the timer range", () => {
    expect(() => createOllamaEndpoint({ model: "llama3.2", timeoutMs: 3_000_000_000 })).toThrow(ConfigError);
    expect(() => createOllamaEndpoint({ model: "llama3.2", timeoutMs: 0 })).toThrow(/llama3\.2\.timeoutMs/);
  });

  it("rejects a body without response text", async () => {
    const { fetch } = fakeFetch({ body: { done: true } });
    const endpoint = createOllamaEndpoint({ model: "llama3.2", fetch });

    await expect(endpoint.infer(request, call)).rejects.toBeInstanceOf(ModelMalformedResponseError);
  });
});
