import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
  OpenAICompatibleClient,
  apiKeyEnvVar,
  chatCompletionsUrl,
  resolveApiKey,
} from "../../src/llm/OpenAICompatibleClient.js";
import { ProviderResponseError, TransportError } from "../../src/core/errors.js";
import { chatCompletionBody, textResponse } from "../fixtures/index.js";

const body = {
  messages: [{ role: "user" as const, content: "Hello" }],
  max_tokens: 16,
  n: 1,
  temperature: 1,
  top_p: 1,
  frequency_penalty: 0,
  presence_penalty: 0,
};

describe("OpenAICompatibleClient", () => {
  let originalFetch: typeof global.fetch;

  beforeEach(() => {
    originalFetch = global.fetch;
  });

  afterEach(() => {
    global.fetch = originalFetch;
  });

  describe("helpers", () => {
    it("maps provider hosts to API key variables", () => {
      expect(apiKeyEnvVar("https://api.openai.com/v1")).toBe("OPENAI_API_KEY");
      expect(apiKeyEnvVar("https://api.anthropic.com/v1")).toBe("ANTHROPIC_API_KEY");
      expect(apiKeyEnvVar("https://api.groq.com/openai/v1")).toBe("GROQ_API_KEY");
      expect(apiKeyEnvVar("https://api.x.ai/v1")).toBe("GROK_API_KEY");
      expect(apiKeyEnvVar("http://localhost:8000/v1")).toBe("API_KEY");
    });

    it("prefers an explicit key over the environment", () => {
      const env = { OPENAI_API_KEY: "env-key" };
      expect(resolveApiKey("https://api.openai.com/v1", "test-secret", env)).toBe("test-secret");
      expect(resolveApiKey("https://api.openai.com/v1", undefined, env)).toBe("env-key");
      expect(resolveApiKey("https://llm.test/v1", undefined, env)).toBeUndefined();
    });

    it("does not append /chat/completions twice", () => {
      expect(chatCompletionsUrl("https://llm.test/v1/")).toBe("https://llm.test/v1/chat/completions");
      expect(chatCompletionsUrl("https://llm.test/v1/chat/completions")).toBe(
        "https://llm.test/v1/chat/completions",
      );
    });
  });

  it("posts the body with the model injected and a bearer key", async () => {
    const fetchMock = vi.fn().mockResolvedValue(
      textResponse(200, JSON.stringify(chatCompletionBody("Hi there."))),
    );
    global.fetch = fetchMock;

    const client = new OpenAICompatibleClient(
      { baseUrl: "https://llm.test/v1", model: "test-model", apiKey: "test-secret" },
      {},
    );
    const result = await client.createChatCompletion(body);

    expect(result).toEqual(chatCompletionBody("Hi there."));
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("https://llm.test/v1/chat/completions");
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({
      "Content-Type": "application/json",
      Authorization: "Bearer test-secret",
    });
    expect(JSON.parse(String(init?.body))).toEqual({ ...body, model: "test-model" });
  });

  it("omits Authorization when no key is known", async () => {
    const fetchMock = vi.fn().mockResolvedValue(textResponse(200, "{}"));
    global.fetch = fetchMock;
    const client = new OpenAICompatibleClient({ baseUrl: "https://llm.test/v1", model: "m" }, {});
    await client.createChatCompletion(body);
    expect(fetchMock.mock.calls[0]?.[1]?.headers).toEqual({ "Content-Type": "application/json" });
  });

  it("throws ProviderResponseError with status and body on non-2xx", async () => {
    global.fetch = vi.fn().mockResolvedValue(textResponse(503, "overloaded"));
    const client = new OpenAICompatibleClient({ baseUrl: "https://llm.test/v1", model: "m" }, {});

    const error = await client.createChatCompletion(body).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ProviderResponseError);
    expect(error).toMatchObject({ status: 503, body: "overloaded" });
    expect(error instanceof ProviderResponseError && error.isServerError).toBe(true);
  });

  it("throws TransportError when fetch rejects", async () => {
    global.fetch = vi.fn().mockRejectedValue(new Error("ECONNREFUSED"));
    const client = new OpenAICompatibleClient({ baseUrl: "https://llm.test/v1", model: "m" }, {});
    await expect(client.createChatCompletion(body)).rejects.toThrow(
      new TransportError(
        "https://llm.test/v1/chat/completions",
        "Request to https://llm.test/v1/chat/completions failed: ECONNREFUSED",
      ),
    );
  });

  it("turns an aborted request into a timeout TransportError", async () => {
    global.fetch = vi.fn().mockImplementation(
      (_url: string, init: RequestInit) =>
        new Promise((_resolve, reject) => {
          init.signal?.addEventListener("abort", () => {
            const abort = new Error("aborted");
            abort.name = "AbortError";
            reject(abort);
          });
        }),
    );
    const client = new OpenAICompatibleClient({ baseUrl: "https://llm.test/v1", model: "m" }, {});
    await expect(client.createChatCompletion(body, { timeoutMs: 10 })).rejects.toThrow(
      "Request to https://llm.test/v1/chat/completions timed out after 10ms",
    );
  });

  it("rejects an unparseable 2xx body", async () => {
    global.fetch = vi.fn().mockResolvedValue(textResponse(200, "<html>"));
    const client = new OpenAICompatibleClient({ baseUrl: "https://llm.test/v1", model: "m" }, {});
    await expect(client.createChatCompletion(body)).rejects.toBeInstanceOf(ProviderResponseError);
  });
});
