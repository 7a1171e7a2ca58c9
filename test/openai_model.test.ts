import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { createMessage } from "../src/contracts/conversation";
import { EVALUATOR_VERDICT_JSON_SCHEMA } from "../src/contracts/verdict";
import { DETERMINISTIC_GENERATION } from "../src/control-plane/agents";
import {
  extractResponseText,
  OpenAICompletion,
  OpenAIProviderError,
  parseRetryAfterMs,
} from "../src/providers/openai_model";
import type { CompletionRequest } from "../src/providers/completion";

type Captured = { url: string; init?: RequestInit };

function stubFetch(response: () => Response, calls: Captured[]): typeof fetch {
  return async (input, init) => {
    calls.push({ url: String(input), init });
    return response();
  };
}

const jsonResponse = (body: unknown, status = 200, headers: Record<string, string> = {}) =>
  new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json", ...headers },
  });

const request: CompletionRequest = {
  instructions: "Evaluate the candidates.",
  generation: DETERMINISTIC_GENERATION,
  history: [createMessage({ role: "user", authorName: "user", content: "metadata", ordinal: 0 })],
  responseFormat: { type: "json_schema", name: "evaluator_verdict", schema: EVALUATOR_VERDICT_JSON_SCHEMA },
};

const captureError = (promise: Promise<unknown>) => promise.then(
  () => null,
  (error: unknown) => (error instanceof OpenAIProviderError ? error : null)
);

describe("OpenAICompletion", () => {
  const previousKey = process.env.OPENAI_API_KEY;

  beforeEach(() => {
    delete process.env.OPENAI_API_KEY;
  });

  afterEach(() => {
    if (previousKey === undefined) {
      delete process.env.OPENAI_API_KEY;
    } else {
      process.env.OPENAI_API_KEY = previousKey;
    }
  });

  it("refuses to call without an API key", async () => {
    const calls: Captured[] = [];
    const client = new OpenAICompletion({ model: "gpt-test", fetchImpl: stubFetch(() => jsonResponse({}), calls) });

    const error = await captureError(client.complete(request));

    expect(error?.message).toBe("OPENAI_API_KEY missing");
    expect(error?.retryable).toBe(false);
    expect(error?.statusCode).toBe(500);
    expect(calls).toHaveLength(0);
  });

  it("posts a strict structured-output request to the Responses API", async () => {
    const calls: Captured[] = [];
    const client = new OpenAICompletion({
      model: "gpt-test",
      apiKey: "test-secret",
      baseUrl: "http://llm.test/v1",
      fetchImpl: stubFetch(
        () => jsonResponse({ output: [{ content: [{ type: "output_text", text: "{\"ok\":true}" }] }] }),
        calls
      ),
    });

    const text = await client.complete(request);

    expect(text).toBe("{\"ok\":true}");
    expect(calls).toHaveLength(1);
    expect(calls[0].url).toBe("http://llm.test/v1/responses");
    expect(new Headers(calls[0].init?.headers).get("authorization")).toBe("Bearer test-secret");

    const body = JSON.parse(String(calls[0].init?.body));
    expect(body).toMatchObject({
      model: "gpt-test",
      store: false,
      stream: false,
      instructions: "Evaluate the candidates.",
      temperature: 0,
      top_p: 1,
      max_output_tokens: 800,
      text: { format: { type: "json_schema", name: "evaluator_verdict", strict: true } },
    });
    expect(body.text.format.schema.additionalProperties).toBe(false);
    expect(body.input).toBe(
      "## Conversation so far (user)\n(no earlier turns)\n\n## Latest message (user)\n[0] user (user):\nmetadata"
    );
  });

  it("marks rate limits retryable and reads retry-after", async () => {
    const client = new OpenAICompletion({
      model: "gpt-test",
      apiKey: "test-secret",
      fetchImpl: stubFetch(
        () => jsonResponse({ error: { type: "rate_limit_error", message: "slow down" } }, 429, { "retry-after": "2" }),
        []
      ),
    });

    const error = await captureError(client.complete(request));

    expect(error?.statusCode).toBe(429);
    expect(error?.retryable).toBe(true);
    expect(error?.retryAfterMs).toBe(2000);
    expect(error?.message).toBe("OpenAI error 429: slow down");
  });

  it("does not retry invalid requests", async () => {
    const client = new OpenAICompletion({
      model: "gpt-test",
      apiKey: "test-secret",
      fetchImpl: stubFetch(
        () => jsonResponse({ error: { type: "invalid_request_error", code: "bad_schema", message: "schema rejected" } }, 400),
        []
      ),
    });

    const error = await captureError(client.complete(request));

    expect(error?.retryable).toBe(false);
    expect(error?.errorType).toBe("invalid_request_error");
    expect(error?.errorCode).toBe("bad_schema");
  });

  it("treats a response without text as retryable", async () => {
    const client = new OpenAICompletion({
      model: "gpt-test",
      apiKey: "test-secret",
      fetchImpl: stubFetch(() => jsonResponse({ output: [] }), []),
    });

    const error = await captureError(client.complete(request));

    expect(error?.message).toBe("OpenAI response missing content");
    expect(error?.retryable).toBe(true);
    expect(error?.statusCode).toBe(502);
  });
});

describe("OpenAI helpers", () => {
  it("parses retry-after as seconds or as a date", () => {
    const now = Date.parse("2026-01-01T00:00:00Z");
    expect(parseRetryAfterMs("1.5", now)).toBe(1500);
    expect(parseRetryAfterMs("Thu, 01 Jan 2026 00:00:05 GMT", now)).toBe(5000);
    expect(parseRetryAfterMs("later", now)).toBeUndefined();
    expect(parseRetryAfterMs(null, now)).toBeUndefined();
  });

  it("falls back to output_text", () => {
    expect(extractResponseText({ output_text: "plain" })).toBe("plain");
    expect(extractResponseText({ output: [{ content: [{ text: "" }] }] })).toBeUndefined();
  });
});
