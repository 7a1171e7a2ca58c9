import { describe, it, expect, afterEach } from "vitest";

import {
  createCompletionCapability,
  resolveLane,
  resolveLlmProvider,
  selectModel,
} from "../src/providers/provider_config";

const TOUCHED = [
  "AUTOAUTH_ENV",
  "AUTOAUTH_MODEL_DEFAULT",
  "AUTOAUTH_MODEL_PROD",
  "LLM_PROVIDER",
  "OPENAI_MODEL",
] as const;

const saved = Object.fromEntries(TOUCHED.map((key) => [key, process.env[key]]));

const setEnv = (key: (typeof TOUCHED)[number], value: string | undefined) => {
  if (value === undefined) {
    delete process.env[key];
  } else {
    process.env[key] = value;
  }
};

describe("selectModel", () => {
  afterEach(() => {
    for (const key of TOUCHED) setEnv(key, saved[key]);
  });

  it("uses lane defaults when no overrides are set", () => {
    for (const key of TOUCHED) setEnv(key, undefined);

    expect(selectModel({ lane: "local", nodeEnv: "development" })).toEqual({
      model: "gpt-4o-mini",
      source: "default",
    });
    expect(selectModel({ lane: "staging" }).model).toBe("gpt-4o");
    expect(selectModel({ lane: "local", defaultModel: "gpt-test-default" }).model).toBe("gpt-test-default");
  });

  it("prefers AUTOAUTH_MODEL_DEFAULT when provided", () => {
    setEnv("AUTOAUTH_MODEL_DEFAULT", "gpt-override");

    const result = selectModel({ lane: "local", defaultModel: "gpt-test-default" });

    expect(result.model).toBe("gpt-override");
    expect(result.source).toBe("env");
  });

  it("reads the per-lane model variable", () => {
    setEnv("AUTOAUTH_MODEL_DEFAULT", undefined);
    setEnv("AUTOAUTH_MODEL_PROD", "gpt-prod-pinned");

    expect(selectModel({ lane: "prod" })).toEqual({ model: "gpt-prod-pinned", source: "env" });
    expect(selectModel({ lane: "dev" }).source).toBe("default");
  });

  it("maps NODE_ENV to a lane when AUTOAUTH_ENV is unset", () => {
    setEnv("AUTOAUTH_ENV", undefined);
    expect(resolveLane("production")).toBe("prod");
    expect(resolveLane("development")).toBe("local");

    setEnv("AUTOAUTH_ENV", "staging");
    expect(resolveLane("production")).toBe("staging");
  });
});

describe("completion provider selection", () => {
  afterEach(() => {
    for (const key of TOUCHED) setEnv(key, saved[key]);
  });

  it("defaults to the fake provider", () => {
    setEnv("LLM_PROVIDER", undefined);

    expect(resolveLlmProvider()).toEqual({ provider: "fake", source: "default" });
    expect(createCompletionCapability().provider).toBe("fake");
  });

  it("builds the OpenAI client when LLM_PROVIDER=openai", () => {
    setEnv("LLM_PROVIDER", "OpenAI");
    setEnv("AUTOAUTH_MODEL_DEFAULT", undefined);
    setEnv("AUTOAUTH_ENV", "local");
    setEnv("OPENAI_MODEL", "gpt-test-model");

    const events: Array<Record<string, unknown>> = [];
    const completion = createCompletionCapability({ logger: { info: (obj) => void events.push(obj) } });

    expect(resolveLlmProvider()).toEqual({ provider: "openai", source: "env" });
    expect(completion.provider).toBe("openai");
    expect(completion.model).toBe("gpt-test-model");
    expect(events[0]).toMatchObject({ evt: "llm.provider.used", provider: "openai", model: "gpt-test-model" });
  });
});
