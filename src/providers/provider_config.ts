import { config as loadEnv } from "dotenv";

import type { CompletionCapability, ProviderLogger } from "./completion";
import { FakeCompletion } from "./fake_model";
import { OpenAICompletion } from "./openai_model";

if (process.env.NODE_ENV !== "production") {
  loadEnv();
}

export type ModelSelection = {
  model: string;
  source: "default" | "env";
};

type SelectModelArgs = {
  lane?: string;
  nodeEnv?: string;
  defaultModel?: string;
};

const DEFAULTS_BY_LANE: Record<string, string> = {
  local: "gpt-4o-mini",
  dev: "gpt-4o-mini",
  staging: "gpt-4o",
  prod: "gpt-4o",
};

export function resolveLane(nodeEnv?: string): string {
  const lane = process.env.AUTOAUTH_ENV ?? "";
  if (lane) return lane;
  if (nodeEnv === "production") return "prod";
  return "local";
}

export function selectModel(args: SelectModelArgs = {}): ModelSelection {
  const lane = args.lane ?? resolveLane(args.nodeEnv);

  const envDefault = process.env.AUTOAUTH_MODEL_DEFAULT;
  const envByLane: Record<string, string | undefined> = {
    local: process.env.AUTOAUTH_MODEL_LOCAL,
    dev: process.env.AUTOAUTH_MODEL_DEV,
    staging: process.env.AUTOAUTH_MODEL_STAGING,
    prod: process.env.AUTOAUTH_MODEL_PROD,
  };
  const envLane = envByLane[lane];

  const laneDefault = DEFAULTS_BY_LANE[lane] ?? DEFAULTS_BY_LANE.local;
  const model = envDefault || envLane || args.defaultModel || laneDefault;
  const source: ModelSelection["source"] = envDefault || envLane ? "env" : "default";

  return { model, source };
}

export type LlmProvider = "openai" | "fake";

export function resolveLlmProvider(): { provider: LlmProvider; source: "env" | "default" } {
  const raw = process.env.LLM_PROVIDER;
  const provider: LlmProvider = (raw ?? "fake").toLowerCase() === "openai" ? "openai" : "fake";
  return { provider, source: raw ? "env" : "default" };
}

export function createCompletionCapability(args: {
  logger?: ProviderLogger;
} = {}): CompletionCapability {
  const { provider, source } = resolveLlmProvider();
  if (provider === "fake") {
    args.logger?.info?.({ evt: "llm.provider.used", provider, source }, "llm.provider.used");
    return new FakeCompletion();
  }

  const selection = selectModel({
    nodeEnv: process.env.NODE_ENV,
    defaultModel: process.env.OPENAI_MODEL,
  });
  args.logger?.info?.(
    { evt: "llm.provider.used", provider, source, model: selection.model, modelSource: selection.source },
    "llm.provider.used"
  );
  return new OpenAICompletion({ model: selection.model, logger: args.logger });
}
