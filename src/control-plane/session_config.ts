import { z } from "zod";

export type SessionConfig = {
  maxIterations: number;
  agentTimeoutMs: number;
  // Extra attempts per turn after a GenerationFailure.
  generationRetries: number;
  // Extra attempts of an Evaluator turn after a VerdictParseError.
  verdictParseRetries: number;
  // Back-off before a generation retry: doubles per attempt from the base,
  // and caps a provider's Retry-After as well.
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
};

export const DEFAULT_SESSION_CONFIG: SessionConfig = {
  maxIterations: 10,
  agentTimeoutMs: 60_000,
  generationRetries: 3,
  verdictParseRetries: 2,
  retryBaseDelayMs: 250,
  retryMaxDelayMs: 10_000,
};

const intFromEnv = (min: number, max: number) =>
  z.preprocess(
    (value) => (value === undefined || value === "" ? undefined : Number(value)),
    z.number().int().min(min).max(max).optional()
  );

const SessionEnvSchema = z.object({
  ORCH_MAX_ITERATIONS: intFromEnv(1, 100),
  ORCH_AGENT_TIMEOUT_MS: intFromEnv(1, 600_000),
  ORCH_GENERATION_RETRIES: intFromEnv(0, 10),
  ORCH_VERDICT_PARSE_RETRIES: intFromEnv(0, 10),
  ORCH_RETRY_BASE_DELAY_MS: intFromEnv(0, 60_000),
  ORCH_RETRY_MAX_DELAY_MS: intFromEnv(0, 600_000),
});

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function loadSessionConfig(env: NodeJS.ProcessEnv = process.env): SessionConfig {
  const parsed = SessionEnvSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid orchestration settings: ${detail}`);
  }

  const data = parsed.data;
  return {
    maxIterations: data.ORCH_MAX_ITERATIONS ?? DEFAULT_SESSION_CONFIG.maxIterations,
    agentTimeoutMs: data.ORCH_AGENT_TIMEOUT_MS ?? DEFAULT_SESSION_CONFIG.agentTimeoutMs,
    generationRetries: data.ORCH_GENERATION_RETRIES ?? DEFAULT_SESSION_CONFIG.generationRetries,
    verdictParseRetries: data.ORCH_VERDICT_PARSE_RETRIES ?? DEFAULT_SESSION_CONFIG.verdictParseRetries,
    retryBaseDelayMs: data.ORCH_RETRY_BASE_DELAY_MS ?? DEFAULT_SESSION_CONFIG.retryBaseDelayMs,
    retryMaxDelayMs: data.ORCH_RETRY_MAX_DELAY_MS ?? DEFAULT_SESSION_CONFIG.retryMaxDelayMs,
  };
}
