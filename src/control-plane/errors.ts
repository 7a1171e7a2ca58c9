import type { AgentIdentity } from "../contracts/conversation";

export type OrchestrationErrorCode =
  | "generation_failure"
  | "selection_error"
  | "verdict_parse_error"
  | "retrieval_failure"
  | "session_cancelled";

export type OrchestrationComponent =
  | AgentIdentity
  | "selector"
  | "termination"
  | "retrieval"
  | "orchestrator";

export abstract class OrchestrationError extends Error {
  abstract readonly code: OrchestrationErrorCode;
  abstract readonly component: OrchestrationComponent;
  abstract readonly retryable: boolean;

  toJSON() {
    return {
      error: this.code,
      component: this.component,
      message: this.message,
      retryable: this.retryable,
    };
  }
}

export class GenerationFailure extends OrchestrationError {
  readonly code = "generation_failure" as const;
  readonly component: AgentIdentity;
  readonly retryable: boolean;
  readonly reason: "provider_error" | "timeout";
  // Provider-requested wait before the next attempt.
  readonly retryAfterMs?: number;

  constructor(args: {
    agent: AgentIdentity;
    cause: unknown;
    reason?: "provider_error" | "timeout";
    retryable?: boolean;
    retryAfterMs?: number;
  }) {
    const detail = args.cause instanceof Error ? args.cause.message : String(args.cause);
    super(`${args.agent} generation failed: ${detail}`, { cause: args.cause });
    this.name = "GenerationFailure";
    this.component = args.agent;
    this.reason = args.reason ?? "provider_error";
    this.retryable = args.retryable ?? true;
    this.retryAfterMs = args.retryAfterMs;
  }
}

export class SelectionError extends OrchestrationError {
  readonly code = "selection_error" as const;
  readonly component = "selector" as const;
  readonly retryable = false;
  readonly ordinal: number | null;

  constructor(message: string, ordinal: number | null = null) {
    super(message);
    this.name = "SelectionError";
    this.ordinal = ordinal;
  }
}

export type VerdictIssue = { path: string; code: string; message: string };

export class VerdictParseError extends OrchestrationError {
  readonly code = "verdict_parse_error" as const;
  readonly component = "termination" as const;
  readonly retryable = true;
  readonly reason: "invalid_json" | "schema_invalid";
  readonly issues: VerdictIssue[];

  constructor(args: {
    reason: "invalid_json" | "schema_invalid";
    issues?: VerdictIssue[];
    cause?: unknown;
  }) {
    const top = (args.issues ?? []).slice(0, 3).map((i) => `${i.path || "(root)"}: ${i.message}`);
    const detail = args.reason === "invalid_json"
      ? "evaluator output is not valid JSON"
      : `evaluator output violates the verdict contract (${top.join("; ")})`;
    super(detail, args.cause === undefined ? undefined : { cause: args.cause });
    this.name = "VerdictParseError";
    this.reason = args.reason;
    this.issues = args.issues ?? [];
  }
}

export class RetrievalFailure extends OrchestrationError {
  readonly code = "retrieval_failure" as const;
  readonly component = "retrieval" as const;
  readonly retryable = true;

  constructor(cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`policy search unavailable: ${detail}`, { cause });
    this.name = "RetrievalFailure";
  }
}

export class SessionCancelled extends OrchestrationError {
  readonly code = "session_cancelled" as const;
  readonly component = "orchestrator" as const;
  readonly retryable = false;

  constructor(message = "session cancelled by caller") {
    super(message);
    this.name = "SessionCancelled";
  }
}
