import { randomUUID } from "node:crypto";
import { setTimeout as sleep } from "node:timers/promises";

import {
  createMessage,
  type AgentIdentity,
  type ConversationMessage,
} from "../contracts/conversation";
import type { TelemetrySink, TelemetrySpanStatus } from "../contracts/telemetry";
import type { EvaluatorVerdict, TerminationReason } from "../contracts/verdict";
import type { SessionLogger } from "../logger";
import type { Agent, AgentRoster } from "./agents";
import {
  GenerationFailure,
  OrchestrationError,
  SelectionError,
  SessionCancelled,
  VerdictParseError,
} from "./errors";
import { selectNext } from "./selector";
import { DEFAULT_SESSION_CONFIG, type SessionConfig } from "./session_config";
import { emitSpan, noopTelemetrySink, SERVICE_NAME } from "./telemetry";
import {
  buildExhaustedVerdict,
  buildVerdictCorrection,
  evaluateTermination,
  type TerminationDecision,
} from "./termination";

export type OrchestrationState =
  | "starting"
  | "formulating"
  | "retrieving"
  | "evaluating"
  | "terminated";

const STATE_FOR_AGENT: Record<AgentIdentity, OrchestrationState> = {
  formulator: "formulating",
  retriever: "retrieving",
  evaluator: "evaluating",
};

const ALLOWED_TRANSITIONS: Record<OrchestrationState, readonly OrchestrationState[]> = {
  starting: ["formulating", "terminated"],
  formulating: ["retrieving", "terminated"],
  retrieving: ["evaluating", "terminated"],
  evaluating: ["formulating", "terminated"],
  terminated: [],
};

export type SessionResult =
  | {
      ok: true;
      verdict: EvaluatorVerdict;
      terminationReason: TerminationReason;
      iterationCount: number;
      turns: number;
    }
  | {
      ok: false;
      error: OrchestrationError;
      iterationCount: number;
      turns: number;
    };

export type SleepImpl = (ms: number, signal?: AbortSignal) => Promise<void>;

export type OrchestrationSessionArgs = {
  id?: string;
  clinicalMetadata: string;
  agents: AgentRoster;
  log: SessionLogger;
  config?: Partial<SessionConfig>;
  telemetry?: TelemetrySink;
  signal?: AbortSignal;
  sleepImpl?: SleepImpl;
};

// An abort ends the wait early; the next cancellation check reports it.
const sleepUntilAborted: SleepImpl = async (ms, signal) => {
  try {
    await sleep(ms, undefined, { signal });
  } catch (error) {
    if (!signal?.aborted) throw error;
  }
};

/**
 * Group-chat driver for one PA request. Owns the conversation exclusively and
 * runs exactly one agent turn at a time:
 * formulator -> retriever -> evaluator -> (formulator ... | terminated).
 */
export class OrchestrationSession {
  readonly id: string;
  readonly config: SessionConfig;

  private readonly clinicalMetadata: string;
  private readonly agents: AgentRoster;
  private readonly telemetry: TelemetrySink;
  private readonly signal?: AbortSignal;
  private readonly log: SessionLogger;
  private readonly sleepImpl: SleepImpl;

  private readonly conversation: ConversationMessage[] = [];
  private readonly pendingSpans: Promise<void>[] = [];
  private iterationCount = 0;
  private state: OrchestrationState = "starting";
  private lastVerdict: EvaluatorVerdict | null = null;
  private started = false;

  constructor(args: OrchestrationSessionArgs) {
    this.id = args.id ?? randomUUID();
    this.clinicalMetadata = args.clinicalMetadata;
    this.agents = args.agents;
    this.config = { ...DEFAULT_SESSION_CONFIG, ...args.config };
    this.telemetry = args.telemetry ?? noopTelemetrySink;
    this.signal = args.signal;
    this.sleepImpl = args.sleepImpl ?? sleepUntilAborted;
    this.log = args.log.child({ sessionId: this.id });

    if (this.config.maxIterations < 1) {
      throw new RangeError("maxIterations must be at least 1");
    }
  }

  get transcript(): readonly ConversationMessage[] {
    return this.conversation.slice();
  }

  get currentState(): OrchestrationState {
    return this.state;
  }

  get iterations(): number {
    return this.iterationCount;
  }

  get terminated(): boolean {
    return this.state === "terminated";
  }

  get latestVerdict(): EvaluatorVerdict | null {
    return this.lastVerdict;
  }

  /**
   * Resolves once every span handed to the telemetry sink has settled.
   * Never rejects.
   */
  async flushTelemetry(): Promise<void> {
    await Promise.all(this.pendingSpans);
  }

  async run(): Promise<SessionResult> {
    if (this.started) {
      throw new Error(`session ${this.id} has already run`);
    }
    this.started = true;

    this.log.info(
      {
        evt: "session.started",
        metadataChars: this.clinicalMetadata.length,
        maxIterations: this.config.maxIterations,
      },
      "session.started"
    );

    this.append(
      createMessage({ role: "user", authorName: "user", content: this.clinicalMetadata, ordinal: 0 })
    );

    try {
      for (;;) {
        const next = selectNext(this.conversation);
        this.transition(STATE_FOR_AGENT[next]);

        if (next !== "evaluator") {
          this.append(await this.runTurn(this.agents[next]));
          continue;
        }

        const decision = await this.runEvaluatorTurn();
        if (decision.terminate) {
          return this.finish(decision);
        }
      }
    } catch (error) {
      return this.fail(error);
    }
  }

  private checkCancelled(): void {
    if (this.signal?.aborted) {
      throw new SessionCancelled();
    }
  }

  private transition(next: OrchestrationState): void {
    this.checkCancelled();
    if (!ALLOWED_TRANSITIONS[this.state].includes(next)) {
      throw new SelectionError(`illegal transition ${this.state} -> ${next}`);
    }
    this.log.debug({ evt: "session.transition", from: this.state, to: next }, "session.transition");
    this.state = next;
  }

  private append(message: ConversationMessage): void {
    if (message.ordinal !== this.conversation.length) {
      throw new SelectionError(
        `message from ${message.authorName} has ordinal ${message.ordinal}; expected ${this.conversation.length}`,
        message.ordinal
      );
    }
    this.conversation.push(message);
  }

  private recordSpan(
    operation: string,
    start: Date,
    status: TelemetrySpanStatus,
    attributes: Record<string, string | number | boolean> = {}
  ): void {
    this.pendingSpans.push(
      emitSpan(
        this.telemetry,
        {
          service_name: SERVICE_NAME,
          operation,
          start: start.toISOString(),
          end: new Date().toISOString(),
          status,
          attributes: { iteration: this.iterationCount, ...attributes },
        },
        this.log
      )
    );
  }

  private async respondWithTimeout(agent: Agent, correction?: string): Promise<ConversationMessage> {
    const controller = new AbortController();
    const timeoutMs = this.config.agentTimeoutMs;
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(
          new GenerationFailure({
            agent: agent.identity,
            cause: new Error(`no response within ${timeoutMs}ms`),
            reason: "timeout",
          })
        );
      }, timeoutMs);
    });

    try {
      return await Promise.race([
        agent.respond(this.conversation.slice(), { correction, signal: controller.signal }),
        timeout,
      ]);
    } finally {
      clearTimeout(timer);
    }
  }

  private backoffMs(attempt: number, failure: GenerationFailure): number {
    const requested = failure.retryAfterMs ?? this.config.retryBaseDelayMs * 2 ** attempt;
    return Math.min(requested, this.config.retryMaxDelayMs);
  }

  /**
   * One agent turn with the GenerationFailure retry budget. Retries wait out
   * the provider's Retry-After, or an exponential back-off without one.
   * A caller cancellation that lands while a call is in flight lets the call
   * finish and then discards its result.
   */
  private async runTurn(agent: Agent, correction?: string): Promise<ConversationMessage> {
    const maxAttempts = this.config.generationRetries + 1;

    for (let attempt = 0; ; attempt++) {
      this.checkCancelled();
      const start = new Date();
      try {
        const message = await this.respondWithTimeout(agent, correction);
        this.checkCancelled();
        if (message.authorName !== agent.identity) {
          throw new SelectionError(
            `${agent.identity} produced a message attributed to ${message.authorName}`,
            message.ordinal
          );
        }
        this.recordSpan(`agent.${agent.identity}`, start, "ok", { attempt });
        this.log.info(
          { evt: "turn.completed", agent: agent.identity, attempt, outputChars: message.content.length },
          "turn.completed"
        );
        return message;
      } catch (error) {
        if (error instanceof SessionCancelled || error instanceof SelectionError) throw error;

        const failure = error instanceof GenerationFailure
          ? error
          : new GenerationFailure({ agent: agent.identity, cause: error });
        const willRetry = failure.retryable && attempt + 1 < maxAttempts;
        const backoffMs = willRetry ? this.backoffMs(attempt, failure) : 0;
        this.recordSpan(`agent.${agent.identity}`, start, "error", {
          attempt,
          error: failure.code,
          reason: failure.reason,
          ...(failure.retryAfterMs !== undefined ? { retry_after_ms: failure.retryAfterMs } : {}),
        });
        this.log.warn(
          {
            evt: "turn.failed",
            agent: agent.identity,
            attempt,
            reason: failure.reason,
            retryable: failure.retryable,
            backoffMs,
            error: failure.message,
          },
          "turn.failed"
        );

        if (!willRetry) {
          throw failure;
        }
        if (backoffMs > 0) {
          await this.sleepImpl(backoffMs, this.signal);
        }
      }
    }
  }

  /**
   * Evaluator turn plus termination check. Each attempt counts toward the
   * iteration cap, including attempts whose verdict fails to parse.
   */
  private async runEvaluatorTurn(): Promise<TerminationDecision> {
    let correction: string | undefined;

    for (let parseAttempt = 0; ; parseAttempt++) {
      const message = await this.runTurn(this.agents.evaluator, correction);
      this.iterationCount += 1;
      const start = new Date();

      try {
        const decision = evaluateTermination({
          message,
          iterationCount: this.iterationCount,
          maxIterations: this.config.maxIterations,
        });
        this.append(message);
        this.lastVerdict = decision.verdict;
        this.recordSpan("termination.evaluate", start, "ok", {
          decision: decision.reason,
          policies: decision.verdict.policies.length,
        });
        return decision;
      } catch (error) {
        if (!(error instanceof VerdictParseError)) throw error;

        this.recordSpan("termination.evaluate", start, "error", {
          parseAttempt,
          error: error.code,
          reason: error.reason,
        });
        this.log.warn(
          {
            evt: "verdict.parse_failed",
            parseAttempt,
            reason: error.reason,
            issues: error.issues.slice(0, 3),
          },
          "verdict.parse_failed"
        );

        if (parseAttempt >= this.config.verdictParseRetries) throw error;
        if (this.iterationCount >= this.config.maxIterations) {
          return {
            terminate: true,
            reason: "iteration_cap",
            verdict: buildExhaustedVerdict(this.config.maxIterations),
          };
        }
        correction = buildVerdictCorrection(error);
      }
    }
  }

  private finish(decision: Extract<TerminationDecision, { terminate: true }>): SessionResult {
    // A verdict in hand is returned even if cancellation lands now.
    this.state = "terminated";

    const verdict = decision.reason === "satisfied"
      ? decision.verdict
      : buildExhaustedVerdict(this.config.maxIterations);

    this.log.info(
      {
        evt: "session.terminated",
        reason: decision.reason,
        iterationCount: this.iterationCount,
        turns: this.conversation.length - 1,
        policies: verdict.policies.length,
      },
      "session.terminated"
    );

    return {
      ok: true,
      verdict,
      terminationReason: decision.reason,
      iterationCount: this.iterationCount,
      turns: this.conversation.length - 1,
    };
  }

  private fail(error: unknown): SessionResult {
    this.state = "terminated";

    if (!(error instanceof OrchestrationError)) {
      this.log.error({ evt: "session.crashed", error: String(error) }, "session.crashed");
      throw error;
    }

    this.log.error(
      {
        evt: "session.failed",
        code: error.code,
        component: error.component,
        iterationCount: this.iterationCount,
        error: error.message,
      },
      "session.failed"
    );

    return {
      ok: false,
      error,
      iterationCount: this.iterationCount,
      turns: this.conversation.length - 1,
    };
  }
}
