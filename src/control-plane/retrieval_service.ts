import type { PolicySearchCapability } from "../contracts/search";
import type { EvaluatorVerdict } from "../contracts/verdict";
import type { SessionLogger } from "../logger";
import type { CompletionCapability } from "../providers/completion";
import type { ControlPlaneStore } from "../store/control_plane_store";
import { createAgents } from "./agents";
import { OrchestrationSession, type SessionResult } from "./orchestrator";
import { DEFAULT_SESSION_CONFIG, type SessionConfig } from "./session_config";
import { CompositeTelemetrySink, LoggingTelemetrySink, StoreTelemetrySink } from "./telemetry";

export type RunRetrievalOptions = {
  caseId?: string;
  maxIterations?: number;
  signal?: AbortSignal;
};

export type RetrievalRun = {
  sessionId: string;
  result: SessionResult;
};

export type PolicyRetrievalServiceArgs = {
  store: ControlPlaneStore;
  search: PolicySearchCapability;
  completion: CompletionCapability;
  log: SessionLogger;
  config?: Partial<SessionConfig>;
};

export class PolicyRetrievalService {
  private readonly store: ControlPlaneStore;
  private readonly search: PolicySearchCapability;
  private readonly completion: CompletionCapability;
  private readonly log: SessionLogger;
  readonly config: SessionConfig;

  constructor(args: PolicyRetrievalServiceArgs) {
    this.store = args.store;
    this.search = args.search;
    this.completion = args.completion;
    this.log = args.log;
    this.config = { ...DEFAULT_SESSION_CONFIG, ...args.config };
  }

  /**
   * Runs one session and returns its verdict. Fatal orchestration errors are
   * thrown as-is.
   */
  async runRetrieval(clinicalMetadata: string, options: RunRetrievalOptions = {}): Promise<EvaluatorVerdict> {
    const { result } = await this.runRetrievalDetailed(clinicalMetadata, options);
    if (!result.ok) throw result.error;
    return result.verdict;
  }

  async runRetrievalDetailed(
    clinicalMetadata: string,
    options: RunRetrievalOptions = {}
  ): Promise<RetrievalRun> {
    const maxIterations = options.maxIterations ?? this.config.maxIterations;
    const record = await this.store.createSession({
      caseId: options.caseId,
      clinicalMetadata,
      maxIterations,
    });

    const log = this.log.child({ caseId: options.caseId ?? null });
    const session = new OrchestrationSession({
      id: record.id,
      clinicalMetadata,
      agents: createAgents({ completion: this.completion, search: this.search, log }),
      log,
      config: { ...this.config, maxIterations },
      telemetry: new CompositeTelemetrySink([
        new StoreTelemetrySink(this.store, record.id),
        new LoggingTelemetrySink(log),
      ]),
      signal: options.signal,
    });

    let result: SessionResult;
    try {
      result = await session.run();
    } catch (error) {
      await this.persistTranscript(session);
      await this.store.failSession({
        sessionId: record.id,
        iterationCount: session.iterations,
        error: {
          code: "internal_error",
          component: "orchestrator",
          message: error instanceof Error ? error.message : String(error),
          retryable: false,
        },
      });
      throw error;
    }
    await this.persistTranscript(session);

    if (result.ok) {
      await this.store.completeSession({
        sessionId: record.id,
        iterationCount: result.iterationCount,
        terminationReason: result.terminationReason,
        verdict: result.verdict,
      });
    } else {
      const { error, component, message, retryable } = result.error.toJSON();
      await this.store.failSession({
        sessionId: record.id,
        iterationCount: result.iterationCount,
        error: { code: error, component, message, retryable },
      });
    }

    return { sessionId: record.id, result };
  }

  private async persistTranscript(session: OrchestrationSession): Promise<void> {
    await session.flushTelemetry();
    await this.store.appendMessages({ sessionId: session.id, messages: session.transcript });
  }
}
