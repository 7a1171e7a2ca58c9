import {
  createMessage,
  type AgentIdentity,
  type ConversationMessage,
} from "../contracts/conversation";
import type { PolicySearchCapability, RetrieverTurnPayload, SearchMode } from "../contracts/search";
import { EVALUATOR_VERDICT_JSON_SCHEMA } from "../contracts/verdict";
import type {
  CompletionCapability,
  GenerationConfig,
  ResponseFormat,
} from "../providers/completion";
import { OpenAIProviderError } from "../providers/openai_model";
import { EVALUATOR_INSTRUCTIONS, FORMULATOR_INSTRUCTIONS } from "./agent_instructions";
import { GenerationFailure, RetrievalFailure } from "./errors";
import type { SessionLogger } from "../logger";
import { buildPromptPack, promptPackLogShape } from "./prompt_pack";

export type RespondOptions = {
  correction?: string;
  signal?: AbortSignal;
};

export interface Agent {
  readonly identity: AgentIdentity;
  readonly roleInstructions: string;
  readonly generation: Readonly<GenerationConfig>;
  readonly capabilityRefs: ReadonlySet<string>;
  respond(history: readonly ConversationMessage[], options?: RespondOptions): Promise<ConversationMessage>;
}

// Temperature 0 everywhere: PA decisions must be reproducible.
export const DETERMINISTIC_GENERATION: Readonly<GenerationConfig> = Object.freeze({
  temperature: 0,
  maxTokens: 800,
  topP: 1,
});

const nextOrdinal = (history: readonly ConversationMessage[]): number => {
  const last = history.at(-1);
  return last ? last.ordinal + 1 : 0;
};

function assertHistory(identity: AgentIdentity, history: readonly ConversationMessage[]): void {
  if (history.length === 0) {
    throw new GenerationFailure({
      agent: identity,
      cause: new Error("history is empty; the seed user message is required"),
      retryable: false,
    });
  }
}

abstract class CompletionAgent implements Agent {
  abstract readonly identity: AgentIdentity;
  abstract readonly roleInstructions: string;
  readonly generation = DETERMINISTIC_GENERATION;
  readonly capabilityRefs: ReadonlySet<string> = new Set(["completion"]);
  protected readonly responseFormat?: ResponseFormat;

  constructor(
    protected readonly completion: CompletionCapability,
    protected readonly log: SessionLogger
  ) {}

  async respond(
    history: readonly ConversationMessage[],
    options: RespondOptions = {}
  ): Promise<ConversationMessage> {
    assertHistory(this.identity, history);

    this.log.debug(
      {
        evt: "agent.prompt",
        agent: this.identity,
        ...promptPackLogShape(buildPromptPack({ history, correction: options.correction })),
      },
      "agent.prompt"
    );

    let text: string;
    try {
      text = await this.completion.complete({
        instructions: this.roleInstructions,
        generation: this.generation,
        history,
        responseFormat: this.responseFormat,
        correction: options.correction,
        signal: options.signal,
      });
    } catch (error) {
      if (error instanceof OpenAIProviderError) {
        throw new GenerationFailure({
          agent: this.identity,
          cause: error,
          retryable: error.retryable,
          retryAfterMs: error.retryAfterMs,
        });
      }
      throw new GenerationFailure({ agent: this.identity, cause: error });
    }

    const content = text.trim();
    if (!content) {
      throw new GenerationFailure({ agent: this.identity, cause: new Error("empty completion") });
    }

    return createMessage({
      role: "agent",
      authorName: this.identity,
      content,
      ordinal: nextOrdinal(history),
    });
  }
}

export class FormulatorAgent extends CompletionAgent {
  readonly identity = "formulator" as const;
  readonly roleInstructions = FORMULATOR_INSTRUCTIONS;
}

export class EvaluatorAgent extends CompletionAgent {
  readonly identity = "evaluator" as const;
  readonly roleInstructions = EVALUATOR_INSTRUCTIONS;
  protected readonly responseFormat: ResponseFormat = {
    type: "json_schema",
    name: "evaluator_verdict",
    schema: EVALUATOR_VERDICT_JSON_SCHEMA,
  };
}

/**
 * Runs the formulated query against the policy index. The query type is
 * classified by the search capability's own mode selector; no completion
 * call is made.
 */
export class RetrieverAgent implements Agent {
  readonly identity = "retriever" as const;
  readonly roleInstructions =
    "Classify the latest query as semantic, keyword or hybrid and run it against the policy index.";
  readonly generation = DETERMINISTIC_GENERATION;
  readonly capabilityRefs: ReadonlySet<string> = new Set(["policy_search"]);

  constructor(
    private readonly search: PolicySearchCapability,
    private readonly log: SessionLogger
  ) {}

  async respond(
    history: readonly ConversationMessage[],
    _options: RespondOptions = {}
  ): Promise<ConversationMessage> {
    assertHistory(this.identity, history);

    const formulated = [...history].reverse().find((m) => m.authorName === "formulator");
    const query = (formulated?.content ?? history[0].content).trim();

    let mode: SearchMode = "hybrid";
    let payload: RetrieverTurnPayload;
    try {
      mode = this.search.selectMode(query);
      const results = await this.search.search(query, mode);
      payload = { query, mode, results };
      this.log.info(
        {
          evt: "retriever.search",
          mode,
          queryChars: query.length,
          count: results.length,
          paths: results.map((r) => r.sourcePath),
        },
        "retriever.search"
      );
    } catch (error) {
      const failure = new RetrievalFailure(error);
      this.log.warn(
        { evt: "retriever.search_failed", mode, error: failure.message },
        "retriever.search_failed"
      );
      payload = { query, mode, results: [], error: "retrieval_unavailable" };
    }

    return createMessage({
      role: "agent",
      authorName: this.identity,
      content: JSON.stringify(payload),
      ordinal: nextOrdinal(history),
    });
  }
}

export type AgentRoster = Readonly<Record<AgentIdentity, Agent>>;

export function createAgents(args: {
  completion: CompletionCapability;
  search: PolicySearchCapability;
  log: SessionLogger;
}): AgentRoster {
  return Object.freeze({
    formulator: new FormulatorAgent(args.completion, args.log),
    retriever: new RetrieverAgent(args.search, args.log),
    evaluator: new EvaluatorAgent(args.completion, args.log),
  });
}
