import { z } from "zod";

import { buildPromptPack, toSinglePromptText } from "../control-plane/prompt_pack";
import type {
  CompletionCapability,
  CompletionRequest,
  ProviderLogger,
} from "./completion";

export class OpenAIProviderError extends Error {
  statusCode: number;
  retryable: boolean;
  errorType?: string;
  errorCode?: string;
  retryAfterMs?: number;

  constructor(
    message: string,
    args: {
      statusCode?: number;
      retryable?: boolean;
      errorType?: string;
      errorCode?: string;
      retryAfterMs?: number;
    } = {}
  ) {
    super(message);
    this.name = "OpenAIProviderError";
    this.statusCode = args.statusCode ?? 502;
    this.retryable = args.retryable ?? true;
    this.errorType = args.errorType;
    this.errorCode = args.errorCode;
    this.retryAfterMs = args.retryAfterMs;
  }
}

export const parseRetryAfterMs = (header: string | null, now = Date.now()): number | undefined => {
  if (!header) return undefined;
  const seconds = Number(header);
  if (!Number.isNaN(seconds)) {
    return Math.max(0, Math.floor(seconds * 1000));
  }
  const retryDate = Date.parse(header);
  if (!Number.isNaN(retryDate)) {
    return Math.max(0, retryDate - now);
  }
  return undefined;
};

const ErrorBodySchema = z.object({
  error: z.object({
    type: z.string().optional(),
    code: z.string().nullable().optional(),
    message: z.string().optional(),
  }).passthrough(),
}).passthrough();

const ResponsesBodySchema = z.object({
  output: z.array(
    z.object({
      content: z.array(z.object({ text: z.string().optional() }).passthrough()).optional(),
    }).passthrough()
  ).optional(),
  output_text: z.string().optional(),
}).passthrough();

export function extractResponseText(data: unknown): string | undefined {
  const parsed = ResponsesBodySchema.safeParse(data);
  if (!parsed.success) return undefined;

  for (const item of parsed.data.output ?? []) {
    for (const part of item.content ?? []) {
      if (typeof part.text === "string" && part.text) return part.text;
    }
  }

  return parsed.data.output_text || undefined;
}

export type OpenAICompletionOptions = {
  model: string;
  apiKey?: string;
  baseUrl?: string;
  logger?: ProviderLogger;
  fetchImpl?: typeof fetch;
};

/**
 * Responses API client. Agent instructions go into `instructions`; the
 * rendered transcript goes into `input`.
 */
export class OpenAICompletion implements CompletionCapability {
  readonly provider = "openai" as const;
  readonly model: string;
  private readonly apiKey?: string;
  private readonly baseUrl: string;
  private readonly logger?: ProviderLogger;
  private readonly fetchImpl: typeof fetch;

  constructor(opts: OpenAICompletionOptions) {
    this.model = opts.model;
    this.apiKey = opts.apiKey ?? process.env.OPENAI_API_KEY;
    this.baseUrl = opts.baseUrl ?? process.env.OPENAI_BASE_URL ?? "https://api.openai.com/v1";
    this.logger = opts.logger;
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  async complete(request: CompletionRequest): Promise<string> {
    if (!this.apiKey) {
      throw new OpenAIProviderError("OPENAI_API_KEY missing", {
        statusCode: 500,
        retryable: false,
      });
    }

    const pack = buildPromptPack({
      history: request.history,
      correction: request.correction,
    });

    const body: Record<string, unknown> = {
      model: this.model,
      store: false,
      stream: false,
      instructions: request.instructions,
      input: toSinglePromptText(pack),
      temperature: request.generation.temperature,
      top_p: request.generation.topP,
      max_output_tokens: request.generation.maxTokens,
    };
    if (request.responseFormat?.type === "json_schema") {
      body.text = {
        format: {
          type: "json_schema",
          name: request.responseFormat.name,
          strict: true,
          schema: request.responseFormat.schema,
        },
      };
    }

    const res = await this.fetchImpl(`${this.baseUrl}/responses`, {
      method: "POST",
      headers: {
        "content-type": "application/json",
        authorization: `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify(body),
      signal: request.signal,
    });

    if (!res.ok) {
      const text = await res.text();
      let errorBody: z.infer<typeof ErrorBodySchema> | null = null;
      try {
        const parsed = ErrorBodySchema.safeParse(JSON.parse(text));
        errorBody = parsed.success ? parsed.data : null;
      } catch {
        errorBody = null;
      }
      const errorType = errorBody?.error.type;
      const errorCode = errorBody?.error.code ?? undefined;
      const bodySnippet = (errorBody?.error.message ?? text).slice(0, 500);
      const requestId = res.headers.get("x-request-id") ?? undefined;
      const isInvalidRequest = errorType === "invalid_request_error";
      const statusCode = res.status;

      this.logger?.error?.(
        { evt: "openai.request_failed", statusCode, requestId, errorType, errorCode },
        "openai.request_failed"
      );
      throw new OpenAIProviderError(`OpenAI error ${statusCode}: ${bodySnippet}`, {
        statusCode,
        retryable: !isInvalidRequest && statusCode !== 401 && statusCode !== 403,
        errorType,
        errorCode,
        retryAfterMs: parseRetryAfterMs(res.headers.get("retry-after")),
      });
    }

    const content = extractResponseText(await res.json());
    if (!content) {
      throw new OpenAIProviderError("OpenAI response missing content", {
        statusCode: 502,
        retryable: true,
      });
    }

    return content;
  }
}
