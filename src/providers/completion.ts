import type { ConversationMessage } from "../contracts/conversation";

export type GenerationConfig = {
  temperature: number;
  maxTokens: number;
  topP: number;
};

export type ResponseFormat =
  | { type: "text" }
  | { type: "json_schema"; name: string; schema: Record<string, unknown> };

export type CompletionRequest = {
  instructions: string;
  generation: GenerationConfig;
  history: readonly ConversationMessage[];
  responseFormat?: ResponseFormat;
  // Correction notes from a failed attempt of the same turn.
  correction?: string;
  signal?: AbortSignal;
};

export interface CompletionCapability {
  readonly provider: "openai" | "fake";
  readonly model: string;
  complete(request: CompletionRequest): Promise<string>;
}

export type ProviderLogger = {
  error?: (obj: Record<string, unknown>, msg?: string) => void;
  warn?: (obj: Record<string, unknown>, msg?: string) => void;
  info?: (obj: Record<string, unknown>, msg?: string) => void;
  debug?: (obj: Record<string, unknown>, msg?: string) => void;
};
