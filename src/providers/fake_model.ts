import type { ConversationMessage } from "../contracts/conversation";
import { RetrieverTurnPayload } from "../contracts/search";
import type { EvaluatorVerdict } from "../contracts/verdict";
import type { CompletionCapability, CompletionRequest } from "./completion";

const STOPWORDS = new Set([
  "the", "and", "for", "with", "not", "was", "has", "have", "are", "this", "that",
  "from", "patient", "provided", "name", "date", "value", "none", "information",
]);

export function queryTerms(text: string, limit = 12): string[] {
  const tokens = text.toLowerCase().match(/[a-z0-9][a-z0-9.-]{2,}/g) ?? [];
  const seen = new Set<string>();
  const terms: string[] = [];
  for (const token of tokens) {
    const t = token.replace(/[.-]+$/, "");
    if (t.length < 3 || STOPWORDS.has(t) || seen.has(t)) continue;
    seen.add(t);
    terms.push(t);
    if (terms.length >= limit) break;
  }
  return terms;
}

function latestRetrieverPayload(history: readonly ConversationMessage[]): RetrieverTurnPayload | null {
  for (let i = history.length - 1; i >= 0; i--) {
    const m = history[i];
    if (m.authorName !== "retriever") continue;
    try {
      const parsed = RetrieverTurnPayload.safeParse(JSON.parse(m.content));
      return parsed.success ? parsed.data : null;
    } catch {
      return null;
    }
  }
  return null;
}

export function fakeFormulatorReply(history: readonly ConversationMessage[]): string {
  const seed = history[0]?.content ?? "";
  const priorCycles = history.filter((m) => m.authorName === "evaluator").length;
  const terms = queryTerms(seed);
  // Later cycles widen the query so the retry is not a replay of the first pass.
  const suffix = priorCycles > 0 ? " prior authorization policy criteria" : "";
  return `${terms.join(" ")}${suffix}`.trim();
}

export function fakeEvaluatorReply(history: readonly ConversationMessage[]): EvaluatorVerdict {
  const payload = latestRetrieverPayload(history);
  if (!payload || payload.results.length === 0) {
    return {
      policies: [],
      reasoning: ["No candidate policy documents were available to evaluate."],
      retry: true,
    };
  }

  const terms = queryTerms(payload.query);
  const threshold = Math.min(2, terms.length);
  const policies: string[] = [];
  const reasoning: string[] = [];

  for (const hit of payload.results) {
    const haystack = `${hit.caption}\n${hit.contentSnippet}`.toLowerCase();
    const matched = terms.filter((t) => haystack.includes(t)).length;
    if (matched >= threshold && threshold > 0 && !policies.includes(hit.sourcePath)) {
      policies.push(hit.sourcePath);
      reasoning.push(`Approved ${hit.sourcePath}: matches ${matched} of ${terms.length} query terms.`);
    } else {
      reasoning.push(`Rejected ${hit.sourcePath}: matches ${matched} of ${terms.length} query terms.`);
    }
  }

  return { policies, reasoning, retry: policies.length === 0 };
}

/**
 * Deterministic stand-in for the language model. Evaluator calls are the
 * ones that ask for the verdict JSON schema; everything else is treated as a
 * Formulator call.
 */
export class FakeCompletion implements CompletionCapability {
  readonly provider = "fake" as const;
  readonly model = "fake-deterministic";

  async complete(request: CompletionRequest): Promise<string> {
    if (request.responseFormat?.type === "json_schema") {
      return JSON.stringify(fakeEvaluatorReply(request.history));
    }
    return fakeFormulatorReply(request.history);
  }
}
