import type { ConversationMessage } from "../contracts/conversation";
import {
  EvaluatorVerdictSchema,
  type EvaluatorVerdict,
} from "../contracts/verdict";
import { VerdictParseError, type VerdictIssue } from "./errors";

function summarizeZodIssues(issues: Array<{ path: PropertyKey[]; code: string; message: string }>): VerdictIssue[] {
  return issues.map((issue) => ({
    path: issue.path.map(String).join("."),
    code: issue.code,
    message: issue.message,
  }));
}

// Models sometimes wrap JSON in a markdown fence even when asked not to.
function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  const fenced = /^```(?:json)?\s*\n?([\s\S]*?)\n?```$/i.exec(trimmed);
  return fenced ? fenced[1].trim() : trimmed;
}

export function parseVerdict(content: string): EvaluatorVerdict {
  let raw: unknown;
  try {
    raw = JSON.parse(stripCodeFence(content));
  } catch (error) {
    throw new VerdictParseError({ reason: "invalid_json", cause: error });
  }

  const result = EvaluatorVerdictSchema.safeParse(raw);
  if (!result.success) {
    throw new VerdictParseError({
      reason: "schema_invalid",
      issues: summarizeZodIssues(result.error.issues),
    });
  }
  return result.data;
}

export type TerminationDecision =
  | { terminate: true; reason: "satisfied" | "iteration_cap"; verdict: EvaluatorVerdict }
  | { terminate: false; reason: "continue"; verdict: EvaluatorVerdict };

/**
 * Approval termination strategy. Stops once the evaluator no longer asks for a
 * retry, or once the iteration cap is reached.
 */
export function evaluateTermination(args: {
  message: ConversationMessage;
  iterationCount: number;
  maxIterations: number;
}): TerminationDecision {
  const verdict = parseVerdict(args.message.content);
  if (!verdict.retry) {
    return { terminate: true, reason: "satisfied", verdict };
  }
  if (args.iterationCount >= args.maxIterations) {
    return { terminate: true, reason: "iteration_cap", verdict };
  }
  return { terminate: false, reason: "continue", verdict };
}

export function shouldTerminate(
  lastEvaluatorMessage: ConversationMessage,
  iterationCount: number,
  maxIterations: number
): boolean {
  return evaluateTermination({ message: lastEvaluatorMessage, iterationCount, maxIterations }).terminate;
}

export function buildExhaustedVerdict(maxIterations: number): EvaluatorVerdict {
  return {
    policies: [],
    reasoning: [
      `Iteration limit of ${maxIterations} reached without a policy that satisfies the request; more information is needed.`,
    ],
    retry: true,
  };
}

export function buildVerdictCorrection(error: VerdictParseError): string {
  const lines: string[] = [];
  lines.push("Your previous reply could not be accepted.");
  lines.push(`Problem: ${error.message}.`);
  lines.push(
    'Reply with a single JSON object with exactly the keys "policies" (array of unique strings), "reasoning" (array of strings) and "retry" (boolean). No other keys, no prose.'
  );
  return lines.join("\n");
}
