import { isAgentIdentity, type AgentIdentity, type ConversationMessage } from "../contracts/conversation";
import { SelectionError } from "./errors";

const NEXT_AFTER: Record<AgentIdentity, AgentIdentity> = {
  formulator: "retriever",
  retriever: "evaluator",
  evaluator: "formulator",
};

/**
 * Pick the agent that acts next. Pure function of the transcript: the same
 * history always yields the same agent.
 */
export function selectNext(history: readonly ConversationMessage[]): AgentIdentity {
  if (history.length === 0) return "formulator";

  history.forEach((message, index) => {
    if (message.role === "user" && index !== 0) {
      throw new SelectionError(
        `user message at position ${index}; only the seed message may come from the user`,
        message.ordinal
      );
    }
  });

  const last = history[history.length - 1];
  if (last.role === "user") return "formulator";

  if (!isAgentIdentity(last.authorName)) {
    throw new SelectionError(
      `last message is not attributable to a known agent: ${last.authorName}`,
      last.ordinal
    );
  }

  return NEXT_AFTER[last.authorName];
}
