import { z } from "zod";

export const AGENT_IDENTITIES = ["formulator", "retriever", "evaluator"] as const;

export type AgentIdentity = (typeof AGENT_IDENTITIES)[number];

export const isAgentIdentity = (value: string): value is AgentIdentity =>
  AGENT_IDENTITIES.some((identity) => identity === value);

export type ConversationRole = "user" | "agent";

export type ConversationMessage = Readonly<{
  role: ConversationRole;
  authorName: string;
  content: string;
  ordinal: number;
}>;

/**
 * Messages are frozen on creation; the orchestration loop owns the sequence and
 * agents only ever see a read-only view of it.
 */
export function createMessage(args: {
  role: ConversationRole;
  authorName: string;
  content: string;
  ordinal: number;
}): ConversationMessage {
  return Object.freeze({
    role: args.role,
    authorName: args.authorName,
    content: args.content,
    ordinal: args.ordinal,
  });
}

export const RetrievalRequest = z.object({
  clinicalMetadata: z.string().min(1).max(50_000),
  caseId: z.string().min(1).max(128).optional(),
  maxIterations: z.number().int().min(1).max(50).optional(),
}).strict();

export type RetrievalRequest = z.infer<typeof RetrievalRequest>;
