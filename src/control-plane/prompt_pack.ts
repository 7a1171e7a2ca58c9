import type { ConversationMessage } from "../contracts/conversation";

/**
 * PromptPack is the deterministic input for provider calls.
 * The agent's role instructions travel separately; the pack carries the
 * conversation so far and any correction from a failed attempt.
 */

export type PromptRole = "system" | "user";

export type PromptSectionId = "correction" | "transcript" | "latest";

export type PromptSection = {
  id: PromptSectionId;
  role: PromptRole;
  title: string;
  content: string;
};

export type PromptPack = {
  version: "prompt-pack-v1";
  sections: PromptSection[];
};

export function formatTranscriptLine(message: ConversationMessage): string {
  return `[${message.ordinal}] ${message.authorName} (${message.role}):\n${message.content}`;
}

/**
 * Order is fixed:
 * 1) correction (system, only when present)
 * 2) transcript (user): every message except the latest
 * 3) latest (user): the message the agent is responding to
 */
export function buildPromptPack(args: {
  history: readonly ConversationMessage[];
  correction?: string;
}): PromptPack {
  const sections: PromptSection[] = [];

  const correction = args.correction?.trim();
  if (correction) {
    sections.push({
      id: "correction",
      role: "system",
      title: "Correction",
      content: correction,
    });
  }

  const earlier = args.history.slice(0, -1);
  const latest = args.history.at(-1);

  sections.push({
    id: "transcript",
    role: "user",
    title: "Conversation so far",
    content: earlier.length ? earlier.map(formatTranscriptLine).join("\n\n") : "(no earlier turns)",
  });

  sections.push({
    id: "latest",
    role: "user",
    title: "Latest message",
    content: latest ? formatTranscriptLine(latest) : "(empty)",
  });

  return { version: "prompt-pack-v1", sections };
}

/**
 * Single stable string with section headers; the OpenAI client sends it as
 * `input`.
 */
export function toSinglePromptText(pack: PromptPack): string {
  const parts: string[] = [];

  for (const s of pack.sections) {
    parts.push(`## ${s.title} (${s.role})`);
    parts.push(s.content);
    parts.push("");
  }

  return parts.join("\n").trim();
}

/**
 * Small helper for structured logs. Avoid logging full content by default.
 */
export function promptPackLogShape(pack: PromptPack): {
  version: PromptPack["version"];
  sectionBytes: Array<{ id: PromptSectionId; bytes: number }>;
} {
  return {
    version: pack.version,
    sectionBytes: pack.sections.map((s) => ({
      id: s.id,
      bytes: Buffer.byteLength(s.content, "utf8"),
    })),
  };
}
