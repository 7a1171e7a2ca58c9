import { describe, it, expect } from "vitest";

import { createMessage } from "../src/contracts/conversation";
import {
  buildPromptPack,
  promptPackLogShape,
  toSinglePromptText,
} from "../src/control-plane/prompt_pack";

const history = [
  createMessage({ role: "user", authorName: "user", content: "metadata text", ordinal: 0 }),
  createMessage({ role: "agent", authorName: "formulator", content: "query", ordinal: 1 }),
];

describe("PromptPack", () => {
  it("uses deterministic section order", () => {
    const pack = buildPromptPack({ history });

    expect(pack.version).toBe("prompt-pack-v1");
    expect(pack.sections.map((s) => s.id)).toEqual(["transcript", "latest"]);
    expect(pack.sections.map((s) => s.content)).toEqual([
      "[0] user (user):\nmetadata text",
      "[1] formulator (agent):\nquery",
    ]);
  });

  it("puts the correction first as a system section", () => {
    const pack = buildPromptPack({ history, correction: "  Fix the output.  " });

    expect(pack.sections.map((s) => s.id)).toEqual(["correction", "transcript", "latest"]);
    expect(pack.sections[0]).toEqual({
      id: "correction",
      role: "system",
      title: "Correction",
      content: "Fix the output.",
    });
  });

  it("ignores a blank correction", () => {
    expect(buildPromptPack({ history, correction: "   " }).sections.map((s) => s.id)).toEqual([
      "transcript",
      "latest",
    ]);
  });

  it("keeps both sections for an empty history", () => {
    const pack = buildPromptPack({ history: [] });
    expect(pack.sections.map((s) => s.content)).toEqual(["(no earlier turns)", "(empty)"]);
  });

  it("renders stable section headers", () => {
    expect(toSinglePromptText(buildPromptPack({ history }))).toBe(
      [
        "## Conversation so far (user)",
        "[0] user (user):",
        "metadata text",
        "",
        "## Latest message (user)",
        "[1] formulator (agent):",
        "query",
      ].join("\n")
    );
  });

  it("logs section sizes instead of content", () => {
    expect(promptPackLogShape(buildPromptPack({ history }))).toEqual({
      version: "prompt-pack-v1",
      sectionBytes: [
        { id: "transcript", bytes: 30 },
        { id: "latest", bytes: 29 },
      ],
    });
  });
});
