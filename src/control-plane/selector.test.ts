import { describe, it, expect } from "vitest";

import { createMessage, type ConversationMessage } from "../contracts/conversation";
import { SelectionError } from "./errors";
import { selectNext } from "./selector";

const user = (content = "metadata") => createMessage({ role: "user", authorName: "user", content, ordinal: 0 });

const agent = (authorName: string, ordinal: number) =>
  createMessage({ role: "agent", authorName, content: "...", ordinal });

describe("selectNext", () => {
  it("starts with the formulator", () => {
    expect(selectNext([])).toBe("formulator");
    expect(selectNext([user()])).toBe("formulator");
  });

  it("cycles formulator -> retriever -> evaluator -> formulator", () => {
    const history: ConversationMessage[] = [user()];
    const picked: string[] = [];
    for (let i = 1; i <= 6; i++) {
      const next = selectNext(history);
      picked.push(next);
      history.push(agent(next, i));
    }
    expect(picked).toEqual(["formulator", "retriever", "evaluator", "formulator", "retriever", "evaluator"]);
  });

  it("returns the same agent when replayed on the same history", () => {
    const history = [user(), agent("formulator", 1), agent("retriever", 2)];
    expect(selectNext(history)).toBe("evaluator");
    expect(selectNext(history)).toBe("evaluator");
    expect(history).toHaveLength(3);
  });

  it("rejects a message from an unknown author", () => {
    const history = [user(), agent("reviewer", 1)];
    expect(() => selectNext(history)).toThrow(SelectionError);
    expect(() => selectNext(history)).toThrow("last message is not attributable to a known agent: reviewer");
  });

  it("rejects a user message after the seed", () => {
    const history = [user(), agent("formulator", 1), createMessage({ role: "user", authorName: "user", content: "more", ordinal: 2 })];
    try {
      selectNext(history);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(SelectionError);
      if (error instanceof SelectionError) expect(error.ordinal).toBe(2);
    }
  });
});
