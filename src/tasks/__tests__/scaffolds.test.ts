import { describe, it, expect } from "vitest";
import {
  answerScaffold,
  chatScaffold,
  grammarScaffold,
  summarizeScaffold,
  translateScaffold,
} from "../scaffolds.js";

describe("task scaffolds", () => {
  it("summarize sends the stored text as the user turn", () => {
    const messages = summarizeScaffold("Hello");
    expect(messages).toHaveLength(2);
    expect(messages[0]?.role).toBe("system");
    expect(messages[0]?.content).toContain("Summarize the following content");
    expect(messages[1]).toEqual({ role: "user", content: "Hello" });
  });

  it("answer embeds the text and question", () => {
    expect(answerScaffold("Hello", "What?")).toEqual([
      { role: "system", content: "You are answering questions based on the following HTML content." },
      { role: "user", content: "HTML:\nHello\n\nQuestion:\nWhat?" },
    ]);
  });

  it("grammar sends the text unchanged", () => {
    const messages = grammarScaffold("i has a apple");
    expect(messages[1]).toEqual({ role: "user", content: "i has a apple" });
  });

  it("translate names the target language", () => {
    expect(translateScaffold("Hello", "French")).toEqual([
      {
        role: "system",
        content: "Translate the user's text into French. Reply with the translation only.",
      },
      { role: "user", content: "Hello" },
    ]);
  });

  it("chat puts the selected content before the question", () => {
    const messages = chatScaffold("Cats sleep a lot.", "Do cats sleep?");
    expect(messages[1]).toEqual({
      role: "user",
      content: "Content:\nCats sleep a lot.\n\nQuestion:\nDo cats sleep?",
    });
  });
});
