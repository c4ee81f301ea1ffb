import { describe, it, expect, beforeEach, afterAll } from "vitest";
import { ContentService } from "../content-service.js";
import { InMemoryContentStore } from "../../adapters/storage/inmemory-content-store.adapter.js";
import { TiktokenBudgeter } from "../../adapters/token-counter/tiktoken.adapter.js";
import { CompletionError, NotFoundError, StorageError, ValidationError } from "../../errors.js";
import { fail } from "../../result.js";
import {
  FakeCompletion,
  UnreachableStore,
  createCapturingLogger,
} from "../../__tests__/helpers/fakes.js";

const budgeter = new TiktokenBudgeter();

afterAll(() => {
  budgeter.dispose();
});

describe("ContentService", () => {
  let store: InMemoryContentStore;
  let completion: FakeCompletion;
  let service: ContentService;

  beforeEach(() => {
    store = new InMemoryContentStore();
    completion = new FakeCompletion();
    service = new ContentService({
      store,
      completion,
      budgeter,
      budget: { maxTokens: 4096, encoding: "cl100k_base" },
    });
  });

  async function storedText(token: string): Promise<string> {
    const entry = await store.get(token);
    if (!entry.success) throw entry.error;
    return entry.data.text;
  }

  describe("upload", () => {
    it("stores the visible text and returns its token", async () => {
      const result = await service.upload(
        "<html><body><p>Hello</p><script>evil()</script></body></html>",
      );
      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(await storedText(result.data)).toBe("Hello");
    });

    it("rejects HTML without visible text and stores nothing", async () => {
      for (const html of ["", "<div style=\"display:none\">x</div>", "<script>a()</script>"]) {
        const result = await service.upload(html);
        expect(result.success).toBe(false);
        if (result.success) return;
        expect(result.error).toBeInstanceOf(ValidationError);
        expect(result.error.message).toBe("No visible text found in HTML");
      }
      expect(store.size()).toBe(0);
    });

    it("truncates text to the token budget", async () => {
      const small = new ContentService({
        store,
        completion,
        budgeter,
        budget: { maxTokens: 1, encoding: "cl100k_base" },
      });
      const result = await small.upload("<p>hello world</p>");
      if (!result.success) throw result.error;
      expect(await storedText(result.data)).toBe("hello");
    });

    it("reports a budget too small for the first character", async () => {
      class SplittingBudgeter extends TiktokenBudgeter {
        override truncate(): string {
          return "";
        }
      }
      const { logger, entries } = createCapturingLogger();
      const tiny = new ContentService({
        store,
        completion,
        budgeter: new SplittingBudgeter(),
        budget: { maxTokens: 1, encoding: "cl100k_base" },
        logger,
      });

      const result = await tiny.upload("<p>\u{1F642} smile</p>");

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error).toBeInstanceOf(ValidationError);
      expect(result.error.message).toBe(
        "Text does not fit a budget of 1 token(s) without splitting a character",
      );
      expect(entries.map((e) => e.event)).toContain("upload:over-budget");
      expect(store.size()).toBe(0);
    });

    it("issues distinct tokens for identical uploads", async () => {
      const a = await service.upload("<p>same</p>");
      const b = await service.upload("<p>same</p>");
      if (!a.success || !b.success) throw new Error("upload failed");
      expect(a.data).not.toBe(b.data);
    });

    it("surfaces a storage failure", async () => {
      const broken = new ContentService({
        store: new UnreachableStore(),
        completion,
        budgeter,
        budget: { maxTokens: 4096, encoding: "cl100k_base" },
      });
      const result = await broken.upload("<p>Hello</p>");
      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error).toBeInstanceOf(StorageError);
    });

    it("logs the stored token", async () => {
      const { logger, entries } = createCapturingLogger();
      const logged = new ContentService({
        store,
        completion,
        budgeter,
        budget: { maxTokens: 4096, encoding: "cl100k_base" },
        logger,
      });
      const result = await logged.upload("<p>Hello</p>");
      if (!result.success) throw result.error;
      expect(entries.find((e) => e.event === "upload:stored")?.data).toEqual({
        token: result.data,
        textLength: 5,
        truncated: false,
      });
    });
  });

  describe("summarize", () => {
    it("sends the stored text through the summary scaffold", async () => {
      completion.reply = { success: true, data: "A greeting." };
      const uploaded = await service.upload("<p>Hello</p>");
      if (!uploaded.success) throw uploaded.error;

      const result = await service.summarize(uploaded.data);

      expect(result).toEqual({ success: true, data: "A greeting." });
      expect(completion.calls).toHaveLength(1);
      expect(completion.calls[0]?.[1]).toEqual({ role: "user", content: "Hello" });
    });

    it("returns NotFoundError without calling the model", async () => {
      const result = await service.summarize("missing");
      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error).toBeInstanceOf(NotFoundError);
      expect(completion.calls).toHaveLength(0);
    });

    it("propagates a completion failure", async () => {
      completion.reply = fail(new CompletionError("Completion failed: timeout"));
      const uploaded = await service.upload("<p>Hello</p>");
      if (!uploaded.success) throw uploaded.error;

      const result = await service.summarize(uploaded.data);
      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error).toBeInstanceOf(CompletionError);
    });
  });

  describe("ask", () => {
    it("embeds the stored text and the question", async () => {
      const uploaded = await service.upload("<p>Cats sleep a lot.</p>");
      if (!uploaded.success) throw uploaded.error;

      const result = await service.ask(uploaded.data, "Do cats sleep?");

      expect(result).toEqual({ success: true, data: "fake reply" });
      expect(completion.calls[0]?.[1]).toEqual({
        role: "user",
        content: "HTML:\nCats sleep a lot.\n\nQuestion:\nDo cats sleep?",
      });
    });

    it("returns NotFoundError for an unknown token", async () => {
      const result = await service.ask("missing", "Why?");
      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.code).toBe("NOT_FOUND");
    });
  });

  describe("stateless tasks", () => {
    it("correctGrammar passes the text to the model", async () => {
      const result = await service.correctGrammar("i has a apple");
      expect(result).toEqual({ success: true, data: "fake reply" });
      expect(completion.calls[0]?.[1]).toEqual({ role: "user", content: "i has a apple" });
    });

    it("translate names the target language", async () => {
      await service.translate("Hello", "German");
      expect(completion.calls[0]?.[0]?.content).toBe(
        "Translate the user's text into German. Reply with the translation only.",
      );
    });

    it("chat sends the selected content and question", async () => {
      await service.chat("What is it?", "A red ball.");
      expect(completion.calls[0]?.[1]).toEqual({
        role: "user",
        content: "Content:\nA red ball.\n\nQuestion:\nWhat is it?",
      });
    });

    it("never touches the store", async () => {
      const stateless = new ContentService({
        store: new UnreachableStore(),
        completion,
        budgeter,
        budget: { maxTokens: 4096, encoding: "cl100k_base" },
      });
      expect((await stateless.correctGrammar("text")).success).toBe(true);
    });
  });
});
