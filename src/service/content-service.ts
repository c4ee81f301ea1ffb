// =============================================================================
// ContentService — Upload, lookup and completion tasks over stored text
// =============================================================================

import type { ContentStorePort } from "../ports/content-store.port.js";
import type { CompletionPort } from "../ports/completion.port.js";
import {
  ValidationError,
  type CompletionError,
  type NotFoundError,
  type StorageError,
} from "../errors.js";
import { fail, type Result } from "../result.js";
import type { ChatMessage } from "../types.js";
import { extractVisibleText } from "../extraction/visible-text.js";
import type { TiktokenBudgeter } from "../adapters/token-counter/tiktoken.adapter.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import {
  answerScaffold,
  chatScaffold,
  grammarScaffold,
  summarizeScaffold,
  translateScaffold,
} from "../tasks/scaffolds.js";

export interface TokenBudget {
  maxTokens: number;
  encoding: string;
}

export interface ContentServiceOptions {
  store: ContentStorePort;
  completion: CompletionPort;
  budgeter: TiktokenBudgeter;
  budget: TokenBudget;
  logger?: Logger;
}

export type StoredTaskError = NotFoundError | StorageError | CompletionError;

export class ContentService {
  private readonly store: ContentStorePort;
  private readonly completion: CompletionPort;
  private readonly budgeter: TiktokenBudgeter;
  private readonly budget: TokenBudget;
  private readonly logger: Logger;

  constructor(options: ContentServiceOptions) {
    this.store = options.store;
    this.completion = options.completion;
    this.budgeter = options.budgeter;
    this.budget = options.budget;
    this.logger = options.logger ?? silentLogger;
  }

  /** Extract, budget and store the visible text of `html`. Resolves to the new token. */
  async upload(html: string): Promise<Result<string, ValidationError | StorageError>> {
    const extracted = extractVisibleText(html);
    if (!extracted) {
      this.logger.warn("upload:empty", { htmlLength: html.length });
      return fail(new ValidationError("No visible text found in HTML"));
    }

    const text = this.budgeter.truncate(extracted, this.budget.maxTokens, this.budget.encoding);
    if (!text) {
      // the first character alone needs more tokens than the budget allows
      this.logger.warn("upload:over-budget", {
        textLength: extracted.length,
        maxTokens: this.budget.maxTokens,
      });
      return fail(
        new ValidationError(
          `Text does not fit a budget of ${this.budget.maxTokens} token(s) without splitting a character`,
        ),
      );
    }

    const inserted = await this.store.insert(text);
    if (inserted.success) {
      this.logger.info("upload:stored", {
        token: inserted.data,
        textLength: text.length,
        truncated: text.length < extracted.length,
      });
    }
    return inserted;
  }

  async summarize(token: string): Promise<Result<string, StoredTaskError>> {
    return this.withStoredText(token, "summarize", (text) => summarizeScaffold(text));
  }

  async ask(token: string, question: string): Promise<Result<string, StoredTaskError>> {
    return this.withStoredText(token, "ask", (text) => answerScaffold(text, question));
  }

  async correctGrammar(text: string): Promise<Result<string, CompletionError>> {
    return this.run("correct-grammar", grammarScaffold(text));
  }

  async translate(text: string, targetLang: string): Promise<Result<string, CompletionError>> {
    return this.run("translate", translateScaffold(text, targetLang));
  }

  async chat(question: string, selectedContent: string): Promise<Result<string, CompletionError>> {
    return this.run("chat", chatScaffold(selectedContent, question));
  }

  private async withStoredText(
    token: string,
    task: string,
    scaffold: (text: string) => ChatMessage[],
  ): Promise<Result<string, StoredTaskError>> {
    const entry = await this.store.get(token);
    if (!entry.success) {
      if (entry.error.code === "NOT_FOUND") {
        this.logger.warn(`${task}:not-found`, { token });
      }
      return entry;
    }
    return this.run(task, scaffold(entry.data.text));
  }

  private async run(
    task: string,
    messages: ChatMessage[],
  ): Promise<Result<string, CompletionError>> {
    const result = await this.completion.complete(messages);
    if (result.success) {
      this.logger.info(`${task}:done`, { replyLength: result.data.length });
    }
    return result;
  }
}
