// =============================================================================
// Task scaffolds — fixed message lists sent to the completion backend
// =============================================================================

import type { ChatMessage } from "../types.js";

const SUMMARIZE_INSTRUCTION =
  "Summarize the following content extracted from a web page. Focus only on its text. " +
  "Do not include any HTML tags or attributes in the summary. " +
  "The summary should be concise and informative.";

const ANSWER_INSTRUCTION =
  "You are answering questions based on the following HTML content.";

const GRAMMAR_INSTRUCTION =
  "Correct the grammar, spelling and punctuation of the user's text. " +
  "Keep its meaning and tone. Reply with the corrected text only.";

const CHAT_INSTRUCTION =
  "You are answering questions about content the user selected on a web page. " +
  "Base your answer on that content.";

export function summarizeScaffold(text: string): ChatMessage[] {
  return [
    { role: "system", content: SUMMARIZE_INSTRUCTION },
    { role: "user", content: text },
  ];
}

export function answerScaffold(text: string, question: string): ChatMessage[] {
  return [
    { role: "system", content: ANSWER_INSTRUCTION },
    { role: "user", content: `HTML:\n${text}\n\nQuestion:\n${question}` },
  ];
}

export function grammarScaffold(text: string): ChatMessage[] {
  return [
    { role: "system", content: GRAMMAR_INSTRUCTION },
    { role: "user", content: text },
  ];
}

export function translateScaffold(text: string, targetLang: string): ChatMessage[] {
  return [
    {
      role: "system",
      content: `Translate the user's text into ${targetLang}. Reply with the translation only.`,
    },
    { role: "user", content: text },
  ];
}

export function chatScaffold(selectedContent: string, question: string): ChatMessage[] {
  return [
    { role: "system", content: CHAT_INSTRUCTION },
    { role: "user", content: `Content:\n${selectedContent}\n\nQuestion:\n${question}` },
  ];
}
