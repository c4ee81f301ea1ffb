// =============================================================================
// REST API — Request body schemas
// =============================================================================

import { z } from "zod";

const nonBlank = z.string().trim().min(1);

export const UploadRequestSchema = z.object({
  html: z.string(),
});

export const AskRequestSchema = z.object({
  token: nonBlank,
  question: nonBlank,
});

export const CorrectGrammarRequestSchema = z.object({
  text: nonBlank,
});

export const TranslateRequestSchema = z.object({
  text: nonBlank,
  targetLang: nonBlank,
});

export const ChatRequestSchema = z.object({
  question: nonBlank,
  selectedContent: nonBlank,
});

export type UploadRequest = z.infer<typeof UploadRequestSchema>;
export type AskRequest = z.infer<typeof AskRequestSchema>;
export type CorrectGrammarRequest = z.infer<typeof CorrectGrammarRequestSchema>;
export type TranslateRequest = z.infer<typeof TranslateRequestSchema>;
export type ChatRequest = z.infer<typeof ChatRequestSchema>;
