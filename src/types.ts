// =============================================================================
// Shared domain types
// =============================================================================

/** Text extracted from an uploaded HTML snippet, addressed by its token. */
export interface StoredContent {
  token: string;
  text: string;
  createdAt: Date;
}

export type MessageRole = "system" | "user" | "assistant";

export interface ChatMessage {
  role: MessageRole;
  content: string;
}
