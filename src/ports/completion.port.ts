// =============================================================================
// CompletionPort — Language-model completion over role-tagged messages
// =============================================================================

import type { CompletionError } from "../errors.js";
import type { Result } from "../result.js";
import type { ChatMessage } from "../types.js";

export interface CompletionPort {
  /** Send the messages to the backend and return its reply text verbatim */
  complete(messages: ChatMessage[]): Promise<Result<string, CompletionError>>;
}
