// =============================================================================
// pagebrief — Public API
// =============================================================================

export type { StoredContent, ChatMessage, MessageRole } from "./types.js";
export type { Result } from "./result.js";
export { ok, fail } from "./result.js";
export {
  PageBriefError,
  ValidationError,
  NotFoundError,
  StorageError,
  CompletionError,
  ConfigError,
  type ErrorCode,
} from "./errors.js";

// Ports
export type { ContentStorePort } from "./ports/content-store.port.js";
export type { CompletionPort } from "./ports/completion.port.js";

// Core
export { extractVisibleText } from "./extraction/visible-text.js";
export {
  TiktokenBudgeter,
  truncateToTokenLimit,
  isTokenizerEncoding,
  TOKENIZER_ENCODINGS,
  type TokenizerEncoding,
} from "./adapters/token-counter/tiktoken.adapter.js";
export { InMemoryContentStore, type InMemoryContentStoreOptions } from "./adapters/storage/inmemory-content-store.adapter.js";
export {
  PostgresContentStore,
  type PostgresContentStoreOptions,
} from "./adapters/storage/postgres/postgres-content-store.adapter.js";
export {
  AiSdkCompletionGateway,
  type AiSdkCompletionGatewayOptions,
} from "./adapters/completion/ai-sdk-completion.adapter.js";
export { ollama, type OllamaProviderOptions } from "./providers/ollama.js";
export { ExpiryScheduler, type ExpirySchedulerOptions, type SweepReport } from "./scheduler/expiry-scheduler.js";
export { ContentService, type ContentServiceOptions, type TokenBudget } from "./service/content-service.js";
export * as scaffolds from "./tasks/scaffolds.js";

// Ambient
export { loadConfig, type AppConfig } from "./config/config.js";
export {
  createLogger,
  createRotatingFileSink,
  consoleSink,
  silentLogger,
  type Logger,
  type LogEntry,
  type LogLevel,
  type LogSink,
} from "./logging/logger.js";
export { createApp, type App, type AppOverrides } from "./app.js";
export { PageBriefServer } from "./rest/index.js";
