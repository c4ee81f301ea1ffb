// =============================================================================
// Application wiring — builds every service once and owns their lifecycle
// =============================================================================

import type { AppConfig } from "./config/config.js";
import type { ContentStorePort } from "./ports/content-store.port.js";
import type { CompletionPort } from "./ports/completion.port.js";
import { InMemoryContentStore } from "./adapters/storage/inmemory-content-store.adapter.js";
import { PostgresContentStore } from "./adapters/storage/postgres/postgres-content-store.adapter.js";
import { AiSdkCompletionGateway } from "./adapters/completion/ai-sdk-completion.adapter.js";
import { TiktokenBudgeter } from "./adapters/token-counter/tiktoken.adapter.js";
import { ollama } from "./providers/ollama.js";
import { ContentService } from "./service/content-service.js";
import { ExpiryScheduler } from "./scheduler/expiry-scheduler.js";
import { PageBriefServer } from "./rest/server.js";
import {
  consoleSink,
  createLogger,
  createRotatingFileSink,
  type Logger,
  type LogSink,
} from "./logging/logger.js";

export interface AppOverrides {
  store?: ContentStorePort;
  completion?: CompletionPort;
  logger?: Logger;
}

export interface App {
  readonly logger: Logger;
  readonly store: ContentStorePort;
  readonly service: ContentService;
  readonly scheduler: ExpiryScheduler;
  readonly server: PageBriefServer;
  start(): Promise<void>;
  stop(): Promise<void>;
}

export function createLoggerFromConfig(config: AppConfig["logging"]): Logger {
  const sinks: LogSink[] = [consoleSink];
  if (config.file) sinks.push(createRotatingFileSink({ path: config.file }));
  return createLogger({ level: config.level, sinks });
}

function createStore(config: AppConfig["store"]): ContentStorePort {
  if (config.kind === "memory") return new InMemoryContentStore();
  return new PostgresContentStore({
    connectionString: config.connectionString,
    poolSize: config.poolSize,
  });
}

export function createApp(config: AppConfig, overrides: AppOverrides = {}): App {
  const logger = overrides.logger ?? createLoggerFromConfig(config.logging);
  const store = overrides.store ?? createStore(config.store);
  const completion = overrides.completion ?? new AiSdkCompletionGateway({
    model: ollama(config.model.name, { baseURL: config.model.baseURL }),
    temperature: config.model.temperature,
    timeoutMs: config.model.timeoutMs,
    logger,
  });
  const budgeter = new TiktokenBudgeter();

  const service = new ContentService({
    store,
    completion,
    budgeter,
    budget: config.budget,
    logger,
  });
  const scheduler = new ExpiryScheduler({
    store,
    retentionMs: config.expiry.retentionMs,
    intervalMs: config.expiry.intervalMs,
    logger,
  });
  const server = new PageBriefServer(service, config.server, logger);

  let started = false;

  return {
    logger,
    store,
    service,
    scheduler,
    server,

    async start() {
      if (started) return;
      logger.info("app:starting", { model: config.model.name, store: config.store.kind });
      await store.initialize();
      scheduler.start();
      try {
        await server.listen();
      } catch (err) {
        await scheduler.stop();
        await store.close();
        throw err;
      }
      started = true;
    },

    async stop() {
      if (!started) return;
      started = false;
      logger.info("app:stopping");
      await server.close();
      await scheduler.stop();
      await store.close();
      budgeter.dispose();
      logger.info("app:stopped");
      await logger.flush();
    },
  };
}
