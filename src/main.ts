#!/usr/bin/env node
// =============================================================================
// pagebrief — service entry point
// =============================================================================

import { loadConfig, type AppConfig } from "./config/config.js";
import { createApp } from "./app.js";
import { ConfigError } from "./errors.js";
import { describeError } from "./logging/logger.js";

async function main(): Promise<void> {
  let config: AppConfig;
  try {
    config = loadConfig(process.env);
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(err.message);
      process.exit(1);
    }
    throw err;
  }

  const app = createApp(config);
  await app.start();

  let stopping = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    app.logger.info("app:signal", { signal });
    app.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        app.logger.error("app:stop-failed", describeError(err));
        process.exit(1);
      },
    );
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err: unknown) => {
  console.error("Fatal:", err instanceof Error ? err.message : String(err));
  process.exit(1);
});
