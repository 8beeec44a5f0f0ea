/**
 * Entry point.
 *
 * Loads configuration, wires the guardian, starts the driver and the
 * HTTP server, and shuts both down on SIGTERM/SIGINT.
 */

import { serve } from "@hono/node-server";
import { loadConfig, loadGuardianConfig, parseApiKeys } from "./config.js";
import { createLogger } from "./logger.js";
import { bootstrap } from "./bootstrap.js";
import { createApp } from "./app.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config);
  const file = loadGuardianConfig(config.CONFIG_PATH);

  const { service, driver, restored } = await bootstrap(config, file, logger);

  const apiKeys = parseApiKeys(config.OPERATOR_API_KEYS);
  if (apiKeys.length === 0) {
    logger.warn("No OPERATOR_API_KEYS configured; operator API is unsecured");
  } else {
    logger.info({ apiKeyCount: apiKeys.length }, "Auth configured");
  }

  const httpLogger = logger.child({ component: "http" });
  const { app } = createApp({
    service,
    auth: { apiKeys },
    logFn: (entry) => {
      httpLogger[entry.level](entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
    onInternalError: (err) => {
      httpLogger.error({ err }, "Unhandled error");
    },
  });

  driver.start();

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  const state = service.current();
  logger.info(
    {
      port: config.PORT,
      host: config.HOST,
      restored,
      mode: state.mode,
      principal: state.principal,
      executor: service.hasExecutor,
    },
    "Yield guardian started",
  );

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Shutdown signal received");
    server.close();
    await driver.stop();
    try {
      await service.writeSnapshot();
    } catch (err) {
      logger.error({ err }, "Final snapshot failed");
    }
    logger.info("Shutdown complete");
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
