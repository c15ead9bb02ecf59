import { createApp } from "./app";
import { loadConfig } from "./config";
import { ProductParserService } from "./crawlers/productParser";
import { BrowserPageLoader } from "./lib/browser";
import { Database } from "./lib/db";
import { ResilientHttpClient } from "./lib/http";
import { Logger } from "./lib/logger";
import { MergeStore } from "./lib/mergeStore";
import { BrainSource } from "./sources/brain";
import { ComfySource } from "./sources/comfy";
import { HotlineSource } from "./sources/hotline";
import { SourceRegistry } from "./sources/registry";

const config = loadConfig();
const logger = new Logger("parser.server", config.LOG_LEVEL);

const retry = { attempts: config.FETCH_RETRIES, baseDelayMs: config.FETCH_RETRY_DELAY_MS };
const http = new ResilientHttpClient({ ...retry, timeoutMs: config.REQUEST_TIMEOUT_MS }, logger.child("http"));
const pages = new BrowserPageLoader({ ...retry, timeoutMs: config.BROWSER_TIMEOUT_MS }, logger.child("browser"));

const database = new Database(config.DATABASE_URL);
const sources = new SourceRegistry([
  new HotlineSource({ http, cityId: config.HOTLINE_CITY_ID, logger: logger.child("hotline") }),
  new ComfySource({ http, pages, logger: logger.child("comfy") }),
  new BrainSource({ http, logger: logger.child("brain") })
]);
const parser = new ProductParserService(sources, new MergeStore(database, logger.child("store")), database, logger);

const app = createApp(parser, logger);

const start = async (): Promise<void> => {
  try {
    await database.ensureSchema();
  } catch (error) {
    logger.error("schema_init_failed", { error });
  }

  const server = app.listen(config.PORT, () => {
    logger.info("server_started", {
      port: config.PORT,
      log_level: config.LOG_LEVEL,
      persistence: database.isEnabled() ? "enabled" : "disabled",
      sources: sources.domains(),
      fetch_retries: config.FETCH_RETRIES,
      request_timeout_ms: config.REQUEST_TIMEOUT_MS,
      browser_timeout_ms: config.BROWSER_TIMEOUT_MS
    });
  });

  const shutdown = async (): Promise<void> => {
    logger.info("shutdown_started");
    server.close();
    await database.close();
    logger.info("shutdown_completed");
  };

  process.on("SIGINT", () => {
    void shutdown();
  });

  process.on("SIGTERM", () => {
    void shutdown();
  });
};

start().catch((error: unknown) => {
  logger.error("startup_failed", { error });
  process.exitCode = 1;
});
