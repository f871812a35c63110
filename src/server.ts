import "dotenv/config";
import { createApp } from "./app";
import {
  CatalogRepository,
  InMemoryCatalogRepository,
  PgCatalogRepository,
} from "./catalog/catalog.repository";
import { CatalogService } from "./catalog/catalog.service";
import { ConversationService } from "./conversation/conversation.service";
import {
  InMemoryTurnLogRepository,
  PgTurnLogRepository,
  TurnLogRepository,
} from "./conversation/turn-log.repository";
import { loadConfig } from "./config";
import { closePool, getPool } from "./lib/db";
import { initConversationPruneScheduler } from "./scheduler/conversation-prune.scheduler";
import { configureLogger, logger } from "./utils/logger";

const config = loadConfig();
configureLogger(config.logLevel);

let catalogRepository: CatalogRepository;
let turnLogRepository: TurnLogRepository;
if (config.databaseUrl) {
  const pool = getPool(config.databaseUrl);
  catalogRepository = new PgCatalogRepository(pool);
  turnLogRepository = new PgTurnLogRepository(pool);
  logger.info("[DB] Using Postgres catalog and turn log");
} else {
  catalogRepository = new InMemoryCatalogRepository();
  turnLogRepository = new InMemoryTurnLogRepository();
  logger.warn("[DB] DATABASE_URL not set, using in-memory stores");
}

const catalogService = new CatalogService(
  catalogRepository,
  config.catalogCacheTtlMs
);
const conversationService = new ConversationService(
  catalogService,
  turnLogRepository,
  logger,
  config.engine
);

const app = createApp({
  catalogService,
  conversationService,
  isProd: config.isProd,
});

const pruneTask = initConversationPruneScheduler(
  conversationService,
  config.conversationIdleMinutes
);

const server = app.listen(config.port, "0.0.0.0", () => {
  logger.info(`Server running on port ${config.port}`);
  logger.info(`Environment: ${config.env}`);
});

const shutdown = (signal: string) => {
  logger.info(`${signal} received, shutting down`);
  pruneTask.stop();
  server.close(() => {
    closePool()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error({ err }, "Failed to close database pool");
        process.exit(1);
      });
  });
};

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
