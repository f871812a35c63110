import express from "express";
import cors from "cors";
import helmet from "helmet";
import rateLimit from "express-rate-limit";
import pinoHttp from "pino-http";
import { createCatalogRouter } from "./catalog/catalog.controller";
import { CatalogService } from "./catalog/catalog.service";
import { createConversationRouter } from "./conversation/conversation.controller";
import { ConversationService } from "./conversation/conversation.service";
import { errorHandler } from "./middleware/error.middleware";
import { logger } from "./utils/logger";

export type AppDependencies = {
  catalogService: CatalogService;
  conversationService: ConversationService;
  isProd?: boolean;
};

export const createApp = ({
  catalogService,
  conversationService,
  isProd = false,
}: AppDependencies) => {
  const app = express();

  app.use(express.json({ limit: "64kb" }));
  app.use(helmet());
  app.use(
    rateLimit({
      windowMs: 15 * 60 * 1000,
      max: isProd ? 300 : 5000,
      standardHeaders: true,
      legacyHeaders: false,
    })
  );
  app.use(pinoHttp({ logger }));

  app.use(
    cors({
      origin: "*",
      methods: ["GET", "POST", "DELETE"],
      allowedHeaders: ["Content-Type", "X-Requested-With"],
    })
  );

  // Tolerate a doubled /api prefix from misconfigured front-end proxies
  app.use((req, _res, next) => {
    if (req.url.startsWith("/api/api/")) {
      req.url = req.url.replace(/^\/api\/api\//, "/api/");
    }
    next();
  });

  app.get("/api/healthz", (_req, res) => {
    res.json({
      ok: true,
      activeConversations: conversationService.activeConversations(),
    });
  });

  app.use("/api/products", createCatalogRouter(catalogService));
  app.use("/api/conversations", createConversationRouter(conversationService));

  // Error handling middleware
  app.use(errorHandler);

  return app;
};
