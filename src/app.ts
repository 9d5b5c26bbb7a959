import express from "express";
import type { Express } from "express";
import { pinoHttp } from "pino-http";
import type { Logger } from "pino";
import type { Config } from "./config.js";
import { makeRoutes } from "./api/routes.js";
import { makeWebhookRoutes } from "./api/webhook.js";
import { createBridge } from "./plugin/createBridge.js";
import type { GraphApi } from "./lib/graph-client.js";
import type { ImageStore } from "./store/images.js";
import type { MetadataResult } from "./types/contracts.js";

export function createApp(args: {
  config: Config;
  logger: Logger;
  graph: GraphApi;
  images: ImageStore;
  extractMetadata?: (filePath: string) => Promise<MetadataResult>;
}): Express {
  const { config, logger } = args;

  const bridge = createBridge({
    graph: args.graph,
    images: args.images,
    logger,
    extractMetadata: args.extractMetadata
  });

  const app = express();
  app.disable("x-powered-by");
  app.use(
    pinoHttp({
      logger,
      customLogLevel: (_req, res, err) => {
        if (res.statusCode >= 500 || err) return "error";
        if (res.statusCode >= 400) return "warn";
        return "info";
      },
      autoLogging: { ignore: (req) => req.url === "/health" }
    })
  );

  app.use(
    "/webhook",
    makeWebhookRoutes({
      bridge,
      logger,
      verifyToken: config.verifyToken,
      signature: config.signature,
      rateLimit: config.rateLimit
    })
  );
  app.use(makeRoutes({ config, logger }));

  return app;
}
