import path from "node:path";

import dotenv from "dotenv";
dotenv.config({ path: path.resolve(process.cwd(), ".env.local") });
dotenv.config({ path: path.resolve(process.cwd(), ".env") });

import fs from "node:fs";
import { pino } from "pino";

import { loadConfig, ConfigError } from "./config.js";
import { makeLogger } from "./lib/logger.js";
import { GraphClient } from "./lib/graph-client.js";
import { FileImageStore } from "./store/images.js";
import { createApp } from "./app.js";

async function main() {
  const config = loadConfig();
  const log = makeLogger(config.logLevel);

  const images = new FileImageStore(config.imagesDir);
  const existed = fs.existsSync(images.directory);
  await images.init();
  if (!existed) log.info({ dir: images.directory }, "created images folder");

  const graph = new GraphClient({
    token: config.graph.token,
    baseUrl: config.graph.baseUrl,
    version: config.graph.version,
    maxDownloadBytes: config.mediaMaxBytes
  });

  const app = createApp({ config, logger: log, graph, images });

  const server = app.listen(config.port, () => {
    log.info(
      {
        PORT: config.port,
        IMAGES_DIR: images.directory,
        GRAPH_API_VERSION: config.graph.version,
        VERIFY_TOKEN_CONFIGURED: Boolean(config.verifyToken),
        GRAPH_TOKEN_CONFIGURED: graph.isConfigured(),
        SIGNATURE_ENFORCED: config.signature.enforce,
        DEBUG_ENDPOINT: config.debugEndpoint
      },
      "application is starting up"
    );
  });

  const shutdown = (signal: NodeJS.Signals) => {
    log.info({ signal }, "application is shutting down");
    server.close((err) => {
      if (err) {
        log.error({ err }, "error while closing server");
        process.exit(1);
      }
      process.exit(0);
    });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((err) => {
  const log = pino();
  if (err instanceof ConfigError) {
    log.fatal({ issues: err.issues }, "invalid configuration");
  } else {
    log.fatal({ err }, "fatal");
  }
  process.exit(1);
});
