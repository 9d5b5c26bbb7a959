import { Router } from "express";
import type { Logger } from "pino";
import type { Config } from "../config.js";
import { maskSecret } from "../lib/_util.js";

export const ROOT_HTML = "<pre>Nothing to see here.\nCheckout README.md to start.</pre>";

export function debugSnapshot(config: Config) {
  return {
    WEBHOOK_VERIFY_TOKEN: maskSecret(config.verifyToken),
    GRAPH_API_TOKEN: maskSecret(config.graph.token),
    PORT: config.rawPort
  };
}

export function makeRoutes(args: { config: Config; logger: Logger }) {
  const r = Router();
  const log = args.logger;

  r.get("/", (_req, res) => {
    log.info("root endpoint accessed");
    res.type("text/html").send(ROOT_HTML);
  });

  r.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  if (args.config.debugEndpoint) {
    r.get("/debug", (_req, res) => {
      log.info("debug endpoint accessed");
      res.json(debugSnapshot(args.config));
    });
  }

  return r;
}
