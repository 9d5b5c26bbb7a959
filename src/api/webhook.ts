import express, { Router } from "express";
import type { ErrorRequestHandler } from "express";
import type { Logger } from "pino";
import type { Bridge } from "../plugin/createBridge.js";
import { whatsappCloudToInboundMessage } from "../adapters/whatsapp-cloud.js";
import { captureRawBody } from "./raw-body.js";
import { makeRateLimiter } from "./rate-limit.js";
import { verifySubscription, verifyWhatsAppSignature } from "./verify-whatsapp.js";
import type { SignatureOptions } from "./verify-whatsapp.js";

export const OK_BODY = { status: "ok" } as const;

export function makeWebhookRoutes(args: {
  bridge: Bridge;
  logger: Logger;
  verifyToken?: string;
  signature: SignatureOptions;
  rateLimit: { windowMs: number; max: number };
}) {
  const r = Router();
  const log = args.logger;

  r.use(makeRateLimiter(args.rateLimit));

  // --- Subscription handshake (GET) ---
  r.get("/", (req, res) => {
    log.info(
      {
        mode: req.query["hub.mode"],
        challenge: req.query["hub.challenge"],
        tokenPresent: typeof req.query["hub.verify_token"] === "string"
      },
      "webhook: verification request"
    );

    const challenge = verifySubscription(req.query, args.verifyToken);
    if (challenge !== null) {
      log.info("webhook: verified");
      return res.status(200).type("text/plain").send(challenge);
    }

    log.warn("webhook: verification failed");
    return res.status(403).type("text/plain").send("Forbidden");
  });

  // --- Notifications (POST) ---
  r.post("/", express.json({ limit: "1mb", verify: captureRawBody }), async (req, res) => {
    const sig = verifyWhatsAppSignature(req, args.signature);
    if (!sig.ok) {
      log.warn({ error: sig.error }, "webhook: signature rejected");
      return res.status(401).json({ status: "error", error: sig.error });
    }

    log.info({ body: req.body }, "webhook: incoming");

    const parsed = whatsappCloudToInboundMessage(req.body);
    if (!parsed.ok) {
      log.warn({ error: parsed.error }, "webhook: unrecognised payload");
      return res.json(OK_BODY);
    }

    try {
      await args.bridge.handleMessage(parsed.message);
    } catch (err) {
      log.error({ err }, "webhook: handler failed");
    }
    return res.json(OK_BODY);
  });

  const onBodyError: ErrorRequestHandler = (err, req, res, next) => {
    if (req.method !== "POST" || res.headersSent) return next(err);
    log.warn({ err }, "webhook: unreadable body");
    res.json(OK_BODY);
  };
  r.use(onBodyError);

  return r;
}
