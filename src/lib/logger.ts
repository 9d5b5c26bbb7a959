import { pino } from "pino";
import type { Logger } from "pino";
import type { LogLevel } from "../config.js";

export type { Logger };

export function makeLogger(level: LogLevel = "info"): Logger {
  return pino({
    level,
    base: { service: "wa-image-metadata-bridge" },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: {
      paths: ["req.headers.authorization", "req.headers[\"x-hub-signature-256\"]"],
      censor: "[redacted]",
    },
  });
}
