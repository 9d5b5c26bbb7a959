import rateLimit from "express-rate-limit";

export function makeRateLimiter(opts: { windowMs: number; max: number }) {
  return rateLimit({
    windowMs: opts.windowMs,
    limit: opts.max,
    standardHeaders: true,
    legacyHeaders: false,
    message: { status: "error", error: "rate_limited" }
  });
}
