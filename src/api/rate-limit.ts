import rateLimit from "express-rate-limit";

export function makeRateLimiter(opts: { windowMs: number; max: number }) {
  return rateLimit({
    windowMs: opts.windowMs,
    max: opts.max,
    standardHeaders: true,
    legacyHeaders: false,
    message: { ok: false, error: "rate_limited" }
  });
}
