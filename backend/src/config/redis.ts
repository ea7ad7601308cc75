// config/redis.ts — ioredis client for the rate-limit counters (per IP and per user).
// Chat state never lives here; a lost counter only resets a window.

import { Redis } from "ioredis";

import { env } from "./env.js";
import { logger } from "./logger.js";

export const redis = new Redis(env.REDIS_URL, {
  connectionName: "random-chat-limiter",
  maxRetriesPerRequest: 1,
  enableReadyCheck: false,
});

redis.on("error", (err) => {
  logger.error({ err: err.message }, "Rate-limit store connection error");
});

redis.on("ready", () => {
  logger.info("Rate-limit store ready");
});

redis.on("reconnecting", (delay: number) => {
  logger.warn({ delay }, "Rate-limit store reconnecting");
});
