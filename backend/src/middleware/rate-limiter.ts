// middleware/rate-limiter.ts — Redis-backed rate limiters.

import type { Context } from "hono";
import { RedisStore, rateLimiter } from "hono-rate-limiter";

import { env } from "../config/env.js";
import { redis } from "../config/redis.js";
import type { AuthEnv } from "./auth.js";

const redisClient = {
  scriptLoad: (script: string) => redis.script("LOAD", script) as Promise<string>,
  evalsha: <TArgs extends unknown[], TData = unknown>(sha1: string, keys: string[], args: TArgs) =>
    redis.evalsha(sha1, keys.length, ...keys, ...(args as string[])) as Promise<TData>,
  decr: (key: string) => redis.decr(key),
  del: (key: string) => redis.del(key),
};

/**
 * Client IP. x-forwarded-for is only trusted in production, where the service runs
 * behind a known reverse proxy; the last entry is the one that proxy added.
 */
function clientIp(c: Context): string {
  if (env.NODE_ENV === "production") {
    const xff = c.req.header("x-forwarded-for");
    if (xff) {
      const parts = xff
        .split(",")
        .map((s) => s.trim())
        .filter(Boolean);
      return parts[parts.length - 1] ?? "unknown";
    }
  }
  return c.req.header("x-real-ip") ?? "unknown";
}

export const globalLimiter = rateLimiter({
  windowMs: 60 * 1000,
  limit: 300,
  keyGenerator: (c) => clientIp(c),
  store: new RedisStore({ client: redisClient, prefix: "rl:global:" }),
  standardHeaders: "draft-7",
});

// Commands per user: matchmaking, joins and messages all count
export const commandLimiter = rateLimiter<AuthEnv>({
  windowMs: 60 * 1000,
  limit: 120,
  keyGenerator: (c) => c.get("user").id,
  store: new RedisStore<AuthEnv>({ client: redisClient, prefix: "rl:command:" }),
  standardHeaders: "draft-7",
});
