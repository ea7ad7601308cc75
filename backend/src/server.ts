// server.ts — Hono web server for the chat service: Pino logging, Redis rate
// limiting, token auth, SSE event streams and graceful shutdown.

import type { ServerType } from "@hono/node-server";
import { serve } from "@hono/node-server";
import { sql } from "drizzle-orm";
import { Hono } from "hono";
import { bodyLimit } from "hono/body-limit";
import { cors } from "hono/cors";
import { pinoLogger } from "hono-pino";

import { env } from "./config/env.js";
import { logger } from "./config/logger.js";
import { redis } from "./config/redis.js";
import { connection, db } from "./db/connection.js";
import { runMigrations } from "./db/migrate.js";
import type { AuthEnv } from "./middleware/auth.js";
import { requireUser } from "./middleware/auth.js";
import { commandLimiter, globalLimiter } from "./middleware/rate-limiter.js";
import { hub } from "./realtime/hub.js";
import eventsRouter from "./routes/events.js";
import meRouter from "./routes/me.js";
import roomsRouter from "./routes/rooms.js";

const app = new Hono<AuthEnv>();

// --- Middleware ---

app.use("*", pinoLogger({ pino: logger }));
app.use("*", bodyLimit({ maxSize: 64 * 1024 })); // 64KB max body
app.use(
  "*",
  cors({
    origin: env.CORS_ORIGINS.split(","),
    allowMethods: ["GET", "POST", "PUT", "DELETE"],
    allowHeaders: ["Content-Type", "Authorization"],
    credentials: true,
  }),
);

app.use("/api/*", globalLimiter);
app.use("/api/rooms/*", requireUser);
app.use("/api/me/*", requireUser);
app.use("/api/events", requireUser);
app.use("/api/rooms/*", commandLimiter);
app.use("/api/me/*", commandLimiter);

// --- Routes ---

app.route("/api/rooms", roomsRouter);
app.route("/api/me", meRouter);
app.route("/api/events", eventsRouter);

app.get("/api/health", async (c) => {
  const checks = { database: false, redis: false };

  try {
    await db.execute(sql`SELECT 1`);
    checks.database = true;
  } catch (err) {
    logger.warn({ err: err instanceof Error ? err.message : String(err) }, "Database check failed");
  }

  try {
    await redis.ping();
    checks.redis = true;
  } catch (err) {
    logger.warn({ err: err instanceof Error ? err.message : String(err) }, "Redis check failed");
  }

  const healthy = checks.database && checks.redis;
  return c.json(
    {
      status: healthy ? "ok" : "degraded",
      checks,
      connections: hub.connectionCount(),
      timestamp: new Date().toISOString(),
    },
    healthy ? 200 : 503,
  );
});

app.get("/", (c) => c.json({ name: "Random Chat Backend", version: "1.0.0" }));

app.onError((err, c) => {
  logger.error({ err: err.message, path: c.req.path }, "Unhandled request error");
  return c.json({ error: "Internal server error" }, 500);
});

// --- Startup + Shutdown ---

let httpServer: ServerType | undefined;

async function start(): Promise<void> {
  await runMigrations();

  httpServer = serve({ fetch: app.fetch, port: env.PORT }, (info) => {
    logger.info({ port: info.port }, "Chat backend running");
  });
}

async function shutdown(signal: string): Promise<void> {
  logger.info({ signal }, "Shutting down gracefully...");
  setTimeout(() => {
    logger.error("Forced shutdown after timeout");
    process.exit(1);
  }, 30_000).unref();

  httpServer?.close();
  await redis.quit().catch((err: unknown) => logger.warn({ err }, "Redis quit failed"));
  await connection.end().catch((err: unknown) => logger.warn({ err }, "Postgres close failed"));

  logger.info("All resources closed");
  process.exit(0);
}

process.on("SIGTERM", () => void shutdown("SIGTERM"));
process.on("SIGINT", () => void shutdown("SIGINT"));

start().catch((err: unknown) => {
  logger.fatal({ err }, "Failed to start server");
  process.exit(1);
});
