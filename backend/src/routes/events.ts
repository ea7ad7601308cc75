// routes/events.ts — Per-connection SSE stream of chat events.
// Opening the stream puts the user online; closing their last stream takes them
// offline. Events already committed are never rolled back by a disconnect.

import { Hono } from "hono";
import { streamSSE } from "hono/streaming";

import { env } from "../config/env.js";
import { logger } from "../config/logger.js";
import { goOffline, goOnline } from "../core/users.js";
import type { AuthEnv } from "../middleware/auth.js";
import { hub } from "../realtime/hub.js";
import { announceToRooms } from "../realtime/notify.js";
import { chatStore } from "../store/index.js";

const eventsRouter = new Hono<AuthEnv>();

eventsRouter.get("/", (c) => {
  const user = c.get("user");

  return streamSSE(
    c,
    async (stream) => {
      const closed = new Promise<void>((resolve) => stream.onAbort(resolve));
      const connectionId = hub.connect(user.id, async (event) => {
        await stream.writeSSE({ event: event.type, data: JSON.stringify(event) });
      });
      logger.debug({ userId: user.id, connectionId }, "Event stream opened");

      try {
        await stream.writeSSE({ event: "ready", data: JSON.stringify({ connectionId }) });
        await announceToRooms(chatStore, hub, await goOnline(chatStore, user.id));

        while (!stream.aborted) {
          await Promise.race([stream.sleep(env.SSE_KEEPALIVE_MS), closed]);
          if (stream.aborted) break;
          await stream.writeSSE({ event: "ping", data: "" });
        }
      } finally {
        const left = hub.disconnect(connectionId);
        logger.debug({ userId: user.id, connectionId }, "Event stream closed");
        if (left?.lastConnection) {
          await announceToRooms(chatStore, hub, await goOffline(chatStore, user.id));
        }
      }
    },
    async (err) => {
      logger.error({ err: err.message, userId: user.id }, "Event stream error");
    },
  );
});

export default eventsRouter;
