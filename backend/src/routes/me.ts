// routes/me.ts — The caller's profile, inbox, topics and account.

import { Hono } from "hono";
import { z } from "zod/v4";

import { roomPolicy } from "../config/env.js";
import { listConversations } from "../core/ledger.js";
import {
  addTopic,
  agreeTerms,
  deleteAccount,
  listTopics,
  removeTopic,
  updateDisplayName,
} from "../core/users.js";
import type { AuthEnv } from "../middleware/auth.js";
import { hub } from "../realtime/hub.js";
import { announceConversations, announceMembers, announceToRooms } from "../realtime/notify.js";
import { chatStore } from "../store/index.js";

const policy = roomPolicy();

const meRouter = new Hono<AuthEnv>();

const displayNameBody = z.object({ name: z.string().max(150, "Display name too long") });
const topicBody = z.object({ name: z.string().max(100, "Topic too long") });

meRouter.get("/", async (c) => {
  const user = c.get("user");
  const topics = await listTopics(chatStore, user.id);
  return c.json({
    id: user.id,
    username: user.username,
    displayName: user.displayName,
    isVerified: user.isVerified,
    agreedTerms: user.agreedTerms,
    topics,
  });
});

meRouter.put("/display-name", async (c) => {
  const user = c.get("user");
  const parsed = displayNameBody.safeParse(await c.req.json().catch(() => undefined));
  if (!parsed.success) {
    return c.json({ error: parsed.error.issues[0]?.message ?? "Invalid request" }, 400);
  }

  const result = await updateDisplayName(chatStore, user, parsed.data.name);
  switch (result.status) {
    case "ignored":
      return c.body(null, 204);
    case "taken":
      await hub.sendToUser(user.id, { type: "display_name_rejected", name: result.displayName });
      return c.json({ error: "Display name already taken" }, 409);
    case "updated":
      for (const roomId of result.roomIds) {
        const memberIds = await announceMembers(chatStore, hub, roomId);
        await hub.sendToUsers(memberIds, { type: "messages_refreshed", roomId });
      }
      await announceConversations(hub, result.participantsToRefresh);
      await hub.sendToUser(user.id, {
        type: "display_name_changed",
        displayName: result.displayName,
      });
      return c.json({ displayName: result.displayName });
  }
});

meRouter.get("/conversations", async (c) => {
  const user = c.get("user");
  return c.json(await listConversations(chatStore, user.id));
});

meRouter.get("/topics", async (c) => {
  const user = c.get("user");
  return c.json(await listTopics(chatStore, user.id));
});

meRouter.post("/topics", async (c) => {
  const user = c.get("user");
  const parsed = topicBody.safeParse(await c.req.json().catch(() => undefined));
  if (!parsed.success) {
    return c.json({ error: parsed.error.issues[0]?.message ?? "Invalid request" }, 400);
  }
  const added = await addTopic(chatStore, user.id, parsed.data.name);
  return c.json(await listTopics(chatStore, user.id), added ? 201 : 200);
});

meRouter.delete("/topics/:name", async (c) => {
  const user = c.get("user");
  const removed = await removeTopic(chatStore, user.id, c.req.param("name"));
  if (!removed) return c.json({ error: "Topic not found" }, 404);
  return c.json(await listTopics(chatStore, user.id));
});

meRouter.post("/agree-terms", async (c) => {
  const user = c.get("user");
  await agreeTerms(chatStore, user.id);
  return c.json({ agreedTerms: true });
});

meRouter.delete("/", async (c) => {
  const user = c.get("user");
  const roomIds = await deleteAccount(chatStore, user, policy);
  await announceToRooms(chatStore, hub, roomIds);
  return c.body(null, 204);
});

export default meRouter;
