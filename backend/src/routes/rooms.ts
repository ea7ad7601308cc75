// routes/rooms.ts — Matchmaking, membership, messages and moderation for rooms.
// Each route commits through the core, then fans events out through the hub.

import type { Context } from "hono";
import { Hono } from "hono";
import { z } from "zod/v4";

import { roomPolicy } from "../config/env.js";
import { logger } from "../config/logger.js";
import { activeQuestions, findRooms, suggestQuestions } from "../core/discovery.js";
import type { HistoryCursor } from "../core/ledger.js";
import { markRead, messagesSince, pagedMessageHistory, recordMessage } from "../core/ledger.js";
import type { MatchRequest } from "../core/matchmaker.js";
import { findOrCreateRoom } from "../core/matchmaker.js";
import { getMembers, leaveRoom, openRoom, renameRoom, setCapacity } from "../core/rooms.js";
import { blockUser, reportUser } from "../core/users.js";
import type { AuthEnv } from "../middleware/auth.js";
import { hub } from "../realtime/hub.js";
import { announceConversations, announceMembers } from "../realtime/notify.js";
import { chatStore } from "../store/index.js";
import type { MessageRecord } from "../store/types.js";

const policy = roomPolicy();

const roomsRouter = new Hono<AuthEnv>();

const roomId = z.string().uuid("Invalid room id");

const matchBody = z.union([
  z.object({ topic: z.string().trim().min(1, "Topic cannot be empty").max(100) }),
  z.object({ question: z.string().trim().min(1, "Question cannot be empty").max(255) }),
]);

const messageBody = z.object({
  content: z.string().max(10000, "Message too long"),
});

const historyQuery = z.object({
  before: z.string().uuid().optional(),
  beforeTs: z.iso.datetime().optional(),
  since: z.iso.datetime().optional(),
});

const questionQuery = z.object({
  question: z.string().trim().min(1, "Question is required").max(255),
});

const usernameBody = z.object({ username: z.string().min(1).max(150) });
const capacityBody = z.object({ limit: z.number().int().min(1).max(1000) });
const nameBody = z.object({ name: z.string().max(150) });

function parseRoomId(c: Context<AuthEnv>): string | undefined {
  const parsed = roomId.safeParse(c.req.param("id"));
  return parsed.success ? parsed.data : undefined;
}

async function readJson(c: Context<AuthEnv>): Promise<unknown> {
  try {
    return await c.req.json();
  } catch {
    return undefined;
  }
}

roomsRouter.post("/match", async (c) => {
  const user = c.get("user");
  const parsed = matchBody.safeParse(await readJson(c));
  if (!parsed.success) {
    return c.json({ error: parsed.error.issues[0]?.message ?? "Invalid request" }, 400);
  }
  const request: MatchRequest =
    "topic" in parsed.data
      ? { kind: "topic", topic: parsed.data.topic }
      : { kind: "question", question: parsed.data.question };

  const result = await findOrCreateRoom(chatStore, user, request, policy);
  if (!result) return c.body(null, 204);

  const memberIds = await announceMembers(chatStore, hub, result.room.id);
  await announceConversations(hub, [...memberIds, user.id]);

  return c.json({
    roomId: result.room.id,
    state: result.state,
    pool: result.pool,
    members: result.members,
    vacatedRoomIds: result.vacatedRoomIds,
  });
});

roomsRouter.get("/search", async (c) => {
  const parsed = questionQuery.safeParse(c.req.query());
  if (!parsed.success) {
    return c.json({ error: parsed.error.issues[0]?.message ?? "Invalid query" }, 400);
  }
  return c.json(await findRooms(chatStore, c.get("user").id, parsed.data.question));
});

roomsRouter.get("/suggestions", async (c) => {
  const parsed = questionQuery.safeParse(c.req.query());
  if (!parsed.success) {
    return c.json({ error: parsed.error.issues[0]?.message ?? "Invalid query" }, 400);
  }
  return c.json(await suggestQuestions(chatStore, c.get("user").id, parsed.data.question));
});

roomsRouter.get("/active", async (c) => {
  return c.json(await activeQuestions(chatStore, c.get("user").id));
});

roomsRouter.post("/:id/join", async (c) => {
  const user = c.get("user");
  const id = parseRoomId(c);
  if (!id) return c.json({ error: "Invalid room id" }, 400);

  const joined = await openRoom(chatStore, user, id, policy);
  if (!joined) return c.body(null, 204);

  if (joined.status === "full") {
    await hub.sendToUser(user.id, { type: "room_full", roomId: id });
    return c.json({ roomId: id, joined: false, state: joined.state, members: joined.members });
  }

  if (joined.wasAdded) {
    await hub.sendToUsers(
      joined.members.map((m) => m.id),
      { type: "members_changed", roomId: id, members: joined.members },
    );
    await announceConversations(
      hub,
      joined.members.map((m) => m.id),
    );
  } else if (await markRead(chatStore, user.id, id)) {
    await announceConversations(hub, [user.id]);
  }

  const messages = await pagedMessageHistory(chatStore, user.id, id, undefined, policy.pageSize);
  return c.json({
    roomId: id,
    joined: true,
    displayName: joined.room.displayName,
    state: joined.state,
    members: joined.members,
    messages: messages ?? [],
  });
});

roomsRouter.post("/:id/leave", async (c) => {
  const user = c.get("user");
  const id = parseRoomId(c);
  if (!id) return c.json({ error: "Invalid room id" }, 400);

  const before = await chatStore.listMembers(id);
  const result = await leaveRoom(chatStore, user.id, id, policy);
  if (!result) return c.json({ error: "Room not found" }, 404);
  if (result.status === "not_member") return c.body(null, 204);

  if (result.state !== "closed") await announceMembers(chatStore, hub, id);
  await announceConversations(hub, [...before.map((m) => m.id), user.id]);
  return c.json({ roomId: id, state: result.state, remaining: result.remaining });
});

roomsRouter.get("/:id/members", async (c) => {
  const id = parseRoomId(c);
  if (!id) return c.json({ error: "Invalid room id" }, 400);
  if (!(await chatStore.findRoom(id))) return c.json({ error: "Room not found" }, 404);
  return c.json(await getMembers(chatStore, id));
});

roomsRouter.get("/:id/messages", async (c) => {
  const user = c.get("user");
  const id = parseRoomId(c);
  if (!id) return c.json({ error: "Invalid room id" }, 400);

  const parsed = historyQuery.safeParse(c.req.query());
  if (!parsed.success) {
    return c.json({ error: parsed.error.issues[0]?.message ?? "Invalid query" }, 400);
  }
  const { before, beforeTs, since } = parsed.data;

  let result: MessageRecord[] | undefined;
  if (since) {
    result = await messagesSince(chatStore, user.id, id, new Date(since));
  } else {
    const cursor: HistoryCursor = before
      ? { beforeMessageId: before }
      : beforeTs
        ? { beforeTimestamp: new Date(beforeTs) }
        : undefined;
    result = await pagedMessageHistory(chatStore, user.id, id, cursor, policy.pageSize);
  }
  if (!result) return c.json({ error: "Room not found" }, 404);
  return c.json(result);
});

roomsRouter.post("/:id/messages", async (c) => {
  const user = c.get("user");
  const id = parseRoomId(c);
  if (!id) return c.json({ error: "Invalid room id" }, 400);

  const parsed = messageBody.safeParse(await readJson(c));
  if (!parsed.success) {
    return c.json({ error: parsed.error.issues[0]?.message ?? "Invalid request" }, 400);
  }

  const recorded = await recordMessage(chatStore, user, id, parsed.data.content);
  if (!recorded) return c.body(null, 204);

  const { message, recipientIds } = recorded;
  await hub.sendToUsers(recipientIds, { type: "new_message", roomId: id, message });
  await announceConversations(hub, recipientIds);
  return c.json(message, 201);
});

roomsRouter.post("/:id/read", async (c) => {
  const user = c.get("user");
  const id = parseRoomId(c);
  if (!id) return c.json({ error: "Invalid room id" }, 400);

  if (await markRead(chatStore, user.id, id)) {
    await announceConversations(hub, [user.id]);
  }
  return c.body(null, 204);
});

roomsRouter.post("/:id/block", async (c) => {
  const user = c.get("user");
  const id = parseRoomId(c);
  if (!id) return c.json({ error: "Invalid room id" }, 400);
  const parsed = usernameBody.safeParse(await readJson(c));
  if (!parsed.success) return c.json({ error: "Username is required" }, 400);

  if (!(await blockUser(chatStore, user, id, parsed.data.username))) {
    return c.json({ error: "User not found in room" }, 404);
  }
  await announceConversations(hub, [user.id]);
  return c.body(null, 204);
});

roomsRouter.post("/:id/report", async (c) => {
  const user = c.get("user");
  const id = parseRoomId(c);
  if (!id) return c.json({ error: "Invalid room id" }, 400);
  const parsed = usernameBody.safeParse(await readJson(c));
  if (!parsed.success) return c.json({ error: "Username is required" }, 400);

  if (!(await reportUser(chatStore, user, id, parsed.data.username))) {
    return c.json({ error: "User not found in room" }, 404);
  }
  return c.body(null, 204);
});

roomsRouter.put("/:id/capacity", async (c) => {
  const user = c.get("user");
  const id = parseRoomId(c);
  if (!id) return c.json({ error: "Invalid room id" }, 400);
  const parsed = capacityBody.safeParse(await readJson(c));
  if (!parsed.success) {
    return c.json({ error: parsed.error.issues[0]?.message ?? "Invalid request" }, 400);
  }

  const result = await setCapacity(chatStore, user.id, id, parsed.data.limit);
  if (!result) return c.json({ error: "Room not found" }, 404);

  if (result.changed) {
    logger.info({ roomId: id, maxMembers: result.room.maxMembers }, "Room capacity changed");
    if (result.state === "full") {
      const members = await chatStore.listMembers(id);
      await hub.sendToUsers(
        members.map((m) => m.id),
        { type: "room_full", roomId: id },
      );
    }
  }
  return c.json({
    roomId: id,
    changed: result.changed,
    maxMembers: result.room.maxMembers,
    state: result.state,
  });
});

roomsRouter.put("/:id/name", async (c) => {
  const user = c.get("user");
  const id = parseRoomId(c);
  if (!id) return c.json({ error: "Invalid room id" }, 400);
  const parsed = nameBody.safeParse(await readJson(c));
  if (!parsed.success) return c.json({ error: "Name is required" }, 400);

  if (!(await renameRoom(chatStore, user.id, id, parsed.data.name))) return c.body(null, 204);

  const members = await chatStore.listMembers(id);
  await announceConversations(
    hub,
    members.map((m) => m.id),
  );
  return c.json({ roomId: id, displayName: parsed.data.name.trim() });
});

export default roomsRouter;
