// Tests for routes/rooms.ts — HTTP status mapping and event fan-out for room commands.

import { randomUUID } from "node:crypto";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const store = await vi.hoisted(async () => {
  const { MemoryChatStore } = await import("./helpers/memory-store.js");
  return new MemoryChatStore();
});

vi.mock("../store/index.js", () => ({ chatStore: store }));

vi.mock("../config/env.js", () => ({
  env: { NODE_ENV: "test" },
  roomPolicy: () => ({ defaultCapacity: 5, retainEmptyRooms: false, pageSize: 10 }),
}));

vi.mock("../config/logger.js", () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

import { Hono } from "hono";

import type { AuthEnv } from "../middleware/auth.js";
import type { ChatEvent } from "../realtime/hub.js";
import { hub } from "../realtime/hub.js";
import type { UserRecord } from "../store/types.js";

const { default: roomsRouter } = await import("../routes/rooms.js");

let current: UserRecord;
const app = new Hono<AuthEnv>();
app.use("*", async (c, next) => {
  c.set("user", current);
  await next();
});
app.route("/rooms", roomsRouter);

const connections: string[] = [];

function listen(user: UserRecord): ChatEvent[] {
  const events: ChatEvent[] = [];
  connections.push(
    hub.connect(user.id, async (event) => {
      events.push(event);
    }),
  );
  return events;
}

function send(user: UserRecord, method: string, path: string, body?: unknown) {
  current = user;
  return app.request(path, {
    method,
    headers: { "Content-Type": "application/json" },
    body: body === undefined ? undefined : JSON.stringify(body),
  });
}

async function user(name: string, verified = true): Promise<UserRecord> {
  return store.ensureUser(name, verified);
}

async function roomWith(...members: UserRecord[]): Promise<string> {
  const roomId = randomUUID();
  for (const member of members) {
    await send(member, "POST", `/rooms/${roomId}/join`);
  }
  return roomId;
}

describe("rooms routes", () => {
  beforeEach(() => {
    store.reset();
  });

  afterEach(() => {
    for (const id of connections.splice(0)) hub.disconnect(id);
  });

  describe("POST /rooms/match", () => {
    it("creates a waiting room, then pairs the next user on the same topic", async () => {
      const alice = await user("alice");
      const bob = await user("bob");
      const aliceEvents = listen(alice);

      const first = await send(alice, "POST", "/rooms/match", { topic: "sports" });
      expect(first.status).toBe(200);
      const [roomId] = await store.listRoomIdsForUser(alice.id);
      expect(await first.json()).toMatchObject({
        roomId,
        pool: "new",
        state: "waiting",
        vacatedRoomIds: [],
      });
      expect(aliceEvents.map((e) => e.type)).toEqual(["members_changed", "conversations_changed"]);

      const second = await send(bob, "POST", "/rooms/match", { topic: "sports" });
      expect(await second.json()).toMatchObject({ roomId, pool: "topic", state: "active" });

      const lastMembers = aliceEvents.filter((e) => e.type === "members_changed").at(-1);
      expect(lastMembers?.type === "members_changed" && lastMembers.members.length).toBe(2);
    });

    it("rejects a body without topic or question", async () => {
      const alice = await user("alice");

      const res = await send(alice, "POST", "/rooms/match", {});

      expect(res.status).toBe(400);
    });

    it("answers 204 for unverified users", async () => {
      const guest = await user("guest", false);

      const res = await send(guest, "POST", "/rooms/match", { question: "Anyone up?" });

      expect(res.status).toBe(204);
      expect(store.rooms.size).toBe(0);
    });
  });

  describe("POST /rooms/:id/join", () => {
    it("creates the room for an unknown id and returns an empty history", async () => {
      const alice = await user("alice");
      const roomId = randomUUID();

      const res = await send(alice, "POST", `/rooms/${roomId}/join`);

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        roomId,
        joined: true,
        state: "waiting",
        messages: [],
      });
    });

    it("rejects malformed room ids", async () => {
      const alice = await user("alice");

      const res = await send(alice, "POST", "/rooms/not-a-uuid/join");

      expect(res.status).toBe(400);
    });

    it("signals room_full to the caller when the room has no seat left", async () => {
      const alice = await user("alice");
      const host = await user("host");
      const room = await store.createRoom({ creatorId: host.id, maxMembers: 1 });
      await store.addMember(room.id, host.id, () => true);
      const events = listen(alice);

      const res = await send(alice, "POST", `/rooms/${room.id}/join`);

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ roomId: room.id, joined: false, state: "full" });
      expect(events).toEqual([{ type: "room_full", roomId: room.id }]);
    });

    it("tells existing members about the newcomer", async () => {
      const alice = await user("alice");
      const bob = await user("bob");
      const roomId = await roomWith(alice);
      const aliceEvents = listen(alice);

      await send(bob, "POST", `/rooms/${roomId}/join`);

      expect(aliceEvents.map((e) => e.type)).toEqual(["members_changed", "conversations_changed"]);
    });
  });

  describe("messages", () => {
    it("stores a message, notifies members and serves it in history", async () => {
      const alice = await user("alice");
      const bob = await user("bob");
      const roomId = await roomWith(alice, bob);
      const bobEvents = listen(bob);

      const res = await send(alice, "POST", `/rooms/${roomId}/messages`, { content: "hello" });
      expect(res.status).toBe(201);
      expect(await res.json()).toMatchObject({ roomId, content: "hello", creatorUsername: "alice" });
      expect(bobEvents.map((e) => e.type)).toEqual(["new_message", "conversations_changed"]);

      const history = await send(bob, "GET", `/rooms/${roomId}/messages`);
      expect(history.status).toBe(200);
      expect(await history.json()).toMatchObject([{ content: "hello" }]);
    });

    it("answers 204 for whitespace-only content", async () => {
      const alice = await user("alice");
      const roomId = await roomWith(alice);

      const res = await send(alice, "POST", `/rooms/${roomId}/messages`, { content: "   " });

      expect(res.status).toBe(204);
      expect(store.messages).toHaveLength(0);
    });

    it("refuses history to non-members", async () => {
      const alice = await user("alice");
      const outsider = await user("outsider");
      const roomId = await roomWith(alice);

      const res = await send(outsider, "GET", `/rooms/${roomId}/messages`);

      expect(res.status).toBe(404);
    });

    it("marks the conversation read", async () => {
      const alice = await user("alice");
      const bob = await user("bob");
      const roomId = await roomWith(alice, bob);
      await send(alice, "POST", `/rooms/${roomId}/messages`, { content: "ping" });

      const res = await send(bob, "POST", `/rooms/${roomId}/read`);

      expect(res.status).toBe(204);
      const [conversation] = await store.listConversations(bob.id);
      expect(conversation?.read).toBe(true);
    });
  });

  describe("POST /rooms/:id/leave", () => {
    it("updates the remaining members and is a no-op the second time", async () => {
      const alice = await user("alice");
      const bob = await user("bob");
      const roomId = await roomWith(alice, bob);
      const bobEvents = listen(bob);

      const res = await send(alice, "POST", `/rooms/${roomId}/leave`);
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ roomId, state: "waiting", remaining: 1 });

      const update = bobEvents[0];
      expect(update?.type === "members_changed" && update.members.map((m) => m.id)).toEqual([
        bob.id,
      ]);

      const again = await send(alice, "POST", `/rooms/${roomId}/leave`);
      expect(again.status).toBe(204);
    });

    it("answers 404 for unknown rooms", async () => {
      const alice = await user("alice");

      const res = await send(alice, "POST", `/rooms/${randomUUID()}/leave`);

      expect(res.status).toBe(404);
    });
  });

  describe("GET /rooms/:id/members", () => {
    it("lists members and answers 404 for unknown rooms", async () => {
      const alice = await user("alice");
      const roomId = await roomWith(alice);

      const found = await send(alice, "GET", `/rooms/${roomId}/members`);
      expect(await found.json()).toMatchObject([{ username: "alice" }]);

      const missing = await send(alice, "GET", `/rooms/${randomUUID()}/members`);
      expect(missing.status).toBe(404);
    });
  });

  describe("PUT /rooms/:id/capacity", () => {
    it("lets the creator fill the room and ignores everyone else", async () => {
      const alice = await user("alice");
      const bob = await user("bob");
      const roomId = await roomWith(alice);
      const aliceEvents = listen(alice);

      const res = await send(alice, "PUT", `/rooms/${roomId}/capacity`, { limit: 1 });
      expect(await res.json()).toEqual({ roomId, changed: true, maxMembers: 1, state: "full" });
      expect(aliceEvents).toEqual([{ type: "room_full", roomId }]);

      const denied = await send(bob, "PUT", `/rooms/${roomId}/capacity`, { limit: 10 });
      expect(await denied.json()).toEqual({ roomId, changed: false, maxMembers: 1, state: "full" });
    });

    it("rejects limits below one", async () => {
      const alice = await user("alice");
      const roomId = await roomWith(alice);

      const res = await send(alice, "PUT", `/rooms/${roomId}/capacity`, { limit: 0 });

      expect(res.status).toBe(400);
    });
  });

  describe("moderation", () => {
    it("blocks a fellow member and answers 404 for strangers", async () => {
      const alice = await user("alice");
      const bob = await user("bob");
      const roomId = await roomWith(alice, bob);

      const res = await send(alice, "POST", `/rooms/${roomId}/block`, { username: "bob" });
      expect(res.status).toBe(204);
      expect(await store.listBlockedIds(alice.id)).toEqual([bob.id]);

      const missing = await send(alice, "POST", `/rooms/${roomId}/block`, { username: "nobody" });
      expect(missing.status).toBe(404);

      const malformed = await send(alice, "POST", `/rooms/${roomId}/block`, {});
      expect(malformed.status).toBe(400);
    });

    it("files a report with the room transcript", async () => {
      const alice = await user("alice");
      const bob = await user("bob");
      const roomId = await roomWith(alice, bob);
      await send(bob, "POST", `/rooms/${roomId}/messages`, { content: "rude remark" });

      const res = await send(alice, "POST", `/rooms/${roomId}/report`, { username: "bob" });

      expect(res.status).toBe(204);
      expect(store.reports[0]?.transcript).toEqual(["bob: rude remark"]);
    });
  });

  describe("PUT /rooms/:id/name", () => {
    it("renames the room with the trimmed name", async () => {
      const alice = await user("alice");
      const roomId = await roomWith(alice);

      const res = await send(alice, "PUT", `/rooms/${roomId}/name`, { name: "  Lounge " });

      expect(await res.json()).toEqual({ roomId, displayName: "Lounge" });
      expect((await store.findRoom(roomId))?.displayName).toBe("Lounge");
    });
  });

  describe("question browsing", () => {
    async function askedBy(host: UserRecord, question: string): Promise<string> {
      const room = await store.createRoom({ creatorId: host.id, maxMembers: 5, question });
      await store.addMember(room.id, host.id, () => true);
      return room.id;
    }

    it("searches rooms and suggests distinct questions", async () => {
      const alice = await user("alice");
      const bob = await user("bob");
      const carol = await user("carol");
      const older = await askedBy(alice, "Best pizza in town?");
      const newer = await askedBy(bob, "Best pizza in town?");
      await askedBy(bob, "Favourite film?");

      const search = await send(carol, "GET", "/rooms/search?question=PIZZA");
      expect(search.status).toBe(200);
      expect(await search.json()).toMatchObject([
        { id: newer, question: "Best pizza in town?", memberCount: 1, alreadyJoined: false },
        { id: older, question: "Best pizza in town?", memberCount: 1, alreadyJoined: false },
      ]);

      const suggestions = await send(carol, "GET", "/rooms/suggestions?question=pizza");
      expect(await suggestions.json()).toEqual(["Best pizza in town?"]);
    });

    it("requires a question to search", async () => {
      const alice = await user("alice");

      expect((await send(alice, "GET", "/rooms/search")).status).toBe(400);
      expect((await send(alice, "GET", "/rooms/suggestions?question=%20")).status).toBe(400);
    });

    it("lists active questions newest first when nothing else tells them apart", async () => {
      const alice = await user("alice");
      const carol = await user("carol");
      const first = await askedBy(alice, "Morning run?");
      const second = await askedBy(alice, "Lunch spot?");

      const res = await send(carol, "GET", "/rooms/active");

      expect(await res.json()).toEqual([
        { id: second, question: "Lunch spot?" },
        { id: first, question: "Morning run?" },
      ]);
    });
  });
});
