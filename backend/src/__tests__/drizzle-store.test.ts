// Tests for store/drizzle-store.ts — the Postgres store run against an in-process
// PGlite database migrated from backend/drizzle.

import { fileURLToPath } from "node:url";
import { PGlite } from "@electric-sql/pglite";
import { sql } from "drizzle-orm";
import { drizzle } from "drizzle-orm/pglite";
import { migrate } from "drizzle-orm/pglite/migrator";
import { afterAll, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("../config/logger.js", () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

import { pagedMessageHistory, recordMessage } from "../core/ledger.js";
import { findOrCreateRoom } from "../core/matchmaker.js";
import { canAdmit } from "../core/room-state.js";
import { joinRoom } from "../core/rooms.js";
import * as schema from "../db/schema.js";
import { DrizzleChatStore } from "../store/drizzle-store.js";

const client = new PGlite();
const db = drizzle(client, { schema });
const store = new DrizzleChatStore(db);

beforeAll(async () => {
  await migrate(db, { migrationsFolder: fileURLToPath(new URL("../../drizzle", import.meta.url)) });
}, 30_000);

afterAll(async () => {
  await client.close();
});

beforeEach(async () => {
  await db.execute(sql`truncate table users, rooms, topics cascade`);
});

describe("DrizzleChatStore", () => {
  describe("addMember", () => {
    it("admits exactly two of six concurrent joiners into a two-seat room", async () => {
      const room = await store.createRoom({ creatorId: null, maxMembers: 2 });
      const users = [];
      for (let i = 0; i < 6; i++) users.push(await store.ensureUser(`joiner-${i}`, true));

      const results = await Promise.all(users.map((u) => store.addMember(room.id, u.id, canAdmit)));

      expect(results.filter((r) => r.status === "added")).toHaveLength(2);
      expect(results.filter((r) => r.status === "full")).toHaveLength(4);
      expect(await store.listMembers(room.id)).toHaveLength(2);
    });

    it("seeds the conversation with the latest message, already read", async () => {
      const host = await store.ensureUser("host", true);
      const guest = await store.ensureUser("guest", true);
      const room = await store.createRoom({ creatorId: host.id, maxMembers: 5 });
      await store.addMember(room.id, host.id, canAdmit);
      await store.appendMessage(room.id, host.id, "welcome", []);

      expect(await store.addMember(room.id, guest.id, canAdmit)).toEqual({
        status: "added",
        memberCount: 2,
      });
      const [conversation] = await store.listConversations(guest.id);
      expect(conversation?.read).toBe(true);
      expect(conversation?.latestMessage?.content).toBe("welcome");
    });
  });

  describe("getOrCreateRoom", () => {
    it("creates one room for concurrent opens of the same id", async () => {
      const alice = await store.ensureUser("alice", true);
      const bob = await store.ensureUser("bob", true);
      const roomId = "7d1e5c1e-0000-4000-8000-000000000001";

      const results = await Promise.all([
        store.getOrCreateRoom(roomId, { creatorId: alice.id, maxMembers: 5, topic: "chess" }),
        store.getOrCreateRoom(roomId, { creatorId: bob.id, maxMembers: 5, topic: "chess" }),
      ]);

      expect(results.filter((r) => r.created)).toHaveLength(1);
      expect(results.map((r) => r.room.id)).toEqual([roomId, roomId]);
      expect(await db.select().from(schema.rooms)).toHaveLength(1);
      expect(await db.select().from(schema.roomTopics)).toHaveLength(1);
    });
  });

  describe("removeMember", () => {
    it("deletes an emptied room and keeps its reports with a null room", async () => {
      const alice = await store.ensureUser("alice", true);
      const bob = await store.ensureUser("bob", true);
      const room = await store.createRoom({ creatorId: alice.id, maxMembers: 5, topic: "chess" });
      await store.addMember(room.id, alice.id, canAdmit);
      await store.addMember(room.id, bob.id, canAdmit);
      await store.appendMessage(room.id, alice.id, "hi", []);
      await store.addReport(bob.id, alice.id, room.id, ["alice: hi"]);

      expect(await store.removeMember(room.id, bob.id, true)).toEqual({
        status: "left",
        remaining: 1,
        deleted: false,
      });
      expect(await store.removeMember(room.id, alice.id, true)).toEqual({
        status: "left",
        remaining: 0,
        deleted: true,
      });

      expect(await store.findRoom(room.id)).toBeUndefined();
      expect(await db.select().from(schema.messages)).toEqual([]);
      expect(await db.select().from(schema.conversations)).toEqual([]);
      expect(await db.select().from(schema.roomTopics)).toEqual([]);
      const [report] = await db.select().from(schema.reportedChats);
      expect(report).toMatchObject({ roomId: null, transcript: ["alice: hi"] });
    });

    it("keeps an emptied room when asked to", async () => {
      const alice = await store.ensureUser("alice", true);
      const room = await store.createRoom({ creatorId: alice.id, maxMembers: 5 });
      await store.addMember(room.id, alice.id, canAdmit);

      const result = await store.removeMember(room.id, alice.id, false);

      expect(result).toEqual({ status: "left", remaining: 0, deleted: false });
      expect(await store.findRoom(room.id)).toMatchObject({ id: room.id });
    });
  });

  describe("appendMessage", () => {
    it("picks recipients from the members at write time", async () => {
      const alice = await store.ensureUser("alice", true);
      const bob = await store.ensureUser("bob", true);
      const outsider = await store.ensureUser("outsider", true);
      const room = await store.createRoom({ creatorId: alice.id, maxMembers: 5 });
      await store.addMember(room.id, alice.id, canAdmit);

      const [recorded] = await Promise.all([
        recordMessage(store, alice, room.id, "hello"),
        joinRoom(store, bob.id, room.id),
      ]);

      expect(recorded?.message.content).toBe("hello");
      const [theirs] = await store.listConversations(bob.id);
      expect(theirs?.latestMessage?.content).toBe("hello");
      expect(await store.appendMessage(room.id, outsider.id, "hi", [])).toEqual({
        status: "not_member",
      });
    });

    it("leaves out excluded members", async () => {
      const alice = await store.ensureUser("alice", true);
      const bob = await store.ensureUser("bob", true);
      const room = await store.createRoom({ creatorId: alice.id, maxMembers: 5 });
      await store.addMember(room.id, alice.id, canAdmit);
      await store.addMember(room.id, bob.id, canAdmit);

      const result = await store.appendMessage(room.id, alice.id, "hello?", [bob.id]);

      expect(result.status === "appended" && result.recipientIds).toEqual([alice.id]);
      const [theirs] = await store.listConversations(bob.id);
      expect(theirs?.latestMessage).toBeNull();
    });
  });

  describe("message paging", () => {
    it("keeps sub-millisecond and tied neighbours of the anchor", async () => {
      const alice = await store.ensureUser("alice", true);
      const room = await store.createRoom({ creatorId: alice.id, maxMembers: 5 });
      await store.addMember(room.id, alice.id, canAdmit);
      await db.execute(sql`
        insert into messages (id, room_id, creator_id, content, created_at) values
          ('00000000-0000-4000-8000-000000000001', ${room.id}, ${alice.id}, 'm1', '2024-01-01 00:00:00.000200'),
          ('00000000-0000-4000-8000-000000000002', ${room.id}, ${alice.id}, 'm2', '2024-01-01 00:00:00.000700'),
          ('00000000-0000-4000-8000-000000000003', ${room.id}, ${alice.id}, 'm3', '2024-01-01 00:00:00.000700'),
          ('00000000-0000-4000-8000-000000000004', ${room.id}, ${alice.id}, 'm4', '2024-01-01 00:00:00.000900')
      `);

      const latest = await pagedMessageHistory(store, alice.id, room.id, undefined, 2);
      expect(latest?.map((m) => m.content)).toEqual(["m3", "m4"]);

      const previous = await pagedMessageHistory(
        store,
        alice.id,
        room.id,
        { beforeMessageId: "00000000-0000-4000-8000-000000000003" },
        2,
      );
      expect(previous?.map((m) => m.content)).toEqual(["m1", "m2"]);

      const rest = await pagedMessageHistory(
        store,
        alice.id,
        room.id,
        { beforeMessageId: "00000000-0000-4000-8000-000000000001" },
        2,
      );
      expect(rest).toEqual([]);
    });
  });

  describe("withUserLock", () => {
    it("keeps a single waiting room when one user matches twice at once", async () => {
      const user = await store.ensureUser("user", true);

      const [first, second] = await Promise.all([
        findOrCreateRoom(store, user, { kind: "topic", topic: "chess" }),
        findOrCreateRoom(store, user, { kind: "topic", topic: "chess" }),
      ]);

      expect(second?.room.id).toBe(first?.room.id);
      expect([first?.pool, second?.pool].sort()).toEqual(["new", "own"]);
      expect(await db.select().from(schema.rooms)).toHaveLength(1);
      expect(await store.listRoomIdsForUser(user.id)).toEqual([first?.room.id]);
    });
  });
});
