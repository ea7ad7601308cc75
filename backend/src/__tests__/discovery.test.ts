// Tests for core/discovery.ts — room search, question suggestions and the active feed.

import { beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("../config/logger.js", () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

import { activeQuestions, findRooms, suggestQuestions } from "../core/discovery.js";
import type { RoomRecord, UserRecord } from "../store/types.js";
import { MemoryChatStore } from "./helpers/memory-store.js";

const admit = () => true;

describe("question discovery", () => {
  let store: MemoryChatStore;
  let viewer: UserRecord;

  beforeEach(async () => {
    store = new MemoryChatStore();
    viewer = await store.ensureUser("viewer", true);
  });

  async function questionRoom(
    question: string | null,
    members: UserRecord[],
    maxMembers: number | null = 5,
  ): Promise<RoomRecord> {
    const room = await store.createRoom({ creatorId: members[0]?.id ?? null, maxMembers, question });
    for (const member of members) await store.addMember(room.id, member.id, admit);
    return room;
  }

  describe("findRooms", () => {
    it("ranks joined rooms, then affinity, members online and activity", async () => {
      const partner = await store.ensureUser("partner", true);
      const friend = await store.ensureUser("friend", true);
      const online = await store.ensureUser("online", true);
      const talker = await store.ensureUser("talker", true);
      const quiet = await store.ensureUser("quiet", true);

      // viewer chats with partner, partner chats with friend
      const shared = await questionRoom(null, [viewer, partner]);
      await store.appendMessage(shared.id, viewer.id, "hey", []);
      await store.appendMessage(shared.id, partner.id, "hello", []);
      const partnerRoom = await questionRoom(null, [partner, friend]);
      await store.appendMessage(partnerRoom.id, partner.id, "yo", []);
      await store.appendMessage(partnerRoom.id, friend.id, "sup", []);

      const oldest = await questionRoom("Chess openings for beginners?", [quiet]);
      const joined = await questionRoom("Is chess a sport?", [viewer]);
      const recent = await questionRoom("Chess clocks: worth it?", [talker]);
      await store.appendMessage(recent.id, talker.id, "yes", []);
      const lively = await questionRoom("Online chess sites?", [online]);
      await store.setOnline(online.id, true);
      const affinity = await questionRoom("Chess problems?", [friend]);

      const rooms = await findRooms(store, viewer.id, "chess");

      expect(rooms.map((r) => r.id)).toEqual([
        joined.id,
        affinity.id,
        lively.id,
        recent.id,
        oldest.id,
      ]);
      expect(rooms.map((r) => r.alreadyJoined)).toEqual([true, false, false, false, false]);
      expect(rooms[3]).toMatchObject({ question: "Chess clocks: worth it?", memberCount: 1 });
      expect(rooms[3]?.latestMessageAt).toBeInstanceOf(Date);
      expect(rooms[4]?.latestMessageAt).toBeNull();
    });

    it("matches case-insensitively and leaves out blocked, full and unrelated rooms", async () => {
      const blocked = await store.ensureUser("blocked", true);
      const blocker = await store.ensureUser("blocker", true);
      const a = await store.ensureUser("a", true);
      const b = await store.ensureUser("b", true);
      await store.addBlock(viewer.id, blocked.id);
      await store.addBlock(blocker.id, viewer.id);

      await questionRoom("Chess with a blocked user?", [blocked]);
      await questionRoom("Chess with a blocker?", [blocker]);
      await questionRoom("Chess for two?", [a, b], 2);
      await questionRoom("Best pasta?", [a]);
      const visible = await questionRoom("Speed CHESS tonight?", [b]);

      const rooms = await findRooms(store, viewer.id, "  chess ");

      expect(rooms.map((r) => r.id)).toEqual([visible.id]);
    });

    it("returns at most the requested number of rooms", async () => {
      const host = await store.ensureUser("host", true);
      for (let i = 0; i < 4; i++) await questionRoom(`Chess puzzle ${i}?`, [host]);

      expect(await findRooms(store, viewer.id, "chess", 3)).toHaveLength(3);
    });
  });

  describe("suggestQuestions", () => {
    it("lists each matching question once, best ranked first", async () => {
      const host = await store.ensureUser("host", true);
      await questionRoom("Is chess a sport?", [host]);
      await questionRoom("Chess or go?", [host]);
      await questionRoom("Is chess a sport?", [host]);
      await questionRoom("Favourite film?", [host]);

      expect(await suggestQuestions(store, viewer.id, "chess")).toEqual([
        "Is chess a sport?",
        "Chess or go?",
      ]);
      expect(await suggestQuestions(store, viewer.id, "chess", 1)).toEqual(["Is chess a sport?"]);
    });
  });

  describe("activeQuestions", () => {
    it("feeds open question rooms by members online, then activity", async () => {
      const online = await store.ensureUser("online", true);
      const talker = await store.ensureUser("talker", true);
      const quiet = await store.ensureUser("quiet", true);

      const lively = await questionRoom("Anyone up?", [online]);
      await store.setOnline(online.id, true);
      const chatty = await questionRoom("Weekend plans?", [talker]);
      await store.appendMessage(chatty.id, talker.id, "hiking", []);
      const fresh = await questionRoom("Favourite film?", [quiet]);
      await questionRoom(null, [quiet]);

      expect(await activeQuestions(store, viewer.id)).toEqual([
        { id: lively.id, question: "Anyone up?" },
        { id: chatty.id, question: "Weekend plans?" },
        { id: fresh.id, question: "Favourite film?" },
      ]);
    });
  });
});
