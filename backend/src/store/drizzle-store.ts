// store/drizzle-store.ts — ChatStore on Postgres via Drizzle.
// Join, leave, capacity change and message append lock the room row
// (SELECT … FOR UPDATE) so concurrent commands on one room serialize on it.
// withUserLock holds the user row for a whole matchmaking pass; the store it hands
// out runs on that transaction, so nested writes become savepoints.

import { randomUUID } from "node:crypto";
import { and, count, desc, eq, gte, inArray, lt, max, notInArray, sql } from "drizzle-orm";
import type { SQL } from "drizzle-orm";
import { alias } from "drizzle-orm/pg-core";
import type { PgDatabase, PgQueryResultHKT } from "drizzle-orm/pg-core";

import * as schema from "../db/schema.js";
import {
  conversations,
  messages,
  reportedChats,
  roomMembers,
  rooms,
  roomTopics,
  topics,
  userBlocks,
  userReports,
  users,
  userTopics,
} from "../db/schema.js";
import type {
  AddMemberResult,
  AdmissionCheck,
  AppendMessageResult,
  CandidateRoom,
  CapacityGuard,
  ChatStore,
  ConversationRecord,
  MemberRecord,
  MessageQuery,
  MessageRecord,
  NewRoom,
  RemoveMemberResult,
  RoomChatStats,
  RoomRecord,
  UpdateCapacityResult,
  UserRecord,
} from "./types.js";
import { DisplayNameTakenError } from "./types.js";

/** Any Drizzle Postgres database or transaction over this schema (postgres.js in production). */
export type Database = PgDatabase<PgQueryResultHKT, typeof schema>;
type Transaction = Parameters<Parameters<Database["transaction"]>[0]>[0];

const UNIQUE_VIOLATION = "23505";
const DEADLOCK_DETECTED = "40P01";
const USER_LOCK_ATTEMPTS = 3;

/** Drizzle may wrap the driver error; look through `cause`. */
function hasErrorCode(err: unknown, code: string): boolean {
  if (typeof err !== "object" || err === null) return false;
  if ("code" in err && err.code === code) return true;
  return "cause" in err && hasErrorCode(err.cause, code);
}

const memberColumns = {
  id: users.id,
  username: users.username,
  displayName: users.displayName,
  isOnline: users.isOnline,
};

const messageColumns = {
  id: messages.id,
  roomId: messages.roomId,
  creatorId: messages.creatorId,
  creatorUsername: users.username,
  creatorDisplayName: users.displayName,
  content: messages.content,
  createdAt: messages.createdAt,
};

export class DrizzleChatStore implements ChatStore {
  constructor(private readonly db: Database) {}

  async withUserLock<T>(userId: string, fn: (store: ChatStore) => Promise<T>): Promise<T> {
    // Room locks taken under the user lock live until commit; a deadlock with another
    // user's pass rolls this one back, so it is retried from scratch.
    for (let attempt = 1; ; attempt++) {
      try {
        return await this.db.transaction(async (tx) => {
          await tx
            .select({ id: users.id })
            .from(users)
            .where(eq(users.id, userId))
            .for("no key update");
          return fn(new DrizzleChatStore(tx));
        });
      } catch (err) {
        if (attempt >= USER_LOCK_ATTEMPTS || !hasErrorCode(err, DEADLOCK_DETECTED)) throw err;
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Users
  // ---------------------------------------------------------------------------

  async ensureUser(username: string, verified?: boolean): Promise<UserRecord> {
    const existing = await this.findUserByUsername(username);
    if (existing) {
      if (verified === undefined || existing.isVerified === verified) return existing;
      const [updated] = await this.db
        .update(users)
        .set({ isVerified: verified })
        .where(eq(users.id, existing.id))
        .returning();
      return updated ?? existing;
    }

    // The display name starts as the username; fall back to a suffixed one if taken
    for (const displayName of [username, `${username}-${randomUUID().slice(0, 8)}`]) {
      await this.db
        .insert(users)
        .values({ username, displayName, isVerified: verified ?? false })
        .onConflictDoNothing();
      const user = await this.findUserByUsername(username);
      if (user) return user;
    }
    throw new Error(`Could not create user ${username}`);
  }

  async findUser(userId: string): Promise<UserRecord | undefined> {
    return this.db.query.users.findFirst({ where: eq(users.id, userId) });
  }

  async findUserByUsername(username: string): Promise<UserRecord | undefined> {
    return this.db.query.users.findFirst({ where: eq(users.username, username) });
  }

  async setDisplayName(userId: string, displayName: string): Promise<void> {
    try {
      await this.db.update(users).set({ displayName }).where(eq(users.id, userId));
    } catch (err) {
      if (hasErrorCode(err, UNIQUE_VIOLATION)) throw new DisplayNameTakenError(displayName);
      throw err;
    }
  }

  async setOnline(userId: string, online: boolean): Promise<void> {
    await this.db.update(users).set({ isOnline: online }).where(eq(users.id, userId));
  }

  async setAgreedTerms(userId: string): Promise<void> {
    await this.db.update(users).set({ agreedTerms: true }).where(eq(users.id, userId));
  }

  async deleteUser(userId: string): Promise<void> {
    await this.db.delete(users).where(eq(users.id, userId));
  }

  async addBlock(blockerId: string, blockedId: string): Promise<void> {
    await this.db.insert(userBlocks).values({ blockerId, blockedId }).onConflictDoNothing();
  }

  async listBlockedIds(userId: string): Promise<string[]> {
    const rows = await this.db
      .select({ id: userBlocks.blockedId })
      .from(userBlocks)
      .where(eq(userBlocks.blockerId, userId));
    return rows.map((r) => r.id);
  }

  async listBlockerIds(userId: string): Promise<string[]> {
    const rows = await this.db
      .select({ id: userBlocks.blockerId })
      .from(userBlocks)
      .where(eq(userBlocks.blockedId, userId));
    return rows.map((r) => r.id);
  }

  async addReport(
    reporterId: string,
    reportedId: string,
    roomId: string,
    transcript: string[],
  ): Promise<boolean> {
    return this.db.transaction(async (tx) => {
      await tx.insert(userReports).values({ reporterId, reportedId }).onConflictDoNothing();
      const logged = await tx
        .insert(reportedChats)
        .values({ roomId, reporterId, reportedId, transcript })
        .onConflictDoNothing()
        .returning({ id: reportedChats.id });
      return logged.length > 0;
    });
  }

  // ---------------------------------------------------------------------------
  // Topics
  // ---------------------------------------------------------------------------

  private async topicId(tx: Transaction, name: string): Promise<string> {
    await tx.insert(topics).values({ name }).onConflictDoNothing({ target: topics.name });
    const [row] = await tx.select({ id: topics.id }).from(topics).where(eq(topics.name, name));
    if (!row) throw new Error(`Topic ${name} vanished after insert`);
    return row.id;
  }

  async listTopics(userId: string): Promise<string[]> {
    const rows = await this.db
      .select({ name: topics.name })
      .from(userTopics)
      .innerJoin(topics, eq(topics.id, userTopics.topicId))
      .where(eq(userTopics.userId, userId))
      .orderBy(topics.name);
    return rows.map((r) => r.name);
  }

  async addTopic(userId: string, name: string): Promise<boolean> {
    return this.db.transaction(async (tx) => {
      const topicId = await this.topicId(tx, name);
      const added = await tx
        .insert(userTopics)
        .values({ userId, topicId })
        .onConflictDoNothing()
        .returning({ topicId: userTopics.topicId });
      return added.length > 0;
    });
  }

  async removeTopic(userId: string, name: string): Promise<boolean> {
    const removed = await this.db
      .delete(userTopics)
      .where(
        and(
          eq(userTopics.userId, userId),
          inArray(
            userTopics.topicId,
            this.db.select({ id: topics.id }).from(topics).where(eq(topics.name, name)),
          ),
        ),
      )
      .returning({ topicId: userTopics.topicId });
    return removed.length > 0;
  }

  // ---------------------------------------------------------------------------
  // Rooms
  // ---------------------------------------------------------------------------

  private async tagRoom(tx: Transaction, roomId: string, topic: string): Promise<void> {
    const topicId = await this.topicId(tx, topic);
    await tx.insert(roomTopics).values({ roomId, topicId }).onConflictDoNothing();
  }

  async createRoom(init: NewRoom): Promise<RoomRecord> {
    return this.db.transaction(async (tx) => {
      const [room] = await tx
        .insert(rooms)
        .values({
          creatorId: init.creatorId,
          maxMembers: init.maxMembers,
          question: init.question ?? null,
        })
        .returning();
      if (!room) throw new Error("Room insert returned no row");
      if (init.topic) await this.tagRoom(tx, room.id, init.topic);
      return room;
    });
  }

  async getOrCreateRoom(
    roomId: string,
    init: NewRoom,
  ): Promise<{ room: RoomRecord; created: boolean }> {
    return this.db.transaction(async (tx) => {
      const [inserted] = await tx
        .insert(rooms)
        .values({
          id: roomId,
          creatorId: init.creatorId,
          maxMembers: init.maxMembers,
          question: init.question ?? null,
        })
        .onConflictDoNothing({ target: rooms.id })
        .returning();
      if (inserted) {
        if (init.topic) await this.tagRoom(tx, inserted.id, init.topic);
        return { room: inserted, created: true };
      }
      const [existing] = await tx.select().from(rooms).where(eq(rooms.id, roomId));
      if (!existing) throw new Error(`Room ${roomId} neither inserted nor found`);
      return { room: existing, created: false };
    });
  }

  async findRoom(roomId: string): Promise<RoomRecord | undefined> {
    return this.db.query.rooms.findFirst({ where: eq(rooms.id, roomId) });
  }

  async renameRoom(roomId: string, displayName: string): Promise<boolean> {
    const updated = await this.db
      .update(rooms)
      .set({ displayName })
      .where(eq(rooms.id, roomId))
      .returning({ id: rooms.id });
    return updated.length > 0;
  }

  async listMembers(roomId: string): Promise<MemberRecord[]> {
    return this.db
      .select(memberColumns)
      .from(roomMembers)
      .innerJoin(users, eq(users.id, roomMembers.userId))
      .where(eq(roomMembers.roomId, roomId))
      .orderBy(roomMembers.joinedAt);
  }

  async listRoomIdsForUser(userId: string): Promise<string[]> {
    const rows = await this.db
      .select({ roomId: roomMembers.roomId })
      .from(roomMembers)
      .where(eq(roomMembers.userId, userId));
    return rows.map((r) => r.roomId);
  }

  private async lockRoom(tx: Transaction, roomId: string): Promise<RoomRecord | undefined> {
    const [room] = await tx.select().from(rooms).where(eq(rooms.id, roomId)).for("update");
    return room;
  }

  private async memberCount(tx: Transaction, roomId: string): Promise<number> {
    const [row] = await tx
      .select({ value: count() })
      .from(roomMembers)
      .where(eq(roomMembers.roomId, roomId));
    return row?.value ?? 0;
  }

  async addMember(
    roomId: string,
    userId: string,
    canAdmit: AdmissionCheck,
  ): Promise<AddMemberResult> {
    return this.db.transaction(async (tx): Promise<AddMemberResult> => {
      const room = await this.lockRoom(tx, roomId);
      if (!room) return { status: "not_found" };

      const memberRows = await tx
        .select({ userId: roomMembers.userId })
        .from(roomMembers)
        .where(eq(roomMembers.roomId, roomId));
      const memberCount = memberRows.length;
      if (memberRows.some((r) => r.userId === userId)) {
        return { status: "already_member", memberCount };
      }
      if (!canAdmit(memberCount, room.maxMembers)) return { status: "full", memberCount };

      await tx.insert(roomMembers).values({ roomId, userId });
      const [latest] = await tx
        .select({ id: messages.id })
        .from(messages)
        .where(eq(messages.roomId, roomId))
        .orderBy(desc(messages.createdAt), desc(messages.id))
        .limit(1);
      const latestMessageId = latest?.id ?? null;
      await tx
        .insert(conversations)
        .values({ participantId: userId, roomId, latestMessageId, read: true })
        .onConflictDoUpdate({
          target: [conversations.participantId, conversations.roomId],
          set: { latestMessageId, read: true },
        });
      return { status: "added", memberCount: memberCount + 1 };
    });
  }

  /** Explicit cleanup of everything a room owns; reports keep a null room reference. */
  private async purgeRoom(tx: Transaction, roomId: string): Promise<void> {
    await tx.delete(conversations).where(eq(conversations.roomId, roomId));
    await tx.delete(roomMembers).where(eq(roomMembers.roomId, roomId));
    await tx.delete(roomTopics).where(eq(roomTopics.roomId, roomId));
    await tx.delete(messages).where(eq(messages.roomId, roomId));
    await tx.delete(rooms).where(eq(rooms.id, roomId));
  }

  async removeMember(
    roomId: string,
    userId: string,
    deleteWhenEmpty: boolean,
  ): Promise<RemoveMemberResult> {
    return this.db.transaction(async (tx): Promise<RemoveMemberResult> => {
      const room = await this.lockRoom(tx, roomId);
      if (!room) return { status: "not_found" };

      const removed = await tx
        .delete(roomMembers)
        .where(and(eq(roomMembers.roomId, roomId), eq(roomMembers.userId, userId)))
        .returning({ userId: roomMembers.userId });
      if (removed.length === 0) return { status: "not_member" };

      await tx
        .delete(conversations)
        .where(and(eq(conversations.roomId, roomId), eq(conversations.participantId, userId)));

      const remaining = await this.memberCount(tx, roomId);
      if (remaining === 0 && deleteWhenEmpty) {
        await this.purgeRoom(tx, roomId);
        return { status: "left", remaining, deleted: true };
      }
      return { status: "left", remaining, deleted: false };
    });
  }

  async updateCapacity(
    roomId: string,
    maxMembers: number,
    guard: CapacityGuard,
  ): Promise<UpdateCapacityResult> {
    return this.db.transaction(async (tx): Promise<UpdateCapacityResult> => {
      const room = await this.lockRoom(tx, roomId);
      if (!room) return { status: "not_found" };

      const memberCount = await this.memberCount(tx, roomId);
      if (!guard(room, memberCount)) return { status: "rejected", room, memberCount };

      const [updated] = await tx
        .update(rooms)
        .set({ maxMembers })
        .where(eq(rooms.id, roomId))
        .returning();
      return { status: "updated", room: updated ?? room, memberCount };
    });
  }

  // ---------------------------------------------------------------------------
  // Statistics
  // ---------------------------------------------------------------------------

  async listOpenRooms(): Promise<CandidateRoom[]> {
    const open = await this.db
      .select({
        id: rooms.id,
        createdAt: rooms.createdAt,
        maxMembers: rooms.maxMembers,
        question: rooms.question,
        latestMessageAt: max(messages.createdAt),
      })
      .from(rooms)
      .innerJoin(roomMembers, eq(roomMembers.roomId, rooms.id))
      .leftJoin(messages, eq(messages.roomId, rooms.id))
      .groupBy(rooms.id)
      .having(
        sql`${rooms.maxMembers} is null or count(distinct ${roomMembers.userId}) < ${rooms.maxMembers}`,
      );
    if (open.length === 0) return [];

    const ids = open.map((r) => r.id);
    const [memberRows, topicRows] = await Promise.all([
      this.db
        .select({ roomId: roomMembers.roomId, id: users.id, isOnline: users.isOnline })
        .from(roomMembers)
        .innerJoin(users, eq(users.id, roomMembers.userId))
        .where(inArray(roomMembers.roomId, ids)),
      this.db
        .select({ roomId: roomTopics.roomId, name: topics.name })
        .from(roomTopics)
        .innerJoin(topics, eq(topics.id, roomTopics.topicId))
        .where(inArray(roomTopics.roomId, ids)),
    ]);

    return open.map((room) => ({
      ...room,
      topics: topicRows.filter((t) => t.roomId === room.id).map((t) => t.name),
      members: memberRows
        .filter((m) => m.roomId === room.id)
        .map((m) => ({ id: m.id, isOnline: m.isOnline })),
    }));
  }

  async listRoomChatStats(userIds: string[]): Promise<RoomChatStats[]> {
    if (userIds.length === 0) return [];
    const roomIdRows = await this.db
      .selectDistinct({ roomId: roomMembers.roomId })
      .from(roomMembers)
      .where(inArray(roomMembers.userId, userIds));
    if (roomIdRows.length === 0) return [];

    const ids = roomIdRows.map((r) => r.roomId);
    const [roomRows, memberRows, countRows] = await Promise.all([
      this.db
        .select({ id: rooms.id, createdAt: rooms.createdAt, maxMembers: rooms.maxMembers })
        .from(rooms)
        .where(inArray(rooms.id, ids)),
      this.db
        .select({ roomId: roomMembers.roomId, userId: roomMembers.userId })
        .from(roomMembers)
        .where(inArray(roomMembers.roomId, ids)),
      this.db
        .select({ roomId: messages.roomId, creatorId: messages.creatorId, value: count() })
        .from(messages)
        .where(inArray(messages.roomId, ids))
        .groupBy(messages.roomId, messages.creatorId),
    ]);

    return roomRows.map((room) => {
      const messageCounts: Record<string, number> = {};
      for (const row of countRows) {
        if (row.roomId === room.id) messageCounts[row.creatorId] = row.value;
      }
      return {
        roomId: room.id,
        createdAt: room.createdAt,
        maxMembers: room.maxMembers,
        memberIds: memberRows.filter((m) => m.roomId === room.id).map((m) => m.userId),
        messageCounts,
      };
    });
  }

  // ---------------------------------------------------------------------------
  // Messages & conversations
  // ---------------------------------------------------------------------------

  async appendMessage(
    roomId: string,
    creatorId: string,
    content: string,
    excludeRecipientIds: string[],
  ): Promise<AppendMessageResult> {
    return this.db.transaction(async (tx): Promise<AppendMessageResult> => {
      const room = await this.lockRoom(tx, roomId);
      if (!room) return { status: "not_found" };

      const memberRows = await tx
        .select({ userId: roomMembers.userId })
        .from(roomMembers)
        .where(eq(roomMembers.roomId, roomId))
        .orderBy(roomMembers.joinedAt);
      const memberIds = memberRows.map((r) => r.userId);
      if (!memberIds.includes(creatorId)) return { status: "not_member" };

      const [inserted] = await tx
        .insert(messages)
        .values({ roomId, creatorId, content })
        .returning({ id: messages.id });
      if (!inserted) throw new Error("Message insert returned no row");

      const recipientIds = memberIds.filter((id) => !excludeRecipientIds.includes(id));
      for (const userId of recipientIds) {
        const read = userId === creatorId;
        await tx
          .insert(conversations)
          .values({ participantId: userId, roomId, latestMessageId: inserted.id, read })
          .onConflictDoUpdate({
            target: [conversations.participantId, conversations.roomId],
            set: { latestMessageId: inserted.id, read },
          });
      }

      const [message] = await tx
        .select(messageColumns)
        .from(messages)
        .innerJoin(users, eq(users.id, messages.creatorId))
        .where(eq(messages.id, inserted.id));
      if (!message) throw new Error(`Message ${inserted.id} vanished after insert`);
      return { status: "appended", message, recipientIds };
    });
  }

  async findMessage(roomId: string, messageId: string): Promise<MessageRecord | undefined> {
    const [row] = await this.db
      .select(messageColumns)
      .from(messages)
      .innerJoin(users, eq(users.id, messages.creatorId))
      .where(and(eq(messages.id, messageId), eq(messages.roomId, roomId)));
    return row;
  }

  async listMessages(roomId: string, query: MessageQuery): Promise<MessageRecord[]> {
    const filters: SQL[] = [eq(messages.roomId, roomId)];
    if (query.before) filters.push(lt(messages.createdAt, query.before));
    if (query.beforeMessageId) {
      // Row comparison in SQL keeps the anchor's microseconds, which a JS Date drops
      filters.push(
        sql`(${messages.createdAt}, ${messages.id}) < (select anchor.created_at, anchor.id from ${messages} anchor where anchor.id = ${query.beforeMessageId})`,
      );
    }
    if (query.since) filters.push(gte(messages.createdAt, query.since));
    if (query.excludeCreatorIds.length > 0) {
      filters.push(notInArray(messages.creatorId, query.excludeCreatorIds));
    }

    const base = this.db
      .select(messageColumns)
      .from(messages)
      .innerJoin(users, eq(users.id, messages.creatorId))
      .where(and(...filters))
      .orderBy(desc(messages.createdAt), desc(messages.id));
    if (query.limit != null) return base.limit(query.limit);
    return base;
  }

  async markConversationRead(userId: string, roomId: string): Promise<boolean> {
    const updated = await this.db
      .update(conversations)
      .set({ read: true })
      .where(
        and(
          eq(conversations.participantId, userId),
          eq(conversations.roomId, roomId),
          eq(conversations.read, false),
        ),
      )
      .returning({ id: conversations.id });
    return updated.length > 0;
  }

  async listConversations(userId: string): Promise<ConversationRecord[]> {
    const creator = alias(users, "creator");
    const rows = await this.db
      .select({
        roomId: conversations.roomId,
        roomDisplayName: rooms.displayName,
        question: rooms.question,
        read: conversations.read,
        createdAt: conversations.createdAt,
        messageContent: messages.content,
        messageCreatedAt: messages.createdAt,
        creatorDisplayName: creator.displayName,
      })
      .from(conversations)
      .innerJoin(rooms, eq(rooms.id, conversations.roomId))
      .leftJoin(messages, eq(messages.id, conversations.latestMessageId))
      .leftJoin(creator, eq(creator.id, messages.creatorId))
      .where(eq(conversations.participantId, userId));

    return rows.map((row) => ({
      roomId: row.roomId,
      roomDisplayName: row.roomDisplayName,
      question: row.question,
      read: row.read,
      createdAt: row.createdAt,
      latestMessage:
        row.messageContent != null && row.messageCreatedAt != null
          ? {
              creatorDisplayName: row.creatorDisplayName ?? "",
              content: row.messageContent,
              createdAt: row.messageCreatedAt,
            }
          : null,
    }));
  }

  async listParticipantsShowingCreator(creatorId: string): Promise<string[]> {
    const rows = await this.db
      .selectDistinct({ participantId: conversations.participantId })
      .from(conversations)
      .innerJoin(messages, eq(messages.id, conversations.latestMessageId))
      .where(eq(messages.creatorId, creatorId));
    return rows.map((r) => r.participantId);
  }
}
