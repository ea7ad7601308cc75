// db/schema.ts — Drizzle ORM schema: users, topics, rooms, messages, conversations, reports.
// Room-owned rows (members, messages, conversations, topic tags) are removed by the
// store's explicit room cleanup rather than by ON DELETE CASCADE on the room.

import {
  boolean,
  index,
  integer,
  pgTable,
  primaryKey,
  text,
  timestamp,
  uniqueIndex,
  uuid,
} from "drizzle-orm/pg-core";

// ---------------------------------------------------------------------------
// Users — created on first authenticated contact
// ---------------------------------------------------------------------------
export const users = pgTable(
  "users",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    // Opaque subject from the identity provider
    username: text("username").notNull(),
    displayName: text("display_name").notNull(),
    isVerified: boolean("is_verified").notNull().default(false),
    isOnline: boolean("is_online").notNull().default(false),
    agreedTerms: boolean("agreed_terms").notNull().default(false),
    createdAt: timestamp("created_at").defaultNow().notNull(),
  },
  (table) => [
    uniqueIndex("users_username_idx").on(table.username),
    uniqueIndex("users_display_name_idx").on(table.displayName),
  ],
);

export const userBlocks = pgTable(
  "user_blocks",
  {
    blockerId: uuid("blocker_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    blockedId: uuid("blocked_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
  },
  (table) => [
    primaryKey({ columns: [table.blockerId, table.blockedId] }),
    index("user_blocks_blocked_id_idx").on(table.blockedId),
  ],
);

export const userReports = pgTable(
  "user_reports",
  {
    reporterId: uuid("reporter_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    reportedId: uuid("reported_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
  },
  (table) => [primaryKey({ columns: [table.reporterId, table.reportedId] })],
);

// ---------------------------------------------------------------------------
// Topics — shared vocabulary for users' interests and room tags
// ---------------------------------------------------------------------------
export const topics = pgTable(
  "topics",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    name: text("name").notNull(),
  },
  (table) => [uniqueIndex("topics_name_idx").on(table.name)],
);

export const userTopics = pgTable(
  "user_topics",
  {
    userId: uuid("user_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    topicId: uuid("topic_id")
      .notNull()
      .references(() => topics.id, { onDelete: "cascade" }),
  },
  (table) => [primaryKey({ columns: [table.userId, table.topicId] })],
);

// ---------------------------------------------------------------------------
// Rooms — ephemeral chats; membership lives in room_members
// ---------------------------------------------------------------------------
export const rooms = pgTable(
  "rooms",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    displayName: text("display_name"),
    creatorId: uuid("creator_id").references(() => users.id, { onDelete: "set null" }),
    maxMembers: integer("max_members"),
    question: text("question"),
    createdAt: timestamp("created_at").defaultNow().notNull(),
  },
  (table) => [index("rooms_created_at_idx").on(table.createdAt)],
);

export const roomMembers = pgTable(
  "room_members",
  {
    roomId: uuid("room_id")
      .notNull()
      .references(() => rooms.id),
    userId: uuid("user_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    joinedAt: timestamp("joined_at").defaultNow().notNull(),
  },
  (table) => [
    primaryKey({ columns: [table.roomId, table.userId] }),
    index("room_members_user_id_idx").on(table.userId),
  ],
);

export const roomTopics = pgTable(
  "room_topics",
  {
    roomId: uuid("room_id")
      .notNull()
      .references(() => rooms.id),
    topicId: uuid("topic_id")
      .notNull()
      .references(() => topics.id, { onDelete: "cascade" }),
  },
  (table) => [primaryKey({ columns: [table.roomId, table.topicId] })],
);

// ---------------------------------------------------------------------------
// Messages — append-only
// ---------------------------------------------------------------------------
export const messages = pgTable(
  "messages",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    roomId: uuid("room_id")
      .notNull()
      .references(() => rooms.id),
    creatorId: uuid("creator_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    content: text("content").notNull(),
    createdAt: timestamp("created_at").defaultNow().notNull(),
  },
  (table) => [index("messages_room_id_created_at_idx").on(table.roomId, table.createdAt)],
);

// ---------------------------------------------------------------------------
// Conversations — one inbox entry per (participant, room) while a member
// ---------------------------------------------------------------------------
export const conversations = pgTable(
  "conversations",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    participantId: uuid("participant_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    roomId: uuid("room_id")
      .notNull()
      .references(() => rooms.id),
    latestMessageId: uuid("latest_message_id").references(() => messages.id, {
      onDelete: "set null",
    }),
    read: boolean("read").notNull().default(false),
    createdAt: timestamp("created_at").defaultNow().notNull(),
  },
  (table) => [uniqueIndex("conversations_participant_room_idx").on(table.participantId, table.roomId)],
);

// ---------------------------------------------------------------------------
// Reported chats — audit log, outlives the room
// ---------------------------------------------------------------------------
export const reportedChats = pgTable(
  "reported_chats",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    roomId: uuid("room_id").references(() => rooms.id, { onDelete: "set null" }),
    reporterId: uuid("reporter_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    reportedId: uuid("reported_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    transcript: text("transcript").array().notNull(),
    createdAt: timestamp("created_at").defaultNow().notNull(),
  },
  (table) => [
    uniqueIndex("reported_chats_room_reporter_reported_idx").on(
      table.roomId,
      table.reporterId,
      table.reportedId,
    ),
  ],
);
