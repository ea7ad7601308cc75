// store/types.ts — Persistence boundary for the chat core.
// Every mutating method is atomic for the room (or user) it touches: capacity,
// membership and conversation rows are checked and written in one step, so callers
// may run concurrently without further locking.

export interface UserRecord {
  id: string;
  username: string;
  displayName: string;
  isVerified: boolean;
  isOnline: boolean;
  agreedTerms: boolean;
  createdAt: Date;
}

export interface RoomRecord {
  id: string;
  displayName: string | null;
  creatorId: string | null;
  maxMembers: number | null;
  question: string | null;
  createdAt: Date;
}

export interface NewRoom {
  creatorId: string | null;
  maxMembers: number | null;
  question?: string | null;
  topic?: string | null;
}

export interface MemberRecord {
  id: string;
  username: string;
  displayName: string;
  isOnline: boolean;
}

export interface MessageRecord {
  id: string;
  roomId: string;
  creatorId: string;
  creatorUsername: string;
  creatorDisplayName: string;
  content: string;
  createdAt: Date;
}

/** A user's inbox entry joined with room and latest-message metadata. */
export interface ConversationRecord {
  roomId: string;
  roomDisplayName: string | null;
  question: string | null;
  read: boolean;
  createdAt: Date;
  latestMessage: {
    creatorDisplayName: string;
    content: string;
    createdAt: Date;
  } | null;
}

/** Per-room message statistics consumed by the scoring engine. */
export interface RoomChatStats {
  roomId: string;
  createdAt: Date;
  maxMembers: number | null;
  memberIds: string[];
  /** Message count keyed by creator id. */
  messageCounts: Record<string, number>;
}

/** A room with at least one member, as seen by the matchmaker. */
export interface CandidateRoom {
  id: string;
  createdAt: Date;
  maxMembers: number | null;
  question: string | null;
  topics: string[];
  members: Array<{ id: string; isOnline: boolean }>;
  latestMessageAt: Date | null;
}

/** Decides whether a room with `memberCount` members may admit one more. */
export type AdmissionCheck = (memberCount: number, maxMembers: number | null) => boolean;

export type AddMemberResult =
  | { status: "not_found" }
  | { status: "full"; memberCount: number }
  | { status: "added" | "already_member"; memberCount: number };

export type RemoveMemberResult =
  | { status: "not_found" }
  | { status: "not_member" }
  | { status: "left"; remaining: number; deleted: boolean };

export type CapacityGuard = (room: RoomRecord, memberCount: number) => boolean;

export type UpdateCapacityResult =
  | { status: "not_found" }
  | { status: "rejected"; room: RoomRecord; memberCount: number }
  | { status: "updated"; room: RoomRecord; memberCount: number };

export type AppendMessageResult =
  | { status: "not_found" }
  | { status: "not_member" }
  | { status: "appended"; message: MessageRecord; recipientIds: string[] };

export interface MessageQuery {
  /** Strictly older than this instant. */
  before?: Date;
  /** Strictly older than this message, comparing (createdAt, id). */
  beforeMessageId?: string;
  /** At or after this instant. */
  since?: Date;
  excludeCreatorIds: string[];
  limit?: number;
}

/** Raised by setDisplayName when another user already holds the name. */
export class DisplayNameTakenError extends Error {
  constructor(readonly displayName: string) {
    super(`Display name already taken: ${displayName}`);
    this.name = "DisplayNameTakenError";
  }
}

export interface ChatStore {
  /**
   * Runs `fn` while holding an exclusive per-user lock. The store handed to `fn`
   * must be used for every read and write made under the lock.
   */
  withUserLock<T>(userId: string, fn: (store: ChatStore) => Promise<T>): Promise<T>;

  // --- Users ---
  ensureUser(username: string, verified?: boolean): Promise<UserRecord>;
  findUser(userId: string): Promise<UserRecord | undefined>;
  findUserByUsername(username: string): Promise<UserRecord | undefined>;
  /** @throws DisplayNameTakenError */
  setDisplayName(userId: string, displayName: string): Promise<void>;
  setOnline(userId: string, online: boolean): Promise<void>;
  setAgreedTerms(userId: string): Promise<void>;
  deleteUser(userId: string): Promise<void>;

  addBlock(blockerId: string, blockedId: string): Promise<void>;
  /** Users this user has blocked. */
  listBlockedIds(userId: string): Promise<string[]>;
  /** Users who have blocked this user. */
  listBlockerIds(userId: string): Promise<string[]>;
  addReport(
    reporterId: string,
    reportedId: string,
    roomId: string,
    transcript: string[],
  ): Promise<boolean>;

  listTopics(userId: string): Promise<string[]>;
  addTopic(userId: string, name: string): Promise<boolean>;
  removeTopic(userId: string, name: string): Promise<boolean>;

  // --- Rooms ---
  createRoom(init: NewRoom): Promise<RoomRecord>;
  getOrCreateRoom(roomId: string, init: NewRoom): Promise<{ room: RoomRecord; created: boolean }>;
  findRoom(roomId: string): Promise<RoomRecord | undefined>;
  renameRoom(roomId: string, displayName: string): Promise<boolean>;
  listMembers(roomId: string): Promise<MemberRecord[]>;
  listRoomIdsForUser(userId: string): Promise<string[]>;
  /**
   * Adds the member if `canAdmit` accepts the current count, and seeds the member's
   * conversation with the room's latest message marked read.
   */
  addMember(roomId: string, userId: string, canAdmit: AdmissionCheck): Promise<AddMemberResult>;
  /** Removes the member and their conversation; deletes the room when it empties and `deleteWhenEmpty`. */
  removeMember(roomId: string, userId: string, deleteWhenEmpty: boolean): Promise<RemoveMemberResult>;
  updateCapacity(roomId: string, maxMembers: number, guard: CapacityGuard): Promise<UpdateCapacityResult>;

  // --- Statistics ---
  listOpenRooms(): Promise<CandidateRoom[]>;
  /** Stats for every room that has at least one of `userIds` as a member. */
  listRoomChatStats(userIds: string[]): Promise<RoomChatStats[]>;

  // --- Messages & conversations ---
  /**
   * Appends a message from a current member and points the conversation of every
   * member outside `excludeRecipientIds` at it, read only for the creator.
   * Membership and recipients are read under the room lock.
   */
  appendMessage(
    roomId: string,
    creatorId: string,
    content: string,
    excludeRecipientIds: string[],
  ): Promise<AppendMessageResult>;
  findMessage(roomId: string, messageId: string): Promise<MessageRecord | undefined>;
  /** Newest first, ties broken by id. */
  listMessages(roomId: string, query: MessageQuery): Promise<MessageRecord[]>;
  /** Returns true only when the row was unread. */
  markConversationRead(userId: string, roomId: string): Promise<boolean>;
  listConversations(userId: string): Promise<ConversationRecord[]>;
  /** Participants whose conversation currently shows a message written by `creatorId`. */
  listParticipantsShowingCreator(creatorId: string): Promise<string[]>;
}
