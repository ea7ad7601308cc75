// core/ledger.ts — Messages and per-user conversation (inbox) state.

import { logger } from "../config/logger.js";
import type { ChatStore, ConversationRecord, MessageRecord, UserRecord } from "../store/types.js";
import { MESSAGES_PER_PAGE } from "./constants.js";

export interface RecordedMessage {
  message: MessageRecord;
  /** Members whose conversation now points at the message. */
  recipientIds: string[];
}

export type HistoryCursor =
  | { beforeMessageId: string }
  | { beforeTimestamp: Date }
  | undefined;

export async function recordMessage(
  store: ChatStore,
  creator: UserRecord,
  roomId: string,
  content: string,
): Promise<RecordedMessage | undefined> {
  if (content.trim().length === 0 || !creator.isVerified) return undefined;

  // Recipients are the room's members at write time, minus those who blocked the creator
  const blockers = await store.listBlockerIds(creator.id);
  const result = await store.appendMessage(roomId, creator.id, content, blockers);
  switch (result.status) {
    case "not_found":
      logger.warn({ roomId, userId: creator.id }, "Message sent to unknown room");
      return undefined;
    case "not_member":
      logger.warn({ roomId, userId: creator.id }, "Message from non-member ignored");
      return undefined;
    case "appended":
      return { message: result.message, recipientIds: result.recipientIds };
  }
}

export async function markRead(store: ChatStore, userId: string, roomId: string): Promise<boolean> {
  return store.markConversationRead(userId, roomId);
}

/** Unread first, then latest message newest first (none last), then newest conversation. */
export function compareConversations(a: ConversationRecord, b: ConversationRecord): number {
  if (a.read !== b.read) return a.read ? 1 : -1;
  const aLatest = a.latestMessage?.createdAt.getTime();
  const bLatest = b.latestMessage?.createdAt.getTime();
  if (aLatest !== bLatest) {
    if (aLatest == null) return 1;
    if (bLatest == null) return -1;
    return bLatest - aLatest;
  }
  return b.createdAt.getTime() - a.createdAt.getTime();
}

export async function listConversations(
  store: ChatStore,
  userId: string,
): Promise<ConversationRecord[]> {
  const rows = await store.listConversations(userId);
  return rows.sort(compareConversations);
}

async function isMember(store: ChatStore, userId: string, roomId: string): Promise<boolean> {
  const members = await store.listMembers(roomId);
  return members.some((m) => m.id === userId);
}

/**
 * One page of messages strictly older than the cursor (the latest page without one),
 * oldest first. Messages by users the viewer blocked are left out.
 */
export async function pagedMessageHistory(
  store: ChatStore,
  viewerId: string,
  roomId: string,
  cursor: HistoryCursor,
  pageSize = MESSAGES_PER_PAGE,
): Promise<MessageRecord[] | undefined> {
  if (!(await isMember(store, viewerId, roomId))) {
    logger.warn({ roomId, userId: viewerId }, "History requested by non-member");
    return undefined;
  }

  const excludeCreatorIds = await store.listBlockedIds(viewerId);
  let page: MessageRecord[];
  if (cursor && "beforeMessageId" in cursor) {
    const anchor = await store.findMessage(roomId, cursor.beforeMessageId);
    if (!anchor) return [];
    page = await store.listMessages(roomId, {
      beforeMessageId: anchor.id,
      excludeCreatorIds,
      limit: pageSize,
    });
  } else {
    page = await store.listMessages(roomId, {
      before: cursor?.beforeTimestamp,
      excludeCreatorIds,
      limit: pageSize,
    });
  }
  return page.reverse();
}

/** Every visible message at or after `since`, oldest first. */
export async function messagesSince(
  store: ChatStore,
  viewerId: string,
  roomId: string,
  since: Date,
): Promise<MessageRecord[] | undefined> {
  if (!(await isMember(store, viewerId, roomId))) return undefined;
  const excludeCreatorIds = await store.listBlockedIds(viewerId);
  const rows = await store.listMessages(roomId, { since, excludeCreatorIds });
  return rows.reverse();
}
