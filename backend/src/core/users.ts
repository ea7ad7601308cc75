// core/users.ts — Profile, presence, blocking, reporting, topics and account removal.

import { logger } from "../config/logger.js";
import type { ChatStore, MemberRecord, UserRecord } from "../store/types.js";
import { DisplayNameTakenError } from "../store/types.js";
import type { RoomPolicy } from "./constants.js";
import { DEFAULT_POLICY } from "./constants.js";
import { normalizeTopic } from "./matchmaker.js";
import { leaveRoom } from "./rooms.js";

export type DisplayNameResult =
  | { status: "ignored" }
  | { status: "taken"; displayName: string }
  | {
      status: "updated";
      displayName: string;
      roomIds: string[];
      /** Users whose inbox shows a message by the renamed user. */
      participantsToRefresh: string[];
    };

/** Get-or-create on first authenticated contact; the display name starts as the username. */
export async function resolveUser(
  store: ChatStore,
  username: string,
  verified?: boolean,
): Promise<UserRecord> {
  return store.ensureUser(username, verified);
}

export async function updateDisplayName(
  store: ChatStore,
  user: UserRecord,
  requested: string,
): Promise<DisplayNameResult> {
  const displayName = requested.trim();
  if (displayName.length === 0) return { status: "ignored" };

  try {
    await store.setDisplayName(user.id, displayName);
  } catch (err) {
    if (err instanceof DisplayNameTakenError) {
      logger.info({ userId: user.id, displayName }, "Display name already taken");
      return { status: "taken", displayName };
    }
    throw err;
  }

  const [roomIds, participantsToRefresh] = await Promise.all([
    store.listRoomIdsForUser(user.id),
    store.listParticipantsShowingCreator(user.id),
  ]);
  return { status: "updated", displayName, roomIds, participantsToRefresh };
}

/** Marks the user online and returns the rooms whose members should hear about it. */
export async function goOnline(store: ChatStore, userId: string): Promise<string[]> {
  await store.setOnline(userId, true);
  return store.listRoomIdsForUser(userId);
}

export async function goOffline(store: ChatStore, userId: string): Promise<string[]> {
  await store.setOnline(userId, false);
  return store.listRoomIdsForUser(userId);
}

/** Resolves `username` to a fellow member of the room, or undefined. */
async function findRoomPeer(
  store: ChatStore,
  user: UserRecord,
  roomId: string,
  username: string,
): Promise<MemberRecord | undefined> {
  const members = await store.listMembers(roomId);
  if (members.length === 0) {
    logger.warn({ roomId, userId: user.id }, "Room not found or empty");
    return undefined;
  }
  if (!members.some((m) => m.id === user.id)) return undefined;
  return members.find((m) => m.username === username && m.id !== user.id);
}

export async function blockUser(
  store: ChatStore,
  user: UserRecord,
  roomId: string,
  username: string,
): Promise<boolean> {
  const peer = await findRoomPeer(store, user, roomId, username);
  if (!peer) return false;
  await store.addBlock(user.id, peer.id);
  logger.info({ roomId, blockerId: user.id, blockedId: peer.id }, "User blocked");
  return true;
}

export async function reportUser(
  store: ChatStore,
  user: UserRecord,
  roomId: string,
  username: string,
): Promise<boolean> {
  const peer = await findRoomPeer(store, user, roomId, username);
  if (!peer) return false;

  const history = await store.listMessages(roomId, { excludeCreatorIds: [] });
  const transcript = history.reverse().map((m) => `${m.creatorDisplayName}: ${m.content}`);
  const logged = await store.addReport(user.id, peer.id, roomId, transcript);
  logger.warn({ roomId, reporterId: user.id, reportedId: peer.id, logged }, "User reported");
  return true;
}

export async function listTopics(store: ChatStore, userId: string): Promise<string[]> {
  return store.listTopics(userId);
}

export async function addTopic(store: ChatStore, userId: string, name: string): Promise<boolean> {
  const topic = normalizeTopic(name);
  if (topic.length === 0) return false;
  return store.addTopic(userId, topic);
}

export async function removeTopic(store: ChatStore, userId: string, name: string): Promise<boolean> {
  const topic = normalizeTopic(name);
  if (topic.length === 0) return false;
  return store.removeTopic(userId, topic);
}

export async function agreeTerms(store: ChatStore, userId: string): Promise<void> {
  await store.setAgreedTerms(userId);
}

/** Leaves every room through the regular leave path, then removes the user. */
export async function deleteAccount(
  store: ChatStore,
  user: UserRecord,
  policy: RoomPolicy = DEFAULT_POLICY,
): Promise<string[]> {
  const roomIds = await store.listRoomIdsForUser(user.id);
  for (const roomId of roomIds) {
    await leaveRoom(store, user.id, roomId, policy);
  }
  await store.deleteUser(user.id);
  logger.info({ userId: user.id, rooms: roomIds.length }, "Account deleted");
  return roomIds;
}
