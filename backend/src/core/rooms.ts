// core/rooms.ts — Room lifecycle: open (get-or-create), join, leave, capacity, rename.
// Missing rooms are logged and reported as undefined; capacity and authorization
// rejections come back as unchanged state, never as errors.

import { logger } from "../config/logger.js";
import type { ChatStore, MemberRecord, RoomRecord, UserRecord } from "../store/types.js";
import type { RoomPolicy } from "./constants.js";
import { DEFAULT_POLICY } from "./constants.js";
import type { RoomState } from "./room-state.js";
import { canAdmit, deriveRoomState } from "./room-state.js";

export interface JoinResult {
  status: "joined" | "already_member" | "full";
  room: RoomRecord;
  members: MemberRecord[];
  /** True only when this call added the user; callers broadcast membership on true. */
  wasAdded: boolean;
  state: RoomState;
}

export type LeaveResult =
  | { status: "not_member"; room: RoomRecord }
  | { status: "left"; room: RoomRecord; remaining: number; state: RoomState };

export interface CapacityResult {
  changed: boolean;
  room: RoomRecord;
  state: RoomState;
}

export async function joinRoom(
  store: ChatStore,
  userId: string,
  roomId: string,
): Promise<JoinResult | undefined> {
  const room = await store.findRoom(roomId);
  if (!room) {
    logger.warn({ roomId, userId }, "Join requested for unknown room");
    return undefined;
  }

  // Capacity is re-checked inside the store's write, not here
  const result = await store.addMember(roomId, userId, canAdmit);
  if (result.status === "not_found") {
    logger.warn({ roomId, userId }, "Room disappeared before join");
    return undefined;
  }

  const members = await store.listMembers(roomId);
  return {
    status: result.status === "added" ? "joined" : result.status,
    room,
    members,
    wasAdded: result.status === "added",
    state: deriveRoomState(members.length, room.maxMembers),
  };
}

/**
 * Join by id, creating the room when the id is unknown. After a room has been
 * deleted the same id yields a fresh, empty room. Unverified users get nothing.
 */
export async function openRoom(
  store: ChatStore,
  user: UserRecord,
  roomId: string,
  policy: RoomPolicy = DEFAULT_POLICY,
): Promise<JoinResult | undefined> {
  if (!user.isVerified) {
    logger.debug({ userId: user.id, roomId }, "Unverified user cannot open rooms");
    return undefined;
  }
  const { created } = await store.getOrCreateRoom(roomId, {
    creatorId: user.id,
    maxMembers: policy.defaultCapacity,
  });
  if (created) logger.info({ roomId, userId: user.id }, "Room created by id");
  return joinRoom(store, user.id, roomId);
}

export async function leaveRoom(
  store: ChatStore,
  userId: string,
  roomId: string,
  policy: RoomPolicy = DEFAULT_POLICY,
): Promise<LeaveResult | undefined> {
  const room = await store.findRoom(roomId);
  if (!room) {
    logger.warn({ roomId, userId }, "Leave requested for unknown room");
    return undefined;
  }

  const result = await store.removeMember(roomId, userId, !policy.retainEmptyRooms);
  switch (result.status) {
    case "not_found":
      logger.warn({ roomId, userId }, "Room disappeared before leave");
      return undefined;
    case "not_member":
      return { status: "not_member", room };
    case "left":
      if (result.deleted) logger.info({ roomId }, "Room deleted after last member left");
      return {
        status: "left",
        room,
        remaining: result.remaining,
        state: result.deleted ? "closed" : deriveRoomState(result.remaining, room.maxMembers),
      };
  }
}

/** Only the creator may change capacity, and never below the current occupancy. */
export async function setCapacity(
  store: ChatStore,
  requesterId: string,
  roomId: string,
  maxMembers: number,
): Promise<CapacityResult | undefined> {
  const result = await store.updateCapacity(
    roomId,
    maxMembers,
    (room, memberCount) =>
      room.creatorId === requesterId &&
      Number.isInteger(maxMembers) &&
      maxMembers >= 1 &&
      maxMembers >= memberCount,
  );
  if (result.status === "not_found") {
    logger.warn({ roomId, requesterId }, "Capacity change for unknown room");
    return undefined;
  }
  return {
    changed: result.status === "updated",
    room: result.room,
    state: deriveRoomState(result.memberCount, result.room.maxMembers),
  };
}

export async function renameRoom(
  store: ChatStore,
  userId: string,
  roomId: string,
  displayName: string,
): Promise<boolean> {
  const name = displayName.trim();
  if (name.length === 0) return false;
  const members = await store.listMembers(roomId);
  if (!members.some((m) => m.id === userId)) return false;
  return store.renameRoom(roomId, name);
}

export async function getMembers(store: ChatStore, roomId: string): Promise<MemberRecord[]> {
  return store.listMembers(roomId);
}
