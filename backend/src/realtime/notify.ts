// realtime/notify.ts — Which members hear about what after a command commits.

import type { ChatStore } from "../store/types.js";
import type { EventHub } from "./hub.js";

export async function announceMembers(
  store: ChatStore,
  hub: EventHub,
  roomId: string,
): Promise<string[]> {
  const members = await store.listMembers(roomId);
  const memberIds = members.map((m) => m.id);
  await hub.sendToUsers(memberIds, { type: "members_changed", roomId, members });
  return memberIds;
}

export async function announceConversations(hub: EventHub, userIds: Iterable<string>): Promise<void> {
  await Promise.all(
    [...new Set(userIds)].map((userId) =>
      hub.sendToUser(userId, { type: "conversations_changed", userId }),
    ),
  );
}

/** Presence or profile changes: refresh member lists and inboxes of every room. */
export async function announceToRooms(
  store: ChatStore,
  hub: EventHub,
  roomIds: string[],
): Promise<void> {
  for (const roomId of roomIds) {
    const memberIds = await announceMembers(store, hub, roomId);
    await announceConversations(hub, memberIds);
  }
}
