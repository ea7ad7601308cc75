// core/scoring.ts — Chattiness scores and most-chatted partner rankings.
// Pure functions over pre-aggregated RoomChatStats; mostChattedOfMostChatted is the
// only part that reads, with one batched stats query per level.

import type { ChatStore, RoomChatStats } from "../store/types.js";
import { TOP_CHATTY_ROOMS } from "./constants.js";

/**
 * (total × mine) / others, or 0 when the user or the others never wrote.
 * Rooms where only one side talks carry no affinity.
 */
export function chattinessScore(stats: RoomChatStats, userId: string): number {
  let total = 0;
  for (const count of Object.values(stats.messageCounts)) total += count;
  const mine = stats.messageCounts[userId] ?? 0;
  const others = total - mine;
  if (mine === 0 || others === 0) return 0;
  return (total * mine) / others;
}

export interface ScoredRoom {
  stats: RoomChatStats;
  score: number;
}

/** User's rooms ordered by score, newest room first on ties, then by id. */
export function rankRooms(
  rooms: RoomChatStats[],
  userId: string,
  excludedRoomIds: ReadonlySet<string> = new Set(),
): ScoredRoom[] {
  return rooms
    .filter(
      (r) =>
        r.memberIds.includes(userId) &&
        !excludedRoomIds.has(r.roomId) &&
        (r.maxMembers == null || r.memberIds.length <= r.maxMembers),
    )
    .map((stats) => ({ stats, score: chattinessScore(stats, userId) }))
    .sort(
      (a, b) =>
        b.score - a.score ||
        b.stats.createdAt.getTime() - a.stats.createdAt.getTime() ||
        a.stats.roomId.localeCompare(b.stats.roomId),
    );
}

/** Other members of the user's top-ranked rooms. */
export function mostChattedPartners(
  rooms: RoomChatStats[],
  userId: string,
  excludedRoomIds: ReadonlySet<string> = new Set(),
  topRooms = TOP_CHATTY_ROOMS,
): Set<string> {
  const partners = new Set<string>();
  for (const { stats } of rankRooms(rooms, userId, excludedRoomIds).slice(0, topRooms)) {
    for (const memberId of stats.memberIds) {
      if (memberId !== userId) partners.add(memberId);
    }
  }
  return partners;
}

/**
 * Partners of the user's partners, found in rooms the user is not part of.
 * Drives the "friend of a friend" pool of the matchmaker.
 */
export async function mostChattedOfMostChatted(
  store: ChatStore,
  userId: string,
): Promise<Set<string>> {
  const ownStats = await store.listRoomChatStats([userId]);
  const partners = mostChattedPartners(ownStats, userId);
  const result = new Set<string>();
  if (partners.size === 0) return result;

  const ownRoomIds = new Set(ownStats.map((r) => r.roomId));
  const partnerStats = await store.listRoomChatStats([...partners]);
  for (const partnerId of partners) {
    for (const id of mostChattedPartners(partnerStats, partnerId, ownRoomIds)) {
      result.add(id);
    }
  }
  result.delete(userId);
  return result;
}
