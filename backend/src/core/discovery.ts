// core/discovery.ts — Question browsing: room search, question suggestions, active feed.
// Read-only. Rooms holding a user the viewer blocked, or who blocked the viewer,
// are never listed, and neither are full or question-less rooms.

import type { CandidateRoom, ChatStore } from "../store/types.js";
import { DISCOVERY_LIMIT } from "./constants.js";
import { canAdmit } from "./room-state.js";
import { mostChattedOfMostChatted } from "./scoring.js";

export interface RoomSummary {
  id: string;
  question: string;
  createdAt: Date;
  latestMessageAt: Date | null;
  memberCount: number;
  alreadyJoined: boolean;
}

export interface ActiveQuestion {
  id: string;
  question: string;
}

interface Viewer {
  userId: string;
  excludedUserIds: ReadonlySet<string>;
  affinityUserIds: ReadonlySet<string>;
}

type QuestionRoom = CandidateRoom & { question: string };

async function loadViewer(store: ChatStore, userId: string): Promise<Viewer> {
  const [blocked, blockers, affinity] = await Promise.all([
    store.listBlockedIds(userId),
    store.listBlockerIds(userId),
    mostChattedOfMostChatted(store, userId),
  ]);
  return { userId, excludedUserIds: new Set([...blocked, ...blockers]), affinityUserIds: affinity };
}

function hasQuestion(room: CandidateRoom): room is QuestionRoom {
  return room.question != null && room.question.length > 0;
}

async function visibleRooms(store: ChatStore, viewer: Viewer): Promise<QuestionRoom[]> {
  const rooms = await store.listOpenRooms();
  return rooms
    .filter(hasQuestion)
    .filter(
      (r) =>
        canAdmit(r.members.length, r.maxMembers) &&
        !r.members.some((m) => viewer.excludedUserIds.has(m.id)),
    );
}

export function matchesQuestion(question: string, query: string): boolean {
  return question.toLowerCase().includes(query.trim().toLowerCase());
}

const isJoined = (room: CandidateRoom, viewer: Viewer) =>
  room.members.some((m) => m.id === viewer.userId);
const affinityCount = (room: CandidateRoom, viewer: Viewer) =>
  room.members.filter((m) => viewer.affinityUserIds.has(m.id)).length;
const onlineCount = (room: CandidateRoom) => room.members.filter((m) => m.isOnline).length;

/** Latest message first (silent rooms last), then newest room. */
function compareActivity(a: CandidateRoom, b: CandidateRoom): number {
  const aLatest = a.latestMessageAt?.getTime();
  const bLatest = b.latestMessageAt?.getTime();
  if (aLatest !== bLatest) {
    if (aLatest == null) return 1;
    if (bLatest == null) return -1;
    return bLatest - aLatest;
  }
  return b.createdAt.getTime() - a.createdAt.getTime();
}

/** Joined rooms first, then affinity members, members online, activity. */
function compareSearchResults(viewer: Viewer) {
  return (a: CandidateRoom, b: CandidateRoom): number =>
    Number(isJoined(b, viewer)) - Number(isJoined(a, viewer)) ||
    affinityCount(b, viewer) - affinityCount(a, viewer) ||
    onlineCount(b) - onlineCount(a) ||
    compareActivity(a, b);
}

async function searchRanked(
  store: ChatStore,
  userId: string,
  query: string,
): Promise<QuestionRoom[]> {
  const viewer = await loadViewer(store, userId);
  const rooms = await visibleRooms(store, viewer);
  return rooms
    .filter((r) => matchesQuestion(r.question, query))
    .sort(compareSearchResults(viewer));
}

export async function findRooms(
  store: ChatStore,
  userId: string,
  query: string,
  limit = DISCOVERY_LIMIT,
): Promise<RoomSummary[]> {
  const ranked = await searchRanked(store, userId, query);
  return ranked.slice(0, limit).map((r) => ({
    id: r.id,
    question: r.question,
    createdAt: r.createdAt,
    latestMessageAt: r.latestMessageAt,
    memberCount: r.members.length,
    alreadyJoined: r.members.some((m) => m.id === userId),
  }));
}

/** Distinct questions of the search results, best ranked first. */
export async function suggestQuestions(
  store: ChatStore,
  userId: string,
  query: string,
  limit = DISCOVERY_LIMIT,
): Promise<string[]> {
  const suggestions: string[] = [];
  for (const room of await searchRanked(store, userId, query)) {
    if (!suggestions.includes(room.question)) suggestions.push(room.question);
    if (suggestions.length === limit) break;
  }
  return suggestions;
}

/** Open rooms to browse, ranked by affinity members, members online, activity, then size. */
export async function activeQuestions(
  store: ChatStore,
  userId: string,
  limit = DISCOVERY_LIMIT,
): Promise<ActiveQuestion[]> {
  const viewer = await loadViewer(store, userId);
  const rooms = await visibleRooms(store, viewer);
  return rooms
    .sort(
      (a, b) =>
        affinityCount(b, viewer) - affinityCount(a, viewer) ||
        onlineCount(b) - onlineCount(a) ||
        compareActivity(a, b) ||
        b.members.length - a.members.length,
    )
    .slice(0, limit)
    .map((r) => ({ id: r.id, question: r.question }));
}
