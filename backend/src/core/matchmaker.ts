// core/matchmaker.ts — Waiting-room resolution.
// Candidate pools are tried in order: social affinity, topic/question match, other
// users' open rooms, then the requester's own waiting room. The first pool with a
// room that still admits the requester wins; otherwise a new waiting room is created.
// A user keeps at most one waiting room of their own: each pass runs under the
// store's user lock, so passes for the same user never overlap.

import { logger } from "../config/logger.js";
import type { CandidateRoom, ChatStore, MemberRecord, RoomRecord, UserRecord } from "../store/types.js";
import type { RoomPolicy } from "./constants.js";
import { DEFAULT_POLICY } from "./constants.js";
import { canAdmit, deriveRoomState } from "./room-state.js";
import type { RoomState } from "./room-state.js";
import { joinRoom, leaveRoom } from "./rooms.js";
import { mostChattedOfMostChatted } from "./scoring.js";

export type MatchRequest = { kind: "topic"; topic: string } | { kind: "question"; question: string };

export type PoolName = "affinity" | "topic" | "open" | "own";

export interface MatchContext {
  userId: string;
  /** Users blocked by, or blocking, the requester. */
  excludedUserIds: ReadonlySet<string>;
  affinityUserIds: ReadonlySet<string>;
  request: MatchRequest;
}

export interface MatchResult {
  room: RoomRecord;
  members: MemberRecord[];
  state: RoomState;
  pool: PoolName | "new";
  /** The requester's former waiting rooms given up for this match. */
  vacatedRoomIds: string[];
}

export function normalizeTopic(name: string): string {
  return name.trim().toLowerCase();
}

function matchesRequest(room: CandidateRoom, request: MatchRequest): boolean {
  if (request.kind === "topic") {
    const wanted = normalizeTopic(request.topic);
    return room.topics.some((t) => normalizeTopic(t) === wanted);
  }
  const needle = request.question.trim().toLowerCase();
  return room.question != null && room.question.toLowerCase().includes(needle);
}

/** Latest message first (rooms without messages last), then newest room, then most members online. */
export function compareCandidates(a: CandidateRoom, b: CandidateRoom): number {
  const aLatest = a.latestMessageAt?.getTime();
  const bLatest = b.latestMessageAt?.getTime();
  if (aLatest !== bLatest) {
    if (aLatest == null) return 1;
    if (bLatest == null) return -1;
    return bLatest - aLatest;
  }
  const created = b.createdAt.getTime() - a.createdAt.getTime();
  if (created !== 0) return created;
  const online = (r: CandidateRoom) => r.members.filter((m) => m.isOnline).length;
  return online(b) - online(a);
}

export function isWaitingRoomOf(room: CandidateRoom, userId: string): boolean {
  return room.members.length === 1 && room.members[0]?.id === userId;
}

/** Candidate pools in priority order, each already sorted. */
export function buildPools(
  rooms: CandidateRoom[],
  ctx: MatchContext,
): Array<{ pool: PoolName; rooms: CandidateRoom[] }> {
  const eligible = rooms.filter(
    (r) =>
      r.members.length > 0 &&
      canAdmit(r.members.length, r.maxMembers) &&
      !r.members.some((m) => ctx.excludedUserIds.has(m.id)),
  );
  const others = eligible.filter((r) => !r.members.some((m) => m.id === ctx.userId));

  const sorted = (list: CandidateRoom[]) => [...list].sort(compareCandidates);
  return [
    {
      pool: "affinity",
      rooms: sorted(others.filter((r) => r.members.some((m) => ctx.affinityUserIds.has(m.id)))),
    },
    { pool: "topic", rooms: sorted(others.filter((r) => matchesRequest(r, ctx.request))) },
    { pool: "open", rooms: sorted(others) },
    { pool: "own", rooms: sorted(eligible.filter((r) => isWaitingRoomOf(r, ctx.userId))) },
  ];
}

async function vacate(
  store: ChatStore,
  userId: string,
  roomIds: string[],
  policy: RoomPolicy,
): Promise<string[]> {
  const vacated: string[] = [];
  for (const roomId of roomIds) {
    const result = await leaveRoom(store, userId, roomId, policy);
    if (result?.status === "left") vacated.push(roomId);
  }
  return vacated;
}

export async function findOrCreateRoom(
  store: ChatStore,
  user: UserRecord,
  request: MatchRequest,
  policy: RoomPolicy = DEFAULT_POLICY,
): Promise<MatchResult | undefined> {
  if (!user.isVerified) {
    logger.debug({ userId: user.id }, "Unverified user cannot be matched");
    return undefined;
  }
  return store.withUserLock(user.id, (locked) => resolveRoom(locked, user, request, policy));
}

async function resolveRoom(
  store: ChatStore,
  user: UserRecord,
  request: MatchRequest,
  policy: RoomPolicy,
): Promise<MatchResult> {
  const [blocked, blockers, affinity, rooms] = await Promise.all([
    store.listBlockedIds(user.id),
    store.listBlockerIds(user.id),
    mostChattedOfMostChatted(store, user.id),
    store.listOpenRooms(),
  ]);
  const ctx: MatchContext = {
    userId: user.id,
    excludedUserIds: new Set([...blocked, ...blockers]),
    affinityUserIds: affinity,
    request,
  };
  const ownWaitingIds = rooms.filter((r) => isWaitingRoomOf(r, user.id)).map((r) => r.id);

  for (const { pool, rooms: candidates } of buildPools(rooms, ctx)) {
    for (const candidate of candidates) {
      // The candidate list is a snapshot; the join re-validates capacity at write time
      const joined = await joinRoom(store, user.id, candidate.id);
      if (!joined || joined.status === "full") continue;

      const stale = ownWaitingIds.filter((id) => id !== joined.room.id);
      const vacatedRoomIds = await vacate(store, user.id, stale, policy);
      logger.info(
        { userId: user.id, roomId: joined.room.id, pool, vacatedRoomIds },
        "Matched into room",
      );
      return { room: joined.room, members: joined.members, state: joined.state, pool, vacatedRoomIds };
    }
  }

  const vacatedRoomIds = await vacate(store, user.id, ownWaitingIds, policy);
  const room = await store.createRoom({
    creatorId: user.id,
    maxMembers: policy.defaultCapacity,
    question: request.kind === "question" ? request.question.trim() : null,
    topic: request.kind === "topic" ? normalizeTopic(request.topic) : null,
  });
  const joined = await joinRoom(store, user.id, room.id);
  const members = joined?.members ?? [];
  logger.info({ userId: user.id, roomId: room.id }, "Created waiting room");
  return {
    room,
    members,
    state: deriveRoomState(members.length, room.maxMembers),
    pool: "new",
    vacatedRoomIds,
  };
}
