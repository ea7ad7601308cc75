// core/room-state.ts — Room status derived from member count and capacity.
// Status is never persisted; every consumer calls deriveRoomState.

export type RoomState = "empty" | "waiting" | "active" | "full" | "closed";

export function deriveRoomState(memberCount: number, maxMembers: number | null): RoomState {
  if (memberCount <= 0) return "empty";
  if (maxMembers != null && memberCount >= maxMembers) return "full";
  return memberCount === 1 ? "waiting" : "active";
}

/** Admission rule applied atomically by the store on every join. */
export function canAdmit(memberCount: number, maxMembers: number | null): boolean {
  return maxMembers == null || memberCount < maxMembers;
}

export function isJoinable(state: RoomState): boolean {
  return state === "waiting" || state === "active";
}
