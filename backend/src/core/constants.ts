// core/constants.ts — Tunables for matchmaking, paging and room lifecycle.

/** Rooms ranked per user when computing most-chatted partners. */
export const TOP_CHATTY_ROOMS = 5;

/** Rooms or questions returned by one discovery query. */
export const DISCOVERY_LIMIT = 10;

export const DEFAULT_ROOM_CAPACITY = 5;
export const MESSAGES_PER_PAGE = 10;

export interface RoomPolicy {
  /** Capacity given to rooms created by the matchmaker or by opening an unknown id. */
  defaultCapacity: number;
  /** Keep rooms after their last member leaves instead of deleting them. */
  retainEmptyRooms: boolean;
  pageSize: number;
}

export const DEFAULT_POLICY: RoomPolicy = {
  defaultCapacity: DEFAULT_ROOM_CAPACITY,
  retainEmptyRooms: false,
  pageSize: MESSAGES_PER_PAGE,
};
