// realtime/hub.ts — In-process fan-out of chat events to connected clients.
// Each user id names a group of connections (one per open SSE stream). Delivery is
// best-effort: a failing sink is logged and never fails the command that emitted it.

import { randomUUID } from "node:crypto";

import { logger } from "../config/logger.js";
import type { MemberRecord, MessageRecord } from "../store/types.js";

export type ChatEvent =
  | { type: "members_changed"; roomId: string; members: MemberRecord[] }
  | { type: "new_message"; roomId: string; message: MessageRecord }
  // A signal to re-pull the conversation list, not a payload
  | { type: "conversations_changed"; userId: string }
  | { type: "room_full"; roomId: string }
  | { type: "display_name_rejected"; name: string }
  | { type: "display_name_changed"; displayName: string }
  | { type: "messages_refreshed"; roomId: string };

export type EventSink = (event: ChatEvent) => Promise<void>;

interface Connection {
  userId: string;
  sink: EventSink;
}

export class EventHub {
  private readonly connections = new Map<string, Connection>();
  private readonly groups = new Map<string, Set<string>>();

  /** Registers a connection in the user's group and returns its id. */
  connect(userId: string, sink: EventSink): string {
    const connectionId = randomUUID();
    this.connections.set(connectionId, { userId, sink });
    const group = this.groups.get(userId) ?? new Set<string>();
    group.add(connectionId);
    this.groups.set(userId, group);
    return connectionId;
  }

  /** Drops the connection; `lastConnection` tells whether the user is now unreachable. */
  disconnect(connectionId: string): { userId: string; lastConnection: boolean } | undefined {
    const connection = this.connections.get(connectionId);
    if (!connection) return undefined;
    this.connections.delete(connectionId);

    const group = this.groups.get(connection.userId);
    group?.delete(connectionId);
    const lastConnection = !group || group.size === 0;
    if (lastConnection) this.groups.delete(connection.userId);
    return { userId: connection.userId, lastConnection };
  }

  isConnected(userId: string): boolean {
    return this.groups.has(userId);
  }

  connectionCount(): number {
    return this.connections.size;
  }

  async sendToUser(userId: string, event: ChatEvent): Promise<void> {
    await this.sendToUsers([userId], event);
  }

  async sendToUsers(userIds: Iterable<string>, event: ChatEvent): Promise<void> {
    const targets: Array<[string, Connection]> = [];
    for (const userId of new Set(userIds)) {
      for (const connectionId of this.groups.get(userId) ?? []) {
        const connection = this.connections.get(connectionId);
        if (connection) targets.push([connectionId, connection]);
      }
    }

    const results = await Promise.allSettled(targets.map(([, c]) => c.sink(event)));
    results.forEach((result, i) => {
      if (result.status === "rejected") {
        const reason: unknown = result.reason;
        logger.warn(
          {
            connectionId: targets[i]?.[0],
            event: event.type,
            err: reason instanceof Error ? reason.message : String(reason),
          },
          "Event delivery failed",
        );
      }
    });
  }
}

export const hub = new EventHub();
