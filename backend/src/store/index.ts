// store/index.ts — Process-wide ChatStore backed by the shared Drizzle connection.

import { db } from "../db/connection.js";
import { DrizzleChatStore } from "./drizzle-store.js";
import type { ChatStore } from "./types.js";

export const chatStore: ChatStore = new DrizzleChatStore(db);
