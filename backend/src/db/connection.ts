// db/connection.ts — Postgres pool behind the chat store (postgres.js driver).
// Connections report application_name "random-chat"; a matchmaking pass holds one until it commits.

import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";

import { env } from "../config/env.js";
import * as schema from "./schema.js";

export const connection = postgres(env.DATABASE_URL, {
  max: env.DATABASE_POOL_MAX,
  idle_timeout: 30,
  connection: { application_name: "random-chat" },
});
export const db = drizzle(connection, { schema });
