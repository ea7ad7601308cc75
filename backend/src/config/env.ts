// config/env.ts — Zod-validated environment variables.
// Room policy knobs (capacity, page size, empty-room retention) are read here
// and handed to the core as a RoomPolicy; core modules never touch process.env.

import { config } from "dotenv";
import { z } from "zod/v4";

import type { RoomPolicy } from "../core/constants.js";

config({ path: "../.env" });

const booleanFlag = z
  .enum(["true", "false"])
  .default("false")
  .transform((v) => v === "true");

export const envSchema = z.object({
  DATABASE_URL: z.string(),
  // Each matchmaking pass holds one pooled connection until it commits
  DATABASE_POOL_MAX: z.coerce.number().int().min(2).default(10),

  REDIS_URL: z.string().default("redis://localhost:6379"),

  // Identity tokens are issued by the external provider and signed with this secret.
  JWT_SECRET: z
    .string()
    .min(32, "JWT_SECRET must be at least 32 characters (use: openssl rand -base64 32)"),

  CORS_ORIGINS: z.string().default("http://localhost:5173,http://localhost:5174"),

  PORT: z.coerce.number().default(3000),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),

  // Member limit given to rooms the matchmaker creates
  ROOM_CAPACITY: z.coerce.number().int().min(2).default(5),
  MESSAGES_PER_PAGE: z.coerce.number().int().min(1).max(100).default(10),

  // Audit variant: keep rooms after their last member leaves
  RETAIN_EMPTY_ROOMS: booleanFlag,

  SSE_KEEPALIVE_MS: z.coerce.number().int().min(1000).default(25_000),
});

export type Env = z.infer<typeof envSchema>;

export const env: Env = envSchema.parse(process.env);

export function roomPolicy(source: Env = env): RoomPolicy {
  return {
    defaultCapacity: source.ROOM_CAPACITY,
    retainEmptyRooms: source.RETAIN_EMPTY_ROOMS,
    pageSize: source.MESSAGES_PER_PAGE,
  };
}
