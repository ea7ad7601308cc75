// middleware/auth.ts — Identity from the external provider's token.
// Accepts the httpOnly `token` cookie or a Bearer header, verifies it (HS256),
// and get-or-creates the user record for the token subject.

import type { Context } from "hono";
import { getCookie } from "hono/cookie";
import { createMiddleware } from "hono/factory";
import { verify } from "hono/jwt";

import { env } from "../config/env.js";
import { logger } from "../config/logger.js";
import { resolveUser } from "../core/users.js";
import { chatStore } from "../store/index.js";
import type { UserRecord } from "../store/types.js";

export type AuthEnv = { Variables: { user: UserRecord } };

function readToken(c: Context): string | undefined {
  const header = c.req.header("Authorization");
  if (header?.startsWith("Bearer ")) return header.slice("Bearer ".length);
  return getCookie(c, "token");
}

export const requireUser = createMiddleware<AuthEnv>(async (c, next) => {
  const token = readToken(c);
  if (!token) {
    return c.json({ error: "Unauthorized" }, 401);
  }

  let subject: unknown;
  let verified: unknown;
  try {
    const payload = await verify(token, env.JWT_SECRET, "HS256");
    subject = payload.sub;
    verified = payload.verified;
  } catch (err) {
    logger.debug({ err: err instanceof Error ? err.message : String(err) }, "Token rejected");
    return c.json({ error: "Unauthorized" }, 401);
  }
  if (typeof subject !== "string" || subject.length === 0) {
    return c.json({ error: "Unauthorized" }, 401);
  }

  const user = await resolveUser(
    chatStore,
    subject,
    typeof verified === "boolean" ? verified : undefined,
  );
  c.set("user", user);
  await next();
});
