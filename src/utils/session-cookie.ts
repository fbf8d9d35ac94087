import type { FastifyReply, FastifyRequest } from "fastify";
import { env } from "../env";

export const SESSION_COOKIE_NAME = "sid";

export function readSessionId(request: FastifyRequest): string | undefined {
  return request.cookies[SESSION_COOKIE_NAME];
}

export function setSessionCookie(reply: FastifyReply, sessionId: string) {
  const maxAge = env.SESSION_IDLE_TTL_MINUTES * 60;
  const secure = env.SESSION_COOKIE_SECURE ?? env.NODE_ENV === "production";
  reply.setCookie(SESSION_COOKIE_NAME, sessionId, {
    httpOnly: true,
    secure,
    sameSite: "lax",
    path: "/",
    maxAge,
    expires: new Date(Date.now() + maxAge * 1000)
  });
}

export function clearSessionCookie(reply: FastifyReply) {
  reply.clearCookie(SESSION_COOKIE_NAME, { path: "/" });
}
