import type { FastifyPluginCallback } from "fastify";
import fp from "fastify-plugin";
import { z } from "zod";
import { toStatusResponse } from "../../utils/case-response";
import { clearSessionCookie, readSessionId, setSessionCookie } from "../../utils/session-cookie";

const InitBody = z
  .object({
    mode: z.enum(["approval", "proceed"]).optional()
  })
  .strict();

const sessionRoutes: FastifyPluginCallback = (app, _opts, done) => {
  app.post("/api/session/init", async (request, reply) => {
    const parsed = InitBody.safeParse(request.body ?? {});
    if (!parsed.success) {
      return reply.code(400).send({ error: "INVALID_BODY", issues: parsed.error.issues });
    }

    const session = app.caseSessions.create(parsed.data.mode);
    request.log.info({ sessionId: session.sessionId, mode: session.mode }, "case session created");

    setSessionCookie(reply, session.sessionId);
    return reply.code(201).send({ session_id: session.sessionId, mode: session.mode });
  });

  app.get("/api/session", async (request, reply) => {
    const session = app.caseSessions.get(readSessionId(request));
    if (!session) {
      return reply.code(401).send({ error: "SESSION_NOT_FOUND" });
    }

    setSessionCookie(reply, session.sessionId);
    return reply.send(toStatusResponse(session.status()));
  });

  app.delete("/api/session", async (request, reply) => {
    const sessionId = readSessionId(request);
    if (!sessionId || !app.caseSessions.drop(sessionId)) {
      return reply.code(401).send({ error: "SESSION_NOT_FOUND" });
    }

    app.rateLimiter.forget(sessionId);
    clearSessionCookie(reply);
    return reply.code(204).send();
  });

  done();
};

export default fp(sessionRoutes, { name: "session-routes" });
