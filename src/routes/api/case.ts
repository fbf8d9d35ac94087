import type { FastifyPluginCallback, FastifyReply, FastifyRequest } from "fastify";
import fp from "fastify-plugin";
import { z } from "zod";
import { isStage } from "../../orchestrator/catalog";
import type { CaseSession } from "../../services/case-sessions";
import { toResultResponse, toStatusResponse } from "../../utils/case-response";
import { readSessionId, setSessionCookie } from "../../utils/session-cookie";

export const MAX_MESSAGE_LENGTH = 20_000;
export const GENERATION_LIMIT_PER_MINUTE = 20;
export const GENERATION_LIMIT_PER_HOUR = 200;

const ONE_MINUTE_MS = 60_000;
const ONE_HOUR_MS = 60 * ONE_MINUTE_MS;

const StartBody = z.object({ case_text: z.string().max(MAX_MESSAGE_LENGTH) }).strict();
const MessageBody = z.object({ message: z.string().max(MAX_MESSAGE_LENGTH) }).strict();
const AdvanceBody = z.object({ message: z.string().max(MAX_MESSAGE_LENGTH).optional() }).strict();

const caseRoutes: FastifyPluginCallback = (app, _opts, done) => {
  const resolveSession = (request: FastifyRequest, reply: FastifyReply): CaseSession | undefined => {
    const session = app.caseSessions.get(readSessionId(request));
    if (!session) {
      reply.code(401).send({ error: "SESSION_NOT_FOUND" });
      return undefined;
    }
    setSessionCookie(reply, session.sessionId);
    return session;
  };

  /** Rate limits and the per-session lock around one generating call. */
  const withGeneration = async <T>(session: CaseSession, reply: FastifyReply, run: () => Promise<T>) => {
    const sid = session.sessionId;
    const perMinute = app.rateLimiter.check(sid, "generate:minute", GENERATION_LIMIT_PER_MINUTE, ONE_MINUTE_MS);
    const perHour = app.rateLimiter.check(sid, "generate:hour", GENERATION_LIMIT_PER_HOUR, ONE_HOUR_MS);
    if (!perMinute.ok || !perHour.ok) {
      const retryAfter = Math.max(perMinute.retryAfterSec, perHour.retryAfterSec);
      reply.header("Retry-After", String(retryAfter));
      return reply.code(429).send({ error: "RATE_LIMITED", retry_after_sec: retryAfter });
    }
    if (!app.rateLimiter.acquireSession(sid)) {
      return reply.code(429).send({ error: "SESSION_BUSY" });
    }
    try {
      return await run();
    } finally {
      app.rateLimiter.releaseSession(sid);
    }
  };

  app.post("/api/case/start", async (request, reply) => {
    const session = resolveSession(request, reply);
    if (!session) return reply;
    const parsed = StartBody.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: "INVALID_BODY", issues: parsed.error.issues });
    }

    return withGeneration(session, reply, async () => {
      const status = await session.startCase(parsed.data.case_text);
      const extraction = session.getResult("extraction");
      return reply.send({
        status: toStatusResponse(status),
        result: extraction ? toResultResponse(extraction) : null
      });
    });
  });

  app.post("/api/case/submit", async (request, reply) => {
    const session = resolveSession(request, reply);
    if (!session) return reply;
    const parsed = MessageBody.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: "INVALID_BODY", issues: parsed.error.issues });
    }

    return withGeneration(session, reply, async () => {
      const status = await session.submit(parsed.data.message);
      return reply.send({ status: toStatusResponse(status) });
    });
  });

  app.post("/api/case/approve", async (request, reply) => {
    const session = resolveSession(request, reply);
    if (!session) return reply;
    return reply.send({ status: toStatusResponse(session.approve()) });
  });

  app.post("/api/case/refine", async (request, reply) => {
    const session = resolveSession(request, reply);
    if (!session) return reply;
    const parsed = MessageBody.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: "INVALID_BODY", issues: parsed.error.issues });
    }

    return withGeneration(session, reply, async () => {
      const status = await session.refine(parsed.data.message);
      return reply.send({ status: toStatusResponse(status) });
    });
  });

  app.post("/api/case/advance", async (request, reply) => {
    const session = resolveSession(request, reply);
    if (!session) return reply;
    const parsed = AdvanceBody.safeParse(request.body ?? {});
    if (!parsed.success) {
      return reply.code(400).send({ error: "INVALID_BODY", issues: parsed.error.issues });
    }

    return withGeneration(session, reply, async () => {
      const result = await session.advance(parsed.data.message);
      return reply.send({ status: toStatusResponse(session.status()), result: toResultResponse(result) });
    });
  });

  app.post("/api/case/restart", async (request, reply) => {
    const session = resolveSession(request, reply);
    if (!session) return reply;
    return reply.send({ status: toStatusResponse(session.restart()) });
  });

  app.get("/api/case/results", async (request, reply) => {
    const session = resolveSession(request, reply);
    if (!session) return reply;
    return reply.send({ results: session.results() });
  });

  app.get<{ Params: { stage: string } }>("/api/case/results/:stage", async (request, reply) => {
    const session = resolveSession(request, reply);
    if (!session) return reply;
    const { stage } = request.params;
    if (!isStage(stage)) {
      return reply.code(400).send({ error: "UNKNOWN_STAGE", message: `Unknown stage: ${stage}` });
    }

    const result = session.getResult(stage);
    if (!result) {
      return reply.code(404).send({ error: "RESULT_NOT_FOUND", stage });
    }
    return reply.send(toResultResponse(result));
  });

  done();
};

export default fp(caseRoutes, { name: "case-routes" });
