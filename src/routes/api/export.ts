import type { FastifyPluginCallback } from "fastify";
import fp from "fastify-plugin";
import { buildManifest, createZipStream } from "../../utils/export";
import { readSessionId, setSessionCookie } from "../../utils/session-cookie";

const exportRoutes: FastifyPluginCallback = (app, _opts, done) => {
  app.post("/api/case/export", async (request, reply) => {
    const session = app.caseSessions.get(readSessionId(request));
    if (!session) {
      return reply.code(401).send({ error: "SESSION_NOT_FOUND" });
    }

    const results = session.records();
    if (results.size === 0) {
      return reply.code(409).send({ error: "NOTHING_TO_EXPORT" });
    }

    const manifest = buildManifest(session.sessionId, results);
    const { stream, finalize } = createZipStream({ results, manifest });
    finalize();

    setSessionCookie(reply, session.sessionId);
    return reply
      .header("Content-Type", "application/zip")
      .header("Content-Disposition", `attachment; filename=case-${session.sessionId}.zip`)
      .send(stream);
  });

  done();
};

export default fp(exportRoutes, { name: "export-routes" });
