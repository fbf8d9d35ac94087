import fp from "fastify-plugin";
import type { FastifyPluginCallback } from "fastify";
import type { CaseSessionRegistry } from "../services/case-sessions";

declare module "fastify" {
  interface FastifyInstance {
    caseSessions: CaseSessionRegistry;
  }
}

type CaseSessionsPluginOptions = {
  registry: CaseSessionRegistry;
};

const caseSessionsPlugin: FastifyPluginCallback<CaseSessionsPluginOptions> = (app, opts, done) => {
  app.decorate("caseSessions", opts.registry);
  done();
};

export default fp(caseSessionsPlugin, { name: "case-sessions" });
