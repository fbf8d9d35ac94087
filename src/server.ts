import fastify, { type FastifyInstance } from "fastify";
import fastifyCookie from "@fastify/cookie";
import type { LevelWithSilent } from "pino";
import { env } from "./env";
import { createGatewayFromEnv } from "./libs/openai";
import type { GenerationGateway } from "./orchestrator/gateway";
import { CaseSessionRegistry } from "./services/case-sessions";
import securityHeadersPlugin from "./plugins/security";
import errorHandlerPlugin from "./plugins/error-handler";
import rateLimitPlugin from "./plugins/rate-limit";
import caseSessionsPlugin from "./plugins/case-sessions";
import sessionRoutes from "./routes/api/session";
import caseRoutes from "./routes/api/case";
import exportRoutes from "./routes/api/export";

export type CreateAppOptions = {
  gateway: GenerationGateway;
  dev: boolean;
  logLevel?: LevelWithSilent;
  generationTimeoutMs?: number;
  sessionIdleTtlMs?: number;
};

export function createApp(options: CreateAppOptions): FastifyInstance {
  const app = fastify({
    logger: {
      level: options.logLevel ?? (options.dev ? "info" : "warn")
    }
  });

  const registry = new CaseSessionRegistry({
    gateway: options.gateway,
    timeoutMs: options.generationTimeoutMs ?? env.GENERATION_TIMEOUT_MS,
    idleTtlMs: options.sessionIdleTtlMs ?? env.SESSION_IDLE_TTL_MINUTES * 60_000,
    logger: app.log.child({ component: "orchestrator" }),
    onEvict: (sessionId) => app.rateLimiter.forget(sessionId)
  });

  app.register(fastifyCookie);
  app.register(securityHeadersPlugin);
  app.register(errorHandlerPlugin);
  app.register(rateLimitPlugin);
  app.register(caseSessionsPlugin, { registry });
  app.register(sessionRoutes);
  app.register(caseRoutes);
  app.register(exportRoutes);

  app.get("/api/health", async (_, reply) => {
    return reply.send({ ok: true });
  });

  return app;
}

export async function start() {
  const dev = env.NODE_ENV !== "production";
  const app = createApp({ gateway: createGatewayFromEnv(env), dev, logLevel: env.LOG_LEVEL });
  const port = env.PORT;
  const host = env.HOST ?? "0.0.0.0";

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    app.log.info({ signal }, "Shutting down server...");
    try {
      await app.close();
      process.exit(0);
    } catch (error) {
      app.log.error({ err: error }, "Error during shutdown");
      process.exit(1);
    }
  };

  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  try {
    await app.listen({ port, host });
    app.log.info(`Server ready on http://${host}:${port}`);
  } catch (error) {
    app.log.error({ err: error }, "Failed to start server");
    process.exit(1);
  }
}
