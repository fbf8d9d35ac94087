import fp from "fastify-plugin";
import type { FastifyPluginCallback } from "fastify";

// JSON and zip responses only; nothing here should ever be framed or executed.
const API_HEADERS: Record<string, string> = {
  "Content-Security-Policy": "default-src 'none'; frame-ancestors 'none'",
  "X-Content-Type-Options": "nosniff",
  "X-Frame-Options": "DENY",
  "Referrer-Policy": "no-referrer",
  "Cache-Control": "no-store",
  "Cross-Origin-Resource-Policy": "same-origin"
};

const securityHeadersPlugin: FastifyPluginCallback = (app, _opts, done) => {
  app.addHook("onRequest", (_request, reply, hookDone) => {
    for (const [header, value] of Object.entries(API_HEADERS)) {
      reply.header(header, value);
    }
    if (process.env.NODE_ENV === "production") {
      reply.header("Strict-Transport-Security", "max-age=63072000; includeSubDomains");
    }
    hookDone();
  });

  done();
};

export default fp(securityHeadersPlugin, {
  name: "security-headers"
});
