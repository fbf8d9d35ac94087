import fp from "fastify-plugin";
import type { FastifyPluginCallback } from "fastify";

type Counter = { count: number; resetAt: number };

export type RateLimitDecision = { ok: boolean; remaining: number; retryAfterSec: number };

export class InMemoryRateLimiter {
  private counters = new Map<string, Counter>();
  private activeSessions = new Set<string>();

  constructor(private readonly now: () => number = Date.now) {}

  check(sid: string, bucket: string, limit: number, windowMs: number): RateLimitDecision {
    const now = this.now();
    const key = `${sid}:${bucket}`;
    const current = this.counters.get(key);
    if (!current || now >= current.resetAt) {
      this.counters.set(key, { count: 1, resetAt: now + windowMs });
      return { ok: true, remaining: limit - 1, retryAfterSec: 0 };
    }
    if (current.count < limit) {
      current.count += 1;
      return { ok: true, remaining: limit - current.count, retryAfterSec: 0 };
    }
    const retryAfterSec = Math.ceil((current.resetAt - now) / 1000);
    return { ok: false, remaining: 0, retryAfterSec };
  }

  /** One in-flight generation per session; false when the session is busy. */
  acquireSession(sid: string): boolean {
    if (this.activeSessions.has(sid)) return false;
    this.activeSessions.add(sid);
    return true;
  }

  releaseSession(sid: string): void {
    this.activeSessions.delete(sid);
  }

  tracks(sid: string): boolean {
    if (this.activeSessions.has(sid)) return true;
    for (const key of this.counters.keys()) {
      if (key.startsWith(`${sid}:`)) return true;
    }
    return false;
  }

  forget(sid: string): void {
    this.activeSessions.delete(sid);
    for (const key of this.counters.keys()) {
      if (key.startsWith(`${sid}:`)) {
        this.counters.delete(key);
      }
    }
  }
}

declare module "fastify" {
  interface FastifyInstance {
    rateLimiter: InMemoryRateLimiter;
  }
}

const rateLimitPlugin: FastifyPluginCallback = (app, _opts, done) => {
  app.decorate("rateLimiter", new InMemoryRateLimiter());
  done();
};

export default fp(rateLimitPlugin, { name: "rate-limit" });
