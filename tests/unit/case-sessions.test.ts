import { describe, expect, it } from "vitest";
import { InMemoryRateLimiter } from "../../src/plugins/rate-limit";
import { CaseSession, CaseSessionRegistry } from "../../src/services/case-sessions";
import { FakeGateway } from "../support/fake-gateway";

const CASE_TEXT = "Patient reports chest pain";

describe("CaseSession", () => {
  it("runs straight through stages in proceed mode", async () => {
    const gateway = new FakeGateway().enqueue("Symptoms: chest pain", "Chest pain <- ischemia");
    const session = new CaseSession({ gateway, mode: "proceed" });

    const started = await session.startCase(CASE_TEXT);
    expect(started.state).toBe("awaiting_input");
    expect(started.latestStage).toBe("extraction");
    expect(started.latestText).toBe("Symptoms: chest pain");

    const result = await session.advance();
    expect(result.stage).toBe("causal_analysis");
    expect(session.status().nextStage).toBe("validation");
    expect(session.conversationLength()).toBe(0);
  });

  it("keeps approval operations out of proceed mode", async () => {
    const session = new CaseSession({ gateway: new FakeGateway(), mode: "proceed" });
    await session.startCase(CASE_TEXT);

    expect(() => session.approve()).toThrow("Cannot approve while in proceed mode");
    await expect(session.refine("more")).rejects.toThrow("Cannot refine while in proceed mode");
    await expect(session.submit("more")).rejects.toThrow("Cannot submit while in proceed mode");
  });

  it("keeps advance out of approval mode", async () => {
    const session = new CaseSession({ gateway: new FakeGateway() });
    await expect(session.advance()).rejects.toThrow("Cannot advance while in approval mode");
  });

  it("undoes a proceed-mode start when extraction fails", async () => {
    const gateway = new FakeGateway().enqueue(new Error("unreachable"));
    const session = new CaseSession({ gateway, mode: "proceed" });

    await expect(session.startCase(CASE_TEXT)).rejects.toThrow("Generation failed: unreachable");
    expect(session.status().nextStage).toBe("initial");
    expect(session.results()).toEqual({});
  });

  it("reports per-stage status", async () => {
    const session = new CaseSession({ gateway: new FakeGateway() });
    await session.startCase(CASE_TEXT);

    const { stages } = session.status();
    expect(stages.slice(0, 3)).toEqual([
      { stage: "initial", status: "completed" },
      { stage: "extraction", status: "completed" },
      { stage: "causal_analysis", status: "not_started" }
    ]);
    expect(stages).toHaveLength(11);
  });

  it("restarts with an empty case", async () => {
    const session = new CaseSession({ gateway: new FakeGateway() });
    await session.startCase(CASE_TEXT);

    const status = session.restart();

    expect(status.state).toBe("awaiting_input");
    expect(status.latestStage).toBeNull();
    expect(session.results()).toEqual({});
    expect(session.conversationLength()).toBe(0);
  });
});

describe("CaseSessionRegistry", () => {
  it("creates independent sessions", async () => {
    const registry = new CaseSessionRegistry({ gateway: new FakeGateway(), idleTtlMs: 60_000 });
    const first = registry.create();
    const second = registry.create("proceed");

    await first.startCase(CASE_TEXT);

    expect(first.sessionId).not.toBe(second.sessionId);
    expect(second.mode).toBe("proceed");
    expect(registry.get(second.sessionId)?.results()).toEqual({});
    expect(registry.size).toBe(2);
  });

  it("returns nothing for unknown or missing ids", () => {
    const registry = new CaseSessionRegistry({ gateway: new FakeGateway(), idleTtlMs: 60_000 });
    expect(registry.get(undefined)).toBeUndefined();
    expect(registry.get("not-a-session")).toBeUndefined();
  });

  it("evicts sessions idle past the TTL", () => {
    let now = 1_000_000;
    const registry = new CaseSessionRegistry({ gateway: new FakeGateway(), idleTtlMs: 60_000, now: () => now });
    const idle = registry.create();
    now += 30_000;
    const active = registry.create();

    now += 40_000;
    expect(registry.evictIdle()).toEqual([idle.sessionId]);
    expect(registry.get(idle.sessionId)).toBeUndefined();
    expect(registry.get(active.sessionId)).toBe(active);
  });

  it("reports evicted sessions so their rate-limit counters are released", () => {
    let now = 1_000_000;
    const limiter = new InMemoryRateLimiter(() => now);
    const evicted: string[] = [];
    const registry = new CaseSessionRegistry({
      gateway: new FakeGateway(),
      idleTtlMs: 60_000,
      now: () => now,
      onEvict: (sessionId) => {
        evicted.push(sessionId);
        limiter.forget(sessionId);
      }
    });
    const session = registry.create();
    limiter.check(session.sessionId, "generate:minute", 20, 60_000);
    limiter.check(session.sessionId, "generate:hour", 200, 3_600_000);
    expect(limiter.tracks(session.sessionId)).toBe(true);

    now += 60_001;
    registry.evictIdle();

    expect(evicted).toEqual([session.sessionId]);
    expect(limiter.tracks(session.sessionId)).toBe(false);
  });

  it("drops a session on request", () => {
    const registry = new CaseSessionRegistry({ gateway: new FakeGateway(), idleTtlMs: 60_000 });
    const session = registry.create();

    expect(registry.drop(session.sessionId)).toBe(true);
    expect(registry.drop(session.sessionId)).toBe(false);
    expect(registry.size).toBe(0);
  });
});
