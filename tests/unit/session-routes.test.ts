import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { env } from "../../src/env";
import { SESSION_COOKIE_NAME } from "../../src/utils/session-cookie";
import { createTestApp, initSession } from "../support/http";

const { app } = createTestApp();

beforeAll(async () => {
  await app.ready();
});

afterAll(async () => {
  await app.close();
});

describe("session routes", () => {
  it("creates an approval-mode session and sets an http-only cookie", async () => {
    const response = await app.inject({ method: "POST", url: "/api/session/init" });

    expect(response.statusCode).toBe(201);
    const body = response.json<{ session_id: string; mode: string }>();
    expect(body.session_id).toMatch(/^[a-f0-9-]{36}$/);
    expect(body.mode).toBe("approval");

    const cookie = response.cookies.find((entry) => entry.name === SESSION_COOKIE_NAME);
    expect(cookie?.value).toBe(body.session_id);
    expect(cookie?.httpOnly).toBe(true);
    expect(cookie?.sameSite).toBe("Lax");
    expect(cookie?.path).toBe("/");
    expect(cookie?.maxAge).toBe(env.SESSION_IDLE_TTL_MINUTES * 60);
    expect(cookie?.secure).toBeUndefined();
  });

  it("creates a proceed-mode session on request", async () => {
    const response = await app.inject({ method: "POST", url: "/api/session/init", payload: { mode: "proceed" } });

    expect(response.statusCode).toBe(201);
    expect(response.json()).toMatchObject({ mode: "proceed" });
  });

  it("rejects an unknown mode", async () => {
    const response = await app.inject({ method: "POST", url: "/api/session/init", payload: { mode: "autopilot" } });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({ error: "INVALID_BODY" });
  });

  it("reports the status of a fresh session", async () => {
    const { cookie, sessionId } = await initSession(app);

    const response = await app.inject({ method: "GET", url: "/api/session", headers: { cookie } });

    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body).toMatchObject({
      session_id: sessionId,
      mode: "approval",
      state: "awaiting_input",
      stage: "initial",
      next_stage: "initial",
      pending_text: null,
      ready: null,
      is_terminal: false,
      latest_stage: null,
      latest_text: null
    });
    expect(body.stages).toHaveLength(11);
  });

  it("requires a known session cookie", async () => {
    const missing = await app.inject({ method: "GET", url: "/api/session" });
    expect(missing.statusCode).toBe(401);
    expect(missing.json()).toEqual({ error: "SESSION_NOT_FOUND" });

    const unknown = await app.inject({
      method: "GET",
      url: "/api/session",
      headers: { cookie: `${SESSION_COOKIE_NAME}=not-a-session` }
    });
    expect(unknown.statusCode).toBe(401);
  });

  it("deletes a session", async () => {
    const { cookie } = await initSession(app);

    const deleted = await app.inject({ method: "DELETE", url: "/api/session", headers: { cookie } });
    expect(deleted.statusCode).toBe(204);

    const after = await app.inject({ method: "GET", url: "/api/session", headers: { cookie } });
    expect(after.statusCode).toBe(401);

    const again = await app.inject({ method: "DELETE", url: "/api/session", headers: { cookie } });
    expect(again.statusCode).toBe(401);
  });
});
