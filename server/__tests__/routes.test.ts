import { describe, it, expect, beforeAll, afterAll, vi } from "vitest";
import type { Server } from "node:http";
import { ActionGenerator } from "../actions.js";
import { createApp } from "../app.js";
import { ExecutionEngine } from "../engine.js";
import { VERDICTS } from "../judge.js";
import type { Action } from "../types.js";
import { MemoryStore } from "./memoryStore.js";

// ─── Test Helpers ─────────────────────────────────────────

const ORIGIN = "http://localhost:5173";

let server: Server;
let baseUrl: string;

async function call(method: string, path: string, body?: unknown, headers: Record<string, string> = {}) {
  const res = await fetch(`${baseUrl}${path}`, {
    method,
    headers: { "Content-Type": "application/json", Origin: ORIGIN, ...headers },
    body: body === undefined ? undefined : typeof body === "string" ? body : JSON.stringify(body),
  });
  const data: unknown = await res.json();
  return { status: res.status, data };
}

function actionsOf(data: unknown): Action[] {
  if (typeof data === "object" && data !== null && "actions" in data && Array.isArray(data.actions)) {
    return data.actions;
  }
  throw new Error("response has no actions");
}

beforeAll(async () => {
  const engine = new ExecutionEngine({
    store: new MemoryStore(),
    generator: new ActionGenerator(),
    today: () => "2026-03-02",
    now: () => "2026-03-02T09:00:00.000Z",
  });
  const app = createApp({ engine, allowedOrigins: [ORIGIN], rateLimitMax: 1000, logFormat: null });

  server = await new Promise<Server>((resolve) => {
    const s = app.listen(0, "127.0.0.1", () => resolve(s));
  });
  const address = server.address();
  if (!address || typeof address === "string") throw new Error("server is not listening on a TCP port");
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
});

// ─── routes ───────────────────────────────────────────────

describe("HTTP API", () => {
  it("answers the health check", async () => {
    expect(await call("GET", "/api/health")).toEqual({ status: 200, data: { ok: true } });
  });

  it("validates the create-user body", async () => {
    const res = await call("POST", "/api/users", { userId: "ab", goalText: "Go" });
    expect(res.status).toBe(400);
    expect(res.data).toMatchObject({ error: { fieldErrors: { userId: expect.any(Array), goalText: expect.any(Array) } } });
  });

  it("rejects a body that is not JSON", async () => {
    expect(await call("POST", "/api/users", "{not json")).toEqual({ status: 400, data: { error: "Invalid JSON body" } });
  });

  it("creates a user once and reports the duplicate as a conflict", async () => {
    const created = await call("POST", "/api/users", { userId: "founder", goalText: "Ship the MVP this month" });
    expect(created.status).toBe(200);
    expect(created.data).toMatchObject({ user: { id: "founder", level: 1, xp: 0, difficulty: 1 } });

    const again = await call("POST", "/api/users", { userId: "founder", goalText: "Ship the MVP this month" });
    expect(again).toEqual({ status: 409, data: { error: "User already exists", code: "conflict" } });
  });

  it("returns 404 for an unknown user", async () => {
    expect(await call("GET", "/api/users/nobody")).toEqual({
      status: 404,
      data: { error: "User not found", code: "not_found" },
    });
    expect((await call("GET", "/api/users/nobody/history")).status).toBe(404);
  });

  it("returns 404 for an id that could never have been created", async () => {
    expect(await call("GET", "/api/users/ab")).toEqual({
      status: 404,
      data: { error: "User not found", code: "not_found" },
    });
    expect((await call("POST", "/api/users/ab/today")).status).toBe(404);
  });

  it("refuses a check-in before today's actions exist", async () => {
    expect(await call("POST", "/api/users/founder/checkin", { updates: [] })).toEqual({
      status: 400,
      data: { error: "No actions for today. Generate today's actions first.", code: "bad_request" },
    });
  });

  it("generates today's actions idempotently", async () => {
    expect(await call("GET", "/api/users/founder/today")).toEqual({ status: 200, data: { day: "2026-03-02", actions: [] } });

    const first = await call("POST", "/api/users/founder/today");
    const second = await call("POST", "/api/users/founder/today");
    expect(first.status).toBe(200);
    expect(actionsOf(first.data)).toHaveLength(4);
    expect(actionsOf(second.data).map((a) => a.id)).toEqual(actionsOf(first.data).map((a) => a.id));
  });

  it("judges a check-in and records it in history", async () => {
    const today = await call("GET", "/api/users/founder/today");
    const updates = actionsOf(today.data).map((a) => ({ actionId: a.id, completed: true }));

    // product set at difficulty 1: 80 + 10 * (1.3 + 1.2 + 1.1 + 1.4) + 5
    const res = await call("POST", "/api/users/founder/checkin", { updates });
    expect(res.status).toBe(200);
    expect(res.data).toMatchObject({
      completed: 4,
      missed: 0,
      xpDelta: 135,
      xp: 135,
      streak: 1,
      difficulty: 2,
      verdict: VERDICTS.raise_the_bar,
    });

    const history = await call("GET", "/api/users/founder/history");
    expect(history).toEqual({
      status: 200,
      data: {
        results: [
          {
            id: expect.any(String),
            userId: "founder",
            day: "2026-03-02",
            xpDelta: 135,
            penalty: 0,
            verdict: VERDICTS.raise_the_bar,
            createdAt: "2026-03-02T09:00:00.000Z",
          },
        ],
      },
    });
  });

  it("applies a check-in that carries an unknown action id of any length", async () => {
    await call("POST", "/api/users", { userId: "builder", goalText: "Ship the MVP this month" });
    const today = await call("POST", "/api/users/builder/today");
    const updates = [
      ...actionsOf(today.data).map((a) => ({ actionId: a.id, completed: true })),
      { actionId: "x".repeat(65), completed: false },
    ];

    const res = await call("POST", "/api/users/builder/checkin", { updates });
    expect(res.status).toBe(200);
    expect(res.data).toMatchObject({ completed: 4, missed: 0, xpDelta: 135, penalty: 0 });
  });

  it("validates check-in updates", async () => {
    const res = await call("POST", "/api/users/founder/checkin", { updates: [{ actionId: "x", completed: "yes" }] });
    expect(res.status).toBe(400);
  });

  it("blocks origins outside the allowlist", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const res = await call("GET", "/api/health", undefined, { Origin: "https://evil.example" });
    expect(res).toEqual({ status: 500, data: { error: "CORS blocked: origin not allowed" } });
    vi.restoreAllMocks();
  });
});
