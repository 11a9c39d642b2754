// server/routes.ts
import type { Express, Request, Response, NextFunction } from "express";
import { z } from "zod";
import type { ExecutionEngine } from "./engine.js";
import { EngineError } from "./errors.js";

/** Async route wrapper */
function wrap(fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown> | unknown) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

const UserIdSchema = z
  .string()
  .trim()
  .min(3)
  .max(64)
  .regex(/^[a-zA-Z0-9._-]+$/, "User id can only contain letters, numbers, dot, underscore, hyphen");

const CreateUserSchema = z.object({
  userId: UserIdSchema,
  goalText: z.string().trim().min(5).max(280),
});

const CheckInSchema = z.object({
  updates: z
    .array(
      z.object({
        actionId: z.string().min(1),
        completed: z.boolean(),
      }),
    )
    .max(50),
});

// the id format is enforced on creation only; a lookup for any other id is simply not found
const UserParamsSchema = z.object({ userId: z.string().min(1) });

export function registerRoutes(app: Express, engine: ExecutionEngine) {
  app.get("/api/health", (_req, res) => res.json({ ok: true }));

  // -----------------------------
  // Users
  // -----------------------------
  app.post(
    "/api/users",
    wrap(async (req, res) => {
      const parsed = CreateUserSchema.safeParse(req.body);
      if (!parsed.success) return res.status(400).json({ error: parsed.error.flatten() });

      const user = await engine.createUser(parsed.data);
      return res.json({ user });
    }),
  );

  app.get(
    "/api/users/:userId",
    wrap(async (req, res) => {
      const params = UserParamsSchema.safeParse(req.params);
      if (!params.success) return res.status(400).json({ error: params.error.flatten() });

      const user = await engine.getUser(params.data.userId);
      return res.json({ user });
    }),
  );

  // -----------------------------
  // Today's actions
  // -----------------------------
  app.get(
    "/api/users/:userId/today",
    wrap(async (req, res) => {
      const params = UserParamsSchema.safeParse(req.params);
      if (!params.success) return res.status(400).json({ error: params.error.flatten() });

      return res.json(await engine.todayActions(params.data.userId));
    }),
  );

  // once per day; repeat calls get the same batch back
  app.post(
    "/api/users/:userId/today",
    wrap(async (req, res) => {
      const params = UserParamsSchema.safeParse(req.params);
      if (!params.success) return res.status(400).json({ error: params.error.flatten() });

      return res.json(await engine.generateToday(params.data.userId));
    }),
  );

  // -----------------------------
  // Check-in + record
  // -----------------------------
  app.post(
    "/api/users/:userId/checkin",
    wrap(async (req, res) => {
      const params = UserParamsSchema.safeParse(req.params);
      if (!params.success) return res.status(400).json({ error: params.error.flatten() });

      const parsed = CheckInSchema.safeParse(req.body);
      if (!parsed.success) return res.status(400).json({ error: parsed.error.flatten() });

      const result = await engine.checkIn({ userId: params.data.userId, updates: parsed.data.updates });
      return res.json(result);
    }),
  );

  app.get(
    "/api/users/:userId/history",
    wrap(async (req, res) => {
      const params = UserParamsSchema.safeParse(req.params);
      if (!params.success) return res.status(400).json({ error: params.error.flatten() });

      const results = await engine.history(params.data.userId);
      return res.json({ results });
    }),
  );

  // -----------------------------
  // Error handler
  // -----------------------------
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof EngineError) {
      return res.status(err.status).json({ error: err.message, code: err.code });
    }
    // express.json() rejects unparseable bodies with a SyntaxError
    if (err instanceof SyntaxError) {
      return res.status(400).json({ error: "Invalid JSON body" });
    }
    console.error("❌ API error:", err);
    const msg = err instanceof Error ? err.message : "Server error";
    return res.status(500).json({ error: msg });
  });
}
