// server/app.ts
import express from "express";
import type { Express } from "express";
import cors from "cors";
import helmet from "helmet";
import morgan from "morgan";
import rateLimit from "express-rate-limit";
import type { ExecutionEngine } from "./engine.js";
import { registerRoutes } from "./routes.js";

export type AppOptions = {
  engine: ExecutionEngine;
  allowedOrigins: string[];
  rateLimitMax: number;
  /** morgan format, null to skip request logging */
  logFormat: string | null;
};

function corsOriginCheck(allowed: Set<string>) {
  return (origin: string | undefined, cb: (err: Error | null, ok?: boolean) => void) => {
    // Allow server-to-server / curl / same-origin (no Origin header)
    if (!origin) return cb(null, true);
    if (allowed.has(origin)) return cb(null, true);
    return cb(new Error("CORS blocked: origin not allowed"));
  };
}

export function createApp(opts: AppOptions): Express {
  const app = express();

  // Usually deployed behind a reverse proxy
  app.set("trust proxy", 1);
  app.disable("x-powered-by");

  app.use(
    cors({
      origin: corsOriginCheck(new Set(opts.allowedOrigins)),
      methods: ["GET", "POST", "OPTIONS"],
      allowedHeaders: ["Content-Type"],
    }),
  );

  app.use(
    helmet({
      crossOriginResourcePolicy: { policy: "same-site" },
    }),
  );

  app.use(express.json({ limit: "1mb" }));
  if (opts.logFormat) app.use(morgan(opts.logFormat));

  app.use(
    rateLimit({
      windowMs: 15 * 60 * 1000,
      limit: opts.rateLimitMax,
      standardHeaders: true,
      legacyHeaders: false,
      message: { error: "Too many requests. Try again later." },
    }),
  );

  // routes.ts includes its own JSON error handler at the end
  registerRoutes(app, opts.engine);

  return app;
}
