// server/index.ts
import dotenv from "dotenv";
import { ActionGenerator } from "./actions.js";
import { OpenAIActionModel } from "./actionModel.js";
import { createApp } from "./app.js";
import { loadConfig } from "./config.js";
import { ExecutionEngine } from "./engine.js";
import { PgStore } from "./storage.js";

dotenv.config();

async function main() {
  const config = loadConfig();

  const store = new PgStore({ databaseUrl: config.databaseUrl, ssl: config.databaseSsl });

  // DB must be ready before routes
  await store.ensureSchema();

  const model = config.openaiApiKey
    ? new OpenAIActionModel({
        apiKey: config.openaiApiKey,
        model: config.openaiModel,
        timeoutMs: config.actionTimeoutMs,
      })
    : null;
  const generator = new ActionGenerator(model);

  const engine = new ExecutionEngine({ store, generator });
  const app = createApp({
    engine,
    allowedOrigins: config.allowedOrigins,
    rateLimitMax: config.rateLimitMax,
    logFormat: config.logFormat,
  });

  const server = app.listen(config.port, "0.0.0.0", () => {
    console.log(`✅ Server listening on port ${config.port}`);
    console.log(`✅ Allowed origins: ${config.allowedOrigins.join(", ")}`);
    console.log(`✅ Action source: ${generator.usesModel ? `${config.openaiModel} (offline fallback)` : "offline heuristic"}`);
  });

  let closing = false;
  const shutdown = (signal: string) => {
    if (closing) return;
    closing = true;
    console.log(`Received ${signal}, shutting down`);
    server.close(() => {
      store
        .close()
        .then(() => process.exit(0))
        .catch((err) => {
          console.error("❌ Failed to close database pool:", err);
          process.exit(1);
        });
    });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err) => {
  console.error("❌ Fatal startup error:", err);
  process.exit(1);
});
