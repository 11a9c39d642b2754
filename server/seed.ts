import dotenv from "dotenv";
import { ActionGenerator } from "./actions.js";
import { loadConfig } from "./config.js";
import { ExecutionEngine } from "./engine.js";
import { PgStore } from "./storage.js";

dotenv.config();

const config = loadConfig();
const store = new PgStore({ databaseUrl: config.databaseUrl, ssl: config.databaseSsl });
await store.ensureSchema();

const engine = new ExecutionEngine({ store, generator: new ActionGenerator() });

const userId = process.env.SEED_USER || "founder";
const goalText = process.env.SEED_GOAL || "Get 10 paying customers in 14 days.";

const existing = await store.getUser(userId);
if (existing) {
  console.log("Seed user already exists:", existing.id);
} else {
  const user = await engine.createUser({ userId, goalText });
  const today = await engine.generateToday(user.id);
  console.log("Seeded:", { user: { id: user.id, goalText: user.goalText }, day: today.day, actions: today.actions.length });
}

await store.close();
