// server/storage.ts
// EngineStore contract + Postgres implementation.

import pg from "pg";
import type { Pool, PoolClient, QueryResultRow } from "pg";
import type { Action, DailyResult, User, UserStats } from "./types.js";

/** Writes that must land together run against a transaction handle */
export interface EngineTx {
  /** Reads the user row and holds its lock until the transaction ends */
  lockUser(userId: string): Promise<User | null>;
  listActions(userId: string, day: string): Promise<Action[]>;
  insertActions(actions: Action[]): Promise<void>;
  setActionCompletion(actionId: string, completed: boolean, at: string): Promise<void>;
  /** Insert or overwrite the (userId, day) result; the first row's id is kept */
  upsertDailyResult(result: DailyResult): Promise<DailyResult>;
  updateUserStats(userId: string, stats: UserStats): Promise<void>;
}

export interface EngineStore {
  getUser(userId: string): Promise<User | null>;
  /** false when the id is already taken */
  insertUser(user: User): Promise<boolean>;
  listActions(userId: string, day: string): Promise<Action[]>;
  /** Newest day first */
  listResults(userId: string, limit: number): Promise<DailyResult[]>;
  transaction<T>(fn: (tx: EngineTx) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

/** Runs one statement and returns its rows; bound to either the pool or a transaction client */
type Run = <T extends QueryResultRow>(text: string, params?: unknown[]) => Promise<T[]>;

type UserRow = {
  id: string;
  created_at: string;
  goal_text: string;
  level: number;
  xp: number;
  streak: number;
  debt: number;
  difficulty: number;
};

type ActionRow = {
  id: string;
  user_id: string;
  day_key: string;
  position: number;
  text: string;
  impact_weight: number;
  difficulty: number;
  non_negotiable: boolean;
  completed: boolean | null;
  completed_at: string | null;
};

type ResultRow = {
  id: string;
  user_id: string;
  day_key: string;
  xp_delta: number;
  penalty: number;
  verdict_text: string;
  created_at: string;
};

function toUser(row: UserRow): User {
  return {
    id: row.id,
    createdAt: row.created_at,
    goalText: row.goal_text,
    level: Number(row.level),
    xp: Number(row.xp),
    streak: Number(row.streak),
    debt: Number(row.debt),
    difficulty: Number(row.difficulty),
  };
}

function toAction(row: ActionRow): Action {
  return {
    id: row.id,
    userId: row.user_id,
    day: row.day_key,
    position: Number(row.position),
    text: row.text,
    impactWeight: Number(row.impact_weight),
    difficulty: Number(row.difficulty),
    nonNegotiable: row.non_negotiable,
    completed: row.completed,
    completedAt: row.completed_at,
  };
}

function toResult(row: ResultRow): DailyResult {
  return {
    id: row.id,
    userId: row.user_id,
    day: row.day_key,
    xpDelta: Number(row.xp_delta),
    penalty: Number(row.penalty),
    verdict: row.verdict_text,
    createdAt: row.created_at,
  };
}

async function selectUser(run: Run, userId: string, forUpdate: boolean) {
  const rows = await run<UserRow>(`SELECT * FROM users WHERE id = $1${forUpdate ? " FOR UPDATE" : ""}`, [userId]);
  const row = rows[0];
  return row ? toUser(row) : null;
}

async function selectActions(run: Run, userId: string, day: string) {
  const rows = await run<ActionRow>(
    "SELECT * FROM actions WHERE user_id = $1 AND day_key = $2 ORDER BY position ASC",
    [userId, day],
  );
  return rows.map(toAction);
}

class PgTx implements EngineTx {
  private readonly run: Run;

  constructor(client: PoolClient) {
    this.run = async (text, params = []) => (await client.query(text, params)).rows;
  }

  lockUser(userId: string) {
    return selectUser(this.run, userId, true);
  }

  listActions(userId: string, day: string) {
    return selectActions(this.run, userId, day);
  }

  async insertActions(actions: Action[]) {
    for (const a of actions) {
      await this.run(
        `INSERT INTO actions (id, user_id, day_key, position, text, impact_weight, difficulty, non_negotiable, completed, completed_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)`,
        [a.id, a.userId, a.day, a.position, a.text, a.impactWeight, a.difficulty, a.nonNegotiable, a.completed, a.completedAt],
      );
    }
  }

  async setActionCompletion(actionId: string, completed: boolean, at: string) {
    await this.run("UPDATE actions SET completed = $1, completed_at = $2 WHERE id = $3", [completed, at, actionId]);
  }

  async upsertDailyResult(result: DailyResult) {
    const rows = await this.run<ResultRow>(
      `INSERT INTO daily_results (id, user_id, day_key, xp_delta, penalty, verdict_text, created_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7)
       ON CONFLICT (user_id, day_key) DO UPDATE SET
         xp_delta = EXCLUDED.xp_delta,
         penalty = EXCLUDED.penalty,
         verdict_text = EXCLUDED.verdict_text,
         created_at = EXCLUDED.created_at
       RETURNING *`,
      [result.id, result.userId, result.day, result.xpDelta, result.penalty, result.verdict, result.createdAt],
    );
    const row = rows[0];
    if (!row) throw new Error("Daily result upsert returned no row");
    return toResult(row);
  }

  async updateUserStats(userId: string, stats: UserStats) {
    await this.run("UPDATE users SET xp = $1, level = $2, streak = $3, debt = $4, difficulty = $5 WHERE id = $6", [
      stats.xp,
      stats.level,
      stats.streak,
      stats.debt,
      stats.difficulty,
      userId,
    ]);
  }
}

export type PgStoreOptions =
  | { databaseUrl: string; ssl: boolean }
  /** An already-built pool; the store takes ownership and ends it on close() */
  | { pool: Pool };

/**
 * Postgres-backed store.
 *
 * The pool is created by the constructor and released by close(), so its
 * lifetime follows the process rather than module import.
 */
export class PgStore implements EngineStore {
  private readonly pool: Pool;
  private readonly run: Run;

  constructor(opts: PgStoreOptions) {
    this.pool =
      "pool" in opts
        ? opts.pool
        : new pg.Pool({
            connectionString: opts.databaseUrl,
            ssl: opts.ssl ? { rejectUnauthorized: false } : undefined,
          });
    this.run = async (text, params = []) => (await this.pool.query(text, params)).rows;
  }

  /**
   * Creates tables and indexes if missing.
   * pg does not allow multiple commands in one prepared statement, so each runs alone.
   */
  async ensureSchema() {
    const statements = [
      `
      CREATE TABLE IF NOT EXISTS users (
        id TEXT PRIMARY KEY,
        created_at TEXT NOT NULL,
        goal_text TEXT NOT NULL,
        level INTEGER NOT NULL DEFAULT 1,
        xp INTEGER NOT NULL DEFAULT 0,
        streak INTEGER NOT NULL DEFAULT 0,
        debt INTEGER NOT NULL DEFAULT 0,
        difficulty INTEGER NOT NULL DEFAULT 1
      )`,
      `
      CREATE TABLE IF NOT EXISTS actions (
        id TEXT PRIMARY KEY,
        user_id TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        day_key TEXT NOT NULL,
        position INTEGER NOT NULL,
        text TEXT NOT NULL,
        impact_weight DOUBLE PRECISION NOT NULL,
        difficulty INTEGER NOT NULL,
        non_negotiable BOOLEAN NOT NULL DEFAULT TRUE,
        completed BOOLEAN,
        completed_at TEXT
      )`,
      `
      CREATE TABLE IF NOT EXISTS daily_results (
        id TEXT PRIMARY KEY,
        user_id TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        day_key TEXT NOT NULL,
        xp_delta INTEGER NOT NULL,
        penalty INTEGER NOT NULL,
        verdict_text TEXT NOT NULL,
        created_at TEXT NOT NULL,
        UNIQUE (user_id, day_key)
      )`,
      `CREATE INDEX IF NOT EXISTS idx_actions_user_day ON actions(user_id, day_key, position)`,
      `CREATE INDEX IF NOT EXISTS idx_results_user_day ON daily_results(user_id, day_key DESC)`,
    ];

    for (const s of statements) {
      await this.run(s.trim());
    }
  }

  getUser(userId: string) {
    return selectUser(this.run, userId, false);
  }

  async insertUser(user: User) {
    const rows = await this.run<{ id: string }>(
      `INSERT INTO users (id, created_at, goal_text, level, xp, streak, debt, difficulty)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
       ON CONFLICT (id) DO NOTHING
       RETURNING id`,
      [user.id, user.createdAt, user.goalText, user.level, user.xp, user.streak, user.debt, user.difficulty],
    );
    return rows.length > 0;
  }

  listActions(userId: string, day: string) {
    return selectActions(this.run, userId, day);
  }

  async listResults(userId: string, limit: number) {
    const rows = await this.run<ResultRow>(
      "SELECT * FROM daily_results WHERE user_id = $1 ORDER BY day_key DESC LIMIT $2",
      [userId, limit],
    );
    return rows.map(toResult);
  }

  async transaction<T>(fn: (tx: EngineTx) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      const out = await fn(new PgTx(client));
      await client.query("COMMIT");
      client.release();
      return out;
    } catch (err) {
      try {
        await client.query("ROLLBACK");
      } catch (rollbackErr) {
        console.error("❌ ROLLBACK failed:", rollbackErr);
        // a client that cannot roll back is destroyed instead of returned to the pool
        client.release(rollbackErr instanceof Error ? rollbackErr : true);
        throw err;
      }
      client.release();
      throw err;
    }
  }

  async close() {
    await this.pool.end();
  }
}
