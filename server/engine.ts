// server/engine.ts
// Request layer: reads state, calls the generator / judge, persists the outcome.

import { nanoid } from "nanoid";
import type { ActionGenerator } from "./actions.js";
import { BadRequestError, ConflictError, NotFoundError } from "./errors.js";
import { judgeDay } from "./judge.js";
import type { EngineStore, EngineTx } from "./storage.js";
import type { Action, DailyResult, DraftAction, User } from "./types.js";

export const HISTORY_LIMIT = 30;
export const PROMPT_HISTORY_DAYS = 7;

export type CreateUserInput = {
  userId: string;
  goalText: string;
};

export type ActionUpdate = {
  actionId: string;
  completed: boolean;
};

export type CheckInInput = {
  userId: string;
  updates: ActionUpdate[];
};

export type DayActions = {
  day: string;
  actions: Action[];
};

export type CheckInResult = {
  day: string;
  completed: number;
  missed: number;
  xpDelta: number;
  penalty: number;
  xp: number;
  level: number;
  streak: number;
  debt: number;
  difficulty: number;
  verdict: string;
  actions: Action[];
};

export type EngineDeps = {
  store: EngineStore;
  generator: ActionGenerator;
  /** Current calendar day as YYYY-MM-DD */
  today?: () => string;
  /** Current instant as an ISO timestamp */
  now?: () => string;
};

function nowIso() {
  return new Date().toISOString();
}

function todayKey() {
  return nowIso().slice(0, 10);
}

/** One line the model can read, e.g. "2026-01-02: xp_delta=85, penalty=15; ..." */
export function summarizeHistory(results: DailyResult[]) {
  return results.map((r) => `${r.day}: xp_delta=${r.xpDelta}, penalty=${r.penalty}`).join("; ");
}

export function tallyActions(actions: Action[]) {
  let completed = 0;
  let missed = 0;
  let impactsSum = 0;
  for (const a of actions) {
    if (a.completed === true) {
      completed += 1;
      impactsSum += a.impactWeight;
    } else if (a.completed === false) {
      missed += 1;
    }
  }
  return { completed, missed, impactsSum };
}

export class ExecutionEngine {
  private readonly store: EngineStore;
  private readonly generator: ActionGenerator;
  private readonly today: () => string;
  private readonly now: () => string;

  constructor(deps: EngineDeps) {
    this.store = deps.store;
    this.generator = deps.generator;
    this.today = deps.today ?? todayKey;
    this.now = deps.now ?? nowIso;
  }

  async createUser(input: CreateUserInput): Promise<User> {
    const user: User = {
      id: input.userId,
      createdAt: this.now(),
      goalText: input.goalText.trim(),
      level: 1,
      xp: 0,
      streak: 0,
      debt: 0,
      difficulty: 1,
    };

    const inserted = await this.store.insertUser(user);
    if (!inserted) throw new ConflictError();
    return user;
  }

  async getUser(userId: string): Promise<User> {
    const user = await this.store.getUser(userId);
    if (!user) throw new NotFoundError();
    return user;
  }

  async todayActions(userId: string): Promise<DayActions> {
    await this.getUser(userId);
    const day = this.today();
    return { day, actions: await this.store.listActions(userId, day) };
  }

  /**
   * Generates the day's batch once. Later calls on the same day return it unchanged.
   * The generator runs outside the transaction; the insert re-checks under the user lock.
   */
  async generateToday(userId: string): Promise<DayActions> {
    const user = await this.getUser(userId);
    const day = this.today();

    const existing = await this.store.listActions(userId, day);
    if (existing.length > 0) return { day, actions: existing };

    const recent = await this.store.listResults(userId, PROMPT_HISTORY_DAYS);
    const generated = await this.generator.generate(user.goalText, user.difficulty, summarizeHistory(recent));

    const actions = await this.store.transaction(async (tx) => {
      const locked = await tx.lockUser(userId);
      if (!locked) throw new NotFoundError();

      const raced = await tx.listActions(userId, day);
      if (raced.length > 0) return raced;

      const rows = generated.actions.map((a, i) => this.toAction(userId, day, i, a));
      await tx.insertActions(rows);
      return tx.listActions(userId, day);
    });

    return { day, actions };
  }

  async checkIn(input: CheckInInput): Promise<CheckInResult> {
    const day = this.today();
    return this.store.transaction((tx) => this.judgeToday(tx, input, day));
  }

  async history(userId: string): Promise<DailyResult[]> {
    await this.getUser(userId);
    return this.store.listResults(userId, HISTORY_LIMIT);
  }

  private toAction(userId: string, day: string, position: number, a: DraftAction): Action {
    return {
      id: nanoid(),
      userId,
      day,
      position,
      text: a.text,
      impactWeight: a.impactWeight,
      difficulty: a.difficulty,
      nonNegotiable: a.nonNegotiable,
      completed: null,
      completedAt: null,
    };
  }

  private async judgeToday(tx: EngineTx, input: CheckInInput, day: string): Promise<CheckInResult> {
    const user = await tx.lockUser(input.userId);
    if (!user) throw new NotFoundError();

    const actions = await tx.listActions(input.userId, day);
    if (actions.length === 0) {
      throw new BadRequestError("No actions for today. Generate today's actions first.");
    }

    // unknown ids are ignored; a repeated id keeps its last value
    const known = new Set(actions.map((a) => a.id));
    const latest = new Map<string, boolean>();
    for (const u of input.updates) {
      if (known.has(u.actionId)) latest.set(u.actionId, u.completed);
    }

    const at = this.now();
    for (const [actionId, completed] of latest) {
      await tx.setActionCompletion(actionId, completed, at);
    }

    const updated = await tx.listActions(input.userId, day);
    const { completed, missed, impactsSum } = tallyActions(updated);

    const j = judgeDay({
      currentXp: user.xp,
      currentStreak: user.streak,
      currentDebt: user.debt,
      currentDifficulty: user.difficulty,
      completed,
      missed,
      impactsSum,
    });

    await tx.upsertDailyResult({
      id: nanoid(),
      userId: user.id,
      day,
      xpDelta: j.xpDelta,
      penalty: j.penalty,
      verdict: j.verdict,
      createdAt: at,
    });

    await tx.updateUserStats(user.id, {
      xp: j.newXp,
      level: j.newLevel,
      streak: j.newStreak,
      debt: j.newDebt,
      difficulty: j.newDifficulty,
    });

    return {
      day,
      completed,
      missed,
      xpDelta: j.xpDelta,
      penalty: j.penalty,
      xp: j.newXp,
      level: j.newLevel,
      streak: j.newStreak,
      debt: j.newDebt,
      difficulty: j.newDifficulty,
      verdict: j.verdict,
      actions: updated,
    };
  }
}
