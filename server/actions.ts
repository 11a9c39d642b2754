// Daily action generation.
// - offlineActions(): keyword heuristic, always available
// - requestModelActions(): one model call, returns a Result instead of throwing
// - ActionGenerator: model first (when configured), offline on any failure

import { z } from "zod";
import { APIConnectionTimeoutError, APIError } from "openai";
import type { ActionModel } from "./actionModel.js";
import type { DraftAction } from "./types.js";
import { clamp } from "./judge.js";

export const MIN_ACTIONS = 3;
export const MAX_ACTIONS = 5;
export const MAX_ACTION_TEXT = 300;

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export type GenerationFailureKind = "timeout" | "transport" | "malformed";

export type GenerationFailure = {
  kind: GenerationFailureKind;
  message: string;
};

export type GeneratedActions = {
  actions: DraftAction[];
  source: "model" | "offline";
  failure: GenerationFailure | null;
};

/** Action difficulty lives in 1..3 even though user difficulty goes to 5 */
function actionDifficulty(d: number) {
  return clamp(Math.round(d), 1, 3);
}

function draft(text: string, impactWeight: number, difficulty: number): DraftAction {
  return { text, impactWeight, difficulty: actionDifficulty(difficulty), nonNegotiable: true };
}

const SALES_KEYWORDS = ["mrr", "sales", "customers", "customer", "revenue", "sell", "pipeline"];
const PRODUCT_KEYWORDS = ["product", "mvp", "app", "build", "launch", "ship"];

export function offlineActions(goalText: string, difficulty: number): DraftAction[] {
  const lower = goalText.trim().toLowerCase();
  const harder = difficulty + 1;
  let actions: DraftAction[];

  if (SALES_KEYWORDS.some((k) => lower.includes(k))) {
    actions = [
      draft("Contact 10 prospects (DM/email) with ONE offer. Log replies.", 1.4, harder),
      draft("Improve the offer (headline + price + guarantee). Publish it.", 1.2, difficulty),
      draft("Book 1 short sales call (15 min). No research-avoidance.", 1.5, harder),
      draft("Ask for money: send 1 invoice/checkout link or request a deposit.", 1.5, 3),
    ];
  } else if (PRODUCT_KEYWORDS.some((k) => lower.includes(k))) {
    actions = [
      draft("Set a deadline: ship 1 concrete feature today. No side quests.", 1.3, difficulty),
      draft("Cut 1 feature you 'want' but don't need. Commit the change.", 1.2, difficulty),
      draft("Post a public update (X/LinkedIn) showing what you shipped.", 1.1, difficulty),
      draft("Get 3 people to test and give feedback. Collect responses.", 1.4, harder),
    ];
  } else {
    actions = [
      draft("Write today's 3 deliverables in 1 sentence each. No fluff.", 1.0, difficulty),
      draft("Do the most uncomfortable task first. 45-minute timer. No distractions.", 1.4, harder),
      draft("Remove 1 blocker by contacting a human (not Googling).", 1.3, harder),
      draft("Ship something visible: post/commit/demo. Proof > intention.", 1.2, difficulty),
    ];
  }

  actions = actions.slice(0, MAX_ACTIONS);
  if (actions.length < MIN_ACTIONS) {
    actions.push(draft("Ship a result you can show publicly.", 1.2, difficulty));
  }
  return actions;
}

export function buildPrompt(goalText: string, difficulty: number, history: string) {
  return `You are a ruthless operating manager. Generate ${MIN_ACTIONS}-${MAX_ACTIONS} DAILY, NON-NEGOTIABLE actions for a founder.

Rules:
- No administrative tasks.
- At least 1 action must be uncomfortable (contacting people, publishing, committing, asking for money).
- Actions must directly drive the goal.
- Return ONLY a JSON array of objects:
  { "text": "...", "impact_weight": 0.5-1.5, "difficulty": 1-3, "non_negotiable": true }

GOAL: ${goalText}
DIFFICULTY (1-5): ${difficulty}
HISTORY (brief): ${history}`;
}

const ModelActionsSchema = z.array(
  z.object({
    text: z.string(),
    // models sometimes quote numbers; anything unreadable takes the default
    impact_weight: z.coerce.number().catch(1.0),
    difficulty: z.coerce.number().catch(2),
  }),
);

function malformed(message: string): Result<DraftAction[], GenerationFailure> {
  return { ok: false, error: { kind: "malformed", message } };
}

/** Pull the JSON array out of a model reply and clean it into draft actions */
export function parseModelActions(text: string): Result<DraftAction[], GenerationFailure> {
  const m = text.match(/\[[\s\S]*\]/);
  if (!m) return malformed("No JSON array in model reply");

  let raw: unknown;
  try {
    raw = JSON.parse(m[0]);
  } catch (err) {
    return malformed(err instanceof Error ? err.message : "Invalid JSON");
  }

  const parsed = ModelActionsSchema.safeParse(raw);
  if (!parsed.success) return malformed("Model actions did not match the expected shape");

  const cleaned = parsed.data
    .map((a) => ({ ...a, text: a.text.trim().slice(0, MAX_ACTION_TEXT) }))
    .filter((a) => a.text.length > 0)
    .slice(0, MAX_ACTIONS)
    .map((a) => draft(a.text, clamp(a.impact_weight, 0.5, 1.5), a.difficulty));

  if (cleaned.length < MIN_ACTIONS) return malformed(`Only ${cleaned.length} usable actions`);
  return { ok: true, value: cleaned };
}

/** Maps model client errors to a failure kind; anything else is a bug and is rethrown */
export function classifyFailure(err: unknown): GenerationFailure {
  if (err instanceof APIConnectionTimeoutError) return { kind: "timeout", message: err.message };
  // APIConnectionError and the HTTP status errors all extend APIError
  if (err instanceof APIError) return { kind: "transport", message: err.message };
  throw err;
}

export async function requestModelActions(
  model: ActionModel,
  prompt: string,
): Promise<Result<DraftAction[], GenerationFailure>> {
  let text: string;
  try {
    text = await model.complete(prompt);
  } catch (err) {
    return { ok: false, error: classifyFailure(err) };
  }
  return parseModelActions(text);
}

export class ActionGenerator {
  constructor(private readonly model: ActionModel | null = null) {}

  get usesModel() {
    return this.model !== null;
  }

  async generate(goalText: string, difficulty: number, history = ""): Promise<GeneratedActions> {
    if (!this.model) {
      return { actions: offlineActions(goalText, difficulty), source: "offline", failure: null };
    }

    const res = await requestModelActions(this.model, buildPrompt(goalText, difficulty, history));
    if (res.ok) return { actions: res.value, source: "model", failure: null };

    console.warn(`⚠️ ${this.model.name} actions unavailable (${res.error.kind}): ${res.error.message}`);
    return { actions: offlineActions(goalText, difficulty), source: "offline", failure: res.error };
  }
}
