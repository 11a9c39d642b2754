// Day judging: completion counts + current user state -> new state + verdict.
// Pure and deterministic; the same inputs always give the same transition.

export type JudgeInput = {
  currentXp: number;
  currentStreak: number;
  currentDebt: number;
  currentDifficulty: number;
  completed: number;
  missed: number;
  impactsSum: number; // completed actions only
};

export type VerdictKind = "zero_execution" | "raise_the_bar" | "clean" | "avoidance" | "bailed";

export type Judgement = {
  xpDelta: number;
  penalty: number;
  streakBonus: number;
  newXp: number;
  newLevel: number;
  newStreak: number;
  newDebt: number;
  newDifficulty: number;
  verdictKind: VerdictKind;
  verdict: string;
};

export const VERDICTS: Record<VerdictKind, string> = {
  zero_execution: "You executed nothing. That's self-deception. Penalty applied.",
  raise_the_bar: "You executed hard. Keep going. Next level demands more.",
  clean: "You did the work. No excuses. No detours.",
  avoidance: "You avoided the main goal. You pay now and later. Fix it.",
  bailed: "You did something \u2014 then you bailed on the rest. Not enough.",
};

export const XP_PER_LEVEL = 250;
export const MAX_LEVEL = 10;
export const MIN_DIFFICULTY = 1;
export const MAX_DIFFICULTY = 5;

export function clamp(n: number, a: number, b: number) {
  return Math.max(a, Math.min(b, n));
}

/** Halves go to the even neighbour (2.5 -> 2, 3.5 -> 4). */
export function roundHalfEven(n: number) {
  const floor = Math.floor(n);
  const diff = n - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

export function levelFromXp(xp: number) {
  return clamp(1 + Math.floor(xp / XP_PER_LEVEL), 1, MAX_LEVEL);
}

function nextDifficulty(current: number, missed: number, completed: number, newStreak: number) {
  // only one step per day, first match wins
  let diff = current;
  if (missed >= 2) diff += 1;
  else if (newStreak >= 5) diff += 1;
  else if (missed === 0 && completed >= 4) diff += 1;
  return clamp(diff, MIN_DIFFICULTY, MAX_DIFFICULTY);
}

function pickVerdict(completed: number, missed: number): VerdictKind {
  if (completed === 0 && missed > 0) return "zero_execution";
  if (missed === 0 && completed >= 4) return "raise_the_bar";
  if (missed === 0 && completed > 0) return "clean";
  if (missed >= 2) return "avoidance";
  return "bailed";
}

export function judgeDay(input: JudgeInput): Judgement {
  const { currentXp, currentStreak, currentDebt, currentDifficulty, completed, missed, impactsSum } = input;

  const baseXp = roundHalfEven(20 * completed + 10 * impactsSum + 5 * currentDifficulty);
  const penalty = 15 * missed;

  const newStreak = missed === 0 && completed > 0 ? currentStreak + 1 : 0;
  const streakBonus = newStreak >= 3 ? 5 : 0;

  const xpDelta = baseXp + streakBonus - penalty;
  const newXp = Math.max(0, currentXp + xpDelta);
  const newDebt = currentDebt + missed;

  const verdictKind = pickVerdict(completed, missed);

  return {
    xpDelta,
    penalty,
    streakBonus,
    newXp,
    newLevel: levelFromXp(newXp),
    newStreak,
    newDebt,
    newDifficulty: nextDifficulty(currentDifficulty, missed, completed, newStreak),
    verdictKind,
    verdict: VERDICTS[verdictKind],
  };
}
