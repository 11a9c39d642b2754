export type User = {
  id: string;
  createdAt: string;
  goalText: string;
  level: number; // 1-10
  xp: number;
  streak: number;
  debt: number; // never decreases
  difficulty: number; // 1-5
};

export type UserStats = Pick<User, "xp" | "level" | "streak" | "debt" | "difficulty">;

export type Action = {
  id: string;
  userId: string;
  day: string; // YYYY-MM-DD
  position: number;
  text: string;
  impactWeight: number; // 0.5-1.5
  difficulty: number; // 1-3
  nonNegotiable: boolean;
  completed: boolean | null; // null = not decided yet
  completedAt: string | null;
};

/** Action as produced by the generator, before it is tied to a user/day */
export type DraftAction = {
  text: string;
  impactWeight: number;
  difficulty: number;
  nonNegotiable: true;
};

export type DailyResult = {
  id: string;
  userId: string;
  day: string;
  xpDelta: number;
  penalty: number;
  verdict: string;
  createdAt: string;
};
