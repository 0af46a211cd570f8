export const DATE_COLUMN = "Date";

export type DayKey = string; // YYYY-MM-DD

export type HabitRow = {
  date: DayKey;
  done: boolean[]; // parallel to HabitTable.habits
};

export type HabitTable = {
  habits: string[];
  rows: HabitRow[];
};

export type InvalidHabitReason = "empty" | "reserved" | "duplicate";

export type StoreIssue =
  | { kind: "StoreUnreadable"; message: string }
  | { kind: "StoreUnwritable"; message: string }
  | { kind: "InvalidHabitName"; reason: InvalidHabitReason; message: string }
  | { kind: "MissingTodayRow"; date: DayKey; message: string }
  | { kind: "AmbiguousDateRow"; date: DayKey; message: string }
  | { kind: "UnknownHabit"; habit: string; message: string };

export type Outcome<T> = { ok: true; value: T } | { ok: false; issue: StoreIssue };

export type SessionContext = {
  authenticated: true;
  issuedAt: string; // ISO timestamp
  expiresAt: string; // ISO timestamp
};
