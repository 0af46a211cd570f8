export type DayKey = string;

export type HabitRow = { date: DayKey; done: boolean[] };

export type HabitTable = { habits: string[]; rows: HabitRow[] };

export type StoreIssue = {
  kind:
    | "StoreUnreadable"
    | "StoreUnwritable"
    | "InvalidHabitName"
    | "MissingTodayRow"
    | "AmbiguousDateRow"
    | "UnknownHabit";
  message: string;
};

export type HabitSnapshot = {
  today: DayKey;
  columns: string[];
  table: HabitTable;
  todayRow: HabitRow | null;
  warnings: StoreIssue[];
};

export type SessionContext = {
  authenticated: true;
  issuedAt: string;
  expiresAt: string;
};

const TOKEN_KEY = "habits_token";

export function getToken() {
  try {
    return localStorage.getItem(TOKEN_KEY);
  } catch {
    return null;
  }
}

export function setToken(token: string | null) {
  try {
    if (!token) localStorage.removeItem(TOKEN_KEY);
    else localStorage.setItem(TOKEN_KEY, token);
  } catch {
    // storage unavailable (private mode); the session just won't survive a reload
  }
}

export class ApiError extends Error {
  readonly status: number;
  readonly data: unknown;

  constructor(message: string, status: number, data: unknown) {
    super(message);
    this.name = "ApiError";
    this.status = status;
    this.data = data;
  }
}

function messageFrom(data: unknown, status: number) {
  if (typeof data === "object" && data !== null && "error" in data) {
    const e = data.error;
    if (typeof e === "string" && e) return e;
    if (typeof e === "object" && e !== null && "message" in e && typeof e.message === "string") return e.message;
  }
  return `Request failed (${status})`;
}

async function request<T>(method: string, path: string, body?: unknown): Promise<T> {
  const token = getToken();

  const res = await fetch(path, {
    method,
    headers: {
      "Content-Type": "application/json",
      ...(token ? { Authorization: `Bearer ${token}` } : {}),
    },
    body: body !== undefined ? JSON.stringify(body) : undefined,
  });

  const text = await res.text();
  let data: unknown = null;
  try {
    data = text ? JSON.parse(text) : null;
  } catch {
    data = text;
  }

  if (!res.ok) throw new ApiError(messageFrom(data, res.status), res.status, data);

  return data as T;
}

export const api = {
  async login(password: string) {
    const r = await request<{ token: string; expiresAt: string }>("POST", "/api/auth/login", { password });
    setToken(r.token);
    return r;
  },

  async me() {
    return request<{ auth: SessionContext }>("GET", "/api/me");
  },

  async habits() {
    return request<HabitSnapshot>("GET", "/api/habits");
  },

  async addHabit(name: string) {
    return request<HabitSnapshot>("POST", "/api/habits", { name });
  },

  async setToday(habit: string, done: boolean) {
    return request<HabitSnapshot>("POST", "/api/habits/today", { habit, done });
  },

  /** Fetches the CSV with the session token (a plain link would lack the header). */
  async exportCsv() {
    const token = getToken();
    const res = await fetch("/api/export/habits.csv", {
      headers: token ? { Authorization: `Bearer ${token}` } : {},
    });
    if (!res.ok) throw new ApiError(`Export failed (${res.status})`, res.status, null);
    return res.text();
  },
};
