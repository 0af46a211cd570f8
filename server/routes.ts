import type { Express, Request, Response, NextFunction } from "express";
import { z } from "zod";
import type { StoreIssue } from "./types.js";
import type { HabitService, HabitSnapshot, MutationResult } from "./habits.js";
import { requireAuth } from "./auth.js";
import type { PasswordGate } from "./auth.js";
import { columnsOf } from "./habitTable.js";

/** Async route wrapper */
function wrap(fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

const LoginSchema = z.object({
  password: z.string().min(1).max(1024),
});

const AddHabitSchema = z.object({
  name: z.string().max(80),
});

const SetTodaySchema = z.object({
  habit: z.string().min(1).max(80),
  done: z.boolean(),
});

function present(s: HabitSnapshot) {
  return {
    today: s.today,
    columns: columnsOf(s.table),
    table: s.table,
    todayRow: s.todayRow,
    warnings: s.warnings,
  };
}

function statusFor(issue: StoreIssue) {
  switch (issue.kind) {
    case "InvalidHabitName":
      return issue.reason === "duplicate" ? 409 : 400;
    case "UnknownHabit":
      return 404;
    case "MissingTodayRow":
    case "AmbiguousDateRow":
      return 409;
    default:
      return 500;
  }
}

function sendMutation(res: Response, result: MutationResult) {
  if (!result.ok) {
    return res
      .status(statusFor(result.issue))
      .json({ error: result.issue.message, issue: result.issue, snapshot: present(result.snapshot) });
  }
  return res.json(present(result.snapshot));
}

function statusOf(err: unknown) {
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
    return err.status;
  }
  return 500;
}

export function registerRoutes(app: Express, deps: { habits: HabitService; gate: PasswordGate }) {
  const { habits, gate } = deps;
  const auth = requireAuth(gate);

  app.get("/api/health", (_req, res) => res.json({ ok: true }));

  // -----------------------------
  // Auth
  // -----------------------------
  app.post("/api/auth/login", (req, res) => {
    const parsed = LoginSchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ error: parsed.error.flatten() });

    if (!gate.checkPassword(parsed.data.password)) {
      return res.status(401).json({ error: "Password incorrect" });
    }
    return res.json(gate.issueToken());
  });

  app.get("/api/me", auth, (req, res) => res.json({ auth: req.auth }));

  // -----------------------------
  // Habits
  // -----------------------------
  app.get(
    "/api/habits",
    auth,
    wrap(async (_req, res) => res.json(present(await habits.snapshot()))),
  );

  app.post(
    "/api/habits",
    auth,
    wrap(async (req, res) => {
      const parsed = AddHabitSchema.safeParse(req.body);
      if (!parsed.success) return res.status(400).json({ error: parsed.error.flatten() });

      return sendMutation(res, await habits.addHabit(parsed.data.name));
    }),
  );

  app.post(
    "/api/habits/today",
    auth,
    wrap(async (req, res) => {
      const parsed = SetTodaySchema.safeParse(req.body);
      if (!parsed.success) return res.status(400).json({ error: parsed.error.flatten() });

      return sendMutation(res, await habits.setToday(parsed.data.habit, parsed.data.done));
    }),
  );

  // -----------------------------
  // Export
  // -----------------------------
  app.get(
    "/api/export/habits.csv",
    auth,
    wrap(async (_req, res) => {
      const csv = await habits.exportCsv();
      res.setHeader("Content-Type", "text/csv; charset=utf-8");
      res.setHeader("Content-Disposition", 'attachment; filename="habits.csv"');
      return res.send(csv);
    }),
  );

  // -----------------------------
  // Error handler
  // -----------------------------
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    console.error("API error:", err);
    const status = statusOf(err);
    const msg = err instanceof Error ? err.message : "Server error";
    return res.status(status).json({ error: msg });
  });
}
