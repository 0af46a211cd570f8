import express from "express";
import cors from "cors";
import helmet from "helmet";
import morgan from "morgan";
import rateLimit from "express-rate-limit";
import path from "node:path";
import fs from "node:fs";
import { fileURLToPath } from "node:url";
import { registerRoutes } from "./routes.js";
import type { AppConfig } from "./config.js";
import type { HabitService } from "./habits.js";
import type { PasswordGate } from "./auth.js";

export type AppDeps = {
  config: Pick<AppConfig, "allowedOrigins">;
  habits: HabitService;
  gate: PasswordGate;
  logRequests?: boolean;
  serveClient?: boolean;
};

function corsOriginCheck(allowed: Set<string>) {
  return (origin: string | undefined, cb: (err: Error | null, ok?: boolean) => void) => {
    // same-origin / curl (no Origin header)
    if (!origin) return cb(null, true);
    if (allowed.has(origin)) return cb(null, true);
    return cb(new Error("CORS blocked: origin not allowed"));
  };
}

export function createApp(deps: AppDeps) {
  const app = express();

  app.set("trust proxy", 1);
  app.disable("x-powered-by");

  app.use(
    cors({
      origin: corsOriginCheck(new Set(deps.config.allowedOrigins)),
      credentials: true,
      methods: ["GET", "POST", "OPTIONS"],
      allowedHeaders: ["Content-Type", "Authorization"],
    }),
  );

  app.use(
    helmet({
      crossOriginResourcePolicy: { policy: "same-site" },
    }),
  );

  app.use(express.json({ limit: "100kb" }));
  if (deps.logRequests ?? true) app.use(morgan("dev"));

  app.use(
    rateLimit({
      windowMs: 15 * 60 * 1000,
      max: 300,
      standardHeaders: true,
      legacyHeaders: false,
    }),
  );

  // brute-force protection for the password form
  app.use(
    "/api/auth/login",
    rateLimit({
      windowMs: 15 * 60 * 1000,
      max: 30,
      standardHeaders: true,
      legacyHeaders: false,
      message: { error: "Too many login attempts. Try again later." },
    }),
  );

  registerRoutes(app, { habits: deps.habits, gate: deps.gate });

  if (deps.serveClient ?? true) serveClient(app);

  return app;
}

// --- Serve built frontend (Vite output) ---
function serveClient(app: express.Express) {
  const here = path.dirname(fileURLToPath(import.meta.url));
  const distCandidates = [path.resolve(here, "../dist"), path.resolve(process.cwd(), "dist")];
  const distPath = distCandidates.find((p) => fs.existsSync(path.join(p, "index.html")));

  if (distPath) {
    app.use(express.static(distPath));
    app.get("*", (_req, res) => res.sendFile(path.join(distPath, "index.html")));
  } else {
    app.get("/", (_req, res) => {
      res.status(200).send("API is running. Frontend build not found. Looked in: " + distCandidates.join(", "));
    });
  }
}
