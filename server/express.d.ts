import type { SessionContext } from "./types.js";

declare global {
  namespace Express {
    interface Request {
      auth?: SessionContext;
    }
  }
}

export {};
