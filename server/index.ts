import dotenv from "dotenv";
import { loadConfig } from "./config.js";
import { createApp } from "./app.js";
import { createPasswordGate } from "./auth.js";
import { HabitStore } from "./habitStore.js";
import { HabitService } from "./habits.js";

dotenv.config();

async function main() {
  // throws without HABIT_TRACKER_PASSWORD: refuse to start
  const config = loadConfig();

  const store = new HabitStore(config.habitsFile);
  const habits = new HabitService(store);
  const gate = createPasswordGate(config);

  const app = createApp({ config, habits, gate });

  app.listen(config.port, "0.0.0.0", () => {
    console.log(`✅ Server listening on port ${config.port}`);
    console.log(`✅ Habits file: ${store.path}`);
    console.log(`✅ Allowed origins: ${config.allowedOrigins.join(", ")}`);
  });
}

main().catch((err) => {
  console.error("❌ Fatal startup error:", err);
  process.exit(1);
});
