import App from "./app";
import { loadDefaultSeed } from "./helpers/seed.helper";
import { ActivityRegistry } from "./services/activity.service";

const registry = new ActivityRegistry(loadDefaultSeed());
const app = new App(registry);

async function start(): Promise<void> {
  const activityCount = Object.keys(registry.list()).length;
  console.log(`[INFO] Loaded ${activityCount} activities`);
  await app.listen();
}

async function shutdown(signal: string): Promise<void> {
  console.log(`[INFO] ${signal} received, shutting down gracefully`);
  try {
    await app.close();
    process.exit(0);
  } catch (error) {
    console.error("[ERROR] Shutdown failed:", error);
    process.exit(1);
  }
}

process.on("SIGTERM", () => void shutdown("SIGTERM"));
process.on("SIGINT", () => void shutdown("SIGINT"));

start().catch((error: unknown) => {
  console.error("[ERROR] Failed to start server:", error);
  process.exit(1);
});
