import App from "../src/app";
import { loadDefaultSeed } from "../src/helpers/seed.helper";
import { ActivityRegistry } from "../src/services/activity.service";

export interface TestServer {
  app: App;
  registry: ActivityRegistry;
  baseUrl: string;
}

/** Starts the app on an ephemeral local port with a fresh seeded registry. */
export async function startTestServer(): Promise<TestServer> {
  const registry = new ActivityRegistry(loadDefaultSeed());
  const app = new App(registry);
  const address = await app.listen(0);
  return { app, registry, baseUrl: `http://127.0.0.1:${address.port}` };
}
