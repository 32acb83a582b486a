import { createApp } from "./app.js";
import { getEnv, loadEnvLocal, type Env } from "./config.js";

loadEnvLocal();
const env: Env = getEnv();
const app = createApp(env);

try {
  await app.listen({ port: env.PORT, host: env.HOST });
  app.log.info({ storeDriver: env.STORE_DRIVER, authMode: env.AUTH_MODE }, "api started");
} catch (err) {
  app.log.error({ err }, "failed to start");
  process.exit(1);
}
