import { loadEnv, toAppConfig } from "./config/env";
import { createPool } from "./db/connection";
import { runMigrations } from "./db/migrate";
import { PgTelemetryStore } from "./db/pg-telemetry-store";
import { MqttRetainedPublisher } from "./services/mqtt-publisher";
import { buildApp } from "./app";

const env = loadEnv();
const pool = createPool(env);

async function start() {
  await runMigrations(pool);

  const store = new PgTelemetryStore(pool);
  const publisher = MqttRetainedPublisher.fromEnv(env);

  const app = buildApp({ config: toAppConfig(env), store, publisher });
  publisher.useLogger(app.log);
  app.addHook("onClose", async () => {
    await pool.end();
  });

  await app.listen({
    host: "0.0.0.0",
    port: env.PORT
  });
}

start().catch((error) => {
  // eslint-disable-next-line no-console
  console.error(error);
  pool
    .end()
    .catch(() => undefined)
    .finally(() => {
      process.exit(1);
    });
});
