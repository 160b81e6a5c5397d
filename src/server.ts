import "dotenv/config";
import Fastify from "fastify";
import { env, getMaskedDatabaseLogInfo } from "./config/env";
import { logger } from "./config/logger";
import { createEventStoreFromEnv } from "./es/db/storeFactory";
import { restaurantRoutes } from "./restaurant/http/routes";
import { createRestaurantService } from "./restaurant/service/createRestaurantService";

export async function buildServer() {
  const app = Fastify({ logger: { level: env.LOG_LEVEL, name: "decider-core" } });

  app.get("/health", async () => ({ ok: true }));

  const configured = createEventStoreFromEnv(logger);
  if (configured.kind === "pg" && env.DATABASE_URL) {
    const dbInfo = getMaskedDatabaseLogInfo(env.DATABASE_URL);
    app.log.info(
      `event store: pg connectionString=${dbInfo.connectionString} (db=${dbInfo.db} host=${dbInfo.host} port=${dbInfo.port} user=${dbInfo.user})`
    );
  } else {
    app.log.info(`event store: ${configured.kind}`);
  }

  // branch per kind so each call infers its own transaction type
  const service =
    configured.kind === "pg"
      ? createRestaurantService(configured.store, { log: logger })
      : createRestaurantService(configured.store, { log: logger });

  await app.register(restaurantRoutes, { service });

  if (configured.close) {
    const close = configured.close;
    app.addHook("onClose", async () => {
      await close();
    });
  }

  return app;
}

async function main() {
  const app = await buildServer();
  const port = env.PORT;

  await app.listen({ port, host: "127.0.0.1" });
  app.log.info(`listening on http://127.0.0.1:${port}`);
}

if (require.main === module) {
  main().catch((err) => {
    logger.fatal({ err }, "startup failed");
    process.exit(1);
  });
}
