import { Pool, PoolConfig } from "pg";
import type { Logger } from "pino";
import { env } from "../../config/env";
import { InMemoryEventStore } from "./__mocks__/inMemoryEventStore";
import { PgEventStore } from "./pgEventStore";

export type ConfiguredStore =
  | { kind: "pg"; store: PgEventStore; close: () => Promise<void> }
  | { kind: "inmem"; store: InMemoryEventStore; close?: undefined };

export function createEventStoreFromEnv(log?: Logger): ConfiguredStore {
  const storeType = env.EVENT_STORE;

  if (storeType === "pg") {
    const pool = new Pool(getPgConfigFromEnv());
    pool.on("error", (err) => {
      log?.error({ err }, "idle pg client error");
    });
    return {
      kind: "pg",
      store: new PgEventStore(pool, log?.child({ component: "pg-event-store" })),
      close: () => pool.end(),
    };
  }

  if (storeType !== "inmem") {
    throw new Error(`Invalid EVENT_STORE: "${storeType}" (expected "pg" or "inmem")`);
  }

  return { kind: "inmem", store: new InMemoryEventStore() };
}

export function getPgConfigFromEnv(): PoolConfig {
  if (env.DATABASE_URL) {
    return {
      connectionString: env.DATABASE_URL,
      max: 10,
    };
  }

  const requiredKeys = ["PGHOST", "PGPORT", "PGUSER", "PGPASSWORD", "PGDATABASE"] as const;
  const missing = requiredKeys.filter((key) => !process.env[key]);
  if (missing.length > 0) {
    throw new Error(
      `Missing Postgres env vars for EVENT_STORE=pg. Missing: ${missing.join(", ")}`
    );
  }

  const rawHost = process.env.PGHOST ?? "";
  const host = rawHost === "localhost" ? "127.0.0.1" : rawHost;
  const port = Number(process.env.PGPORT);
  if (!Number.isFinite(port)) {
    throw new Error(`Invalid PGPORT: "${process.env.PGPORT}"`);
  }

  return {
    host,
    port,
    user: process.env.PGUSER,
    password: process.env.PGPASSWORD,
    database: process.env.PGDATABASE,
    max: 10,
  };
}
