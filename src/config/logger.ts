import pino from "pino";
import { env } from "./env";

export const logger = pino({
  name: "decider-core",
  level: env.LOG_LEVEL,
});

export type { Logger } from "pino";
