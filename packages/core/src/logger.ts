/**
 * @concentra/core — Logger factory.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { CoreConfig } from "./config.js";

export type { Logger };

export function createLogger(config: Pick<CoreConfig, "LOG_LEVEL" | "LOG_PRETTY">): Logger {
  return pino({
    name: "concentra",
    level: config.LOG_LEVEL,
    ...(config.LOG_PRETTY ? { transport: { target: "pino-pretty" } } : {}),
  });
}
