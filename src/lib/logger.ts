import pino, { type Logger } from "pino";

import type { AppConfig } from "./config";

export type { Logger };

export function createLogger(config: Pick<AppConfig, "appName" | "appVersion" | "environment" | "logLevel">): Logger {
  return pino({
    name: config.appName,
    level: config.logLevel,
    base: { version: config.appVersion, env: config.environment },
  });
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
