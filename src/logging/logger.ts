/**
 * Logging — winston root logger plus per-subsystem children.
 */

import winston from "winston";
import type { PluginLogger } from "../plugin-sdk/index.js";

export type LogLevel = "error" | "warn" | "info" | "debug";
export type LogFormat = "pretty" | "json";

export type LoggingOptions = {
  level?: LogLevel;
  format?: LogFormat;
  silent?: boolean;
};

let root: winston.Logger | null = null;

const prettyFormat = winston.format.printf((info) => {
  const subsystem = typeof info.subsystem === "string" ? `[${info.subsystem}] ` : "";
  return `${String(info.timestamp)} ${info.level.padEnd(5)} ${subsystem}${String(info.message)}`;
});

/** (Re)configure the root logger. Logs go to stderr so stdout stays machine-readable. */
export function configureLogging(options: LoggingOptions = {}): winston.Logger {
  const format = options.format ?? "pretty";
  root = winston.createLogger({
    level: options.level ?? "info",
    silent: options.silent ?? process.env.NODE_ENV === "test",
    format: winston.format.combine(
      winston.format.timestamp(),
      format === "json" ? winston.format.json() : prettyFormat,
    ),
    transports: [
      new winston.transports.Console({
        stderrLevels: ["error", "warn", "info", "debug"],
      }),
    ],
  });
  return root;
}

export function getRootLogger(): winston.Logger {
  return root ?? configureLogging();
}

/** Logger scoped to one subsystem, shaped like the plugin logger. */
export function createSubsystemLogger(subsystem: string): PluginLogger {
  const child = getRootLogger().child({ subsystem });
  return {
    debug: (msg) => child.debug(msg),
    info: (msg) => child.info(msg),
    warn: (msg) => child.warn(msg),
    error: (msg) => child.error(msg),
  };
}
