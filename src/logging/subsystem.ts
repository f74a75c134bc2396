/**
 * Subsystem loggers.
 *
 * Diagnostics go to stderr as JSON lines (pino) so they never interleave with the
 * progress narrative on stdout. Level comes from RESCAFFOLD_LOG_LEVEL (default "warn").
 */

import { pino, destination, type Logger } from "pino";

export type LogMeta = Record<string, unknown>;

export type SubsystemLogger = {
  debug: (message: string, meta?: LogMeta) => void;
  info: (message: string, meta?: LogMeta) => void;
  warn: (message: string, meta?: LogMeta) => void;
  error: (message: string, meta?: LogMeta) => void;
  child: (name: string) => SubsystemLogger;
};

const LOG_LEVEL_ENV = "RESCAFFOLD_LOG_LEVEL";
const LEVELS = new Set(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): string {
  const raw = env[LOG_LEVEL_ENV]?.trim().toLowerCase();
  return raw && LEVELS.has(raw) ? raw : "warn";
}

let rootLogger: Logger | null = null;

function getRootLogger(): Logger {
  if (!rootLogger) {
    rootLogger = pino(
      { name: "rescaffold", level: resolveLogLevel(), base: undefined },
      destination({ dest: 2, sync: true }),
    );
  }
  return rootLogger;
}

function wrap(logger: Logger, subsystem: string): SubsystemLogger {
  const emit =
    (level: "debug" | "info" | "warn" | "error") => (message: string, meta?: LogMeta) => {
      if (meta) {
        logger[level](meta, message);
      } else {
        logger[level](message);
      }
    };

  return {
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
    child: (name) => {
      const next = `${subsystem}/${name}`;
      return wrap(logger.child({ subsystem: next }), next);
    },
  };
}

export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  return wrap(getRootLogger().child({ subsystem }), subsystem);
}
