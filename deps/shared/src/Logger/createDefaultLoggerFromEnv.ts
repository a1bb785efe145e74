import { Type as t } from "@sinclair/typebox";

import { buildConfigFactoryEnv } from "../ConfigFactory";
import { type LogLevel, logLevels } from "./Logger";
import { LoggerConsole } from "./LoggerConsole";
import { RfsTransport } from "./RfsTransport";

export const defaultEmojiMap: Record<string, string> = {
  start: "🏁",
  done: "✅",
  trace: "🔍",
  debug: "🐛",
  info: "ℹ️",
  warn: "⚠️",
  error: "❌",
};

const getLoggerConfig = buildConfigFactoryEnv(
  t.Object({
    LOG_LEVEL: t.Union(
      logLevels.map((level) => t.Literal(level)),
      { default: "info" }
    ),
    LOG_DIR: t.Optional(t.String()),
  })
);

export function createDefaultLoggerFromEnv(options?: {
  level?: LogLevel;
  logFileName?: string;
}) {
  const { LOG_LEVEL, LOG_DIR } = getLoggerConfig();
  const logger = new LoggerConsole(
    options?.level ?? LOG_LEVEL,
    [],
    {},
    defaultEmojiMap
  );
  if (LOG_DIR) {
    logger.attachTransport(
      new RfsTransport({
        filename: options?.logFileName ?? "app.log",
        rfs: { path: LOG_DIR },
      })
    );
  }
  return logger;
}
