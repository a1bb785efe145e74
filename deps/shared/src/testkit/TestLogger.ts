import { type LogLevel, LoggerConsole, defaultEmojiMap } from "../Logger";

/**
 * 測試用 logger，預設只輸出 error，可用 TEST_LOG_LEVEL 調整。
 */
export function buildTestLogger(level?: LogLevel) {
  const envLevel = process.env.TEST_LOG_LEVEL;
  const resolved = level ?? (isLogLevel(envLevel) ? envLevel : "error");
  return new LoggerConsole(resolved, ["test"], {}, defaultEmojiMap);
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return (
    value === "trace" ||
    value === "debug" ||
    value === "info" ||
    value === "warn" ||
    value === "error"
  );
}
