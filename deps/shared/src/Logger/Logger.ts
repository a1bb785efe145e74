export const logLevels = ["trace", "debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof logLevels)[number];

export type LogContext = {
  /** 事件名稱，會取代路徑最後一段的 level 顯示 */
  event?: string;
  /** 指定此筆紀錄的 emoji */
  emoji?: string;
  error?: unknown;
  [key: string]: unknown;
};

export type LogRecord = {
  time: string;
  level: LogLevel;
  path: string[];
  event?: string;
  msg: string;
  context: Record<string, unknown>;
  err?: { name: string; message: string; stack?: string };
};

export interface LogTransport {
  write(record: LogRecord): void;
  [Symbol.asyncDispose](): Promise<void>;
}

export type TemplateLog = (
  strings: TemplateStringsArray,
  ...values: unknown[]
) => void;

export interface LogMethod {
  (context: LogContext, message: string): void;
  (message: string): void;
  (context?: LogContext): TemplateLog;
}

export interface Logger {
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  /** 建立子 logger，路徑加上一段 name，並合併 context */
  extend(name: string, context?: LogContext): Logger;
  /** 僅合併 context，不改變路徑 */
  append(context: LogContext): Logger;
}
