import kleur from "kleur";

import { dispose } from "../utils/Disposeable";

import type {
  LogContext,
  LogLevel,
  LogMethod,
  LogRecord,
  LogTransport,
  Logger,
  TemplateLog,
} from "./Logger";

const levelWeight: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
};

const consoleWriters: Record<LogLevel, (...args: unknown[]) => void> = {
  trace: (...args) => console.debug(...args),
  debug: (...args) => console.debug(...args),
  info: (...args) => console.info(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
};

export class LoggerConsole implements Logger {
  readonly trace: LogMethod;
  readonly debug: LogMethod;
  readonly info: LogMethod;
  readonly warn: LogMethod;
  readonly error: LogMethod;

  constructor(
    private readonly level: LogLevel,
    private readonly path: string[] = [],
    private readonly context: LogContext = {},
    private readonly emojiMap: Record<string, string> = {},
    private readonly transports: LogTransport[] = []
  ) {
    this.trace = this.buildMethod("trace");
    this.debug = this.buildMethod("debug");
    this.info = this.buildMethod("info");
    this.warn = this.buildMethod("warn");
    this.error = this.buildMethod("error");
  }

  extend(name: string, context: LogContext = {}): LoggerConsole {
    return new LoggerConsole(
      this.level,
      [...this.path, name],
      { ...this.context, ...context },
      this.emojiMap,
      this.transports
    );
  }

  append(context: LogContext): LoggerConsole {
    return new LoggerConsole(
      this.level,
      this.path,
      { ...this.context, ...context },
      this.emojiMap,
      this.transports
    );
  }

  /** transport 由整棵 logger 樹共用 */
  attachTransport(transport: LogTransport) {
    this.transports.push(transport);
  }

  async [Symbol.asyncDispose]() {
    const transports = this.transports.splice(0);
    await dispose(...transports);
  }

  private buildMethod(level: LogLevel): LogMethod {
    const write = (context: LogContext, message: string) =>
      this.write(level, context, message);

    function log(context: LogContext, message: string): void;
    function log(message: string): void;
    function log(context?: LogContext): TemplateLog;
    function log(
      first?: LogContext | string,
      message?: string
    ): TemplateLog | undefined {
      if (typeof first === "string") {
        write({}, first);
        return;
      }
      if (message !== undefined) {
        write(first ?? {}, message);
        return;
      }
      return (strings, ...values) => {
        const valueContext: Record<string, unknown> = {};
        let text = strings[0] ?? "";
        values.forEach((value, i) => {
          valueContext[`__${i}`] = value;
          text += kleur.green(String(value)) + (strings[i + 1] ?? "");
        });
        write({ ...first, ...valueContext }, text);
      };
    }

    return log;
  }

  private write(level: LogLevel, callContext: LogContext, message: string) {
    if (levelWeight[level] < levelWeight[this.level]) return;

    const { emoji: inheritedEmoji, ...inherited } = this.context;
    const { emoji, event, error, ...rest } = { ...inherited, ...callContext };
    const context: Record<string, unknown> = { ...rest };
    const errorInfo = describeError(error);
    if (error !== undefined && !errorInfo) context.error = error;

    const icon =
      emoji ??
      (event ? this.emojiMap[event] : undefined) ??
      (level === "info" ? inheritedEmoji : undefined) ??
      this.emojiMap[level] ??
      inheritedEmoji ??
      "";
    const label = [...this.path, event ?? level].join(":");
    const contextText =
      Object.keys(context).length > 0 ? ` ${safeStringify(context)}` : "";
    const line = `${icon} ${label}: ${message}${contextText}`.trimStart();

    if (level === "error") {
      const stack = errorInfo?.stack ?? captureStack(message);
      consoleWriters.error(line, `\n${stack}`);
    } else {
      consoleWriters[level](line);
    }

    if (this.transports.length === 0) return;
    const record: LogRecord = {
      time: new Date().toISOString(),
      level,
      path: this.path,
      event,
      msg: stripAnsi(message),
      context,
      err: errorInfo,
    };
    for (const transport of this.transports) transport.write(record);
  }
}

function describeError(error: unknown): LogRecord["err"] {
  if (!(error instanceof Error)) return undefined;
  return { name: error.name, message: error.message, stack: error.stack };
}

function captureStack(message: string) {
  return new Error(message).stack ?? message;
}

function safeStringify(value: unknown) {
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

// eslint-disable-next-line no-control-regex
const ansiPattern = /\u001b\[[0-9;]*m/g;

function stripAnsi(text: string) {
  return text.replace(ansiPattern, "");
}
