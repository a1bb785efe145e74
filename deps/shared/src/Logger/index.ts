export * from "./Logger";
export * from "./LoggerConsole";
export * from "./createDefaultLoggerFromEnv";
