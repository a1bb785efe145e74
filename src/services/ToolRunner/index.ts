export * from "./ToolRunner";
export * from "./ToolRunnerChildProcess";
