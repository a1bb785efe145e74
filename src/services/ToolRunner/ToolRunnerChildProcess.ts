import { spawn } from "node:child_process";

import type { Logger } from "~shared/Logger";
import { type Result, err, ok } from "~shared/utils/Result";

import type {
  RunOptions,
  ToolError,
  ToolOutput,
  ToolRunner,
} from "./ToolRunner";

export class ToolRunnerChildProcess implements ToolRunner {
  private readonly logger: Logger;

  constructor(deps: { logger: Logger }) {
    this.logger = deps.logger.extend("ToolRunnerChildProcess");
  }

  run(
    command: string,
    args: readonly string[],
    options?: RunOptions
  ): Promise<Result<ToolOutput, ToolError>> {
    const logger = this.logger.extend(command);
    logger.info({ emoji: "⚙️" })`執行 ${[command, ...args].join(" ")}`;

    return new Promise((resolve) => {
      let settled = false;
      let stdout = "";
      let stderr = "";

      const child = spawn(command, args, {
        stdio: options?.interactive ? "inherit" : ["ignore", "pipe", "pipe"],
      });
      child.stdout?.setEncoding("utf8");
      child.stderr?.setEncoding("utf8");
      child.stdout?.on("data", (chunk: string) => (stdout += chunk));
      child.stderr?.on("data", (chunk: string) => (stderr += chunk));

      child.once("error", (error) => {
        if (settled) return;
        settled = true;
        resolve(
          err({
            type: "SPAWN_FAILED",
            command,
            message: `無法執行 ${command}: ${error.message}`,
          })
        );
      });

      child.once("close", (code, signal) => {
        if (settled) return;
        settled = true;
        if (stdout.trim()) logger.debug({ stdout: stdout.trim() }, "輸出");
        if (stderr.trim()) logger.warn({ stderr: stderr.trim() }, "錯誤輸出");
        if (code === 0) {
          resolve(ok({ stdout, stderr }));
          return;
        }
        resolve(
          err({
            type: "NON_ZERO_EXIT",
            command,
            exitCode: code,
            stderr,
            message: `${command} 結束代碼 ${code ?? signal}`,
          })
        );
      });
    });
  }
}
