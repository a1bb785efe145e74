import type { Result } from "~shared/utils/Result";

export type ToolOutput = { stdout: string; stderr: string };

export type ToolError =
  | { type: "SPAWN_FAILED"; command: string; message: string }
  | {
      type: "NON_ZERO_EXIT";
      command: string;
      exitCode: number | null;
      stderr: string;
      message: string;
    };

export type RunOptions = {
  /** 互動式程式（如 hugin）：繼承終端機的 stdio，不擷取輸出 */
  interactive?: boolean;
};

export interface ToolRunner {
  /** 執行外部程式並等待結束；結束代碼非 0 視為失敗 */
  run(
    command: string,
    args: readonly string[],
    options?: RunOptions
  ): Promise<Result<ToolOutput, ToolError>>;
}
