import { mkdir } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~shared/Logger";
import { type Result, err, isErr, ok } from "~shared/utils/Result";

import { exists, messageOf } from "@/utils/helper";

import type { ToolRunner } from "../ToolRunner";
import type {
  ConvertError,
  ConvertOptions,
  ConvertOutcome,
  RawConverter,
} from "./RawConverter";
import type { StyleCatalog } from "./StyleCatalog";

export class RawConverterDarktable implements RawConverter {
  private readonly runner: ToolRunner;
  private readonly styles: StyleCatalog;
  private readonly logger: Logger;

  constructor(deps: {
    runner: ToolRunner;
    styles: StyleCatalog;
    logger: Logger;
  }) {
    this.runner = deps.runner;
    this.styles = deps.styles;
    this.logger = deps.logger.extend("RawConverterDarktable");
  }

  async convert(
    sourcePath: string,
    targetPath: string,
    options: ConvertOptions = {}
  ): Promise<Result<ConvertOutcome, ConvertError>> {
    if (!options.overwrite && (await exists(targetPath))) {
      this.logger.debug({ targetPath }, "目標已存在，略過轉檔");
      return ok<ConvertOutcome>("skipped");
    }

    const styleArgs: string[] = [];
    if (options.style !== undefined) {
      const styles = await this.styles.list();
      if (isErr(styles)) return err(styles.error);
      if (!styles.value.includes(options.style)) {
        return err({
          type: "INVALID_STYLE",
          style: options.style,
          message: `找不到 darktable style: ${options.style}`,
        });
      }
      styleArgs.push("--style-overwrite", "--style", options.style);
    }

    const targetDir = path.dirname(targetPath);
    try {
      await mkdir(targetDir, { recursive: true });
    } catch (error) {
      return err({
        type: "IO_FAILED",
        path: targetDir,
        message: `無法建立輸出資料夾: ${messageOf(error)}`,
      });
    }
    const res = await this.runner.run("darktable-cli", [
      sourcePath,
      targetPath,
      ...styleArgs,
    ]);
    if (isErr(res)) return err(res.error);

    if (!(await exists(targetPath))) {
      return err({
        type: "OUTPUT_MISSING",
        targetPath,
        message: `轉檔後找不到輸出: ${targetPath}`,
      });
    }
    this.logger.info({ emoji: "🖼️" })`已轉出 ${path.basename(targetPath)}`;
    return ok<ConvertOutcome>("converted");
  }
}
