import type { CAC } from "cac";

import type { Logger } from "~shared/Logger";
import { isErr } from "~shared/utils/Result";

import {
  type RootOptions,
  openBursts,
  runWithContext,
  selectBursts,
} from "./AppContext";

type ConvertCommandOptions = RootOptions & {
  style?: string;
  overwrite?: boolean;
};

export function registerConvert(cli: CAC, baseLogger: Logger) {
  cli
    .command("convert <...indices>", "將指定索引連拍的每張 RAW 轉成 JPEG")
    .option("--root <dir>", "工作目錄，預設為目前目錄", { default: "." })
    .option("--style <name>", "darktable style，預設 PANO_DEFAULT_STYLE")
    .option("--overwrite", "覆寫已存在的 JPEG", { default: false })
    .action(
      async (indices: Array<string | number>, options: ConvertCommandOptions) => {
        const logger = baseLogger.extend("convert");
        await runWithContext(options, logger, async (ctx) => {
          const bursts = await openBursts(ctx, logger);
          if (!bursts) return;

          const { selected, invalid } = selectBursts(bursts, indices);
          for (const index of invalid) {
            logger.warn({ index })`索引不存在，略過`;
          }

          let converted = 0;
          let skipped = 0;
          let failed = invalid.length;
          for (const { index, frames } of selected) {
            for (const frame of frames) {
              const res = await ctx.converter.convert(
                frame,
                ctx.layout.jpegPathOf(frame),
                {
                  style: options.style ?? ctx.config.PANO_DEFAULT_STYLE,
                  overwrite: options.overwrite,
                }
              );
              if (isErr(res)) {
                failed++;
                logger.error({ index, frame, error: res.error })`轉檔失敗`;
                continue;
              }
              if (res.value === "converted") converted++;
              else skipped++;
            }
          }

          logger.info({
            emoji: "✅",
            converted,
            skipped,
            failed,
          })`轉檔結束`;
          if (failed > 0) process.exitCode = 1;
        });
      }
    );
}
