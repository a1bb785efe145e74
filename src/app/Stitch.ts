import type { CAC } from "cac";
import path from "node:path";

import type { Logger } from "~shared/Logger";
import { isErr } from "~shared/utils/Result";

import {
  type RootOptions,
  openBursts,
  runWithContext,
  selectBursts,
  toArray,
} from "./AppContext";

type StitchCommandOptions = RootOptions & {
  style?: string;
  projection?: string | number | Array<string | number>;
  adjust?: boolean;
};

export function registerStitch(cli: CAC, baseLogger: Logger) {
  cli
    .command("stitch <...indices>", "將指定索引的連拍接成全景圖")
    .option("--root <dir>", "工作目錄，預設為目前目錄", { default: "." })
    .option("--style <name>", "darktable style，預設 PANO_DEFAULT_STYLE")
    .option("--projection <p>", "投影名稱或索引，可重複指定，預設 rectilinear")
    .option("--adjust", "接圖前開啟 hugin 手動調整", { default: false })
    .action(
      async (indices: Array<string | number>, options: StitchCommandOptions) => {
        const logger = baseLogger.extend("stitch");
        await runWithContext(options, logger, async (ctx) => {
          const bursts = await openBursts(ctx, logger);
          if (!bursts) return;

          const { selected, invalid } = selectBursts(bursts, indices);
          for (const index of invalid) {
            logger.warn({ index })`索引不存在，略過`;
          }

          const projections = toArray(options.projection);
          let failed = invalid.length;
          for (const { index, frames } of selected) {
            const res = await ctx.stitcher.stitch(frames, {
              style: options.style ?? ctx.config.PANO_DEFAULT_STYLE,
              projections: projections.length > 0 ? projections : undefined,
              adjust: options.adjust,
            });
            if (isErr(res)) {
              failed++;
              logger.error({ index, error: res.error })`#${index} 接圖失敗`;
              continue;
            }
            logger.info({
              emoji: "✅",
              outputs: res.value.map((p) => path.basename(p)),
            })`#${index} 完成`;
          }

          if (failed > 0) process.exitCode = 1;
        });
      }
    );
}
