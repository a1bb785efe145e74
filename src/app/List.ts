import type { CAC } from "cac";
import path from "node:path";

import type { Logger } from "~shared/Logger";

import { type RootOptions, openBursts, runWithContext } from "./AppContext";

export function registerList(cli: CAC, baseLogger: Logger) {
  cli
    .command("list", "列出所有連拍，索引供 reject / stitch / convert 使用")
    .option("--root <dir>", "工作目錄，預設為目前目錄", { default: "." })
    .action(async (options: RootOptions) => {
      const logger = baseLogger.extend("list");
      await runWithContext(options, logger, async (ctx) => {
        const bursts = await openBursts(ctx, logger);
        if (!bursts) return;
        if (bursts.length === 0) {
          logger.warn("沒有偵測到任何連拍");
          return;
        }

        for (const [index, frames] of bursts.entries()) {
          const panoramas = await ctx.stitcher.find(frames);
          const first = path.parse(frames[0]).name;
          const last = path.parse(frames[frames.length - 1]).name;
          logger.info({
            emoji: panoramas.length > 0 ? "🌄" : "📷",
            panoramas: panoramas.map((p) => path.basename(p)),
          })`#${index} ${frames.length} 張 ${first} … ${last}`;
        }
      });
    });
}
