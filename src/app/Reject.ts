import type { CAC } from "cac";

import type { Logger } from "~shared/Logger";
import { isErr } from "~shared/utils/Result";

import {
  type RootOptions,
  openBursts,
  parseIndex,
  runWithContext,
} from "./AppContext";

export function registerReject(cli: CAC, baseLogger: Logger) {
  cli
    .command(
      "reject <...indices>",
      "剔除指定索引的連拍（索引以 list 顯示的為準，一次給多個也不會位移）"
    )
    .option("--root <dir>", "工作目錄，預設為目前目錄", { default: "." })
    .action(async (indices: Array<string | number>, options: RootOptions) => {
      const logger = baseLogger.extend("reject");
      await runWithContext(options, logger, async (ctx) => {
        const bursts = await openBursts(ctx, logger);
        if (!bursts) return;

        const parsed: number[] = [];
        for (const raw of indices) {
          const index = parseIndex(raw);
          if (index === undefined) {
            logger.warn({ index: raw })`索引必須是非負整數，略過`;
          } else {
            parsed.push(index);
          }
        }

        const result = ctx.store.reject(bursts, parsed);
        for (const issue of result.issues) {
          logger.warn({ index: issue.index }, issue.message);
        }
        if (result.rejected.length === 0) {
          logger.warn("沒有可剔除的連拍");
          return;
        }

        const saved = await ctx.store.save(result.bursts);
        if (isErr(saved)) {
          logger.error({ error: saved.error })`儲存連拍紀錄失敗`;
          process.exitCode = 1;
          return;
        }
        logger.info({
          emoji: "🗑️",
          rejected: result.rejected,
        })`已剔除 ${result.rejected.length} 組，剩 ${result.bursts.length} 組`;
      });
    });
}
