import type { CAC } from "cac";

import type { Logger } from "~shared/Logger";
import { isErr } from "~shared/utils/Result";

import { confirm } from "@/utils/helper";

import { type RootOptions, runWithContext } from "./AppContext";

type ClearOptions = RootOptions & {
  yes?: boolean;
};

export function registerClear(cli: CAC, baseLogger: Logger) {
  cli
    .command("clear", "刪除連拍紀錄，下次執行時重新偵測")
    .option("--root <dir>", "工作目錄，預設為目前目錄", { default: "." })
    .option("--yes", "略過確認，直接執行", { default: false })
    .action(async (options: ClearOptions) => {
      const logger = baseLogger.extend("clear");
      await runWithContext(options, logger, async (ctx) => {
        if (!(await ctx.store.exists())) {
          logger.info({ emoji: "✅" })`沒有連拍紀錄`;
          return;
        }

        const proceed =
          options.yes ||
          (await confirm(
            `將刪除 ${ctx.layout.artifactPath}，已剔除的連拍會重新出現，是否繼續？ [y/N] `
          ));
        if (!proceed) {
          logger.warn({ emoji: "⏹️" })`使用者取消`;
          return;
        }

        const res = await ctx.store.invalidate();
        if (isErr(res)) {
          logger.error({ error: res.error })`刪除連拍紀錄失敗`;
          process.exitCode = 1;
          return;
        }
        logger.info({ emoji: "🧹" })`已刪除連拍紀錄`;
      });
    });
}
