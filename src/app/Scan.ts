import type { CAC } from "cac";

import type { Logger } from "~shared/Logger";

import { type RootOptions, openSession, runWithContext } from "./AppContext";

type ScanOptions = RootOptions & {
  rescan?: boolean;
  gap?: number | string;
};

export function registerScan(cli: CAC, baseLogger: Logger) {
  cli
    .command("scan", "讀取 RAW 檔並偵測連拍（已有紀錄時直接載入）")
    .option("--root <dir>", "工作目錄，預設為目前目錄", { default: "." })
    .option("--rescan", "清除既有紀錄後重新偵測", { default: false })
    .option("--gap <seconds>", "相鄰相片最大間隔秒數，預設 PANO_GAP_SECONDS")
    .action(async (options: ScanOptions) => {
      const logger = baseLogger.extend("scan");
      await runWithContext(options, logger, async (ctx) => {
        const session = await openSession(ctx, logger, {
          rescan: options.rescan,
        });
        if (!session) return;
        if (!session.detected && options.gap !== undefined) {
          logger.warn({
            gap: options.gap,
          })`已載入既有的連拍紀錄，--gap 未套用；需要重新偵測請加上 --rescan`;
        }

        const { bursts } = session;
        const frames = bursts.reduce((sum, b) => sum + b.length, 0);
        logger.info({
          emoji: "📚",
          artifact: ctx.layout.artifactPath,
        })`共 ${bursts.length} 組連拍，${frames} 張相片`;
      });
    });
}
