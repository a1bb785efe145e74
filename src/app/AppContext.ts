import { stat } from "node:fs/promises";

import type { Logger } from "~shared/Logger";
import { dispose } from "~shared/utils/Disposeable";
import { isErr } from "~shared/utils/Result";

import { type PanoConfig, getPanoConfig, resolveStyleDir } from "@/config";
import { BurstDetectionServiceDefault } from "@/services/BurstDetectionServiceDefault";
import type {
  BurstSession,
  BurstSessionService,
} from "@/services/BurstSessionService";
import { BurstSessionServiceDefault } from "@/services/BurstSessionServiceDefault";
import { type BurstStore, BurstStoreJson } from "@/services/BurstStore";
import { CaptureCollectorDefault } from "@/services/CaptureCollectorDefault";
import { ExifServiceExifTool } from "@/services/ExifService";
import { FileSystemScannerDefault } from "@/services/FileSystemScanner";
import type { PanoramaStitcher } from "@/services/PanoramaStitcher";
import { PanoramaStitcherHugin } from "@/services/PanoramaStitcher";
import {
  type RawConverter,
  RawConverterDarktable,
  StyleCatalogDarktable,
} from "@/services/RawConverter";
import { ToolRunnerChildProcess } from "@/services/ToolRunner";
import { WorkspaceLayout } from "@/services/WorkspaceLayout";
import type { BurstCollection } from "@/types";
import { expandHome } from "@/utils/helper";

export type RootOptions = {
  root?: string;
};

export type AppContext = {
  config: PanoConfig;
  layout: WorkspaceLayout;
  store: BurstStore;
  session: BurstSessionService;
  converter: RawConverter;
  stitcher: PanoramaStitcher;
};

/**
 * 組裝各服務並執行 fn；結束時關閉 exiftool。
 */
export async function runWithContext(
  options: RootOptions & { gap?: number | string },
  logger: Logger,
  fn: (ctx: AppContext) => Promise<void>
) {
  const config = getPanoConfig();
  const layout = WorkspaceLayout.fromRoot(expandHome(options.root ?? "."));
  const isDir = await stat(layout.root).then(
    (s) => s.isDirectory(),
    () => false
  );
  if (!isDir) {
    logger.error({ root: layout.root })`找不到工作目錄`;
    process.exitCode = 1;
    return;
  }
  await layout.ensure();

  const gapSeconds =
    options.gap === undefined ? config.PANO_GAP_SECONDS : Number(options.gap);
  if (!Number.isInteger(gapSeconds) || gapSeconds < 0) {
    logger.error({ gap: options.gap })`時間間隔必須是非負整數`;
    process.exitCode = 1;
    return;
  }

  const scanner = new FileSystemScannerDefault();
  const exifService = new ExifServiceExifTool();
  const store = new BurstStoreJson({
    artifactPath: layout.artifactPath,
    logger,
  });
  const session = new BurstSessionServiceDefault({
    rootPath: layout.root,
    store,
    collector: new CaptureCollectorDefault({ scanner, exifService, logger }),
    detector: new BurstDetectionServiceDefault({ gapSeconds }),
    logger,
  });
  const runner = new ToolRunnerChildProcess({ logger });
  const converter = new RawConverterDarktable({
    runner,
    styles: new StyleCatalogDarktable({
      scanner,
      styleDir: resolveStyleDir(config),
    }),
    logger,
  });
  const stitcher = new PanoramaStitcherHugin({
    runner,
    converter,
    panoramaDir: layout.panoramaDir,
    tmpDir: layout.tmpDir,
    logger,
  });

  try {
    await fn({ config, layout, store, session, converter, stitcher });
  } finally {
    await dispose(exifService);
  }
}

/** 載入或偵測連拍；失敗時記錄錯誤並設定結束代碼 */
export async function openSession(
  ctx: AppContext,
  logger: Logger,
  options?: { rescan?: boolean }
): Promise<BurstSession | undefined> {
  const res = await ctx.session.open(options);
  if (isErr(res)) {
    logger.error({ error: res.error })`無法取得連拍紀錄`;
    process.exitCode = 1;
    return undefined;
  }
  return res.value;
}

export async function openBursts(
  ctx: AppContext,
  logger: Logger
): Promise<BurstCollection | undefined> {
  return (await openSession(ctx, logger))?.bursts;
}

/** 只接受非負整數；空字串、空白、小數與負數都回傳 undefined */
export function parseIndex(raw: string | number): number | undefined {
  if (typeof raw === "number") {
    return Number.isInteger(raw) && raw >= 0 ? raw : undefined;
  }
  return /^\d+$/.test(raw) ? Number(raw) : undefined;
}

/** 依使用者輸入的索引取出連拍，無效索引回傳於 invalid */
export function selectBursts(
  bursts: BurstCollection,
  indices: ReadonlyArray<string | number>
) {
  const selected: Array<{ index: number; frames: string[] }> = [];
  const invalid: Array<string | number> = [];
  for (const raw of indices) {
    const index = parseIndex(raw);
    const frames = index === undefined ? undefined : bursts[index];
    if (index !== undefined && frames) selected.push({ index, frames });
    else invalid.push(raw);
  }
  return { selected, invalid };
}

export function toArray<T>(value: T | T[] | undefined): T[] {
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}
