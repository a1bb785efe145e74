import { mkdir, mkdtemp, readdir, rm } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~shared/Logger";
import { type Result, err, isErr, ok } from "~shared/utils/Result";

import type { Projection } from "@/constants";
import { exists, messageOf } from "@/utils/helper";

import type { RawConverter } from "../RawConverter";
import type { ToolRunner } from "../ToolRunner";
import { panoramaName, resolveProjection } from "./PanoramaNaming";
import type {
  PanoramaStitcher,
  StitchError,
  StitchOptions,
} from "./PanoramaStitcher";

type StitchTarget = { index: number; name: Projection; outPath: string };

/**
 * 以 Hugin 命令列工具接圖：
 *   darktable-cli → pto_gen → cpfind → cpclean → linefind → autooptimiser
 *   → (每個投影) pano_modify → [hugin] → nona → enblend
 */
export class PanoramaStitcherHugin implements PanoramaStitcher {
  private readonly runner: ToolRunner;
  private readonly converter: RawConverter;
  private readonly panoramaDir: string;
  private readonly tmpDir: string;
  private readonly logger: Logger;

  constructor(deps: {
    runner: ToolRunner;
    converter: RawConverter;
    panoramaDir: string;
    tmpDir: string;
    logger: Logger;
  }) {
    this.runner = deps.runner;
    this.converter = deps.converter;
    this.panoramaDir = deps.panoramaDir;
    this.tmpDir = deps.tmpDir;
    this.logger = deps.logger.extend("PanoramaStitcherHugin");
  }

  async stitch(
    frames: readonly string[],
    options: StitchOptions = {}
  ): Promise<Result<string[], StitchError>> {
    if (frames.length < 2) {
      return err({
        type: "TOO_FEW_FRAMES",
        message: `至少需要兩張相片，實際 ${frames.length} 張`,
      });
    }

    const name = panoramaName(frames);
    const style = options.style ?? "default";
    const prefix = `${name}-${style}-${options.adjust ? "a" : "n"}`;
    const logger = this.logger.extend(name);

    const targets: StitchTarget[] = [];
    for (const projection of options.projections ?? ["rectilinear"]) {
      const resolved = resolveProjection(projection);
      if (isErr(resolved)) return err(resolved.error);
      if (targets.some((t) => t.index === resolved.value.index)) continue;
      targets.push({
        ...resolved.value,
        outPath: path.join(
          this.panoramaDir,
          `${prefix}-${resolved.value.name}.tif`
        ),
      });
    }

    const pending: StitchTarget[] = [];
    for (const target of targets) {
      if (await exists(target.outPath)) {
        logger.info({
          emoji: "⏭️",
        })`已存在，略過 ${path.basename(target.outPath)}`;
      } else {
        pending.push(target);
      }
    }
    const outPaths = targets.map((t) => t.outPath);
    if (pending.length === 0) return ok(outPaths);

    logger.info({ event: "start" })`開始接圖，共 ${frames.length} 張`;
    const prepared = await this.prepareWorkDir();
    if (isErr(prepared)) return err(prepared.error);
    const workDir = prepared.value;
    try {
      const res = await this.runPipeline(
        frames,
        workDir,
        prefix,
        pending,
        options
      );
      if (isErr(res)) return err(res.error);
    } finally {
      await rm(workDir, { recursive: true, force: true }).catch(
        (error: unknown) => logger.warn({ workDir, error })`無法刪除暫存資料夾`
      );
    }

    logger.info({ event: "done" })`接圖完成 ${name}`;
    return ok(outPaths);
  }

  async find(frames: readonly string[]): Promise<string[]> {
    if (frames.length === 0 || !(await exists(this.panoramaDir))) return [];
    const name = panoramaName(frames);
    let entries: string[];
    try {
      entries = await readdir(this.panoramaDir);
    } catch (error) {
      this.logger.warn({ error })`無法讀取 ${this.panoramaDir}`;
      return [];
    }
    return entries
      .filter((entry) => entry.startsWith(`${name}-`))
      .sort()
      .map((entry) => path.join(this.panoramaDir, entry));
  }

  private async prepareWorkDir(): Promise<Result<string, StitchError>> {
    let current = this.panoramaDir;
    try {
      await mkdir(this.panoramaDir, { recursive: true });
      current = this.tmpDir;
      await mkdir(this.tmpDir, { recursive: true });
      return ok(await mkdtemp(path.join(this.tmpDir, "pano_")));
    } catch (error) {
      return err({
        type: "IO_FAILED",
        path: current,
        message: `無法建立資料夾: ${messageOf(error)}`,
      });
    }
  }

  private async runPipeline(
    frames: readonly string[],
    workDir: string,
    prefix: string,
    pending: StitchTarget[],
    options: StitchOptions
  ): Promise<Result<void, StitchError>> {
    const tiffs: string[] = [];
    for (const frame of frames) {
      const tiff = path.join(workDir, `${path.parse(frame).name}.tif`);
      const converted = await this.converter.convert(frame, tiff, {
        style: options.style,
        overwrite: true,
      });
      if (isErr(converted)) return err(converted.error);
      tiffs.push(tiff);
    }

    const pto = path.join(workDir, `${prefix}.pto`);
    const alignSteps: Array<[string, string[]]> = [
      ["pto_gen", [...tiffs, "-o", pto]],
      ["cpfind", ["--celeste", "-o", pto, pto]],
      ["cpclean", ["-o", pto, pto]],
      ["linefind", ["--lines", "3", "-o", pto, pto]],
      ["autooptimiser", ["-q", "-a", "-l", "-m", "-s", "-o", pto, pto]],
    ];
    for (const [command, args] of alignSteps) {
      const res = await this.runner.run(command, args);
      if (isErr(res)) return err(res.error);
    }

    for (const target of pending) {
      const res = await this.render(
        workDir,
        pto,
        target,
        options.adjust ?? false
      );
      if (isErr(res)) return err(res.error);
    }
    return ok();
  }

  private async render(
    workDir: string,
    pto: string,
    target: StitchTarget,
    adjust: boolean
  ): Promise<Result<void, StitchError>> {
    // 每個投影使用各自的 nona 輸出前綴，避免混到前一個投影的圖層
    const layerPrefix = `${path.parse(target.outPath).name}-layer`;

    const modified = await this.runner.run("pano_modify", [
      "--projection",
      String(target.index),
      "--fov",
      "AUTO",
      "--canvas",
      "AUTO",
      "--straighten",
      "--center",
      "--crop",
      "0,100,0,100%",
      "--output-type",
      "NORMAL",
      "-o",
      pto,
      pto,
    ]);
    if (isErr(modified)) return err(modified.error);

    if (adjust) {
      const adjusted = await this.runner.run("hugin", [pto], {
        interactive: true,
      });
      if (isErr(adjusted)) return err(adjusted.error);
    }

    const remapped = await this.runner.run("nona", [
      "-g",
      "-z",
      "LZW",
      "-o",
      path.join(workDir, layerPrefix),
      "--bigtiff",
      "-m",
      "TIFF_m",
      pto,
    ]);
    if (isErr(remapped)) return err(remapped.error);

    let entries: string[];
    try {
      entries = await readdir(workDir);
    } catch (error) {
      return err({
        type: "IO_FAILED",
        path: workDir,
        message: `無法讀取 nona 輸出: ${messageOf(error)}`,
      });
    }
    const layers = entries
      .filter(
        (entry) => entry.startsWith(layerPrefix) && entry.endsWith(".tif")
      )
      .sort()
      .map((entry) => path.join(workDir, entry));

    const blended = await this.runner.run("enblend", [
      "-o",
      target.outPath,
      ...layers,
    ]);
    if (isErr(blended)) return err(blended.error);

    if (!(await exists(target.outPath))) {
      return err({
        type: "OUTPUT_MISSING",
        targetPath: target.outPath,
        message: `找不到接圖結果: ${target.outPath}`,
      });
    }
    this.logger.info({
      emoji: "🌄",
    })`已輸出 ${path.basename(target.outPath)}`;
    return ok();
  }
}
