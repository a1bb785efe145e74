import path from "node:path";

import { type Result, err, ok } from "~shared/utils/Result";

import { type Projection, projections } from "@/constants";

import type { StitchError } from "./PanoramaStitcher";

/** 全景圖名稱：檔名排序後的「第一張-最後一張」 */
export function panoramaName(frames: readonly string[]) {
  const stems = frames.map((f) => path.parse(f).name).sort();
  return `${stems[0]}-${stems[stems.length - 1]}`;
}

export function resolveProjection(
  projection: string | number
): Result<{ index: number; name: Projection }, StitchError> {
  const index =
    typeof projection === "number"
      ? projection
      : /^\d+$/.test(projection)
        ? Number(projection)
        : projections.findIndex((p) => p === projection);
  const name: Projection | undefined = projections[index];
  if (!Number.isInteger(index) || name === undefined) {
    return err({
      type: "INVALID_PROJECTION",
      projection: String(projection),
      message: `不支援的投影: ${projection}`,
    });
  }
  return ok({ index, name });
}
