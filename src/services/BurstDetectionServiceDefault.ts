import { differenceInSeconds } from "date-fns";

import { defaultGapSeconds } from "@/constants";

import type {
  BurstDetectionResult,
  BurstDetectionService,
} from "./BurstDetectionService";
import type { CaptureRecord } from "./ExifService";

export function settingsEqual(
  a: Readonly<Record<string, string>>,
  b: Readonly<Record<string, string>>
) {
  const keys = Object.keys(a);
  if (keys.length !== Object.keys(b).length) return false;
  return keys.every((key) => Object.hasOwn(b, key) && a[key] === b[key]);
}

/**
 * 連拍偵測。
 *
 * 例如（同參數，門檻 4 秒）：
 *   T, T+1, T+2, T+10, T+11 → [T, T+1, T+2], [T+10, T+11]
 *
 * 時間差「大於」門檻才切開，剛好等於門檻仍屬同一組。
 */
export class BurstDetectionServiceDefault implements BurstDetectionService {
  private readonly gapSeconds: number;

  constructor(options?: { gapSeconds?: number }) {
    this.gapSeconds = options?.gapSeconds ?? defaultGapSeconds;
  }

  detect(records: readonly CaptureRecord[]): BurstDetectionResult {
    const groups = this.partitionBySettings(records);

    // 只處理參數分組的結果，切出的尾段本身已檢查過，不需再切
    const classCount = groups.length;
    for (let i = 0; i < classCount; i++) {
      const group = groups[i];
      group.sort((a, b) => a.capturedAt.getTime() - b.capturedAt.getTime());
      for (let j = group.length - 1; j > 0; j--) {
        const gap = differenceInSeconds(
          group[j].capturedAt,
          group[j - 1].capturedAt
        );
        if (gap > this.gapSeconds) {
          groups.push(group.splice(j));
        }
      }
    }

    const singletons = groups
      .filter((g) => g.length === 1)
      .map((g) => g[0].filePath);
    const bursts = groups
      .filter((g) => g.length > 1)
      .map((g) => g.map((r) => r.filePath));

    return { bursts, singletons };
  }

  private partitionBySettings(records: readonly CaptureRecord[]) {
    const groups: CaptureRecord[][] = [];
    const grouped = new Set<number>();

    records.forEach((seed, i) => {
      if (grouped.has(i)) return;
      grouped.add(i);
      const group = [seed];
      for (let k = i + 1; k < records.length; k++) {
        if (grouped.has(k)) continue;
        if (settingsEqual(seed.settings, records[k].settings)) {
          group.push(records[k]);
          grouped.add(k);
        }
      }
      groups.push(group);
    });

    return groups;
  }
}
