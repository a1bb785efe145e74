import type { Burst } from "@/types";

import type { CaptureRecord } from "./ExifService";

export interface BurstDetectionService {
  /**
   * 依輸入順序將拍攝參數完全相同的相片分組，再以時間間隔切開，
   * 最後丟棄只有一張的組。
   */
  detect(records: readonly CaptureRecord[]): BurstDetectionResult;
}

export interface BurstDetectionResult {
  /** 依發現順序排列；因時間間隔切出的組接在最後 */
  bursts: Burst[];
  /** 落單而被丟棄的相片路徑 */
  singletons: string[];
}
