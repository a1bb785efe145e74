import type { Result } from "~shared/utils/Result";

import type { CaptureRecord, ReadError } from "./ExifService";

export interface CaptureCollector {
  /**
   * 掃描工作目錄（不遞迴）內所有 RAW 檔並讀取拍攝資訊。
   * 任一檔案失敗即整體失敗，不會回傳部分結果。
   */
  collect(rootPath: string): Promise<Result<CaptureRecord[], CollectError>>;
}

export type CollectError =
  | { type: "SCAN_FAILED"; message: string }
  | {
      type: "METADATA_UNAVAILABLE";
      filePath: string;
      cause: ReadError;
      message: string;
    }
  | { type: "DUPLICATE_ID"; id: string; filePaths: string[]; message: string };
