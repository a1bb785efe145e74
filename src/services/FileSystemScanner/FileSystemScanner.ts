import type { Result } from "~shared/utils/Result";

export type ScanError = {
  type: "SCAN_FAILED";
  message: string;
};

export type ScanOptions = {
  /** 預設 true */
  recursive?: boolean;
  /** 副檔名白名單，不分大小寫，可省略開頭的點；空陣列表示不過濾 */
  allowExts?: readonly string[];
};

export interface FileSystemScanner {
  /** 回傳依路徑排序的檔案完整路徑 */
  scan(
    rootPath: string,
    options?: ScanOptions
  ): Promise<Result<string[], ScanError>>;
}
