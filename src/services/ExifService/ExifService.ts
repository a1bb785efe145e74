import type { Result } from "~shared/utils/Result";

import type { CaptureRecord, ReadError } from "./CaptureRecord";

export interface ExifService {
  /**
   * 讀取檔案的拍攝參數與拍攝時間。
   * 成功時回傳 CaptureRecord，失敗時包含具體錯誤原因。
   */
  readCapture(filePath: string): Promise<Result<CaptureRecord, ReadError>>;
}
