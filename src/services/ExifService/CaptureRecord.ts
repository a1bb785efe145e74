export type CaptureRecord = {
  /** 不含副檔名的檔名，在同一工作目錄內唯一 */
  id: string;

  /** 檔案完整路徑 */
  filePath: string;

  /** 拍攝參數，僅包含 captureSettingKeys 內的欄位，值為相機回報的原始字串 */
  settings: Readonly<Record<string, string>>;

  /** 拍攝時間（DateTimeOriginal），精度為秒 */
  capturedAt: Date;
};

export type ReadError =
  | { type: "FILE_NOT_FOUND"; message: string }
  | { type: "READ_FAILED"; message: string }
  | { type: "NO_EXIF_DATA"; message: string }
  | { type: "MISSING_CAPTURE_TIME"; message: string };
