import type { Result } from "~shared/utils/Result";

import type { ScanError } from "../FileSystemScanner";
import type { ToolError } from "../ToolRunner";

export type ConvertOptions = {
  /** darktable style 名稱，未指定時使用 darktable 預設處理 */
  style?: string;
  /** 目標已存在時是否重新轉檔，預設 false */
  overwrite?: boolean;
};

export type ConvertOutcome = "converted" | "skipped";

export type ConvertError =
  | ToolError
  | ScanError
  | { type: "INVALID_STYLE"; style: string; message: string }
  | { type: "OUTPUT_MISSING"; targetPath: string; message: string }
  | { type: "IO_FAILED"; path: string; message: string };

export interface RawConverter {
  convert(
    sourcePath: string,
    targetPath: string,
    options?: ConvertOptions
  ): Promise<Result<ConvertOutcome, ConvertError>>;
}
