import { exiftool } from "exiftool-vendored";

import { type Result, err } from "~shared/utils/Result";

import { exists, messageOf } from "@/utils/helper";

import type { CaptureRecord, ReadError } from "./CaptureRecord";
import { normalizeCaptureTags } from "./CaptureTagNormalizer";
import type { ExifService } from "./ExifService";

/** exiftool-vendored 的 ExifTool 中本服務用到的部分 */
export type TagReader = {
  read(filePath: string): Promise<object>;
  end(): Promise<void>;
};

export class ExifServiceExifTool implements ExifService {
  constructor(private readonly reader: TagReader = exiftool) {}

  async readCapture(
    filePath: string
  ): Promise<Result<CaptureRecord, ReadError>> {
    if (!(await exists(filePath))) {
      return err({
        type: "FILE_NOT_FOUND",
        message: `找不到檔案: ${filePath}`,
      });
    }

    let tags: object;
    try {
      tags = await this.reader.read(filePath);
    } catch (e) {
      return err({
        type: "READ_FAILED",
        message: `讀取 EXIF 失敗: ${filePath} (${messageOf(e)})`,
      });
    }

    const entries = Object.entries(tags);
    if (entries.length === 0) {
      return err({
        type: "NO_EXIF_DATA",
        message: `無 EXIF 資料: ${filePath}`,
      });
    }

    return normalizeCaptureTags(filePath, entries);
  }

  async [Symbol.asyncDispose]() {
    await this.reader.end();
  }
}
