import type { Logger } from "~shared/Logger";
import { type Result, err, isErr, ok } from "~shared/utils/Result";

import { rawExtensions } from "@/constants";

import type { CaptureCollector, CollectError } from "./CaptureCollector";
import type { CaptureRecord, ExifService } from "./ExifService";
import type { FileSystemScanner } from "./FileSystemScanner";

export class CaptureCollectorDefault implements CaptureCollector {
  private readonly scanner: FileSystemScanner;
  private readonly exifService: ExifService;
  private readonly logger: Logger;

  constructor(deps: {
    scanner: FileSystemScanner;
    exifService: ExifService;
    logger: Logger;
  }) {
    this.scanner = deps.scanner;
    this.exifService = deps.exifService;
    this.logger = deps.logger.extend("CaptureCollectorDefault");
  }

  async collect(
    rootPath: string
  ): Promise<Result<CaptureRecord[], CollectError>> {
    const scanRes = await this.scanner.scan(rootPath, {
      recursive: false,
      allowExts: rawExtensions,
    });
    if (isErr(scanRes)) return err(scanRes.error);

    const filePaths = scanRes.value;
    this.logger.info({
      emoji: "🔎",
      count: filePaths.length,
    })`找到 ${filePaths.length} 個 RAW 檔`;

    const records: CaptureRecord[] = [];
    const seen = new Map<string, string>();
    for (const [i, filePath] of filePaths.entries()) {
      const res = await this.exifService.readCapture(filePath);
      if (isErr(res)) {
        this.logger.error({ error: res.error, filePath })`無法取得拍攝資訊`;
        return err({
          type: "METADATA_UNAVAILABLE",
          filePath,
          cause: res.error,
          message: res.error.message,
        });
      }

      const record = res.value;
      const other = seen.get(record.id);
      if (other) {
        return err({
          type: "DUPLICATE_ID",
          id: record.id,
          filePaths: [other, filePath],
          message: `檔名重複: ${record.id}`,
        });
      }
      seen.set(record.id, filePath);
      records.push(record);
      this.logger.debug({
        emoji: "📷",
      })`已讀取 ${i + 1}/${filePaths.length}: ${record.id}`;
    }

    return ok(records);
  }
}
