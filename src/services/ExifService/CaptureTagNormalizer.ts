import { startOfSecond } from "date-fns";
import path from "node:path";

import { type Result, err, ok } from "~shared/utils/Result";

import {
  captureSettingAliases,
  captureSettingKeys,
  captureTimeKey,
} from "@/constants";

import type { CaptureRecord, ReadError } from "./CaptureRecord";
import { getTime } from "./ExifDateTimeHelper";

const settingKeySet: ReadonlySet<string> = new Set(captureSettingKeys);
const aliases: Readonly<Partial<Record<string, string>>> =
  captureSettingAliases;

/**
 * 只保留階層式 key 的最後一段，例如：
 * - Exif.Photo.FNumber → FNumber
 * - EXIF:FNumber → FNumber
 * 其他工具的名稱再對應到 exiftool 的名稱（ISOSpeedRatings → ISO）。
 */
export function normalizeTagKey(key: string): string {
  const last = key.split(/[.:]/).pop() || key;
  return aliases[last] ?? last;
}

function stringifyTagValue(value: unknown) {
  return typeof value === "string" ? value.trim() : String(value);
}

/**
 * 將單一檔案的 tag 轉為 CaptureRecord。
 * 缺少可解析的拍攝時間時回傳 MISSING_CAPTURE_TIME，不產生不完整的紀錄。
 */
export function normalizeCaptureTags(
  filePath: string,
  entries: Iterable<readonly [string, unknown]>
): Result<CaptureRecord, ReadError> {
  const settings: Record<string, string> = {};
  let capturedAt: Date | undefined;

  for (const [rawKey, value] of entries) {
    if (value === undefined || value === null) continue;
    const key = normalizeTagKey(rawKey);
    if (key === captureTimeKey) {
      capturedAt = getTime(value) ?? capturedAt;
    } else if (settingKeySet.has(key)) {
      settings[key] = stringifyTagValue(value);
    }
  }

  if (!capturedAt) {
    return err({
      type: "MISSING_CAPTURE_TIME",
      message: `缺少可解析的 ${captureTimeKey}: ${filePath}`,
    });
  }

  return ok({
    id: path.parse(filePath).name,
    filePath,
    settings,
    capturedAt: startOfSecond(capturedAt),
  });
}
