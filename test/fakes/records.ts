import type { CaptureRecord } from "@/services/ExifService";

export const baseSettings: Readonly<Record<string, string>> = {
  FNumber: "8",
  ExposureTime: "1/250",
  ISO: "100",
  FocalLength: "24.0 mm",
  WhiteBalance: "Auto",
};

const t0 = Date.UTC(2024, 7, 17, 11, 26, 50);

/** 建立測試用的拍攝紀錄，offsetSeconds 為相對於固定起點的秒數 */
export function buildRecord(
  id: string,
  offsetSeconds: number,
  settings: Readonly<Record<string, string>> = baseSettings
): CaptureRecord {
  return {
    id,
    filePath: `/photos/${id}.NEF`,
    settings,
    capturedAt: new Date(t0 + offsetSeconds * 1000),
  };
}
