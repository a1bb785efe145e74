import type { ExifDateTime } from "exiftool-vendored";

const RAW_BASIC_RE = /^(\d{4}):(\d{2}):(\d{2})\s+(\d{2}):(\d{2}):(\d{2})/;

type ExifDateTimeLike = Pick<
  ExifDateTime,
  "rawValue" | "tzoffsetMinutes" | "isValid" | "toDate"
>;

function isExifDateTimeLike(value: unknown): value is ExifDateTimeLike {
  return (
    typeof value === "object" &&
    value !== null &&
    "toDate" in value &&
    typeof value.toDate === "function"
  );
}

const ISO_RE =
  /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d+)?(Z|[+-]\d{2}:?\d{2})$/;

/**
 * 將 "YYYY:MM:DD HH:mm:ss" 視為 UTC+offset 的本地時間，換算成 UTC。
 * 沒有時區資訊時 offset 為 0，同一台相機的相片之間時間差仍正確。
 * 未設定時鐘的相機會寫入 "0000:00:00 00:00:00"，超出範圍的欄位一律視為無效。
 */
function fromRaw(raw: string, tzoffsetMinutes = 0): Date | undefined {
  const m = RAW_BASIC_RE.exec(raw);
  if (!m) return undefined;
  const [year, month, day, hour, minute, second] = m.slice(1).map(Number);
  if (
    year < 1 ||
    month < 1 ||
    month > 12 ||
    day < 1 ||
    day > 31 ||
    hour > 23 ||
    minute > 59 ||
    second > 59
  ) {
    return undefined;
  }
  const base = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  // 2 月 30 日之類的日期會被進位到下個月
  if (
    base.getUTCFullYear() !== year ||
    base.getUTCMonth() !== month - 1 ||
    base.getUTCDate() !== day
  ) {
    return undefined;
  }
  return new Date(base.getTime() - tzoffsetMinutes * 60 * 1000);
}

/**
 * 將 exiftool 回傳的時間欄位轉為 JS Date。
 * 規則：
 * 1) 字串 "YYYY:MM:DD HH:mm:ss" 直接解析，另外只接受 ISO-8601。
 * 2) ExifDateTime 有 rawValue 時只依 rawValue + tzoffsetMinutes 解析。
 * 3) 沒有 rawValue 才使用 time.toDate()。
 * 4) 無效資料回傳 undefined。
 */
export function getTime(time: unknown): Date | undefined {
  if (typeof time === "string") {
    const text = time.trim();
    if (RAW_BASIC_RE.test(text)) return fromRaw(text);
    if (!ISO_RE.test(text)) return undefined;
    const d = new Date(text);
    return Number.isNaN(d.getTime()) ? undefined : d;
  }
  if (!isExifDateTimeLike(time) || !time.isValid) return undefined;
  if (time.rawValue) return fromRaw(time.rawValue, time.tzoffsetMinutes);

  const d = time.toDate();
  return Number.isNaN(d.getTime()) ? undefined : d;
}
