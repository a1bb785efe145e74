import type { Result } from "~shared/utils/Result";

import type { ScanError } from "../FileSystemScanner";

export interface StyleCatalog {
  /** 可用的 darktable style 名稱 */
  list(): Promise<Result<string[], ScanError>>;
}
