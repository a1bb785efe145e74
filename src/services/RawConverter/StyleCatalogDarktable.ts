import path from "node:path";

import { type Result, err, isErr, ok } from "~shared/utils/Result";

import { exists } from "@/utils/helper";

import type { FileSystemScanner, ScanError } from "../FileSystemScanner";
import type { StyleCatalog } from "./StyleCatalog";

/** 以 style 資料夾內的 *.dtstyle 檔名（不含副檔名）作為 style 名稱 */
export class StyleCatalogDarktable implements StyleCatalog {
  private readonly scanner: FileSystemScanner;
  private readonly styleDir: string;
  private cached?: string[];

  constructor(deps: { scanner: FileSystemScanner; styleDir: string }) {
    this.scanner = deps.scanner;
    this.styleDir = deps.styleDir;
  }

  async list(): Promise<Result<string[], ScanError>> {
    if (this.cached) return ok(this.cached);
    if (!(await exists(this.styleDir))) return ok([]);

    const scanRes = await this.scanner.scan(this.styleDir, {
      recursive: false,
      allowExts: [".dtstyle"],
    });
    if (isErr(scanRes)) return err(scanRes.error);

    this.cached = scanRes.value.map((p) => path.parse(p).name);
    return ok(this.cached);
  }
}
