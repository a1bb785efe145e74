import { Type as t } from "@sinclair/typebox";
import { Assert } from "@sinclair/typebox/value";
import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~shared/Logger";
import { type Result, err, ok } from "~shared/utils/Result";

import type { BurstCollection } from "@/types";
import { exists, messageOf } from "@/utils/helper";

import type {
  BurstStore,
  RejectIssue,
  RejectResult,
  StoreReadError,
  StoreWriteError,
} from "./BurstStore";

const burstCollectionSchema = t.Array(t.Array(t.String(), { minItems: 2 }));

function isNotFound(error: unknown) {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export class BurstStoreJson implements BurstStore {
  private readonly artifactPath: string;
  private readonly logger: Logger;

  constructor(deps: { artifactPath: string; logger: Logger }) {
    this.artifactPath = deps.artifactPath;
    this.logger = deps.logger.extend("BurstStoreJson");
  }

  exists() {
    return exists(this.artifactPath);
  }

  async load(): Promise<Result<BurstCollection, StoreReadError>> {
    let text: string;
    try {
      text = await readFile(this.artifactPath, "utf8");
    } catch (error) {
      if (isNotFound(error)) {
        return err({
          type: "NOT_FOUND",
          message: `找不到連拍紀錄: ${this.artifactPath}`,
        });
      }
      return err({
        type: "READ_FAILED",
        message: `讀取連拍紀錄失敗: ${messageOf(error)}`,
      });
    }

    try {
      const raw: unknown = JSON.parse(text);
      Assert(burstCollectionSchema, raw);
      this.logger.debug({ count: raw.length })`已載入連拍紀錄`;
      return ok(raw);
    } catch (error) {
      return err({
        type: "CORRUPT",
        message: `連拍紀錄格式錯誤，請清除後重新偵測: ${messageOf(error)}`,
      });
    }
  }

  async save(
    collection: BurstCollection
  ): Promise<Result<void, StoreWriteError>> {
    const tmpPath = `${this.artifactPath}.${process.pid}.tmp`;
    try {
      await mkdir(path.dirname(this.artifactPath), { recursive: true });
      await writeFile(tmpPath, JSON.stringify(collection, null, 2));
      await rename(tmpPath, this.artifactPath);
      this.logger.debug({ count: collection.length })`已儲存連拍紀錄`;
      return ok();
    } catch (error) {
      await rm(tmpPath, { force: true });
      return err({ type: "WRITE_FAILED", message: messageOf(error) });
    }
  }

  reject(collection: BurstCollection, indices: Iterable<number>): RejectResult {
    const valid = new Set<number>();
    const issues: RejectIssue[] = [];
    for (const index of indices) {
      if (!Number.isInteger(index) || index < 0 || index >= collection.length) {
        issues.push({
          index,
          type: "INDEX_OUT_OF_RANGE",
          message: `索引 ${index} 不存在（共 ${collection.length} 組）`,
        });
        continue;
      }
      valid.add(index);
    }

    const rejected = [...valid].sort((a, b) => a - b);
    const bursts = collection.map((burst) => [...burst]);
    // 由大到小移除，前面的索引不會位移
    for (const index of [...rejected].reverse()) {
      bursts.splice(index, 1);
    }

    return { bursts, rejected, issues };
  }

  async invalidate(): Promise<Result<void, StoreWriteError>> {
    try {
      await rm(this.artifactPath, { force: true });
      return ok();
    } catch (error) {
      return err({ type: "WRITE_FAILED", message: messageOf(error) });
    }
  }
}
