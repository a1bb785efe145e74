import type { Result } from "~shared/utils/Result";

import type { BurstCollection } from "@/types";

export type StoreReadError =
  | { type: "NOT_FOUND"; message: string }
  | { type: "READ_FAILED"; message: string }
  | { type: "CORRUPT"; message: string };

export type StoreWriteError = { type: "WRITE_FAILED"; message: string };

export type RejectIssue = {
  index: number;
  type: "INDEX_OUT_OF_RANGE";
  message: string;
};

export interface RejectResult {
  bursts: BurstCollection;
  /** 實際被移除的索引（以移除前的位置計），由小到大 */
  rejected: number[];
  issues: RejectIssue[];
}

export interface BurstStore {
  exists(): Promise<boolean>;

  load(): Promise<Result<BurstCollection, StoreReadError>>;

  /** 覆寫整份紀錄；先寫入暫存檔再 rename，不會留下寫一半的檔案 */
  save(collection: BurstCollection): Promise<Result<void, StoreWriteError>>;

  /**
   * 依索引移除連拍，不修改傳入的 collection，也不會自動存檔。
   * 所有索引都以移除前的位置解讀；超出範圍的索引列入 issues，不影響其他索引。
   */
  reject(collection: BurstCollection, indices: Iterable<number>): RejectResult;

  /** 刪除紀錄檔，下次執行時會重新偵測 */
  invalidate(): Promise<Result<void, StoreWriteError>>;
}
