import type { Result } from "~shared/utils/Result";

import type { BurstCollection } from "@/types";

import type { StoreReadError, StoreWriteError } from "./BurstStore";
import type { CollectError } from "./CaptureCollector";

export interface BurstSessionService {
  /**
   * 有連拍紀錄就直接載入；沒有則讀取所有 RAW、偵測連拍並存檔。
   * rescan 會先清除既有紀錄。
   */
  open(options?: {
    rescan?: boolean;
  }): Promise<Result<BurstSession, SessionError>>;
}

export type BurstSession = {
  bursts: BurstCollection;
  /** 本次是否重新偵測 */
  detected: boolean;
};

export type SessionError = CollectError | StoreReadError | StoreWriteError;
