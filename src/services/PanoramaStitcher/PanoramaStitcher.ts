import type { Result } from "~shared/utils/Result";

import type { ConvertError } from "../RawConverter";
import type { ToolError } from "../ToolRunner";

export type StitchOptions = {
  style?: string;
  /** 投影名稱或索引，預設 rectilinear */
  projections?: ReadonlyArray<string | number>;
  /** 接圖前開啟 hugin 手動調整 */
  adjust?: boolean;
};

export type StitchError =
  | ConvertError
  | ToolError
  | { type: "TOO_FEW_FRAMES"; message: string }
  | { type: "INVALID_PROJECTION"; projection: string; message: string };

export interface PanoramaStitcher {
  /**
   * 將一組連拍接成全景圖，每個投影輸出一張 TIFF。
   * 已存在的輸出會略過，不重新計算。
   */
  stitch(
    frames: readonly string[],
    options?: StitchOptions
  ): Promise<Result<string[], StitchError>>;

  /** 已存在、屬於這組連拍的全景圖 */
  find(frames: readonly string[]): Promise<string[]>;
}
