/** 依拍攝時間排序的一組連拍，內容為來源檔案路徑 */
export type Burst = string[];

export type BurstCollection = Burst[];
