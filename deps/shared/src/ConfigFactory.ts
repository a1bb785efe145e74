import {
  type StaticDecode,
  type TObject,
  type TProperties,
  Type as t,
} from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

/**
 * 以 typebox schema 建立環境變數設定讀取器。
 * 會套用預設值、將字串轉為數字，驗證失敗時拋出 AssertError。
 * 第一次呼叫後結果會被快取。
 */
export function buildConfigFactoryEnv<T extends TProperties>(
  schema: TObject<T>,
  env: Record<string, string | undefined> = process.env
) {
  let cached: StaticDecode<TObject<T>> | undefined;
  return (): StaticDecode<TObject<T>> => {
    cached ??= Value.Parse(schema, { ...env });
    return cached;
  };
}

export function envInteger(options?: { minimum?: number; default?: number }) {
  return t.Integer(options);
}
