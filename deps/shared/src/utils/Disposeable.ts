export type AsyncDisposableLike = {
  [Symbol.asyncDispose](): Promise<void>;
};

/**
 * 依序釋放資源，單一資源失敗不影響其他資源的釋放，最後再拋出第一個錯誤。
 */
export async function dispose(...targets: AsyncDisposableLike[]) {
  let firstError: unknown;
  for (const target of targets) {
    try {
      await target[Symbol.asyncDispose]();
    } catch (error) {
      firstError ??= error;
    }
  }
  if (firstError !== undefined) throw firstError;
}
