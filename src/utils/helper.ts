import { access } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { stdin as input, stdout as output } from "node:process";
import { createInterface } from "node:readline/promises";

/** 展開開頭的 ~ 為家目錄 */
export function expandHome(p: string) {
  if (p === "~") return os.homedir();
  if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
  return p;
}

/** 詢問 y/N，只有 y 或 yes 視為同意 */
export async function confirm(question: string) {
  const rl = createInterface({ input, output });
  try {
    const answer = (await rl.question(question)).trim().toLowerCase();
    return answer === "y" || answer === "yes";
  } finally {
    rl.close();
  }
}

export async function exists(p: string) {
  return access(p).then(
    () => true,
    () => false
  );
}

export function messageOf(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}
