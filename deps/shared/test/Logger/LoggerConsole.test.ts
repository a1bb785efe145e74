import kleur from "kleur";
import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

import {
  type LogRecord,
  type LogTransport,
  LoggerConsole,
  defaultEmojiMap,
} from "~shared/Logger";
import { RfsTransport } from "~shared/Logger/RfsTransport";
import { dispose } from "~shared/utils/Disposeable";

const logDir = "test/tmp/logs";

/** 攔截 console 輸出，每次呼叫記成一行 */
function spyConsole() {
  const out: string[] = [];
  const errorOut: string[] = [];
  const push =
    (target: string[]) =>
    (...args: unknown[]) => {
      target.push(args.map(String).join(" "));
    };
  vi.spyOn(console, "debug").mockImplementation(push(out));
  vi.spyOn(console, "info").mockImplementation(push(out));
  vi.spyOn(console, "warn").mockImplementation(push(out));
  vi.spyOn(console, "error").mockImplementation(push(errorOut));
  return { out, errorOut };
}

describe("LoggerConsole", () => {
  let consoleOut: ReturnType<typeof spyConsole>;

  beforeEach(() => {
    consoleOut = spyConsole();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  test("呼叫時指定的 emoji 優先，其餘欄位輸出為 JSON", () => {
    const logger = new LoggerConsole("debug", [], {}, defaultEmojiMap);
    logger.info({ event: "start", emoji: "🌟", burstIndex: 3 }, "啟動");
    expect(consoleOut.out).toEqual(['🌟 start: 啟動 {"burstIndex":3}']);
  });

  test("依 event 與 level 決定 emoji", () => {
    const logger = new LoggerConsole("info", [], {}, defaultEmojiMap);
    logger.info({ event: "start" }, "偵測開始");
    logger.info({}, "一般訊息");
    logger.warn("找不到 RAW 檔");
    expect(consoleOut.out).toEqual([
      "🏁 start: 偵測開始",
      "ℹ️ info: 一般訊息",
      "⚠️ warn: 找不到 RAW 檔",
    ]);
  });

  test("低於設定等級的紀錄不輸出", () => {
    const logger = new LoggerConsole("warn", [], {}, defaultEmojiMap);
    logger.debug("debug");
    logger.info("info");
    expect(consoleOut.out).toEqual([]);
  });

  test("子 logger 繼承 emoji，只在 info 且沒有 event 時使用", () => {
    const base = new LoggerConsole("info", [], {}, defaultEmojiMap).extend(
      "scan",
      { emoji: "🌟" }
    );
    const child = base.extend("collector", { emoji: "🚀" });
    base.info()`A`;
    child.info()`B`;
    child.info({ event: "start" })`C`;
    child.warn()`D`;
    base.extend("store").info()`E`;
    expect(consoleOut.out).toEqual([
      "🌟 scan:info: A",
      "🚀 scan:collector:info: B",
      "🏁 scan:collector:start: C",
      "⚠️ scan:collector:warn: D",
      "🌟 scan:store:info: E",
    ]);
  });

  test("template 的插值會上色並記在 context", () => {
    const logger = new LoggerConsole("info", [], {}, defaultEmojiMap);
    logger.info({ event: "done" })`完成 ${10} 組連拍`;
    expect(consoleOut.out).toEqual([
      `✅ done: 完成 ${kleur.green("10")} 組連拍 {"__0":10}`,
    ]);
  });

  test("append 只合併 context，不改變路徑", () => {
    const logger = new LoggerConsole("debug", ["stitch"], {}, defaultEmojiMap);
    logger.append({ burst: 2 }).info({ event: "done" }, "完成");
    expect(consoleOut.out).toEqual(['✅ stitch:done: 完成 {"burst":2}']);
  });

  test("error 等級輸出到 stderr 並附上堆疊", () => {
    const logger = new LoggerConsole("debug", [], {}, defaultEmojiMap);
    logger.error({ error: new Error("爆炸了") }, "接圖失敗");
    expect(consoleOut.errorOut).toHaveLength(1);
    expect(consoleOut.errorOut[0]).toMatch(
      /^❌ error: 接圖失敗 \nError: 爆炸了/
    );
  });

  test("非 Error 的 error 值保留在 context", () => {
    const logger = new LoggerConsole("debug", [], {}, defaultEmojiMap);
    logger.error({ error: { type: "CORRUPT" } }, "讀取失敗");
    expect(consoleOut.errorOut[0].split("\n")[0]).toBe(
      '❌ error: 讀取失敗 {"error":{"type":"CORRUPT"}} '
    );
  });

  test("transport 收到結構化紀錄，子 logger 共用 transport", () => {
    const root = new LoggerConsole("debug", [], {}, defaultEmojiMap);
    const records: LogRecord[] = [];
    const transport: LogTransport = {
      write(record) {
        records.push(record);
      },
      async [Symbol.asyncDispose]() {},
    };
    root.attachTransport(transport);
    root.extend("stitch", { burst: 2 }).info({ event: "done" })`完成 ${1} 張`;

    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      level: "info",
      path: ["stitch"],
      event: "done",
      msg: "完成 1 張",
      context: { burst: 2, __0: 1 },
    });
  });

  test("RfsTransport 寫入 JSON lines", async () => {
    await rm(logDir, { recursive: true, force: true });
    const logger = new LoggerConsole("debug", ["cli"], {}, defaultEmojiMap);
    logger.attachTransport(
      new RfsTransport({ filename: "pano.log", rfs: { path: logDir } })
    );
    logger.info({ event: "start", root: "/photos" }, "啟動");
    logger.error({ error: new Error("爆炸了") }, "錯誤");
    await dispose(logger);

    const lines = (await readFile(`${logDir}/pano.log`, "utf8"))
      .trim()
      .split("\n")
      .map((line): unknown => JSON.parse(line));
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatchObject({
      level: "info",
      path: "cli",
      event: "start",
      msg: "啟動",
      root: "/photos",
    });
    expect(lines[1]).toMatchObject({
      level: "error",
      path: "cli",
      msg: "錯誤",
      err: { name: "Error", message: "爆炸了" },
    });
  });

  test("RfsTransport 寫檔失敗時回報一次，不拋出例外", async () => {
    const notADir = "test/tmp/logs-notadir";
    await rm(notADir, { recursive: true, force: true });
    await mkdir("test/tmp", { recursive: true });
    await writeFile(notADir, "a regular file");

    const transport = new RfsTransport({
      filename: "pano.log",
      rfs: { path: notADir },
    });
    const logger = new LoggerConsole("debug", ["cli"], {}, defaultEmojiMap);
    logger.attachTransport(transport);
    logger.info("第一筆");

    await vi.waitFor(() => expect(transport.failed).toBe(true));
    logger.info("第二筆");
    await dispose(logger);

    const reports = consoleOut.errorOut.filter((line) =>
      line.startsWith("log 檔寫入失敗: ")
    );
    expect(reports).toHaveLength(1);
    expect(consoleOut.out).toEqual(["ℹ️ cli:info: 第一筆", "ℹ️ cli:info: 第二筆"]);
    await rm(notADir, { force: true });
  });
});
