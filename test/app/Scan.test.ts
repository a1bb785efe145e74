import { cac } from "cac";
import { mkdir, rm } from "node:fs/promises";
import { beforeEach, describe, expect, test } from "vitest";

import { type LogRecord, LoggerConsole, defaultEmojiMap } from "~shared/Logger";

import { registerScan } from "@/app/Scan";

const root = "test/tmp/scan-command";

async function runScan(args: string[]) {
  const records: LogRecord[] = [];
  const logger = new LoggerConsole("warn", [], {}, defaultEmojiMap);
  logger.attachTransport({
    write(record) {
      records.push(record);
    },
    async [Symbol.asyncDispose]() {},
  });
  const cli = cac("pano");
  registerScan(cli, logger);
  cli.parse(["node", "pano", "scan", "--root", root, ...args], { run: false });
  await cli.runMatchedCommand();
  return records;
}

describe("scan", () => {
  beforeEach(async () => {
    await rm(root, { recursive: true, force: true });
    await mkdir(root, { recursive: true });
  });

  test("載入既有紀錄時提示 --gap 未套用", async () => {
    expect(await runScan(["--gap", "9"])).toEqual([]);

    const records = await runScan(["--gap", "9"]);
    expect(records.map((r) => [r.level, r.path, r.msg])).toEqual([
      [
        "warn",
        ["scan"],
        "已載入既有的連拍紀錄，--gap 未套用；需要重新偵測請加上 --rescan",
      ],
    ]);
  });

  test("搭配 --rescan 時重新偵測，不提示", async () => {
    expect(await runScan([])).toEqual([]);
    expect(await runScan(["--rescan", "--gap", "9"])).toEqual([]);
  });
});
