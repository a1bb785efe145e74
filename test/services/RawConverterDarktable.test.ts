import { mkdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { beforeEach, describe, expect, test } from "vitest";

import { expectErr, expectOk } from "~shared/testkit/ExpectResult";
import { buildTestLogger } from "~shared/testkit/TestLogger";

import { FileSystemScannerDefault } from "@/services/FileSystemScanner";
import {
  RawConverterDarktable,
  StyleCatalogDarktable,
} from "@/services/RawConverter";

import { ToolRunnerFake } from "~test/fakes/ToolRunnerFake";

const tmpDir = "test/tmp/converter";
const styleDir = join(tmpDir, "styles");
const source = join(tmpDir, "DSC_0001.NEF");
const target = join(tmpDir, "Jpeg", "DSC_0001.jpg");

function setup() {
  const runner = new ToolRunnerFake();
  runner.on("darktable-cli", async ({ args }) => {
    await writeFile(args[1], "jpeg");
  });
  const converter = new RawConverterDarktable({
    runner,
    styles: new StyleCatalogDarktable({
      scanner: new FileSystemScannerDefault(),
      styleDir,
    }),
    logger: buildTestLogger(),
  });
  return { runner, converter };
}

describe("RawConverterDarktable", () => {
  beforeEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
    await mkdir(styleDir, { recursive: true });
    await writeFile(source, "raw");
    await writeFile(join(styleDir, "vivid.dtstyle"), "<darktable_style/>");
  });

  test("以 darktable-cli 轉檔並建立輸出資料夾", async () => {
    const { runner, converter } = setup();
    const result = await converter.convert(source, target);
    expectOk(result);
    expect(result.value).toBe("converted");
    expect(runner.calls).toEqual([
      { command: "darktable-cli", args: [source, target], options: undefined },
    ]);
  });

  test("指定 style 時加上 --style 參數", async () => {
    const { runner, converter } = setup();
    const result = await converter.convert(source, target, { style: "vivid" });
    expectOk(result);
    expect(runner.calls[0].args).toEqual([
      source,
      target,
      "--style-overwrite",
      "--style",
      "vivid",
    ]);
  });

  test("找不到 style → INVALID_STYLE，不執行 darktable-cli", async () => {
    const { runner, converter } = setup();
    const result = await converter.convert(source, target, { style: "mono" });
    expectErr(result);
    expect(result.error.type).toBe("INVALID_STYLE");
    expect(runner.calls).toEqual([]);
  });

  test("目標已存在時略過，overwrite 時重新轉檔", async () => {
    const { runner, converter } = setup();
    await mkdir(join(tmpDir, "Jpeg"), { recursive: true });
    await writeFile(target, "old");

    const skipped = await converter.convert(source, target);
    expectOk(skipped);
    expect(skipped.value).toBe("skipped");
    expect(runner.calls).toEqual([]);

    const converted = await converter.convert(source, target, {
      overwrite: true,
    });
    expectOk(converted);
    expect(converted.value).toBe("converted");
    expect(runner.commands()).toEqual(["darktable-cli"]);
  });

  test("darktable-cli 結束代碼非 0 → NON_ZERO_EXIT", async () => {
    const { runner, converter } = setup();
    runner.failOn("darktable-cli", 2);
    const result = await converter.convert(source, target);
    expectErr(result);
    expect(result.error).toMatchObject({
      type: "NON_ZERO_EXIT",
      command: "darktable-cli",
      exitCode: 2,
    });
  });

  test("執行成功但沒有輸出 → OUTPUT_MISSING", async () => {
    const { runner, converter } = setup();
    runner.on("darktable-cli", () => undefined);
    const result = await converter.convert(source, target);
    expectErr(result);
    expect(result.error.type).toBe("OUTPUT_MISSING");
  });

  test("無法建立輸出資料夾 → IO_FAILED，不執行 darktable-cli", async () => {
    const { runner, converter } = setup();
    const blocked = join(tmpDir, "blocked");
    await writeFile(blocked, "a regular file");

    const result = await converter.convert(
      source,
      join(blocked, "DSC_0001.jpg")
    );
    expectErr(result);
    expect(result.error).toMatchObject({ type: "IO_FAILED", path: blocked });
    expect(runner.calls).toEqual([]);
  });
});
