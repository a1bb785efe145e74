import { mkdir, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { beforeEach, describe, expect, test } from "vitest";

import { expectErr, expectOk } from "~shared/testkit/ExpectResult";
import { buildTestLogger } from "~shared/testkit/TestLogger";

import { BurstStoreJson } from "@/services/BurstStore";

const tmpDir = "test/tmp/store";
const artifactPath = join(tmpDir, ".pano", "bursts.json");

const bursts = [
  ["a1.NEF", "a2.NEF"],
  ["b1.NEF", "b2.NEF", "b3.NEF"],
  ["c1.NEF", "c2.NEF"],
  ["d1.NEF", "d2.NEF"],
];

function buildStore() {
  return new BurstStoreJson({ artifactPath, logger: buildTestLogger() });
}

describe("BurstStoreJson", () => {
  beforeEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
    await mkdir(tmpDir, { recursive: true });
  });

  test("存檔後可載入相同內容，不留下暫存檔", async () => {
    const store = buildStore();
    expect(await store.exists()).toBe(false);

    expectOk(await store.save(bursts));
    expect(await store.exists()).toBe(true);
    expect(await readdir(join(tmpDir, ".pano"))).toEqual(["bursts.json"]);

    const loaded = await store.load();
    expectOk(loaded);
    expect(loaded.value).toEqual(bursts);
  });

  test("紀錄檔為 JSON 陣列的陣列", async () => {
    const store = buildStore();
    expectOk(await store.save([["x.NEF", "y.NEF"]]));
    const text = await readFile(artifactPath, "utf8");
    expect(JSON.parse(text)).toEqual([["x.NEF", "y.NEF"]]);
  });

  test("沒有紀錄檔 → NOT_FOUND", async () => {
    const loaded = await buildStore().load();
    expectErr(loaded);
    expect(loaded.error.type).toBe("NOT_FOUND");
  });

  test("內容不是 JSON → CORRUPT", async () => {
    await mkdir(join(tmpDir, ".pano"), { recursive: true });
    await writeFile(artifactPath, "{not json");
    const loaded = await buildStore().load();
    expectErr(loaded);
    expect(loaded.error.type).toBe("CORRUPT");
  });

  test("連拍少於兩張 → CORRUPT", async () => {
    await mkdir(join(tmpDir, ".pano"), { recursive: true });
    await writeFile(artifactPath, JSON.stringify([["only.NEF"]]));
    const loaded = await buildStore().load();
    expectErr(loaded);
    expect(loaded.error.type).toBe("CORRUPT");
  });

  test("invalidate 刪除紀錄檔，重複呼叫也成功", async () => {
    const store = buildStore();
    expectOk(await store.save(bursts));
    expectOk(await store.invalidate());
    expect(await store.exists()).toBe(false);
    expectOk(await store.invalidate());
  });

  describe("reject", () => {
    test("一次剔除多個索引，皆以剔除前的位置解讀", () => {
      const result = buildStore().reject(bursts, [1, 2]);
      expect(result.bursts).toEqual([
        ["a1.NEF", "a2.NEF"],
        ["d1.NEF", "d2.NEF"],
      ]);
      expect(result.rejected).toEqual([1, 2]);
      expect(result.issues).toEqual([]);
    });

    test("索引順序與重複不影響結果", () => {
      const result = buildStore().reject(bursts, [3, 0, 3]);
      expect(result.bursts).toEqual([
        ["b1.NEF", "b2.NEF", "b3.NEF"],
        ["c1.NEF", "c2.NEF"],
      ]);
      expect(result.rejected).toEqual([0, 3]);
    });

    test("超出範圍的索引列為 issue，其餘照常剔除", () => {
      const result = buildStore().reject(bursts, [7, 1, -1]);
      expect(result.bursts).toEqual([
        ["a1.NEF", "a2.NEF"],
        ["c1.NEF", "c2.NEF"],
        ["d1.NEF", "d2.NEF"],
      ]);
      expect(result.rejected).toEqual([1]);
      expect(result.issues.map((i) => i.index)).toEqual([7, -1]);
      expect(result.issues.every((i) => i.type === "INDEX_OUT_OF_RANGE")).toBe(
        true
      );
    });

    test("不修改傳入的 collection", () => {
      const input = bursts.map((b) => [...b]);
      buildStore().reject(input, [0]);
      expect(input).toEqual(bursts);
    });
  });
});
