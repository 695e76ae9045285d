import { join } from "node:path";
import { beforeEach, describe, expect, test } from "vitest";

import { expectErr, expectOk } from "~shared/testkit/ExpectResult";
import { buildTestLogger } from "~shared/testkit/TestLogger";

import { DateResolverDefault } from "@/services/DateResolverDefault";

import { ExifServiceFake } from "~test/fakes/ExifServiceFake";
import { resetTmpDir, writeFileAt } from "~test/helpers/tmpDir";

let tmpDir = "";

function buildContext() {
  const exifService = new ExifServiceFake();
  const resolver = new DateResolverDefault({
    exifService,
    logger: buildTestLogger(),
  });
  return { exifService, resolver };
}

describe("DateResolverDefault", () => {
  beforeEach(async () => {
    tmpDir = await resetTmpDir("date-resolver");
  });

  test("有 DateTimeOriginal 時以其日期為準，不看修改時間", async () => {
    const { exifService, resolver } = buildContext();
    const file = join(tmpDir, "a.jpg");
    await writeFileAt(file, "a", new Date(2021, 6, 1, 12, 0, 0));
    exifService.setExif(file, { dateTimeOriginal: "2020:03:05 23:10:00" });

    const result = await resolver.resolve(file);
    expectOk(result);
    expect(result.value).toEqual({
      date: { year: 2020, month: 3, day: 5 },
      source: "exif",
    });
  });

  test("沒有拍攝時間時使用修改時間的本地日期", async () => {
    const { exifService, resolver } = buildContext();
    const file = join(tmpDir, "b.png");
    await writeFileAt(file, "b", new Date(2021, 6, 1, 0, 30, 0));
    exifService.setExif(file, { mimeType: "image/png" });

    const result = await resolver.resolve(file);
    expectOk(result);
    expect(result.value).toEqual({
      date: { year: 2021, month: 7, day: 1 },
      source: "mtime",
    });
  });

  test.each(["2020-03-05 10:11:12", "2020:02:30 10:11:12", "    "])(
    "拍攝時間格式錯誤（%s）視同沒有拍攝時間",
    async (dateTimeOriginal) => {
      const { exifService, resolver } = buildContext();
      const file = join(tmpDir, "c.jpg");
      await writeFileAt(file, "c", new Date(2018, 11, 24, 18, 0, 0));
      exifService.setExif(file, { dateTimeOriginal });

      const result = await resolver.resolve(file);
      expectOk(result);
      expect(result.value).toEqual({
        date: { year: 2018, month: 12, day: 24 },
        source: "mtime",
      });
    }
  );

  test("無法解析為影像時回傳 UNREADABLE_IMAGE", async () => {
    const { exifService, resolver } = buildContext();
    const file = join(tmpDir, "d.gif");
    await writeFileAt(file, "not an image", new Date(2021, 0, 1));
    exifService.setReadError(file, {
      type: "READ_FAILED",
      message: "Simulated read error",
    });

    const result = await resolver.resolve(file);
    expectErr(result);
    expect(result.error).toEqual({
      type: "UNREADABLE_IMAGE",
      message: "Simulated read error",
    });
  });

  test("退回修改時間時檔案已消失也視為無法讀取", async () => {
    const { exifService, resolver } = buildContext();
    const file = join(tmpDir, "vanished.jpg");
    exifService.setExif(file);

    const result = await resolver.resolve(file);
    expectErr(result);
    expect(result.error.type).toBe("UNREADABLE_IMAGE");
  });
});
