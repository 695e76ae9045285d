import { spawnSync } from "node:child_process";
import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import { afterAll, beforeAll, describe, expect, test } from "vitest";

import { expectErr, expectOk } from "~shared/testkit/ExpectResult";
import { dispose } from "~shared/utils/Disposeable";

import { ExifServiceExifTool } from "@/services/ExifService";

import { jpegWithDateTimeOriginal, plainPng } from "~test/fakes/ImageBytes";
import { resetTmpDir } from "~test/helpers/tmpDir";

// exiftool 在 Linux / macOS 需要系統 perl
const hasPerl =
  process.platform === "win32" || spawnSync("perl", ["-v"]).status === 0;

let tmpDir = "";
const service = new ExifServiceExifTool();

describe.skipIf(!hasPerl)("ExifServiceExifTool", () => {
  beforeAll(async () => {
    tmpDir = await resetTmpDir("exif");
  });

  afterAll(async () => {
    await dispose(service);
  });

  test("能讀取 JPEG 的 DateTimeOriginal", async () => {
    const file = join(tmpDir, "a.jpg");
    await writeFile(file, jpegWithDateTimeOriginal("2020:03:05 10:11:12"));

    const result = await service.readExif(file);
    expectOk(result);
    expect(result.value.filePath).toBe(file);
    expect(result.value.mimeType).toBe("image/jpeg");
    expect(result.value.dateTimeOriginal).toBe("2020:03:05 10:11:12");
  });

  test("沒有 EXIF 的 PNG 可讀取，但沒有拍攝時間", async () => {
    const file = join(tmpDir, "b.png");
    await writeFile(file, plainPng());

    const result = await service.readExif(file);
    expectOk(result);
    expect(result.value.mimeType).toBe("image/png");
    expect(result.value.dateTimeOriginal).toBeUndefined();
  });

  test("損壞的檔案回傳錯誤", async () => {
    const file = join(tmpDir, "c.gif");
    await writeFile(file, "this is not an image at all");

    const result = await service.readExif(file);
    expectErr(result);
    expect(["READ_FAILED", "NOT_AN_IMAGE"]).toContain(result.error.type);
  });

  test("空檔案回傳 READ_FAILED", async () => {
    const file = join(tmpDir, "e.jpg");
    await writeFile(file, "");

    const result = await service.readExif(file);
    expectErr(result);
    expect(result.error.type).toBe("READ_FAILED");
  });

  test("不存在的檔案回傳 FILE_NOT_FOUND", async () => {
    const result = await service.readExif(join(tmpDir, "missing.jpg"));
    expectErr(result);
    expect(result.error.type).toBe("FILE_NOT_FOUND");
  });
});
