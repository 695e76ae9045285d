import { readFile, rm } from "node:fs/promises";
import { join } from "node:path";
import { describe, expect, test } from "vitest";

import { DumpWriterDefault } from "~shared/DumpWriter/DumpWriterDefault";
import { buildTestLogger } from "~shared/testkit/TestLogger";

describe("DumpWriterDefault", () => {
  test("以時間與名稱命名並輸出 JSON", async () => {
    const dir = join("test", "tmp", "reports");
    await rm(dir, { recursive: true, force: true });
    const writer = new DumpWriterDefault(
      buildTestLogger(),
      dir,
      () => new Date(2024, 7, 17, 9, 5, 3)
    );

    const filePath = await writer.dump("organize summary", { copied: 2 });

    expect(filePath).toBe(join(dir, "20240817-090503-organize_summary.json"));
    expect(JSON.parse(await readFile(filePath, "utf8"))).toEqual({
      copied: 2,
    });
  });
});
