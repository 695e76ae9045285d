import { mkdir, readdir, rm, utimes, writeFile } from "node:fs/promises";
import path from "node:path";

/** 重建 test/tmp/<name>，回傳其路徑 */
export async function resetTmpDir(name: string) {
  const dir = path.join("test/tmp", name);
  await rm(dir, { recursive: true, force: true });
  await mkdir(dir, { recursive: true });
  return dir;
}

/** 建立檔案並設定修改時間 */
export async function writeFileAt(
  filePath: string,
  content: string,
  mtime: Date
) {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, content);
  await utimes(filePath, mtime, mtime);
}

/** 遞迴列出目錄下所有檔案，回傳排序過的相對路徑（以 / 分隔） */
export async function listFiles(dir: string): Promise<string[]> {
  const result: string[] = [];
  const walk = async (current: string) => {
    const dirents = await readdir(current, { withFileTypes: true });
    for (const d of dirents) {
      const full = path.join(current, d.name);
      if (d.isDirectory()) await walk(full);
      else result.push(path.relative(dir, full).split(path.sep).join("/"));
    }
  };
  await walk(dir);
  return result.sort();
}
