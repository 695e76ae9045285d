import { readdir } from "node:fs/promises";
import path from "node:path";

import { type Result, err, ok } from "~shared/utils/Result";

import { errorMessage } from "@/utils/helper";

import type {
  FileSystemScanner,
  ScanError,
  ScanOptions,
} from "./FileSystemScanner";

export class FileSystemScannerDefault implements FileSystemScanner {
  async scan(
    rootPath: string,
    options?: ScanOptions
  ): Promise<Result<string[], ScanError>> {
    const allowExts = options?.allowExts ?? [];
    const isRecursive = options?.recursive ?? true;
    const allowExtsSet = new Set(
      allowExts.map((e) =>
        e.startsWith(".") ? e.toLowerCase() : `.${e.toLowerCase()}`
      )
    );
    const accept = (name: string) =>
      allowExtsSet.size === 0 ||
      allowExtsSet.has(path.extname(name).toLowerCase());

    try {
      const files: string[] = [];
      await walk(rootPath, isRecursive, accept, files);
      return ok(files);
    } catch (e) {
      return err({
        type: "SCAN_FAILED",
        message: errorMessage(e),
      });
    }
  }
}

// 依名稱排序，讓輸出順序不受檔案系統影響
async function walk(
  dir: string,
  recursive: boolean,
  accept: (name: string) => boolean,
  out: string[]
) {
  const dirents = await readdir(dir, { withFileTypes: true });
  dirents.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  for (const d of dirents) {
    const fullPath = path.join(dir, d.name);
    if (d.isDirectory()) {
      if (recursive) await walk(fullPath, recursive, accept, out);
      continue;
    }
    if (d.isFile() && accept(d.name)) out.push(fullPath);
  }
}
