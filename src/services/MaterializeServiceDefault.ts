import type { Stats } from "node:fs";
import {
  constants,
  copyFile,
  mkdir,
  rm,
  stat,
  utimes,
} from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~shared/Logger";
import { type Result, err, isErr, ok } from "~shared/utils/Result";

import type { ProgressSink } from "@/types";
import { calendarDateSegments } from "@/utils/calendarDate";
import { errorMessage, exists } from "@/utils/helper";

import type {
  ClassificationIndex,
  FolderTarget,
  Placement,
} from "./ClassificationService";
import { listPlacements } from "./ClassificationServiceDefault";
import type {
  CopiedFile,
  DestinationUnwritable,
  MaterializeIssue,
  MaterializeOptions,
  MaterializeResult,
  MaterializeService,
} from "./MaterializeService";

const MAX_SUFFIX = 10_000;

/** 第 n 個候選檔名：n=0 為原檔名，其餘為 name_n.ext */
export function candidateFileName(fileName: string, n: number) {
  if (n === 0) return fileName;
  const ext = path.extname(fileName);
  const name = fileName.slice(0, fileName.length - ext.length);
  return `${name}_${n}${ext}`;
}

export function folderPath(destinationRoot: string, target: FolderTarget) {
  if (target.kind === "root") return destinationRoot;
  return path.join(destinationRoot, ...calendarDateSegments(target.date));
}

export class MaterializeServiceDefault implements MaterializeService {
  private readonly logger: Logger;

  constructor(deps: { logger: Logger }) {
    this.logger = deps.logger.extend("MaterializeServiceDefault");
  }

  async materialize(
    index: ClassificationIndex,
    destinationRoot: string,
    progress: ProgressSink,
    options: MaterializeOptions = {}
  ): Promise<Result<MaterializeResult, DestinationUnwritable>> {
    const total = index.total;
    const result: MaterializeResult = {
      copied: [],
      issues: [],
      processed: 0,
      aborted: false,
    };
    const tick = () => {
      result.processed++;
      progress(result.processed, total);
    };

    const ensured = new Set<string>();
    const ensureDir = async (dir: string) => {
      if (ensured.has(dir)) return ok();
      try {
        await mkdir(dir, { recursive: true });
        ensured.add(dir);
        return ok();
      } catch (e) {
        const error: DestinationUnwritable = {
          type: "DESTINATION_UNWRITABLE",
          directory: dir,
          message: `無法建立目的資料夾 ${dir}: ${errorMessage(e)}`,
        };
        this.logger.error({ emoji: "🧨", error })`${error.message}`;
        return err(error);
      }
    };

    if (index.mode.kind === "flat") {
      const rootRes = await ensureDir(destinationRoot);
      if (isErr(rootRes)) return rootRes;
    }

    for (const placement of listPlacements(index)) {
      if (options.signal?.aborted) return ok(this.abort(result, total));

      const dir = folderPath(destinationRoot, placement.target);
      const dirRes = await ensureDir(dir);
      if (isErr(dirRes)) return dirRes;

      const copyRes = await this.copyPlacement(dir, placement);
      if (isErr(copyRes)) {
        result.issues.push(copyRes.error);
        this.logger.error({
          event: "copy-failed",
          emoji: "💥",
          source: copyRes.error.sourcePath,
        })`${copyRes.error.message}`;
      } else {
        result.copied.push(copyRes.value);
        this.logger.info({
          event: "copied",
          emoji: "📦",
          from: copyRes.value.sourcePath,
          to: copyRes.value.targetPath,
        })`${copyRes.value.sourcePath} → ${copyRes.value.targetPath} (${result.processed + 1}/${total})`;
      }
      tick();
    }

    for (const record of index.skipped) {
      if (options.signal?.aborted) return ok(this.abort(result, total));
      result.issues.push({ sourcePath: record.sourcePath, ...record.issue });
      this.logger.warn({
        event: "skipped",
        source: record.sourcePath,
        type: record.issue.type,
      })`略過無法讀取的影像 ${record.sourcePath}: ${record.issue.message}`;
      tick();
    }

    return ok(result);
  }

  private abort(result: MaterializeResult, total: number) {
    this.logger.warn({
      event: "aborted",
      emoji: "⏹️",
    })`已中止，完成 ${result.processed}/${total}`;
    return { ...result, aborted: true };
  }

  /**
   * 從 collisionRank 對應的候選檔名開始逐一嘗試，
   * 寫入前檢查目的檔案，並以 COPYFILE_EXCL 確保不覆蓋既有檔案。
   */
  private async copyPlacement(
    dir: string,
    placement: Placement
  ): Promise<Result<CopiedFile, MaterializeIssue>> {
    const { record, collisionRank } = placement;
    const failed = (message: string): MaterializeIssue => ({
      sourcePath: record.sourcePath,
      type: "COPY_FAILED",
      message,
    });

    let source: Stats;
    try {
      source = await stat(record.sourcePath);
    } catch (e) {
      return err(failed(`無法讀取來源 ${record.sourcePath}: ${errorMessage(e)}`));
    }

    for (let n = collisionRank; n <= MAX_SUFFIX; n++) {
      const targetPath = path.join(dir, candidateFileName(record.baseName, n));
      if (await exists(targetPath)) continue;

      try {
        await copyFile(record.sourcePath, targetPath, constants.COPYFILE_EXCL);
      } catch (e) {
        if (isAlreadyExists(e)) continue;
        // EEXIST 以外的錯誤發生時，目的檔案只可能是這次建立的
        const cleanup = await rm(targetPath, { force: true }).then(
          () => "",
          (rmError: unknown) => `，且無法移除不完整的檔案: ${errorMessage(rmError)}`
        );
        return err(
          failed(
            `複製失敗 ${record.sourcePath} → ${targetPath}: ${errorMessage(e)}${cleanup}`
          )
        );
      }

      try {
        // 以秒為單位傳入，保留毫秒以下的精度
        await utimes(targetPath, source.atimeMs / 1000, source.mtimeMs / 1000);
      } catch (e) {
        this.logger.warn({
          event: "utimes-failed",
          target: targetPath,
        })`已複製但無法保留時間 ${targetPath}: ${errorMessage(e)}`;
      }

      return ok({
        sourcePath: record.sourcePath,
        targetPath,
        renamed: n > 0,
      });
    }

    return err(
      failed(`找不到可用的檔名 ${record.baseName}（已嘗試到 _${MAX_SUFFIX}）`)
    );
  }
}

function isAlreadyExists(e: unknown) {
  return e instanceof Error && "code" in e && e.code === "EEXIST";
}
