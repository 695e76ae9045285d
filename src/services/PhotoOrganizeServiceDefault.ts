import path from "node:path";

import type { Logger } from "~shared/Logger";
import { type Result, err, isErr, ok } from "~shared/utils/Result";

import type { ImageRecord, ResolvedImageRecord } from "@/types";

import type { ClassificationService } from "./ClassificationService";
import type { DateResolver } from "./DateResolver";
import type {
  DestinationUnwritable,
  MaterializeResult,
  MaterializeService,
} from "./MaterializeService";
import type {
  OrganizeFatalError,
  OrganizeRequest,
  OrganizeStage,
  OrganizeSummary,
  PhotoOrganizeService,
} from "./PhotoOrganizeService";

/**
 * 依序執行 scanning → grouping → copying。
 *
 * 每個檔案都會等前一個處理完才開始，不平行存取檔案系統。
 */
export class PhotoOrganizeServiceDefault implements PhotoOrganizeService {
  private readonly dateResolver: DateResolver;
  private readonly classificationService: ClassificationService;
  private readonly materializeService: MaterializeService;
  private readonly logger: Logger;
  private currentStage: OrganizeStage = "idle";

  constructor(deps: {
    dateResolver: DateResolver;
    classificationService: ClassificationService;
    materializeService: MaterializeService;
    logger: Logger;
  }) {
    this.dateResolver = deps.dateResolver;
    this.classificationService = deps.classificationService;
    this.materializeService = deps.materializeService;
    this.logger = deps.logger.extend("PhotoOrganizeServiceDefault");
  }

  get stage() {
    return this.currentStage;
  }

  async organize(
    request: OrganizeRequest
  ): Promise<Result<OrganizeSummary, OrganizeFatalError>> {
    const { filePaths, destinationRoot, mode, progress, signal } = request;
    const enter = (stage: OrganizeStage) => {
      this.currentStage = stage;
      this.logger.debug({ event: "stage", stage })`進入 ${stage} 階段`;
      request.onStageChange?.(stage);
    };

    enter("scanning");
    const records: ImageRecord[] = [];
    for (const [sequence, sourcePath] of filePaths.entries()) {
      if (signal?.aborted) break;
      records.push(await this.resolveRecord(sequence, sourcePath));
    }
    const scanAborted = records.length < filePaths.length;
    this.logger.info({
      emoji: "🔎",
      count: records.length,
    })`日期判定完成 ${records.length}/${filePaths.length}`;

    enter("grouping");
    const index = this.classificationService.build(records, mode);
    this.logger.info({
      emoji: "📚",
      folders: index.folders.length,
      skipped: index.skipped.length,
    })`分類完成，共 ${index.folders.length} 個目的資料夾`;

    enter("copying");
    const materialized: Result<MaterializeResult, DestinationUnwritable> =
      scanAborted
        ? ok<MaterializeResult>({
            copied: [],
            issues: [],
            processed: 0,
            aborted: true,
          })
        : await this.materializeService.materialize(
            index,
            destinationRoot,
            progress,
            { signal }
          );
    if (isErr(materialized)) {
      enter("done");
      return err(materialized.error);
    }
    const { copied, issues, aborted } = materialized.value;

    enter("done");
    const resolved = records.filter(
      (r): r is ResolvedImageRecord => r.status === "resolved"
    );
    const summary: OrganizeSummary = {
      mode: mode.kind,
      found: filePaths.length,
      classified: resolved.length,
      dateSources: {
        exif: resolved.filter((r) => r.dateSource === "exif").length,
        mtime: resolved.filter((r) => r.dateSource === "mtime").length,
      },
      copied: copied.length,
      renamed: copied.filter((c) => c.renamed).length,
      skipped: issues.filter((i) => i.type === "UNREADABLE_IMAGE"),
      failed: issues.filter((i) => i.type !== "UNREADABLE_IMAGE"),
      aborted,
    };
    return ok(summary);
  }

  private async resolveRecord(
    sequence: number,
    sourcePath: string
  ): Promise<ImageRecord> {
    const baseName = path.basename(sourcePath);
    const resolution = await this.dateResolver.resolve(sourcePath);
    if (isErr(resolution)) {
      this.logger.warn({
        event: "unreadable",
        source: sourcePath,
      })`無法讀取影像 ${sourcePath}`;
      return {
        sequence,
        sourcePath,
        baseName,
        status: "unreadable",
        issue: resolution.error,
      };
    }
    return {
      sequence,
      sourcePath,
      baseName,
      status: "resolved",
      resolvedDate: resolution.value.date,
      dateSource: resolution.value.source,
    };
  }
}
