import { Type as t } from "@sinclair/typebox";
import type { CAC } from "cac";

import { parseConfig } from "~shared/ConfigFactory";
import { DumpWriterDefault } from "~shared/DumpWriter/DumpWriterDefault";
import type { Logger } from "~shared/Logger";
import { dispose } from "~shared/utils/Disposeable";
import { isErr } from "~shared/utils/Result";

import { getAppConfig } from "@/config";
import { imageExtensions } from "@/constants";
import { ClassificationServiceDefault } from "@/services/ClassificationServiceDefault";
import { DateResolverDefault } from "@/services/DateResolverDefault";
import { ExifServiceExifTool } from "@/services/ExifService";
import { FileSystemScannerDefault } from "@/services/FileSystemScanner";
import { MaterializeServiceDefault } from "@/services/MaterializeServiceDefault";
import { PhotoOrganizeServiceDefault } from "@/services/PhotoOrganizeServiceDefault";
import type { OrganizeMode, OrganizeModeName } from "@/types";
import { confirm, expandHome } from "@/utils/helper";

const organizeOptionsSchema = t.Object({
  target: t.String({ default: "~/pictures/photos/sorted", minLength: 1 }),
  mode: t.Union([t.Literal("by-date"), t.Literal("flat")], {
    default: "by-date",
  }),
  yes: t.Boolean({ default: false }),
});

export function toOrganizeMode(name: OrganizeModeName): OrganizeMode {
  switch (name) {
    case "by-date":
      return { kind: "by-date" };
    case "flat":
      return { kind: "flat" };
  }
}

export function registerOrganize(cli: CAC, baseLogger: Logger) {
  cli
    .command("organize <source>", "依拍攝日期將相片複製到 年/月/日 資料夾")
    .option("--target <path>", "指定目標目錄，預設 ~/pictures/photos/sorted")
    .option("--mode <mode>", "by-date（依日期分資料夾）或 flat（全部放同一層）", {
      default: "by-date",
    })
    .option("--yes", "略過確認，直接執行複製", { default: false })
    .action(async (source: string, rawOptions: Record<string, unknown>) => {
      const options = parseConfig(organizeOptionsSchema, rawOptions);
      const logger = baseLogger.extend("organize", { source, options });
      const reporter = new DumpWriterDefault(logger, getAppConfig().REPORT_DIR);

      const sourceRoot = expandHome(source);
      const targetRoot = expandHome(options.target);
      const mode = toOrganizeMode(options.mode);
      logger.info({
        emoji: "📁",
      })`來源: ${sourceRoot} → 目標: ${targetRoot}（${mode.kind}）`;

      // 1) 掃描檔案
      const scanner = new FileSystemScannerDefault();
      const scanRes = await scanner.scan(sourceRoot, {
        allowExts: imageExtensions,
      });
      if (isErr(scanRes)) {
        logger.error({
          emoji: "❌",
          error: scanRes.error,
        })`掃描來源目錄失敗`;
        process.exitCode = 1;
        return;
      }
      const filePaths = scanRes.value;
      logger.info({
        emoji: "🔎",
        count: filePaths.length,
      })`掃描完成，共 ${filePaths.length} 個影像檔案`;

      // 2) 確認
      const proceed =
        filePaths.length === 0 ||
        options.yes ||
        (await confirm(
          `即將複製 ${filePaths.length} 個檔案到 ${targetRoot}，是否繼續？ [y/N] `
        ));
      if (!proceed) {
        logger.warn({
          emoji: "⏹️",
        })`使用者取消`;
        return;
      }

      // 3) 判定日期、分類、複製
      const exifService = new ExifServiceExifTool();
      const organizer = new PhotoOrganizeServiceDefault({
        dateResolver: new DateResolverDefault({ exifService, logger }),
        classificationService: new ClassificationServiceDefault(),
        materializeService: new MaterializeServiceDefault({ logger }),
        logger,
      });
      const controller = new AbortController();
      const onSigint = () => {
        logger.warn({ emoji: "⏹️" })`收到中斷訊號，處理完目前檔案後停止`;
        controller.abort();
      };
      process.once("SIGINT", onSigint);

      try {
        const result = await organizer.organize({
          filePaths,
          destinationRoot: targetRoot,
          mode,
          signal: controller.signal,
          progress: (completed, total) => {
            if (completed === total || completed % 50 === 0) {
              logger.info({
                event: "progress",
                emoji: "⏳",
              })`進度 ${completed}/${total}`;
            }
          },
        });

        if (isErr(result)) {
          logger.error({
            emoji: "🧨",
            error: result.error,
          })`目的資料夾無法寫入，中止：${result.error.directory}`;
          process.exitCode = 1;
          return;
        }

        const summary = result.value;
        await reporter.dump("organize-summary", summary);
        logger.info({
          event: "done",
          found: summary.found,
          copied: summary.copied,
          renamed: summary.renamed,
          skipped: summary.skipped.length,
          failed: summary.failed.length,
        })`共 ${summary.found} 個檔案，分類 ${summary.classified} 個（EXIF ${summary.dateSources.exif}、修改時間 ${summary.dateSources.mtime}），複製 ${summary.copied} 個，略過 ${summary.skipped.length} 個，失敗 ${summary.failed.length} 個`;
        for (const entry of summary.skipped) {
          logger.warn({ type: entry.type })`略過 ${entry.sourcePath}：${entry.message}`;
        }
        if (summary.aborted) {
          logger.warn({ emoji: "⏹️" })`處理已中止，已複製的檔案保留`;
        }
        if (summary.failed.length > 0) process.exitCode = 1;
      } finally {
        process.off("SIGINT", onSigint);
        await dispose(exifService);
      }
    });
}
