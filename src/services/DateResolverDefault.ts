import { stat } from "node:fs/promises";

import type { Logger } from "~shared/Logger";
import { type Result, err, isErr, isOk, ok } from "~shared/utils/Result";

import { toCalendarDate } from "@/utils/calendarDate";
import { errorMessage } from "@/utils/helper";

import type {
  DateResolution,
  DateResolver,
  ResolveIssue,
} from "./DateResolver";
import { type ExifService, parseExifDate } from "./ExifService";

export class DateResolverDefault implements DateResolver {
  private readonly exifService: ExifService;
  private readonly logger: Logger;

  constructor(deps: { exifService: ExifService; logger: Logger }) {
    this.exifService = deps.exifService;
    this.logger = deps.logger.extend("DateResolverDefault");
  }

  async resolve(
    filePath: string
  ): Promise<Result<DateResolution, ResolveIssue>> {
    const exif = await this.exifService.readExif(filePath);
    if (isErr(exif)) {
      return err({ type: "UNREADABLE_IMAGE", message: exif.error.message });
    }

    const raw = exif.value.dateTimeOriginal;
    if (raw !== undefined) {
      const parsed = parseExifDate(raw);
      if (isOk(parsed)) return ok({ date: parsed.value, source: "exif" });
      this.logger.debug({
        event: "metadata-fallback",
        filePath,
        issue: parsed.error,
      })`${filePath} 的拍攝時間無法解析，改用修改時間`;
    }

    try {
      const { mtime } = await stat(filePath);
      return ok({ date: toCalendarDate(mtime), source: "mtime" });
    } catch (e) {
      return err({
        type: "UNREADABLE_IMAGE",
        message: `無法讀取檔案資訊: ${filePath} (${errorMessage(e)})`,
      });
    }
  }
}
