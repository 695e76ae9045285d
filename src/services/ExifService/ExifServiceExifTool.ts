import { exiftool } from "exiftool-vendored";

import { type Result, err, ok } from "~shared/utils/Result";

import { errorMessage, exists } from "@/utils/helper";

import type { Exif, ReadError } from "./Exif";
import { toRawExifString } from "./ExifDateTimeHelper";
import type { ExifService } from "./ExifService";

export class ExifServiceExifTool implements ExifService {
  async readExif(filePath: string): Promise<Result<Exif, ReadError>> {
    if (!(await exists(filePath))) {
      return err({
        type: "FILE_NOT_FOUND",
        message: `找不到檔案: ${filePath}`,
      });
    }

    try {
      const tags = await exiftool.read(filePath);
      const fields = new Map<string, unknown>(Object.entries(tags));

      const error = fields.get("Error");
      if (typeof error === "string" && error.length > 0) {
        return err({
          type: "READ_FAILED",
          message: `無法解析影像 ${filePath}: ${error}`,
        });
      }

      const mimeType = fields.get("MIMEType");
      if (typeof mimeType !== "string" || !mimeType.startsWith("image/")) {
        return err({
          type: "NOT_AN_IMAGE",
          message: `不是影像檔案: ${filePath}`,
        });
      }

      return ok({
        filePath,
        mimeType,
        dateTimeOriginal: toRawExifString(fields.get("DateTimeOriginal")),
      });
    } catch (e) {
      return err({
        type: "READ_FAILED",
        message: `讀取 EXIF 失敗: ${filePath} (${errorMessage(e)})`,
      });
    }
  }

  async [Symbol.asyncDispose]() {
    await exiftool.end();
  }
}
