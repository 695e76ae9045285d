import { type Result, err, ok } from "~shared/utils/Result";

import type { Exif, ExifService, ReadError } from "@/services/ExifService";

export class ExifServiceFake implements ExifService {
  private readonly records: Map<string, Result<Exif, ReadError>> = new Map();
  readonly calls: string[] = [];

  async readExif(filePath: string): Promise<Result<Exif, ReadError>> {
    this.calls.push(filePath);
    const record = this.records.get(filePath);
    if (!record) {
      return err({
        type: "FILE_NOT_FOUND",
        message: `No such file: ${filePath}`,
      });
    }
    return record;
  }

  /** 設定為可讀取的影像，未給 dateTimeOriginal 代表沒有拍攝時間 */
  setExif(filePath: string, exif: Omit<Exif, "filePath"> = {}) {
    this.records.set(
      filePath,
      ok({ filePath, mimeType: "image/jpeg", ...exif })
    );
  }

  setReadError(filePath: string, error: ReadError) {
    this.records.set(filePath, err(error));
  }
}
