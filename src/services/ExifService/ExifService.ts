import type { Result } from "~shared/utils/Result";

import type { Exif, ReadError } from "./Exif";

export interface ExifService {
  /**
   * 嘗試將檔案當作影像讀取，並取出拍攝時間欄位。
   * 檔案無法解析為影像時回傳錯誤；影像沒有拍攝時間時 dateTimeOriginal 為 undefined。
   */
  readExif(filePath: string): Promise<Result<Exif, ReadError>>;
}
