export type Exif = {
  /** 檔案完整路徑 */
  filePath: string;

  /** MIME 類型，例如 image/jpeg */
  mimeType?: string;

  /** DateTimeOriginal 原始字串，正常格式為 YYYY:MM:DD HH:mm:ss */
  dateTimeOriginal?: string;
};

export type ReadError =
  | { type: "FILE_NOT_FOUND"; message: string }
  | { type: "READ_FAILED"; message: string }
  | { type: "NOT_AN_IMAGE"; message: string };
