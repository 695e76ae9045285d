import type { Result } from "~shared/utils/Result";

import type { CalendarDate, DateSource } from "@/types";

export type DateResolution = {
  date: CalendarDate;
  source: DateSource;
};

export type ResolveIssue = {
  type: "UNREADABLE_IMAGE";
  message: string;
};

export interface DateResolver {
  /**
   * 決定單一檔案的拍攝日期：
   * 1) EXIF DateTimeOriginal
   * 2) 缺少或格式錯誤時改用檔案修改時間（本地日期）
   * 3) 無法當作影像解析時回傳 UNREADABLE_IMAGE
   */
  resolve(filePath: string): Promise<Result<DateResolution, ResolveIssue>>;
}
