import type { Result } from "~shared/utils/Result";

import type { FileIssueType, ProgressSink } from "@/types";

import type { ClassificationIndex } from "./ClassificationService";

export interface MaterializeService {
  /**
   * 建立目的資料夾並逐一複製檔案，每處理完一個檔案（含略過與失敗）呼叫一次 progress。
   * 單一檔案失敗只記錄在 issues；只有目的資料夾無法建立時回傳錯誤並中止。
   */
  materialize(
    index: ClassificationIndex,
    destinationRoot: string,
    progress: ProgressSink,
    options?: MaterializeOptions
  ): Promise<Result<MaterializeResult, DestinationUnwritable>>;
}

export type MaterializeOptions = {
  /** 每個檔案處理前檢查，已中止則停止處理，已複製的檔案保留 */
  signal?: AbortSignal;
};

export type CopiedFile = {
  sourcePath: string;
  targetPath: string;
  /** 是否因檔名衝突而加上後綴 */
  renamed: boolean;
};

export type MaterializeIssue = {
  sourcePath: string;
  type: FileIssueType;
  message: string;
};

export type MaterializeResult = {
  copied: CopiedFile[];
  issues: MaterializeIssue[];
  processed: number;
  aborted: boolean;
};

export type DestinationUnwritable = {
  type: "DESTINATION_UNWRITABLE";
  directory: string;
  message: string;
};
