import type { Result } from "~shared/utils/Result";

import type {
  DateSource,
  FileIssueType,
  OrganizeMode,
  ProgressSink,
} from "@/types";

import type { DestinationUnwritable } from "./MaterializeService";

export interface PhotoOrganizeService {
  organize(
    request: OrganizeRequest
  ): Promise<Result<OrganizeSummary, OrganizeFatalError>>;
}

export type OrganizeStage = "idle" | "scanning" | "grouping" | "copying" | "done";

export type OrganizeRequest = {
  filePaths: readonly string[];
  destinationRoot: string;
  mode: OrganizeMode;
  progress: ProgressSink;
  signal?: AbortSignal;
  onStageChange?: (stage: OrganizeStage) => void;
};

export type SummaryEntry = {
  sourcePath: string;
  type: FileIssueType;
  message: string;
};

export type OrganizeSummary = {
  mode: OrganizeMode["kind"];
  found: number;
  /** 成功決定日期、進入分類的檔案數 */
  classified: number;
  dateSources: Record<DateSource, number>;
  copied: number;
  /** 因檔名衝突而改名的檔案數 */
  renamed: number;
  skipped: SummaryEntry[];
  failed: SummaryEntry[];
  aborted: boolean;
};

export type OrganizeFatalError = DestinationUnwritable;
