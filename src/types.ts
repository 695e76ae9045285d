import type { organizeModes } from "./constants";

/** 不含時間與時區的日曆日期，month 為 1-12 */
export type CalendarDate = {
  year: number;
  month: number;
  day: number;
};

export type DateSource = "exif" | "mtime";

type ImageRecordBase = {
  /** 在輸入清單中的位置，用於排序與命名衝突的先後判定 */
  sequence: number;
  sourcePath: string;
  baseName: string;
};

export type ResolvedImageRecord = ImageRecordBase & {
  status: "resolved";
  resolvedDate: CalendarDate;
  dateSource: DateSource;
};

export type UnreadableImageRecord = ImageRecordBase & {
  status: "unreadable";
  issue: FileIssue;
};

export type ImageRecord = ResolvedImageRecord | UnreadableImageRecord;

export type OrganizeModeName = (typeof organizeModes)[number];

export type OrganizeMode = { kind: "by-date" } | { kind: "flat" };

export type FileIssueType =
  | "UNREADABLE_IMAGE"
  | "METADATA_PARSE_FAILED"
  | "COPY_FAILED";

export type FileIssue = {
  type: FileIssueType;
  message: string;
};

export type ProgressSink = (completed: number, total: number) => void;
