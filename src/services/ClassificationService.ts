import type {
  CalendarDate,
  ImageRecord,
  OrganizeMode,
  ResolvedImageRecord,
  UnreadableImageRecord,
} from "@/types";

export interface ClassificationService {
  build(records: ImageRecord[], mode: OrganizeMode): ClassificationIndex;
}

/**
 * 分類結果。
 * by-date：每個日期一個 folder，依日期遞增排序。
 * flat：所有檔案放在同一個 root folder。
 */
export type ClassificationIndex = {
  mode: OrganizeMode;
  /** 輸入檔案總數，包含無法讀取的檔案 */
  total: number;
  folders: DestinationFolder[];
  /** 無法讀取而不參與分類的檔案，依輸入順序 */
  skipped: UnreadableImageRecord[];
};

export type FolderTarget =
  | { kind: "date"; date: CalendarDate }
  | { kind: "root" };

export interface DestinationFolder {
  target: FolderTarget;
  /** 依組內最小 sequence 排序 */
  groups: FileNameGroup[];
}

/** 同一目的資料夾下檔名相同、會互相衝突的檔案 */
export interface FileNameGroup {
  fileName: string;
  /** 依 sequence 排序，第一個保留原檔名 */
  records: ResolvedImageRecord[];
}

export type Placement = {
  record: ResolvedImageRecord;
  target: FolderTarget;
  /** 在檔名群組中的位置，0 代表保留原檔名 */
  collisionRank: number;
};
