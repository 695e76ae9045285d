import type {
  CalendarDate,
  ImageRecord,
  OrganizeMode,
  ResolvedImageRecord,
  UnreadableImageRecord,
} from "@/types";
import {
  compareCalendarDate,
  formatCalendarDate,
} from "@/utils/calendarDate";

import type {
  ClassificationIndex,
  ClassificationService,
  DestinationFolder,
  FileNameGroup,
  FolderTarget,
  Placement,
} from "./ClassificationService";

type DateBucket = { date: CalendarDate; records: ResolvedImageRecord[] };

const bySequence = (a: { sequence: number }, b: { sequence: number }) =>
  a.sequence - b.sequence;

export class ClassificationServiceDefault implements ClassificationService {
  build(records: ImageRecord[], mode: OrganizeMode): ClassificationIndex {
    const ordered = [...records].sort(bySequence);
    const resolved: ResolvedImageRecord[] = [];
    const skipped: UnreadableImageRecord[] = [];
    for (const record of ordered) {
      if (record.status === "resolved") resolved.push(record);
      else skipped.push(record);
    }

    const folders =
      mode.kind === "by-date"
        ? buildDateFolders(resolved)
        : buildRootFolder(resolved);

    return { mode, total: records.length, folders, skipped };
  }
}

function buildDateFolders(records: ResolvedImageRecord[]) {
  const buckets = records.reduce((map, record) => {
    const key = formatCalendarDate(record.resolvedDate);
    const bucket = map.get(key);
    if (bucket) bucket.records.push(record);
    else map.set(key, { date: record.resolvedDate, records: [record] });
    return map;
  }, new Map<string, DateBucket>());

  return [...buckets.values()]
    .sort((a, b) => compareCalendarDate(a.date, b.date))
    .map(({ date, records }) =>
      buildFolder({ kind: "date", date: { ...date } }, records)
    );
}

function buildRootFolder(records: ResolvedImageRecord[]) {
  if (records.length === 0) return [];
  return [buildFolder({ kind: "root" }, records)];
}

function buildFolder(
  target: FolderTarget,
  records: ResolvedImageRecord[]
): DestinationFolder {
  const groups = new Map<string, FileNameGroup>();
  for (const record of records) {
    const group = groups.get(record.baseName);
    if (group) group.records.push(record);
    else
      groups.set(record.baseName, {
        fileName: record.baseName,
        records: [record],
      });
  }
  const sorted = [...groups.values()].sort((a, b) =>
    bySequence(a.records[0], b.records[0])
  );
  for (const group of sorted) group.records.sort(bySequence);
  return { target, groups: sorted };
}

/** 依資料夾、檔名群組、sequence 的順序攤平成複製清單 */
export function listPlacements(index: ClassificationIndex): Placement[] {
  return index.folders.flatMap((folder) =>
    folder.groups.flatMap((group) =>
      group.records.map((record, collisionRank) => ({
        record,
        target: folder.target,
        collisionRank,
      }))
    )
  );
}
