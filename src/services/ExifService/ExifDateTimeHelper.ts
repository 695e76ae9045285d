import { getDaysInMonth } from "date-fns";
import { ExifDateTime } from "exiftool-vendored";

import { type Result, err, ok } from "~shared/utils/Result";

import type { CalendarDate } from "@/types";

const RAW_BASIC_RE = /^(\d{4}):(\d{2}):(\d{2})\s+(\d{2}):(\d{2}):(\d{2})$/;

export type MetadataParseError = {
  type: "METADATA_PARSE_FAILED";
  message: string;
};

/**
 * 取出 exiftool 標籤的原始字串。
 * exiftool 對無法解析的日期會直接給字串，可解析的則是 ExifDateTime。
 */
export function toRawExifString(value: unknown): string | undefined {
  if (value instanceof ExifDateTime) {
    return value.rawValue ?? value.toExifString();
  }
  if (typeof value === "string") return value;
  return undefined;
}

/**
 * 解析 "YYYY:MM:DD HH:mm:ss"，只保留日期部分，不做時區換算。
 */
export function parseExifDate(
  raw: string
): Result<CalendarDate, MetadataParseError> {
  const m = RAW_BASIC_RE.exec(raw.trim());
  if (!m) {
    return err({
      type: "METADATA_PARSE_FAILED",
      message: `拍攝時間格式不符: ${raw}`,
    });
  }

  const [year, month, day, hour, minute, second] = m
    .slice(1)
    .map((part) => Number(part));

  if (
    year < 1 ||
    month < 1 ||
    month > 12 ||
    day < 1 ||
    day > getDaysInMonth(new Date(year, month - 1)) ||
    hour > 23 ||
    minute > 59 ||
    second > 59
  ) {
    return err({
      type: "METADATA_PARSE_FAILED",
      message: `拍攝時間不是有效日期: ${raw}`,
    });
  }

  return ok({ year, month, day });
}
