import { getDate, getMonth, getYear } from "date-fns";

import type { CalendarDate } from "@/types";

/** 以本地時區取日期部分 */
export function toCalendarDate(time: Date): CalendarDate {
  return { year: getYear(time), month: getMonth(time) + 1, day: getDate(time) };
}

export function compareCalendarDate(a: CalendarDate, b: CalendarDate) {
  return a.year - b.year || a.month - b.month || a.day - b.day;
}

/** 目錄層級：yyyy / MM / dd */
export function calendarDateSegments(date: CalendarDate): [string, string, string] {
  return [
    String(date.year).padStart(4, "0"),
    String(date.month).padStart(2, "0"),
    String(date.day).padStart(2, "0"),
  ];
}

export function formatCalendarDate(date: CalendarDate) {
  return calendarDateSegments(date).join("-");
}
