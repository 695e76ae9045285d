import type { AsyncDisposableResource } from "../utils/Disposeable";

export const logLevels = ["trace", "debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof logLevels)[number];

export type LogContext = {
  /** 覆寫輸出前綴的 emoji */
  emoji?: string;
  /** 事件名稱，會取代輸出中的 level 字樣 */
  event?: string;
  error?: unknown;
  [key: string]: unknown;
};

export type TemplateLog = (
  strings: TemplateStringsArray,
  ...values: unknown[]
) => void;

export interface LogMethod {
  (context: LogContext, message: string): void;
  (message: string): void;
  /** 回傳 tagged template，插值會以 `__0`、`__1`… 記錄在 context 中 */
  (context?: LogContext): TemplateLog;
}

export interface Logger {
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;

  /** 建立子 logger，namespace 以 `:` 串接在路徑後 */
  extend(namespace: string, context?: LogContext): Logger;

  /** 建立合併 context 的 logger，路徑不變 */
  append(context: LogContext): Logger;
}

export type SerializedError = {
  name: string;
  message: string;
  stack?: string;
};

export type LogRecord = {
  time: string;
  level: LogLevel;
  path: string;
  event?: string;
  msg: string;
  context: Record<string, unknown>;
  err?: SerializedError;
};

export interface LogTransport extends AsyncDisposableResource {
  write(record: LogRecord): void;
}
