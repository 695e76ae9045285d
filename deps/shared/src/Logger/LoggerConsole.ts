import kleur from "kleur";

import type { AsyncDisposableResource } from "../utils/Disposeable";
import {
  type LogContext,
  type LogLevel,
  type LogMethod,
  type LogRecord,
  type LogTransport,
  type Logger,
  type SerializedError,
  type TemplateLog,
  logLevels,
} from "./Logger";

export type EmojiMap = Record<string, string>;

export const defaultEmojiMap: EmojiMap = {
  trace: "🔍",
  debug: "🐛",
  info: "ℹ️",
  warn: "⚠️",
  error: "❌",
  start: "🏁",
  done: "✅",
};

export class LoggerConsole implements Logger, AsyncDisposableResource {
  readonly trace: LogMethod;
  readonly debug: LogMethod;
  readonly info: LogMethod;
  readonly warn: LogMethod;
  readonly error: LogMethod;

  constructor(
    private readonly level: LogLevel,
    private readonly transports: LogTransport[] = [],
    private readonly context: LogContext = {},
    private readonly emojiMap: EmojiMap = defaultEmojiMap,
    private readonly path: string[] = []
  ) {
    this.trace = this.buildMethod("trace");
    this.debug = this.buildMethod("debug");
    this.info = this.buildMethod("info");
    this.warn = this.buildMethod("warn");
    this.error = this.buildMethod("error");
  }

  extend(namespace: string, context: LogContext = {}): LoggerConsole {
    return new LoggerConsole(
      this.level,
      this.transports,
      { ...this.context, ...context },
      this.emojiMap,
      [...this.path, namespace]
    );
  }

  append(context: LogContext): LoggerConsole {
    return new LoggerConsole(
      this.level,
      this.transports,
      { ...this.context, ...context },
      this.emojiMap,
      this.path
    );
  }

  /** transport 與所有子 logger 共用 */
  attachTransport(transport: LogTransport) {
    this.transports.push(transport);
  }

  async [Symbol.asyncDispose]() {
    const transports = this.transports.splice(0);
    for (const transport of transports) {
      await transport[Symbol.asyncDispose]();
    }
  }

  private buildMethod(level: LogLevel): LogMethod {
    const emit = (context: LogContext, message: string, colored?: string) =>
      this.emit(level, context, message, colored ?? message);

    function method(context: LogContext, message: string): void;
    function method(message: string): void;
    function method(context?: LogContext): TemplateLog;
    function method(
      first?: LogContext | string,
      message?: string
    ): TemplateLog | void {
      if (typeof first === "string") {
        emit({}, first);
        return;
      }
      if (message !== undefined) {
        emit(first ?? {}, message);
        return;
      }
      const base: LogContext = first ?? {};
      return (strings, ...values) => {
        const context: LogContext = { ...base };
        let plain = strings[0] ?? "";
        let colored = plain;
        values.forEach((value, index) => {
          context[`__${index}`] = value;
          plain += formatValue(value) + (strings[index + 1] ?? "");
          colored +=
            kleur.green(formatValue(value)) + (strings[index + 1] ?? "");
        });
        emit(context, plain, colored);
      };
    }

    return method;
  }

  private emit(
    level: LogLevel,
    callContext: LogContext,
    message: string,
    coloredMessage: string
  ) {
    if (logLevels.indexOf(level) < logLevels.indexOf(this.level)) return;

    const { emoji: callEmoji, event, error, ...callRest } = callContext;
    const {
      emoji: inheritedEmoji,
      event: _inheritedEvent,
      error: _inheritedError,
      ...inheritedRest
    } = this.context;
    const context: Record<string, unknown> = { ...inheritedRest, ...callRest };
    const emoji = this.resolveEmoji(level, callEmoji, event, inheritedEmoji);
    const serializedError = error === undefined ? undefined : serialize(error);
    const err =
      serializedError ??
      (level === "error" ? captureStack(new Error(message)) : undefined);
    const path = this.path.join(":");
    const label = [path, event ?? level].filter(Boolean).join(":");

    const contextJson =
      Object.keys(context).length > 0
        ? ` ${kleur.gray(stringify(context))}`
        : "";
    const line = `${emoji} ${label}: ${coloredMessage}${contextJson}`;
    const writer = consoleWriter(level);
    if (level === "error" && err?.stack) {
      writer(`${line}\n${kleur.gray(err.stack)}`);
    } else {
      writer(line);
    }

    const record: LogRecord = {
      time: new Date().toISOString(),
      level,
      path,
      event: typeof event === "string" ? event : undefined,
      msg: message,
      context,
      err,
    };
    for (const transport of this.transports) {
      transport.write(record);
    }
  }

  private resolveEmoji(
    level: LogLevel,
    callEmoji: unknown,
    event: unknown,
    inheritedEmoji: unknown
  ) {
    if (typeof callEmoji === "string") return callEmoji;
    if (typeof event === "string" && this.emojiMap[event]) {
      return this.emojiMap[event];
    }
    if (level === "warn" || level === "error") return this.emojiMap[level];
    if (typeof inheritedEmoji === "string") return inheritedEmoji;
    return this.emojiMap[level] ?? "";
  }
}

function consoleWriter(level: LogLevel): (line: string) => void {
  switch (level) {
    case "trace":
    case "debug":
      return (line) => console.debug(line);
    case "info":
      return (line) => console.info(line);
    case "warn":
      return (line) => console.warn(line);
    case "error":
      return (line) => console.error(line);
  }
}

function formatValue(value: unknown) {
  if (typeof value === "string") return value;
  if (value instanceof Error) return value.message;
  if (typeof value === "object" && value !== null) return stringify(value);
  return String(value);
}

function serialize(error: unknown): SerializedError {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  if (typeof error === "object" && error !== null) {
    const type = "type" in error ? String(error.type) : "Error";
    const message = "message" in error ? String(error.message) : "";
    return { name: type, message: message || stringify(error) };
  }
  return { name: "Error", message: String(error) };
}

/** 移除 logger 自身的呼叫堆疊，讓第一行指向呼叫端 */
function captureStack(error: Error): SerializedError {
  const lines = (error.stack ?? "").split("\n");
  const callerLines = lines.filter(
    (line, index) => index === 0 || !line.includes("LoggerConsole.ts")
  );
  return {
    name: error.name,
    message: error.message,
    stack: callerLines.join("\n"),
  };
}

function stringify(value: unknown) {
  return JSON.stringify(value, (_key, v: unknown) => {
    if (v instanceof Error) return { name: v.name, message: v.message };
    if (typeof v === "bigint") return v.toString();
    return v;
  });
}
