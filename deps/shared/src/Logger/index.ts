import { Type as t } from "@sinclair/typebox";

import { buildConfigFactoryEnv } from "../ConfigFactory";
import { LoggerConsole } from "./LoggerConsole";
import { RfsTransport } from "./RfsTransport";

export * from "./Logger";
export * from "./LoggerConsole";

export const getLoggerConfig = buildConfigFactoryEnv(
  t.Object({
    LOG_LEVEL: t.Union(
      [
        t.Literal("trace"),
        t.Literal("debug"),
        t.Literal("info"),
        t.Literal("warn"),
        t.Literal("error"),
      ],
      { default: "info" }
    ),
    LOG_FILE_DIR: t.Optional(t.String()),
  })
);

export function createDefaultLoggerFromEnv(
  env: NodeJS.ProcessEnv = process.env
): LoggerConsole {
  const { LOG_LEVEL, LOG_FILE_DIR } = getLoggerConfig(env);
  const logger = new LoggerConsole(LOG_LEVEL);
  if (LOG_FILE_DIR) {
    logger.attachTransport(
      new RfsTransport({ filename: "app.log", rfs: { path: LOG_FILE_DIR } })
    );
  }
  return logger;
}
