import { Type as t } from "@sinclair/typebox";

import { buildConfigFactoryEnv } from "../ConfigFactory";
import { LoggerConsole } from "../Logger";

const getTestLoggerConfig = buildConfigFactoryEnv(
  t.Object({
    TEST_LOG_LEVEL: t.Union(
      [
        t.Literal("trace"),
        t.Literal("debug"),
        t.Literal("info"),
        t.Literal("warn"),
        t.Literal("error"),
      ],
      { default: "error" }
    ),
  })
);

/** 測試用 logger，預設只輸出 error，可用 TEST_LOG_LEVEL 調整 */
export function buildTestLogger() {
  return new LoggerConsole(getTestLoggerConfig().TEST_LOG_LEVEL);
}
