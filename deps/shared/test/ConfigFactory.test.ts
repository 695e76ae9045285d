import { Type as t } from "@sinclair/typebox";
import { describe, expect, test } from "vitest";

import {
  ConfigError,
  buildConfigFactoryEnv,
  envBoolean,
  parseConfig,
} from "~shared/ConfigFactory";

const schema = t.Object({
  NAME: t.String({ default: "photos" }),
  RETRY: t.Number({ default: 3 }),
  VERBOSE: t.Optional(envBoolean()),
  MODE: t.Union([t.Literal("by-date"), t.Literal("flat")], {
    default: "by-date",
  }),
});

describe("ConfigFactory", () => {
  test("套用預設值", () => {
    expect(parseConfig(schema, {})).toEqual({
      NAME: "photos",
      RETRY: 3,
      MODE: "by-date",
    });
  });

  test("環境變數字串會轉換為對應型別，空字串視為未設定", () => {
    const getConfig = buildConfigFactoryEnv(schema);
    expect(
      getConfig({ NAME: "", RETRY: "5", VERBOSE: "true", MODE: "flat" })
    ).toEqual({ NAME: "photos", RETRY: 5, VERBOSE: true, MODE: "flat" });
  });

  test("只取 schema 中定義的欄位", () => {
    expect(parseConfig(schema, { OTHER: "x", "--": [] })).toEqual({
      NAME: "photos",
      RETRY: 3,
      MODE: "by-date",
    });
  });

  test("不合法的值丟出 ConfigError", () => {
    expect(() => parseConfig(schema, { MODE: "by-month" })).toThrow(
      ConfigError
    );
  });
});
