import { type Static, type TObject, Type as t } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`設定值不合法：${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

/**
 * 以 typebox schema 解析設定值。
 * 依序套用預設值、型別轉換（例如 "true" → true、"3" → 3），最後驗證。
 */
export function parseConfig<T extends TObject>(
  schema: T,
  source: Record<string, unknown>
): Static<T> {
  const picked: Record<string, unknown> = {};
  for (const key of Object.keys(schema.properties)) {
    const value = source[key];
    if (value !== undefined && value !== "") picked[key] = value;
  }
  const value = Value.Convert(schema, Value.Default(schema, picked));
  if (Value.Check(schema, value)) return value;
  const issues = [...Value.Errors(schema, value)].map(
    (e) => `${e.path || "/"} ${e.message}`
  );
  throw new ConfigError(issues);
}

/** 建立從環境變數讀取設定的 factory */
export function buildConfigFactoryEnv<T extends TObject>(schema: T) {
  return (env: NodeJS.ProcessEnv = process.env): Static<T> =>
    parseConfig(schema, env);
}

/** 接受 "true" / "false" / "1" / "0" 的布林環境變數 */
export function envBoolean() {
  return t.Boolean();
}
