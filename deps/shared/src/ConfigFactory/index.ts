import type { Static, TObject } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`設定值不合法: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export type EnvSource = () => Record<string, string | undefined>;

/**
 * 以 TypeBox schema 建立讀取環境變數的設定工廠。
 * 每次呼叫都重新讀取 source，不做快取。
 *
 * 流程：移除 schema 以外的鍵 → 型別轉換 (字串轉數字/布林) → 套用預設值 → 驗證。
 */
export function buildConfigFactoryEnv<T extends TObject>(
  schema: T,
  source: EnvSource = () => process.env
) {
  return (): Static<T> => {
    const cleaned = Value.Clean(schema, { ...source() });
    const converted = Value.Convert(schema, cleaned);
    const value = Value.Default(schema, converted);
    if (Value.Check(schema, value)) return value;

    const issues = [...Value.Errors(schema, value)].map(
      (e) => `${e.path || "/"} ${e.message}`
    );
    throw new ConfigError(issues);
  };
}
