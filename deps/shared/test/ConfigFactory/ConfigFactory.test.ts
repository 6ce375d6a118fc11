import { Type as t } from "@sinclair/typebox";
import { describe, expect, test } from "vitest";

import { ConfigError, buildConfigFactoryEnv } from "~shared/ConfigFactory";

const schema = t.Object({
  REPORT_DIR: t.String({ default: "dist/reports" }),
  MAX_FILES: t.Optional(t.Number()),
  VERBOSE: t.Optional(t.Boolean()),
  MODE: t.Union([t.Literal("fast"), t.Literal("full")], { default: "full" }),
});

describe("buildConfigFactoryEnv", () => {
  test("套用預設值並忽略 schema 以外的變數", () => {
    const getConfig = buildConfigFactoryEnv(schema, () => ({
      PATH: "/usr/bin",
    }));

    expect(getConfig()).toEqual({ REPORT_DIR: "dist/reports", MODE: "full" });
  });

  test("環境變數字串轉換為數字與布林", () => {
    const getConfig = buildConfigFactoryEnv(schema, () => ({
      REPORT_DIR: "/tmp/reports",
      MAX_FILES: "14",
      VERBOSE: "true",
      MODE: "fast",
    }));

    expect(getConfig()).toEqual({
      REPORT_DIR: "/tmp/reports",
      MAX_FILES: 14,
      VERBOSE: true,
      MODE: "fast",
    });
  });

  test("每次呼叫重新讀取來源", () => {
    const env: Record<string, string | undefined> = { MODE: "fast" };
    const getConfig = buildConfigFactoryEnv(schema, () => env);

    expect(getConfig().MODE).toBe("fast");
    env.MODE = "full";
    expect(getConfig().MODE).toBe("full");
  });

  test("不合法的值丟出 ConfigError", () => {
    const getConfig = buildConfigFactoryEnv(schema, () => ({
      MAX_FILES: "many",
      MODE: "slow",
    }));

    expect(getConfig).toThrow(ConfigError);
    try {
      getConfig();
    } catch (e) {
      expect(e).toBeInstanceOf(ConfigError);
      if (e instanceof ConfigError) {
        expect(e.issues.some((i) => i.startsWith("/MAX_FILES"))).toBe(true);
        expect(e.issues.some((i) => i.startsWith("/MODE"))).toBe(true);
      }
    }
  });
});
