import { mkdtemp, readFile, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterAll, beforeAll, describe, expect, test, vi } from "vitest";

import {
  LoggerConsole,
  RfsTransport,
  createDefaultLoggerFromEnv,
} from "~shared/Logger";
import { dispose } from "~shared/utils/Disposeable";

async function readJsonLines(filePath: string) {
  const text = await readFile(filePath, "utf8");
  return text
    .trim()
    .split("\n")
    .map((line): Record<string, unknown> => JSON.parse(line));
}

describe("RfsTransport", () => {
  let tmpDir = "";

  beforeAll(async () => {
    tmpDir = await mkdtemp(path.join(os.tmpdir(), "rfs-"));
    vi.spyOn(console, "info").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterAll(async () => {
    vi.restoreAllMocks();
    await rm(tmpDir, { recursive: true, force: true });
  });

  test("以 JSON Lines 寫入日誌檔", async () => {
    const logger = new LoggerConsole("debug");
    const transport = new RfsTransport({
      filename: "test.log",
      rfs: { path: tmpDir },
    });
    logger.attachTransport(transport);

    logger.info({ event: "start", emoji: "🌟", userId: "abc" }, "啟動");
    logger.error({ error: new Error("爆炸了"), event: "error" }, "錯誤");
    await dispose(transport);

    const [info, error] = await readJsonLines(path.join(tmpDir, "test.log"));
    expect(info).toMatchObject({
      level: "info",
      event: "start",
      msg: "啟動",
      userId: "abc",
    });
    expect(info.err).toBeUndefined();
    expect(error).toMatchObject({
      level: "error",
      event: "error",
      msg: "錯誤",
      err: { name: "Error", message: "爆炸了" },
    });
  });

  test("LOG_FILE 設定時根 logger 寫入檔案", async () => {
    const logger = createDefaultLoggerFromEnv(() => ({
      LOG_LEVEL: "debug",
      LOG_FILE: "app.log",
      LOG_DIR: tmpDir,
    }));

    logger.extend("materialize").info({ count: 3n })`共 ${3} 個檔案`;
    await dispose(logger);

    const lines = await readJsonLines(path.join(tmpDir, "app.log"));
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: "info",
      path: "materialize",
      msg: "共 3 個檔案",
      count: "3",
      __0: 3,
    });
  });
});
