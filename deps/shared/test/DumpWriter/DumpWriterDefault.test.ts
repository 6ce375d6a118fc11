import { mkdtemp, readFile, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterAll, beforeAll, describe, expect, test } from "vitest";

import { DumpWriterDefault } from "~shared/DumpWriter/DumpWriterDefault";
import { LoggerConsole } from "~shared/Logger";

describe("DumpWriterDefault", () => {
  let tmpDir = "";

  beforeAll(async () => {
    tmpDir = await mkdtemp(path.join(os.tmpdir(), "dump-"));
  });

  afterAll(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  test("以時間戳與名稱寫出 JSON", async () => {
    const outputDir = path.join(tmpDir, "reports");
    const writer = new DumpWriterDefault(
      new LoggerConsole("error"),
      outputDir,
      () => new Date(2024, 0, 2, 3, 4, 5)
    );

    const filePath = await writer.dump("image sets", {
      grouping: new Map([["a_###.img", [1, 2]]]),
      total: 2,
    });

    expect(filePath).toBe(path.join(outputDir, "20240102-030405-image-sets.json"));
    const content = JSON.parse(await readFile(filePath, "utf8"));
    expect(content).toEqual({ grouping: { "a_###.img": [1, 2] }, total: 2 });
  });
});
