import { format } from "date-fns";
import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~shared/Logger";
import { safeStringify } from "~shared/Logger/LoggerConsole";

import type { DumpWriter } from "./DumpWriter";

export class DumpWriterDefault implements DumpWriter {
  private readonly logger: Logger;

  constructor(
    logger: Logger,
    private readonly outputDir = "dist/reports",
    private readonly now: () => Date = () => new Date()
  ) {
    this.logger = logger.extend("dump");
  }

  async dump(name: string, data: unknown): Promise<string> {
    await mkdir(this.outputDir, { recursive: true });
    const safeName = name.replace(/[\\/:*?"<>|\s]+/g, "-");
    const filePath = path.join(
      this.outputDir,
      `${format(this.now(), "yyyyMMdd-HHmmss")}-${safeName}.json`
    );
    await writeFile(filePath, safeStringify(data, 2) + "\n", "utf8");
    this.logger.info({ emoji: "📝", file: filePath })`已輸出報告 ${filePath}`;
    return filePath;
  }
}
