import type { CAC } from "cac";
import path from "node:path";

import { DumpWriterDefault } from "~shared/DumpWriter/DumpWriterDefault";
import type { Logger } from "~shared/Logger";
import { isErr } from "~shared/utils/Result";

import { getAppConfig } from "@/config";
import { FileSystemScannerDefault } from "@/services/FileSystemScanner";
import { ImagesetGroupingServiceDefault } from "@/services/ImagesetGroupingServiceDefault";
import {
  type ImagesetSummary,
  summarizeImagesets,
} from "@/services/ImagesetSummary";
import { expandHome, parseExtList } from "@/utils/helper";

type GroupOptions = {
  exts?: string;
  recursive?: boolean;
  report?: boolean;
};

export function registerGroupImagesets(cli: CAC, baseLogger: Logger) {
  cli
    .command("group <folder>", "將資料夾內的檔案依序列樣板分組")
    .option("--exts <list>", "副檔名白名單（逗號分隔），預設不限")
    .option("--recursive", "遞迴掃描子資料夾", { default: false })
    .option("--report", "輸出 JSON 報告", { default: false })
    .action(async (folder: string, options: GroupOptions) => {
      const logger = baseLogger.extend("group", { folder });
      const root = expandHome(folder);

      // 1) 掃描檔案
      const scanner = new FileSystemScannerDefault();
      const scanRes = await scanner.scanFiles(root, {
        recursive: options.recursive,
        allowExts: parseExtList(options.exts),
      });
      if (isErr(scanRes)) {
        logger.error({ error: scanRes.error })`掃描 ${root} 失敗`;
        process.exit(1);
      }
      const filePaths = scanRes.value;
      if (filePaths.length === 0) {
        logger.warn("資料夾內沒有可處理的檔案");
        return;
      }
      logger.info({
        emoji: "🔎",
        count: filePaths.length,
      })`掃描完成，共 ${filePaths.length} 個檔案`;

      // 2) 依目錄分組，樣板只比對檔名
      const byDir = filePaths.reduce((map, p) => {
        const dir = path.dirname(p);
        const names = map.get(dir) ?? [];
        names.push(path.basename(p));
        map.set(dir, names);
        return map;
      }, new Map<string, string[]>());

      const grouper = new ImagesetGroupingServiceDefault();
      const imagesets: Array<ImagesetSummary & { directory: string }> = [];
      for (const [directory, names] of byDir.entries()) {
        for (const summary of summarizeImagesets(grouper.group(names))) {
          imagesets.push({ ...summary, directory });
        }
      }

      // 3) 輸出結果
      for (const set of imagesets) {
        const location = path.join(set.directory, set.key);
        if (!set.isSequence) {
          logger.info({ emoji: "📄" })`${location} (單一檔案)`;
          continue;
        }
        const log = set.missingCount > 0n ? logger.warn : logger.info;
        log({
          emoji: "🎞️",
          missing: set.missing,
          duplicates: set.duplicates,
        })`${location} 共 ${set.count} 個，序號 ${set.first}-${set.last}，缺 ${set.missingCount} 個`;
      }
      logger.info({
        event: "done",
        imagesetCount: imagesets.filter((s) => s.isSequence).length,
        singleCount: imagesets.filter((s) => !s.isSequence).length,
      })`分組完成`;

      if (options.report) {
        const reporter = new DumpWriterDefault(
          logger,
          getAppConfig().IMAGESET_REPORT_DIR
        );
        await reporter.dump("imagesets", { root, imagesets });
      }
    });
}
