import type { CAC } from "cac";

import { DumpWriterDefault } from "~shared/DumpWriter/DumpWriterDefault";
import type { Logger } from "~shared/Logger";
import { isErr } from "~shared/utils/Result";

import { getAppConfig } from "@/config";
import { SequenceMaterializerDefault } from "@/services/SequenceMaterializerDefault";
import { expandHome } from "@/utils/helper";

type MaterializeOptions = {
  report?: boolean;
};

export function registerMaterializeSequence(cli: CAC, baseLogger: Logger) {
  cli
    .command("materialize <file>", "列出與代表檔同樣板的所有既有檔案")
    .option("--report", "輸出 JSON 報告", { default: false })
    .action(async (file: string, options: MaterializeOptions) => {
      const logger = baseLogger.extend("materialize", { file });
      const filePath = expandHome(file);

      const materializer = new SequenceMaterializerDefault({ logger });
      const result = await materializer.materialize(filePath);
      if (isErr(result)) {
        logger.error({
          error: result.error.cause,
          code: result.error.code,
        })`無法列出 ${result.error.path}：${result.error.message}`;
        process.exit(1);
      }

      const paths = result.value;
      paths.forEach((p, i) => {
        logger.info({ emoji: "🖼️" })`${i + 1}/${paths.length} ${p}`;
      });
      logger.info({ event: "done", count: paths.length })`共 ${paths.length} 個檔案`;

      if (options.report) {
        const reporter = new DumpWriterDefault(
          logger,
          getAppConfig().IMAGESET_REPORT_DIR
        );
        await reporter.dump("sequence", { file: filePath, paths });
      }
    });
}
