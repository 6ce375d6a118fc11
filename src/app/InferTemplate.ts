import type { CAC } from "cac";
import path from "node:path";

import type { Logger } from "~shared/Logger";

import { formatTemplate, toPrintfPattern } from "@/services/Template";
import { TemplateInferencerDefault } from "@/services/TemplateInferencerDefault";

export function registerInferTemplate(cli: CAC, baseLogger: Logger) {
  cli
    .command("infer <...files>", "從檔名推斷序列樣板與序號")
    .action((files: string[]) => {
      const logger = baseLogger.extend("infer");
      const inferencer = new TemplateInferencerDefault();

      for (const file of files) {
        const fileName = path.basename(file);
        const { template, index, heuristic } = inferencer.infer(fileName);
        if (!template) {
          logger.warn({ file })`${fileName} 無序號樣板`;
          continue;
        }
        logger.info({
          emoji: "🧩",
          file,
          heuristic,
          prefix: template.prefix,
          digitCount: template.digitCount,
          suffix: template.suffix,
        })`${fileName} → ${formatTemplate(template)} (${toPrintfPattern(template)}) 序號 ${index}`;
      }
    });
}
