import path from "node:path";

import type { Logger } from "~shared/Logger";
import { type Result, isErr, ok } from "~shared/utils/Result";

import {
  type DirectoryLister,
  FileSystemScannerDefault,
  type ScanError,
} from "./FileSystemScanner";
import type { SequenceMaterializer } from "./SequenceMaterializer";
import { formatTemplate, matchTemplateDigits } from "./Template";
import type { TemplateInferencer } from "./TemplateInferencer";
import { TemplateInferencerDefault } from "./TemplateInferencerDefault";

/**
 * 目錄只列一次。比對方式為「列出的檔名是否與樣板完全吻合」，
 * 結果等同於逐一檢查 0..10^d-1 的每個候選檔名，但成本只與目錄大小有關。
 * 回傳的是列出的原始檔名，不經由序號重建。
 */
export class SequenceMaterializerDefault implements SequenceMaterializer {
  private readonly inferencer: TemplateInferencer;
  private readonly scanner: DirectoryLister;
  private readonly logger: Logger;

  constructor(deps: {
    logger: Logger;
    inferencer?: TemplateInferencer;
    scanner?: DirectoryLister;
  }) {
    this.inferencer = deps.inferencer ?? new TemplateInferencerDefault();
    this.scanner = deps.scanner ?? new FileSystemScannerDefault();
    this.logger = deps.logger.extend("SequenceMaterializer");
  }

  async materialize(filePath: string): Promise<Result<string[], ScanError>> {
    const directory = path.dirname(filePath);
    const fileName = path.basename(filePath);

    const { template } = this.inferencer.infer(fileName);
    if (!template) {
      this.logger.debug({ file: filePath })`${fileName} 無序號樣板，視為單一檔案`;
      return ok([filePath]);
    }

    const listed = await this.scanner.listEntries(directory);
    if (isErr(listed)) return listed;

    // 同寬度的數字段，字串排序即為數值排序
    const matched = listed.value
      .flatMap((name) => {
        const digits = matchTemplateDigits(template, name);
        return digits === null ? [] : [{ name, digits }];
      })
      .sort((a, b) =>
        a.digits < b.digits ? -1 : a.digits > b.digits ? 1 : 0
      );

    this.logger.debug({
      template: formatTemplate(template),
      count: matched.length,
    })`${directory} 中找到 ${matched.length} 個符合 ${formatTemplate(template)} 的檔案`;

    return ok(matched.map(({ name }) => path.join(directory, name)));
  }
}
