import { type ImageTemplate, isAsciiDigit } from "./Template";
import type {
  TemplateHeuristic,
  TemplateInference,
  TemplateInferencer,
} from "./TemplateInferencer";

type DigitRun = { start: number; end: number };

type Heuristic = {
  name: TemplateHeuristic;
  locate(fileName: string): DigitRun | null;
};

/** 往左找出結束於 end (不含) 的連續數字起點 */
function digitRunStart(fileName: string, end: number): number {
  let start = end;
  while (start > 0 && isAsciiDigit(fileName[start - 1])) start--;
  return start;
}

/** image.0001：檔名以 "." + 數字結尾 */
function locateBareNumeric(fileName: string): DigitRun | null {
  const end = fileName.length;
  const start = digitRunStart(fileName, end);
  if (start === end || fileName[start - 1] !== ".") return null;
  return { start, end };
}

/**
 * 由左往右找第一個前面緊接數字的 "."，數字段取到最長。
 * requireUnderscore 時，數字段前一個字元必須是 "_"。
 */
function locateBeforeDot(requireUnderscore: boolean) {
  return (fileName: string): DigitRun | null => {
    for (
      let dot = fileName.indexOf(".");
      dot !== -1;
      dot = fileName.indexOf(".", dot + 1)
    ) {
      const start = digitRunStart(fileName, dot);
      if (start === dot) continue;
      if (requireUnderscore && fileName[start - 1] !== "_") continue;
      return { start, end: dot };
    }
    return null;
  };
}

/**
 * 依固定優先順序嘗試三種規則，第一個成功者勝出：
 * 1. bare-numeric：image.0001
 * 2. underscore-delimited：foo_0001.cbf
 * 3. generic：foo0001.cbf
 */
export class TemplateInferencerDefault implements TemplateInferencer {
  private readonly heuristics: readonly Heuristic[] = [
    { name: "bare-numeric", locate: locateBareNumeric },
    { name: "underscore-delimited", locate: locateBeforeDot(true) },
    { name: "generic", locate: locateBeforeDot(false) },
  ];

  infer(fileName: string): TemplateInference {
    for (const heuristic of this.heuristics) {
      const run = heuristic.locate(fileName);
      if (!run) continue;

      const template: ImageTemplate = {
        prefix: fileName.slice(0, run.start),
        digitCount: run.end - run.start,
        suffix: fileName.slice(run.end),
      };
      return {
        template,
        index: BigInt(fileName.slice(run.start, run.end)),
        heuristic: heuristic.name,
      };
    }
    return { template: null, index: 0n, heuristic: null };
  }
}
