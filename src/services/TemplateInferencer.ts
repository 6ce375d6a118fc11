import type { ImageTemplate } from "./Template";

export type TemplateHeuristic =
  | "bare-numeric"
  | "underscore-delimited"
  | "generic";

export type TemplateInference =
  | { template: ImageTemplate; index: bigint; heuristic: TemplateHeuristic }
  | { template: null; index: 0n; heuristic: null };

export interface TemplateInferencer {
  /**
   * 從單一檔名推斷序列樣板與序號。
   * 找不到數字序列時回傳 template: null，該檔案應視為單獨一組。
   */
  infer(fileName: string): TemplateInference;
}
