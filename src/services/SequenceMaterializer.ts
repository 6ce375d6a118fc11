import type { Result } from "~shared/utils/Result";

import type { ScanError } from "./FileSystemScanner";

export interface SequenceMaterializer {
  /**
   * 由一個代表檔推斷樣板，列出同目錄下所有符合樣板的既有檔案 (依序號遞增)。
   * 無法推斷樣板時回傳只含原路徑的陣列。
   */
  materialize(filePath: string): Promise<Result<string[], ScanError>>;
}
