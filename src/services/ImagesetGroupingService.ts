/**
 * key 為樣板字串 (例如 a_###.img)；無法推斷樣板的檔案以檔名本身為 key，值為 [null]。
 * key 依首次出現順序排列，序號依輸入順序排列，不排序也不去重。
 */
export type ImagesetGrouping = Map<string, Array<bigint | null>>;

export interface ImagesetGroupingService {
  group(fileNames: readonly string[]): ImagesetGrouping;
}
