import type { Result } from "~shared/utils/Result";

export type ScanError = {
  type: "SCAN_FAILED";
  path: string;
  /** 系統錯誤碼，例如 ENOENT、EACCES */
  code?: string;
  message: string;
  cause: unknown;
};

export type ScanOptions = {
  recursive?: boolean;
  allowExts?: readonly string[];
};

export interface DirectoryLister {
  /** 列出目錄內所有項目名稱 (不遞迴、不分類型)，為單次快照 */
  listEntries(dirPath: string): Promise<Result<string[], ScanError>>;
}

export interface FileSystemScanner extends DirectoryLister {
  /** 列出目錄下的檔案完整路徑 */
  scanFiles(
    rootPath: string,
    options?: ScanOptions
  ): Promise<Result<string[], ScanError>>;
}
