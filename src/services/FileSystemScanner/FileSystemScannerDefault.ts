import { readdir } from "node:fs/promises";
import path from "node:path";

import { type Result, err, ok } from "~shared/utils/Result";

import type {
  FileSystemScanner,
  ScanError,
  ScanOptions,
} from "./FileSystemScanner";

export class FileSystemScannerDefault implements FileSystemScanner {
  async listEntries(dirPath: string): Promise<Result<string[], ScanError>> {
    try {
      return ok(await readdir(dirPath));
    } catch (e) {
      return err(toScanError(dirPath, e));
    }
  }

  async scanFiles(
    rootPath: string,
    options?: ScanOptions
  ): Promise<Result<string[], ScanError>> {
    const allowExts = options?.allowExts ?? [];
    const isRecursive = options?.recursive ?? false;
    const allowExtsSet = new Set(
      allowExts.map((e) =>
        e.startsWith(".") ? e.toLowerCase() : `.${e.toLowerCase()}`
      )
    );
    try {
      const dirents = await readdir(rootPath, {
        recursive: isRecursive,
        withFileTypes: true,
      });
      const fullPaths = dirents
        .filter((d) => {
          if (!d.isFile()) return false;
          if (allowExtsSet.size === 0) return true;
          return allowExtsSet.has(path.extname(d.name).toLowerCase());
        })
        .map((d) => path.join(d.parentPath, d.name))
        .sort();
      return ok(fullPaths);
    } catch (e) {
      return err(toScanError(rootPath, e));
    }
  }
}

function toScanError(targetPath: string, e: unknown): ScanError {
  const code =
    e instanceof Error && "code" in e && typeof e.code === "string"
      ? e.code
      : undefined;
  return {
    type: "SCAN_FAILED",
    path: targetPath,
    code,
    message: e instanceof Error ? e.message : String(e),
    cause: e,
  };
}
