import os from "node:os";
import path from "node:path";

export function expandHome(p: string) {
  if (p === "~") return os.homedir();
  if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
  return p;
}

/** "cbf, .img,h5" → ["cbf", ".img", "h5"] */
export function parseExtList(list: string | undefined): string[] {
  if (!list) return [];
  return list
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}
