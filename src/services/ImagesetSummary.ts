import type { ImagesetGrouping } from "./ImagesetGroupingService";
import { compareIndex } from "./Template";

export type IndexRange = { from: bigint; to: bigint };

export interface ImagesetSummary {
  key: string;
  isSequence: boolean;
  count: number;
  first: bigint | null;
  last: bigint | null;
  /** first 與 last 之間缺少的序號區間 (含兩端) */
  missing: IndexRange[];
  missingCount: bigint;
  duplicates: bigint[];
}

export function summarizeImagesets(
  grouping: ImagesetGrouping
): ImagesetSummary[] {
  return Array.from(grouping.entries()).map(
    ([key, values]): ImagesetSummary => {
      const indices = values.filter((v): v is bigint => v !== null);
      if (indices.length === 0) {
        return {
          key,
          isSequence: false,
          count: values.length,
          first: null,
          last: null,
          missing: [],
          missingCount: 0n,
          duplicates: [],
        };
      }

      const sorted = [...indices].sort(compareIndex);
      const first = sorted[0];
      const last = sorted[sorted.length - 1];
      const duplicates = new Set<bigint>();
      const missing: IndexRange[] = [];
      let missingCount = 0n;
      for (let i = 1; i < sorted.length; i++) {
        const prev = sorted[i - 1];
        const cur = sorted[i];
        if (cur === prev) {
          duplicates.add(cur);
        } else if (cur > prev + 1n) {
          missing.push({ from: prev + 1n, to: cur - 1n });
          missingCount += cur - prev - 1n;
        }
      }

      return {
        key,
        isSequence: true,
        count: values.length,
        first,
        last,
        missing,
        missingCount,
        duplicates: Array.from(duplicates),
      };
    }
  );
}
