import { describe, expect, test } from "vitest";

import type { ImagesetGrouping } from "@/services/ImagesetGroupingService";
import { summarizeImagesets } from "@/services/ImagesetSummary";

describe("summarizeImagesets", () => {
  test("計算範圍、缺號區間與重複序號", () => {
    const grouping: ImagesetGrouping = new Map([
      ["a_###.img", [5n, 1n, 2n, 2n, 7n]],
    ]);

    expect(summarizeImagesets(grouping)).toEqual([
      {
        key: "a_###.img",
        isSequence: true,
        count: 5,
        first: 1n,
        last: 7n,
        missing: [
          { from: 3n, to: 4n },
          { from: 6n, to: 6n },
        ],
        missingCount: 3n,
        duplicates: [2n],
      },
    ]);
  });

  test("連續序列沒有缺號", () => {
    const grouping: ImagesetGrouping = new Map([["x_####.cbf", [3n, 1n, 2n]]]);

    const [summary] = summarizeImagesets(grouping);

    expect(summary.first).toBe(1n);
    expect(summary.last).toBe(3n);
    expect(summary.missing).toEqual([]);
    expect(summary.missingCount).toBe(0n);
  });

  test("無樣板的檔案回報為單一檔案", () => {
    const grouping: ImagesetGrouping = new Map([["b.dat", [null]]]);

    expect(summarizeImagesets(grouping)).toEqual([
      {
        key: "b.dat",
        isSequence: false,
        count: 1,
        first: null,
        last: null,
        missing: [],
        missingCount: 0n,
        duplicates: [],
      },
    ]);
  });
});
