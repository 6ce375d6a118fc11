export const TEMPLATE_PLACEHOLDER = "#";

/**
 * 序列檔名樣板：固定前綴 + 固定寬度數字 + 固定後綴。
 * 例如 foo_0001.cbf → { prefix: "foo_", digitCount: 4, suffix: ".cbf" }
 */
export interface ImageTemplate {
  prefix: string;
  digitCount: number;
  suffix: string;
}

/** foo_####.cbf */
export function formatTemplate(template: ImageTemplate): string {
  return (
    template.prefix +
    TEMPLATE_PLACEHOLDER.repeat(template.digitCount) +
    template.suffix
  );
}

/** foo_%04d.cbf */
export function toPrintfPattern(template: ImageTemplate): string {
  return `${template.prefix}%0${template.digitCount}d${template.suffix}`;
}

/** 序號以 bigint 表示，長數字段 (例如時間戳) 不會失去精度 */
export function renderTemplate(template: ImageTemplate, index: bigint): string {
  const digits = index.toString();
  if (index < 0n || digits.length > template.digitCount) {
    throw new RangeError(
      `序號 ${digits} 超出樣板 ${formatTemplate(template)} 可表示的範圍`
    );
  }
  return (
    template.prefix + digits.padStart(template.digitCount, "0") + template.suffix
  );
}

/**
 * 檔名必須與樣板完全吻合 (數字寬度一致) 才算符合，回傳數字段原文；否則回傳 null。
 */
export function matchTemplateDigits(
  template: ImageTemplate,
  fileName: string
): string | null {
  const { prefix, digitCount, suffix } = template;
  if (fileName.length !== prefix.length + digitCount + suffix.length) {
    return null;
  }
  if (!fileName.startsWith(prefix) || !fileName.endsWith(suffix)) return null;

  const digits = fileName.slice(prefix.length, prefix.length + digitCount);
  for (const ch of digits) {
    if (!isAsciiDigit(ch)) return null;
  }
  return digits;
}

export function matchTemplate(
  template: ImageTemplate,
  fileName: string
): bigint | null {
  const digits = matchTemplateDigits(template, fileName);
  return digits === null ? null : BigInt(digits);
}

export function compareIndex(a: bigint, b: bigint): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function isAsciiDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= "0" && ch <= "9";
}
