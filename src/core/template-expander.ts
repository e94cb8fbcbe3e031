/**
 * 通知模板展开
 *
 * 从左到右扫描模板：每个位置上先依次尝试捕获参数的键，命中则输出对应的值；
 * 否则若是占位字符则输出匹配原文；否则原样输出该字符。
 * 输出的值不会被再次扫描。
 */

import type { ArgumentOrder, MatchRecord } from "../types";

export const DEFAULT_PLACEHOLDER = "$";

export interface ExpandOptions {
  placeholder?: string;
  argumentOrder?: ArgumentOrder;
}

/**
 * 按给定顺序排列参数键，空键会被忽略
 */
export function orderArgumentKeys(
  args: Map<string, string>,
  order: ArgumentOrder = "longest-first"
): string[] {
  const keys = [...args.keys()].filter((key) => key.length > 0);
  if (order === "report") {
    return keys;
  }
  return keys.sort((a, b) => {
    if (a.length !== b.length) return b.length - a.length;
    return a < b ? -1 : a > b ? 1 : 0;
  });
}

export function expandAdvice(
  template: string,
  record: Pick<MatchRecord, "matchedText" | "capturedArgs">,
  options: ExpandOptions = {}
): string {
  const placeholder = options.placeholder ?? DEFAULT_PLACEHOLDER;
  const keys = orderArgumentKeys(record.capturedArgs, options.argumentOrder);

  let out = "";
  let i = 0;
  while (i < template.length) {
    const key = keys.find((k) => template.startsWith(k, i));
    if (key !== undefined) {
      out += record.capturedArgs.get(key) ?? "";
      i += key.length;
    } else if (placeholder && template.startsWith(placeholder, i)) {
      out += record.matchedText;
      i += placeholder.length;
    } else {
      out += template[i];
      i++;
    }
  }
  return out;
}
